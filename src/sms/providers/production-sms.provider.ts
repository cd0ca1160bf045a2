import { ConfigService } from '@nestjs/config';
import { BaseSmsProvider } from './base-sms.provider';

/**
 * Production SMS provider
 * Posts messages to an HTTP gateway authenticated with a bearer API key
 */
export class ProductionSmsProvider extends BaseSmsProvider {
  constructor(private configService: ConfigService) {
    super('ProductionSmsProvider');
  }

  async sendOtpSms(phone: string, code: string): Promise<void> {
    this.assertValid(phone, code);

    const apiKey = this.configService.get<string>('sms.apiKey');
    const gatewayUrl = this.configService.get<string>('sms.gatewayUrl');
    if (!apiKey || !gatewayUrl) {
      throw new Error('SMS gateway is not configured. Set SMS_API_KEY and SMS_GATEWAY_URL.');
    }

    const timeoutMs = this.configService.get<number>('sms.timeoutMs') ?? 5000;
    const response = await fetch(gatewayUrl, {
      method: 'POST',
      headers: {
        'Content-Type': 'application/json',
        Authorization: `Bearer ${apiKey}`,
      },
      body: JSON.stringify({
        to: phone,
        from: this.configService.get<string>('sms.sender'),
        message: this.formatMessage(code),
      }),
      signal: AbortSignal.timeout(timeoutMs),
    });

    if (!response.ok) {
      throw new Error(`SMS gateway responded with ${response.status} ${response.statusText}`);
    }

    this.logger.log(`SMS accepted by gateway (${response.status})`);
  }
}
