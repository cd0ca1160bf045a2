import { BaseSmsProvider } from './base-sms.provider';

/**
 * Mock SMS provider for development and testing
 * Logs SMS messages instead of actually sending them
 */
export class MockSmsProvider extends BaseSmsProvider {
  constructor() {
    super('MockSmsProvider');
  }

  async sendOtpSms(phone: string, code: string): Promise<void> {
    this.assertValid(phone, code);

    this.logger.log(`[SMS MOCK] To: ${phone} | ${this.formatMessage(code)}`);
  }
}
