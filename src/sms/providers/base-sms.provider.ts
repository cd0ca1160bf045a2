import { Logger } from '@nestjs/common';

const E164_PATTERN = /^\+[1-9]\d{7,14}$/;

/**
 * Base abstract class for SMS providers
 * Implements the Strategy pattern for different SMS providers
 */
export abstract class BaseSmsProvider {
  protected readonly logger: Logger;

  constructor(loggerContext: string) {
    this.logger = new Logger(loggerContext);
  }

  /**
   * Send an OTP SMS to the specified phone number
   * @throws Error if the message could not be handed to the provider
   */
  abstract sendOtpSms(phone: string, code: string): Promise<void>;

  protected validatePhoneNumber(phone: string): boolean {
    return E164_PATTERN.test(phone);
  }

  protected validateOtpCode(code: string): boolean {
    return code.length >= 4 && /^\d+$/.test(code);
  }

  protected formatMessage(code: string): string {
    return `Your verification code is: ${code}`;
  }

  protected assertValid(phone: string, code: string): void {
    if (!this.validatePhoneNumber(phone)) {
      throw new Error('Invalid phone number format');
    }

    if (!this.validateOtpCode(code)) {
      throw new Error('Invalid OTP code format');
    }
  }
}
