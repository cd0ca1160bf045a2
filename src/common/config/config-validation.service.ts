import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';

const MIN_SECRET_LENGTH = 32;

/**
 * Configuration Validation Service
 *
 * Validates environment-derived configuration on application startup.
 * Fails fast for critical missing configs, warns for optional ones.
 */
@Injectable()
export class ConfigValidationService {
  private readonly logger = new Logger(ConfigValidationService.name);
  private errors: string[] = [];
  private warnings: string[] = [];

  constructor(private configService: ConfigService) {}

  /**
   * Validates all configuration values
   * Throws error if critical configs are missing/invalid
   */
  validate(): void {
    this.errors = [];
    this.warnings = [];
    this.logger.log('Validating configuration...');

    this.validateDatabase();
    this.validateRedis();
    this.validateJwt();
    this.validateOtp();
    this.validateSms();

    if (this.errors.length > 0) {
      this.logger.error('❌ Configuration validation failed:');
      this.errors.forEach((error) => this.logger.error(`  - ${error}`));
      throw new Error(`Configuration validation failed. Fix the above errors and restart.`);
    }

    if (this.warnings.length > 0) {
      this.logger.warn('⚠️  Configuration warnings:');
      this.warnings.forEach((warning) => this.logger.warn(`  - ${warning}`));
    }

    this.logger.log('✅ Configuration validation passed');
  }

  getWarnings(): readonly string[] {
    return this.warnings;
  }

  private validateDatabase(): void {
    const host = this.configService.get<string>('database.host');
    const port = this.configService.get<number>('database.port');
    const password = this.configService.get<string>('database.password');
    const poolSize = this.configService.get<number>('database.poolSize');

    if (!host) {
      this.errors.push('DATABASE_HOST is required but missing');
    }

    if (!this.isValidPort(port)) {
      this.errors.push('DATABASE_PORT must be a valid port number (1-65535)');
    }

    if (!password) {
      this.warnings.push('DATABASE_PASSWORD is not set');
    }

    if (poolSize !== undefined && (poolSize < 1 || poolSize > 100)) {
      this.errors.push('DATABASE_POOL_SIZE must be between 1 and 100');
    }
  }

  private validateRedis(): void {
    const host = this.configService.get<string>('redis.host');
    const port = this.configService.get<number>('redis.port');
    const commandTimeoutMs = this.configService.get<number>('redis.commandTimeoutMs');

    if (!host) {
      this.errors.push('REDIS_HOST is required but missing');
    }

    if (!this.isValidPort(port)) {
      this.errors.push('REDIS_PORT must be a valid port number (1-65535)');
    }

    if (!commandTimeoutMs || commandTimeoutMs < 1) {
      this.errors.push('REDIS_COMMAND_TIMEOUT_MS must be a positive number of milliseconds');
    }

    if (!this.configService.get<string>('redis.password')) {
      this.warnings.push('REDIS_PASSWORD is not set (authentication disabled)');
    }
  }

  private validateJwt(): void {
    const keys = this.configService.get<Record<string, string>>('auth.jwt.keys') ?? {};
    const activeKeyId = this.configService.get<string>('auth.jwt.activeKeyId');
    const keyIds = Object.keys(keys);

    if (keyIds.length === 0) {
      this.errors.push('JWT_SIGNING_KEYS or JWT_SECRET is required but missing');
      return;
    }

    for (const keyId of keyIds) {
      if (keys[keyId].length < MIN_SECRET_LENGTH) {
        this.errors.push(`JWT key '${keyId}' must be at least ${MIN_SECRET_LENGTH} characters`);
      }
    }

    if (!activeKeyId || !(activeKeyId in keys)) {
      this.errors.push('JWT_ACTIVE_KEY_ID must name one of the configured signing keys');
    }

    const accessTtl = this.configService.get<number>('auth.jwt.accessTokenTtlSeconds') ?? 0;
    const refreshTtl = this.configService.get<number>('auth.jwt.refreshTokenTtlSeconds') ?? 0;
    if (accessTtl <= 0 || refreshTtl <= 0) {
      this.errors.push('ACCESS_TOKEN_TTL_SECONDS and REFRESH_TOKEN_TTL_SECONDS must be positive');
    } else if (accessTtl >= refreshTtl) {
      this.warnings.push('ACCESS_TOKEN_TTL_SECONDS should be shorter than REFRESH_TOKEN_TTL_SECONDS');
    }
  }

  private validateOtp(): void {
    const length = this.configService.get<number>('auth.otp.length') ?? 0;
    if (length < 4 || length > 10) {
      this.errors.push('OTP_LENGTH must be between 4 and 10');
    }

    const otpTtl = this.configService.get<number>('auth.otp.expirySeconds');
    if (otpTtl && (otpTtl < 30 || otpTtl > 600)) {
      this.warnings.push('OTP_EXPIRY_SECONDS should be between 30 and 600 seconds');
    }

    const maxVerifyAttempts = this.configService.get<number>('auth.otp.maxVerifyAttempts') ?? 0;
    if (maxVerifyAttempts < 1) {
      this.errors.push('MAX_OTP_VERIFY_ATTEMPTS must be at least 1');
    } else if (maxVerifyAttempts > 10) {
      this.warnings.push('MAX_OTP_VERIFY_ATTEMPTS should not exceed 10');
    }

    const maxRequests = this.configService.get<number>('auth.rateLimit.issueMaxRequests') ?? 0;
    if (maxRequests < 1) {
      this.errors.push('OTP_ISSUE_MAX_REQUESTS must be at least 1');
    }
  }

  private validateSms(): void {
    const smsApiKey = this.configService.get<string>('sms.apiKey');
    const gatewayUrl = this.configService.get<string>('sms.gatewayUrl');
    const smsSandbox = this.configService.get<boolean>('sms.sandbox');

    if (!smsSandbox && (!smsApiKey || !gatewayUrl)) {
      this.warnings.push('SMS_API_KEY or SMS_GATEWAY_URL is missing. OTP delivery will fail.');
    }
  }

  private isValidPort(port: number | undefined): boolean {
    return port !== undefined && port >= 1 && port <= 65535;
  }
}
