import { ConfigService } from '@nestjs/config';
import { ConfigValidationService } from './config-validation.service';

describe('ConfigValidationService', () => {
  const validConfig = (): Record<string, unknown> => ({
    'database.host': 'localhost',
    'database.port': 5432,
    'database.password': 'test-password',
    'database.poolSize': 20,
    'redis.host': 'localhost',
    'redis.port': 6379,
    'redis.password': 'test-password',
    'redis.commandTimeoutMs': 500,
    'auth.jwt.keys': { k1: 'test-secret-that-is-long-enough-1234' },
    'auth.jwt.activeKeyId': 'k1',
    'auth.jwt.accessTokenTtlSeconds': 900,
    'auth.jwt.refreshTokenTtlSeconds': 2592000,
    'auth.otp.length': 6,
    'auth.otp.expirySeconds': 300,
    'auth.otp.maxVerifyAttempts': 3,
    'auth.rateLimit.issueMaxRequests': 5,
    'sms.sandbox': true,
  });

  const createService = (config: Record<string, unknown>): ConfigValidationService => {
    const configService = {
      get: jest.fn((key: string) => config[key]),
    } as unknown as ConfigService;
    return new ConfigValidationService(configService);
  };

  it('should pass a complete configuration without warnings', () => {
    const service = createService(validConfig());

    expect(() => service.validate()).not.toThrow();
    expect(service.getWarnings()).toEqual([]);
  });

  it('should fail when no signing key is configured', () => {
    const service = createService({ ...validConfig(), 'auth.jwt.keys': {} });

    expect(() => service.validate()).toThrow('Configuration validation failed');
  });

  it('should fail on a short signing key', () => {
    const service = createService({ ...validConfig(), 'auth.jwt.keys': { k1: 'short' } });

    expect(() => service.validate()).toThrow('Configuration validation failed');
  });

  it('should fail when the active key id is unknown', () => {
    const service = createService({ ...validConfig(), 'auth.jwt.activeKeyId': 'k9' });

    expect(() => service.validate()).toThrow('Configuration validation failed');
  });

  it('should fail on an out of range OTP length', () => {
    const service = createService({ ...validConfig(), 'auth.otp.length': 3 });

    expect(() => service.validate()).toThrow('Configuration validation failed');
  });

  it('should fail on an invalid port', () => {
    const service = createService({ ...validConfig(), 'redis.port': 70000 });

    expect(() => service.validate()).toThrow('Configuration validation failed');
  });

  it('should warn when the access token outlives the refresh token', () => {
    const service = createService({
      ...validConfig(),
      'auth.jwt.accessTokenTtlSeconds': 3600,
      'auth.jwt.refreshTokenTtlSeconds': 600,
    });

    service.validate();

    expect(service.getWarnings()).toEqual([
      'ACCESS_TOKEN_TTL_SECONDS should be shorter than REFRESH_TOKEN_TTL_SECONDS',
    ]);
  });

  it('should warn when the SMS gateway is missing outside sandbox mode', () => {
    const service = createService({ ...validConfig(), 'sms.sandbox': false });

    service.validate();

    expect(service.getWarnings()).toEqual([
      'SMS_API_KEY or SMS_GATEWAY_URL is missing. OTP delivery will fail.',
    ]);
  });
});
