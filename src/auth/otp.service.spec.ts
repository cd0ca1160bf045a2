import { Test, TestingModule } from '@nestjs/testing';
import { ConfigService } from '@nestjs/config';
import * as bcrypt from 'bcrypt';
import { OtpService } from './otp.service';
import { OtpStoreService } from './services/otp-store.service';
import { OtpRateLimiterService } from './services/otp-rate-limiter.service';
import { RedisService } from '../redis/redis.service';
import { SmsService } from '../sms/sms.service';
import { AuditLoggerService } from '../common/services/audit-logger.service';
import { MetricsService } from '../common/services/metrics.service';
import { ClockService } from '../common/services/clock.service';
import { RandomService } from '../common/services/random.service';
import {
  AuthErrorCode,
  AuthException,
  RateLimitedException,
} from '../common/exceptions/auth.exception';
import { InMemoryRedisService } from '../../test/helpers/in-memory-redis.service';
import { FakeClock } from '../../test/helpers/fake-clock';
import {
  AuditLoggerMock,
  createAuditLoggerMock,
  createMetricsMock,
  failureOf,
  MetricsMock,
} from '../../test/helpers/service-mocks';

describe('OtpService', () => {
  let otpService: OtpService;
  let otpStore: OtpStoreService;
  let redis: InMemoryRedisService;
  let clock: FakeClock;
  let smsService: { sendOtpSms: jest.Mock };
  let auditLogger: AuditLoggerMock;
  let metricsService: MetricsMock;
  let config: Record<string, number>;

  const phone = '+994501234567';

  const lastSentCode = (): string => {
    const calls = smsService.sendOtpSms.mock.calls;
    return calls[calls.length - 1][1];
  };

  const wrongCodeFor = (code: string): string => (code === '000000' ? '111111' : '000000');

  beforeEach(async () => {
    clock = new FakeClock();
    redis = new InMemoryRedisService(() => clock.now());
    smsService = { sendOtpSms: jest.fn().mockResolvedValue(undefined) };
    auditLogger = createAuditLoggerMock();
    metricsService = createMetricsMock();

    config = {
      'auth.otp.length': 6,
      'auth.otp.expirySeconds': 300,
      'auth.otp.maxVerifyAttempts': 3,
      'auth.otp.hashRounds': 4,
      'auth.rateLimit.issueWindowSeconds': 600,
      'auth.rateLimit.issueMaxRequests': 5,
    };

    const module: TestingModule = await Test.createTestingModule({
      providers: [
        OtpService,
        OtpStoreService,
        OtpRateLimiterService,
        RandomService,
        { provide: RedisService, useValue: redis },
        { provide: SmsService, useValue: smsService },
        { provide: ConfigService, useValue: { getOrThrow: jest.fn((key: string) => config[key]) } },
        { provide: ClockService, useValue: clock },
        { provide: AuditLoggerService, useValue: auditLogger },
        { provide: MetricsService, useValue: metricsService },
      ],
    }).compile();

    otpService = module.get<OtpService>(OtpService);
    otpStore = module.get<OtpStoreService>(OtpStoreService);
  });

  describe('issue', () => {
    it('should store only a hash of the code and send the code by SMS', async () => {
      const result = await otpService.issue(phone);

      const code = lastSentCode();
      const stored = await otpStore.find(phone);

      expect(code).toMatch(/^\d{6}$/);
      expect(smsService.sendOtpSms).toHaveBeenCalledWith(phone, code);
      expect(stored?.record.codeHash).not.toContain(code);
      expect(await bcrypt.compare(code, stored?.record.codeHash ?? '')).toBe(true);
      expect(stored?.record).toMatchObject({
        phone,
        issuedAt: clock.now(),
        expiresAt: clock.now() + 300000,
        attemptsRemaining: 3,
      });
      expect(result).toEqual({
        phone,
        expiresAt: new Date(clock.now() + 300000),
        attemptsAllowed: 3,
        dispatched: true,
      });
      expect(auditLogger.logOtpIssued).toHaveBeenCalledWith(phone, new Date(clock.now() + 300000));
      expect(metricsService.incrementOtpIssued).toHaveBeenCalledWith('success');
    });

    it('should invalidate the previous code when a new one is issued', async () => {
      await otpService.issue(phone);
      const firstCode = lastSentCode();
      await otpService.issue(phone);
      const secondCode = lastSentCode();

      if (firstCode !== secondCode) {
        const error = await failureOf(otpService.verifyAndConsume(phone, firstCode));
        expect(error).toMatchObject({ code: AuthErrorCode.CODE_MISMATCH });
      }
      await expect(otpService.verifyAndConsume(phone, secondCode)).resolves.toBeUndefined();
    });

    it('should keep the record and report a failed dispatch', async () => {
      smsService.sendOtpSms.mockRejectedValueOnce(new Error('gateway down'));

      const result = await otpService.issue(phone);

      expect(result.dispatched).toBe(false);
      expect(auditLogger.logOtpDispatchFailed).toHaveBeenCalledWith(phone, 'gateway down');
      expect(metricsService.incrementOtpIssued).toHaveBeenCalledWith('dispatch_failed');
      expect(auditLogger.logOtpIssued).not.toHaveBeenCalled();
      await expect(otpService.verifyAndConsume(phone, lastSentCode())).resolves.toBeUndefined();
    });

    it('should stop issuing once the window cap is reached', async () => {
      for (let i = 0; i < 5; i++) {
        await otpService.issue(phone);
      }

      const error = await failureOf(otpService.issue(phone));

      expect(error).toBeInstanceOf(RateLimitedException);
      expect(error).toMatchObject({ retryAfterSeconds: 600 });
      expect(smsService.sendOtpSms).toHaveBeenCalledTimes(5);
    });

    it('should propagate store outages', async () => {
      redis.setUnavailable(true);

      const error = await failureOf(otpService.issue(phone));

      expect(error).toMatchObject({ code: AuthErrorCode.STORE_UNAVAILABLE });
      expect(smsService.sendOtpSms).not.toHaveBeenCalled();
    });
  });

  describe('verifyAndConsume', () => {
    it('should accept the correct code exactly once', async () => {
      await otpService.issue(phone);
      const code = lastSentCode();

      await expect(otpService.verifyAndConsume(phone, code)).resolves.toBeUndefined();
      const error = await failureOf(otpService.verifyAndConsume(phone, code));

      expect(error).toMatchObject({ code: AuthErrorCode.NOT_FOUND });
      expect(auditLogger.logOtpVerified).toHaveBeenCalledWith(phone);
      expect(metricsService.incrementOtpVerified).toHaveBeenCalledTimes(1);
    });

    it('should fail with NOT_FOUND when no code was issued', async () => {
      const error = await failureOf(otpService.verifyAndConsume(phone, '123456'));

      expect(error).toBeInstanceOf(AuthException);
      expect(error).toMatchObject({ code: AuthErrorCode.NOT_FOUND });
      expect(metricsService.incrementOtpFailed).toHaveBeenCalledWith('not_found');
    });

    it('should reject an empty code without touching the record', async () => {
      await otpService.issue(phone);

      const error = await failureOf(otpService.verifyAndConsume(phone, ''));

      expect(error).toMatchObject({ code: AuthErrorCode.CODE_MISMATCH });
      expect((await otpStore.find(phone))?.record.attemptsRemaining).toBe(3);
    });

    it('should count down attempts and evict the record when they run out', async () => {
      await otpService.issue(phone);
      const code = lastSentCode();
      const wrong = wrongCodeFor(code);

      const first = await failureOf(otpService.verifyAndConsume(phone, wrong));
      const second = await failureOf(otpService.verifyAndConsume(phone, wrong));
      const third = await failureOf(otpService.verifyAndConsume(phone, wrong));
      const afterwards = await failureOf(otpService.verifyAndConsume(phone, code));

      expect(first).toMatchObject({
        code: AuthErrorCode.CODE_MISMATCH,
        details: { attemptsRemaining: 2 },
      });
      expect(second).toMatchObject({
        code: AuthErrorCode.CODE_MISMATCH,
        details: { attemptsRemaining: 1 },
      });
      expect(third).toMatchObject({ code: AuthErrorCode.TOO_MANY_ATTEMPTS });
      expect(afterwards).toMatchObject({ code: AuthErrorCode.NOT_FOUND });
    });

    it('should accept the correct code after a wrong one', async () => {
      await otpService.issue(phone);
      const code = lastSentCode();

      await failureOf(otpService.verifyAndConsume(phone, wrongCodeFor(code)));

      await expect(otpService.verifyAndConsume(phone, code)).resolves.toBeUndefined();
    });

    it('should reject a correct code after expiry and evict the record', async () => {
      await otpService.issue(phone);
      const code = lastSentCode();
      clock.advance(300001);

      const expired = await failureOf(otpService.verifyAndConsume(phone, code));
      const afterwards = await failureOf(otpService.verifyAndConsume(phone, code));

      expect(expired).toMatchObject({ code: AuthErrorCode.EXPIRED });
      expect(afterwards).toMatchObject({ code: AuthErrorCode.NOT_FOUND });
      expect(metricsService.incrementOtpFailed).toHaveBeenCalledWith('expired');
    });

    it('should still accept the code at its expiry instant', async () => {
      await otpService.issue(phone);
      clock.advance(300000);

      await expect(otpService.verifyAndConsume(phone, lastSentCode())).resolves.toBeUndefined();
    });

    it('should let only one of two concurrent correct submissions through', async () => {
      await otpService.issue(phone);
      const code = lastSentCode();

      const results = await Promise.allSettled([
        otpService.verifyAndConsume(phone, code),
        otpService.verifyAndConsume(phone, code),
      ]);

      const fulfilled = results.filter((r) => r.status === 'fulfilled');
      const rejected = results.filter(
        (r): r is PromiseRejectedResult => r.status === 'rejected',
      );
      expect(fulfilled).toHaveLength(1);
      expect(rejected).toHaveLength(1);
      expect(rejected[0].reason).toMatchObject({ code: AuthErrorCode.NOT_FOUND });
    });

    it('should not lose attempts when wrong codes arrive concurrently', async () => {
      await otpService.issue(phone);
      const wrong = wrongCodeFor(lastSentCode());

      await Promise.allSettled([
        otpService.verifyAndConsume(phone, wrong),
        otpService.verifyAndConsume(phone, wrong),
      ]);

      expect((await otpStore.find(phone))?.record.attemptsRemaining).toBe(1);
    });

    it('should count every wrong code when more arrive at once than the retry limit', async () => {
      config['auth.otp.maxVerifyAttempts'] = 10;
      await otpService.issue(phone);
      const code = lastSentCode();
      const wrongCodes = ['0', '1', '2', '3', '4', '5', '6', '7', '8', '9']
        .map((digit) => digit.repeat(6))
        .filter((candidate) => candidate !== code)
        .slice(0, 8);

      const results = await Promise.allSettled(
        wrongCodes.map((wrong) => otpService.verifyAndConsume(phone, wrong)),
      );

      const reasons = results.map((r) => (r.status === 'rejected' ? r.reason : undefined));
      expect(reasons).toHaveLength(8);
      reasons.forEach((reason) => {
        expect(reason).toMatchObject({ code: AuthErrorCode.CODE_MISMATCH });
      });
      expect((await otpStore.find(phone))?.record.attemptsRemaining).toBe(2);
      expect(metricsService.incrementOtpFailed).not.toHaveBeenCalledWith('contention');
    });

    it('should not charge a newer code for a guess made against the old one', async () => {
      await otpService.issue(phone);
      const wrong = wrongCodeFor(lastSentCode());
      const recordFailedAttempt = otpStore.recordFailedAttempt.bind(otpStore);
      jest.spyOn(otpStore, 'recordFailedAttempt').mockImplementationOnce(async (current) => {
        await otpService.issue(phone);
        return recordFailedAttempt(current);
      });

      const error = await failureOf(otpService.verifyAndConsume(phone, wrong));

      expect(error).toMatchObject({ code: AuthErrorCode.CODE_MISMATCH });
      expect((await otpStore.find(phone))?.record.attemptsRemaining).toBe(3);
    });

    it('should fail closed when the record keeps changing underneath', async () => {
      await otpService.issue(phone);
      const code = lastSentCode();
      const remove = jest.spyOn(otpStore, 'remove').mockResolvedValue(false);

      const error = await failureOf(otpService.verifyAndConsume(phone, code));

      expect(error).toMatchObject({ code: AuthErrorCode.CODE_MISMATCH });
      expect(remove).toHaveBeenCalledTimes(3);
      expect(metricsService.incrementOtpFailed).toHaveBeenCalledWith('contention');
    });
  });
});
