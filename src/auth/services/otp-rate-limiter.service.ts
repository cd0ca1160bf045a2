import { Injectable } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { RedisService } from '../../redis/redis.service';
import { ClockService } from '../../common/services/clock.service';
import { AuditLoggerService } from '../../common/services/audit-logger.service';
import { MetricsService } from '../../common/services/metrics.service';
import { RateLimitedException } from '../../common/exceptions/auth.exception';
import { AUTH_CONSTANTS } from '../constants/auth.constants';
import { RateLimitCounter } from '../types/auth.types';

/**
 * Fixed-window cap on OTP issuance per phone number.
 */
@Injectable()
export class OtpRateLimiterService {
  constructor(
    private redisService: RedisService,
    private configService: ConfigService,
    private clock: ClockService,
    private auditLogger: AuditLoggerService,
    private metricsService: MetricsService,
  ) {}

  /**
   * Counts one issuance for `phone`. The counter is incremented before the cap is
   * checked, so concurrent requests can never all slip under it.
   *
   * @throws RateLimitedException when the window already holds `issueMaxRequests` issuances
   */
  async consume(phone: string): Promise<RateLimitCounter> {
    const windowMs = this.configService.getOrThrow<number>('auth.rateLimit.issueWindowSeconds') * 1000;
    const maxRequests = this.configService.getOrThrow<number>('auth.rateLimit.issueMaxRequests');

    const { count, ttlMs } = await this.redisService.incrementWindow(
      `${AUTH_CONSTANTS.KEYS.OTP_ISSUE_COUNTER}${phone}`,
      windowMs,
    );

    if (count > maxRequests) {
      const retryAfterSeconds = Math.max(Math.ceil(ttlMs / 1000), 1);
      this.auditLogger.logRateLimitExceeded(phone, 'otp_issue', retryAfterSeconds);
      this.metricsService.incrementOtpIssued('rate_limited');
      throw new RateLimitedException(retryAfterSeconds);
    }

    return {
      phone,
      windowStart: new Date(this.clock.now() - (windowMs - ttlMs)),
      count,
    };
  }
}
