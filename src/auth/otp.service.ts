import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import * as bcrypt from 'bcrypt';
import { SmsService } from '../sms/sms.service';
import { AuditLoggerService } from '../common/services/audit-logger.service';
import { MetricsService, OtpFailureReason } from '../common/services/metrics.service';
import { ClockService } from '../common/services/clock.service';
import { RandomService } from '../common/services/random.service';
import {
  AuthErrorCode,
  AuthErrorDetails,
  AuthException,
} from '../common/exceptions/auth.exception';
import { OtpStoreService } from './services/otp-store.service';
import { OtpRateLimiterService } from './services/otp-rate-limiter.service';
import { AUTH_CONSTANTS } from './constants/auth.constants';
import { OtpIssueResult, OtpRecord, VersionedOtpRecord } from './types/auth.types';

/**
 * Issues one-time codes and verifies them exactly once.
 *
 * Phones passed in must already be canonical.
 */
@Injectable()
export class OtpService {
  private readonly logger = new Logger(OtpService.name);

  constructor(
    private otpStore: OtpStoreService,
    private rateLimiter: OtpRateLimiterService,
    private smsService: SmsService,
    private configService: ConfigService,
    private clock: ClockService,
    private random: RandomService,
    private auditLogger: AuditLoggerService,
    private metricsService: MetricsService,
  ) {}

  /**
   * Generates a fresh code for `phone`, replacing any pending one, and hands it
   * to the SMS provider. A delivery failure does not undo the stored record;
   * it is reported through `dispatched: false`.
   *
   * @throws RateLimitedException when the issuance window is full
   */
  async issue(phone: string): Promise<OtpIssueResult> {
    await this.rateLimiter.consume(phone);

    const length = this.configService.getOrThrow<number>('auth.otp.length');
    const expirySeconds = this.configService.getOrThrow<number>('auth.otp.expirySeconds');
    const maxAttempts = this.configService.getOrThrow<number>('auth.otp.maxVerifyAttempts');
    const hashRounds = this.configService.getOrThrow<number>('auth.otp.hashRounds');

    const code = this.random.numericCode(length);
    const issuedAt = this.clock.now();
    const record: OtpRecord = {
      phone,
      codeHash: await bcrypt.hash(code, hashRounds),
      issuedAt,
      expiresAt: issuedAt + expirySeconds * 1000,
      attemptsRemaining: maxAttempts,
    };

    await this.otpStore.save(record);

    const expiresAt = new Date(record.expiresAt);
    const dispatched = await this.dispatch(phone, code);
    if (dispatched) {
      this.auditLogger.logOtpIssued(phone, expiresAt);
      this.metricsService.incrementOtpIssued('success');
    }

    return { phone, expiresAt, attemptsAllowed: maxAttempts, dispatched };
  }

  /**
   * Checks `code` against the pending record and consumes it on success.
   *
   * Consumption is conditional on the exact record that was read. When another
   * caller changed the record first, the loop re-reads it; after
   * `MAX_OPTIMISTIC_RETRIES` lost races a correct code is rejected. A wrong code
   * never loops: its attempt is taken off atomically.
   *
   * @throws AuthException NOT_FOUND, EXPIRED, CODE_MISMATCH or TOO_MANY_ATTEMPTS
   */
  async verifyAndConsume(phone: string, code: string): Promise<void> {
    const startTime = this.clock.now();

    if (!code) {
      throw this.rejection(phone, AuthErrorCode.CODE_MISMATCH, 'code_mismatch');
    }

    for (let attempt = 0; attempt < AUTH_CONSTANTS.OTP.MAX_OPTIMISTIC_RETRIES; attempt++) {
      const current = await this.otpStore.find(phone);
      if (!current) {
        throw this.rejection(phone, AuthErrorCode.NOT_FOUND, 'not_found');
      }

      const { record } = current;
      if (this.clock.now() > record.expiresAt) {
        await this.otpStore.remove(current);
        throw this.rejection(phone, AuthErrorCode.EXPIRED, 'expired');
      }

      const matches = await bcrypt.compare(code, record.codeHash);

      if (matches) {
        if (await this.otpStore.remove(current)) {
          this.auditLogger.logOtpVerified(phone);
          this.metricsService.incrementOtpVerified();
          this.metricsService.recordOtpVerificationDuration((this.clock.now() - startTime) / 1000);
          return;
        }
        continue;
      }

      throw await this.wrongCode(phone, current);
    }

    this.logger.warn(`Gave up verifying after concurrent updates for ${this.auditLogger.maskPhoneNumber(phone)}`);
    throw this.rejection(phone, AuthErrorCode.CODE_MISMATCH, 'contention');
  }

  private async wrongCode(phone: string, current: VersionedOtpRecord): Promise<AuthException> {
    const result = await this.otpStore.recordFailedAttempt(current);

    switch (result.status) {
      case 'gone':
        return this.rejection(phone, AuthErrorCode.NOT_FOUND, 'not_found');
      case 'superseded':
        // A newer code was issued after the comparison; it keeps its attempts.
        return this.rejection(phone, AuthErrorCode.CODE_MISMATCH, 'code_mismatch');
      case 'counted':
        if (result.attemptsRemaining <= 0) {
          return this.rejection(phone, AuthErrorCode.TOO_MANY_ATTEMPTS, 'too_many_attempts');
        }
        return this.rejection(phone, AuthErrorCode.CODE_MISMATCH, 'code_mismatch', {
          attemptsRemaining: result.attemptsRemaining,
        });
    }
  }

  private async dispatch(phone: string, code: string): Promise<boolean> {
    try {
      await this.smsService.sendOtpSms(phone, code);
      return true;
    } catch (error) {
      const reason = error instanceof Error ? error.message : String(error);
      this.logger.error(`OTP dispatch failed for ${this.auditLogger.maskPhoneNumber(phone)}: ${reason}`);
      this.auditLogger.logOtpDispatchFailed(phone, reason);
      this.metricsService.incrementOtpIssued('dispatch_failed');
      return false;
    }
  }

  private rejection(
    phone: string,
    code: AuthErrorCode,
    reason: OtpFailureReason,
    details?: AuthErrorDetails,
  ): AuthException {
    this.auditLogger.logOtpVerificationFailed(phone, reason, details);
    this.metricsService.incrementOtpFailed(reason);
    return new AuthException(code, details);
  }
}
