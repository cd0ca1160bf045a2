import { Injectable } from '@nestjs/common';
import { Counter, Histogram, register } from 'prom-client';

export type OtpFailureReason =
  | 'not_found'
  | 'expired'
  | 'code_mismatch'
  | 'too_many_attempts'
  | 'contention';

/**
 * Metrics service for Prometheus monitoring of the auth core.
 * Tracks OTP issuance and verification, token minting, rotation and revocation.
 */
@Injectable()
export class MetricsService {
  // OTP Metrics
  private readonly otpIssuedCounter: Counter;
  private readonly otpVerifiedCounter: Counter;
  private readonly otpFailedCounter: Counter;
  private readonly otpVerificationDuration: Histogram;

  // Token Metrics
  private readonly tokensIssuedCounter: Counter;
  private readonly tokenRefreshCounter: Counter;
  private readonly tokensRevokedCounter: Counter;

  // Store maintenance
  private readonly storeEvictionsCounter: Counter;

  constructor() {
    this.otpIssuedCounter = this.counter(
      'auth_otp_issued_total',
      'Total number of OTP issuance requests',
      ['status'],
    );

    this.otpVerifiedCounter = this.counter(
      'auth_otp_verified_total',
      'Total number of successful OTP verifications',
    );

    this.otpFailedCounter = this.counter(
      'auth_otp_failed_total',
      'Total number of failed OTP verifications',
      ['reason'],
    );

    this.otpVerificationDuration = this.histogram(
      'auth_otp_verification_duration_seconds',
      'Duration of OTP verification operations',
      [0.05, 0.1, 0.25, 0.5, 1, 2],
    );

    this.tokensIssuedCounter = this.counter(
      'auth_tokens_issued_total',
      'Total number of tokens minted',
      ['type'],
    );

    this.tokenRefreshCounter = this.counter(
      'auth_token_refresh_total',
      'Total number of refresh attempts',
      ['result'],
    );

    this.tokensRevokedCounter = this.counter(
      'auth_tokens_revoked_total',
      'Total number of refresh tokens revoked',
      ['reason'],
    );

    this.storeEvictionsCounter = this.counter(
      'auth_store_evictions_total',
      'Total number of expired entries removed by the periodic evictor',
      ['store'],
    );
  }

  // OTP Metrics Methods
  incrementOtpIssued(status: 'success' | 'rate_limited' | 'dispatch_failed' = 'success'): void {
    this.otpIssuedCounter.inc({ status });
  }

  incrementOtpVerified(): void {
    this.otpVerifiedCounter.inc();
  }

  incrementOtpFailed(reason: OtpFailureReason): void {
    this.otpFailedCounter.inc({ reason });
  }

  recordOtpVerificationDuration(durationSeconds: number): void {
    this.otpVerificationDuration.observe(durationSeconds);
  }

  // Token Metrics Methods
  incrementTokensIssued(type: 'access' | 'refresh'): void {
    this.tokensIssuedCounter.inc({ type });
  }

  incrementTokenRefresh(result: 'success' | 'revoked' | 'invalid' | 'expired'): void {
    this.tokenRefreshCounter.inc({ result });
  }

  incrementTokensRevoked(reason: 'logout' | 'rotation'): void {
    this.tokensRevokedCounter.inc({ reason });
  }

  incrementStoreEvictions(store: 'otp' | 'revocation', count: number): void {
    this.storeEvictionsCounter.inc({ store }, count);
  }

  // Metric names are process-global in prom-client; reuse an existing instance
  // when the service is constructed more than once (e.g. several testing modules).
  private counter(name: string, help: string, labelNames: string[] = []): Counter {
    const existing = register.getSingleMetric(name);
    if (existing instanceof Counter) {
      return existing;
    }
    return new Counter({ name, help, labelNames });
  }

  private histogram(name: string, help: string, buckets: number[]): Histogram {
    const existing = register.getSingleMetric(name);
    if (existing instanceof Histogram) {
      return existing;
    }
    return new Histogram({ name, help, buckets });
  }
}
