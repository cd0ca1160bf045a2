import { Injectable, Logger } from '@nestjs/common';
import { Cron, CronExpression } from '@nestjs/schedule';
import { OtpStoreService } from './otp-store.service';
import { RevocationStoreService } from './revocation-store.service';
import { ClockService } from '../../common/services/clock.service';
import { AuditLoggerService } from '../../common/services/audit-logger.service';
import { MetricsService } from '../../common/services/metrics.service';

export interface EvictionSummary {
  otpRecords: number;
  revokedTokens: number;
}

/**
 * Sweeps expired OTP records and revocation entries that outlived their TTL.
 * Correctness never depends on this job; it only bounds store growth.
 */
@Injectable()
export class AuthStoreCleanupService {
  private readonly logger = new Logger(AuthStoreCleanupService.name);

  constructor(
    private otpStore: OtpStoreService,
    private revocationStore: RevocationStoreService,
    private clock: ClockService,
    private auditLogger: AuditLoggerService,
    private metricsService: MetricsService,
  ) {}

  @Cron(CronExpression.EVERY_10_MINUTES, { name: 'auth-store-cleanup' })
  async handleCleanup(): Promise<void> {
    this.logger.log('Starting scheduled auth store cleanup...');
    await this.evictExpired();
  }

  /**
   * Runs one sweep over both stores.
   */
  async evictExpired(): Promise<EvictionSummary> {
    const startTime = this.clock.now();

    try {
      const otpRecords = await this.otpStore.evictExpired(startTime);
      const revokedTokens = await this.revocationStore.evictExpired();
      const duration = (this.clock.now() - startTime) / 1000;

      this.metricsService.incrementStoreEvictions('otp', otpRecords);
      this.metricsService.incrementStoreEvictions('revocation', revokedTokens);

      this.logger.log(
        `Evicted ${otpRecords} OTP records and ${revokedTokens} revocation entries in ${duration.toFixed(2)}s`,
      );
      this.auditLogger.logStoreCleanup(true, 'Expired entries evicted', {
        otpRecords,
        revokedTokens,
        durationSeconds: duration,
      });

      return { otpRecords, revokedTokens };
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      this.logger.error(`Auth store cleanup failed: ${message}`);
      this.auditLogger.logStoreCleanup(false, `Auth store cleanup failed: ${message}`);
      throw error;
    }
  }
}
