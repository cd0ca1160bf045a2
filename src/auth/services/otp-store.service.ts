import { Injectable, Logger } from '@nestjs/common';
import { RedisService } from '../../redis/redis.service';
import { AUTH_CONSTANTS } from '../constants/auth.constants';
import { FailedAttemptResult, OtpRecord, VersionedOtpRecord } from '../types/auth.types';

/**
 * Volatile store of pending OTP records, one per canonical phone number.
 * Mutations are conditional on the version read, so concurrent verifiers
 * never both act on the same record.
 */
@Injectable()
export class OtpStoreService {
  private readonly logger = new Logger(OtpStoreService.name);

  constructor(private redisService: RedisService) {}

  /**
   * Stores a record, overwriting any pending record for the same phone. The key
   * expires a grace period after the record itself.
   */
  async save(record: OtpRecord): Promise<void> {
    const ttlMs =
      Math.max(record.expiresAt - record.issuedAt, 0) + AUTH_CONSTANTS.OTP.EXPIRED_RECORD_GRACE_MS;
    await this.redisService.psetex(this.key(record.phone), ttlMs, JSON.stringify(record));
  }

  async find(phone: string): Promise<VersionedOtpRecord | null> {
    const raw = await this.redisService.get(this.key(phone));
    if (raw === null) {
      return null;
    }

    const record = this.parse(raw);
    if (!record) {
      this.logger.warn(`Discarding unreadable OTP record for key ${this.key(phone)}`);
      await this.redisService.compareAndDelete(this.key(phone), raw);
      return null;
    }

    return { record, version: raw };
  }

  /**
   * Takes one attempt off the record for a wrong code. The decrement is atomic,
   * so concurrent wrong codes each cost exactly one attempt. It applies only while
   * the stored record is the same issuance (same code hash) that was compared,
   * and the record is deleted when no attempts are left.
   */
  async recordFailedAttempt(current: VersionedOtpRecord): Promise<FailedAttemptResult> {
    const result = await this.redisService.decrementJsonField(
      this.key(current.record.phone),
      'attemptsRemaining',
      { field: 'codeHash', value: current.record.codeHash },
    );

    switch (result.outcome) {
      case 'missing':
        return { status: 'gone' };
      case 'guard_mismatch':
        return { status: 'superseded' };
      case 'decremented':
        return { status: 'counted', attemptsRemaining: result.remaining };
    }
  }

  /**
   * Deletes the record only if it still matches `version`. Used both to consume a
   * verified code and to evict an expired or exhausted one.
   */
  async remove(current: VersionedOtpRecord): Promise<boolean> {
    return this.redisService.compareAndDelete(this.key(current.record.phone), current.version);
  }

  /**
   * Removes records whose expiry has passed. Returns the number removed.
   */
  async evictExpired(now: number): Promise<number> {
    const keys = await this.redisService.scanKeys(
      `${AUTH_CONSTANTS.KEYS.OTP_RECORD}*`,
      AUTH_CONSTANTS.CLEANUP.SCAN_BATCH_SIZE,
    );

    let evicted = 0;
    for (const key of keys) {
      const raw = await this.redisService.get(key);
      if (raw === null) continue;

      const record = this.parse(raw);
      if (!record || now > record.expiresAt) {
        if (await this.redisService.compareAndDelete(key, raw)) {
          evicted++;
        }
      }
    }

    return evicted;
  }

  private key(phone: string): string {
    return `${AUTH_CONSTANTS.KEYS.OTP_RECORD}${phone}`;
  }

  private parse(raw: string): OtpRecord | null {
    let value: unknown;
    try {
      value = JSON.parse(raw);
    } catch {
      return null;
    }

    return isOtpRecord(value) ? value : null;
  }
}

function isOtpRecord(value: unknown): value is OtpRecord {
  return (
    typeof value === 'object' &&
    value !== null &&
    'phone' in value &&
    typeof value.phone === 'string' &&
    'codeHash' in value &&
    typeof value.codeHash === 'string' &&
    'issuedAt' in value &&
    typeof value.issuedAt === 'number' &&
    'expiresAt' in value &&
    typeof value.expiresAt === 'number' &&
    'attemptsRemaining' in value &&
    typeof value.attemptsRemaining === 'number'
  );
}
