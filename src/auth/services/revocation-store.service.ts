import { Injectable } from '@nestjs/common';
import { RedisService } from '../../redis/redis.service';
import { ClockService } from '../../common/services/clock.service';
import { AUTH_CONSTANTS } from '../constants/auth.constants';

/**
 * Denylist of refresh token ids. An entry lives only until the token it blocks
 * would have expired anyway.
 */
@Injectable()
export class RevocationStoreService {
  constructor(
    private redisService: RedisService,
    private clock: ClockService,
  ) {}

  /**
   * Revokes `tokenId` until `expiresAt`.
   *
   * Returns true when this call created the entry and false when the id was
   * already revoked. The insert is a single SET NX, so of several concurrent
   * callers exactly one gets true. Tokens that have already expired are not
   * written and report false.
   */
  async revoke(tokenId: string, expiresAt: Date): Promise<boolean> {
    const ttlMs = expiresAt.getTime() - this.clock.now();
    if (ttlMs <= 0) {
      return false;
    }

    return this.redisService.setIfAbsent(
      this.key(tokenId),
      String(expiresAt.getTime()),
      ttlMs,
    );
  }

  async isRevoked(tokenId: string): Promise<boolean> {
    return this.redisService.exists(this.key(tokenId));
  }

  /**
   * Removes entries whose token has expired. Returns the number removed.
   */
  async evictExpired(): Promise<number> {
    const now = this.clock.now();
    const keys = await this.redisService.scanKeys(
      `${AUTH_CONSTANTS.KEYS.REVOKED_TOKEN}*`,
      AUTH_CONSTANTS.CLEANUP.SCAN_BATCH_SIZE,
    );

    let evicted = 0;
    for (const key of keys) {
      const raw = await this.redisService.get(key);
      if (raw === null) continue;

      const expiresAt = Number(raw);
      if (Number.isNaN(expiresAt) || expiresAt <= now) {
        if (await this.redisService.compareAndDelete(key, raw)) {
          evicted++;
        }
      }
    }

    return evicted;
  }

  private key(tokenId: string): string {
    return `${AUTH_CONSTANTS.KEYS.REVOKED_TOKEN}${tokenId}`;
  }
}
