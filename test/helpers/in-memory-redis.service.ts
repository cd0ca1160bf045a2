import { FieldDecrement, RedisService, WindowCounter } from '../../src/redis/redis.service';
import { StoreUnavailableException } from '../../src/common/exceptions/auth.exception';

interface Entry {
  value: string;
  expiresAt: number | null;
}

type RedisSurface = Omit<RedisService, 'onModuleInit' | 'onModuleDestroy'>;

/**
 * In-process stand-in for RedisService. Expiry follows the supplied clock, and
 * each command runs to completion before another starts, like a single Redis node.
 */
export class InMemoryRedisService implements RedisSurface {
  private readonly entries = new Map<string, Entry>();
  private unavailable = false;

  constructor(private readonly now: () => number = Date.now) {}

  /** Makes every following command fail as if the server were unreachable. */
  setUnavailable(unavailable: boolean): void {
    this.unavailable = unavailable;
  }

  /** Milliseconds until `key` expires, or null when it has no expiry or does not exist. */
  ttlOf(key: string): number | null {
    const expiresAt = this.entries.get(key)?.expiresAt;
    return expiresAt == null ? null : expiresAt - this.now();
  }

  /** Returns the raw stored value without expiring it. */
  peek(key: string): string | undefined {
    return this.entries.get(key)?.value;
  }

  async get(key: string): Promise<string | null> {
    return this.live(key)?.value ?? null;
  }

  async psetex(key: string, ttlMs: number, value: string): Promise<void> {
    this.assertAvailable();
    this.entries.set(key, { value, expiresAt: this.now() + ttlMs });
  }

  async setIfAbsent(key: string, value: string, ttlMs: number): Promise<boolean> {
    if (this.live(key)) {
      return false;
    }
    this.entries.set(key, { value, expiresAt: this.now() + ttlMs });
    return true;
  }

  async exists(key: string): Promise<boolean> {
    return this.live(key) !== undefined;
  }

  async compareAndDelete(key: string, expected: string): Promise<boolean> {
    if (this.live(key)?.value !== expected) {
      return false;
    }
    this.entries.delete(key);
    return true;
  }

  async decrementJsonField(
    key: string,
    field: string,
    guard: { field: string; value: string },
  ): Promise<FieldDecrement> {
    const entry = this.live(key);
    if (!entry) {
      return { outcome: 'missing' };
    }

    const value: Record<string, unknown> = JSON.parse(entry.value);
    if (value[guard.field] !== guard.value) {
      return { outcome: 'guard_mismatch' };
    }

    const remaining = Number(value[field]) - 1;
    if (remaining <= 0) {
      this.entries.delete(key);
      return { outcome: 'decremented', remaining: 0 };
    }
    this.entries.set(key, {
      value: JSON.stringify({ ...value, [field]: remaining }),
      expiresAt: entry.expiresAt,
    });
    return { outcome: 'decremented', remaining };
  }

  async incrementWindow(key: string, windowMs: number): Promise<WindowCounter> {
    const entry = this.live(key);
    const count = entry ? Number(entry.value) + 1 : 1;
    const expiresAt = entry?.expiresAt ?? this.now() + windowMs;
    this.entries.set(key, { value: String(count), expiresAt });
    return { count, ttlMs: expiresAt - this.now() };
  }

  /**
   * Matches `*` globs. Unlike `get`, does not drop expired keys, so sweeps can be
   * tested against entries that outlived their TTL.
   */
  async scanKeys(pattern: string): Promise<string[]> {
    this.assertAvailable();
    const source = pattern
      .split('*')
      .map((part) => part.replace(/[.+?^${}()|[\]\\]/g, '\\$&'))
      .join('.*');
    const matcher = new RegExp(`^${source}$`);
    return [...this.entries.keys()].filter((key) => matcher.test(key));
  }

  /** Stores a value that never expires on its own. */
  seed(key: string, value: string): void {
    this.entries.set(key, { value, expiresAt: null });
  }

  private live(key: string): Entry | undefined {
    this.assertAvailable();
    const entry = this.entries.get(key);
    if (entry && entry.expiresAt !== null && entry.expiresAt <= this.now()) {
      this.entries.delete(key);
      return undefined;
    }
    return entry;
  }

  private assertAvailable(): void {
    if (this.unavailable) {
      throw new StoreUnavailableException();
    }
  }
}
