import { Injectable, OnModuleInit, OnModuleDestroy, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import Redis from 'ioredis';
import { StoreUnavailableException } from '../common/exceptions/auth.exception';

export interface WindowCounter {
  count: number;
  ttlMs: number;
}

/**
 * Outcome of decrementing a numeric field of a JSON value. `remaining` 0 means
 * the key was deleted.
 */
export type FieldDecrement =
  | { outcome: 'missing' }
  | { outcome: 'guard_mismatch' }
  | { outcome: 'decremented'; remaining: number };

const COMPARE_AND_DELETE_SCRIPT = `
if redis.call('GET', KEYS[1]) == ARGV[1] then
  return redis.call('DEL', KEYS[1])
end
return 0
`;

const DECREMENT_JSON_FIELD_SCRIPT = `
local raw = redis.call('GET', KEYS[1])
if not raw then
  return -1
end
local value = cjson.decode(raw)
if value[ARGV[2]] ~= ARGV[3] then
  return -2
end
local remaining = tonumber(value[ARGV[1]]) - 1
if remaining <= 0 then
  redis.call('DEL', KEYS[1])
  return 0
end
value[ARGV[1]] = remaining
redis.call('SET', KEYS[1], cjson.encode(value), 'KEEPTTL')
return remaining
`;

const INCREMENT_WINDOW_SCRIPT = `
local count = redis.call('INCR', KEYS[1])
local ttl = redis.call('PTTL', KEYS[1])
if ttl < 0 then
  redis.call('PEXPIRE', KEYS[1], ARGV[1])
  ttl = tonumber(ARGV[1])
end
return {count, ttl}
`;

/**
 * Narrow client for the shared cache. Every call is bounded by the ioredis
 * command timeout; any failure surfaces as StoreUnavailableException.
 */
@Injectable()
export class RedisService implements OnModuleInit, OnModuleDestroy {
  private client: Redis | null = null;
  private readonly logger = new Logger(RedisService.name);

  constructor(private configService: ConfigService) {}

  async onModuleInit(): Promise<void> {
    const client = new Redis({
      host: this.configService.getOrThrow<string>('redis.host'),
      port: this.configService.getOrThrow<number>('redis.port'),
      password: this.configService.get<string>('redis.password'),
      commandTimeout: this.configService.getOrThrow<number>('redis.commandTimeoutMs'),
      retryStrategy: (times) => {
        const delay = Math.min(times * 50, 2000);
        this.logger.warn(`Redis connection retry attempt ${times}, waiting ${delay}ms`);
        return delay;
      },
      // Commands are sent at most once.
      maxRetriesPerRequest: 0,
      autoResendUnfulfilledCommands: false,
    });

    client.on('error', (err) => {
      this.logger.error('Redis Client Error:', err);
    });

    client.on('connect', () => {
      this.logger.log('✅ Redis connected successfully');
    });

    client.on('close', () => {
      this.logger.warn('Redis connection closed');
    });

    client.on('reconnecting', () => {
      this.logger.log('Reconnecting to Redis...');
    });

    this.client = client;
  }

  async onModuleDestroy(): Promise<void> {
    try {
      if (this.client) {
        await this.client.quit();
        this.logger.log('Redis connection closed');
      }
    } catch (error) {
      this.logger.error('Error closing Redis connection:', error);
    }
  }

  async get(key: string): Promise<string | null> {
    return this.run(`getting key ${key}`, (client) => client.get(key));
  }

  /**
   * Sets a value that expires after `ttlMs`, replacing any previous value.
   */
  async psetex(key: string, ttlMs: number, value: string): Promise<void> {
    await this.run(`setting key ${key} with expiry`, (client) => client.psetex(key, ttlMs, value));
  }

  /**
   * SET NX PX. Returns true when this call created the key.
   */
  async setIfAbsent(key: string, value: string, ttlMs: number): Promise<boolean> {
    const result = await this.run(`setting key ${key} if absent`, (client) =>
      client.set(key, value, 'PX', ttlMs, 'NX'),
    );
    return result === 'OK';
  }

  async exists(key: string): Promise<boolean> {
    const count = await this.run(`checking existence of key ${key}`, (client) =>
      client.exists(key),
    );
    return count > 0;
  }

  /**
   * Deletes `key` only if it still holds `expected`. Executed as one Lua script.
   */
  async compareAndDelete(key: string, expected: string): Promise<boolean> {
    const result = await this.run(`compare-and-delete on key ${key}`, (client) =>
      client.eval(COMPARE_AND_DELETE_SCRIPT, 1, key, expected),
    );
    return Number(result) === 1;
  }

  /**
   * Decrements `field` of the JSON object stored at `key`, provided its
   * `guard.field` still equals `guard.value`. The key is deleted when the field
   * reaches zero, and keeps its TTL otherwise. Runs as one Lua script.
   */
  async decrementJsonField(
    key: string,
    field: string,
    guard: { field: string; value: string },
  ): Promise<FieldDecrement> {
    const result = await this.run(`decrementing ${field} on key ${key}`, (client) =>
      client.eval(DECREMENT_JSON_FIELD_SCRIPT, 1, key, field, guard.field, guard.value),
    );

    const reply = Number(result);
    if (reply === -1) {
      return { outcome: 'missing' };
    }
    if (reply === -2) {
      return { outcome: 'guard_mismatch' };
    }
    return { outcome: 'decremented', remaining: reply };
  }

  /**
   * Increments a fixed-window counter, starting the window on its first hit.
   */
  async incrementWindow(key: string, windowMs: number): Promise<WindowCounter> {
    const result = await this.run(`incrementing window counter ${key}`, (client) =>
      client.eval(INCREMENT_WINDOW_SCRIPT, 1, key, windowMs),
    );

    if (!Array.isArray(result) || result.length !== 2) {
      this.logger.error(`Unexpected reply while incrementing window counter ${key}`);
      throw new StoreUnavailableException();
    }

    return { count: Number(result[0]), ttlMs: Number(result[1]) };
  }

  /**
   * Collects every key matching `pattern` using SCAN (never KEYS).
   */
  async scanKeys(pattern: string, batchSize = 500): Promise<string[]> {
    const keys: string[] = [];
    let cursor = '0';

    do {
      const [next, batch] = await this.run(`scanning ${pattern}`, (client) =>
        client.scan(cursor, 'MATCH', pattern, 'COUNT', batchSize),
      );
      keys.push(...batch);
      cursor = next;
    } while (cursor !== '0');

    return keys;
  }

  private async run<T>(operation: string, command: (client: Redis) => Promise<T>): Promise<T> {
    const client = this.client;
    if (!client) {
      this.logger.error(`Redis client not initialised while ${operation}`);
      throw new StoreUnavailableException();
    }

    try {
      return await command(client);
    } catch (error) {
      this.logger.error(`Error ${operation}:`, error);
      throw new StoreUnavailableException();
    }
  }
}
