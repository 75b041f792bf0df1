import { Redis, type RedisOptions } from 'ioredis';
import type { LeaseCapableBackend } from '../shared/cache.js';
import { CacheUnavailableError, describeCause } from '../shared/errors.js';
import { silentLogger, type Logger } from '../shared/logger.js';
import type { CachedAnalysis } from '../shared/schemas.js';
import { ValidationLayer } from '../shared/validation.js';

/**
 * The handful of key/value operations the cache needs. Kept narrow so tests
 * can supply an in-process fake instead of a Redis server.
 */
export interface KeyValueClient {
  get(key: string): Promise<string | null>;
  setWithTtl(key: string, value: string, ttlMs: number): Promise<void>;
  /** SET NX PX; resolves `true` when the key was written. */
  setIfAbsent(key: string, value: string, ttlMs: number): Promise<boolean>;
  /** Deletes `key` only while it still holds `value`. */
  deleteIfEquals(key: string, value: string): Promise<boolean>;
  ping(): Promise<boolean>;
  close(): Promise<void>;
}

const COMPARE_AND_DELETE = `
if redis.call("GET", KEYS[1]) == ARGV[1] then
  return redis.call("DEL", KEYS[1])
end
return 0
`;

export interface RedisClientOptions {
  connectTimeoutMs?: number;
  logger?: Logger;
}

/** {@link KeyValueClient} over an ioredis connection. */
export class IORedisClient implements KeyValueClient {
  private readonly redis: Redis;
  private readonly logger: Logger;

  constructor(url: string, options: RedisClientOptions = {}) {
    this.logger = options.logger ?? silentLogger;
    const redisOptions: RedisOptions = {
      lazyConnect: true,
      // Fail fast instead of queueing commands while disconnected; the
      // facade's breaker and fallback take over.
      enableOfflineQueue: false,
      maxRetriesPerRequest: 1,
      connectTimeout: options.connectTimeoutMs ?? 2000,
      retryStrategy: (times: number) => Math.min(times * 200, 5000)
    };
    this.redis = new Redis(url, redisOptions);
    this.redis.on('error', (error: Error) => {
      this.logger.debug(`Redis connection error: ${error.message}`);
    });
  }

  async connect(): Promise<void> {
    await this.redis.connect();
  }

  async get(key: string): Promise<string | null> {
    return this.redis.get(key);
  }

  async setWithTtl(key: string, value: string, ttlMs: number): Promise<void> {
    await this.redis.set(key, value, 'PX', ttlMs);
  }

  async setIfAbsent(key: string, value: string, ttlMs: number): Promise<boolean> {
    const reply = await this.redis.set(key, value, 'PX', ttlMs, 'NX');
    return reply === 'OK';
  }

  async deleteIfEquals(key: string, value: string): Promise<boolean> {
    const removed = await this.redis.eval(COMPARE_AND_DELETE, 1, key, value);
    return removed === 1;
  }

  async ping(): Promise<boolean> {
    return (await this.redis.ping()) === 'PONG';
  }

  async close(): Promise<void> {
    try {
      await this.redis.quit();
    } catch (error) {
      this.logger.debug(`Redis quit failed, disconnecting: ${describeCause(error)}`);
      this.redis.disconnect();
    }
  }
}

export interface RedisCacheBackendOptions {
  name?: string;
  logger?: Logger;
}

/**
 * Primary cache backend. Values are JSON; a payload that no longer matches
 * the snapshot schema is treated as a miss.
 */
export class RedisCacheBackend implements LeaseCapableBackend {
  readonly name: string;
  private readonly logger: Logger;

  constructor(private readonly client: KeyValueClient, options: RedisCacheBackendOptions = {}) {
    this.name = options.name ?? 'redis';
    this.logger = options.logger ?? silentLogger;
  }

  async get(key: string): Promise<CachedAnalysis | undefined> {
    const raw = await this.call('get', () => this.client.get(key));
    if (raw === null) return undefined;

    let payload: unknown;
    try {
      payload = JSON.parse(raw);
    } catch {
      this.logger.warn(`⚠️ Discarding unparseable cache entry ${key}`);
      return undefined;
    }

    const value = ValidationLayer.parseCachedAnalysis(payload);
    if (!value) {
      this.logger.warn(`⚠️ Discarding malformed cache entry ${key}`);
    }
    return value;
  }

  async set(key: string, value: CachedAnalysis, ttlMs: number): Promise<void> {
    // Redis rejects a zero PX; such an entry would be expired on arrival anyway.
    if (ttlMs <= 0) return;
    await this.call('set', () => this.client.setWithTtl(key, JSON.stringify(value), Math.ceil(ttlMs)));
  }

  async isAvailable(): Promise<boolean> {
    try {
      return await this.client.ping();
    } catch (error) {
      this.logger.debug(`Redis ping failed: ${describeCause(error)}`);
      return false;
    }
  }

  async acquireLease(key: string, owner: string, ttlMs: number): Promise<boolean> {
    return this.call('acquireLease', () => this.client.setIfAbsent(key, owner, Math.max(1, Math.ceil(ttlMs))));
  }

  async releaseLease(key: string, owner: string): Promise<void> {
    await this.call('releaseLease', () => this.client.deleteIfEquals(key, owner));
  }

  private async call<T>(operation: string, fn: () => Promise<T>): Promise<T> {
    try {
      return await fn();
    } catch (error) {
      throw new CacheUnavailableError(`Redis ${operation} failed: ${describeCause(error)}`, this.name, error);
    }
  }
}
