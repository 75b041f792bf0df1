import { describe, expect, it } from 'vitest';
import { RedisCacheBackend, type KeyValueClient } from '../src/lib/redis-backend.js';
import { CacheUnavailableError } from '../src/shared/errors.js';
import { FINGERPRINT_A, recordingLogger, sampleAnalysis } from './helpers.js';

/** In-process stand-in for a Redis connection. TTLs are recorded, not enforced. */
class FakeKeyValueClient implements KeyValueClient {
  readonly values = new Map<string, string>();
  readonly ttls = new Map<string, number>();
  failure: Error | null = null;
  closed = false;

  async get(key: string): Promise<string | null> {
    this.check();
    return this.values.get(key) ?? null;
  }

  async setWithTtl(key: string, value: string, ttlMs: number): Promise<void> {
    this.check();
    this.values.set(key, value);
    this.ttls.set(key, ttlMs);
  }

  async setIfAbsent(key: string, value: string, ttlMs: number): Promise<boolean> {
    this.check();
    if (this.values.has(key)) return false;
    await this.setWithTtl(key, value, ttlMs);
    return true;
  }

  async deleteIfEquals(key: string, value: string): Promise<boolean> {
    this.check();
    if (this.values.get(key) !== value) return false;
    this.values.delete(key);
    return true;
  }

  async ping(): Promise<boolean> {
    this.check();
    return true;
  }

  async close(): Promise<void> {
    this.closed = true;
  }

  private check(): void {
    if (this.failure) throw this.failure;
  }
}

describe('RedisCacheBackend', () => {
  it('stores snapshots as JSON with a whole-millisecond TTL', async () => {
    const client = new FakeKeyValueClient();
    const backend = new RedisCacheBackend(client);

    await backend.set('analysis:x', sampleAnalysis(), 1500.2);

    expect(JSON.parse(client.values.get('analysis:x') ?? '')).toEqual(sampleAnalysis());
    expect(client.ttls.get('analysis:x')).toBe(1501);
    expect(await backend.get('analysis:x')).toEqual(sampleAnalysis());
  });

  it('skips writes with a non-positive TTL', async () => {
    const client = new FakeKeyValueClient();
    await new RedisCacheBackend(client).set('analysis:x', sampleAnalysis(), 0);

    expect(client.values.size).toBe(0);
  });

  it('returns undefined for a missing key', async () => {
    expect(await new RedisCacheBackend(new FakeKeyValueClient()).get('analysis:none')).toBeUndefined();
  });

  it('treats unparseable and malformed entries as misses', async () => {
    const client = new FakeKeyValueClient();
    const logger = recordingLogger();
    const backend = new RedisCacheBackend(client, { logger });
    client.values.set('bad-json', '{nope');
    client.values.set('bad-shape', JSON.stringify({ fingerprint: FINGERPRINT_A }));

    expect(await backend.get('bad-json')).toBeUndefined();
    expect(await backend.get('bad-shape')).toBeUndefined();
    expect(logger.lines.map(line => line.message)).toEqual([
      '⚠️ Discarding unparseable cache entry bad-json',
      '⚠️ Discarding malformed cache entry bad-shape'
    ]);
  });

  it('wraps client failures as cache unavailability', async () => {
    const client = new FakeKeyValueClient();
    client.failure = new Error('connect ECONNREFUSED');
    const backend = new RedisCacheBackend(client, { name: 'redis-test' });

    const error = await backend.get('analysis:x').catch((e: unknown) => e);
    expect(error).toBeInstanceOf(CacheUnavailableError);
    expect(error).toHaveProperty('message', 'Redis get failed: connect ECONNREFUSED');
    expect(error).toHaveProperty('backend', 'redis-test');

    expect(await backend.isAvailable()).toBe(false);
  });

  it('implements leases with owner-checked release', async () => {
    const client = new FakeKeyValueClient();
    const backend = new RedisCacheBackend(client);

    expect(await backend.acquireLease('lease:x', 'owner-1', 0.5)).toBe(true);
    expect(client.ttls.get('lease:x')).toBe(1);
    expect(await backend.acquireLease('lease:x', 'owner-2', 1000)).toBe(false);

    await backend.releaseLease('lease:x', 'owner-2');
    expect(client.values.get('lease:x')).toBe('owner-1');

    await backend.releaseLease('lease:x', 'owner-1');
    expect(client.values.has('lease:x')).toBe(false);
  });
});
