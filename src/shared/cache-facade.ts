import { randomUUID } from 'node:crypto';
import type { CacheBackend, Clock, LeaseCapableBackend } from './cache.js';
import { CircuitBreaker, type CircuitBreakerOptions, type CircuitState } from './circuit-breaker.js';
import type { GracefulDegradationManager } from './degradation.js';
import { LeaseError, LeaseExpiredError, describeCause } from './errors.js';
import { cacheKey } from './fingerprint.js';
import { LeaseTable, type Lease } from './lease.js';
import { silentLogger, type Logger } from './logger.js';
import type { MetricsCollector } from './metrics.js';
import type { CachedAnalysis } from './schemas.js';

export interface CacheFacadeOptions {
  primary: LeaseCapableBackend | null;
  fallback: CacheBackend;
  ttlMs: number;
  leaseTtlMs: number;
  leasePollIntervalMs: number;
  breaker?: Partial<CircuitBreakerOptions>;
  logger?: Logger;
  metrics?: MetricsCollector;
  degradation?: GracefulDegradationManager;
  clock?: Clock;
}

export type CacheLookup =
  | { status: 'hit'; value: CachedAnalysis; backend: string }
  | { status: 'miss'; backend: string };

export type ComputeSource = 'cache' | 'shared' | 'computed';

export interface ComputeOutcome {
  value: CachedAnalysis;
  source: ComputeSource;
}

export interface CacheFacadeStatus {
  primary: string | null;
  fallback: string;
  circuit: CircuitState | null;
  inFlight: number;
}

// Bounds how often a caller re-enters the lease protocol after a holder timed out.
const MAX_LEASE_ROUNDS = 3;

export function leaseKey(fingerprint: string): string {
  return `lease:${fingerprint}`;
}

/**
 * Single entry point for cached analyses: primary store behind a circuit
 * breaker, an in-process fallback, and per-fingerprint single-flight so
 * identical concurrent requests compute once.
 */
export class CacheFacade {
  private readonly primary: LeaseCapableBackend | null;
  private readonly fallback: CacheBackend;
  private readonly breaker: CircuitBreaker;
  private readonly leases: LeaseTable<CachedAnalysis>;
  private readonly logger: Logger;
  private readonly clock: Clock;

  constructor(private readonly options: CacheFacadeOptions) {
    this.primary = options.primary;
    this.fallback = options.fallback;
    this.clock = options.clock ?? Date.now;
    this.logger = options.logger ?? silentLogger;
    this.breaker = new CircuitBreaker(`cache:${options.primary?.name ?? 'none'}`, options.breaker, this.clock);
    this.leases = new LeaseTable<CachedAnalysis>(options.leaseTtlMs, this.clock);
  }

  get ttlMs(): number {
    return this.options.ttlMs;
  }

  async get(fingerprint: string): Promise<CacheLookup> {
    return this.lookup(fingerprint, true);
  }

  /** Writes to the primary when reachable and always to the fallback. Never throws. */
  async set(fingerprint: string, value: CachedAnalysis, ttlMs: number = this.options.ttlMs): Promise<void> {
    const key = cacheKey(fingerprint);
    const primary = this.primary;

    if (primary) {
      try {
        await this.breaker.execute(() => primary.set(key, value, ttlMs));
        this.markPrimaryHealthy();
      } catch (error) {
        this.markPrimaryUnavailable(error);
      }
    }

    try {
      await this.fallback.set(key, value, ttlMs);
    } catch (error) {
      this.logger.error(`❌ Fallback cache write failed: ${describeCause(error)}`, { fingerprint });
    }
  }

  async isPrimaryAvailable(): Promise<boolean> {
    const primary = this.primary;
    if (!primary || !this.breaker.isCallPermitted()) return false;

    let available: boolean;
    try {
      available = await primary.isAvailable();
    } catch (error) {
      this.markPrimaryUnavailable(error);
      return false;
    }

    if (available) {
      this.markPrimaryHealthy();
    } else {
      this.options.degradation?.recordFailure('cache', `${primary.name} did not answer the health check`);
    }
    return available;
  }

  /**
   * Returns the cached value for `fingerprint`, or runs `compute` at most once
   * per fingerprint across concurrent callers and caches its result.
   * A failed computation rejects every caller with a {@link LeaseError}.
   */
  async getOrCompute(fingerprint: string, compute: () => Promise<CachedAnalysis>): Promise<ComputeOutcome> {
    const cached = await this.lookup(fingerprint, true);
    if (cached.status === 'hit') {
      return { value: cached.value, source: 'cache' };
    }

    for (let round = 0; round < MAX_LEASE_ROUNDS; round++) {
      const acquisition = this.leases.acquire(fingerprint);

      if (acquisition.role === 'holder') {
        return this.computeAsHolder(fingerprint, acquisition.lease, compute);
      }

      try {
        const value = await acquisition.result;
        this.options.metrics?.recordSharedResult();
        return { value, source: 'shared' };
      } catch (error) {
        if (!(error instanceof LeaseExpiredError)) throw error;
        this.logger.warn(`⏳ Lease for ${fingerprint.slice(0, 12)} expired, retrying`);
        const retry = await this.lookup(fingerprint, false);
        if (retry.status === 'hit') {
          return { value: retry.value, source: 'cache' };
        }
      }
    }

    throw new LeaseError(`Could not obtain a lease after ${MAX_LEASE_ROUNDS} attempts`, fingerprint);
  }

  getStatus(): CacheFacadeStatus {
    return {
      primary: this.primary?.name ?? null,
      fallback: this.fallback.name,
      circuit: this.primary ? this.breaker.getState() : null,
      inFlight: this.leases.size
    };
  }

  private async lookup(fingerprint: string, record: boolean): Promise<CacheLookup> {
    const key = cacheKey(fingerprint);
    const metrics = record ? this.options.metrics : undefined;
    const primary = this.primary;

    if (primary) {
      try {
        const value = await this.breaker.execute(() => primary.get(key));
        this.markPrimaryHealthy();
        if (value) {
          metrics?.recordCacheHit('primary');
          return { status: 'hit', value, backend: primary.name };
        }
        metrics?.recordCacheMiss();
        return { status: 'miss', backend: primary.name };
      } catch (error) {
        this.markPrimaryUnavailable(error);
      }
    }

    try {
      const value = await this.fallback.get(key);
      if (value) {
        metrics?.recordCacheHit('fallback');
        return { status: 'hit', value, backend: this.fallback.name };
      }
    } catch (error) {
      this.logger.error(`❌ Fallback cache read failed: ${describeCause(error)}`, { fingerprint });
    }
    metrics?.recordCacheMiss();
    return { status: 'miss', backend: this.fallback.name };
  }

  private async computeAsHolder(
    fingerprint: string,
    lease: Lease<CachedAnalysis>,
    compute: () => Promise<CachedAnalysis>
  ): Promise<ComputeOutcome> {
    const owner = randomUUID();
    let claimed = false;

    try {
      const claim = await this.claimDistributedLease(fingerprint, owner);
      claimed = claim === 'claimed';
      if (claim === 'held-elsewhere') {
        const produced = await this.pollForValue(fingerprint);
        if (produced) {
          lease.resolve(produced);
          return { value: produced, source: 'cache' };
        }
        this.logger.warn(`⏳ Remote lease for ${fingerprint.slice(0, 12)} timed out, computing locally`);
      } else {
        // A holder that finished between our miss and our lease has already published.
        const settled = await this.lookup(fingerprint, false);
        if (settled.status === 'hit') {
          lease.resolve(settled.value);
          return { value: settled.value, source: 'cache' };
        }
      }

      let value: CachedAnalysis;
      try {
        value = await compute();
      } catch (error) {
        const failure = error instanceof LeaseError
          ? error
          : new LeaseError(`Analysis failed: ${describeCause(error)}`, fingerprint, error);
        lease.reject(failure);
        throw failure;
      }

      await this.set(fingerprint, value);
      lease.resolve(value);
      return { value, source: 'computed' };
    } finally {
      lease.release();
      if (claimed) {
        await this.releaseDistributedLease(fingerprint, owner);
      }
    }
  }

  private async claimDistributedLease(
    fingerprint: string,
    owner: string
  ): Promise<'claimed' | 'held-elsewhere' | 'unavailable'> {
    const primary = this.primary;
    if (!primary || !this.breaker.isCallPermitted()) return 'unavailable';

    try {
      const acquired = await this.breaker.execute(() =>
        primary.acquireLease(leaseKey(fingerprint), owner, this.options.leaseTtlMs)
      );
      return acquired ? 'claimed' : 'held-elsewhere';
    } catch (error) {
      this.markPrimaryUnavailable(error);
      return 'unavailable';
    }
  }

  private async releaseDistributedLease(fingerprint: string, owner: string): Promise<void> {
    const primary = this.primary;
    if (!primary) return;
    try {
      await this.breaker.execute(() => primary.releaseLease(leaseKey(fingerprint), owner));
    } catch (error) {
      // The lease expires on its own; a failed release only delays other processes.
      this.logger.debug(`Lease release failed: ${describeCause(error)}`, { fingerprint });
    }
  }

  /** Waits for another process to publish the value, up to one lease TTL. */
  private async pollForValue(fingerprint: string): Promise<CachedAnalysis | undefined> {
    const interval = Math.max(1, this.options.leasePollIntervalMs);
    const polls = Math.max(1, Math.ceil(this.options.leaseTtlMs / interval));
    for (let i = 0; i < polls; i++) {
      await sleep(interval);
      const lookup = await this.lookup(fingerprint, false);
      if (lookup.status === 'hit') return lookup.value;
    }
    return undefined;
  }

  private markPrimaryHealthy(): void {
    this.options.degradation?.recordRecovery('cache');
  }

  private markPrimaryUnavailable(error: unknown): void {
    this.logger.debug(`Primary cache unavailable: ${describeCause(error)}`);
    this.options.degradation?.recordFailure('cache', describeCause(error));
  }
}

function sleep(ms: number): Promise<void> {
  return new Promise(resolve => setTimeout(resolve, ms));
}
