import { describe, expect, it, vi } from 'vitest';
import { CacheFacade, leaseKey, type CacheFacadeOptions } from '../src/shared/cache-facade.js';
import { MemoryCacheBackend } from '../src/shared/cache.js';
import { CircuitState } from '../src/shared/circuit-breaker.js';
import { GracefulDegradationManager, ServiceLevel } from '../src/shared/degradation.js';
import { LeaseError } from '../src/shared/errors.js';
import { cacheKey } from '../src/shared/fingerprint.js';
import { MetricsCollector } from '../src/shared/metrics.js';
import type { CachedAnalysis } from '../src/shared/types.js';
import { FINGERPRINT_A, FakeSharedBackend, sampleAnalysis } from './helpers.js';

function createFacade(overrides: Partial<CacheFacadeOptions> = {}) {
  const fallback = new MemoryCacheBackend({ maxEntries: 100 });
  const facade = new CacheFacade({
    primary: null,
    fallback,
    ttlMs: 60_000,
    leaseTtlMs: 1000,
    leasePollIntervalMs: 5,
    ...overrides
  });
  return { facade, fallback };
}

function deferred<T>() {
  let resolve: (value: T) => void = () => {};
  let reject: (error: unknown) => void = () => {};
  const promise = new Promise<T>((res, rej) => {
    resolve = res;
    reject = rej;
  });
  return { promise, resolve, reject };
}

const tick = () => new Promise(resolve => setTimeout(resolve, 0));

describe('CacheFacade', () => {
  it('computes once and serves later calls from the cache', async () => {
    const { facade } = createFacade();
    const compute = vi.fn(async () => sampleAnalysis());

    const first = await facade.getOrCompute(FINGERPRINT_A, compute);
    const second = await facade.getOrCompute(FINGERPRINT_A, compute);

    expect(first.source).toBe('computed');
    expect(second).toEqual({ value: sampleAnalysis(), source: 'cache' });
    expect(compute).toHaveBeenCalledTimes(1);
  });

  it('shares one computation between concurrent callers', async () => {
    const metrics = new MetricsCollector();
    const { facade } = createFacade({ metrics });
    const pending = deferred<CachedAnalysis>();
    const compute = vi.fn(() => pending.promise);

    const calls = Array.from({ length: 5 }, () => facade.getOrCompute(FINGERPRINT_A, compute));
    await tick();
    expect(facade.getStatus().inFlight).toBe(1);
    pending.resolve(sampleAnalysis());

    const outcomes = await Promise.all(calls);
    expect(compute).toHaveBeenCalledTimes(1);
    expect(outcomes.map(o => o.source).sort()).toEqual(['computed', 'shared', 'shared', 'shared', 'shared']);
    expect(outcomes.every(o => o.value.fingerprint === FINGERPRINT_A)).toBe(true);
    expect(metrics.getMetrics().sharedResults).toBe(4);
    expect(facade.getStatus().inFlight).toBe(0);
  });

  it('uses a value published while it was taking the lease', async () => {
    const { facade, fallback } = createFacade();
    const compute = vi.fn(async () => sampleAnalysis());
    const read = fallback.get.bind(fallback);
    let reads = 0;
    vi.spyOn(fallback, 'get').mockImplementation(async key => {
      reads++;
      // Another caller publishes between the first miss and the lease.
      if (reads === 2) await fallback.set(key, sampleAnalysis(FINGERPRINT_A, { analysisTimeMs: 7 }), 60_000);
      return reads === 1 ? undefined : read(key);
    });

    const outcome = await facade.getOrCompute(FINGERPRINT_A, compute);

    expect(outcome).toEqual({ value: sampleAnalysis(FINGERPRINT_A, { analysisTimeMs: 7 }), source: 'cache' });
    expect(compute).not.toHaveBeenCalled();
  });

  it('fails every concurrent caller when the computation fails and caches nothing', async () => {
    const { facade, fallback } = createFacade();
    const pending = deferred<CachedAnalysis>();

    const calls = [1, 2, 3].map(() => facade.getOrCompute(FINGERPRINT_A, () => pending.promise));
    const settled = Promise.allSettled(calls);
    await tick();
    pending.reject(new Error('boom'));

    const results = await settled;
    for (const result of results) {
      expect(result.status).toBe('rejected');
      if (result.status === 'rejected') {
        expect(result.reason).toBeInstanceOf(LeaseError);
        expect(result.reason).toHaveProperty('message', 'Analysis failed: boom');
      }
    }
    expect(fallback.keys()).toEqual([]);

    const retry = await facade.getOrCompute(FINGERPRINT_A, async () => sampleAnalysis());
    expect(retry.source).toBe('computed');
  });

  it('reads and writes through the primary when it is reachable', async () => {
    const primary = new FakeSharedBackend();
    const { facade, fallback } = createFacade({ primary });

    await facade.set(FINGERPRINT_A, sampleAnalysis());

    expect(await primary.store.get(cacheKey(FINGERPRINT_A))).toEqual(sampleAnalysis());
    expect(await fallback.get(cacheKey(FINGERPRINT_A))).toEqual(sampleAnalysis());
    expect(await facade.get(FINGERPRINT_A)).toEqual({ status: 'hit', value: sampleAnalysis(), backend: 'redis' });
  });

  it('falls back to the in-process cache when the primary fails', async () => {
    const primary = new FakeSharedBackend();
    const degradation = new GracefulDegradationManager();
    const { facade } = createFacade({ primary, degradation, breaker: { failureThreshold: 10 } });
    primary.down = true;

    const outcome = await facade.getOrCompute(FINGERPRINT_A, async () => sampleAnalysis());
    expect(outcome.source).toBe('computed');
    expect(await facade.get(FINGERPRINT_A)).toEqual({ status: 'hit', value: sampleAnalysis(), backend: 'memory' });
    expect(degradation.isDegraded('cache')).toBe(true);
    expect(degradation.getLevel()).toBe(ServiceLevel.DEGRADED);

    primary.down = false;
    expect(await facade.isPrimaryAvailable()).toBe(true);
    expect(degradation.isDegraded('cache')).toBe(false);
  });

  it('stops calling the primary once the circuit opens', async () => {
    const primary = new FakeSharedBackend();
    const { facade } = createFacade({ primary, breaker: { failureThreshold: 2, recoveryTimeout: 60_000 } });
    primary.down = true;

    await facade.get(FINGERPRINT_A);
    await facade.get(FINGERPRINT_A);
    const callsWhenOpened = primary.calls;
    await facade.get(FINGERPRINT_A);

    expect(facade.getStatus().circuit).toBe(CircuitState.OPEN);
    expect(primary.calls).toBe(callsWhenOpened);
  });

  it('waits for another process holding the shared lease', async () => {
    const primary = new FakeSharedBackend();
    const { facade } = createFacade({ primary, leaseTtlMs: 200, leasePollIntervalMs: 5 });
    await primary.store.acquireLease(leaseKey(FINGERPRINT_A), 'other-process', 200);
    const compute = vi.fn(async () => sampleAnalysis());

    setTimeout(() => {
      void primary.store.set(cacheKey(FINGERPRINT_A), sampleAnalysis(FINGERPRINT_A, { analysisTimeMs: 9 }), 60_000);
    }, 12);
    const outcome = await facade.getOrCompute(FINGERPRINT_A, compute);

    expect(outcome.source).toBe('cache');
    expect(outcome.value.analysisTimeMs).toBe(9);
    expect(compute).not.toHaveBeenCalled();
  });

  it('computes locally when the other process never publishes', async () => {
    const primary = new FakeSharedBackend();
    const { facade } = createFacade({ primary, leaseTtlMs: 20, leasePollIntervalMs: 5 });
    await primary.store.acquireLease(leaseKey(FINGERPRINT_A), 'other-process', 60_000);

    const outcome = await facade.getOrCompute(FINGERPRINT_A, async () => sampleAnalysis());

    expect(outcome.source).toBe('computed');
  });

  it('releases the shared lease after computing', async () => {
    const primary = new FakeSharedBackend();
    const { facade } = createFacade({ primary });

    await facade.getOrCompute(FINGERPRINT_A, async () => sampleAnalysis());

    expect(await primary.store.acquireLease(leaseKey(FINGERPRINT_A), 'next-owner', 1000)).toBe(true);
  });

  it('reports its configuration', async () => {
    const { facade } = createFacade();

    expect(facade.getStatus()).toEqual({ primary: null, fallback: 'memory', circuit: null, inFlight: 0 });
    expect(await facade.isPrimaryAvailable()).toBe(false);
    expect(facade.ttlMs).toBe(60_000);
  });
});
