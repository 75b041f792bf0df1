import { LeaseError, LeaseExpiredError } from './errors.js';
import type { Clock } from './cache.js';

interface Waiter<T> {
  resolve(value: T): void;
  reject(error: unknown): void;
  timer: NodeJS.Timeout;
}

export type LeaseAcquisition<T> =
  | { role: 'holder'; lease: Lease<T> }
  | { role: 'waiter'; result: Promise<T> };

/**
 * Exclusive right to compute the value for one key. Settles exactly once;
 * later calls to `resolve` or `reject` are ignored.
 */
export class Lease<T> {
  private readonly waiters: Waiter<T>[] = [];
  private settled = false;

  constructor(
    readonly key: string,
    readonly expiresAt: number,
    private readonly table: LeaseTable<T>
  ) {}

  get isSettled(): boolean {
    return this.settled;
  }

  get waiterCount(): number {
    return this.waiters.length;
  }

  resolve(value: T): void {
    if (this.settled) return;
    this.settled = true;
    for (const waiter of this.waiters.splice(0)) {
      clearTimeout(waiter.timer);
      waiter.resolve(value);
    }
  }

  reject(error: unknown): void {
    if (this.settled) return;
    this.settled = true;
    for (const waiter of this.waiters.splice(0)) {
      clearTimeout(waiter.timer);
      waiter.reject(error);
    }
  }

  /** Drops the lease from its table if it is still the current one. */
  release(): void {
    if (!this.settled) {
      this.reject(new LeaseError('Lease released before a result was produced', this.key));
    }
    this.table.remove(this);
  }

  wait(timeoutMs: number): Promise<T> {
    return new Promise<T>((resolve, reject) => {
      const waiter: Waiter<T> = {
        resolve,
        reject,
        timer: setTimeout(() => {
          const index = this.waiters.indexOf(waiter);
          if (index >= 0) this.waiters.splice(index, 1);
          reject(new LeaseExpiredError(this.key, this.table.ttlMs));
        }, Math.max(0, timeoutMs))
      };
      this.waiters.push(waiter);
    });
  }
}

/**
 * In-process, per-key single-flight table. The first caller for a key
 * becomes the holder; later callers wait for the holder's outcome until
 * the lease TTL elapses.
 */
export class LeaseTable<T> {
  private readonly leases = new Map<string, Lease<T>>();

  constructor(
    readonly ttlMs: number,
    private readonly clock: Clock = Date.now
  ) {}

  acquire(key: string): LeaseAcquisition<T> {
    const now = this.clock();
    const current = this.leases.get(key);
    if (current && !current.isSettled && current.expiresAt > now) {
      return { role: 'waiter', result: current.wait(current.expiresAt - now) };
    }

    // An expired or settled lease is superseded by a fresh one.
    const lease = new Lease<T>(key, now + this.ttlMs, this);
    this.leases.set(key, lease);
    return { role: 'holder', lease };
  }

  has(key: string): boolean {
    return this.leases.has(key);
  }

  get size(): number {
    return this.leases.size;
  }

  /** @internal called by {@link Lease.release} */
  remove(lease: Lease<T>): void {
    if (this.leases.get(lease.key) === lease) {
      this.leases.delete(lease.key);
    }
  }
}
