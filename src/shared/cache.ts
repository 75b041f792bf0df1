import type { CachedAnalysis } from './schemas.js';

export type Clock = () => number;

/**
 * A key/value store for analysis snapshots. `get` resolves `undefined` on a
 * miss and rejects with `CacheUnavailableError` when the store is unreachable.
 */
export interface CacheBackend {
  readonly name: string;
  get(key: string): Promise<CachedAnalysis | undefined>;
  set(key: string, value: CachedAnalysis, ttlMs: number): Promise<void>;
  isAvailable(): Promise<boolean>;
}

/** A backend that can also hold short-lived, owner-tagged locks. */
export interface LeaseCapableBackend extends CacheBackend {
  acquireLease(key: string, owner: string, ttlMs: number): Promise<boolean>;
  releaseLease(key: string, owner: string): Promise<void>;
}

export interface MemoryCacheConfig {
  maxEntries: number;
  clock?: Clock;
  /** Periodic sweep of expired entries; off when 0 or omitted. */
  cleanupIntervalMs?: number;
}

export interface CacheStats {
  hits: number;
  misses: number;
  size: number;
  evictions: number;
}

interface CacheEntry {
  value: CachedAnalysis;
  expiresAt: number;
  /** Insertion order, used to break eviction ties. */
  sequence: number;
}

interface LeaseEntry {
  owner: string;
  expiresAt: number;
}

/**
 * Bounded in-process store. Expired entries are dropped lazily on read and
 * before any capacity eviction; when still full, the entry closest to expiry
 * goes first, oldest insertion breaking ties. Values are copied in and out,
 * so callers never share a stored snapshot.
 */
export class MemoryCacheBackend implements LeaseCapableBackend {
  readonly name = 'memory';

  private readonly entries = new Map<string, CacheEntry>();
  private readonly leases = new Map<string, LeaseEntry>();
  private readonly clock: Clock;
  private stats: CacheStats = { hits: 0, misses: 0, size: 0, evictions: 0 };
  private sequence = 0;
  private cleanupInterval: NodeJS.Timeout | null = null;

  constructor(private readonly config: MemoryCacheConfig) {
    if (!Number.isInteger(config.maxEntries) || config.maxEntries < 1) {
      throw new RangeError(`maxEntries must be a positive integer, got ${config.maxEntries}`);
    }
    this.clock = config.clock ?? Date.now;
    if (config.cleanupIntervalMs && config.cleanupIntervalMs > 0) {
      this.startCleanupTimer(config.cleanupIntervalMs);
    }
  }

  async get(key: string): Promise<CachedAnalysis | undefined> {
    const entry = this.entries.get(key);
    if (!entry) {
      this.stats.misses++;
      return undefined;
    }

    if (this.isExpired(entry)) {
      this.entries.delete(key);
      this.stats.misses++;
      return undefined;
    }

    this.stats.hits++;
    return structuredClone(entry.value);
  }

  /** `ttlMs <= 0` stores an entry that is already expired. */
  async set(key: string, value: CachedAnalysis, ttlMs: number): Promise<void> {
    const entry: CacheEntry = {
      value: structuredClone(value),
      expiresAt: this.clock() + Math.max(0, ttlMs),
      sequence: this.sequence++
    };

    if (!this.entries.has(key)) {
      this.ensureCapacity();
    }
    this.entries.set(key, entry);
  }

  async isAvailable(): Promise<boolean> {
    return true;
  }

  async acquireLease(key: string, owner: string, ttlMs: number): Promise<boolean> {
    const now = this.clock();
    const current = this.leases.get(key);
    if (current && current.expiresAt > now && current.owner !== owner) {
      return false;
    }
    this.leases.set(key, { owner, expiresAt: now + ttlMs });
    return true;
  }

  async releaseLease(key: string, owner: string): Promise<void> {
    if (this.leases.get(key)?.owner === owner) {
      this.leases.delete(key);
    }
  }

  getStats(): CacheStats {
    return { ...this.stats, size: this.entries.size };
  }

  /** Keys in storage, expired ones included until they are purged. */
  keys(): string[] {
    return [...this.entries.keys()];
  }

  clear(): void {
    this.entries.clear();
    this.leases.clear();
    this.stats = { hits: 0, misses: 0, size: 0, evictions: 0 };
  }

  /**
   * Removes every expired entry.
   * @returns the number of entries removed
   */
  purgeExpired(): number {
    let removed = 0;
    for (const [key, entry] of this.entries) {
      if (this.isExpired(entry)) {
        this.entries.delete(key);
        removed++;
      }
    }
    return removed;
  }

  stopCleanupTimer(): void {
    if (this.cleanupInterval) {
      clearInterval(this.cleanupInterval);
      this.cleanupInterval = null;
    }
  }

  private ensureCapacity(): void {
    if (this.entries.size < this.config.maxEntries) return;

    this.purgeExpired();
    while (this.entries.size >= this.config.maxEntries) {
      this.evictOne();
    }
  }

  private evictOne(): void {
    let victimKey: string | undefined;
    let victim: CacheEntry | undefined;
    for (const [key, entry] of this.entries) {
      if (
        !victim ||
        entry.expiresAt < victim.expiresAt ||
        (entry.expiresAt === victim.expiresAt && entry.sequence < victim.sequence)
      ) {
        victimKey = key;
        victim = entry;
      }
    }
    if (victimKey !== undefined) {
      this.entries.delete(victimKey);
      this.stats.evictions++;
    }
  }

  private isExpired(entry: CacheEntry): boolean {
    return entry.expiresAt <= this.clock();
  }

  private startCleanupTimer(intervalMs: number): void {
    this.cleanupInterval = setInterval(() => {
      this.purgeExpired();
    }, intervalMs);
    // The sweep must never keep the process alive on its own.
    this.cleanupInterval.unref();
  }
}

export function isLeaseCapable(backend: CacheBackend): backend is LeaseCapableBackend {
  return 'acquireLease' in backend && 'releaseLease' in backend;
}
