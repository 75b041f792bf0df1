import { CodeAnalyzer, type CodeAnalyzerOptions } from '../src/shared/analyzer.js';
import { CacheFacade } from '../src/shared/cache-facade.js';
import { MemoryCacheBackend, type LeaseCapableBackend } from '../src/shared/cache.js';
import { CacheUnavailableError } from '../src/shared/errors.js';
import type { Logger } from '../src/shared/logger.js';
import { RuleEngine } from '../src/shared/rule-engine.js';
import type { CachedAnalysis, Suggestion, SyntaxTree } from '../src/shared/types.js';
import { parsePython } from '../src/lib/parser-adapter.js';
import { createRuleSet } from '../src/lib/rules/index.js';

export const FINGERPRINT_A = 'a'.repeat(64);
export const FINGERPRINT_B = 'b'.repeat(64);

export function sampleSuggestion(overrides: Partial<Suggestion> = {}): Suggestion {
  return {
    ruleId: 'missing_docstring',
    message: "Function 'foo' should have a docstring.",
    severity: 'info',
    line: 1,
    column: 0,
    metadata: { function: 'foo' },
    ...overrides
  };
}

export function sampleAnalysis(fingerprint = FINGERPRINT_A, overrides: Partial<CachedAnalysis> = {}): CachedAnalysis {
  return {
    fingerprint,
    suggestions: [sampleSuggestion()],
    analysisTimeMs: 1.5,
    createdAt: '2024-01-01T00:00:00.000Z',
    ...overrides
  };
}

/** A settable clock for code that takes a `() => number`. */
export class ManualClock {
  constructor(public now = 1_000_000) {}

  readonly read = (): number => this.now;

  advance(ms: number): void {
    this.now += ms;
  }
}

export interface LogLine {
  level: 'debug' | 'info' | 'warn' | 'error';
  message: string;
}

export function recordingLogger(): Logger & { lines: LogLine[] } {
  const lines: LogLine[] = [];
  return {
    lines,
    debug: message => { lines.push({ level: 'debug', message }); },
    info: message => { lines.push({ level: 'info', message }); },
    warn: message => { lines.push({ level: 'warn', message }); },
    error: message => { lines.push({ level: 'error', message }); }
  };
}

/** An analyzer over the in-process cache only, with the canonical rules. */
export function createTestAnalyzer(overrides: Partial<CodeAnalyzerOptions> = {}): CodeAnalyzer {
  const cache = new CacheFacade({
    primary: null,
    fallback: new MemoryCacheBackend({ maxEntries: 100 }),
    ttlMs: 60_000,
    leaseTtlMs: 1000,
    leasePollIntervalMs: 5
  });
  return new CodeAnalyzer({ ruleEngine: new RuleEngine(createRuleSet()), cache, ...overrides });
}

/** Parses source that is expected to be valid. */
export async function parseTree(source: string): Promise<SyntaxTree> {
  const outcome = await parsePython(source);
  if (!outcome.ok) throw new Error(`unexpected syntax error: ${outcome.failure.message}`);
  return outcome.tree;
}

/** Shared-store stand-in that can be switched off like an unreachable server. */
export class FakeSharedBackend implements LeaseCapableBackend {
  readonly name = 'redis';
  readonly store = new MemoryCacheBackend({ maxEntries: 100 });
  down = false;
  calls = 0;

  async get(key: string): Promise<CachedAnalysis | undefined> {
    this.check();
    return this.store.get(key);
  }

  async set(key: string, value: CachedAnalysis, ttlMs: number): Promise<void> {
    this.check();
    await this.store.set(key, value, ttlMs);
  }

  async isAvailable(): Promise<boolean> {
    return !this.down;
  }

  async acquireLease(key: string, owner: string, ttlMs: number): Promise<boolean> {
    this.check();
    return this.store.acquireLease(key, owner, ttlMs);
  }

  async releaseLease(key: string, owner: string): Promise<void> {
    this.check();
    await this.store.releaseLease(key, owner);
  }

  private check(): void {
    this.calls++;
    if (this.down) throw new CacheUnavailableError('Redis get failed: connection refused', this.name);
  }
}
