import { performance } from 'node:perf_hooks';
import { loadPythonParser } from '../lib/parser-adapter.js';
import type { CacheFacade, ComputeOutcome } from './cache-facade.js';
import { GracefulDegradationManager, ServiceLevel } from './degradation.js';
import {
  AnalysisError,
  EnrichmentError,
  LeaseError,
  PersistenceError,
  describeCause
} from './errors.js';
import { computeFingerprint } from './fingerprint.js';
import { silentLogger, type Logger } from './logger.js';
import { MetricsCollector } from './metrics.js';
import type { RuleEngine } from './rule-engine.js';
import type {
  AnalysisResult,
  CachedAnalysis,
  HealthReport,
  HistoryEntry,
  HistoryStore,
  ParseFailure,
  ReportEnricher,
  ReportResult,
  RuleInfo,
  SourceUnit,
  Suggestion
} from './types.js';
import { ValidationLayer } from './validation.js';

export interface CodeAnalyzerOptions {
  ruleEngine: RuleEngine;
  cache: CacheFacade;
  history?: HistoryStore | null;
  enricher?: ReportEnricher | null;
  /** Store the submitted source text with each history record. */
  persistSnippets?: boolean;
  logger?: Logger;
  metrics?: MetricsCollector;
  degradation?: GracefulDegradationManager;
}

export interface AnalyzeOptions {
  /** `false` skips both cache lookup and cache write; the rule pass still runs. */
  useCache?: boolean;
  /** `false` skips the history record for this call. */
  persist?: boolean;
}

export const SYNTAX_ERROR_RULE_ID = 'syntax_error';

/**
 * Orchestrates one analysis: validate, fingerprint, consult the cache, run
 * the parser and rules on a miss, and record history in the background.
 */
export class CodeAnalyzer {
  private readonly ruleEngine: RuleEngine;
  private readonly cache: CacheFacade;
  private readonly history: HistoryStore | null;
  private readonly enricher: ReportEnricher | null;
  private readonly persistSnippets: boolean;
  private readonly logger: Logger;
  private readonly metrics: MetricsCollector;
  private readonly degradation: GracefulDegradationManager;
  private readonly pending = new Set<Promise<void>>();

  constructor(options: CodeAnalyzerOptions) {
    this.ruleEngine = options.ruleEngine;
    this.cache = options.cache;
    this.history = options.history ?? null;
    this.enricher = options.enricher ?? null;
    this.persistSnippets = options.persistSnippets ?? true;
    this.logger = options.logger ?? silentLogger;
    this.metrics = options.metrics ?? new MetricsCollector();
    this.degradation = options.degradation ?? new GracefulDegradationManager(this.logger);
  }

  async analyze(input: unknown, options: AnalyzeOptions = {}): Promise<AnalysisResult> {
    const unit = ValidationLayer.validateSourceUnit(input);
    return this.analyzeUnit(unit, options);
  }

  /**
   * Runs {@link analyze} and then asks the configured model for a prioritized
   * report. Any enrichment failure degrades to the raw suggestions.
   */
  async analyzeWithReport(input: unknown, options: AnalyzeOptions = {}): Promise<ReportResult> {
    const unit = ValidationLayer.validateSourceUnit(input);
    const result = await this.analyzeUnit(unit, options);

    const enricher = this.enricher;
    if (!enricher) {
      return { ...result, prioritizedReport: null, modelUsed: 'none' };
    }

    try {
      const enrichment = await enricher.enrich({ code: unit.code, suggestions: result.suggestions });
      this.degradation.recordRecovery('enrichment');
      return { ...result, prioritizedReport: enrichment.report, modelUsed: enrichment.modelUsed };
    } catch (error) {
      const failure = error instanceof EnrichmentError
        ? error
        : new EnrichmentError(describeCause(error), enricher.provider, undefined, error);
      this.degradation.handleError(failure);
      this.logger.warn(`⚠️ Report enrichment failed: ${failure.message}`, {
        provider: failure.provider,
        statusCode: failure.statusCode,
        correlationId: failure.correlationId
      });
      return {
        ...result,
        prioritizedReport: null,
        modelUsed: `${enricher.provider}/${enricher.model}`,
        enrichmentError: failure.getUserFriendlyMessage()
      };
    }
  }

  async health(): Promise<HealthReport> {
    const primaryAvailable = await this.cache.isPrimaryAvailable();
    const level = this.degradation.getLevel();
    const metrics = this.metrics.getMetrics();

    return {
      status: level === ServiceLevel.FULL ? 'ok' : 'degraded',
      cache: primaryAvailable ? 'ok' : 'fallback',
      rulesLoaded: this.ruleEngine.size,
      rules: this.ruleEngine.listRules(),
      persistence: this.persistenceStatus(),
      modelProvider: this.enricher?.provider ?? 'none',
      serviceLevel: level,
      metrics: {
        analyses: metrics.totalAnalyses,
        cacheHitRate: metrics.cacheHitRate,
        averageAnalysisTimeMs: metrics.averageAnalysisTime,
        uptimeMs: metrics.uptime
      }
    };
  }

  listRules(): RuleInfo[] {
    return this.ruleEngine.listRules();
  }

  async findHistory(fingerprint: string): Promise<HistoryEntry | undefined> {
    if (!this.history) return undefined;
    return this.history.findLatest(fingerprint);
  }

  get historyEnabled(): boolean {
    return this.history !== null;
  }

  getMetrics(): MetricsCollector {
    return this.metrics;
  }

  getDegradation(): GracefulDegradationManager {
    return this.degradation;
  }

  /** Resolves once every in-flight history record has settled. */
  async drain(): Promise<void> {
    while (this.pending.size > 0) {
      await Promise.all([...this.pending]);
    }
  }

  private async analyzeUnit(unit: SourceUnit, options: AnalyzeOptions): Promise<AnalysisResult> {
    const fingerprint = computeFingerprint(unit.code, unit.languageVersion);
    this.metrics.recordAnalysis();

    let outcome: ComputeOutcome;
    try {
      outcome = options.useCache === false
        ? { value: await this.runUncached(unit, fingerprint), source: 'computed' }
        : await this.cache.getOrCompute(fingerprint, () => this.runPass(unit, fingerprint));
    } catch (error) {
      this.metrics.recordFailure();
      this.logger.error(`❌ Analysis failed for ${fingerprint.slice(0, 12)}: ${describeCause(error)}`);
      throw error;
    }

    if (outcome.source === 'computed' && options.persist !== false) {
      this.persist(unit, outcome.value);
    }

    this.logger.debug(`Analysis ${fingerprint.slice(0, 12)} served from ${outcome.source}`, {
      suggestions: outcome.value.suggestions.length
    });

    // Concurrent callers share one computed value; each gets its own copy.
    return {
      fingerprint,
      suggestions: structuredClone(outcome.value.suggestions),
      analysisTimeMs: outcome.value.analysisTimeMs,
      cached: outcome.source !== 'computed'
    };
  }

  private async runUncached(unit: SourceUnit, fingerprint: string): Promise<CachedAnalysis> {
    try {
      return await this.runPass(unit, fingerprint);
    } catch (error) {
      if (error instanceof LeaseError || error instanceof AnalysisError) throw error;
      throw new AnalysisError(describeCause(error), fingerprint, error);
    }
  }

  /** Parse plus rule pass. Only this part is timed; loading the grammar is not. */
  private async runPass(unit: SourceUnit, fingerprint: string): Promise<CachedAnalysis> {
    const parser = await loadPythonParser();
    const start = performance.now();
    const parsed = parser.parse(unit.code, unit.languageVersion);

    let suggestions: Suggestion[];
    let faults = 0;
    if (parsed.ok) {
      try {
        const evaluation = this.ruleEngine.evaluate(parsed.tree);
        suggestions = evaluation.suggestions;
        faults = evaluation.faults.length;
      } finally {
        parsed.tree.delete();
      }
    } else {
      suggestions = [syntaxErrorSuggestion(parsed.failure)];
    }

    const analysisTimeMs = roundMs(performance.now() - start);
    this.metrics.recordComputation(analysisTimeMs, faults);

    return {
      fingerprint,
      suggestions,
      analysisTimeMs,
      createdAt: new Date().toISOString()
    };
  }

  private persist(unit: SourceUnit, value: CachedAnalysis): void {
    const history = this.history;
    if (!history) return;

    const task: Promise<void> = history
      .record({
        fingerprint: value.fingerprint,
        sourceText: this.persistSnippets ? unit.code : null,
        suggestions: value.suggestions,
        analysisTimeMs: value.analysisTimeMs,
        languageVersion: unit.languageVersion,
        timestamp: new Date(value.createdAt)
      })
      .then(
        () => this.degradation.recordRecovery('persistence'),
        (error: unknown) => {
          const failure = error instanceof PersistenceError
            ? error
            : new PersistenceError(`History write failed: ${describeCause(error)}`, error);
          this.degradation.handleError(failure);
          this.logger.warn(`⚠️ ${failure.message}`, { fingerprint: value.fingerprint });
        }
      )
      .finally(() => {
        this.pending.delete(task);
      });
    this.pending.add(task);
  }

  private persistenceStatus(): HealthReport['persistence'] {
    if (!this.history) return 'disabled';
    return this.degradation.isDegraded('persistence') ? 'error' : 'ok';
  }
}

export function syntaxErrorSuggestion(failure: ParseFailure): Suggestion {
  return {
    ruleId: SYNTAX_ERROR_RULE_ID,
    message: `Syntax error: ${failure.message}`,
    severity: 'error',
    line: failure.line,
    column: failure.column === null ? null : Math.max(0, failure.column - 1),
    metadata: {}
  };
}

function roundMs(ms: number): number {
  return Math.round(ms * 1000) / 1000;
}
