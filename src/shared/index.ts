// Public surface of the analysis core
export * from './schemas.js';
export * from './validation.js';
export * from './analyzer.js';
export * from './rule-engine.js';
export * from './errors.js';
export * from './degradation.js';
export * from './retry.js';
export * from './circuit-breaker.js';
export * from './metrics.js';
export * from './fingerprint.js';
export * from './cache.js';
export * from './cache-facade.js';
export * from './lease.js';
export * from './logger.js';
export * from './config.js';

export type {
  SyntaxTree,
  ParseFailure,
  ParseOutcome,
  AnalysisRule,
  RuleFault,
  RuleEvaluation,
  RuleInfo,
  ReportResult,
  HistoryRecord,
  HistoryEntry,
  HistoryRecorder,
  HistoryStore,
  EnrichmentRequest,
  EnrichmentResult,
  ReportEnricher,
  ServiceLevelName,
  HealthReport
} from './types.js';
