import type Parser from 'web-tree-sitter';
import type { Suggestion, AnalysisResult } from './schemas.js';
import type { ServiceLevel } from './degradation.js';

export type { Severity, Suggestion, SourceUnit, CachedAnalysis, AnalysisResult, Fingerprint } from './schemas.js';

/** A tree-sitter tree; whoever parsed it releases it with `delete()`. */
export type SyntaxTree = Parser.Tree;

export interface ParseFailure {
  message: string;
  line: number | null;
  /** 1-based, in UTF-16 code units */
  column: number | null;
}

export type ParseOutcome =
  | { ok: true; tree: SyntaxTree }
  | { ok: false; failure: ParseFailure };

export interface AnalysisRule {
  readonly id: string;
  readonly description: string;
  evaluate(tree: SyntaxTree): Suggestion[];
}

export interface RuleFault {
  ruleId: string;
  message: string;
}

export interface RuleEvaluation {
  suggestions: Suggestion[];
  faults: RuleFault[];
}

export interface RuleInfo {
  id: string;
  description: string;
}

export interface ReportResult extends AnalysisResult {
  prioritizedReport: string | null;
  modelUsed: string;
  enrichmentError?: string;
}

export interface HistoryRecord {
  fingerprint: string;
  /** `null` when snippet persistence is switched off. */
  sourceText: string | null;
  suggestions: Suggestion[];
  analysisTimeMs: number;
  languageVersion: string | null;
  timestamp: Date;
}

export interface HistoryEntry extends HistoryRecord {
  id: number;
}

export interface HistoryRecorder {
  record(record: HistoryRecord): Promise<void>;
}

export interface HistoryStore extends HistoryRecorder {
  findLatest(fingerprint: string): Promise<HistoryEntry | undefined>;
  listRecent(limit: number): Promise<HistoryEntry[]>;
  close(): void;
}

export interface EnrichmentRequest {
  code: string;
  suggestions: Suggestion[];
}

export interface EnrichmentResult {
  report: string;
  modelUsed: string;
}

/** Turns raw suggestions into a prioritized, human-readable report. */
export interface ReportEnricher {
  readonly provider: string;
  readonly model: string;
  enrich(request: EnrichmentRequest): Promise<EnrichmentResult>;
}

export type ServiceLevelName = `${ServiceLevel}`;

export interface HealthReport {
  status: 'ok' | 'degraded';
  cache: 'ok' | 'fallback';
  rulesLoaded: number;
  rules: RuleInfo[];
  persistence: 'ok' | 'disabled' | 'error';
  modelProvider: string;
  serviceLevel: ServiceLevel;
  metrics?: {
    analyses: number;
    cacheHitRate: number;
    averageAnalysisTimeMs: number;
    uptimeMs: number;
  };
}
