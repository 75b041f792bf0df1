import { z } from 'zod';

export const MAX_SOURCE_LENGTH = 1_000_000;

const CodeSchema = z.string({
  required_error: 'Code is required',
  invalid_type_error: 'Code must be a string'
})
  .min(1, 'Code cannot be empty')
  .max(MAX_SOURCE_LENGTH, 'Code too large (max 1,000,000 characters)');

const LanguageVersionSchema = z.string()
  .max(32, 'Language version too long (max 32 characters)')
  .regex(/^[0-9A-Za-z.+-]*$/, 'Language version may only contain letters, digits, dots, plus and minus');

// Core Analysis Schemas
export const SourceUnitSchema = z.object({
  code: CodeSchema,
  languageVersion: LanguageVersionSchema.nullish().transform(version => version ?? null)
});

export const SeveritySchema = z.enum(['info', 'warning', 'error'], {
  errorMap: () => ({ message: "Severity must be 'info', 'warning', or 'error'" })
});

export const SuggestionSchema = z.object({
  ruleId: z.string().min(1, 'Rule ID cannot be empty'),
  message: z.string().min(1, 'Suggestion message cannot be empty'),
  severity: SeveritySchema,
  line: z.number().int('Line must be an integer').min(1, 'Line number must be positive').nullable(),
  column: z.number().int('Column must be an integer').min(0, 'Column cannot be negative').nullable(),
  metadata: z.record(z.unknown())
});

export const FingerprintSchema = z.string().regex(/^[0-9a-f]{64}$/, 'Fingerprint must be a SHA-256 hex digest');

/** Shape stored in either cache backend. */
export const CachedAnalysisSchema = z.object({
  fingerprint: FingerprintSchema,
  suggestions: z.array(SuggestionSchema),
  analysisTimeMs: z.number().min(0, 'Analysis time cannot be negative'),
  createdAt: z.string().datetime()
});

export const AnalysisResultSchema = z.object({
  fingerprint: FingerprintSchema,
  suggestions: z.array(SuggestionSchema),
  analysisTimeMs: z.number().min(0, 'Analysis time cannot be negative'),
  cached: z.boolean()
});

// MCP tool arguments
export const AnalyzeToolArgsSchema = z.object({
  code: CodeSchema,
  languageVersion: LanguageVersionSchema.optional(),
  useCache: z.boolean().default(true)
});

// HTTP request bodies use snake_case like the rest of the REST surface
export const HttpAnalyzeRequestSchema = z.object({
  code: CodeSchema,
  language_version: LanguageVersionSchema.nullish()
});

export const HistoryLookupSchema = z.object({
  codeHash: FingerprintSchema
});

export type SourceUnit = z.infer<typeof SourceUnitSchema>;
export type Severity = z.infer<typeof SeveritySchema>;
export type Suggestion = z.infer<typeof SuggestionSchema>;
export type Fingerprint = z.infer<typeof FingerprintSchema>;
export type CachedAnalysis = z.infer<typeof CachedAnalysisSchema>;
export type AnalysisResult = z.infer<typeof AnalysisResultSchema>;
export type AnalyzeToolArgs = z.infer<typeof AnalyzeToolArgsSchema>;
export type HttpAnalyzeRequest = z.infer<typeof HttpAnalyzeRequestSchema>;
