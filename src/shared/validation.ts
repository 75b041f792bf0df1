import { z } from 'zod';
import {
  SourceUnitSchema,
  AnalyzeToolArgsSchema,
  HttpAnalyzeRequestSchema,
  HistoryLookupSchema,
  CachedAnalysisSchema,
  type SourceUnit,
  type AnalyzeToolArgs,
  type HttpAnalyzeRequest,
  type CachedAnalysis
} from './schemas.js';
import { ValidationError } from './errors.js';

export class ValidationLayer {
  /**
   * Validates a source unit with detailed error reporting
   */
  static validateSourceUnit(input: unknown): SourceUnit {
    return this.validate(SourceUnitSchema, input, 'Invalid source unit provided');
  }

  static validateAnalyzeToolArgs(input: unknown): AnalyzeToolArgs {
    return this.validate(AnalyzeToolArgsSchema, input, 'Invalid analyze-python arguments');
  }

  static validateHttpAnalyzeRequest(input: unknown): HttpAnalyzeRequest {
    return this.validate(HttpAnalyzeRequestSchema, input, 'Invalid analysis request body');
  }

  static validateFingerprint(input: unknown): string {
    return this.validate(HistoryLookupSchema, { codeHash: input }, 'Invalid code hash').codeHash;
  }

  /**
   * Parses a cached payload; anything that does not match is treated as absent
   */
  static parseCachedAnalysis(input: unknown): CachedAnalysis | undefined {
    const result = CachedAnalysisSchema.safeParse(input);
    return result.success ? result.data : undefined;
  }

  /**
   * Generic safe validation with success/error result
   */
  static safeValidate<T>(
    schema: z.ZodType<T, z.ZodTypeDef, unknown>,
    input: unknown
  ): { success: true; data: T } | { success: false; error: ValidationError } {
    const result = schema.safeParse(input);

    if (result.success) {
      return { success: true, data: result.data };
    }
    return {
      success: false,
      error: new ValidationError('Validation failed', result.error.issues)
    };
  }

  /**
   * Transform validation errors into user-friendly MCP error format
   */
  static formatMCPError(error: ValidationError): {
    code: string;
    message: string;
    data: { issues: Array<{ path: string; message: string; code: string }> };
  } {
    return {
      code: 'VALIDATION_ERROR',
      message: `Input validation failed: ${this.formatIssues(error.issues)}`,
      data: {
        issues: error.issues.map(issue => ({
          path: issue.path.join('.'),
          message: issue.message,
          code: issue.code
        }))
      }
    };
  }

  static formatIssues(issues: z.ZodIssue[]): string {
    return issues
      .map(issue => issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message)
      .join('; ');
  }

  private static validate<T>(
    schema: z.ZodType<T, z.ZodTypeDef, unknown>,
    input: unknown,
    message: string
  ): T {
    const result = schema.safeParse(input);

    if (!result.success) {
      throw new ValidationError(message, result.error.issues);
    }

    return result.data;
  }
}
