import { randomUUID } from 'node:crypto';
import { z } from 'zod';

export enum ErrorSeverity {
  LOW = 'low',
  MEDIUM = 'medium',
  HIGH = 'high',
  CRITICAL = 'critical'
}

export enum ErrorCategory {
  VALIDATION = 'validation',
  ANALYSIS = 'analysis',
  CACHE = 'cache',
  EXTERNAL_SERVICE = 'external_service',
  PERSISTENCE = 'persistence',
  CONFIGURATION = 'configuration',
  CONCURRENCY = 'concurrency',
  RATE_LIMIT = 'rate_limit'
}

export abstract class PyLensError extends Error {
  abstract readonly category: ErrorCategory;
  abstract readonly severity: ErrorSeverity;
  abstract readonly recoverable: boolean;
  abstract readonly retryable: boolean;

  public readonly timestamp: Date;
  public readonly correlationId: string;
  public readonly context: Record<string, unknown>;

  constructor(
    message: string,
    context: Record<string, unknown> = {},
    cause?: unknown
  ) {
    super(message);
    this.name = this.constructor.name;
    this.timestamp = new Date();
    this.correlationId = `pylens_${randomUUID()}`;
    this.context = context;

    if (cause !== undefined) {
      this.cause = cause;
    }
  }

  public toJSON() {
    return {
      name: this.name,
      message: this.message,
      category: this.category,
      severity: this.severity,
      recoverable: this.recoverable,
      retryable: this.retryable,
      timestamp: this.timestamp.toISOString(),
      correlationId: this.correlationId,
      context: this.context
    };
  }

  public getUserFriendlyMessage(): string {
    return this.message;
  }

  public getRecoveryActions(): string[] {
    return [];
  }
}

export class ValidationError extends PyLensError {
  readonly category = ErrorCategory.VALIDATION;
  readonly severity = ErrorSeverity.MEDIUM;
  readonly recoverable = true;
  readonly retryable = false;

  constructor(
    message: string,
    public readonly issues: z.ZodIssue[]
  ) {
    super(message, { issues });
  }

  public getUserFriendlyMessage(): string {
    const fieldErrors = this.issues
      .map(issue => issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message)
      .join('; ');
    return `Please check your input: ${fieldErrors}`;
  }

  public getRecoveryActions(): string[] {
    return [
      'Send the source text in the "code" field',
      'Keep the snippet between 1 and 1,000,000 characters'
    ];
  }
}

/** Internal fault during an analysis pass that is not a syntax error. */
export class AnalysisError extends PyLensError {
  readonly category = ErrorCategory.ANALYSIS;
  readonly severity = ErrorSeverity.HIGH;
  readonly recoverable = false;
  readonly retryable = false;

  constructor(
    message: string,
    public readonly fingerprint?: string,
    cause?: unknown
  ) {
    super(message, { fingerprint }, cause);
  }

  public getUserFriendlyMessage(): string {
    return `Code analysis failed: ${this.message}`;
  }
}

/** A single rule threw while evaluating a tree. Isolated by the rule engine. */
export class RuleEvaluationError extends PyLensError {
  readonly category = ErrorCategory.ANALYSIS;
  readonly severity = ErrorSeverity.LOW;
  readonly recoverable = true;
  readonly retryable = false;

  constructor(
    public readonly ruleId: string,
    cause: unknown
  ) {
    super(`Rule "${ruleId}" failed: ${describeCause(cause)}`, { ruleId }, cause);
  }
}

export class CacheUnavailableError extends PyLensError {
  readonly category = ErrorCategory.CACHE;
  readonly severity = ErrorSeverity.MEDIUM;
  readonly recoverable = true;
  readonly retryable = true;

  constructor(
    message: string,
    public readonly backend: string,
    cause?: unknown
  ) {
    super(message, { backend }, cause);
  }

  public getUserFriendlyMessage(): string {
    return `Cache backend "${this.backend}" is unreachable. Results are served from the in-process cache.`;
  }

  public getRecoveryActions(): string[] {
    return [
      'Check that the Redis server is running and REDIS_URL is correct',
      'Analysis continues without the shared cache'
    ];
  }
}

export class CircuitOpenError extends PyLensError {
  readonly category = ErrorCategory.CACHE;
  readonly severity = ErrorSeverity.MEDIUM;
  readonly recoverable = true;
  readonly retryable = true;

  constructor(
    public readonly circuit: string,
    public readonly retryAt: number
  ) {
    super(`Circuit "${circuit}" is open`, { circuit, retryAt: new Date(retryAt).toISOString() });
  }
}

/**
 * The computation behind a dedup lease failed. Every caller waiting on the
 * same fingerprint receives this error.
 */
export class LeaseError extends PyLensError {
  readonly category = ErrorCategory.CONCURRENCY;
  readonly severity = ErrorSeverity.HIGH;
  readonly recoverable = false;
  readonly retryable = true;

  constructor(
    message: string,
    public readonly fingerprint: string,
    cause?: unknown
  ) {
    super(message, { fingerprint }, cause);
  }

  public getUserFriendlyMessage(): string {
    return `Analysis could not be completed: ${this.message}`;
  }

  public getRecoveryActions(): string[] {
    return ['Retry the request'];
  }
}

export class LeaseExpiredError extends LeaseError {
  constructor(fingerprint: string, ttlMs: number) {
    super(`Lease for ${fingerprint.slice(0, 12)} expired after ${ttlMs}ms`, fingerprint);
  }
}

export class EnrichmentError extends PyLensError {
  readonly category: ErrorCategory;
  readonly severity = ErrorSeverity.MEDIUM;
  readonly recoverable = true;
  readonly retryable: boolean;

  constructor(
    message: string,
    public readonly provider: string,
    public readonly statusCode?: number,
    cause?: unknown
  ) {
    super(message, { provider, statusCode }, cause);
    this.category = statusCode === 429 ? ErrorCategory.RATE_LIMIT : ErrorCategory.EXTERNAL_SERVICE;
    // Timeouts and network failures carry no status code and are worth retrying.
    this.retryable = statusCode === undefined || statusCode === 429 || statusCode >= 500;
  }

  get rateLimited(): boolean {
    return this.statusCode === 429;
  }

  public getUserFriendlyMessage(): string {
    if (this.rateLimited) {
      return `The ${this.provider} API rate limit was reached. Returning raw suggestions only.`;
    }
    if (this.statusCode === 401 || this.statusCode === 403) {
      return `The ${this.provider} API rejected the credentials. Returning raw suggestions only.`;
    }
    return `The ${this.provider} model is unavailable. Returning raw suggestions only.`;
  }

  public getRecoveryActions(): string[] {
    if (this.rateLimited) {
      return ['Wait for the rate limit to reset', 'Use the plain analysis endpoint meanwhile'];
    }
    return ['Check the model provider configuration and API key', 'Retry in a few moments'];
  }
}

export class PersistenceError extends PyLensError {
  readonly category = ErrorCategory.PERSISTENCE;
  readonly severity = ErrorSeverity.LOW;
  readonly recoverable = true;
  readonly retryable = false;

  constructor(message: string, cause?: unknown) {
    super(message, {}, cause);
  }
}

export class ConfigurationError extends PyLensError {
  readonly category = ErrorCategory.CONFIGURATION;
  readonly severity = ErrorSeverity.HIGH;
  readonly recoverable = false;
  readonly retryable = false;

  constructor(
    message: string,
    public readonly configKey?: string
  ) {
    super(message, { configKey });
  }

  public getUserFriendlyMessage(): string {
    return `Configuration issue: ${this.message}. Please check your setup.`;
  }

  public getRecoveryActions(): string[] {
    return [
      'Review pylens.yaml',
      'Check environment variables and settings'
    ];
  }
}

export function describeCause(cause: unknown): string {
  if (cause instanceof Error) return cause.message;
  return String(cause);
}
