import { PyLensError, EnrichmentError } from './errors.js';

export interface RetryOptions {
  maxAttempts: number;
  baseDelay: number;
  maxDelay: number;
  backoffMultiplier: number;
  jitter: boolean;
  retryCondition: (error: Error) => boolean;
}

export interface RetryResult<T> {
  success: boolean;
  result?: T;
  error?: Error;
  attempts: number;
  totalDuration: number;
}

export class RetryManager {
  private static defaultOptions: RetryOptions = {
    maxAttempts: 3,
    baseDelay: 1000,
    maxDelay: 10000,
    backoffMultiplier: 2,
    jitter: true,
    retryCondition: (error) => {
      if (error instanceof PyLensError) {
        return error.retryable;
      }
      return false; // Don't retry unknown errors by default
    }
  };

  public static async executeWithRetry<T>(
    operation: () => Promise<T>,
    options: Partial<RetryOptions> = {}
  ): Promise<RetryResult<T>> {
    const config: RetryOptions = { ...this.defaultOptions, ...options };
    const startTime = Date.now();
    let lastError: Error = new Error('No attempts made');
    let finalAttempt = 0;

    for (let attempt = 1; attempt <= config.maxAttempts; attempt++) {
      finalAttempt = attempt;
      try {
        const result = await operation();

        return {
          success: true,
          result,
          attempts: attempt,
          totalDuration: Date.now() - startTime
        };
      } catch (error) {
        lastError = error instanceof Error ? error : new Error(String(error));

        if (attempt === config.maxAttempts || !config.retryCondition(lastError)) {
          break;
        }

        await this.sleep(this.calculateDelay(attempt, config));
      }
    }

    return {
      success: false,
      error: lastError,
      attempts: finalAttempt,
      totalDuration: Date.now() - startTime
    };
  }

  /** Backoff before attempt `attempt + 1`, capped at `maxDelay`, ±25% jitter. */
  static calculateDelay(attempt: number, options: RetryOptions): number {
    const exponentialDelay = Math.min(
      options.baseDelay * Math.pow(options.backoffMultiplier, attempt - 1),
      options.maxDelay
    );

    if (options.jitter) {
      const jitterRange = exponentialDelay * 0.25;
      const jitter = (Math.random() - 0.5) * 2 * jitterRange;
      return Math.max(0, exponentialDelay + jitter);
    }

    return exponentialDelay;
  }

  private static sleep(ms: number): Promise<void> {
    return new Promise(resolve => setTimeout(resolve, ms));
  }

  // Specialized retry for model provider calls: 429 and 5xx only
  public static async retryProviderOperation<T>(
    operation: () => Promise<T>,
    options: Partial<RetryOptions> = {}
  ): Promise<RetryResult<T>> {
    return this.executeWithRetry(operation, {
      maxAttempts: 3,
      baseDelay: 500,
      maxDelay: 4000,
      backoffMultiplier: 2,
      retryCondition: (error) => error instanceof EnrichmentError && error.retryable,
      ...options
    });
  }
}
