import { CircuitOpenError } from './errors.js';
import type { Clock } from './cache.js';

export enum CircuitState {
  CLOSED = 'closed',     // Normal operation
  OPEN = 'open',
  HALF_OPEN = 'half_open' // Testing if service recovered
}

export interface CircuitBreakerOptions {
  failureThreshold: number;
  recoveryTimeout: number;
  halfOpenMaxCalls: number;
}

export interface CircuitBreakerStats {
  state: CircuitState;
  failureCount: number;
  successCount: number;
  lastFailureTime?: Date;
  lastSuccessTime?: Date;
  totalCalls: number;
}

export const DEFAULT_BREAKER_OPTIONS: CircuitBreakerOptions = {
  failureThreshold: 5,
  recoveryTimeout: 30000,
  halfOpenMaxCalls: 1
};

export class CircuitBreaker {
  private state: CircuitState = CircuitState.CLOSED;
  private failureCount = 0;
  private successCount = 0;
  private lastFailureTime?: number;
  private lastSuccessTime?: number;
  private totalCalls = 0;
  private halfOpenCalls = 0;
  private readonly options: CircuitBreakerOptions;

  constructor(
    private readonly name: string,
    options: Partial<CircuitBreakerOptions> = {},
    private readonly clock: Clock = Date.now
  ) {
    this.options = { ...DEFAULT_BREAKER_OPTIONS, ...options };
  }

  /**
   * Runs `operation` unless the circuit is open, in which case it rejects
   * with {@link CircuitOpenError} without calling it.
   */
  public async execute<T>(operation: () => Promise<T>): Promise<T> {
    if (this.state === CircuitState.OPEN) {
      if (this.shouldAttemptReset()) {
        this.state = CircuitState.HALF_OPEN;
        this.halfOpenCalls = 0;
      } else {
        throw new CircuitOpenError(this.name, this.retryAt());
      }
    }

    if (this.state === CircuitState.HALF_OPEN && this.halfOpenCalls >= this.options.halfOpenMaxCalls) {
      throw new CircuitOpenError(this.name, this.retryAt());
    }

    this.totalCalls++;

    if (this.state === CircuitState.HALF_OPEN) {
      this.halfOpenCalls++;
    }

    try {
      const result = await operation();
      this.onSuccess();
      return result;
    } catch (error) {
      this.onFailure();
      throw error;
    }
  }

  /** True when a call would be attempted right now. */
  public isCallPermitted(): boolean {
    return this.state !== CircuitState.OPEN || this.shouldAttemptReset();
  }

  public getState(): CircuitState {
    return this.state;
  }

  private onSuccess(): void {
    this.successCount++;
    this.lastSuccessTime = this.clock();

    if (this.state === CircuitState.HALF_OPEN) {
      if (this.halfOpenCalls >= this.options.halfOpenMaxCalls) {
        this.state = CircuitState.CLOSED;
        this.failureCount = 0;
      }
    } else {
      this.failureCount = 0;
    }
  }

  private onFailure(): void {
    this.failureCount++;
    this.lastFailureTime = this.clock();

    if (this.state === CircuitState.HALF_OPEN) {
      // Failure in half-open means the service is still down
      this.state = CircuitState.OPEN;
    } else if (this.state === CircuitState.CLOSED && this.failureCount >= this.options.failureThreshold) {
      this.state = CircuitState.OPEN;
    }
  }

  private shouldAttemptReset(): boolean {
    if (this.lastFailureTime === undefined) return false;
    return this.clock() - this.lastFailureTime >= this.options.recoveryTimeout;
  }

  private retryAt(): number {
    return (this.lastFailureTime ?? this.clock()) + this.options.recoveryTimeout;
  }

  public getStats(): CircuitBreakerStats {
    return {
      state: this.state,
      failureCount: this.failureCount,
      successCount: this.successCount,
      lastFailureTime: this.lastFailureTime === undefined ? undefined : new Date(this.lastFailureTime),
      lastSuccessTime: this.lastSuccessTime === undefined ? undefined : new Date(this.lastSuccessTime),
      totalCalls: this.totalCalls
    };
  }
}
