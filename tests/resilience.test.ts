import { describe, expect, it, vi } from 'vitest';
import { CircuitBreaker, CircuitState } from '../src/shared/circuit-breaker.js';
import { GracefulDegradationManager, ServiceLevel } from '../src/shared/degradation.js';
import {
  CacheUnavailableError,
  CircuitOpenError,
  ConfigurationError,
  EnrichmentError,
  ErrorCategory,
  PersistenceError,
  RuleEvaluationError,
  ValidationError
} from '../src/shared/errors.js';
import { RetryManager } from '../src/shared/retry.js';
import { ManualClock } from './helpers.js';

const fail = (message = 'down') => async (): Promise<never> => {
  throw new Error(message);
};

describe('CircuitBreaker', () => {
  it('opens after the failure threshold and rejects without calling', async () => {
    const clock = new ManualClock();
    const breaker = new CircuitBreaker('cache:redis', { failureThreshold: 2, recoveryTimeout: 1000 }, clock.read);
    const operation = vi.fn(fail());

    await expect(breaker.execute(operation)).rejects.toThrow('down');
    await expect(breaker.execute(operation)).rejects.toThrow('down');
    expect(breaker.getState()).toBe(CircuitState.OPEN);

    await expect(breaker.execute(operation)).rejects.toBeInstanceOf(CircuitOpenError);
    expect(operation).toHaveBeenCalledTimes(2);
    expect(breaker.isCallPermitted()).toBe(false);
  });

  it('closes again after a successful half-open call', async () => {
    const clock = new ManualClock();
    const breaker = new CircuitBreaker('cache:redis', { failureThreshold: 1, recoveryTimeout: 1000 }, clock.read);

    await expect(breaker.execute(fail())).rejects.toThrow();
    clock.advance(1000);
    expect(breaker.isCallPermitted()).toBe(true);

    await expect(breaker.execute(async () => 'ok')).resolves.toBe('ok');
    expect(breaker.getState()).toBe(CircuitState.CLOSED);
  });

  it('reopens when the half-open call fails', async () => {
    const clock = new ManualClock();
    const breaker = new CircuitBreaker('cache:redis', { failureThreshold: 1, recoveryTimeout: 1000 }, clock.read);

    await expect(breaker.execute(fail())).rejects.toThrow();
    clock.advance(1000);
    await expect(breaker.execute(fail('still down'))).rejects.toThrow('still down');

    expect(breaker.getState()).toBe(CircuitState.OPEN);
    expect(breaker.getStats()).toMatchObject({ failureCount: 2, successCount: 0, totalCalls: 2 });
  });

  it('resets failures after a success while closed', async () => {
    const breaker = new CircuitBreaker('x', { failureThreshold: 2 });

    await expect(breaker.execute(fail())).rejects.toThrow();
    await breaker.execute(async () => undefined);
    await expect(breaker.execute(fail())).rejects.toThrow();

    expect(breaker.getState()).toBe(CircuitState.CLOSED);
  });
});

describe('RetryManager', () => {
  const fast = { baseDelay: 0, jitter: false };

  it('retries retryable errors up to the attempt limit', async () => {
    const operation = vi.fn(async () => {
      throw new EnrichmentError('openai API error (503): overloaded', 'openai', 503);
    });

    const result = await RetryManager.retryProviderOperation(operation, fast);

    expect(result.success).toBe(false);
    expect(result.attempts).toBe(3);
    expect(operation).toHaveBeenCalledTimes(3);
  });

  it('does not retry client errors', async () => {
    const operation = vi.fn(async () => {
      throw new EnrichmentError('openai API error (401): bad key', 'openai', 401);
    });

    const result = await RetryManager.retryProviderOperation(operation, fast);

    expect(result.attempts).toBe(1);
    expect(result.error).toBeInstanceOf(EnrichmentError);
  });

  it('returns the first success', async () => {
    const operation = vi.fn()
      .mockRejectedValueOnce(new EnrichmentError('gemini request failed: timed out after 10ms', 'gemini'))
      .mockResolvedValueOnce('report');

    const result = await RetryManager.retryProviderOperation(operation, fast);

    expect(result).toMatchObject({ success: true, result: 'report', attempts: 2 });
  });

  it('leaves unknown errors alone by default', async () => {
    const result = await RetryManager.executeWithRetry(fail('plain'), fast);

    expect(result.attempts).toBe(1);
    expect(result.error?.message).toBe('plain');
  });

  it('grows the delay exponentially up to the cap', () => {
    const options = {
      maxAttempts: 5,
      baseDelay: 100,
      maxDelay: 300,
      backoffMultiplier: 2,
      jitter: false,
      retryCondition: () => true
    };

    expect([1, 2, 3].map(attempt => RetryManager.calculateDelay(attempt, options))).toEqual([100, 200, 300]);
  });
});

describe('GracefulDegradationManager', () => {
  it('derives the service level from failing components', () => {
    const manager = new GracefulDegradationManager();
    expect(manager.getLevel()).toBe(ServiceLevel.FULL);

    manager.handleError(new CacheUnavailableError('Redis get failed: refused', 'redis'));
    expect(manager.getLevel()).toBe(ServiceLevel.DEGRADED);

    manager.handleError(new PersistenceError('disk full'));
    const status = manager.getCurrentStatus();
    expect(status.level).toBe(ServiceLevel.MINIMAL);
    expect(status.unavailableFeatures).toEqual(['Shared analysis cache (Redis)', 'Analysis history']);
    expect(status.degradationReason).toBe('fallback-cache: Redis get failed: refused; skip-history: disk full');

    manager.recordRecovery('cache');
    expect(manager.getLevel()).toBe(ServiceLevel.DEGRADED);
  });

  it('maps provider failures to the enrichment component', () => {
    const manager = new GracefulDegradationManager();

    manager.handleError(new EnrichmentError('rate limited', 'anthropic', 429));

    expect(manager.isDegraded('enrichment')).toBe(true);
  });

  it('ignores errors with no matching strategy', () => {
    const manager = new GracefulDegradationManager();

    manager.handleError(new ConfigurationError('bad value', 'port'));

    expect(manager.getLevel()).toBe(ServiceLevel.FULL);
  });

  it('records each transition once', () => {
    const manager = new GracefulDegradationManager();

    manager.recordFailure('cache', 'refused');
    manager.recordFailure('cache', 'refused again');
    manager.recordRecovery('cache');
    manager.recordRecovery('cache');

    expect(manager.getDegradationHistory().map(event => [event.component, event.change, event.level])).toEqual([
      ['cache', 'failed', ServiceLevel.DEGRADED],
      ['cache', 'recovered', ServiceLevel.FULL]
    ]);
  });
});

describe('errors', () => {
  it('classifies enrichment failures by status code', () => {
    const rateLimited = new EnrichmentError('x', 'openai', 429);
    expect(rateLimited.category).toBe(ErrorCategory.RATE_LIMIT);
    expect(rateLimited.retryable).toBe(true);
    expect(rateLimited.rateLimited).toBe(true);
    expect(new EnrichmentError('x', 'openai', 500).retryable).toBe(true);
    expect(new EnrichmentError('x', 'openai').retryable).toBe(true);
    expect(new EnrichmentError('x', 'openai', 400).retryable).toBe(false);
    expect(new EnrichmentError('x', 'openai', 401).getUserFriendlyMessage())
      .toBe('The openai API rejected the credentials. Returning raw suggestions only.');
  });

  it('formats validation issues for users', () => {
    const error = new ValidationError('Invalid input', [
      { code: 'custom', path: ['code'], message: 'Code cannot be empty' }
    ]);

    expect(error.getUserFriendlyMessage()).toBe('Please check your input: code: Code cannot be empty');
    expect(error.category).toBe(ErrorCategory.VALIDATION);
  });

  it('wraps rule failures with the rule id', () => {
    const error = new RuleEvaluationError('naming_conventions', new TypeError('bad node'));

    expect(error.message).toBe('Rule "naming_conventions" failed: bad node');
    expect(error.cause).toBeInstanceOf(TypeError);
  });

  it('serializes with a correlation id', () => {
    const json = new PersistenceError('disk full').toJSON();

    expect(json).toMatchObject({ name: 'PersistenceError', message: 'disk full', category: 'persistence' });
    expect(json.correlationId).toMatch(/^pylens_[0-9a-f-]{36}$/);
  });
});
