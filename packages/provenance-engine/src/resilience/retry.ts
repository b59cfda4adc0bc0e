/**
 * Retry with Exponential Backoff
 *
 * Retries transient collaborator failures with exponential backoff and
 * jitter. Only errors classified as transient are retried; anything else
 * fails on the first attempt.
 *
 * delay = initialDelay * multiplier^(attempt - 1), capped at maxDelay,
 * then spread by ±jitterFactor.
 */

import type { RetryConfig, RetryAttempt, RetryableErrorType } from './types.js';
import { ALL_RETRYABLE_ERRORS } from './types.js';
import { HTTPError, HTTPNetworkError, HTTPTimeoutError } from '../core/http-client.js';

/**
 * Retry exhausted error (thrown after max attempts or a non-retryable error)
 */
export class RetryExhaustedError extends Error {
  readonly attempts: readonly RetryAttempt[];
  readonly lastError: Error;

  constructor(attempts: readonly RetryAttempt[], lastError: Error) {
    super(`Retry exhausted after ${attempts.length} attempts: ${lastError.message}`);
    this.name = 'RetryExhaustedError';
    this.attempts = attempts;
    this.lastError = lastError;
  }
}

/**
 * Retry timeout error (thrown when total time exceeds timeout)
 */
export class RetryTimeoutError extends Error {
  readonly elapsedMs: number;
  readonly timeoutMs: number;

  constructor(elapsedMs: number, timeoutMs: number) {
    super(`Retry timeout after ${elapsedMs}ms (limit: ${timeoutMs}ms)`);
    this.name = 'RetryTimeoutError';
    this.elapsedMs = elapsedMs;
    this.timeoutMs = timeoutMs;
  }
}

/**
 * Retry executor with exponential backoff
 *
 * @example
 * ```typescript
 * const retry = createRetryExecutor({ maxAttempts: 3 });
 * const candidates = await retry.execute(() => retrieval.retrieveSimilar(request));
 * ```
 */
export class RetryExecutor {
  private readonly config: RetryConfig;
  private readonly sleep: (ms: number) => Promise<void>;

  constructor(config: RetryConfig, sleep?: (ms: number) => Promise<void>) {
    this.config = config;
    this.sleep = sleep ?? ((ms) => new Promise((resolve) => setTimeout(resolve, ms)));
  }

  /**
   * Execute function with retry logic
   *
   * @throws {RetryExhaustedError} when attempts run out or the error is not retryable
   * @throws {RetryTimeoutError} when the total timeout elapses between attempts
   */
  async execute<T>(fn: () => Promise<T>): Promise<T> {
    const attempts: RetryAttempt[] = [];
    const startTime = Date.now();
    let lastError: Error | null = null;

    for (let attempt = 1; attempt <= this.config.maxAttempts; attempt++) {
      const elapsed = Date.now() - startTime;
      if (this.config.timeoutMs && elapsed >= this.config.timeoutMs) {
        throw new RetryTimeoutError(elapsed, this.config.timeoutMs);
      }

      try {
        return await fn();
      } catch (error) {
        lastError = error instanceof Error ? error : new Error(String(error));

        const errorType = classifyError(lastError);
        const retryable = errorType !== null && this.config.retryableErrors.includes(errorType);
        const delay = this.calculateDelay(attempt);

        attempts.push({
          attemptNumber: attempt,
          delayMs: delay,
          totalElapsedMs: Date.now() - startTime,
          error: lastError,
          retryable,
        });

        if (!retryable || attempt === this.config.maxAttempts) {
          throw new RetryExhaustedError(attempts, lastError);
        }

        await this.sleep(delay);
      }
    }

    throw new RetryExhaustedError(attempts, lastError ?? new Error('Unknown error'));
  }

  private calculateDelay(attempt: number): number {
    const exponentialDelay =
      this.config.initialDelayMs * Math.pow(this.config.backoffMultiplier, attempt - 1);
    const cappedDelay = Math.min(exponentialDelay, this.config.maxDelayMs);

    const jitterRange = cappedDelay * this.config.jitterFactor;
    const jitter = Math.random() * 2 * jitterRange - jitterRange;

    return Math.max(0, Math.floor(cappedDelay + jitter));
  }
}

/**
 * Classify an error into a retry type, or null when it is not transient
 */
export function classifyError(error: Error): RetryableErrorType | null {
  if (error instanceof HTTPTimeoutError) {
    return 'network_timeout';
  }
  if (error instanceof HTTPNetworkError) {
    return 'network_error';
  }
  if (error instanceof HTTPError) {
    switch (error.statusCode) {
      case 408:
        return 'network_timeout';
      case 429:
        return 'rate_limit';
      case 502:
      case 503:
        return 'service_unavailable';
      case 504:
        return 'gateway_timeout';
      default:
        return null;
    }
  }

  const message = error.message.toLowerCase();

  if (message.includes('timeout') || message.includes('etimedout') || error.name === 'TimeoutError') {
    return 'network_timeout';
  }

  if (
    message.includes('econnrefused') ||
    message.includes('econnreset') ||
    message.includes('enetunreach') ||
    error.name === 'NetworkError'
  ) {
    return 'network_error';
  }

  if (message.includes('rate limit')) {
    return 'rate_limit';
  }

  if (message.includes('service unavailable')) {
    return 'service_unavailable';
  }

  if (message.includes('temporary') || message.includes('temporarily')) {
    return 'temporary_failure';
  }

  return null;
}

/**
 * Unwrap RetryExhaustedError to the error that actually happened
 */
export function rootError(error: unknown): Error {
  if (error instanceof RetryExhaustedError) {
    return error.lastError;
  }
  return error instanceof Error ? error : new Error(String(error));
}

/**
 * Create retry executor with engine defaults
 */
export function createRetryExecutor(
  overrides?: Partial<RetryConfig>,
  sleep?: (ms: number) => Promise<void>
): RetryExecutor {
  const config: RetryConfig = {
    maxAttempts: 3,
    initialDelayMs: 100,
    maxDelayMs: 5000,
    backoffMultiplier: 2,
    jitterFactor: 0.1,
    retryableErrors: ALL_RETRYABLE_ERRORS,
    ...overrides,
  };

  return new RetryExecutor(config, sleep);
}
