/**
 * Collaborator Guard
 *
 * Retry plus a consecutive-failure breaker, for one collaborator within one
 * run. `call` only retries; the caller reports each settled outcome with
 * `recordSuccess` / `recordFailure`, in the order it applies them.
 *
 * Client errors (HTTP 4xx other than 408/429) describe the request, not the
 * service, and never count toward the breaker.
 */

import {
  CollaboratorUnavailableError,
  DescriptorComputationError,
  describeError,
} from '../core/errors.js';
import { HTTPError } from '../core/http-client.js';
import { CircuitBreaker, createCircuitBreaker } from './circuit-breaker.js';
import { RetryExecutor, classifyError, createRetryExecutor, rootError } from './retry.js';

export interface CollaboratorGuardConfig {
  readonly maxConsecutiveFailures: number;
  readonly retryAttempts: number;
  readonly retryInitialDelayMs: number;
  readonly retryMaxDelayMs: number;
}

export class CollaboratorGuard {
  readonly name: string;
  private readonly breaker: CircuitBreaker;
  private readonly retry: RetryExecutor;

  constructor(name: string, breaker: CircuitBreaker, retry: RetryExecutor) {
    this.name = name;
    this.breaker = breaker;
    this.retry = retry;
  }

  /**
   * Run `fn` with retry
   *
   * @throws the underlying error (unwrapped from the retry envelope)
   */
  async call<T>(fn: () => Promise<T>): Promise<T> {
    try {
      return await this.retry.execute(fn);
    } catch (error) {
      throw rootError(error);
    }
  }

  recordSuccess(): void {
    this.breaker.recordSuccess();
  }

  /**
   * Count a failure against the collaborator
   *
   * @returns false when the error is about the request and was not counted
   */
  recordFailure(error: unknown): boolean {
    if (!countsAgainstCollaborator(error)) {
      return false;
    }
    this.breaker.recordFailure(describeError(error));
    return true;
  }

  get isUnavailable(): boolean {
    return this.breaker.isOpen();
  }

  unavailableError(): CollaboratorUnavailableError {
    const stats = this.breaker.getStats();
    return new CollaboratorUnavailableError(
      this.name,
      stats.consecutiveFailures,
      stats.lastError ?? 'unknown error'
    );
  }
}

/**
 * Whether an error says the collaborator itself is failing
 *
 * Transient errors and anything unclassified count; a client error is a
 * statement about one request and does not.
 */
export function countsAgainstCollaborator(error: unknown): boolean {
  const cause = error instanceof DescriptorComputationError ? error.underlying : error;
  if (!(cause instanceof HTTPError)) {
    return true;
  }
  if (classifyError(cause) !== null) {
    return true;
  }
  return cause.statusCode < 400 || cause.statusCode >= 500;
}

/**
 * Guard whose breaker opens after `maxConsecutiveFailures` failures in a row
 */
export function createCollaboratorGuard(
  name: string,
  config: CollaboratorGuardConfig,
  sleep?: (ms: number) => Promise<void>
): CollaboratorGuard {
  const breaker = createCircuitBreaker(name, config.maxConsecutiveFailures);
  const retry = createRetryExecutor(
    {
      maxAttempts: Math.max(1, config.retryAttempts),
      initialDelayMs: config.retryInitialDelayMs,
      maxDelayMs: config.retryMaxDelayMs,
    },
    sleep
  );
  return new CollaboratorGuard(name, breaker, retry);
}
