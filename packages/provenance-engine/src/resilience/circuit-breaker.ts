/**
 * Circuit Breaker
 *
 * Consecutive-failure breaker for one collaborator within one run:
 * closed → open after `failureThreshold` failures in a row. A success resets
 * the count. There is no way back from open; an open breaker ends the run.
 *
 * Callers report outcomes explicitly, in the order they want them to count.
 * The traversal reports pair outcomes in candidate order, so a parallel
 * expansion counts exactly like a sequential one.
 */

import type { CircuitState, CircuitBreakerStats, CircuitBreakerConfig } from './types.js';
import { logger } from '../core/utils/logger.js';

export class CircuitBreaker {
  private readonly config: CircuitBreakerConfig;
  private state: CircuitState = 'closed';
  private failureCount = 0;
  private successCount = 0;
  private consecutiveFailures = 0;
  private lastError: string | null = null;

  constructor(config: CircuitBreakerConfig) {
    this.config = config;
  }

  get name(): string {
    return this.config.name;
  }

  recordSuccess(): void {
    if (this.state === 'open') return;
    this.successCount++;
    this.consecutiveFailures = 0;
  }

  recordFailure(reason: string): void {
    if (this.state === 'open') return;
    this.failureCount++;
    this.consecutiveFailures++;
    this.lastError = reason;

    if (this.consecutiveFailures >= this.config.failureThreshold) {
      this.state = 'open';
      logger.warn('Circuit opened', {
        component: this.config.name,
        consecutiveFailures: this.consecutiveFailures,
        lastError: reason,
      });
    }
  }

  isOpen(): boolean {
    return this.state === 'open';
  }

  getStats(): CircuitBreakerStats {
    return {
      state: this.state,
      failureCount: this.failureCount,
      successCount: this.successCount,
      consecutiveFailures: this.consecutiveFailures,
      lastError: this.lastError,
    };
  }
}

export function createCircuitBreaker(name: string, failureThreshold = 5): CircuitBreaker {
  return new CircuitBreaker({ name, failureThreshold });
}
