/**
 * Resilience Types
 *
 * Configuration and statistics for retry and circuit breaking around the
 * external collaborators (retrieval, verification, descriptor computation).
 */

// ============================================================================
// Retry
// ============================================================================

export type RetryableErrorType =
  | 'network_timeout'
  | 'network_error'
  | 'rate_limit'
  | 'service_unavailable'
  | 'gateway_timeout'
  | 'temporary_failure';

export const ALL_RETRYABLE_ERRORS: readonly RetryableErrorType[] = [
  'network_timeout',
  'network_error',
  'rate_limit',
  'service_unavailable',
  'gateway_timeout',
  'temporary_failure',
];

export interface RetryConfig {
  readonly maxAttempts: number;
  readonly initialDelayMs: number;
  readonly maxDelayMs: number;
  readonly backoffMultiplier: number;
  /** 0-1; spread applied around each delay */
  readonly jitterFactor: number;
  readonly retryableErrors: readonly RetryableErrorType[];
  /** Total time allowed across attempts */
  readonly timeoutMs?: number;
}

export interface RetryAttempt {
  readonly attemptNumber: number;
  readonly delayMs: number;
  readonly totalElapsedMs: number;
  readonly error: Error;
  readonly retryable: boolean;
}

// ============================================================================
// Circuit Breaker
// ============================================================================

export type CircuitState = 'closed' | 'open';

export interface CircuitBreakerConfig {
  readonly name: string;
  /** Consecutive failures that open the circuit */
  readonly failureThreshold: number;
}

export interface CircuitBreakerStats {
  readonly state: CircuitState;
  readonly failureCount: number;
  readonly successCount: number;
  readonly consecutiveFailures: number;
  readonly lastError: string | null;
}
