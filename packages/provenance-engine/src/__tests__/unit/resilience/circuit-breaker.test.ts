import { describe, it, expect } from 'vitest';
import { createCircuitBreaker } from '../../../resilience/circuit-breaker.js';

describe('CircuitBreaker', () => {
  it('opens after the threshold of consecutive failures', () => {
    const breaker = createCircuitBreaker('verification', 3);

    breaker.recordFailure('one');
    breaker.recordFailure('two');
    expect(breaker.isOpen()).toBe(false);

    breaker.recordFailure('three');
    expect(breaker.isOpen()).toBe(true);
    expect(breaker.getStats()).toEqual({
      state: 'open',
      failureCount: 3,
      successCount: 0,
      consecutiveFailures: 3,
      lastError: 'three',
    });
  });

  it('resets the consecutive count on success', () => {
    const breaker = createCircuitBreaker('retrieval', 2);

    breaker.recordFailure('one');
    breaker.recordSuccess();
    breaker.recordFailure('two');

    expect(breaker.isOpen()).toBe(false);
    expect(breaker.getStats()).toMatchObject({ failureCount: 2, successCount: 1, consecutiveFailures: 1 });
  });

  it('stays open and keeps the stats it opened with', () => {
    const breaker = createCircuitBreaker('descriptors', 1);

    breaker.recordFailure('gone');
    breaker.recordSuccess();
    breaker.recordFailure('later');

    expect(breaker.isOpen()).toBe(true);
    expect(breaker.getStats()).toMatchObject({ consecutiveFailures: 1, lastError: 'gone' });
  });

  it('defaults to five failures', () => {
    const breaker = createCircuitBreaker('retrieval');

    for (let i = 0; i < 4; i++) breaker.recordFailure(`f${i}`);
    expect(breaker.isOpen()).toBe(false);
    breaker.recordFailure('f4');
    expect(breaker.isOpen()).toBe(true);
  });
});
