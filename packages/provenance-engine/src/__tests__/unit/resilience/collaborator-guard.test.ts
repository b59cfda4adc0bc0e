import { describe, it, expect, vi } from 'vitest';
import {
  countsAgainstCollaborator,
  createCollaboratorGuard,
} from '../../../resilience/collaborator-guard.js';
import { CollaboratorUnavailableError, DescriptorComputationError } from '../../../core/errors.js';
import { HTTPError } from '../../../core/http-client.js';

const settings = {
  maxConsecutiveFailures: 2,
  retryAttempts: 3,
  retryInitialDelayMs: 10,
  retryMaxDelayMs: 100,
};

const httpError = (status: number) =>
  new HTTPError(`HTTP ${status}: nope`, status, 'http://svc.test/verify', 'nope');

describe('CollaboratorGuard', () => {
  it('passes results through', async () => {
    const guard = createCollaboratorGuard('retrieval', settings, async () => undefined);

    await expect(guard.call(async () => ['img2'])).resolves.toEqual(['img2']);
    expect(guard.isUnavailable).toBe(false);
  });

  it('rethrows the underlying error, not the retry envelope', async () => {
    const guard = createCollaboratorGuard('retrieval', settings, async () => undefined);

    await expect(guard.call(() => Promise.reject(new Error('bad request')))).rejects.toThrow(
      /^bad request$/
    );
  });

  it('retries transient errors without counting them itself', async () => {
    const sleep = vi.fn(async () => undefined);
    const guard = createCollaboratorGuard('verification', settings, sleep);
    const fn = vi.fn(() => Promise.reject(new Error('ECONNRESET')));

    await expect(guard.call(fn)).rejects.toThrow('ECONNRESET');
    await expect(guard.call(fn)).rejects.toThrow('ECONNRESET');

    expect(fn).toHaveBeenCalledTimes(6);
    expect(sleep).toHaveBeenCalledTimes(4);
    expect(guard.isUnavailable).toBe(false);
  });

  it('becomes unavailable after consecutive recorded failures', () => {
    const guard = createCollaboratorGuard('verification', settings, async () => undefined);

    expect(guard.recordFailure(new Error('first'))).toBe(true);
    expect(guard.isUnavailable).toBe(false);
    guard.recordFailure(new Error('second'));

    expect(guard.isUnavailable).toBe(true);
    const error = guard.unavailableError();
    expect(error).toBeInstanceOf(CollaboratorUnavailableError);
    expect(error.message).toBe('verification unavailable after 2 consecutive failures: second');
  });

  it('resets the count on success', () => {
    const guard = createCollaboratorGuard('retrieval', settings, async () => undefined);

    guard.recordFailure(new Error('first'));
    guard.recordSuccess();
    guard.recordFailure(new Error('second'));

    expect(guard.isUnavailable).toBe(false);
  });

  it('ignores client errors', () => {
    const guard = createCollaboratorGuard('verification', settings, async () => undefined);

    expect(guard.recordFailure(httpError(404))).toBe(false);
    expect(guard.recordFailure(httpError(422))).toBe(false);

    expect(guard.isUnavailable).toBe(false);
  });
});

describe('countsAgainstCollaborator', () => {
  it('counts server, throttling and unclassified errors', () => {
    expect(countsAgainstCollaborator(httpError(500))).toBe(true);
    expect(countsAgainstCollaborator(httpError(503))).toBe(true);
    expect(countsAgainstCollaborator(httpError(429))).toBe(true);
    expect(countsAgainstCollaborator(httpError(408))).toBe(true);
    expect(countsAgainstCollaborator(new Error('service down'))).toBe(true);
  });

  it('looks through descriptor failures to what the computer threw', () => {
    expect(
      countsAgainstCollaborator(new DescriptorComputationError('A', 'HTTP 400: nope', httpError(400)))
    ).toBe(false);
    expect(
      countsAgainstCollaborator(new DescriptorComputationError('A', 'offline', new Error('offline')))
    ).toBe(true);
  });
});
