import { describe, it, expect } from 'vitest';
import {
  CollaboratorUnavailableError,
  InvalidConfigError,
  NotFoundError,
  PerPairVerificationFailure,
  ProvenanceError,
  describeError,
} from '../../../core/errors.js';

describe('error types', () => {
  it('carry stable codes', () => {
    expect(new NotFoundError('job', 'job-1').code).toBe('NOT_FOUND');
    expect(new InvalidConfigError([]).code).toBe('INVALID_CONFIG');
    expect(new CollaboratorUnavailableError('retrieval', 5, 'down').code).toBe(
      'COLLABORATOR_UNAVAILABLE'
    );
  });

  it('are ProvenanceErrors and Errors', () => {
    const error = new PerPairVerificationFailure('a', 'b', 'timeout');

    expect(error).toBeInstanceOf(ProvenanceError);
    expect(error).toBeInstanceOf(Error);
    expect(error.name).toBe('PerPairVerificationFailure');
    expect(error.message).toBe('Verification of a <-> b failed: timeout');
  });

  it('name the missing resource', () => {
    expect(new NotFoundError('image', 'img-9').message).toBe('Image img-9 not found');
    expect(new NotFoundError('job', 'job-9').message).toBe('Job job-9 not found');
  });

  it('format config issues', () => {
    expect(new InvalidConfigError([]).message).toBe('Invalid analysis configuration: unknown problem');
    expect(new InvalidConfigError([{ path: '', message: 'bad' }]).message).toBe(
      'Invalid analysis configuration: bad'
    );
  });
});

describe('describeError', () => {
  it('follows cause chains', () => {
    const error = new Error('outer', { cause: new Error('inner') });

    expect(describeError(error)).toBe('outer (caused by: inner)');
  });

  it('stringifies non-errors', () => {
    expect(describeError(42)).toBe('42');
  });
});
