/**
 * Provenance Engine Error Types
 *
 * Every error the core surfaces to callers derives from ProvenanceError and
 * carries a stable `code`, so the request layer can map errors to responses
 * without string matching.
 *
 * RECOVERY:
 * - InvalidConfig / Forbidden / NotFound: caller error, nothing to retry
 * - CollaboratorUnavailable: check the external service, resubmit later
 * - PerPairVerificationFailure: recorded on the job, never fatal
 */

import type { ImageId } from './types.js';

export type ProvenanceErrorCode =
  | 'INVALID_CONFIG'
  | 'FORBIDDEN'
  | 'NOT_FOUND'
  | 'COLLABORATOR_UNAVAILABLE'
  | 'PAIR_VERIFICATION_FAILED'
  | 'DESCRIPTOR_FAILED'
  | 'CANCELLED'
  | 'JOB_CONFLICT'
  | 'INVARIANT_VIOLATION';

/**
 * Base class for all engine errors
 */
export class ProvenanceError extends Error {
  readonly code: ProvenanceErrorCode;

  constructor(code: ProvenanceErrorCode, message: string) {
    super(message);
    this.name = 'ProvenanceError';
    this.code = code;

    // Maintain proper stack trace for where error was thrown (V8 only)
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, new.target);
    }
  }
}

/**
 * Single validation problem in a submitted configuration
 */
export interface ConfigIssue {
  readonly path: string;
  readonly message: string;
}

/**
 * Rejected before any work starts: bad caps, bad parameters, empty seeds
 */
export class InvalidConfigError extends ProvenanceError {
  readonly issues: readonly ConfigIssue[];

  constructor(issues: readonly ConfigIssue[]) {
    super('INVALID_CONFIG', `Invalid analysis configuration: ${formatIssues(issues)}`);
    this.name = 'InvalidConfigError';
    this.issues = issues;
  }
}

export class ForbiddenError extends ProvenanceError {
  constructor(message: string) {
    super('FORBIDDEN', message);
    this.name = 'ForbiddenError';
  }
}

export class NotFoundError extends ProvenanceError {
  readonly resource: 'job' | 'image';
  readonly id: string;

  constructor(resource: 'job' | 'image', id: string) {
    super('NOT_FOUND', `${resource === 'job' ? 'Job' : 'Image'} ${id} not found`);
    this.name = 'NotFoundError';
    this.resource = resource;
    this.id = id;
  }
}

/**
 * A collaborator failed systemically. Escalates the job to `failed`.
 */
export class CollaboratorUnavailableError extends ProvenanceError {
  readonly collaborator: string;
  readonly consecutiveFailures: number;
  readonly lastError: string;

  constructor(collaborator: string, consecutiveFailures: number, lastError: string) {
    super(
      'COLLABORATOR_UNAVAILABLE',
      `${collaborator} unavailable after ${consecutiveFailures} consecutive failures: ${lastError}`
    );
    this.name = 'CollaboratorUnavailableError';
    this.collaborator = collaborator;
    this.consecutiveFailures = consecutiveFailures;
    this.lastError = lastError;
  }
}

/**
 * Isolated failure for one pair. Recorded and skipped by the traversal.
 */
export class PerPairVerificationFailure extends ProvenanceError {
  readonly imageA: ImageId;
  readonly imageB: ImageId;

  constructor(imageA: ImageId, imageB: ImageId, reason: string) {
    super('PAIR_VERIFICATION_FAILED', `Verification of ${imageA} <-> ${imageB} failed: ${reason}`);
    this.name = 'PerPairVerificationFailure';
    this.imageA = imageA;
    this.imageB = imageB;
  }
}

/**
 * Descriptor computation failed for one image
 */
export class DescriptorComputationError extends ProvenanceError {
  readonly imageId: ImageId;
  readonly reason: string;
  /** What the descriptor computer threw */
  readonly underlying: unknown;

  constructor(imageId: ImageId, reason: string, underlying?: unknown) {
    super('DESCRIPTOR_FAILED', `Descriptor computation for ${imageId} failed: ${reason}`);
    this.name = 'DescriptorComputationError';
    this.imageId = imageId;
    this.reason = reason;
    this.underlying = underlying;
  }
}

export class CancelledError extends ProvenanceError {
  constructor(message = 'Analysis cancelled') {
    super('CANCELLED', message);
    this.name = 'CancelledError';
  }
}

export class JobConflictError extends ProvenanceError {
  constructor(message: string) {
    super('JOB_CONFLICT', message);
    this.name = 'JobConflictError';
  }
}

/**
 * Internal invariant broken (illegal state transition, corrupt record)
 */
export class InvariantViolationError extends ProvenanceError {
  constructor(message: string) {
    super('INVARIANT_VIOLATION', message);
    this.name = 'InvariantViolationError';
  }
}

/**
 * Normalize an unknown thrown value into a message, keeping cause chains
 */
export function describeError(error: unknown): string {
  if (error instanceof Error) {
    const cause: unknown = error.cause;
    if (cause !== undefined && cause !== error) {
      return `${error.message} (caused by: ${describeError(cause)})`;
    }
    return error.message;
  }
  return String(error);
}

function formatIssues(issues: readonly ConfigIssue[]): string {
  if (issues.length === 0) {
    return 'unknown problem';
  }
  return issues
    .map((issue) => (issue.path ? `${issue.path}: ${issue.message}` : issue.message))
    .join('; ');
}
