/**
 * Analysis Orchestrator Type Definitions
 */

import type {
  AnalysisResult,
  ImageId,
  ProgressCounters,
} from '../core/types.js';
import type { AnalysisConfig } from '../validation/analysis-config.js';
import type { HealthStatus } from '../collaborators/types.js';
import { InvariantViolationError } from '../core/errors.js';

// ============================================================================
// Job Lifecycle
// ============================================================================

/**
 * Job status lifecycle
 */
export type JobStatus =
  | 'pending'     // Submitted, waiting for a worker
  | 'processing'  // Traversal running
  | 'completed'   // Result stored
  | 'failed'      // Systemic failure, reason stored
  | 'cancelled';  // Cancelled by the owner, progress kept

export const TERMINAL_STATUSES: ReadonlySet<JobStatus> = new Set<JobStatus>([
  'completed',
  'failed',
  'cancelled',
]);

const TRANSITIONS: Readonly<Record<JobStatus, readonly JobStatus[]>> = {
  pending: ['processing', 'cancelled'],
  processing: ['completed', 'failed', 'cancelled'],
  completed: [],
  failed: [],
  cancelled: [],
};

export function isTerminal(status: JobStatus): boolean {
  return TERMINAL_STATUSES.has(status);
}

/**
 * @throws {InvariantViolationError} when `from → to` is not a legal transition
 */
export function assertTransition(jobId: string, from: JobStatus, to: JobStatus): void {
  if (!TRANSITIONS[from].includes(to)) {
    throw new InvariantViolationError(`Illegal transition for job ${jobId}: ${from} -> ${to}`);
  }
}

// ============================================================================
// Job Records
// ============================================================================

/**
 * Stored analysis job
 */
export interface AnalysisJob {
  readonly jobId: string;
  readonly owner: string;
  readonly seeds: readonly ImageId[];
  readonly config: AnalysisConfig;
  readonly status: JobStatus;
  readonly progress: ProgressCounters;
  /** Present only for completed jobs */
  readonly result: AnalysisResult | null;
  /** Failure reason, verbatim */
  readonly error: string | null;
  readonly createdAt: Date;
  readonly updatedAt: Date;
  readonly startedAt: Date | null;
  readonly completedAt: Date | null;
  /** When retention archives the job */
  readonly expiresAt: Date | null;
}

/**
 * Fields a state change may set
 */
export interface JobUpdate {
  readonly status?: JobStatus;
  readonly progress?: ProgressCounters;
  readonly result?: AnalysisResult | null;
  readonly error?: string | null;
  readonly startedAt?: Date | null;
  readonly completedAt?: Date | null;
  readonly expiresAt?: Date | null;
  readonly updatedAt: Date;
}

export interface JobQuery {
  /** Restrict to one owner; undefined lists every owner */
  readonly owner?: string;
  readonly status?: JobStatus;
  readonly limit?: number;
}

/**
 * What callers see from getStatus
 */
export interface JobStatusView {
  readonly jobId: string;
  readonly owner: string;
  readonly status: JobStatus;
  readonly progress: ProgressCounters;
  readonly result: AnalysisResult | null;
  readonly error: string | null;
  readonly createdAt: Date;
  readonly startedAt: Date | null;
  readonly completedAt: Date | null;
  readonly expiresAt: Date | null;
}

/**
 * Job summary for listing
 */
export interface JobSummary {
  readonly jobId: string;
  readonly owner: string;
  readonly status: JobStatus;
  readonly seeds: readonly ImageId[];
  readonly progress: ProgressCounters;
  readonly createdAt: Date;
  readonly durationMs?: number;
}

export interface ListJobsOptions {
  readonly status?: JobStatus;
  /** Default: 20 */
  readonly limit?: number;
}

export interface OrchestratorHealth {
  readonly healthy: boolean;
  readonly collaborators: Readonly<Record<string, HealthStatus>>;
  readonly runningJobs: number;
  readonly queuedJobs: number;
}

export interface RecoverySummary {
  /** Pending jobs put back in the queue */
  readonly requeued: number;
  /** Jobs left processing by a previous process, marked failed */
  readonly interrupted: number;
}
