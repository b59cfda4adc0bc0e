/**
 * Job State Store
 *
 * Storage seam for analysis jobs. The orchestrator owns every state change;
 * stores only persist what they are given. Archived jobs are invisible to
 * every read.
 */

import { randomBytes } from 'node:crypto';
import type {
  AnalysisJob,
  JobQuery,
  JobUpdate,
} from './analysis-orchestrator.types.js';
import { NotFoundError } from '../core/errors.js';

export interface JobStore {
  create(job: AnalysisJob): Promise<void>;
  get(jobId: string): Promise<AnalysisJob | null>;
  /**
   * @throws {NotFoundError} when the job does not exist or is archived
   */
  update(jobId: string, update: JobUpdate): Promise<AnalysisJob>;
  /** Newest first */
  list(query: JobQuery): Promise<readonly AnalysisJob[]>;
  /**
   * @returns false when the job was already archived or never existed
   */
  archive(jobId: string, archivedAt: Date): Promise<boolean>;
  /** Jobs whose expiresAt is at or before `now` */
  findExpired(now: Date): Promise<readonly string[]>;
  /** Non-archived jobs in one of the given statuses, oldest first */
  findByStatus(statuses: readonly AnalysisJob['status'][]): Promise<readonly AnalysisJob[]>;
}

/**
 * Generate unique job ID
 */
export function generateJobId(): string {
  const timestamp = Date.now().toString(36);
  const random = randomBytes(4).toString('hex');
  return `job-${timestamp}-${random}`;
}

/**
 * Apply an update to a job record
 */
export function applyJobUpdate(job: AnalysisJob, update: JobUpdate): AnalysisJob {
  return {
    ...job,
    ...(update.status !== undefined && { status: update.status }),
    ...(update.progress !== undefined && { progress: update.progress }),
    ...(update.result !== undefined && { result: update.result }),
    ...(update.error !== undefined && { error: update.error }),
    ...(update.startedAt !== undefined && { startedAt: update.startedAt }),
    ...(update.completedAt !== undefined && { completedAt: update.completedAt }),
    ...(update.expiresAt !== undefined && { expiresAt: update.expiresAt }),
    updatedAt: update.updatedAt,
  };
}

/**
 * Process-local job store
 */
export class InMemoryJobStore implements JobStore {
  private readonly jobs = new Map<string, { job: AnalysisJob; archivedAt: Date | null }>();

  async create(job: AnalysisJob): Promise<void> {
    this.jobs.set(job.jobId, { job, archivedAt: null });
  }

  async get(jobId: string): Promise<AnalysisJob | null> {
    const entry = this.jobs.get(jobId);
    return entry && entry.archivedAt === null ? entry.job : null;
  }

  async update(jobId: string, update: JobUpdate): Promise<AnalysisJob> {
    const entry = this.jobs.get(jobId);
    if (!entry || entry.archivedAt !== null) {
      throw new NotFoundError('job', jobId);
    }
    const job = applyJobUpdate(entry.job, update);
    this.jobs.set(jobId, { job, archivedAt: null });
    return job;
  }

  async list(query: JobQuery): Promise<readonly AnalysisJob[]> {
    const jobs = [...this.jobs.values()]
      .filter((entry) => entry.archivedAt === null)
      .map((entry) => entry.job)
      .filter((job) => query.owner === undefined || job.owner === query.owner)
      .filter((job) => query.status === undefined || job.status === query.status)
      // Latest insert first among equal timestamps
      .reverse()
      .sort((a, b) => b.createdAt.getTime() - a.createdAt.getTime());

    return query.limit !== undefined ? jobs.slice(0, query.limit) : jobs;
  }

  async archive(jobId: string, archivedAt: Date): Promise<boolean> {
    const entry = this.jobs.get(jobId);
    if (!entry || entry.archivedAt !== null) {
      return false;
    }
    this.jobs.set(jobId, { job: entry.job, archivedAt });
    return true;
  }

  async findExpired(now: Date): Promise<readonly string[]> {
    const expired: string[] = [];
    for (const { job, archivedAt } of this.jobs.values()) {
      if (archivedAt === null && job.expiresAt !== null && job.expiresAt.getTime() <= now.getTime()) {
        expired.push(job.jobId);
      }
    }
    return expired;
  }

  async findByStatus(statuses: readonly AnalysisJob['status'][]): Promise<readonly AnalysisJob[]> {
    return [...this.jobs.values()]
      .filter((entry) => entry.archivedAt === null && statuses.includes(entry.job.status))
      .map((entry) => entry.job)
      .sort((a, b) => a.createdAt.getTime() - b.createdAt.getTime());
  }
}
