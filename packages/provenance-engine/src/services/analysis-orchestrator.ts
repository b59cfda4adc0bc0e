/**
 * Analysis Orchestrator
 *
 * Owns the lifecycle of provenance analysis jobs:
 * - Submission and validation of the closed configuration
 * - A bounded worker pool with FIFO pickup
 * - Cooperative cancellation (observed at traversal iteration boundaries)
 * - Live progress snapshots while a job is processing
 * - Result storage, retention and archival
 *
 * STATE MACHINE:
 *   pending → processing → completed | failed | cancelled
 *   pending → cancelled
 * Terminal states are final. Cancelled jobs keep their progress counters
 * but never a result.
 *
 * VISIBILITY: a job is visible to its owner and to admins. Anything else is
 * reported as not found.
 */

import type { AnalysisResult, ImageId, Principal, ProgressCounters, SearchScope } from '../core/types.js';
import { EMPTY_PROGRESS } from '../core/types.js';
import type { CollaboratorSet, HealthStatus } from '../collaborators/types.js';
import type { DescriptorCache } from '../cache/descriptor-cache.js';
import { DEFAULT_CONFIG, type EngineConfig } from '../core/config.js';
import {
  ForbiddenError,
  InvalidConfigError,
  JobConflictError,
  NotFoundError,
  describeError,
} from '../core/errors.js';
import { createLogger, type Logger } from '../core/utils/logger.js';
import { summarize } from '../graph/graph-summarizer.js';
import { TraversalEngine } from '../traversal/traversal-engine.js';
import type { TraversalOutcome } from '../traversal/types.js';
import {
  parseAnalysisConfig,
  parseSeeds,
  type AnalysisConfig,
  type AnalysisConfigInput,
} from '../validation/analysis-config.js';
import {
  assertTransition,
  isTerminal,
  type AnalysisJob,
  type JobStatusView,
  type JobSummary,
  type ListJobsOptions,
  type OrchestratorHealth,
  type RecoverySummary,
} from './analysis-orchestrator.types.js';
import { InMemoryJobStore, generateJobId, type JobStore } from './job-state-store.js';

const DAY_MS = 24 * 60 * 60 * 1000;

export interface OrchestratorDependencies {
  readonly collaborators: CollaboratorSet;
  readonly descriptorCache: DescriptorCache;
  readonly jobStore?: JobStore;
  readonly config?: EngineConfig;
  readonly logger?: Logger;
  /** Wall clock for job timestamps */
  readonly now?: () => Date;
  /** Backoff sleep passed to collaborator retries */
  readonly sleep?: (ms: number) => Promise<void>;
  readonly generateId?: () => string;
}

/**
 * A job that a worker has taken
 */
interface RunningJob {
  readonly controller: AbortController;
  progress: ProgressCounters;
  iterations: number;
  /** Serialized progress writes */
  flush: Promise<void>;
  done: Promise<void>;
}

type Waiter = (view: JobStatusView) => void;

export class AnalysisOrchestrator {
  private readonly collaborators: CollaboratorSet;
  private readonly descriptorCache: DescriptorCache;
  private readonly store: JobStore;
  private readonly config: EngineConfig;
  private readonly log: Logger;
  private readonly now: () => Date;
  private readonly generateId: () => string;
  private readonly engine: TraversalEngine;

  private readonly queue: string[] = [];
  private readonly running = new Map<string, RunningJob>();
  private readonly waiters = new Map<string, Waiter[]>();
  /** Failed views whose terminal write did not reach the store */
  private readonly unrecorded = new Map<string, JobStatusView>();
  private accepting = true;

  constructor(deps: OrchestratorDependencies) {
    this.collaborators = deps.collaborators;
    this.descriptorCache = deps.descriptorCache;
    this.store = deps.jobStore ?? new InMemoryJobStore();
    this.config = deps.config ?? DEFAULT_CONFIG;
    this.log = deps.logger ?? createLogger({ module: 'orchestrator' });
    this.now = deps.now ?? (() => new Date());
    this.generateId = deps.generateId ?? generateJobId;
    this.engine = new TraversalEngine(
      {
        collaborators: deps.collaborators,
        descriptorCache: deps.descriptorCache,
        logger: this.log.child({ module: 'traversal' }),
        ...(deps.sleep !== undefined && { sleep: deps.sleep }),
      },
      this.config.resilience
    );
  }

  // ==========================================================================
  // Submission
  // ==========================================================================

  /**
   * Validate and queue a new analysis
   *
   * @throws {InvalidConfigError} bad seeds or configuration
   * @throws {ForbiddenError} global scope requested by a non-admin
   * @throws {NotFoundError} a seed is unknown or not visible to the caller
   */
  async submit(
    seeds: readonly ImageId[],
    configInput: AnalysisConfigInput,
    principal: Principal,
    scope?: SearchScope
  ): Promise<string> {
    if (!this.accepting) {
      throw new JobConflictError('Orchestrator is shutting down');
    }

    const config = parseAnalysisConfig(
      scope !== undefined ? { ...configInput, searchScope: scope } : configInput
    );
    const uniqueSeeds = parseSeeds(seeds, config);

    if (config.searchScope === 'global' && !principal.isAdmin) {
      throw new ForbiddenError('Global search scope requires admin privileges');
    }
    if (config.sameLabelOnly && !this.collaborators.catalog) {
      throw new InvalidConfigError([
        { path: 'sameLabelOnly', message: 'requires an image catalog' },
      ]);
    }
    await this.assertSeedsVisible(uniqueSeeds, config, principal);

    const now = this.now();
    const job: AnalysisJob = {
      jobId: this.generateId(),
      owner: principal.id,
      seeds: uniqueSeeds,
      config,
      status: 'pending',
      progress: EMPTY_PROGRESS,
      result: null,
      error: null,
      createdAt: now,
      updatedAt: now,
      startedAt: null,
      completedAt: null,
      expiresAt: null,
    };
    await this.store.create(job);

    this.log.info('Analysis submitted', {
      jobId: job.jobId,
      owner: job.owner,
      seeds: uniqueSeeds.length,
      scope: config.searchScope,
    });

    this.queue.push(job.jobId);
    this.pump();
    return job.jobId;
  }

  private async assertSeedsVisible(
    seeds: readonly ImageId[],
    config: AnalysisConfig,
    principal: Principal
  ): Promise<void> {
    const catalog = this.collaborators.catalog;
    if (!catalog) return;

    for (const seed of seeds) {
      const metadata = await catalog.describe(seed);
      if (!metadata) {
        throw new NotFoundError('image', seed);
      }
      const ownerOnly = config.searchScope === 'owner' || !principal.isAdmin;
      if (ownerOnly && metadata.owner !== principal.id) {
        throw new NotFoundError('image', seed);
      }
    }
  }

  // ==========================================================================
  // Queries
  // ==========================================================================

  /**
   * Current status; live progress while processing
   *
   * @throws {NotFoundError} unknown job, or not visible to the caller
   */
  async getStatus(jobId: string, principal: Principal): Promise<JobStatusView> {
    const job = await this.visibleJob(jobId, principal);
    return this.unrecorded.get(jobId) ?? this.toView(job);
  }

  async listJobs(
    principal: Principal,
    options: ListJobsOptions = {}
  ): Promise<readonly JobSummary[]> {
    const jobs = await this.store.list({
      ...(!principal.isAdmin && { owner: principal.id }),
      ...(options.status !== undefined && { status: options.status }),
      limit: options.limit ?? 20,
    });

    return jobs.map((job) => {
      const durationMs =
        job.startedAt !== null && job.completedAt !== null
          ? job.completedAt.getTime() - job.startedAt.getTime()
          : undefined;
      return {
        jobId: job.jobId,
        owner: job.owner,
        status: job.status,
        seeds: job.seeds,
        progress: this.running.get(job.jobId)?.progress ?? job.progress,
        createdAt: job.createdAt,
        ...(durationMs !== undefined && { durationMs }),
      };
    });
  }

  /**
   * Resolve once the job reaches a terminal state
   */
  async waitForJob(jobId: string): Promise<JobStatusView> {
    const failed = this.unrecorded.get(jobId);
    if (failed) {
      return failed;
    }
    const job = await this.store.get(jobId);
    if (!job) {
      throw new NotFoundError('job', jobId);
    }
    if (isTerminal(job.status)) {
      return this.toView(job);
    }
    return new Promise<JobStatusView>((resolve, reject) => {
      const list = this.waiters.get(jobId) ?? [];
      list.push(resolve);
      this.waiters.set(jobId, list);

      // The job may have finished between the read above and registration
      this.store.get(jobId).then((latest) => {
        if (latest && isTerminal(latest.status)) {
          this.notifyWaiters(jobId, this.toView(latest));
        }
      }, reject);
    });
  }

  // ==========================================================================
  // Cancellation & Deletion
  // ==========================================================================

  /**
   * Request cancellation
   *
   * Terminal jobs are left as they are. Pending jobs are cancelled at once;
   * processing jobs when the traversal reaches its next iteration boundary.
   */
  async cancel(jobId: string, principal: Principal): Promise<JobStatusView> {
    const job = await this.visibleJob(jobId, principal);
    if (isTerminal(job.status)) {
      return this.toView(job);
    }

    const running = this.running.get(jobId);
    if (running) {
      running.controller.abort();
      this.log.info('Cancellation requested', { jobId });
      return this.toView(job);
    }

    const index = this.queue.indexOf(jobId);
    if (index !== -1) {
      this.queue.splice(index, 1);
    }
    const cancelled = await this.finish(job, 'cancelled', { progress: job.progress });
    return this.toView(cancelled);
  }

  /**
   * Archive a job. Pending jobs are cancelled first.
   *
   * @throws {JobConflictError} while the job is processing
   */
  async deleteJob(jobId: string, principal: Principal): Promise<void> {
    const job = await this.visibleJob(jobId, principal);
    if (job.status === 'processing' || this.running.has(jobId)) {
      throw new JobConflictError(`Job ${jobId} is processing; cancel it first`);
    }
    if (job.status === 'pending') {
      await this.cancel(jobId, principal);
    }
    await this.store.archive(jobId, this.now());
    this.log.info('Job archived', { jobId });
  }

  /**
   * Archive terminal jobs past their retention window
   *
   * @returns number of jobs archived
   */
  async purgeExpiredJobs(principal: Principal, now: Date = this.now()): Promise<number> {
    this.requireAdmin(principal, 'purge expired jobs');

    const expired = await this.store.findExpired(now);
    let archived = 0;
    for (const jobId of expired) {
      if (await this.store.archive(jobId, now)) {
        archived++;
      }
    }

    this.log.info('Expired jobs purged', { archived, cutoff: now.toISOString() });
    return archived;
  }

  // ==========================================================================
  // Descriptor Cache Administration
  // ==========================================================================

  /**
   * Evict descriptors older than `olderThanMs`
   *
   * @throws {ForbiddenError} for non-admins
   */
  async cleanupDescriptorCache(
    olderThanMs: number,
    principal: Principal,
    ownerFilter?: string
  ): Promise<number> {
    this.requireAdmin(principal, 'clean up the descriptor cache');
    return this.descriptorCache.evictOlderThan(olderThanMs, ownerFilter);
  }

  // ==========================================================================
  // Lifecycle
  // ==========================================================================

  /**
   * Pick up jobs left behind by a previous process
   *
   * Pending jobs are queued again in submission order. Jobs that were
   * processing cannot be resumed and are marked failed.
   */
  async recover(): Promise<RecoverySummary> {
    const stale = await this.store.findByStatus(['pending', 'processing']);
    let requeued = 0;
    let interrupted = 0;

    for (const job of stale) {
      if (this.running.has(job.jobId) || this.queue.includes(job.jobId)) continue;
      if (job.status === 'pending') {
        this.queue.push(job.jobId);
        requeued++;
      } else {
        await this.finish(job, 'failed', {
          progress: job.progress,
          error: 'Interrupted: the process running this job stopped',
        });
        interrupted++;
      }
    }

    if (requeued > 0 || interrupted > 0) {
      this.log.info('Recovered jobs', { requeued, interrupted });
    }
    this.pump();
    return { requeued, interrupted };
  }

  async checkHealth(): Promise<OrchestratorHealth> {
    const collaborators: Record<string, HealthStatus> = {};

    const checks: Array<[string, (() => Promise<HealthStatus | null>) | undefined]> = [
      ['retrieval', this.collaborators.retrieval.health?.bind(this.collaborators.retrieval)],
      ['verification', this.collaborators.verification.health?.bind(this.collaborators.verification)],
      ['descriptors', () => this.descriptorCache.computerHealth()],
    ];

    for (const [name, check] of checks) {
      if (!check) continue;
      try {
        const status = await check();
        if (status) collaborators[name] = status;
      } catch (error) {
        collaborators[name] = { healthy: false, message: describeError(error) };
      }
    }

    return {
      healthy: Object.values(collaborators).every((status) => status.healthy),
      collaborators,
      runningJobs: this.running.size,
      queuedJobs: this.queue.length,
    };
  }

  /**
   * Stop picking up work and wait for running jobs to finish
   *
   * Queued jobs stay pending in the store.
   */
  async shutdown(): Promise<void> {
    this.accepting = false;
    const queued = this.queue.splice(0, this.queue.length);
    this.log.info('Orchestrator shutting down', {
      running: this.running.size,
      leftPending: queued.length,
    });
    await Promise.all([...this.running.values()].map((job) => job.done));
  }

  // ==========================================================================
  // Worker Pool
  // ==========================================================================

  private pump(): void {
    while (
      this.accepting &&
      this.running.size < this.config.workers.maxConcurrentJobs &&
      this.queue.length > 0
    ) {
      const jobId = this.queue.shift();
      if (jobId === undefined) break;

      const running: RunningJob = {
        controller: new AbortController(),
        progress: EMPTY_PROGRESS,
        iterations: 0,
        flush: Promise.resolve(),
        done: Promise.resolve(),
      };
      this.running.set(jobId, running);

      running.done = this.process(jobId, running)
        .catch((error: unknown) => {
          this.log.error('Worker crashed', { jobId, error: describeError(error) });
        })
        .finally(() => {
          this.running.delete(jobId);
          this.pump();
        });
    }
  }

  private async process(jobId: string, running: RunningJob): Promise<void> {
    const job = await this.store.get(jobId);
    if (!job || job.status !== 'pending') {
      return;
    }

    if (running.controller.signal.aborted) {
      await this.finish(job, 'cancelled', { progress: job.progress });
      return;
    }

    assertTransition(jobId, job.status, 'processing');
    const started = await this.store.update(jobId, {
      status: 'processing',
      startedAt: this.now(),
      updatedAt: this.now(),
    });
    this.log.info('Analysis started', { jobId, owner: job.owner });

    try {
      await this.analyze(started, running);
    } catch (error) {
      await this.failCrashed(started, running, error);
    }
  }

  /**
   * Traverse, summarize and store the terminal state of a processing job
   */
  private async analyze(started: AnalysisJob, running: RunningJob): Promise<void> {
    const jobId = started.jobId;
    let outcome: TraversalOutcome;
    try {
      outcome = await this.engine.run(started.seeds, started.config, {
        owner: started.owner,
        signal: running.controller.signal,
        onProgress: (progress) => this.onProgress(jobId, running, progress),
      });
    } catch (error) {
      await running.flush;
      const reason = describeError(error);
      this.log.error('Analysis failed', { jobId, error: reason });
      await this.finish(started, 'failed', { progress: running.progress, error: reason });
      return;
    }

    await running.flush;

    if (outcome.status === 'cancelled') {
      await this.finish(started, 'cancelled', { progress: outcome.progress });
      return;
    }

    const summary = summarize(outcome.graph);
    const result: AnalysisResult = {
      graph: outcome.graph,
      spanningForest: summary.spanningForest,
      components: summary.components,
      truncated: outcome.truncated,
      failures: outcome.failures,
    };
    await this.finish(started, 'completed', { progress: outcome.progress, result });
  }

  /**
   * Fail a processing job after an error outside the traversal
   *
   * When even that write fails, the failed view is kept in memory and
   * served to getStatus and waitForJob.
   */
  private async failCrashed(job: AnalysisJob, running: RunningJob, error: unknown): Promise<void> {
    await running.flush;
    const reason = describeError(error);
    this.log.error('Analysis crashed', { jobId: job.jobId, error: reason });

    try {
      await this.finish(job, 'failed', { progress: running.progress, error: reason });
    } catch (writeError) {
      this.log.error('Could not record failed job', {
        jobId: job.jobId,
        error: describeError(writeError),
      });
      const view: JobStatusView = {
        ...this.toView(job),
        status: 'failed',
        progress: running.progress,
        result: null,
        error: reason,
        completedAt: this.now(),
      };
      this.unrecorded.set(job.jobId, view);
      this.notifyWaiters(job.jobId, view);
    }
  }

  private onProgress(jobId: string, running: RunningJob, progress: ProgressCounters): void {
    running.progress = progress;
    running.iterations++;

    if (running.iterations % this.config.workers.progressFlushInterval !== 0) {
      return;
    }
    running.flush = running.flush
      .then(async () => {
        await this.store.update(jobId, { progress, updatedAt: this.now() });
      })
      .catch((error: unknown) => {
        this.log.warn('Progress flush failed', { jobId, error: describeError(error) });
      });
  }

  /**
   * Move a job to a terminal state and notify waiters
   */
  private async finish(
    job: AnalysisJob,
    status: 'completed' | 'failed' | 'cancelled',
    fields: { progress: ProgressCounters; result?: AnalysisResult; error?: string }
  ): Promise<AnalysisJob> {
    assertTransition(job.jobId, job.status, status);

    const completedAt = this.now();
    const expiresAt = new Date(
      completedAt.getTime() + this.config.retention.jobRetentionDays * DAY_MS
    );
    const updated = await this.store.update(job.jobId, {
      status,
      progress: fields.progress,
      result: status === 'completed' ? fields.result ?? null : null,
      error: status === 'failed' ? fields.error ?? 'Unknown error' : null,
      completedAt,
      expiresAt,
      updatedAt: completedAt,
    });

    this.log.info('Analysis finished', {
      jobId: job.jobId,
      status,
      imagesProcessed: fields.progress.imagesProcessed,
      matchedPairs: fields.progress.matchedPairs,
    });

    this.notifyWaiters(job.jobId, this.toView(updated));
    return updated;
  }

  private notifyWaiters(jobId: string, view: JobStatusView): void {
    const waiting = this.waiters.get(jobId) ?? [];
    this.waiters.delete(jobId);
    for (const resolve of waiting) {
      resolve(view);
    }
  }

  // ==========================================================================
  // Helpers
  // ==========================================================================

  private async visibleJob(jobId: string, principal: Principal): Promise<AnalysisJob> {
    const job = await this.store.get(jobId);
    if (!job || (!principal.isAdmin && job.owner !== principal.id)) {
      throw new NotFoundError('job', jobId);
    }
    return job;
  }

  private requireAdmin(principal: Principal, action: string): void {
    if (!principal.isAdmin) {
      throw new ForbiddenError(`Only admins may ${action}`);
    }
  }

  private toView(job: AnalysisJob): JobStatusView {
    const live = job.status === 'processing' ? this.running.get(job.jobId) : undefined;
    return {
      jobId: job.jobId,
      owner: job.owner,
      status: job.status,
      progress: live?.progress ?? job.progress,
      result: job.result,
      error: job.error,
      createdAt: job.createdAt,
      startedAt: job.startedAt,
      completedAt: job.completedAt,
      expiresAt: job.expiresAt,
    };
  }
}
