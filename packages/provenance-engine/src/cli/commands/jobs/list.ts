/**
 * Jobs List Command
 *
 * USAGE:
 *   provenance-engine jobs list [--status <status>] [--limit <n>]
 *
 * Admins see every owner's jobs; everyone else sees their own.
 *
 * @module cli/commands/jobs/list
 */

import { describeError } from '../../../core/errors.js';
import type { JobStatus, JobSummary } from '../../../services/analysis-orchestrator.types.js';
import type { CommandContext } from '../../lib/context.js';

export interface ListOptions {
  readonly status?: JobStatus;
  readonly limit?: number;
}

export interface ListResult {
  readonly success: boolean;
  readonly jobs?: readonly JobSummary[];
  readonly error?: string;
}

export async function runList(ctx: CommandContext, options: ListOptions = {}): Promise<ListResult> {
  ctx.logger.commandStart('jobs list', { ...options });
  try {
    const { orchestrator } = await ctx.engine();
    const jobs = await orchestrator.listJobs(ctx.principal, options);

    ctx.logger.table(
      jobs.map((job) => ({
        job: job.jobId,
        owner: job.owner,
        status: job.status,
        seeds: job.seeds.length,
        processed: job.progress.imagesProcessed,
        pairs: job.progress.matchedPairs,
        created: job.createdAt,
        duration_ms: job.durationMs,
      })),
      ['job', 'owner', 'status', 'seeds', 'processed', 'pairs', 'created', 'duration_ms']
    );

    ctx.logger.commandEnd(true, { count: jobs.length });
    return { success: true, jobs };
  } catch (error) {
    const message = describeError(error);
    ctx.logger.error(message);
    ctx.logger.commandEnd(false);
    return { success: false, error: message };
  }
}
