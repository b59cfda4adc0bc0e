/**
 * Jobs Cancel Command
 *
 * USAGE:
 *   provenance-engine jobs cancel <jobId>
 *
 * @module cli/commands/jobs/cancel
 */

import { describeError } from '../../../core/errors.js';
import type { JobStatusView } from '../../../services/analysis-orchestrator.types.js';
import type { CommandContext } from '../../lib/context.js';

export interface CancelResult {
  readonly success: boolean;
  readonly job?: JobStatusView;
  readonly error?: string;
}

export async function runCancel(ctx: CommandContext, jobId: string): Promise<CancelResult> {
  ctx.logger.commandStart('jobs cancel', { jobId });
  try {
    const { orchestrator } = await ctx.engine();
    const job = await orchestrator.cancel(jobId, ctx.principal);
    ctx.logger.output(job, () => [`Job ${job.jobId} is ${job.status}`]);
    ctx.logger.commandEnd(true);
    return { success: true, job };
  } catch (error) {
    const message = describeError(error);
    ctx.logger.error(message);
    ctx.logger.commandEnd(false);
    return { success: false, error: message };
  }
}
