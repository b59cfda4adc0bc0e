/**
 * Jobs Purge Command
 *
 * Archives terminal jobs whose retention window has passed. Admin only.
 *
 * USAGE:
 *   provenance-engine --admin jobs purge
 *
 * @module cli/commands/jobs/purge
 */

import { describeError } from '../../../core/errors.js';
import type { CommandContext } from '../../lib/context.js';

export interface PurgeResult {
  readonly success: boolean;
  readonly archived?: number;
  readonly error?: string;
}

export async function runPurge(ctx: CommandContext): Promise<PurgeResult> {
  ctx.logger.commandStart('jobs purge');
  try {
    const { orchestrator } = await ctx.engine();
    const archived = await orchestrator.purgeExpiredJobs(ctx.principal);
    ctx.logger.output({ archived }, () => [`Archived ${archived} expired job(s)`]);
    ctx.logger.commandEnd(true, { archived });
    return { success: true, archived };
  } catch (error) {
    const message = describeError(error);
    ctx.logger.error(message);
    ctx.logger.commandEnd(false);
    return { success: false, error: message };
  }
}
