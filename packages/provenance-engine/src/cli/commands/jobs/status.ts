/**
 * Jobs Status Command
 *
 * USAGE:
 *   provenance-engine jobs status <jobId>
 *
 * @module cli/commands/jobs/status
 */

import { describeError } from '../../../core/errors.js';
import type { JobStatusView } from '../../../services/analysis-orchestrator.types.js';
import type { CommandContext } from '../../lib/context.js';

export interface StatusResult {
  readonly success: boolean;
  readonly job?: JobStatusView;
  readonly error?: string;
}

export async function runStatus(ctx: CommandContext, jobId: string): Promise<StatusResult> {
  ctx.logger.commandStart('jobs status', { jobId });
  try {
    const { orchestrator } = await ctx.engine();
    const job = await orchestrator.getStatus(jobId, ctx.principal);
    ctx.logger.output(job, () => describeJob(job));
    ctx.logger.commandEnd(true);
    return { success: true, job };
  } catch (error) {
    const message = describeError(error);
    ctx.logger.error(message);
    ctx.logger.commandEnd(false);
    return { success: false, error: message };
  }
}

/**
 * Human-readable lines for one job
 */
export function describeJob(job: JobStatusView): string[] {
  const { progress } = job;
  const lines = [
    `Job:        ${job.jobId}`,
    `Owner:      ${job.owner}`,
    `Status:     ${job.status}`,
    `Progress:   ${progress.imagesProcessed} processed, ${progress.imagesEnqueued} enqueued, ` +
      `${progress.matchedPairs} matched pairs (depth ${progress.currentDepth})`,
    `Failures:   ${progress.verificationFailures} verification, ${progress.retrievalFailures} retrieval`,
  ];

  if (job.error !== null) {
    lines.push(`Error:      ${job.error}`);
  }

  const { result } = job;
  if (result) {
    lines.push(
      `Graph:      ${result.graph.nodes.length} images, ${result.graph.edges.length} edges`,
      `Components: ${result.components.length}`
    );
    if (result.truncated !== null) {
      lines.push(`Truncated:  ${result.truncated}`);
    }
    for (const component of result.components) {
      lines.push(`  - ${component.join(', ')}`);
    }
    for (const edge of result.spanningForest) {
      lines.push(`  ${edge.a} -- ${edge.b}  weight=${edge.weight.toFixed(3)}${edge.isFlipped ? ' (flipped)' : ''}`);
    }
  }

  return lines;
}
