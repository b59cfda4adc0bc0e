/**
 * Analyze Command
 *
 * Submits one provenance analysis and waits for it to finish.
 *
 * USAGE:
 *   provenance-engine analyze <imageId...> [options]
 *
 * OPTIONS:
 *   --seeds-file <path>   Read additional seed ids, one per line
 *   --max-depth <n>       Expansion depth limit (0 = unlimited)
 *   --output <path>       Write the result document as JSON
 *
 * EXAMPLES:
 *   provenance-engine analyze img-001 img-002 --max-depth 2
 *   provenance-engine --admin analyze img-001 --scope global --output graph.json
 *
 * Interrupting the process requests cancellation; the job stops at its next
 * traversal iteration.
 *
 * @module cli/commands/analyze
 */

import { readFile, writeFile } from 'node:fs/promises';
import type { ImageId, SearchScope } from '../../core/types.js';
import { describeError } from '../../core/errors.js';
import type { AnalysisConfigInput } from '../../validation/analysis-config.js';
import type { JobStatusView } from '../../services/analysis-orchestrator.types.js';
import type { CommandContext } from '../lib/context.js';
import { describeJob } from './jobs/status.js';

export interface AnalyzeOptions {
  readonly seeds: readonly ImageId[];
  readonly seedsFile?: string;
  readonly config: AnalysisConfigInput;
  readonly scope?: SearchScope;
  /** Write the result document here */
  readonly output?: string;
  /** Aborting requests cancellation of the submitted job */
  readonly signal?: AbortSignal;
}

export interface AnalyzeResult {
  readonly success: boolean;
  readonly job?: JobStatusView;
  readonly error?: string;
}

/**
 * Seed ids from a text file: one per line, blank lines and # comments skipped
 */
export function parseSeedList(content: string): ImageId[] {
  return content
    .split(/\r?\n/)
    .map((line) => line.trim())
    .filter((line) => line.length > 0 && !line.startsWith('#'));
}

export async function runAnalyze(ctx: CommandContext, options: AnalyzeOptions): Promise<AnalyzeResult> {
  const { logger, principal } = ctx;
  logger.commandStart('analyze', { seeds: options.seeds.length });

  try {
    const seeds = [...options.seeds];
    if (options.seedsFile) {
      seeds.push(...parseSeedList(await readFile(options.seedsFile, 'utf-8')));
    }

    const { orchestrator } = await ctx.engine();
    const jobId = await orchestrator.submit(seeds, options.config, principal, options.scope);
    logger.info('Analysis submitted', { jobId, seeds: seeds.length });

    const requestCancel = (): void => {
      logger.warn('Cancellation requested', { jobId });
      orchestrator.cancel(jobId, principal).catch((error: unknown) => {
        logger.error('Cancellation failed', { jobId, error: describeError(error) });
      });
    };
    if (options.signal?.aborted) {
      requestCancel();
    } else {
      options.signal?.addEventListener('abort', requestCancel, { once: true });
    }

    let job: JobStatusView;
    try {
      job = await orchestrator.waitForJob(jobId);
    } finally {
      options.signal?.removeEventListener('abort', requestCancel);
    }

    if (options.output && job.result) {
      await writeFile(options.output, `${JSON.stringify(job.result, null, 2)}\n`, 'utf-8');
      logger.info('Result written', { path: options.output });
    }

    logger.output(job, () => describeJob(job));

    const success = job.status === 'completed';
    logger.commandEnd(success, { jobId, status: job.status });
    return success
      ? { success, job }
      : { success, job, error: job.error ?? `Job ${job.status}` };
  } catch (error) {
    const message = describeError(error);
    logger.error(message);
    logger.commandEnd(false);
    return { success: false, error: message };
  }
}
