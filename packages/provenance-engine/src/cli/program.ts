/**
 * CLI program
 *
 * Builds the commander program. Each action loads configuration, runs one
 * command against a fresh context, closes the engine, and records the
 * exit code.
 *
 * @module cli/program
 */

import { Command, InvalidArgumentError } from 'commander';
import {
  DEFAULT_DESCRIPTOR_VARIANT,
  DESCRIPTOR_VARIANTS,
  type DescriptorVariant,
  type SearchScope,
} from '../core/types.js';
import type { CreateEngineOptions } from '../engine.js';
import type { JobStatus } from '../services/analysis-orchestrator.types.js';
import type { AnalysisConfigInput } from '../validation/analysis-config.js';
import { loadConfig, type LoadConfigOptions } from './lib/config.js';
import { createCLILogger, type LogSink } from './lib/logger.js';
import { createCommandContext, type CommandContext } from './lib/context.js';
import { runAnalyze } from './commands/analyze.js';
import { runCancel, runList, runPurge, runStatus } from './commands/jobs/index.js';
import { runCleanup, runWarm } from './commands/cache/index.js';
import { runHealth } from './commands/health.js';

// ============================================================================
// Exit Codes
// ============================================================================

export const EXIT_CODES = {
  SUCCESS: 0,
  ERRORS: 2,
  CONFIG_ERROR: 3,
  USER_CANCELLED: 10,
} as const;

export type ExitCode = (typeof EXIT_CODES)[keyof typeof EXIT_CODES];

const JOB_STATUSES: readonly JobStatus[] = ['pending', 'processing', 'completed', 'failed', 'cancelled'];

// ============================================================================
// Option Parsers
// ============================================================================

function intOption(value: string): number {
  const parsed = Number(value);
  if (!Number.isInteger(parsed)) {
    throw new InvalidArgumentError('Not an integer.');
  }
  return parsed;
}

function numberOption(value: string): number {
  const parsed = Number(value);
  if (!Number.isFinite(parsed)) {
    throw new InvalidArgumentError('Not a number.');
  }
  return parsed;
}

function isVariant(value: string): value is DescriptorVariant {
  return DESCRIPTOR_VARIANTS.some((variant) => variant === value);
}

function isJobStatus(value: string): value is JobStatus {
  return JOB_STATUSES.some((status) => status === value);
}

function variantOption(value: string): DescriptorVariant {
  if (!isVariant(value)) {
    throw new InvalidArgumentError(`Allowed choices are ${DESCRIPTOR_VARIANTS.join(', ')}.`);
  }
  return value;
}

function statusOption(value: string): JobStatus {
  if (!isJobStatus(value)) {
    throw new InvalidArgumentError(`Allowed choices are ${JOB_STATUSES.join(', ')}.`);
  }
  return value;
}

function scopeOption(value: string): SearchScope {
  if (value !== 'owner' && value !== 'global') {
    throw new InvalidArgumentError('Allowed choices are owner, global.');
  }
  return value;
}

// ============================================================================
// Program
// ============================================================================

type GlobalOptions = {
  verbose?: boolean;
  json?: boolean;
  config?: string;
  owner?: string;
  admin?: boolean;
  database?: string;
  concurrency?: number;
};

export interface ProgramOptions {
  readonly version?: string;
  /** Passed to the engine factory (tests swap the collaborators here) */
  readonly engine?: CreateEngineOptions;
  readonly sink?: LogSink;
  readonly env?: LoadConfigOptions['env'];
  readonly cwd?: string;
  /** Cancels a running analysis when aborted */
  readonly signal?: AbortSignal;
  /** Receives each command's exit code */
  readonly onExit?: (code: ExitCode) => void;
}

export function createProgram(options: ProgramOptions = {}): Command {
  const program = new Command();
  const exit = options.onExit ?? ((code: ExitCode) => {
    process.exitCode = code;
  });

  program
    .name('provenance-engine')
    .description('Image provenance analysis: build and summarize verified-match graphs')
    .version(options.version ?? '0.0.0', '-V, --version', 'Output the version number')
    .option('-v, --verbose', 'Enable verbose output')
    .option('--json', 'Output as JSON (machine-readable)')
    .option('--config <path>', 'Path to config file (default: .provenancerc)')
    .option('--owner <id>', 'Principal to act as')
    .option('--admin', 'Act with admin privileges')
    .option('--database <path>', 'SQLite database path (enables persistence)')
    .option('--concurrency <n>', 'Jobs processing at the same time', intOption);

  /**
   * Wrap a command: build its context, run it, always close the engine
   */
  const action = (
    run: (ctx: CommandContext) => Promise<{ readonly success: boolean }>
  ): Promise<void> => {
    const flags = program.opts<GlobalOptions>();

    let ctx: CommandContext;
    try {
      const config = loadConfig({
        ...(flags.config !== undefined && { configPath: flags.config }),
        ...(options.env !== undefined && { env: options.env }),
        ...(options.cwd !== undefined && { cwd: options.cwd }),
        overrides: {
          ...(flags.verbose !== undefined && { verbose: flags.verbose }),
          ...(flags.json !== undefined && { json: flags.json }),
          ...(flags.owner !== undefined && { owner: flags.owner }),
          ...(flags.admin !== undefined && { admin: flags.admin }),
          ...(flags.database !== undefined && { database: flags.database }),
          ...(flags.concurrency !== undefined && { concurrency: flags.concurrency }),
        },
      });
      const logger = createCLILogger(
        { level: config.verbose ? 'debug' : 'info', json: config.json },
        options.sink
      );
      ctx = createCommandContext(config, logger, options.engine);
    } catch (error) {
      const sink = options.sink ?? { out: console.log, err: console.error };
      sink.err(`Configuration error: ${error instanceof Error ? error.message : String(error)}`);
      exit(EXIT_CODES.CONFIG_ERROR);
      return Promise.resolve();
    }

    return run(ctx)
      .then((result) => {
        const cancelled = options.signal?.aborted ?? false;
        exit(result.success ? EXIT_CODES.SUCCESS : cancelled ? EXIT_CODES.USER_CANCELLED : EXIT_CODES.ERRORS);
      })
      .finally(() => ctx.close());
  };

  // ==========================================================================
  // analyze
  // ==========================================================================

  program
    .command('analyze')
    .description('Run a provenance analysis from one or more seed images')
    .argument('[images...]', 'Seed image ids')
    .option('--seeds-file <path>', 'File with one seed id per line')
    .option('--max-depth <n>', 'Expansion depth limit, 0 = unlimited', intOption)
    .option('--max-queue <n>', 'Maximum images ever enqueued', intOption)
    .option('--top-k <n>', 'Retrieval candidates per seed image', intOption)
    .option('--expansion-top-k <n>', 'Retrieval candidates per discovered image', intOption)
    .option('--min-area <ratio>', 'Minimum shared area, 0..1', numberOption)
    .option('--min-keypoints <n>', 'Minimum matched keypoints', intOption)
    .option('--no-check-flip', 'Do not test mirrored matches')
    .option('--same-label-only', 'Restrict retrieval to the query image labels')
    .option('--variant <name>', `Descriptor variant: ${DESCRIPTOR_VARIANTS.join(' | ')}`, variantOption)
    .option('--time-budget <ms>', 'Stop expanding after this long, 0 = none', intOption)
    .option('--parallel <n>', 'Verifications in flight per expansion', intOption)
    .option('--scope <scope>', 'owner | global', scopeOption)
    .option('--output <path>', 'Write the result document as JSON')
    .action(async (images: string[], opts: {
      seedsFile?: string;
      maxDepth?: number;
      maxQueue?: number;
      topK?: number;
      expansionTopK?: number;
      minArea?: number;
      minKeypoints?: number;
      checkFlip: boolean;
      sameLabelOnly?: boolean;
      variant?: DescriptorVariant;
      timeBudget?: number;
      parallel?: number;
      scope?: SearchScope;
      output?: string;
    }) => {
      const config: AnalysisConfigInput = {
        checkFlip: opts.checkFlip,
        ...(opts.maxDepth !== undefined && { maxDepth: opts.maxDepth }),
        ...(opts.maxQueue !== undefined && { maxQueueSize: opts.maxQueue }),
        ...(opts.topK !== undefined && { topK: opts.topK }),
        ...(opts.expansionTopK !== undefined && { expansionTopK: opts.expansionTopK }),
        ...(opts.minArea !== undefined && { minArea: opts.minArea }),
        ...(opts.minKeypoints !== undefined && { minKeypoints: opts.minKeypoints }),
        ...(opts.sameLabelOnly !== undefined && { sameLabelOnly: opts.sameLabelOnly }),
        ...(opts.variant !== undefined && { descriptorVariant: opts.variant }),
        ...(opts.timeBudget !== undefined && { timeBudgetMs: opts.timeBudget }),
        ...(opts.parallel !== undefined && { verificationConcurrency: opts.parallel }),
      };

      await action((ctx) =>
        runAnalyze(ctx, {
          seeds: images,
          config,
          ...(opts.seedsFile !== undefined && { seedsFile: opts.seedsFile }),
          ...(opts.scope !== undefined && { scope: opts.scope }),
          ...(opts.output !== undefined && { output: opts.output }),
          ...(options.signal !== undefined && { signal: options.signal }),
        })
      );
    });

  // ==========================================================================
  // jobs
  // ==========================================================================

  const jobs = program.command('jobs').description('Inspect and manage analysis jobs');

  jobs
    .command('list')
    .description('List recent jobs, newest first')
    .option('--status <status>', 'Filter by status', statusOption)
    .option('--limit <n>', 'Max results', intOption)
    .action(async (opts: { status?: JobStatus; limit?: number }) => {
      await action((ctx) =>
        runList(ctx, {
          ...(opts.status !== undefined && { status: opts.status }),
          ...(opts.limit !== undefined && { limit: opts.limit }),
        })
      );
    });

  jobs
    .command('status <jobId>')
    .description('Show status, progress and result of one job')
    .action(async (jobId: string) => {
      await action((ctx) => runStatus(ctx, jobId));
    });

  jobs
    .command('cancel <jobId>')
    .description('Cancel a pending or processing job')
    .action(async (jobId: string) => {
      await action((ctx) => runCancel(ctx, jobId));
    });

  jobs
    .command('purge')
    .description('Archive jobs past their retention window (admin)')
    .action(async () => {
      await action((ctx) => runPurge(ctx));
    });

  // ==========================================================================
  // cache
  // ==========================================================================

  const cache = program.command('cache').description('Descriptor cache maintenance');

  cache
    .command('warm')
    .description('Compute descriptors ahead of analysis')
    .argument('<images...>', 'Image ids')
    .option(
      '--variant <name>',
      `Descriptor variant: ${DESCRIPTOR_VARIANTS.join(' | ')}`,
      variantOption,
      DEFAULT_DESCRIPTOR_VARIANT
    )
    .action(async (images: string[], opts: { variant: DescriptorVariant }) => {
      await action((ctx) => runWarm(ctx, { images, variant: opts.variant }));
    });

  cache
    .command('cleanup')
    .description('Evict descriptors older than a given age (admin)')
    .requiredOption('--older-than <age>', 'Age such as 30d, 12h, 15m or milliseconds')
    .option('--for-owner <id>', 'Only evict descriptors recorded for this owner')
    .action(async (opts: { olderThan: string; forOwner?: string }) => {
      await action((ctx) =>
        runCleanup(ctx, {
          olderThan: opts.olderThan,
          ...(opts.forOwner !== undefined && { owner: opts.forOwner }),
        })
      );
    });

  // ==========================================================================
  // health
  // ==========================================================================

  program
    .command('health')
    .description('Check collaborator health')
    .action(async () => {
      await action((ctx) => runHealth(ctx));
    });

  return program;
}
