/**
 * Analysis Configuration Validation
 *
 * The per-analysis configuration is a closed record: unknown options are
 * rejected, every cap is positive, every threshold is in range. Everything
 * is checked at submission, before any work is scheduled.
 */

import { z } from 'zod';
import {
  DEFAULT_DESCRIPTOR_VARIANT,
  type DescriptorVariant,
  type ImageId,
  type SearchScope,
} from '../core/types.js';
import { InvalidConfigError, type ConfigIssue } from '../core/errors.js';

// ============================================================================
// Schema
// ============================================================================

const intIn = (min: number, max: number, label: string) =>
  z
    .number({ invalid_type_error: `${label} must be a number` })
    .int(`${label} must be an integer`)
    .min(min, `${label} must be >= ${min}`)
    .max(max, `${label} must be <= ${max}`);

export const AnalysisConfigSchema = z
  .object({
    maxDepth: intIn(0, 1_000, 'maxDepth').default(3),
    maxQueueSize: intIn(1, 1_000_000, 'maxQueueSize').default(100),
    topK: intIn(1, 1_000, 'topK').default(10),
    expansionTopK: intIn(1, 1_000, 'expansionTopK').optional(),
    minArea: z
      .number()
      .min(0, 'minArea must be >= 0')
      .max(1, 'minArea must be <= 1')
      .default(0.02),
    minKeypoints: intIn(0, 100_000, 'minKeypoints').default(10),
    checkFlip: z.boolean().default(true),
    sameLabelOnly: z.boolean().default(false),
    descriptorVariant: z
      .enum(['cv_sift', 'cv_rsift', 'vlfeat_sift_heq'])
      .default(DEFAULT_DESCRIPTOR_VARIANT),
    timeBudgetMs: intIn(0, 7 * 24 * 60 * 60 * 1000, 'timeBudgetMs').default(0),
    verificationConcurrency: intIn(1, 64, 'verificationConcurrency').default(1),
    searchScope: z.enum(['owner', 'global']).default('owner'),
    scopeOwners: z.array(z.string().min(1)).min(1).max(1_000).optional(),
  })
  .strict()
  .superRefine((config, ctx) => {
    if (config.scopeOwners !== undefined && config.searchScope !== 'global') {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['scopeOwners'],
        message: 'scopeOwners requires searchScope "global"',
      });
    }
  });

export type AnalysisConfigInput = z.input<typeof AnalysisConfigSchema>;

/**
 * Fully resolved configuration for one analysis
 */
export interface AnalysisConfig {
  /** 0 = unbounded */
  readonly maxDepth: number;
  /** Total images ever enqueued, seeds included */
  readonly maxQueueSize: number;
  /** Candidates requested for seed images */
  readonly topK: number;
  /** Candidates requested for images at depth >= 1 */
  readonly expansionTopK: number;
  readonly minArea: number;
  readonly minKeypoints: number;
  readonly checkFlip: boolean;
  readonly sameLabelOnly: boolean;
  readonly descriptorVariant: DescriptorVariant;
  /** 0 = unbounded */
  readonly timeBudgetMs: number;
  readonly verificationConcurrency: number;
  readonly searchScope: SearchScope;
  readonly scopeOwners?: readonly string[];
}

const SeedsSchema = z
  .array(z.string().min(1, 'seed image id must not be empty'), {
    invalid_type_error: 'seeds must be an array of image ids',
  })
  .min(1, 'at least one seed image is required')
  .max(10_000, 'at most 10000 seed images are allowed');

// ============================================================================
// Parsing
// ============================================================================

/**
 * Resolve a submitted configuration, applying defaults
 *
 * @throws {InvalidConfigError} on unknown options or out-of-range values
 */
export function parseAnalysisConfig(input: unknown = {}): AnalysisConfig {
  const result = AnalysisConfigSchema.safeParse(input ?? {});
  if (!result.success) {
    throw new InvalidConfigError(toIssues(result.error));
  }

  const { expansionTopK, scopeOwners, ...rest } = result.data;
  return {
    ...rest,
    expansionTopK: expansionTopK ?? rest.topK,
    ...(scopeOwners !== undefined && { scopeOwners }),
  };
}

/**
 * Validate the seed list against a resolved configuration
 *
 * Seeds are deduplicated (first occurrence wins). Seeds count against
 * maxQueueSize, so more distinct seeds than the cap is rejected.
 *
 * @throws {InvalidConfigError}
 */
export function parseSeeds(input: unknown, config: AnalysisConfig): readonly ImageId[] {
  const result = SeedsSchema.safeParse(input);
  if (!result.success) {
    throw new InvalidConfigError(toIssues(result.error, 'seeds'));
  }

  const seeds = [...new Set(result.data)];
  if (seeds.length > config.maxQueueSize) {
    throw new InvalidConfigError([
      {
        path: 'seeds',
        message: `${seeds.length} distinct seeds exceed maxQueueSize ${config.maxQueueSize}`,
      },
    ]);
  }
  return seeds;
}

export function toIssues(error: z.ZodError, prefix?: string): ConfigIssue[] {
  return error.errors.map((issue) => {
    const path = issue.path.map(String);
    if (prefix !== undefined) path.unshift(prefix);
    return { path: path.join('.'), message: issue.message };
  });
}
