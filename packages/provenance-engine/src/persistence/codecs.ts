/**
 * JSON column codecs
 *
 * Documents read back from the database are validated before they are
 * handed to the engine; a row that does not decode is a corrupt record.
 */

import { z } from 'zod';
import type { AnalysisResult, ImageId, ProgressCounters } from '../core/types.js';
import { InvariantViolationError } from '../core/errors.js';

const VariantSchema = z.enum(['cv_sift', 'cv_rsift', 'vlfeat_sift_heq']);

const EdgeSchema = z.object({
  a: z.string(),
  b: z.string(),
  weight: z.number(),
  sharedArea: z.number(),
  keypointCount: z.number(),
  isFlipped: z.boolean(),
  variant: VariantSchema,
  depth: z.number(),
});

const ProgressSchema = z.object({
  imagesProcessed: z.number(),
  matchedPairs: z.number(),
  imagesEnqueued: z.number(),
  verificationsAttempted: z.number(),
  verificationFailures: z.number(),
  retrievalFailures: z.number(),
  currentDepth: z.number(),
  elapsedMs: z.number(),
});

const ResultSchema = z.object({
  graph: z.object({
    nodes: z.array(z.object({ id: z.string(), isQuery: z.boolean(), depth: z.number() })),
    edges: z.array(EdgeSchema),
  }),
  spanningForest: z.array(EdgeSchema),
  components: z.array(z.array(z.string())),
  truncated: z.enum(['queue_cap', 'time_budget']).nullable(),
  failures: z.array(
    z.object({
      stage: z.enum(['retrieval', 'descriptor', 'verification']),
      imageA: z.string(),
      imageB: z.string().nullable(),
      reason: z.string(),
      depth: z.number(),
    })
  ),
});

const SeedsSchema = z.array(z.string());

function decode<T>(schema: z.ZodType<T>, text: string, what: string): T {
  let parsed: unknown;
  try {
    parsed = JSON.parse(text);
  } catch (error) {
    throw new InvariantViolationError(
      `Corrupt ${what}: ${error instanceof Error ? error.message : String(error)}`
    );
  }
  const result = schema.safeParse(parsed);
  if (!result.success) {
    const issue = result.error.errors[0];
    throw new InvariantViolationError(
      `Corrupt ${what}: ${issue ? `${issue.path.join('.')}: ${issue.message}` : 'invalid'}`
    );
  }
  return result.data;
}

export function decodeProgress(text: string): ProgressCounters {
  return decode(ProgressSchema, text, 'progress');
}

export function decodeResult(text: string): AnalysisResult {
  return decode(ResultSchema, text, 'result');
}

export function decodeSeeds(text: string): readonly ImageId[] {
  return decode(SeedsSchema, text, 'seeds');
}

export function decodeJson(text: string, what: string): unknown {
  return decode(z.unknown(), text, what);
}
