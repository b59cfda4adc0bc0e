/**
 * Provenance Engine Core Types
 *
 * Shared vocabulary for the traversal engine, graph builder, summarizer and
 * orchestrator. Everything that crosses a module boundary is declared here.
 *
 * TYPE SAFETY: Readonly records throughout. Graph snapshots are frozen.
 */

// ============================================================================
// Identifiers
// ============================================================================

/**
 * Opaque stable key into the external image corpus
 */
export type ImageId = string;

/**
 * Keypoint descriptor variants understood by the verification service
 */
export type DescriptorVariant = 'cv_sift' | 'cv_rsift' | 'vlfeat_sift_heq';

export const DESCRIPTOR_VARIANTS: readonly DescriptorVariant[] = [
  'cv_sift',
  'cv_rsift',
  'vlfeat_sift_heq',
] as const;

export const DEFAULT_DESCRIPTOR_VARIANT: DescriptorVariant = 'cv_rsift';

/**
 * Corpus restriction for candidate retrieval
 */
export type SearchScope = 'owner' | 'global';

/**
 * Caller identity as seen by the core (authentication happens upstream)
 */
export interface Principal {
  readonly id: string;
  readonly isAdmin: boolean;
}

// ============================================================================
// Graph Types
// ============================================================================

/**
 * Verified-match attributes carried by an edge
 */
export interface EdgeAttributes {
  readonly sharedArea: number;
  readonly keypointCount: number;
  readonly isFlipped: boolean;
  readonly variant: DescriptorVariant;
  /** Depth of the expansion that produced the retained result */
  readonly depth: number;
}

/**
 * Undirected weighted edge. Endpoints are normalized so that `a < b`.
 */
export interface Edge extends EdgeAttributes {
  readonly a: ImageId;
  readonly b: ImageId;
  /** Match confidence in [0, 1] */
  readonly weight: number;
}

export interface GraphNode {
  readonly id: ImageId;
  readonly isQuery: boolean;
  /** Depth at which the image was first discovered */
  readonly depth: number;
}

export interface Graph {
  readonly nodes: readonly GraphNode[];
  readonly edges: readonly Edge[];
}

/**
 * Output of the graph summarizer
 */
export interface GraphSummary {
  readonly spanningForest: readonly Edge[];
  readonly components: readonly (readonly ImageId[])[];
}

// ============================================================================
// Traversal Progress
// ============================================================================

/**
 * Monotonic progress counters, readable while a job is processing
 */
export interface ProgressCounters {
  readonly imagesProcessed: number;
  readonly matchedPairs: number;
  readonly imagesEnqueued: number;
  readonly verificationsAttempted: number;
  readonly verificationFailures: number;
  readonly retrievalFailures: number;
  readonly currentDepth: number;
  readonly elapsedMs: number;
}

export const EMPTY_PROGRESS: ProgressCounters = {
  imagesProcessed: 0,
  matchedPairs: 0,
  imagesEnqueued: 0,
  verificationsAttempted: 0,
  verificationFailures: 0,
  retrievalFailures: 0,
  currentDepth: 0,
  elapsedMs: 0,
};

/**
 * Why a traversal stopped before natural frontier exhaustion
 */
export type TruncationReason = 'queue_cap' | 'time_budget';

/**
 * Isolated failure recorded during traversal (retrieval for one image,
 * or descriptor/verification for one pair)
 */
export interface RecordedFailure {
  readonly stage: 'retrieval' | 'descriptor' | 'verification';
  readonly imageA: ImageId;
  readonly imageB: ImageId | null;
  readonly reason: string;
  readonly depth: number;
}

// ============================================================================
// Analysis Result
// ============================================================================

/**
 * Stored result of a completed analysis job
 */
export interface AnalysisResult {
  readonly graph: Graph;
  readonly spanningForest: readonly Edge[];
  readonly components: readonly (readonly ImageId[])[];
  readonly truncated: TruncationReason | null;
  readonly failures: readonly RecordedFailure[];
}
