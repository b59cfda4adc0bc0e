/**
 * Frontier Traversal Types
 */

import type {
  Graph,
  ProgressCounters,
  RecordedFailure,
  TruncationReason,
} from '../core/types.js';
import type { CollaboratorSet } from '../collaborators/types.js';
import type { DescriptorCache } from '../cache/descriptor-cache.js';
import type { Logger } from '../core/utils/logger.js';

/**
 * Everything one traversal needs from the outside world
 */
export interface TraversalDependencies {
  readonly collaborators: CollaboratorSet;
  readonly descriptorCache: DescriptorCache;
  readonly logger?: Logger;
  /** Monotonic clock in ms (default: Date.now) */
  readonly now?: () => number;
  /** Backoff sleep, injectable for tests */
  readonly sleep?: (ms: number) => Promise<void>;
}

/**
 * Collaborator failure policy for one run
 */
export interface TraversalResilience {
  /** Consecutive failures of one collaborator that fail the run (default: 5) */
  readonly maxConsecutiveFailures: number;
  /** Attempts per collaborator call, 1 = no retry (default: 2) */
  readonly retryAttempts: number;
  readonly retryInitialDelayMs: number;
  readonly retryMaxDelayMs: number;
  /** Recorded failures kept on the outcome (default: 200) */
  readonly maxRecordedFailures: number;
}

export const DEFAULT_TRAVERSAL_RESILIENCE: TraversalResilience = {
  maxConsecutiveFailures: 5,
  retryAttempts: 2,
  retryInitialDelayMs: 200,
  retryMaxDelayMs: 5000,
  maxRecordedFailures: 200,
};

export interface TraversalRunOptions {
  /** Principal the analysis runs for; drives owner scoping */
  readonly owner: string;
  /** Checked at every iteration boundary */
  readonly signal?: AbortSignal;
  /** Called after every iteration with the current counters */
  readonly onProgress?: (progress: ProgressCounters) => void;
}

export type TraversalStatus = 'completed' | 'cancelled';

export interface TraversalOutcome {
  readonly status: TraversalStatus;
  readonly graph: Graph;
  readonly truncated: TruncationReason | null;
  readonly progress: ProgressCounters;
  readonly failures: readonly RecordedFailure[];
  /** Failures beyond maxRecordedFailures that were counted but not kept */
  readonly droppedFailures: number;
}
