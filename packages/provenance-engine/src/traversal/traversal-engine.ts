/**
 * Frontier Traversal Engine
 *
 * Bounded breadth-first search over a graph whose adjacency is discovered
 * lazily: retrieval proposes candidates for an image, geometric
 * verification confirms or rejects each pair, accepted pairs become edges
 * and newly found images join the frontier.
 *
 * ITERATION: one dequeued image. Cancellation and the time budget are
 * checked at iteration boundaries only, never in the middle of a
 * collaborator call.
 *
 * DETERMINISM: verification may run in parallel, but outcomes are applied
 * in candidate order, and collaborator failures are counted in that same
 * order, so the graph and the escalation point match a sequential run.
 *
 * FAILURES:
 * - Retrieval failure for one image, or descriptor/verification failure for
 *   one pair: recorded, skipped
 * - An image whose descriptor failed is unreadable for the rest of the run;
 *   its later pairs are recorded without calling the cache again, and the
 *   image counts once toward the descriptor breaker
 * - Too many consecutive failures of one collaborator:
 *   CollaboratorUnavailableError, the run fails
 */

import type {
  ImageId,
  ProgressCounters,
  RecordedFailure,
  TruncationReason,
} from '../core/types.js';
import type { RetrievalCandidate } from '../collaborators/types.js';
import type { AnalysisConfig } from '../validation/analysis-config.js';
import { PerPairVerificationFailure, describeError } from '../core/errors.js';
import { rootError } from '../resilience/retry.js';
import { mapWithConcurrency } from '../core/utils/concurrency.js';
import { createLogger, type Logger } from '../core/utils/logger.js';
import { GraphBuilder, pairKey } from '../graph/graph-builder.js';
import {
  createCollaboratorGuard,
  type CollaboratorGuard,
} from '../resilience/collaborator-guard.js';
import { Frontier, type FrontierEntry } from './frontier.js';
import {
  DEFAULT_TRAVERSAL_RESILIENCE,
  type TraversalDependencies,
  type TraversalOutcome,
  type TraversalResilience,
  type TraversalRunOptions,
} from './types.js';

type PairOutcome =
  | {
      readonly kind: 'accepted';
      readonly candidate: ImageId;
      readonly sharedArea: number;
      readonly keypointCount: number;
      readonly isFlipped: boolean;
    }
  | { readonly kind: 'rejected'; readonly candidate: ImageId }
  | {
      readonly kind: 'descriptor_failed';
      readonly candidate: ImageId;
      /** The image whose descriptor could not be computed */
      readonly image: ImageId;
      readonly error: Error;
    }
  | { readonly kind: 'verification_failed'; readonly candidate: ImageId; readonly error: Error };

type DescriptorResult =
  | { readonly ok: true; readonly blob: Uint8Array }
  | { readonly ok: false; readonly error: Error };

type Guards = Record<'retrieval' | 'verification' | 'descriptors', CollaboratorGuard>;

/**
 * Mutable counters for one run
 */
interface RunState {
  imagesProcessed: number;
  verificationsAttempted: number;
  verificationFailures: number;
  retrievalFailures: number;
  currentDepth: number;
  truncated: TruncationReason | null;
  droppedFailures: number;
  readonly failures: RecordedFailure[];
  readonly verifiedPairs: Set<string>;
  /** Images whose descriptor failed, with the first error seen */
  readonly unreadable: Map<ImageId, Error>;
  /** Unreadable images already counted toward the descriptor breaker */
  readonly countedUnreadable: Set<ImageId>;
}

export class TraversalEngine {
  private readonly deps: TraversalDependencies;
  private readonly resilience: TraversalResilience;
  private readonly log: Logger;
  private readonly now: () => number;

  constructor(deps: TraversalDependencies, resilience: Partial<TraversalResilience> = {}) {
    this.deps = deps;
    this.resilience = { ...DEFAULT_TRAVERSAL_RESILIENCE, ...resilience };
    this.log = deps.logger ?? createLogger({ module: 'traversal' });
    this.now = deps.now ?? Date.now;
  }

  /**
   * Run one bounded traversal from `seeds`
   *
   * Resolves with status 'cancelled' when the signal is observed at an
   * iteration boundary.
   *
   * @throws {CollaboratorUnavailableError} on systemic collaborator failure
   */
  async run(
    seeds: readonly ImageId[],
    config: AnalysisConfig,
    options: TraversalRunOptions
  ): Promise<TraversalOutcome> {
    const startedAt = this.now();
    const builder = new GraphBuilder();
    const frontier = new Frontier(config.maxQueueSize);
    const guards: Guards = {
      retrieval: this.guard('retrieval'),
      verification: this.guard('verification'),
      descriptors: this.guard('descriptors'),
    };
    const state: RunState = {
      imagesProcessed: 0,
      verificationsAttempted: 0,
      verificationFailures: 0,
      retrievalFailures: 0,
      currentDepth: 0,
      truncated: null,
      droppedFailures: 0,
      failures: [],
      verifiedPairs: new Set(),
      unreadable: new Map(),
      countedUnreadable: new Set(),
    };

    const snapshot = (): ProgressCounters => ({
      imagesProcessed: state.imagesProcessed,
      matchedPairs: builder.edgeCount,
      imagesEnqueued: frontier.enqueuedCount,
      verificationsAttempted: state.verificationsAttempted,
      verificationFailures: state.verificationFailures,
      retrievalFailures: state.retrievalFailures,
      currentDepth: state.currentDepth,
      elapsedMs: this.now() - startedAt,
    });

    for (const seed of seeds) {
      builder.markQuery(seed);
      if (!frontier.enqueue(seed, 0)) {
        state.truncated = 'queue_cap';
      }
    }

    this.log.info('Traversal started', {
      owner: options.owner,
      seeds: seeds.length,
      maxDepth: config.maxDepth,
      maxQueueSize: config.maxQueueSize,
    });

    let status: TraversalOutcome['status'] = 'completed';

    while (!frontier.isEmpty) {
      if (options.signal?.aborted) {
        status = 'cancelled';
        break;
      }
      if (config.timeBudgetMs > 0 && this.now() - startedAt >= config.timeBudgetMs) {
        state.truncated = 'time_budget';
        break;
      }

      const entry = frontier.dequeue();
      if (!entry) break;
      state.currentDepth = entry.depth;

      await this.expand(entry, config, options, builder, frontier, guards, state);

      state.imagesProcessed++;
      this.emitProgress(options, snapshot());
    }

    const progress = snapshot();
    this.log.info('Traversal finished', {
      owner: options.owner,
      status,
      truncated: state.truncated,
      nodes: builder.nodeCount,
      edges: builder.edgeCount,
      imagesProcessed: progress.imagesProcessed,
      elapsedMs: progress.elapsedMs,
    });

    return {
      status,
      graph: builder.snapshot(),
      truncated: state.truncated,
      progress,
      failures: state.failures,
      droppedFailures: state.droppedFailures,
    };
  }

  /**
   * Retrieve, verify and apply candidates for one frontier entry
   */
  private async expand(
    entry: FrontierEntry,
    config: AnalysisConfig,
    options: TraversalRunOptions,
    builder: GraphBuilder,
    frontier: Frontier,
    guards: Guards,
    state: RunState
  ): Promise<void> {
    const { imageId, depth } = entry;

    let candidates: readonly RetrievalCandidate[];
    try {
      candidates = await this.retrieve(imageId, depth, config, options, guards.retrieval);
      guards.retrieval.recordSuccess();
    } catch (error) {
      state.retrievalFailures++;
      this.recordFailure(state, {
        stage: 'retrieval',
        imageA: imageId,
        imageB: null,
        reason: describeError(error),
        depth,
      });
      this.log.warn('Retrieval failed', { imageId, depth, error: describeError(error) });
      guards.retrieval.recordFailure(error);
      if (guards.retrieval.isUnavailable) {
        throw guards.retrieval.unavailableError();
      }
      return;
    }

    // Pairs to verify, in candidate order
    const pending: ImageId[] = [];
    for (const candidate of candidates) {
      if (candidate.imageId === imageId) continue;
      const key = pairKey(imageId, candidate.imageId);
      if (state.verifiedPairs.has(key)) continue;
      state.verifiedPairs.add(key);
      pending.push(candidate.imageId);
    }

    state.verificationsAttempted += pending.length;

    const outcomes = await mapWithConcurrency(
      pending,
      config.verificationConcurrency,
      (candidate) => this.verifyPair(imageId, candidate, config, options, guards, state)
    );

    for (const outcome of outcomes) {
      if (outcome.kind === 'descriptor_failed') {
        this.recordPairFailure(state, imageId, outcome.candidate, 'descriptor', outcome.error, depth);
        if (!state.countedUnreadable.has(outcome.image)) {
          state.countedUnreadable.add(outcome.image);
          guards.descriptors.recordFailure(outcome.error);
        }
        if (guards.descriptors.isUnavailable) {
          throw guards.descriptors.unavailableError();
        }
        continue;
      }

      guards.descriptors.recordSuccess();

      if (outcome.kind === 'verification_failed') {
        this.recordPairFailure(state, imageId, outcome.candidate, 'verification', outcome.error, depth);
        guards.verification.recordFailure(outcome.error);
        if (guards.verification.isUnavailable) {
          throw guards.verification.unavailableError();
        }
        continue;
      }

      guards.verification.recordSuccess();
      if (outcome.kind === 'rejected') continue;

      const candidate = outcome.candidate;
      builder.addNode(candidate, depth + 1);
      builder.addEdge(imageId, candidate, clamp01(outcome.sharedArea), {
        sharedArea: outcome.sharedArea,
        keypointCount: outcome.keypointCount,
        isFlipped: outcome.isFlipped,
        variant: config.descriptorVariant,
        depth,
      });

      const depthAllows = config.maxDepth === 0 || depth < config.maxDepth;
      if (depthAllows && !frontier.hasSeen(candidate)) {
        if (!frontier.enqueue(candidate, depth + 1)) {
          state.truncated = state.truncated ?? 'queue_cap';
        }
      }
    }
  }

  private async retrieve(
    imageId: ImageId,
    depth: number,
    config: AnalysisConfig,
    options: TraversalRunOptions,
    guard: CollaboratorGuard
  ): Promise<readonly RetrievalCandidate[]> {
    const labelFilter = config.sameLabelOnly ? await this.labelsOf(imageId) : undefined;
    const ownerIds =
      config.searchScope === 'owner' ? [options.owner] : config.scopeOwners;

    return guard.call(() =>
      this.deps.collaborators.retrieval.retrieveSimilar({
        imageId,
        topK: depth === 0 ? config.topK : config.expansionTopK,
        ...(labelFilter !== undefined && { labelFilter }),
        ...(ownerIds !== undefined && { ownerIds }),
      })
    );
  }

  private async labelsOf(imageId: ImageId): Promise<readonly string[]> {
    const catalog = this.deps.collaborators.catalog;
    if (!catalog) {
      return [];
    }
    const metadata = await catalog.describe(imageId);
    return metadata?.labels ?? [];
  }

  /**
   * Descriptors for both images, then verification. Never throws.
   */
  private async verifyPair(
    imageId: ImageId,
    candidate: ImageId,
    config: AnalysisConfig,
    options: TraversalRunOptions,
    guards: Guards,
    state: RunState
  ): Promise<PairOutcome> {
    const owner = config.searchScope === 'owner' ? options.owner : undefined;

    const a = await this.descriptor(imageId, config, owner, guards.descriptors, state);
    if (!a.ok) {
      return { kind: 'descriptor_failed', candidate, image: imageId, error: a.error };
    }
    const b = await this.descriptor(candidate, config, owner, guards.descriptors, state);
    if (!b.ok) {
      return { kind: 'descriptor_failed', candidate, image: candidate, error: b.error };
    }

    try {
      const match = await guards.verification.call(() =>
        this.deps.collaborators.verification.verifyMatch({
          imageA: imageId,
          imageB: candidate,
          variant: config.descriptorVariant,
          checkFlip: config.checkFlip,
          descriptors: { a: a.blob, b: b.blob },
        })
      );

      const accepted =
        match.accepted &&
        match.sharedArea >= config.minArea &&
        match.keypointCount >= config.minKeypoints;

      if (!accepted) {
        return { kind: 'rejected', candidate };
      }
      return {
        kind: 'accepted',
        candidate,
        sharedArea: match.sharedArea,
        keypointCount: match.keypointCount,
        isFlipped: match.isFlipped,
      };
    } catch (error) {
      return { kind: 'verification_failed', candidate, error: rootError(error) };
    }
  }

  private async descriptor(
    imageId: ImageId,
    config: AnalysisConfig,
    owner: string | undefined,
    guard: CollaboratorGuard,
    state: RunState
  ): Promise<DescriptorResult> {
    const known = state.unreadable.get(imageId);
    if (known) {
      return { ok: false, error: known };
    }

    try {
      const blob = await guard.call(async () => {
        const lookup = await this.deps.descriptorCache.getOrCompute(
          imageId,
          config.descriptorVariant,
          owner !== undefined ? { owner } : {}
        );
        if (!lookup.success) {
          throw lookup.error;
        }
        return lookup.record.blob;
      });
      return { ok: true, blob };
    } catch (error) {
      const failure = state.unreadable.get(imageId) ?? rootError(error);
      state.unreadable.set(imageId, failure);
      return { ok: false, error: failure };
    }
  }

  private guard(name: string): CollaboratorGuard {
    return createCollaboratorGuard(name, this.resilience, this.deps.sleep);
  }

  private recordPairFailure(
    state: RunState,
    imageId: ImageId,
    candidate: ImageId,
    stage: 'descriptor' | 'verification',
    error: Error,
    depth: number
  ): void {
    state.verificationFailures++;
    const reason = describeError(error);
    const failure = new PerPairVerificationFailure(imageId, candidate, reason);
    this.recordFailure(state, { stage, imageA: imageId, imageB: candidate, reason, depth });
    this.log.warn(failure.message, { stage, depth });
  }

  private recordFailure(state: RunState, failure: RecordedFailure): void {
    if (state.failures.length < this.resilience.maxRecordedFailures) {
      state.failures.push(failure);
    } else {
      state.droppedFailures++;
    }
  }

  private emitProgress(options: TraversalRunOptions, progress: ProgressCounters): void {
    if (!options.onProgress) return;
    try {
      options.onProgress(progress);
    } catch (error) {
      this.log.error('Progress listener failed', { error: describeError(error) });
    }
  }
}

function clamp01(value: number): number {
  if (value < 0) return 0;
  if (value > 1) return 1;
  return value;
}
