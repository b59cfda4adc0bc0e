/**
 * Descriptor Cache
 *
 * Memoizes (image, variant) → feature descriptor across every analysis in
 * the process. This is the only mutable state shared between jobs.
 *
 * CONCURRENCY:
 * - Single-flight per key: one outstanding computation (or store read) per
 *   (image, variant); concurrent callers await the same promise.
 * - Unrelated keys proceed in parallel.
 * - Failures are returned as typed values, never stored, and never abort a
 *   precompute batch.
 */

import type { DescriptorVariant, ImageId } from '../core/types.js';
import type { DescriptorComputer, HealthStatus } from '../collaborators/types.js';
import {
  DescriptorComputationError,
  InvalidConfigError,
  describeError,
} from '../core/errors.js';
import { mapWithConcurrency } from '../core/utils/concurrency.js';
import { createLogger, type Logger } from '../core/utils/logger.js';
import {
  InMemoryDescriptorStore,
  descriptorKey,
  type DescriptorRecord,
  type DescriptorStore,
} from './descriptor-store.js';

// ============================================================================
// Types
// ============================================================================

export type DescriptorLookup =
  | { readonly success: true; readonly record: DescriptorRecord; readonly source: 'cache' | 'computed' }
  | { readonly success: false; readonly error: DescriptorComputationError };

export interface GetOrComputeOptions {
  /** Owner recorded on a newly computed record */
  readonly owner?: string;
}

export interface PrecomputeSummary {
  readonly computed: number;
  readonly cached: number;
  readonly failed: readonly { readonly imageId: ImageId; readonly reason: string }[];
}

export interface PrecomputeHandle {
  /** Distinct images scheduled */
  readonly requested: number;
  /** Resolves when every image has been attempted; never rejects */
  readonly done: Promise<PrecomputeSummary>;
}

export interface DescriptorCacheStats {
  readonly hits: number;
  readonly misses: number;
  readonly computations: number;
  readonly failures: number;
  readonly coalesced: number;
  readonly inFlight: number;
}

export interface DescriptorCacheOptions {
  readonly store?: DescriptorStore;
  /** Parallel computations per precompute batch (default: 4) */
  readonly precomputeConcurrency?: number;
  readonly now?: () => Date;
  readonly logger?: Logger;
}

// ============================================================================
// Descriptor Cache
// ============================================================================

export class DescriptorCache {
  private readonly computer: DescriptorComputer;
  private readonly store: DescriptorStore;
  private readonly precomputeConcurrency: number;
  private readonly now: () => Date;
  private readonly log: Logger;
  private readonly inFlight = new Map<string, Promise<DescriptorLookup>>();
  private counters = { hits: 0, misses: 0, computations: 0, failures: 0, coalesced: 0 };

  constructor(computer: DescriptorComputer, options: DescriptorCacheOptions = {}) {
    this.computer = computer;
    this.store = options.store ?? new InMemoryDescriptorStore();
    this.precomputeConcurrency = options.precomputeConcurrency ?? 4;
    this.now = options.now ?? (() => new Date());
    this.log = options.logger ?? createLogger({ module: 'descriptor-cache' });
  }

  /**
   * Return the cached descriptor, computing and storing it on a miss
   *
   * Concurrent calls for the same key share one computation.
   */
  getOrCompute(
    imageId: ImageId,
    variant: DescriptorVariant,
    options: GetOrComputeOptions = {}
  ): Promise<DescriptorLookup> {
    const key = descriptorKey(imageId, variant);
    const pending = this.inFlight.get(key);
    if (pending) {
      this.counters.coalesced++;
      return pending;
    }

    const lookup = this.lookup(imageId, variant, options).finally(() => {
      this.inFlight.delete(key);
    });
    this.inFlight.set(key, lookup);
    return lookup;
  }

  /**
   * Populate the cache in the background
   *
   * Returns immediately. Per-image failures are collected in the summary.
   */
  precompute(
    imageIds: readonly ImageId[],
    variant: DescriptorVariant,
    options: GetOrComputeOptions = {}
  ): PrecomputeHandle {
    const unique = [...new Set(imageIds)];

    const done = mapWithConcurrency(unique, this.precomputeConcurrency, async (imageId) => {
      try {
        const result = await this.getOrCompute(imageId, variant, options);
        return { imageId, result };
      } catch (error) {
        const failure = new DescriptorComputationError(imageId, describeError(error), error);
        return { imageId, result: { success: false as const, error: failure } };
      }
    }).then((outcomes): PrecomputeSummary => {
      let computed = 0;
      let cached = 0;
      const failed: { imageId: ImageId; reason: string }[] = [];

      for (const { imageId, result } of outcomes) {
        if (!result.success) {
          failed.push({ imageId, reason: result.error.reason });
        } else if (result.source === 'computed') {
          computed++;
        } else {
          cached++;
        }
      }

      this.log.info('Descriptor precompute finished', {
        variant,
        requested: unique.length,
        computed,
        cached,
        failed: failed.length,
      });

      return { computed, cached, failed };
    });

    return { requested: unique.length, done };
  }

  /**
   * Delete records older than `ageMs`, optionally only those of one owner
   *
   * @returns number of records removed
   */
  async evictOlderThan(ageMs: number, ownerFilter?: string): Promise<number> {
    if (!Number.isFinite(ageMs) || ageMs < 0) {
      throw new InvalidConfigError([
        { path: 'olderThan', message: 'must be a non-negative number of milliseconds' },
      ]);
    }

    const cutoff = new Date(this.now().getTime() - ageMs);
    const removed = await this.store.deleteOlderThan(cutoff, ownerFilter);

    this.log.info('Descriptor cache cleanup', {
      cutoff: cutoff.toISOString(),
      owner: ownerFilter ?? null,
      removed,
    });

    return removed;
  }

  stats(): DescriptorCacheStats {
    return { ...this.counters, inFlight: this.inFlight.size };
  }

  /**
   * Health of the descriptor computer, or null when it has no health check
   */
  async computerHealth(): Promise<HealthStatus | null> {
    return this.computer.health ? this.computer.health() : null;
  }

  private async lookup(
    imageId: ImageId,
    variant: DescriptorVariant,
    options: GetOrComputeOptions
  ): Promise<DescriptorLookup> {
    const existing = await this.store.get(imageId, variant);
    if (existing) {
      this.counters.hits++;
      return { success: true, record: existing, source: 'cache' };
    }

    this.counters.misses++;
    this.counters.computations++;

    let blob: Uint8Array;
    try {
      blob = await this.computer.computeDescriptor(imageId, variant);
    } catch (error) {
      this.counters.failures++;
      const failure = new DescriptorComputationError(imageId, describeError(error), error);
      this.log.warn('Descriptor computation failed', { imageId, variant, error: failure.reason });
      return { success: false, error: failure };
    }

    const record: DescriptorRecord = {
      imageId,
      variant,
      owner: options.owner ?? null,
      blob,
      createdAt: this.now(),
    };
    await this.store.put(record);

    return { success: true, record, source: 'computed' };
  }
}
