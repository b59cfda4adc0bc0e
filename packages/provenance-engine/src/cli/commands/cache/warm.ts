/**
 * Cache Warm Command
 *
 * Computes descriptors for a batch of images ahead of analysis. Per-image
 * failures are reported; they do not stop the batch.
 *
 * USAGE:
 *   provenance-engine cache warm <imageId...> [--variant cv_rsift]
 *
 * @module cli/commands/cache/warm
 */

import type { DescriptorVariant, ImageId } from '../../../core/types.js';
import { describeError } from '../../../core/errors.js';
import type { PrecomputeSummary } from '../../../cache/descriptor-cache.js';
import type { CommandContext } from '../../lib/context.js';

export interface WarmOptions {
  readonly images: readonly ImageId[];
  readonly variant: DescriptorVariant;
}

export interface WarmResult {
  readonly success: boolean;
  readonly summary?: PrecomputeSummary;
  readonly error?: string;
}

export async function runWarm(ctx: CommandContext, options: WarmOptions): Promise<WarmResult> {
  ctx.logger.commandStart('cache warm', { images: options.images.length, variant: options.variant });
  try {
    const { descriptorCache } = await ctx.engine();
    const handle = descriptorCache.precompute(options.images, options.variant, {
      owner: ctx.principal.id,
    });
    ctx.logger.info('Precompute scheduled', { requested: handle.requested });

    const summary = await handle.done;
    ctx.logger.output(summary, () => [
      `Computed: ${summary.computed}`,
      `Cached:   ${summary.cached}`,
      `Failed:   ${summary.failed.length}`,
      ...summary.failed.map((failure) => `  [FAIL] ${failure.imageId}: ${failure.reason}`),
    ]);

    const success = summary.failed.length === 0;
    ctx.logger.commandEnd(success, { computed: summary.computed, failed: summary.failed.length });
    return { success, summary };
  } catch (error) {
    const message = describeError(error);
    ctx.logger.error(message);
    ctx.logger.commandEnd(false);
    return { success: false, error: message };
  }
}
