/**
 * Cache Cleanup Command
 *
 * Evicts descriptors older than a given age. Admin only.
 *
 * USAGE:
 *   provenance-engine --admin cache cleanup --older-than 30d [--owner <id>]
 *
 * @module cli/commands/cache/cleanup
 */

import { InvalidConfigError, describeError } from '../../../core/errors.js';
import type { CommandContext } from '../../lib/context.js';

export interface CleanupOptions {
  /** Age like "30d", "12h", "15m", "45s", or plain milliseconds */
  readonly olderThan: string;
  readonly owner?: string;
}

export interface CleanupResult {
  readonly success: boolean;
  readonly removed?: number;
  readonly error?: string;
}

const UNIT_MS: Record<string, number> = {
  ms: 1,
  s: 1000,
  m: 60 * 1000,
  h: 60 * 60 * 1000,
  d: 24 * 60 * 60 * 1000,
};

/**
 * @throws {InvalidConfigError} for anything that is not a non-negative duration
 */
export function parseDuration(value: string): number {
  const match = /^(\d+(?:\.\d+)?)(ms|s|m|h|d)?$/.exec(value.trim());
  const amount = match?.[1];
  if (!match || amount === undefined) {
    throw new InvalidConfigError([
      { path: 'olderThan', message: `not a duration: "${value}" (examples: 30d, 12h, 5000)` },
    ]);
  }
  return Number(amount) * (UNIT_MS[match[2] ?? 'ms'] ?? 1);
}

export async function runCleanup(ctx: CommandContext, options: CleanupOptions): Promise<CleanupResult> {
  ctx.logger.commandStart('cache cleanup', { ...options });
  try {
    const olderThanMs = parseDuration(options.olderThan);
    const { orchestrator } = await ctx.engine();
    const removed = await orchestrator.cleanupDescriptorCache(olderThanMs, ctx.principal, options.owner);

    ctx.logger.output({ removed }, () => [`Removed ${removed} descriptor(s)`]);
    ctx.logger.commandEnd(true, { removed });
    return { success: true, removed };
  } catch (error) {
    const message = describeError(error);
    ctx.logger.error(message);
    ctx.logger.commandEnd(false);
    return { success: false, error: message };
  }
}
