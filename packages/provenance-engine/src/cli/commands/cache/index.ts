/**
 * Cache Commands
 *
 * @module cli/commands/cache
 */

export { runWarm, type WarmOptions, type WarmResult } from './warm.js';
export { runCleanup, parseDuration, type CleanupOptions, type CleanupResult } from './cleanup.js';
