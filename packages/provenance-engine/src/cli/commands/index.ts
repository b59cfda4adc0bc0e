/**
 * CLI Commands
 *
 * @module cli/commands
 */

export { runAnalyze, parseSeedList, type AnalyzeOptions, type AnalyzeResult } from './analyze.js';
export * from './jobs/index.js';
export * from './cache/index.js';
export { runHealth, formatReport, type HealthResult } from './health.js';
