/**
 * Jobs Commands
 *
 * @module cli/commands/jobs
 */

export { runList, type ListOptions, type ListResult } from './list.js';
export { runStatus, describeJob, type StatusResult } from './status.js';
export { runCancel, type CancelResult } from './cancel.js';
export { runPurge, type PurgeResult } from './purge.js';
