/**
 * Provenance Engine CLI
 *
 * @module cli
 */

export { loadConfig, type CLIConfig, type LoadConfigOptions } from './lib/config.js';
export { CLILogger, createCLILogger, type LogSink } from './lib/logger.js';
export { createCommandContext, type CommandContext } from './lib/context.js';
export * from './commands/index.js';
export { createProgram, EXIT_CODES, type ExitCode, type ProgramOptions } from './program.js';

