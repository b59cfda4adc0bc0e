/**
 * Command context
 *
 * What every command receives: merged configuration, the CLI logger, the
 * principal the CLI acts as, and a lazily created engine.
 *
 * @module cli/lib/context
 */

import type { Principal } from '../../core/types.js';
import {
  createProvenanceEngine,
  type CreateEngineOptions,
  type ProvenanceEngine,
} from '../../engine.js';
import type { CLIConfig } from './config.js';
import type { CLILogger } from './logger.js';

export interface CommandContext {
  readonly config: CLIConfig;
  readonly logger: CLILogger;
  readonly principal: Principal;
  /** Created on first use; commands that never touch it open nothing */
  engine(): Promise<ProvenanceEngine>;
  /** Release the engine if one was created */
  close(): Promise<void>;
}

export function createCommandContext(
  config: CLIConfig,
  logger: CLILogger,
  engineOptions: CreateEngineOptions = {}
): CommandContext {
  let engine: Promise<ProvenanceEngine> | null = null;

  return {
    config,
    logger,
    principal: { id: config.owner, isAdmin: config.admin },
    engine(): Promise<ProvenanceEngine> {
      engine ??= createProvenanceEngine(config.engine, engineOptions);
      return engine;
    },
    async close(): Promise<void> {
      if (engine) {
        await (await engine).close();
      }
    },
  };
}
