/**
 * CLI Configuration Management
 *
 * Loads configuration from .provenancerc (YAML or JSON) with environment
 * variable overrides and the engine defaults.
 *
 * Configuration precedence (highest to lowest):
 * 1. Command-line options
 * 2. Environment variables (PROVENANCE_*)
 * 3. Config file (.provenancerc or --config path)
 * 4. Default values
 *
 * @module cli/lib/config
 */

import { readFileSync, existsSync } from 'node:fs';
import { join, resolve } from 'node:path';
import { parse as parseYaml } from 'yaml';
import { z } from 'zod';
import {
  configOverridesFromEnv,
  createConfig,
  type EngineConfig,
  type EngineConfigOverrides,
} from '../../core/config.js';
import { InvalidConfigError } from '../../core/errors.js';
import { toIssues } from '../../validation/analysis-config.js';

// ============================================================================
// Configuration Types
// ============================================================================

/**
 * Full CLI configuration
 */
export interface CLIConfig {
  /** Engine settings after every layer is applied */
  readonly engine: EngineConfig;
  /** Principal the CLI acts as */
  readonly owner: string;
  readonly admin: boolean;

  // Runtime overrides (from CLI flags)
  readonly verbose: boolean;
  readonly json: boolean;
  /** Resolved config file path */
  readonly configPath: string | null;
}

const EndpointSchema = z
  .object({
    base_url: z.string().url().optional(),
    timeout_ms: z.number().int().positive().optional(),
  })
  .strict();

/**
 * Config file structure
 */
const ConfigFileSchema = z
  .object({
    version: z.literal(1).optional(),
    owner: z.string().min(1).optional(),
    admin: z.boolean().optional(),
    persistence: z
      .object({
        enabled: z.boolean().optional(),
        database_path: z.string().min(1).optional(),
        auto_migrate: z.boolean().optional(),
      })
      .strict()
      .optional(),
    workers: z
      .object({
        max_concurrent_jobs: z.number().int().min(1).max(64).optional(),
        progress_flush_interval: z.number().int().min(1).optional(),
      })
      .strict()
      .optional(),
    retention: z
      .object({ job_retention_days: z.number().min(0).optional() })
      .strict()
      .optional(),
    cache: z
      .object({ precompute_concurrency: z.number().int().min(1).max(64).optional() })
      .strict()
      .optional(),
    resilience: z
      .object({
        max_consecutive_failures: z.number().int().min(1).optional(),
        retry_attempts: z.number().int().min(1).max(10).optional(),
        retry_initial_delay_ms: z.number().int().min(0).optional(),
        retry_max_delay_ms: z.number().int().min(0).optional(),
        max_recorded_failures: z.number().int().min(0).optional(),
      })
      .strict()
      .optional(),
    services: z
      .object({
        retrieval: EndpointSchema.optional(),
        verification: EndpointSchema.optional(),
        descriptors: EndpointSchema.optional(),
      })
      .strict()
      .optional(),
  })
  .strict();

export type ConfigFile = z.infer<typeof ConfigFileSchema>;

// ============================================================================
// Configuration Loading
// ============================================================================

/**
 * Standard config file names to search for
 */
const CONFIG_FILE_NAMES = [
  '.provenancerc',
  '.provenancerc.yaml',
  '.provenancerc.yml',
  '.provenancerc.json',
];

/**
 * Find config file in the given directory or its parents
 */
export function findConfigFile(startDir: string): string | null {
  let dir = resolve(startDir);

  for (;;) {
    for (const fileName of CONFIG_FILE_NAMES) {
      const filePath = join(dir, fileName);
      if (existsSync(filePath)) {
        return filePath;
      }
    }
    const parent = resolve(dir, '..');
    if (parent === dir) return null;
    dir = parent;
  }
}

/**
 * Parse and validate config file content
 *
 * YAML is a superset of JSON, so one parser covers both.
 *
 * @throws {InvalidConfigError} when the file does not match the schema
 */
export function parseConfigFile(content: string): ConfigFile {
  const result = ConfigFileSchema.safeParse(parseYaml(content) ?? {});
  if (!result.success) {
    throw new InvalidConfigError(toIssues(result.error, '.provenancerc'));
  }
  return result.data;
}

/**
 * Map file settings onto engine overrides
 */
export function fileToOverrides(file: ConfigFile): EngineConfigOverrides {
  const endpoint = (value: z.infer<typeof EndpointSchema> | undefined) => ({
    ...(value?.base_url !== undefined && { baseUrl: value.base_url }),
    ...(value?.timeout_ms !== undefined && { timeoutMs: value.timeout_ms }),
  });

  return {
    persistence: {
      ...(file.persistence?.enabled !== undefined && { enabled: file.persistence.enabled }),
      ...(file.persistence?.database_path !== undefined && {
        databasePath: file.persistence.database_path,
      }),
      ...(file.persistence?.auto_migrate !== undefined && {
        autoMigrate: file.persistence.auto_migrate,
      }),
    },
    workers: {
      ...(file.workers?.max_concurrent_jobs !== undefined && {
        maxConcurrentJobs: file.workers.max_concurrent_jobs,
      }),
      ...(file.workers?.progress_flush_interval !== undefined && {
        progressFlushInterval: file.workers.progress_flush_interval,
      }),
    },
    retention: {
      ...(file.retention?.job_retention_days !== undefined && {
        jobRetentionDays: file.retention.job_retention_days,
      }),
    },
    cache: {
      ...(file.cache?.precompute_concurrency !== undefined && {
        precomputeConcurrency: file.cache.precompute_concurrency,
      }),
    },
    resilience: {
      ...(file.resilience?.max_consecutive_failures !== undefined && {
        maxConsecutiveFailures: file.resilience.max_consecutive_failures,
      }),
      ...(file.resilience?.retry_attempts !== undefined && {
        retryAttempts: file.resilience.retry_attempts,
      }),
      ...(file.resilience?.retry_initial_delay_ms !== undefined && {
        retryInitialDelayMs: file.resilience.retry_initial_delay_ms,
      }),
      ...(file.resilience?.retry_max_delay_ms !== undefined && {
        retryMaxDelayMs: file.resilience.retry_max_delay_ms,
      }),
      ...(file.resilience?.max_recorded_failures !== undefined && {
        maxRecordedFailures: file.resilience.max_recorded_failures,
      }),
    },
    services: {
      retrieval: endpoint(file.services?.retrieval),
      verification: endpoint(file.services?.verification),
      descriptors: endpoint(file.services?.descriptors),
    },
  };
}

/**
 * Layer `top` over `base`, section by section
 */
export function mergeOverrides(
  base: EngineConfigOverrides,
  top: EngineConfigOverrides
): EngineConfigOverrides {
  return {
    persistence: { ...base.persistence, ...top.persistence },
    workers: { ...base.workers, ...top.workers },
    retention: { ...base.retention, ...top.retention },
    cache: { ...base.cache, ...top.cache },
    resilience: { ...base.resilience, ...top.resilience },
    services: {
      retrieval: { ...base.services?.retrieval, ...top.services?.retrieval },
      verification: { ...base.services?.verification, ...top.services?.verification },
      descriptors: { ...base.services?.descriptors, ...top.services?.descriptors },
    },
  };
}

type Env = Readonly<Record<string, string | undefined>>;

function getEnvVar(env: Env, name: string): string | undefined {
  const value = env[`PROVENANCE_${name}`];
  return value === undefined || value === '' ? undefined : value;
}

function getEnvBool(env: Env, name: string): boolean | undefined {
  const value = getEnvVar(env, name);
  if (value === undefined) return undefined;
  return value.toLowerCase() === 'true' || value === '1';
}

/**
 * Load configuration options
 */
export interface LoadConfigOptions {
  /** Explicit config file path */
  configPath?: string;
  /** Directory to start the config file search from (default: cwd) */
  cwd?: string;
  env?: Env;
  /** CLI flag overrides */
  overrides?: {
    verbose?: boolean;
    json?: boolean;
    owner?: string;
    admin?: boolean;
    database?: string;
    concurrency?: number;
  };
}

/**
 * Load and merge configuration from all sources
 *
 * @throws {Error} when an explicit config file does not exist
 * @throws {InvalidConfigError} when the config file is invalid
 */
export function loadConfig(options: LoadConfigOptions = {}): CLIConfig {
  const env = options.env ?? process.env;
  let configPath: string | null = null;

  if (options.configPath) {
    configPath = resolve(options.configPath);
    if (!existsSync(configPath)) {
      throw new Error(`Config file not found: ${configPath}`);
    }
  } else {
    const envConfigPath = getEnvVar(env, 'CONFIG');
    if (envConfigPath) {
      const candidate = resolve(envConfigPath);
      configPath = existsSync(candidate) ? candidate : null;
    } else {
      configPath = findConfigFile(options.cwd ?? process.cwd());
    }
  }

  const file: ConfigFile = configPath ? parseConfigFile(readFileSync(configPath, 'utf-8')) : {};
  const flags = options.overrides ?? {};

  const flagOverrides: EngineConfigOverrides = {
    persistence: {
      ...(flags.database !== undefined && { enabled: true, databasePath: flags.database }),
    },
    workers: {
      ...(flags.concurrency !== undefined && { maxConcurrentJobs: flags.concurrency }),
    },
  };

  const engine = createConfig(
    mergeOverrides(mergeOverrides(fileToOverrides(file), configOverridesFromEnv(env)), flagOverrides)
  );

  return {
    engine,
    owner: flags.owner ?? getEnvVar(env, 'OWNER') ?? file.owner ?? 'local',
    admin: flags.admin ?? getEnvBool(env, 'ADMIN') ?? file.admin ?? false,
    verbose: flags.verbose ?? getEnvBool(env, 'VERBOSE') ?? false,
    json: flags.json ?? getEnvBool(env, 'JSON') ?? false,
    configPath,
  };
}
