/**
 * Provenance Engine Configuration
 *
 * Process-level settings for the engine: persistence, worker pool, job
 * retention, descriptor cache, collaborator resilience and endpoints.
 * Per-analysis options (depth, caps, thresholds) are not here; they are the
 * closed record validated in validation/analysis-config.ts.
 *
 * TYPE SAFETY: All configuration is strongly typed and immutable.
 */

// ============================================================================
// Engine Configuration
// ============================================================================

/**
 * External collaborator endpoint
 */
export interface ServiceEndpoint {
  readonly baseUrl: string;
  readonly timeoutMs: number;
}

export interface EngineConfig {
  /** Persistence configuration */
  readonly persistence: {
    /** Use SQLite instead of in-memory stores */
    readonly enabled: boolean;
    /** Path to SQLite database file, or ':memory:' */
    readonly databasePath: string;
    /** Run migrations on startup */
    readonly autoMigrate: boolean;
  };

  /** Job worker pool */
  readonly workers: {
    /** Jobs processing at the same time */
    readonly maxConcurrentJobs: number;
    /** Persist progress every N traversal iterations */
    readonly progressFlushInterval: number;
  };

  /** Terminal job retention */
  readonly retention: {
    readonly jobRetentionDays: number;
  };

  /** Descriptor cache */
  readonly cache: {
    /** Parallel computations per precompute batch */
    readonly precomputeConcurrency: number;
  };

  /** Collaborator resilience */
  readonly resilience: {
    /** Consecutive failures of one collaborator that fail the job */
    readonly maxConsecutiveFailures: number;
    /** Attempts per collaborator call (1 = no retry) */
    readonly retryAttempts: number;
    readonly retryInitialDelayMs: number;
    readonly retryMaxDelayMs: number;
    /** Recorded per-pair failures kept on a job result */
    readonly maxRecordedFailures: number;
  };

  /** Collaborator endpoints for the HTTP clients */
  readonly services: {
    readonly retrieval: ServiceEndpoint;
    readonly verification: ServiceEndpoint;
    readonly descriptors: ServiceEndpoint;
  };
}

/**
 * Default engine configuration
 */
export const DEFAULT_CONFIG: EngineConfig = {
  persistence: {
    enabled: false,
    databasePath: '.provenance/provenance.db',
    autoMigrate: true,
  },
  workers: {
    maxConcurrentJobs: 2,
    progressFlushInterval: 10,
  },
  retention: {
    jobRetentionDays: 30,
  },
  cache: {
    precomputeConcurrency: 4,
  },
  resilience: {
    maxConsecutiveFailures: 5,
    retryAttempts: 2,
    retryInitialDelayMs: 200,
    retryMaxDelayMs: 5000,
    maxRecordedFailures: 200,
  },
  services: {
    retrieval: { baseUrl: 'http://localhost:8001', timeoutMs: 60_000 },
    verification: { baseUrl: 'http://localhost:8002', timeoutMs: 120_000 },
    descriptors: { baseUrl: 'http://localhost:8002', timeoutMs: 120_000 },
  },
};

/**
 * Partial configuration accepted by createConfig
 */
export interface EngineConfigOverrides {
  readonly persistence?: Partial<EngineConfig['persistence']>;
  readonly workers?: Partial<EngineConfig['workers']>;
  readonly retention?: Partial<EngineConfig['retention']>;
  readonly cache?: Partial<EngineConfig['cache']>;
  readonly resilience?: Partial<EngineConfig['resilience']>;
  readonly services?: {
    readonly retrieval?: Partial<ServiceEndpoint>;
    readonly verification?: Partial<ServiceEndpoint>;
    readonly descriptors?: Partial<ServiceEndpoint>;
  };
}

/**
 * Create configuration with overrides
 *
 * @param overrides - Partial configuration to merge with defaults
 * @returns Complete configuration
 */
export function createConfig(overrides: EngineConfigOverrides = {}): EngineConfig {
  return {
    persistence: { ...DEFAULT_CONFIG.persistence, ...overrides.persistence },
    workers: { ...DEFAULT_CONFIG.workers, ...overrides.workers },
    retention: { ...DEFAULT_CONFIG.retention, ...overrides.retention },
    cache: { ...DEFAULT_CONFIG.cache, ...overrides.cache },
    resilience: { ...DEFAULT_CONFIG.resilience, ...overrides.resilience },
    services: {
      retrieval: { ...DEFAULT_CONFIG.services.retrieval, ...overrides.services?.retrieval },
      verification: {
        ...DEFAULT_CONFIG.services.verification,
        ...overrides.services?.verification,
      },
      descriptors: { ...DEFAULT_CONFIG.services.descriptors, ...overrides.services?.descriptors },
    },
  };
}

// ============================================================================
// Environment Overrides
// ============================================================================

type Env = Readonly<Record<string, string | undefined>>;

function envNumber(env: Env, name: string): number | undefined {
  const value = env[`PROVENANCE_${name}`];
  if (value === undefined) return undefined;
  const num = Number(value);
  return Number.isFinite(num) ? num : undefined;
}

function envString(env: Env, name: string): string | undefined {
  const value = env[`PROVENANCE_${name}`];
  return value === undefined || value === '' ? undefined : value;
}

function envBool(env: Env, name: string): boolean | undefined {
  const value = env[`PROVENANCE_${name}`];
  if (value === undefined) return undefined;
  return value.toLowerCase() === 'true' || value === '1';
}

/**
 * Read PROVENANCE_* environment variables into overrides
 *
 * Recognized: DB_PATH, PERSISTENCE, MAX_CONCURRENT_JOBS, RETENTION_DAYS,
 * MAX_CONSECUTIVE_FAILURES, RETRY_ATTEMPTS, RETRIEVAL_URL, VERIFICATION_URL,
 * DESCRIPTOR_URL.
 */
export function configOverridesFromEnv(env: Env = process.env): EngineConfigOverrides {
  const dbPath = envString(env, 'DB_PATH');
  const persistence = envBool(env, 'PERSISTENCE');
  const maxConcurrentJobs = envNumber(env, 'MAX_CONCURRENT_JOBS');
  const retentionDays = envNumber(env, 'RETENTION_DAYS');
  const maxConsecutiveFailures = envNumber(env, 'MAX_CONSECUTIVE_FAILURES');
  const retryAttempts = envNumber(env, 'RETRY_ATTEMPTS');
  const retrievalUrl = envString(env, 'RETRIEVAL_URL');
  const verificationUrl = envString(env, 'VERIFICATION_URL');
  const descriptorUrl = envString(env, 'DESCRIPTOR_URL');

  return {
    persistence: {
      ...(persistence !== undefined && { enabled: persistence }),
      ...(dbPath !== undefined && { databasePath: dbPath, enabled: persistence ?? true }),
    },
    workers: {
      ...(maxConcurrentJobs !== undefined && { maxConcurrentJobs }),
    },
    retention: {
      ...(retentionDays !== undefined && { jobRetentionDays: retentionDays }),
    },
    resilience: {
      ...(maxConsecutiveFailures !== undefined && { maxConsecutiveFailures }),
      ...(retryAttempts !== undefined && { retryAttempts }),
    },
    services: {
      retrieval: retrievalUrl !== undefined ? { baseUrl: retrievalUrl } : {},
      verification: verificationUrl !== undefined ? { baseUrl: verificationUrl } : {},
      descriptors: descriptorUrl !== undefined ? { baseUrl: descriptorUrl } : {},
    },
  };
}

/**
 * Defaults, then environment
 */
export function loadEngineConfig(env: Env = process.env): EngineConfig {
  return createConfig(configOverridesFromEnv(env));
}
