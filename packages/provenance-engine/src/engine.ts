/**
 * Engine wiring
 *
 * Builds a ready-to-use orchestrator from an EngineConfig: HTTP
 * collaborators, the shared descriptor cache, and either in-memory or
 * SQLite-backed stores.
 *
 * @example
 * ```typescript
 * const engine = await createProvenanceEngine(loadEngineConfig());
 * const jobId = await engine.orchestrator.submit(['img-1'], { maxDepth: 2 }, principal);
 * await engine.orchestrator.waitForJob(jobId);
 * await engine.close();
 * ```
 */

import type { EngineConfig } from './core/config.js';
import { createLogger, type Logger } from './core/utils/logger.js';
import { DescriptorCache } from './cache/descriptor-cache.js';
import type { DescriptorStore } from './cache/descriptor-store.js';
import type { CollaboratorSet, DescriptorComputer, ImageCatalog } from './collaborators/types.js';
import {
  HttpDescriptorClient,
  HttpRetrievalClient,
  HttpVerificationClient,
} from './collaborators/http-clients.js';
import { AnalysisOrchestrator } from './services/analysis-orchestrator.js';
import type { JobStore } from './services/job-state-store.js';
import { createSQLiteAdapter } from './persistence/adapters/factory.js';
import type { DatabaseAdapter } from './persistence/repository.js';
import { ProvenanceRepository } from './persistence/repository.js';
import { SqliteDescriptorStore, SqliteJobStore } from './persistence/sqlite-stores.js';

export interface ProvenanceEngine {
  readonly config: EngineConfig;
  readonly orchestrator: AnalysisOrchestrator;
  readonly descriptorCache: DescriptorCache;
  /** Wait for running jobs, then release the database */
  close(): Promise<void>;
}

export interface CreateEngineOptions {
  /** Replace the HTTP collaborators (tests, embedding) */
  readonly collaborators?: CollaboratorSet;
  readonly descriptorComputer?: DescriptorComputer;
  readonly catalog?: ImageCatalog;
  readonly logger?: Logger;
}

export async function createProvenanceEngine(
  config: EngineConfig,
  options: CreateEngineOptions = {}
): Promise<ProvenanceEngine> {
  const log = options.logger ?? createLogger({ module: 'engine' });

  const baseCollaborators: CollaboratorSet = options.collaborators ?? {
    retrieval: new HttpRetrievalClient(config.services.retrieval),
    verification: new HttpVerificationClient(config.services.verification),
  };
  const catalog = options.catalog ?? baseCollaborators.catalog;
  const collaborators: CollaboratorSet = {
    retrieval: baseCollaborators.retrieval,
    verification: baseCollaborators.verification,
    ...(catalog !== undefined && { catalog }),
  };
  const computer = options.descriptorComputer ?? new HttpDescriptorClient(config.services.descriptors);

  let adapter: DatabaseAdapter | null = null;
  let jobStore: JobStore | undefined;
  let descriptorStore: DescriptorStore | undefined;

  if (config.persistence.enabled) {
    adapter = await createSQLiteAdapter({
      type: 'sqlite',
      url: config.persistence.databasePath,
      autoMigrate: config.persistence.autoMigrate,
    });
    const repository = new ProvenanceRepository(adapter);
    jobStore = new SqliteJobStore(repository);
    descriptorStore = new SqliteDescriptorStore(repository);
  }

  const descriptorCache = new DescriptorCache(computer, {
    precomputeConcurrency: config.cache.precomputeConcurrency,
    logger: log.child({ module: 'descriptor-cache' }),
    ...(descriptorStore !== undefined && { store: descriptorStore }),
  });

  const orchestrator = new AnalysisOrchestrator({
    collaborators,
    descriptorCache,
    config,
    logger: log.child({ module: 'orchestrator' }),
    ...(jobStore !== undefined && { jobStore }),
  });

  log.debug('Engine created', {
    persistence: config.persistence.enabled ? config.persistence.databasePath : 'memory',
    maxConcurrentJobs: config.workers.maxConcurrentJobs,
  });

  return {
    config,
    orchestrator,
    descriptorCache,
    async close(): Promise<void> {
      await orchestrator.shutdown();
      if (adapter) {
        await adapter.close();
      }
    },
  };
}
