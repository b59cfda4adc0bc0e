/**
 * Image Provenance Engine
 *
 * Given seed images, discovers related images through a retrieval service,
 * confirms each pair with geometric verification, and returns the verified
 * match graph together with its maximum-weight spanning forest and
 * connected components.
 *
 * Analyses run as asynchronous jobs. Progress is polled; cancellation is
 * cooperative and takes effect at the next traversal iteration, so one
 * in-flight expansion always completes.
 *
 * @packageDocumentation
 */

// Engine wiring
export {
  createProvenanceEngine,
  type ProvenanceEngine,
  type CreateEngineOptions,
} from './engine.js';

// Orchestration
export {
  AnalysisOrchestrator,
  type OrchestratorDependencies,
} from './services/analysis-orchestrator.js';
export {
  TERMINAL_STATUSES,
  isTerminal,
  type JobStatus,
  type AnalysisJob,
  type JobStatusView,
  type JobSummary,
  type ListJobsOptions,
  type OrchestratorHealth,
  type RecoverySummary,
} from './services/analysis-orchestrator.types.js';
export { InMemoryJobStore, type JobStore } from './services/job-state-store.js';

// Traversal and graph
export { TraversalEngine } from './traversal/traversal-engine.js';
export type {
  TraversalDependencies,
  TraversalOutcome,
  TraversalResilience,
  TraversalRunOptions,
} from './traversal/types.js';
export { GraphBuilder, type AddEdgeOutcome } from './graph/graph-builder.js';
export { summarize, connectedComponents } from './graph/graph-summarizer.js';
export { DisjointSet } from './graph/disjoint-set.js';

// Descriptor cache
export {
  DescriptorCache,
  type DescriptorLookup,
  type DescriptorCacheOptions,
  type DescriptorCacheStats,
  type PrecomputeHandle,
  type PrecomputeSummary,
} from './cache/descriptor-cache.js';
export {
  InMemoryDescriptorStore,
  type DescriptorRecord,
  type DescriptorStore,
} from './cache/descriptor-store.js';

// Collaborators
export type {
  CollaboratorSet,
  DescriptorComputer,
  HealthStatus,
  ImageCatalog,
  ImageMetadata,
  MatchResult,
  RetrievalCandidate,
  RetrievalCollaborator,
  RetrievalRequest,
  VerificationCollaborator,
  VerificationRequest,
} from './collaborators/types.js';
export {
  HttpRetrievalClient,
  HttpVerificationClient,
  HttpDescriptorClient,
  CollaboratorResponseError,
} from './collaborators/http-clients.js';

// Validation
export {
  AnalysisConfigSchema,
  parseAnalysisConfig,
  parseSeeds,
  type AnalysisConfig,
  type AnalysisConfigInput,
} from './validation/analysis-config.js';

// Persistence
export { SQLiteAdapter } from './persistence/adapters/sqlite.js';
export { createSQLiteAdapter, parseDatabaseUrl, type AdapterConfig } from './persistence/adapters/factory.js';
export { ProvenanceRepository, type DatabaseAdapter } from './persistence/repository.js';
export { SqliteJobStore, SqliteDescriptorStore } from './persistence/sqlite-stores.js';

// Configuration, errors, logging
export {
  DEFAULT_CONFIG,
  createConfig,
  loadEngineConfig,
  type EngineConfig,
  type EngineConfigOverrides,
  type ServiceEndpoint,
} from './core/config.js';
export {
  ProvenanceError,
  InvalidConfigError,
  ForbiddenError,
  NotFoundError,
  CollaboratorUnavailableError,
  PerPairVerificationFailure,
  DescriptorComputationError,
  CancelledError,
  JobConflictError,
  InvariantViolationError,
  type ProvenanceErrorCode,
  type ConfigIssue,
} from './core/errors.js';
export { Logger, createLogger, type LogLevel } from './core/utils/logger.js';

export type {
  AnalysisResult,
  DescriptorVariant,
  Edge,
  Graph,
  GraphNode,
  GraphSummary,
  ImageId,
  Principal,
  ProgressCounters,
  RecordedFailure,
  SearchScope,
  TruncationReason,
} from './core/types.js';
export { DESCRIPTOR_VARIANTS, DEFAULT_DESCRIPTOR_VARIANT, EMPTY_PROGRESS } from './core/types.js';
