/**
 * SQLite-backed stores
 *
 * JobStore and DescriptorStore over ProvenanceRepository. Dates become
 * ISO8601 strings; documents become JSON columns.
 */

import type { DescriptorVariant, ImageId } from '../core/types.js';
import type { DescriptorRecord, DescriptorStore } from '../cache/descriptor-store.js';
import type { JobStore } from '../services/job-state-store.js';
import type {
  AnalysisJob,
  JobQuery,
  JobStatus,
  JobUpdate,
} from '../services/analysis-orchestrator.types.js';
import { NotFoundError } from '../core/errors.js';
import { parseAnalysisConfig } from '../validation/analysis-config.js';
import { decodeJson, decodeProgress, decodeResult, decodeSeeds } from './codecs.js';
import type { ProvenanceRepository } from './repository.js';
import { asJobId, type JobRow } from './schema.types.js';

// ============================================================================
// Job Store
// ============================================================================

export class SqliteJobStore implements JobStore {
  constructor(private readonly repository: ProvenanceRepository) {}

  async create(job: AnalysisJob): Promise<void> {
    await this.repository.createJob({
      id: asJobId(job.jobId),
      owner: job.owner,
      status: job.status,
      seeds_json: JSON.stringify(job.seeds),
      config_json: JSON.stringify(job.config),
      progress_json: JSON.stringify(job.progress),
      result_json: job.result ? JSON.stringify(job.result) : null,
      error: job.error,
      created_at: job.createdAt.toISOString(),
      updated_at: job.updatedAt.toISOString(),
      started_at: toIso(job.startedAt),
      completed_at: toIso(job.completedAt),
      expires_at: toIso(job.expiresAt),
    });
  }

  async get(jobId: string): Promise<AnalysisJob | null> {
    const row = await this.repository.getJob(asJobId(jobId));
    return row ? rowToJob(row) : null;
  }

  async update(jobId: string, update: JobUpdate): Promise<AnalysisJob> {
    const row = await this.repository.updateJob(asJobId(jobId), {
      ...(update.status !== undefined && { status: update.status }),
      ...(update.progress !== undefined && { progress_json: JSON.stringify(update.progress) }),
      ...(update.result !== undefined && {
        result_json: update.result ? JSON.stringify(update.result) : null,
      }),
      ...(update.error !== undefined && { error: update.error }),
      ...(update.startedAt !== undefined && { started_at: toIso(update.startedAt) }),
      ...(update.completedAt !== undefined && { completed_at: toIso(update.completedAt) }),
      ...(update.expiresAt !== undefined && { expires_at: toIso(update.expiresAt) }),
      updated_at: update.updatedAt.toISOString(),
    });
    if (!row) {
      throw new NotFoundError('job', jobId);
    }
    return rowToJob(row);
  }

  async list(query: JobQuery): Promise<readonly AnalysisJob[]> {
    const rows = await this.repository.listJobs(query);
    return rows.map(rowToJob);
  }

  async archive(jobId: string, archivedAt: Date): Promise<boolean> {
    return this.repository.archiveJob(asJobId(jobId), archivedAt.toISOString());
  }

  async findExpired(now: Date): Promise<readonly string[]> {
    return this.repository.findExpiredJobIds(now.toISOString());
  }

  async findByStatus(statuses: readonly JobStatus[]): Promise<readonly AnalysisJob[]> {
    const rows = await this.repository.listJobsByStatus(statuses);
    return rows.map(rowToJob);
  }
}

function rowToJob(row: JobRow): AnalysisJob {
  return {
    jobId: row.id,
    owner: row.owner,
    seeds: decodeSeeds(row.seeds_json),
    config: parseAnalysisConfig(decodeJson(row.config_json, 'config')),
    status: row.status,
    progress: decodeProgress(row.progress_json),
    result: row.result_json !== null ? decodeResult(row.result_json) : null,
    error: row.error,
    createdAt: new Date(row.created_at),
    updatedAt: new Date(row.updated_at),
    startedAt: fromIso(row.started_at),
    completedAt: fromIso(row.completed_at),
    expiresAt: fromIso(row.expires_at),
  };
}

function toIso(date: Date | null): string | null {
  return date ? date.toISOString() : null;
}

function fromIso(value: string | null): Date | null {
  return value !== null ? new Date(value) : null;
}

// ============================================================================
// Descriptor Store
// ============================================================================

export class SqliteDescriptorStore implements DescriptorStore {
  constructor(private readonly repository: ProvenanceRepository) {}

  async get(imageId: ImageId, variant: DescriptorVariant): Promise<DescriptorRecord | null> {
    const row = await this.repository.getDescriptor(imageId, variant);
    if (!row) {
      return null;
    }
    return {
      imageId: row.image_id,
      variant: row.variant,
      owner: row.owner,
      blob: new Uint8Array(row.descriptor),
      createdAt: new Date(row.created_at),
    };
  }

  async put(record: DescriptorRecord): Promise<void> {
    await this.repository.putDescriptor({
      image_id: record.imageId,
      variant: record.variant,
      owner: record.owner,
      descriptor: Buffer.from(record.blob.buffer, record.blob.byteOffset, record.blob.byteLength),
      created_at: record.createdAt.toISOString(),
    });
  }

  async deleteOlderThan(cutoff: Date, owner?: string): Promise<number> {
    return this.repository.deleteDescriptorsOlderThan(cutoff.toISOString(), owner);
  }

  async count(): Promise<number> {
    return this.repository.countDescriptors();
  }
}
