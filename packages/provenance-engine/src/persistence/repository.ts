/**
 * Provenance Engine Database Repository
 *
 * Typed SQL operations over a DatabaseAdapter. All statements use `?`
 * placeholders; the adapter owns driver specifics.
 */

import type {
  DescriptorRow,
  ISO8601Timestamp,
  JobFilter,
  JobId,
  JobInsert,
  JobRow,
  JobRowUpdate,
} from './schema.types.js';
import type { DescriptorVariant } from '../core/types.js';
import type { JobStatus } from '../services/analysis-orchestrator.types.js';

// ============================================================================
// Database Adapter Interface
// ============================================================================

/**
 * Unified database interface. Implementations handle driver-specific details.
 */
export interface DatabaseAdapter {
  /**
   * Execute query returning single row or null.
   */
  queryOne<T>(sql: string, params?: ReadonlyArray<unknown>): Promise<T | null>;

  /**
   * Execute query returning multiple rows.
   */
  queryMany<T>(sql: string, params?: ReadonlyArray<unknown>): Promise<ReadonlyArray<T>>;

  /**
   * Execute statement (INSERT, UPDATE, DELETE).
   * Returns number of affected rows.
   */
  execute(sql: string, params?: ReadonlyArray<unknown>): Promise<number>;

  /**
   * Execute transaction with automatic rollback on error.
   */
  transaction<T>(fn: () => Promise<T>): Promise<T>;

  /**
   * Close database connection.
   */
  close(): Promise<void>;
}

// ============================================================================
// Repository Implementation
// ============================================================================

export class ProvenanceRepository {
  constructor(private readonly db: DatabaseAdapter) {}

  // ==========================================================================
  // Analysis Jobs
  // ==========================================================================

  async createJob(insert: JobInsert): Promise<JobRow> {
    await this.db.execute(
      `INSERT INTO analysis_jobs (
        id, owner, status, seeds_json, config_json, progress_json,
        result_json, error, created_at, updated_at,
        started_at, completed_at, expires_at
      ) VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?)`,
      [
        insert.id,
        insert.owner,
        insert.status,
        insert.seeds_json,
        insert.config_json,
        insert.progress_json,
        insert.result_json,
        insert.error,
        insert.created_at,
        insert.updated_at,
        insert.started_at,
        insert.completed_at,
        insert.expires_at,
      ]
    );

    const row = await this.db.queryOne<JobRow>('SELECT * FROM analysis_jobs WHERE id = ?', [
      insert.id,
    ]);

    if (!row) {
      throw new Error(`Failed to create job: ${insert.id}`);
    }

    return row;
  }

  async getJob(id: JobId): Promise<JobRow | null> {
    return this.db.queryOne<JobRow>(
      'SELECT * FROM analysis_jobs WHERE id = ? AND archived_at IS NULL',
      [id]
    );
  }

  /**
   * @returns the updated row, or null when no live job has this id
   */
  async updateJob(id: JobId, update: JobRowUpdate): Promise<JobRow | null> {
    const setClauses: string[] = [];
    const values: unknown[] = [];

    const columns: ReadonlyArray<keyof Omit<JobRowUpdate, 'updated_at'>> = [
      'status',
      'progress_json',
      'result_json',
      'error',
      'started_at',
      'completed_at',
      'expires_at',
      'archived_at',
    ];
    for (const column of columns) {
      const value = update[column];
      if (value !== undefined) {
        setClauses.push(`${column} = ?`);
        values.push(value);
      }
    }
    setClauses.push('updated_at = ?');
    values.push(update.updated_at);

    values.push(id);

    const changed = await this.db.execute(
      `UPDATE analysis_jobs SET ${setClauses.join(', ')} WHERE id = ? AND archived_at IS NULL`,
      values
    );
    if (changed === 0) {
      return null;
    }

    return this.db.queryOne<JobRow>('SELECT * FROM analysis_jobs WHERE id = ?', [id]);
  }

  /**
   * Live jobs, newest first
   */
  async listJobs(filter: JobFilter): Promise<ReadonlyArray<JobRow>> {
    const where: string[] = ['archived_at IS NULL'];
    const params: unknown[] = [];

    if (filter.owner !== undefined) {
      where.push('owner = ?');
      params.push(filter.owner);
    }
    if (filter.status !== undefined) {
      where.push('status = ?');
      params.push(filter.status);
    }

    params.push(filter.limit ?? -1);

    return this.db.queryMany<JobRow>(
      `SELECT * FROM analysis_jobs
       WHERE ${where.join(' AND ')}
       ORDER BY created_at DESC, rowid DESC
       LIMIT ?`,
      params
    );
  }

  async listJobsByStatus(statuses: ReadonlyArray<JobStatus>): Promise<ReadonlyArray<JobRow>> {
    if (statuses.length === 0) {
      return [];
    }
    const placeholders = statuses.map(() => '?').join(', ');
    return this.db.queryMany<JobRow>(
      `SELECT * FROM analysis_jobs
       WHERE status IN (${placeholders}) AND archived_at IS NULL
       ORDER BY created_at ASC, rowid ASC`,
      statuses
    );
  }

  async findExpiredJobIds(now: ISO8601Timestamp): Promise<ReadonlyArray<JobId>> {
    const rows = await this.db.queryMany<{ id: JobId }>(
      `SELECT id FROM analysis_jobs
       WHERE expires_at IS NOT NULL AND expires_at <= ? AND archived_at IS NULL`,
      [now]
    );
    return rows.map((row) => row.id);
  }

  async archiveJob(id: JobId, archivedAt: ISO8601Timestamp): Promise<boolean> {
    const changed = await this.db.execute(
      'UPDATE analysis_jobs SET archived_at = ?, updated_at = ? WHERE id = ? AND archived_at IS NULL',
      [archivedAt, archivedAt, id]
    );
    return changed > 0;
  }

  // ==========================================================================
  // Descriptors
  // ==========================================================================

  async getDescriptor(imageId: string, variant: DescriptorVariant): Promise<DescriptorRow | null> {
    return this.db.queryOne<DescriptorRow>(
      'SELECT * FROM descriptors WHERE image_id = ? AND variant = ?',
      [imageId, variant]
    );
  }

  async putDescriptor(row: DescriptorRow): Promise<void> {
    await this.db.execute(
      `INSERT INTO descriptors (image_id, variant, owner, descriptor, created_at)
       VALUES (?, ?, ?, ?, ?)
       ON CONFLICT (image_id, variant) DO UPDATE SET
         owner = excluded.owner,
         descriptor = excluded.descriptor,
         created_at = excluded.created_at`,
      [row.image_id, row.variant, row.owner, row.descriptor, row.created_at]
    );
  }

  async deleteDescriptorsOlderThan(
    cutoff: ISO8601Timestamp,
    owner?: string
  ): Promise<number> {
    if (owner !== undefined) {
      return this.db.execute('DELETE FROM descriptors WHERE created_at < ? AND owner = ?', [
        cutoff,
        owner,
      ]);
    }
    return this.db.execute('DELETE FROM descriptors WHERE created_at < ?', [cutoff]);
  }

  async countDescriptors(): Promise<number> {
    const row = await this.db.queryOne<{ count: number }>(
      'SELECT COUNT(*) AS count FROM descriptors'
    );
    return row?.count ?? 0;
  }
}
