/**
 * Provenance Engine Persistence Schema Types
 *
 * Row shapes for schema.sql. Timestamps are ISO8601 strings (DB format);
 * JSON documents are stored as TEXT and decoded by the stores.
 */

import type { DescriptorVariant } from '../core/types.js';
import type { JobStatus } from '../services/analysis-orchestrator.types.js';

// ============================================================================
// Branded ID Types
// ============================================================================

declare const JobIdBrand: unique symbol;

export type JobId = string & { readonly [JobIdBrand]: typeof JobIdBrand };

export function asJobId(id: string): JobId {
  return id as JobId;
}

/**
 * ISO8601 timestamp string in UTC, e.g. "2026-03-02T10:30:00.000Z"
 */
export type ISO8601Timestamp = string;

// ============================================================================
// Analysis Jobs
// ============================================================================

export interface JobRow {
  readonly id: JobId;
  readonly owner: string;
  readonly status: JobStatus;
  readonly seeds_json: string;
  readonly config_json: string;
  readonly progress_json: string;
  readonly result_json: string | null;
  readonly error: string | null;
  readonly created_at: ISO8601Timestamp;
  readonly updated_at: ISO8601Timestamp;
  readonly started_at: ISO8601Timestamp | null;
  readonly completed_at: ISO8601Timestamp | null;
  readonly expires_at: ISO8601Timestamp | null;
  readonly archived_at: ISO8601Timestamp | null;
}

export type JobInsert = Omit<JobRow, 'archived_at'>;

export interface JobRowUpdate {
  readonly status?: JobStatus;
  readonly progress_json?: string;
  readonly result_json?: string | null;
  readonly error?: string | null;
  readonly started_at?: ISO8601Timestamp | null;
  readonly completed_at?: ISO8601Timestamp | null;
  readonly expires_at?: ISO8601Timestamp | null;
  readonly archived_at?: ISO8601Timestamp | null;
  readonly updated_at: ISO8601Timestamp;
}

export interface JobFilter {
  readonly owner?: string;
  readonly status?: JobStatus;
  readonly limit?: number;
}

// ============================================================================
// Descriptors
// ============================================================================

export interface DescriptorRow {
  readonly image_id: string;
  readonly variant: DescriptorVariant;
  readonly owner: string | null;
  readonly descriptor: Uint8Array;
  readonly created_at: ISO8601Timestamp;
}
