/**
 * Descriptor Store
 *
 * Storage seam behind the descriptor cache. Records are keyed by
 * (imageId, variant); a put overwrites the key. Records are only ever
 * removed by age-based cleanup.
 */

import type { DescriptorVariant, ImageId } from '../core/types.js';

export interface DescriptorRecord {
  readonly imageId: ImageId;
  readonly variant: DescriptorVariant;
  /** Owner of the image, when known */
  readonly owner: string | null;
  readonly blob: Uint8Array;
  readonly createdAt: Date;
}

export interface DescriptorStore {
  get(imageId: ImageId, variant: DescriptorVariant): Promise<DescriptorRecord | null>;
  put(record: DescriptorRecord): Promise<void>;
  /**
   * Delete records created before `cutoff`, optionally only those of `owner`
   *
   * @returns number of records removed
   */
  deleteOlderThan(cutoff: Date, owner?: string): Promise<number>;
  count(): Promise<number>;
}

export function descriptorKey(imageId: ImageId, variant: DescriptorVariant): string {
  return `${variant}:${imageId}`;
}

/**
 * Process-local store. Default for tests and ephemeral runs.
 */
export class InMemoryDescriptorStore implements DescriptorStore {
  private readonly records = new Map<string, DescriptorRecord>();

  async get(imageId: ImageId, variant: DescriptorVariant): Promise<DescriptorRecord | null> {
    return this.records.get(descriptorKey(imageId, variant)) ?? null;
  }

  async put(record: DescriptorRecord): Promise<void> {
    this.records.set(descriptorKey(record.imageId, record.variant), record);
  }

  async deleteOlderThan(cutoff: Date, owner?: string): Promise<number> {
    let removed = 0;
    for (const [key, record] of this.records) {
      if (record.createdAt.getTime() >= cutoff.getTime()) continue;
      if (owner !== undefined && record.owner !== owner) continue;
      this.records.delete(key);
      removed++;
    }
    return removed;
  }

  async count(): Promise<number> {
    return this.records.size;
  }
}
