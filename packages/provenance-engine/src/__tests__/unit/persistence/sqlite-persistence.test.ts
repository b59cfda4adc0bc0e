/**
 * SQLite Persistence Tests
 *
 * Adapter, migrations, repository and stores against in-memory databases.
 * One test opens a file database in a temp directory.
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtemp, rm } from 'node:fs/promises';
import { existsSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { createSQLiteAdapter, parseDatabaseUrl } from '../../../persistence/adapters/factory.js';
import type { SQLiteAdapter } from '../../../persistence/adapters/sqlite.js';
import { loadMigrations } from '../../../persistence/migrations.js';
import { ProvenanceRepository } from '../../../persistence/repository.js';
import { SqliteDescriptorStore, SqliteJobStore } from '../../../persistence/sqlite-stores.js';
import { asJobId } from '../../../persistence/schema.types.js';
import {
  decodeJson,
  decodeProgress,
  decodeResult,
  decodeSeeds,
} from '../../../persistence/codecs.js';
import { InvariantViolationError } from '../../../core/errors.js';
import { DescriptorCache } from '../../../cache/descriptor-cache.js';
import { FakeDescriptors, quietLogger } from '../../utils/fakes.js';
import { SAMPLE_RESULT, T0, makeJob, minutesAfter } from '../../fixtures/jobs.js';

describe('SQLite persistence', () => {
  let adapter: SQLiteAdapter;
  let repository: ProvenanceRepository;

  beforeEach(async () => {
    adapter = await createSQLiteAdapter({ type: 'sqlite', url: ':memory:' });
    repository = new ProvenanceRepository(adapter);
  });

  afterEach(async () => {
    await adapter.close();
  });

  describe('migrations', () => {
    it('applies the initial schema once', async () => {
      expect(await adapter.getDatabaseVersion()).toBe(1);
      expect(await adapter.runMigrations(await loadMigrations())).toEqual([]);
      expect(await adapter.getDatabaseVersion()).toBe(1);
    });

    it('applies only newer migrations', async () => {
      const migrations = [
        ...(await loadMigrations()),
        { version: 2, name: 'notes', sql: 'ALTER TABLE analysis_jobs ADD COLUMN notes TEXT;' },
      ];

      expect(await adapter.runMigrations(migrations)).toEqual([2]);
      expect(await adapter.getDatabaseVersion()).toBe(2);
    });

    it('leaves a fresh database unmigrated when autoMigrate is off', async () => {
      const bare = await createSQLiteAdapter({ type: 'sqlite', url: ':memory:', autoMigrate: false });
      try {
        expect(await bare.getDatabaseVersion()).toBe(0);
      } finally {
        await bare.close();
      }
    });

    it('creates the directory of a file database', async () => {
      const dir = await mkdtemp(join(tmpdir(), 'provenance-db-'));
      const path = join(dir, 'nested', 'provenance.db');
      try {
        const fileAdapter = await createSQLiteAdapter({ type: 'sqlite', url: path });
        expect(await fileAdapter.getDatabaseVersion()).toBe(1);
        await fileAdapter.close();
        expect(existsSync(path)).toBe(true);
      } finally {
        await rm(dir, { recursive: true, force: true });
      }
    });
  });

  describe('transactions', () => {
    it('rolls back every statement when the callback throws', async () => {
      const store = new SqliteJobStore(repository);

      await expect(
        adapter.transaction(async () => {
          await store.create(makeJob({ jobId: 'inside' }));
          throw new Error('abort');
        })
      ).rejects.toThrow('abort');

      expect(await store.get('inside')).toBeNull();
    });

    it('rolls back a nested savepoint only', async () => {
      const store = new SqliteJobStore(repository);

      await adapter.transaction(async () => {
        await store.create(makeJob({ jobId: 'outer' }));
        await adapter
          .transaction(async () => {
            await store.create(makeJob({ jobId: 'inner' }));
            throw new Error('inner failed');
          })
          .catch((error: unknown) => {
            expect(error).toBeInstanceOf(Error);
          });
      });

      expect(await store.get('outer')).not.toBeNull();
      expect(await store.get('inner')).toBeNull();
    });
  });

  describe('SqliteJobStore', () => {
    it('refuses a row whose documents do not decode', async () => {
      await repository.createJob({
        id: asJobId('broken'),
        owner: 'alice',
        status: 'pending',
        seeds_json: '["A"]',
        config_json: '{}',
        progress_json: '{"imagesProcessed": "many"}',
        result_json: null,
        error: null,
        created_at: T0.toISOString(),
        updated_at: T0.toISOString(),
        started_at: null,
        completed_at: null,
        expires_at: null,
      });

      await expect(new SqliteJobStore(repository).get('broken')).rejects.toThrow(
        'Corrupt progress: imagesProcessed: Expected number, received string'
      );
    });

    it('rejects a second job with the same id', async () => {
      const store = new SqliteJobStore(repository);
      await store.create(makeJob());

      await expect(store.create(makeJob())).rejects.toThrow(/UNIQUE constraint failed/);
    });
  });

  describe('SqliteDescriptorStore', () => {
    it('stores blobs by image and variant', async () => {
      const store = new SqliteDescriptorStore(repository);
      await store.put({
        imageId: 'A',
        variant: 'cv_rsift',
        owner: 'alice',
        blob: new Uint8Array([1, 2, 3]),
        createdAt: T0,
      });

      const record = await store.get('A', 'cv_rsift');

      expect(record).toEqual({
        imageId: 'A',
        variant: 'cv_rsift',
        owner: 'alice',
        blob: new Uint8Array([1, 2, 3]),
        createdAt: T0,
      });
      expect(await store.get('A', 'cv_sift')).toBeNull();
    });

    it('overwrites an existing key', async () => {
      const store = new SqliteDescriptorStore(repository);
      const base = { imageId: 'A', variant: 'cv_sift' as const, owner: null, createdAt: T0 };
      await store.put({ ...base, blob: new Uint8Array([1]) });
      await store.put({ ...base, blob: new Uint8Array([9, 9]), createdAt: minutesAfter(T0, 1) });

      expect(await store.count()).toBe(1);
      expect((await store.get('A', 'cv_sift'))?.blob).toEqual(new Uint8Array([9, 9]));
    });

    it('deletes records older than a cutoff, optionally per owner', async () => {
      const store = new SqliteDescriptorStore(repository);
      const put = (imageId: string, owner: string | null, minutes: number) =>
        store.put({
          imageId,
          variant: 'cv_rsift',
          owner,
          blob: new Uint8Array([0]),
          createdAt: minutesAfter(T0, minutes),
        });
      await put('old-alice', 'alice', 0);
      await put('old-bob', 'bob', 0);
      await put('old-none', null, 0);
      await put('new-alice', 'alice', 10);

      expect(await store.deleteOlderThan(minutesAfter(T0, 5), 'alice')).toBe(1);
      expect(await store.get('old-alice', 'cv_rsift')).toBeNull();
      expect(await store.deleteOlderThan(minutesAfter(T0, 5))).toBe(2);
      expect(await store.count()).toBe(1);
      expect(await store.deleteOlderThan(minutesAfter(T0, 10))).toBe(0);
    });

    it('backs the descriptor cache', async () => {
      const computer = new FakeDescriptors();
      const cache = new DescriptorCache(computer, {
        store: new SqliteDescriptorStore(repository),
        logger: quietLogger,
      });

      const first = await cache.getOrCompute('A', 'cv_rsift', { owner: 'alice' });
      const second = await cache.getOrCompute('A', 'cv_rsift');

      expect(first.success && first.source).toBe('computed');
      expect(second.success && second.source).toBe('cache');
      expect(second.success && second.record.owner).toBe('alice');
      expect(computer.callsFor('A')).toBe(1);
    });
  });
});

describe('parseDatabaseUrl', () => {
  it('accepts in-memory forms', () => {
    expect(parseDatabaseUrl('sqlite::memory:')).toEqual({ type: 'sqlite', url: ':memory:' });
    expect(parseDatabaseUrl(':memory:')).toEqual({ type: 'sqlite', url: ':memory:' });
  });

  it('maps absolute and relative sqlite URLs to paths', () => {
    expect(parseDatabaseUrl('sqlite:///var/lib/provenance/jobs.db').url).toBe(
      '/var/lib/provenance/jobs.db'
    );
    expect(parseDatabaseUrl('sqlite://data/jobs.db').url).toBe('data/jobs.db');
  });

  it('rejects other protocols', () => {
    expect(() => parseDatabaseUrl('postgres://db.internal/provenance')).toThrow(
      'Unsupported database protocol: postgres:. Supported protocols: sqlite:'
    );
  });
});

describe('codecs', () => {
  it('decodes stored documents', () => {
    expect(decodeSeeds('["A","B"]')).toEqual(['A', 'B']);
    expect(decodeResult(JSON.stringify(SAMPLE_RESULT))).toEqual(SAMPLE_RESULT);
    expect(decodeJson('{"topK":3}', 'config')).toEqual({ topK: 3 });
  });

  it('reports corrupt JSON as an invariant violation', () => {
    expect(() => decodeProgress('{not json')).toThrow(InvariantViolationError);
    expect(() => decodeJson('', 'config')).toThrow(/^Corrupt config: /);
  });

  it('names the first invalid field', () => {
    expect(() => decodeSeeds('["A", 7]')).toThrow(
      'Corrupt seeds: 1: Expected string, received number'
    );
    expect(() => decodeResult('{"graph": {"nodes": [], "edges": []}}')).toThrow(
      'Corrupt result: spanningForest: Required'
    );
  });
});
