/**
 * CLI Configuration Tests
 *
 * Config files are written to a fresh temp directory per test; the
 * environment is always passed explicitly.
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtemp, mkdir, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import {
  fileToOverrides,
  findConfigFile,
  loadConfig,
  mergeOverrides,
  parseConfigFile,
} from '../../../cli/lib/config.js';
import { DEFAULT_CONFIG } from '../../../core/config.js';
import { InvalidConfigError } from '../../../core/errors.js';

describe('parseConfigFile', () => {
  it('reads YAML', () => {
    const file = parseConfigFile(
      ['owner: alice', 'workers:', '  max_concurrent_jobs: 4', ''].join('\n')
    );

    expect(file).toEqual({ owner: 'alice', workers: { max_concurrent_jobs: 4 } });
  });

  it('reads JSON and empty files', () => {
    expect(parseConfigFile('{"admin": true}')).toEqual({ admin: true });
    expect(parseConfigFile('')).toEqual({});
  });

  it('rejects unknown keys with their location', () => {
    let caught: unknown;
    try {
      parseConfigFile('workers:\n  max_jobs: 3\n');
    } catch (error) {
      caught = error;
    }

    expect(caught).toBeInstanceOf(InvalidConfigError);
    expect(caught).toMatchObject({
      issues: [
        { path: '.provenancerc.workers', message: "Unrecognized key(s) in object: 'max_jobs'" },
      ],
    });
  });

  it('rejects out-of-range values', () => {
    expect(() => parseConfigFile('workers:\n  max_concurrent_jobs: 0\n')).toThrow(
      '.provenancerc.workers.max_concurrent_jobs'
    );
  });
});

describe('fileToOverrides', () => {
  it('maps snake_case sections onto engine overrides', () => {
    const overrides = fileToOverrides({
      persistence: { database_path: 'jobs.db' },
      resilience: { retry_attempts: 4 },
      services: { verification: { base_url: 'http://verify.test', timeout_ms: 500 } },
    });

    expect(overrides.persistence).toEqual({ databasePath: 'jobs.db' });
    expect(overrides.resilience).toEqual({ retryAttempts: 4 });
    expect(overrides.services?.verification).toEqual({
      baseUrl: 'http://verify.test',
      timeoutMs: 500,
    });
    expect(overrides.services?.retrieval).toEqual({});
  });
});

describe('mergeOverrides', () => {
  it('lets the top layer win field by field', () => {
    const merged = mergeOverrides(
      { workers: { maxConcurrentJobs: 2, progressFlushInterval: 5 } },
      { workers: { maxConcurrentJobs: 9 } }
    );

    expect(merged.workers).toEqual({ maxConcurrentJobs: 9, progressFlushInterval: 5 });
  });
});

describe('loadConfig', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), 'provenance-cli-'));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it('falls back to defaults', () => {
    const config = loadConfig({ cwd: dir, env: {} });

    expect(config.engine).toEqual(DEFAULT_CONFIG);
    expect(config.owner).toBe('local');
    expect(config.admin).toBe(false);
    expect(config.json).toBe(false);
    expect(config.configPath).toBeNull();
  });

  it('layers file, environment and flags', async () => {
    const path = join(dir, '.provenancerc.yaml');
    await writeFile(
      path,
      [
        'owner: file-owner',
        'workers:',
        '  max_concurrent_jobs: 4',
        'retention:',
        '  job_retention_days: 7',
        'services:',
        '  retrieval:',
        '    base_url: http://retrieval.file:9000',
        '',
      ].join('\n')
    );
    const env = { PROVENANCE_MAX_CONCURRENT_JOBS: '6', PROVENANCE_OWNER: 'env-owner' };

    const fromFileAndEnv = loadConfig({ cwd: dir, env });
    expect(fromFileAndEnv.configPath).toBe(path);
    expect(fromFileAndEnv.owner).toBe('env-owner');
    expect(fromFileAndEnv.engine.workers.maxConcurrentJobs).toBe(6);
    expect(fromFileAndEnv.engine.retention.jobRetentionDays).toBe(7);
    expect(fromFileAndEnv.engine.services.retrieval).toEqual({
      baseUrl: 'http://retrieval.file:9000',
      timeoutMs: 60_000,
    });

    const withFlags = loadConfig({
      cwd: dir,
      env,
      overrides: { owner: 'flag-owner', concurrency: 8, database: 'flag.db' },
    });
    expect(withFlags.owner).toBe('flag-owner');
    expect(withFlags.engine.workers.maxConcurrentJobs).toBe(8);
    expect(withFlags.engine.persistence).toEqual({
      enabled: true,
      databasePath: 'flag.db',
      autoMigrate: true,
    });
  });

  it('finds a config file in a parent directory', async () => {
    await writeFile(join(dir, '.provenancerc'), 'admin: true\n');
    const nested = join(dir, 'a', 'b');
    await mkdir(nested, { recursive: true });

    expect(findConfigFile(nested)).toBe(join(dir, '.provenancerc'));
    expect(loadConfig({ cwd: nested, env: {} }).admin).toBe(true);
  });

  it('honors PROVENANCE_CONFIG and boolean variables', async () => {
    const path = join(dir, 'custom.yaml');
    await writeFile(path, 'owner: from-custom\n');

    const config = loadConfig({
      cwd: dir,
      env: { PROVENANCE_CONFIG: path, PROVENANCE_ADMIN: '1', PROVENANCE_JSON: 'true' },
    });

    expect(config.configPath).toBe(path);
    expect(config.owner).toBe('from-custom');
    expect(config.admin).toBe(true);
    expect(config.json).toBe(true);
  });

  it('fails when an explicit config file is missing', () => {
    const missing = join(dir, 'missing.yaml');

    expect(() => loadConfig({ configPath: missing, env: {} })).toThrow(
      `Config file not found: ${missing}`
    );
  });
});
