/**
 * Database Adapter Factory
 *
 * Creates the SQLite adapter from a path or a DATABASE_URL-style URL and
 * brings its schema up to date.
 *
 * URL format:
 * - sqlite:///absolute/path/to/db.sqlite
 * - sqlite://relative/path/to/db.sqlite
 * - sqlite::memory:
 */

import { mkdir } from 'node:fs/promises';
import { dirname } from 'node:path';
import { loadMigrations } from '../migrations.js';
import { SQLiteAdapter } from './sqlite.js';
import { createLogger } from '../../core/utils/logger.js';

const log = createLogger({ module: 'persistence' });

/**
 * Database adapter configuration
 */
export interface AdapterConfig {
  readonly type: 'sqlite';
  /** File path, or ':memory:' */
  readonly url: string;
  /** Apply pending migrations on open (default: true) */
  readonly autoMigrate?: boolean;
  readonly schemaPath?: string;
}

/**
 * Parse a database URL
 *
 * @throws {Error} for anything but sqlite:
 */
export function parseDatabaseUrl(databaseUrl: string): AdapterConfig {
  if (databaseUrl === 'sqlite::memory:' || databaseUrl === ':memory:') {
    return { type: 'sqlite', url: ':memory:' };
  }

  const url = new URL(databaseUrl);

  if (url.protocol === 'sqlite:') {
    // sqlite:///abs/path has an empty host; sqlite://rel/path puts "rel" in it
    return { type: 'sqlite', url: `${url.host}${url.pathname}` };
  }

  throw new Error(
    `Unsupported database protocol: ${url.protocol}. Supported protocols: sqlite:`
  );
}

/**
 * Open a SQLite adapter and migrate it
 *
 * @example
 * ```typescript
 * const adapter = await createSQLiteAdapter({ type: 'sqlite', url: ':memory:' });
 * const repository = new ProvenanceRepository(adapter);
 * ```
 */
export async function createSQLiteAdapter(config: AdapterConfig): Promise<SQLiteAdapter> {
  if (config.url !== ':memory:') {
    await mkdir(dirname(config.url), { recursive: true });
  }

  const adapter = new SQLiteAdapter(config.url);

  if (config.autoMigrate ?? true) {
    const migrations = await loadMigrations(config.schemaPath);
    const applied = await adapter.runMigrations(migrations);
    if (applied.length > 0) {
      log.info('Applied database migrations', { database: config.url, versions: applied });
    }
  }

  return adapter;
}
