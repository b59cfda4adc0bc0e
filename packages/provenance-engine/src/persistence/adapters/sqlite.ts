/**
 * SQLite Database Adapter
 *
 * Implements DatabaseAdapter on better-sqlite3. The driver is synchronous;
 * the async surface matches the adapter interface.
 *
 * - WAL mode for concurrent reads while a job writes progress
 * - Nested transactions via savepoints
 * - Versioned migrations recorded in schema_migrations
 */

import Database from 'better-sqlite3';
import type { DatabaseAdapter } from '../repository.js';

/**
 * Migration definition
 */
export interface Migration {
  readonly version: number;
  readonly name: string;
  readonly sql: string;
}

export class SQLiteAdapter implements DatabaseAdapter {
  private readonly db: Database.Database;
  private transactionDepth = 0;

  constructor(filepath: string = ':memory:') {
    this.db = new Database(filepath);

    // Enable WAL mode for concurrent reads (no-op for in-memory databases)
    this.db.pragma('journal_mode = WAL');
    this.db.pragma('foreign_keys = ON');
    this.db.pragma('synchronous = NORMAL');
  }

  async queryOne<T>(sql: string, params: ReadonlyArray<unknown> = []): Promise<T | null> {
    const row = this.db.prepare(sql).get(...params) as T | undefined;
    return row ?? null;
  }

  async queryMany<T>(sql: string, params: ReadonlyArray<unknown> = []): Promise<ReadonlyArray<T>> {
    return this.db.prepare(sql).all(...params) as T[];
  }

  async execute(sql: string, params: ReadonlyArray<unknown> = []): Promise<number> {
    return this.db.prepare(sql).run(...params).changes;
  }

  async transaction<T>(fn: () => Promise<T>): Promise<T> {
    const savepoint = `sp_${this.transactionDepth}`;
    this.transactionDepth++;

    try {
      if (this.transactionDepth === 1) {
        this.db.exec('BEGIN');
      } else {
        this.db.exec(`SAVEPOINT ${savepoint}`);
      }

      const result = await fn();

      if (this.transactionDepth === 1) {
        this.db.exec('COMMIT');
      } else {
        this.db.exec(`RELEASE SAVEPOINT ${savepoint}`);
      }

      this.transactionDepth--;
      return result;
    } catch (error) {
      if (this.transactionDepth === 1) {
        if (this.db.inTransaction) {
          this.db.exec('ROLLBACK');
        }
      } else {
        this.db.exec(`ROLLBACK TO SAVEPOINT ${savepoint}`);
      }

      this.transactionDepth--;
      throw error;
    }
  }

  async close(): Promise<void> {
    this.db.close();
  }

  // ==========================================================================
  // Migration Management
  // ==========================================================================

  /**
   * Apply every migration newer than the recorded version, in one transaction
   *
   * @returns versions applied
   */
  async runMigrations(migrations: readonly Migration[]): Promise<readonly number[]> {
    this.db.exec(`
      CREATE TABLE IF NOT EXISTS schema_migrations (
        version INTEGER PRIMARY KEY,
        name TEXT NOT NULL,
        applied_at TEXT NOT NULL DEFAULT (strftime('%Y-%m-%dT%H:%M:%fZ', 'now'))
      );
    `);

    const currentVersion = await this.getDatabaseVersion();
    const pending = [...migrations]
      .filter((migration) => migration.version > currentVersion)
      .sort((a, b) => a.version - b.version);

    const apply = this.db.transaction(() => {
      for (const migration of pending) {
        this.db.exec(migration.sql);
        this.db
          .prepare('INSERT INTO schema_migrations (version, name) VALUES (?, ?)')
          .run(migration.version, migration.name);
      }
    });
    apply();

    return pending.map((migration) => migration.version);
  }

  /**
   * Current schema version (0 if no migrations applied)
   */
  async getDatabaseVersion(): Promise<number> {
    const table = this.db
      .prepare("SELECT name FROM sqlite_master WHERE type = 'table' AND name = 'schema_migrations'")
      .get();
    if (table === undefined) {
      return 0;
    }

    const row = this.db
      .prepare('SELECT MAX(version) AS version FROM schema_migrations')
      .get() as { version: number | null } | undefined;

    return row?.version ?? 0;
  }
}
