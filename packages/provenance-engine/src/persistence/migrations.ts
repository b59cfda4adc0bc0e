/**
 * Schema migrations, oldest first. Version 1 is schema.sql.
 */

import { readFile } from 'node:fs/promises';
import { fileURLToPath } from 'node:url';
import type { Migration } from './adapters/sqlite.js';

export const SCHEMA_PATH = fileURLToPath(new URL('./schema.sql', import.meta.url));

export async function loadMigrations(schemaPath: string = SCHEMA_PATH): Promise<readonly Migration[]> {
  const initialSchema = await readFile(schemaPath, 'utf-8');

  return [
    { version: 1, name: 'initial_schema', sql: initialSchema },
  ];
}
