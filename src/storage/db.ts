/**
 * Database Connection Factory
 *
 * Opens a better-sqlite3 connection, makes sure the credentials table exists
 * and wraps the connection with Drizzle ORM.
 *
 * Usage:
 *   import { createDatabase } from '@/storage/db';
 *   const db = createDatabase('./data/vocab-tutor.db');
 *   const testDb = createDatabase(':memory:'); // in-memory for tests
 */

import { mkdirSync } from 'node:fs';
import { dirname } from 'node:path';
import Database from 'better-sqlite3';
import { drizzle } from 'drizzle-orm/better-sqlite3';
import * as schema from './schema';

/** Default location of the SQLite file, relative to the working directory. */
export const DEFAULT_DATABASE_PATH = './data/vocab-tutor.db';

const CREATE_CREDENTIALS_TABLE = `
  CREATE TABLE IF NOT EXISTS credentials (
    service TEXT NOT NULL,
    account TEXT NOT NULL,
    value TEXT NOT NULL,
    updated_at INTEGER NOT NULL,
    PRIMARY KEY (service, account)
  )
`;

/**
 * Creates a Drizzle ORM database instance connected to the given SQLite file.
 *
 * The parent directory is created when missing. Pass ':memory:' for a
 * throwaway database.
 *
 * @example
 * const db = createDatabase(':memory:');
 * db.select().from(credentials).all();
 */
export function createDatabase(dbPath: string = DEFAULT_DATABASE_PATH) {
  if (dbPath !== ':memory:') {
    mkdirSync(dirname(dbPath), { recursive: true });
  }

  const sqlite = new Database(dbPath);
  sqlite.pragma('journal_mode = WAL');
  sqlite.exec(CREATE_CREDENTIALS_TABLE);

  return drizzle(sqlite, { schema });
}

/**
 * Type alias for the Drizzle database instance.
 */
export type AppDatabase = ReturnType<typeof createDatabase>;
