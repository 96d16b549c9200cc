/**
 * SQLite connection and schema bootstrap
 *
 * The unique partial index on confirmed bookings is what makes booking safe
 * across processes; everything else here is connection plumbing.
 */

import fs from 'fs';
import path from 'path';
import Database from 'better-sqlite3';
import { logger } from '../utils/logger';

export type Db = Database.Database;

const SCHEMA_PATH = path.resolve(__dirname, '..', '..', 'db', 'schema.sql');

export interface OpenDatabaseOptions {
  /** Milliseconds a writer waits on a locked database before failing */
  busyTimeoutMs?: number;
}

export function openDatabase(filename: string, options: OpenDatabaseOptions = {}): Db {
  const db = new Database(filename);
  db.pragma('foreign_keys = ON');
  db.pragma(`busy_timeout = ${options.busyTimeoutMs ?? 5000}`);
  if (filename !== ':memory:') {
    db.pragma('journal_mode = WAL');
  }
  applySchema(db);
  logger.debug('Database opened', { filename });
  return db;
}

export function applySchema(db: Db): void {
  const schema = fs.readFileSync(SCHEMA_PATH, 'utf8');
  db.exec(schema);
}

/**
 * True for a UNIQUE/PRIMARY KEY violation raised by SQLite
 */
export function isUniqueViolation(error: unknown): boolean {
  return (
    error instanceof Database.SqliteError &&
    (error.code === 'SQLITE_CONSTRAINT_UNIQUE' || error.code === 'SQLITE_CONSTRAINT_PRIMARYKEY')
  );
}

/**
 * True when another connection held the write lock past busy_timeout
 */
export function isLockContention(error: unknown): boolean {
  return (
    error instanceof Database.SqliteError &&
    (error.code.startsWith('SQLITE_BUSY') || error.code.startsWith('SQLITE_LOCKED'))
  );
}
