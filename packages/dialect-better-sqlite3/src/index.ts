/**
 * @notekeep/dialect-better-sqlite3 - better-sqlite3 dialect for the note store
 *
 * Provides a Kysely dialect for better-sqlite3 (Node.js), used by the
 * relational engine and by the SQLite key-value driver.
 */

import type { Database as BetterSqlite3Database } from 'better-sqlite3';
import Database from 'better-sqlite3';
import { Kysely, SqliteDialect } from 'kysely';

interface BetterSqlite3PragmaOptions {
  /** Journal mode pragma, e.g. 'wal' for file databases. Default: unchanged */
  journalMode?: 'delete' | 'truncate' | 'persist' | 'memory' | 'wal' | 'off';
  /** Enforce foreign keys (default: true) */
  foreignKeys?: boolean;
  /** busy_timeout in milliseconds (default: 5000) */
  busyTimeoutMs?: number;
}

export interface BetterSqlite3PathOptions extends BetterSqlite3PragmaOptions {
  /** Path to SQLite database file, or ':memory:' for in-memory */
  path: string;
}

export interface BetterSqlite3InstanceOptions extends BetterSqlite3PragmaOptions {
  /** An existing better-sqlite3 Database instance */
  database: BetterSqlite3Database;
}

export type BetterSqlite3Options =
  | BetterSqlite3PathOptions
  | BetterSqlite3InstanceOptions;

function applyPragmas(
  database: BetterSqlite3Database,
  options: BetterSqlite3PragmaOptions
): void {
  const foreignKeys = options.foreignKeys === false ? 'OFF' : 'ON';
  database.pragma(`foreign_keys = ${foreignKeys}`);
  database.pragma(`busy_timeout = ${options.busyTimeoutMs ?? 5000}`);
  if (options.journalMode) {
    database.pragma(`journal_mode = ${options.journalMode}`);
  }
}

/**
 * Create a Kysely instance with better-sqlite3 dialect.
 *
 * @example
 * const db = createBetterSqlite3Db<NotesDb>({ path: './notes.db', journalMode: 'wal' });
 * const db = createBetterSqlite3Db<NotesDb>({ path: ':memory:' });
 */
export function createBetterSqlite3Db<T>(
  options: BetterSqlite3Options
): Kysely<T> {
  return new Kysely<T>({
    dialect: createBetterSqlite3Dialect(options),
  });
}

/**
 * Create the better-sqlite3 dialect directly.
 */
export function createBetterSqlite3Dialect(
  options: BetterSqlite3Options
): SqliteDialect {
  const database =
    'database' in options ? options.database : new Database(options.path);
  applyPragmas(database, options);
  return new SqliteDialect({ database });
}

