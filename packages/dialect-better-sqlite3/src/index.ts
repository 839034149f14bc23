/**
 * @daybook/dialect-better-sqlite3 - better-sqlite3 dialect for sync
 *
 * Provides a Kysely instance over better-sqlite3 (Node.js). Pair it with
 * @daybook/server-dialect-sqlite.
 */

import type { Database as BetterSqlite3Database } from 'better-sqlite3';
import Database from 'better-sqlite3';
import { Kysely, SqliteDialect } from 'kysely';

export interface BetterSqlite3PathOptions {
  /** Path to SQLite database file, or ':memory:' for in-memory */
  path: string;
  /**
   * Use write-ahead logging for file databases so delta reads do not block
   * on a push in progress. Default: true. Ignored for ':memory:'.
   */
  wal?: boolean;
}

export interface BetterSqlite3InstanceOptions {
  /** An existing better-sqlite3 Database instance */
  database: BetterSqlite3Database;
}

export type BetterSqlite3Options =
  | BetterSqlite3PathOptions
  | BetterSqlite3InstanceOptions;

function openDatabase(options: BetterSqlite3PathOptions): BetterSqlite3Database {
  const database = new Database(options.path);
  if (options.path !== ':memory:' && (options.wal ?? true)) {
    database.pragma('journal_mode = WAL');
  }
  return database;
}

/**
 * Create a Kysely instance with better-sqlite3 dialect.
 *
 * @example
 * const db = createBetterSqlite3Db<SyncDb>({ path: './daybook.db' });
 * const db = createBetterSqlite3Db<SyncDb>({ path: ':memory:' });
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
    'database' in options ? options.database : openDatabase(options);
  return new SqliteDialect({ database });
}
