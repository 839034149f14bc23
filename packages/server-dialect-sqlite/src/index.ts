/**
 * @daybook/server-dialect-sqlite - SQLite Server Sync Dialect
 *
 * Works with any SQLite-compatible Kysely dialect (better-sqlite3, libsql,
 * etc.).
 *
 * Key differences from Postgres:
 * - No bigserial → INTEGER PRIMARY KEY AUTOINCREMENT
 * - No JSONB → JSON stored as TEXT
 * - No boolean → INTEGER 0/1
 * - No timestamptz → TEXT with ISO format
 * - No SELECT ... FOR UPDATE (writers are already serialized)
 */

import type { SyncColumnType } from '@daybook/core';
import { BaseServerSyncDialect, type SyncDb } from '@daybook/server';
import type { Kysely, RawBuilder } from 'kysely';
import { sql } from 'kysely';

const sqliteColumnTypes: Record<SyncColumnType, string> = {
  text: 'text',
  integer: 'integer',
  boolean: 'integer',
  json: 'text',
  timestamp: 'text',
};

export class SqliteServerSyncDialect extends BaseServerSyncDialect<'sqlite'> {
  readonly family = 'sqlite' as const;
  readonly supportsForUpdate = false;

  protected columnDataType(type: SyncColumnType): RawBuilder<unknown> {
    return sql.raw(sqliteColumnTypes[type]);
  }

  protected override columnDefault(
    _type: SyncColumnType,
    value: string | number | boolean
  ): string | number | boolean {
    if (typeof value === 'boolean') return value ? 1 : 0;
    return value;
  }

  protected override async prepareSchema(db: Kysely<SyncDb>): Promise<void> {
    await sql`PRAGMA foreign_keys = ON`.execute(db);
  }

  protected async createSyncLogTable(db: Kysely<SyncDb>): Promise<void> {
    const nowIso = sql`(strftime('%Y-%m-%dT%H:%M:%fZ','now'))`;

    await db.schema
      .createTable('sync_log')
      .ifNotExists()
      .addColumn('log_id', 'integer', (col) => col.primaryKey().autoIncrement())
      .addColumn('user_id', 'text', (col) => col.notNull())
      .addColumn('table_name', 'text', (col) => col.notNull())
      .addColumn('record_id', 'text', (col) => col.notNull())
      .addColumn('operation', 'text', (col) => col.notNull())
      .addColumn('changed_at_utc', 'text', (col) =>
        col.notNull().defaultTo(nowIso)
      )
      .addColumn('new_version', 'integer', (col) => col.notNull())
      .execute();
  }
}

export function createSqliteServerDialect(options?: {
  supportsTransactions?: boolean;
}): SqliteServerSyncDialect {
  return new SqliteServerSyncDialect(options);
}
