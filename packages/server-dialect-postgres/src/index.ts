/**
 * @daybook/server-dialect-postgres - PostgreSQL Server Sync Dialect
 *
 * Native types throughout: bigserial log ids, jsonb payload columns,
 * boolean flags and timestamptz timestamps. Row locks are taken with
 * SELECT ... FOR UPDATE while a push evaluates a record's version.
 */

import type { SyncColumnType } from '@daybook/core';
import { BaseServerSyncDialect, type SyncDb } from '@daybook/server';
import type { Kysely, RawBuilder } from 'kysely';
import { sql } from 'kysely';

const postgresColumnTypes: Record<SyncColumnType, string> = {
  text: 'text',
  integer: 'integer',
  boolean: 'boolean',
  json: 'jsonb',
  timestamp: 'timestamptz',
};

export class PostgresServerSyncDialect extends BaseServerSyncDialect<'postgres'> {
  readonly family = 'postgres' as const;
  readonly supportsForUpdate = true;

  protected columnDataType(type: SyncColumnType): RawBuilder<unknown> {
    return sql.raw(postgresColumnTypes[type]);
  }

  protected async createSyncLogTable(db: Kysely<SyncDb>): Promise<void> {
    await db.schema
      .createTable('sync_log')
      .ifNotExists()
      .addColumn('log_id', 'bigserial', (col) => col.primaryKey())
      .addColumn('user_id', 'text', (col) => col.notNull())
      .addColumn('table_name', 'text', (col) => col.notNull())
      .addColumn('record_id', 'text', (col) => col.notNull())
      .addColumn('operation', 'text', (col) => col.notNull())
      .addColumn('changed_at_utc', 'timestamptz', (col) =>
        col.notNull().defaultTo(sql`now()`)
      )
      .addColumn('new_version', 'integer', (col) => col.notNull())
      .execute();
  }
}

export function createPostgresServerDialect(): PostgresServerSyncDialect {
  return new PostgresServerSyncDialect();
}
