/**
 * @daybook/server - Base Server Sync Dialect
 *
 * Abstract base class that implements the DDL and transaction plumbing shared
 * by every dialect. Dialects supply column types, defaults and the change log
 * table through small hooks.
 */

import {
  getSyncTableColumns,
  SYNC_TABLE_NAMES,
  SYNC_TABLES,
  type SyncColumnType,
  type SyncTableName,
} from '@daybook/core';
import type { CreateTableBuilder, Kysely, RawBuilder } from 'kysely';
import { sql } from 'kysely';
import type { DbExecutor, SyncDb } from '../schema';
import type { ServerSyncDialect, SqlFamily } from './types';

function createSavepointName(): string {
  const randomPart = Math.floor(Math.random() * 1_000_000_000).toString(36);
  return `daybook_sp_${Date.now().toString(36)}_${randomPart}`;
}

export abstract class BaseServerSyncDialect<F extends SqlFamily = SqlFamily>
  implements ServerSyncDialect<F>
{
  abstract readonly family: F;
  abstract readonly supportsForUpdate: boolean;
  readonly supportsSavepoints: boolean;
  protected readonly supportsTransactions: boolean;

  constructor(options?: { supportsTransactions?: boolean }) {
    this.supportsTransactions = options?.supportsTransactions ?? true;
    this.supportsSavepoints = this.supportsTransactions;
  }

  // ===========================================================================
  // Abstract DDL hooks
  // ===========================================================================

  /** Store type for a registry column type */
  protected abstract columnDataType(type: SyncColumnType): RawBuilder<unknown>;

  /** Literal default for a column, in the store's representation */
  protected columnDefault(
    _type: SyncColumnType,
    value: string | number | boolean
  ): string | number | boolean {
    return value;
  }

  /** Create `sync_log` with a monotonic `log_id` primary key */
  protected abstract createSyncLogTable(db: Kysely<SyncDb>): Promise<void>;

  /** Statements to run before any DDL (pragmas, extensions) */
  protected async prepareSchema(_db: Kysely<SyncDb>): Promise<void> {}

  // ===========================================================================
  // Schema
  // ===========================================================================

  async ensureSyncSchema(db: Kysely<SyncDb>): Promise<void> {
    await this.prepareSchema(db);
    await this.createSyncLogTable(db);

    await db.schema
      .createIndex('idx_sync_log_user_time')
      .ifNotExists()
      .on('sync_log')
      .columns(['user_id', 'changed_at_utc'])
      .execute();
    await db.schema
      .createIndex('idx_sync_log_table_record')
      .ifNotExists()
      .on('sync_log')
      .columns(['table_name', 'record_id'])
      .execute();

    for (const table of SYNC_TABLE_NAMES) {
      await this.createRecordTable(db, table);
    }
  }

  private async createRecordTable(
    db: Kysely<SyncDb>,
    table: SyncTableName
  ): Promise<void> {
    const tableName: string = table;
    let builder: CreateTableBuilder<string, string> = db.schema
      .createTable(tableName)
      .ifNotExists();

    for (const [column, spec] of Object.entries(getSyncTableColumns(table))) {
      builder = builder.addColumn(
        column,
        this.columnDataType(spec.type),
        (col) => {
          let next = column === 'id' ? col.primaryKey() : col;
          if (!spec.nullable) next = next.notNull();
          if (spec.defaultValue !== undefined) {
            next = next.defaultTo(
              this.columnDefault(spec.type, spec.defaultValue)
            );
          }
          return next;
        }
      );
    }
    await builder.execute();

    // user_preferences holds a single row per user
    const userIndex = db.schema
      .createIndex(`idx_${tableName}_user`)
      .ifNotExists()
      .on(tableName)
      .column('user_id');
    await (
      SYNC_TABLES[table].uniquePerUser ? userIndex.unique() : userIndex
    ).execute();
  }

  // ===========================================================================
  // Transactions
  // ===========================================================================

  async executeInTransaction<T>(
    db: Kysely<SyncDb>,
    fn: (executor: DbExecutor) => Promise<T>
  ): Promise<T> {
    if (db.isTransaction) {
      return this.withSavepoint(db, createSavepointName(), () => fn(db));
    }
    if (this.supportsTransactions) {
      return db.transaction().execute(fn);
    }
    return fn(db);
  }

  async withSavepoint<T>(
    executor: DbExecutor,
    name: string,
    fn: () => Promise<T>
  ): Promise<T> {
    if (!this.supportsSavepoints) {
      return fn();
    }
    await sql.raw(`SAVEPOINT ${name}`).execute(executor);
    try {
      const result = await fn();
      await sql.raw(`RELEASE SAVEPOINT ${name}`).execute(executor);
      return result;
    } catch (error) {
      await sql.raw(`ROLLBACK TO SAVEPOINT ${name}`).execute(executor);
      await sql.raw(`RELEASE SAVEPOINT ${name}`).execute(executor);
      throw error;
    }
  }
}
