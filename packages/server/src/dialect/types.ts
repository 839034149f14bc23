/**
 * @daybook/server - Server Sync Dialect Interface
 *
 * Abstracts the database-specific parts of the sync engine: DDL and
 * transaction control. Queries themselves go through Kysely and are shared.
 */

import type { ColumnCodecDialect } from '@daybook/core';
import type { Kysely } from 'kysely';
import type { DbExecutor, SyncDb } from '../schema';

export type SqlFamily = ColumnCodecDialect;

export type ServerSqliteDialect = ServerSyncDialect<'sqlite'>;
export type ServerPostgresDialect = ServerSyncDialect<'postgres'>;

export interface ServerSyncDialect<F extends SqlFamily = SqlFamily> {
  readonly family: F;
  /** Whether per-record savepoints can isolate failures inside a batch */
  readonly supportsSavepoints: boolean;
  /** Whether `SELECT ... FOR UPDATE` row locks are available */
  readonly supportsForUpdate: boolean;

  /** Create the change log and every registry table + indexes (idempotent) */
  ensureSyncSchema(db: Kysely<SyncDb>): Promise<void>;

  /**
   * Execute callback in a transaction (or directly if transactions are not
   * supported). Inside an open transaction a savepoint is used instead.
   */
  executeInTransaction<T>(
    db: Kysely<SyncDb>,
    fn: (executor: DbExecutor) => Promise<T>
  ): Promise<T>;

  /**
   * Run `fn` inside a named savepoint of the current transaction. A thrown
   * error rolls back to the savepoint and is rethrown. Without savepoint
   * support `fn` runs as is.
   */
  withSavepoint<T>(
    executor: DbExecutor,
    name: string,
    fn: () => Promise<T>
  ): Promise<T>;
}
