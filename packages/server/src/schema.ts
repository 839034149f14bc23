/**
 * @daybook/server - database schema types
 *
 * - sync_log: append-only change log, one row per accepted mutation
 * - one table per registry entry, holding the user's syncable records
 */

import type { SyncOperationType, SyncTableName } from '@daybook/core';
import type { ColumnType, Kysely, Transaction } from 'kysely';

/**
 * Change log entries, read back by delta pulls.
 */
export interface SyncLogTable {
  /** Monotonic entry id; breaks ties between equal timestamps. */
  log_id: ColumnType<number | string | bigint, never, never>;
  user_id: string;
  /** Registry table the change applies to */
  table_name: string;
  record_id: string;
  operation: SyncOperationType;
  /** ISO-8601 UTC; pg hands back `Date` for timestamptz */
  changed_at_utc: ColumnType<string | Date, string | undefined, string>;
  /** Record version after the change */
  new_version: number;
}

/**
 * A syncable record table. Columns beyond the system ones vary per table and
 * are described by the core table registry.
 */
export interface SyncRecordTable {
  [column: string]: unknown;
}

export type SyncRecordTables = { [T in SyncTableName]: SyncRecordTable };

export interface SyncDb extends SyncRecordTables {
  sync_log: SyncLogTable;
}

export type SyncRecordRow = Record<string, unknown>;

export type SyncLogRow = {
  log_id: number;
  user_id: string;
  table_name: string;
  record_id: string;
  operation: SyncOperationType;
  changed_at_utc: string;
  new_version: number;
};

export type DbExecutor = Kysely<SyncDb> | Transaction<SyncDb>;
