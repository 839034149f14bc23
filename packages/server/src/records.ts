/**
 * @daybook/server - Record materialization
 *
 * Reads the current full row of one record for its owner and decodes it into
 * the shape clients exchange.
 */

import {
  applyCodecsFromDbRow,
  applyCodecsToDbRow,
  getTableColumnCodecs,
  isSyncTableName,
  type SyncTableName,
} from '@daybook/core';
import type { ServerSyncDialect } from './dialect/types';
import { UnknownSyncTableError } from './errors';
import type { DbExecutor, SyncRecordRow } from './schema';

export interface RecordKey {
  table: string;
  recordId: string;
  userId: string;
}

/**
 * Narrow a table name to the registry, throwing for anything else.
 */
export function assertSyncTableName(table: string): SyncTableName {
  if (!isSyncTableName(table)) {
    throw new UnknownSyncTableError(table);
  }
  return table;
}

export function decodeRecordRow(
  table: SyncTableName,
  row: SyncRecordRow,
  dialect: Pick<ServerSyncDialect, 'family'>
): SyncRecordRow {
  return applyCodecsFromDbRow(row, getTableColumnCodecs(table), dialect.family);
}

export function encodeRecordRow(
  table: SyncTableName,
  row: SyncRecordRow,
  dialect: Pick<ServerSyncDialect, 'family'>
): SyncRecordRow {
  return applyCodecsToDbRow(row, getTableColumnCodecs(table), dialect.family);
}

/**
 * Fetch the raw stored row. `forUpdate` takes a row lock where the dialect
 * supports it.
 */
export async function readStoredRecord(
  db: DbExecutor,
  dialect: Pick<ServerSyncDialect, 'supportsForUpdate'>,
  table: SyncTableName,
  recordId: string,
  userId: string,
  options: { forUpdate?: boolean } = {}
): Promise<SyncRecordRow | null> {
  let query = db
    .selectFrom(table)
    .selectAll()
    .where('id', '=', recordId)
    .where('user_id', '=', userId);
  if (options.forUpdate && dialect.supportsForUpdate) {
    query = query.forUpdate();
  }
  const row = await query.executeTakeFirst();
  return row ?? null;
}

/**
 * Current payload of a record (soft-deleted rows included), or null when the
 * user has no such record.
 */
export async function materializeRecord(
  db: DbExecutor,
  dialect: ServerSyncDialect,
  key: RecordKey
): Promise<SyncRecordRow | null> {
  const table = assertSyncTableName(key.table);
  const row = await readStoredRecord(db, dialect, table, key.recordId, key.userId);
  return row ? decodeRecordRow(table, row, dialect) : null;
}
