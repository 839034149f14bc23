/**
 * @daybook/server - Change log
 *
 * `sync_log` is append-only: the push pipeline and maintenance jobs write one
 * entry per accepted mutation, in the same transaction as the mutation, and
 * delta pulls read it back in order.
 */

import type { SyncOperationType, SyncTableName } from '@daybook/core';
import { coerceIsoString, coerceNumber } from './dialect/helpers';
import { SyncRetrievalError } from './errors';
import type { DbExecutor, SyncLogRow } from './schema';

export interface ChangeLogAppend {
  userId: string;
  table: SyncTableName;
  recordId: string;
  operation: SyncOperationType;
  changedAt: string;
  newVersion: number;
}

export async function appendChange(
  trx: DbExecutor,
  entry: ChangeLogAppend
): Promise<void> {
  await trx
    .insertInto('sync_log')
    .values({
      user_id: entry.userId,
      table_name: entry.table,
      record_id: entry.recordId,
      operation: entry.operation,
      changed_at_utc: entry.changedAt,
      new_version: entry.newVersion,
    })
    .execute();
}

/**
 * Entries for `userId` strictly after `since`, oldest first. Store failures
 * surface as {@link SyncRetrievalError}.
 */
export async function readChangesSince(
  db: DbExecutor,
  args: { userId: string; since: string }
): Promise<SyncLogRow[]> {
  try {
    const rows = await db
      .selectFrom('sync_log')
      .select([
        'log_id',
        'user_id',
        'table_name',
        'record_id',
        'operation',
        'changed_at_utc',
        'new_version',
      ])
      .where('user_id', '=', args.userId)
      .where('changed_at_utc', '>', args.since)
      .orderBy('changed_at_utc', 'asc')
      .orderBy('log_id', 'asc')
      .execute();

    return rows.map((row) => ({
      log_id: coerceNumber(row.log_id) ?? 0,
      user_id: row.user_id,
      table_name: row.table_name,
      record_id: row.record_id,
      operation: row.operation,
      changed_at_utc: coerceIsoString(row.changed_at_utc),
      new_version: coerceNumber(row.new_version) ?? 0,
    }));
  } catch (error) {
    throw new SyncRetrievalError('Failed to read change log', {
      cause: error,
    });
  }
}

/**
 * Hard-delete entries older than `before`. Returns the number removed.
 */
export async function deleteChangesBefore(
  db: DbExecutor,
  before: string
): Promise<number> {
  const result = await db
    .deleteFrom('sync_log')
    .where('changed_at_utc', '<', before)
    .executeTakeFirst();
  return Number(result.numDeletedRows);
}
