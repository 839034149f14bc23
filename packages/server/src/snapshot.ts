/**
 * @daybook/server - Full snapshot export
 *
 * Every row the user owns across every registry table, soft-deleted rows
 * included. Used by clients recovering from a lost or corrupt local store.
 */

import {
  createSyncTimer,
  logSyncEvent,
  startSyncSpan,
  SYNC_TABLE_NAMES,
  type SyncSnapshotResponse,
} from '@daybook/core';
import type { ServerSyncDialect } from './dialect/types';
import { SyncRetrievalError } from './errors';
import { decodeRecordRow } from './records';
import type { DbExecutor, SyncRecordRow } from './schema';

export interface ExportFullSnapshotArgs {
  db: DbExecutor;
  dialect: ServerSyncDialect;
  userId: string;
  downloadedAt: string;
}

export async function exportFullSnapshot(
  args: ExportFullSnapshotArgs
): Promise<SyncSnapshotResponse> {
  const { db, dialect, userId } = args;

  return startSyncSpan(
    { name: 'sync.snapshot', op: 'sync.snapshot', attributes: { userId } },
    async (span) => {
      const elapsed = createSyncTimer();
      const data: Record<string, SyncRecordRow[]> = {};
      const recordCounts: Record<string, number> = {};
      let total = 0;

      for (const table of SYNC_TABLE_NAMES) {
        let rows: SyncRecordRow[];
        try {
          rows = await db
            .selectFrom(table)
            .selectAll()
            .where('user_id', '=', userId)
            .orderBy('id', 'asc')
            .execute();
        } catch (error) {
          throw new SyncRetrievalError(`Failed to export ${table}`, {
            cause: error,
          });
        }
        data[table] = rows.map((row) => decodeRecordRow(table, row, dialect));
        recordCounts[table] = rows.length;
        total += rows.length;
      }

      const durationMs = elapsed();
      span.setAttributes({ records: total, durationMs });
      span.setStatus('ok');
      logSyncEvent({
        event: 'sync.snapshot',
        userId,
        recordCount: total,
        durationMs,
      });

      return {
        data,
        downloaded_at: args.downloadedAt,
        tables: [...SYNC_TABLE_NAMES],
        record_counts: recordCounts,
      };
    }
  );
}
