/**
 * @daybook/server - Delta pull
 *
 * Turns the change log after a checkpoint into the delta response: one entry
 * per logged change, with the record's current payload attached to INSERT
 * and UPDATE entries.
 */

import {
  countSyncMetric,
  distributionSyncMetric,
  isSyncTableName,
  logSyncEvent,
  startSyncSpan,
  type SyncDeltaRecord,
  type SyncDeltaResponse,
} from '@daybook/core';
import { readChangesSince } from './change-log';
import type { ServerSyncDialect } from './dialect/types';
import { SyncRetrievalError } from './errors';
import { materializeRecord } from './records';
import type { DbExecutor, SyncRecordRow } from './schema';

/** Row count above which a delta response is logged as oversized. */
export const DEFAULT_LARGE_RESPONSE_THRESHOLD = 5000;

export interface PullChangesArgs {
  db: DbExecutor;
  dialect: ServerSyncDialect;
  userId: string;
  /** Normalized ISO-8601 checkpoint; only strictly later changes are returned */
  since: string;
  /** Timestamp handed back as the client's next checkpoint */
  syncedAt: string;
  largeResponseThreshold?: number;
}

export async function pullChanges(
  args: PullChangesArgs
): Promise<SyncDeltaResponse> {
  const { db, dialect, userId } = args;

  return startSyncSpan(
    { name: 'sync.pull', op: 'sync.pull', attributes: { userId } },
    async (span) => {
      const startedAt = Date.now();
      const entries = await readChangesSince(db, {
        userId,
        since: args.since,
      });

      // A record touched several times in the window is read once.
      const materialized = new Map<string, SyncRecordRow | null>();
      const records: SyncDeltaRecord[] = [];

      for (const entry of entries) {
        const table = entry.table_name;
        if (!isSyncTableName(table)) {
          logSyncEvent({
            event: 'sync.delta.unknown_table',
            level: 'warn',
            userId,
            table,
            recordId: entry.record_id,
          });
          continue;
        }

        const record: SyncDeltaRecord = {
          table_name: table,
          record_id: entry.record_id,
          operation: entry.operation,
          changed_at: entry.changed_at_utc,
          version: entry.new_version,
        };

        if (entry.operation !== 'DELETE') {
          const cacheKey = `${table}:${entry.record_id}`;
          let data = materialized.get(cacheKey);
          if (data === undefined) {
            try {
              data = await materializeRecord(db, dialect, {
                table,
                recordId: entry.record_id,
                userId,
              });
            } catch (error) {
              throw new SyncRetrievalError('Failed to materialize record', {
                cause: error,
              });
            }
            materialized.set(cacheKey, data);
          }
          // Purged since the change was logged: the entry stays, without data.
          if (data) record.data = data;
        }

        records.push(record);
      }

      const durationMs = Date.now() - startedAt;
      span.setAttributes({ records: records.length, durationMs });
      span.setStatus('ok');
      countSyncMetric('sync.pull.records', records.length);
      distributionSyncMetric('sync.pull.duration_ms', durationMs, {
        unit: 'millisecond',
      });

      const threshold =
        args.largeResponseThreshold ?? DEFAULT_LARGE_RESPONSE_THRESHOLD;
      if (records.length > threshold) {
        logSyncEvent({
          event: 'sync.delta.large_response',
          level: 'warn',
          userId,
          recordCount: records.length,
          threshold,
        });
      }

      return { records, synced_at: args.syncedAt };
    }
  );
}
