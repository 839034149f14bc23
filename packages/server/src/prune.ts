/**
 * @daybook/server - Retention maintenance
 *
 * - Soft-deleted records are hard-deleted once older than the retention
 *   window (default 30 days); clients have long since pulled the DELETE.
 * - Change log entries older than 90 days are dropped. Clients behind that
 *   window recover through the full snapshot.
 * - Open bets past their due date move to `expired` as a server-side write
 *   with its own version bump and change log entry.
 *
 * The engine owns no timers; the host app decides when to run these.
 */

import {
  countSyncMetric,
  createSyncTimer,
  logSyncEvent,
  SYNC_TABLE_NAMES,
} from '@daybook/core';
import type { Kysely } from 'kysely';
import { appendChange, deleteChangesBefore } from './change-log';
import { coerceNumber } from './dialect/helpers';
import type { ServerSyncDialect } from './dialect/types';
import type { DbExecutor, SyncDb } from './schema';

const DAY_MS = 24 * 60 * 60 * 1000;

export const DEFAULT_SOFT_DELETE_RETENTION_MS = 30 * DAY_MS;
export const DEFAULT_CHANGE_LOG_RETENTION_MS = 90 * DAY_MS;

export interface MaintenanceOptions {
  /** Soft-deleted rows older than this are purged. Default: 30 days. */
  softDeleteRetentionMs?: number;
  /** Change log entries older than this are pruned. Default: 90 days. */
  changeLogRetentionMs?: number;
}

export interface MaintenanceResult {
  /** Rows purged per registry table */
  purgedRecords: Record<string, number>;
  prunedChanges: number;
  expiredBets: number;
}

function cutoffIso(now: string, ageMs: number): string {
  return new Date(new Date(now).getTime() - ageMs).toISOString();
}

export async function purgeSoftDeletedRecords(
  db: DbExecutor,
  args: { olderThan: string }
): Promise<Record<string, number>> {
  const counts: Record<string, number> = {};
  for (const table of SYNC_TABLE_NAMES) {
    const res = await db
      .deleteFrom(table)
      .where('deleted_at_utc', 'is not', null)
      .where('deleted_at_utc', '<', args.olderThan)
      .executeTakeFirst();
    counts[table] = Number(res.numDeletedRows);
  }
  return counts;
}

export async function pruneChangeLog(
  db: DbExecutor,
  args: { olderThan: string }
): Promise<number> {
  return deleteChangesBefore(db, args.olderThan);
}

/**
 * Expire every open, non-deleted bet whose due date has passed. Each bet is
 * versioned and logged like a client UPDATE so devices pull the new status.
 */
export async function expireOverdueBets(
  db: Kysely<SyncDb>,
  dialect: ServerSyncDialect,
  args: { now: string }
): Promise<number> {
  return dialect.executeInTransaction(db, async (trx) => {
    const overdue = await trx
      .selectFrom('bets')
      .select(['id', 'user_id', 'server_version'])
      .where('status', '=', 'open')
      .where('deleted_at_utc', 'is', null)
      .where('due_at_utc', '<', args.now)
      .execute();

    let expired = 0;
    for (const bet of overdue) {
      const recordId = String(bet.id);
      const userId = String(bet.user_id);
      const serverVersion = coerceNumber(bet.server_version) ?? 1;
      const newVersion = serverVersion + 1;

      const res = await trx
        .updateTable('bets')
        .set({
          status: 'expired',
          server_version: newVersion,
          sync_status: 'synced',
          updated_at_utc: args.now,
        })
        .where('id', '=', recordId)
        .where('user_id', '=', userId)
        .where('server_version', '=', serverVersion)
        .executeTakeFirst();
      // A concurrent push won; the bet is reconsidered on the next run.
      if (Number(res.numUpdatedRows) === 0) continue;

      await appendChange(trx, {
        userId,
        table: 'bets',
        recordId,
        operation: 'UPDATE',
        changedAt: args.now,
        newVersion,
      });
      expired += 1;
    }
    return expired;
  });
}

export async function runSyncMaintenance(
  db: Kysely<SyncDb>,
  dialect: ServerSyncDialect,
  args: { now: string; options?: MaintenanceOptions }
): Promise<MaintenanceResult> {
  const elapsed = createSyncTimer();
  const options = args.options ?? {};

  const expiredBets = await expireOverdueBets(db, dialect, { now: args.now });
  const purgedRecords = await purgeSoftDeletedRecords(db, {
    olderThan: cutoffIso(
      args.now,
      options.softDeleteRetentionMs ?? DEFAULT_SOFT_DELETE_RETENTION_MS
    ),
  });
  const prunedChanges = await pruneChangeLog(db, {
    olderThan: cutoffIso(
      args.now,
      options.changeLogRetentionMs ?? DEFAULT_CHANGE_LOG_RETENTION_MS
    ),
  });

  const purgedTotal = Object.values(purgedRecords).reduce(
    (sum, count) => sum + count,
    0
  );
  countSyncMetric('sync.maintenance.purged_records', purgedTotal);
  countSyncMetric('sync.maintenance.pruned_changes', prunedChanges);
  countSyncMetric('sync.maintenance.expired_bets', expiredBets);
  logSyncEvent({
    event: 'sync.maintenance',
    durationMs: elapsed(),
    purgedRecords: purgedTotal,
    prunedChanges,
    expiredBets,
  });

  return { purgedRecords, prunedChanges, expiredBets };
}

interface MaintenanceState {
  inFlight: Promise<MaintenanceResult> | null;
}

const maintenanceStateByDb = new WeakMap<object, MaintenanceState>();

/**
 * Run maintenance unless a run against the same database is already in
 * flight, in which case that run's result is shared.
 */
export async function maybeRunSyncMaintenance(
  db: Kysely<SyncDb>,
  dialect: ServerSyncDialect,
  args: { now: string; options?: MaintenanceOptions }
): Promise<MaintenanceResult> {
  let state = maintenanceStateByDb.get(db);
  if (!state) {
    state = { inFlight: null };
    maintenanceStateByDb.set(db, state);
  }
  if (state.inFlight) return state.inFlight;

  const current = state;
  current.inFlight = (async () => {
    try {
      return await runSyncMaintenance(db, dialect, args);
    } finally {
      current.inFlight = null;
    }
  })();
  return current.inFlight;
}
