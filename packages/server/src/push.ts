/**
 * @daybook/server - Push pipeline
 *
 * Applies a batch of client mutations in one transaction. Each record runs in
 * its own savepoint, so a record that fails is rolled back alone and reported
 * as an error outcome while the rest of the batch commits.
 */

import {
  captureSyncException,
  countSyncMetric,
  describeError,
  distributionSyncMetric,
  getRequiredInsertColumns,
  IMMUTABLE_SYNC_COLUMNS,
  isSyncTableName,
  logSyncEvent,
  parseSyncPayload,
  resolveVersionConflict,
  startSyncSpan,
  type SyncConflict,
  type SyncPushRecord,
  type SyncPushResponse,
  type SyncPushResult,
  type SyncTableName,
} from '@daybook/core';
import type { Kysely } from 'kysely';
import { appendChange } from './change-log';
import {
  classifyConstraintViolationCode,
  coerceNumber,
  isConstraintViolationError,
} from './dialect/helpers';
import type { ServerSyncDialect } from './dialect/types';
import { decodeRecordRow, encodeRecordRow, readStoredRecord } from './records';
import type { DbExecutor, SyncDb, SyncRecordRow } from './schema';

export type PushErrorCode =
  | 'UNKNOWN_TABLE'
  | 'INVALID_PAYLOAD'
  | 'MISSING_REQUIRED_COLUMNS'
  | 'RECORD_ID_TAKEN'
  | 'CONCURRENT_MODIFICATION'
  | 'NOT_NULL_CONSTRAINT'
  | 'UNIQUE_CONSTRAINT'
  | 'FOREIGN_KEY_CONSTRAINT'
  | 'CHECK_CONSTRAINT'
  | 'CONSTRAINT_VIOLATION'
  | 'INTERNAL_ERROR';

export interface PushChangesArgs {
  db: Kysely<SyncDb>;
  dialect: ServerSyncDialect;
  userId: string;
  records: readonly SyncPushRecord[];
  /** Clock for server-stamped timestamps; ISO-8601 UTC */
  now?: () => string;
}

type RecordOutcome =
  | { kind: 'applied'; result: SyncPushResult }
  | { kind: 'conflict'; result: SyncPushResult; conflict: SyncConflict }
  | { kind: 'error'; result: SyncPushResult };

/**
 * A per-record failure carrying its result code. Thrown inside the record's
 * savepoint so that anything it wrote is rolled back.
 */
class PushRecordError extends Error {
  readonly code: PushErrorCode;

  constructor(code: PushErrorCode, message: string) {
    super(message);
    this.name = 'PushRecordError';
    this.code = code;
  }
}

const defaultNow = (): string => new Date().toISOString();

function recordPushMetrics(args: {
  status: 'applied' | 'conflict' | 'error';
  durationMs: number;
  recordCount: number;
  conflictCount: number;
  errorCount: number;
}): void {
  const { status, durationMs, recordCount, conflictCount, errorCount } = args;

  countSyncMetric('sync.push.requests', 1, {
    attributes: { status },
  });
  countSyncMetric('sync.push.records', recordCount);
  if (conflictCount > 0) {
    countSyncMetric('sync.push.conflicts', conflictCount);
  }
  if (errorCount > 0) {
    countSyncMetric('sync.push.errors', errorCount);
  }
  distributionSyncMetric('sync.push.duration_ms', durationMs, {
    unit: 'millisecond',
    attributes: { status },
  });
}

function errorOutcome(
  record: SyncPushRecord,
  code: PushErrorCode,
  message: string
): RecordOutcome {
  return {
    kind: 'error',
    result: {
      table_name: record.table_name,
      record_id: record.record_id,
      success: false,
      error: message,
      error_code: code,
    },
  };
}

function storedVersion(row: SyncRecordRow): number {
  return coerceNumber(row.server_version) ?? 1;
}

function withoutImmutableColumns(
  payload: Record<string, unknown>
): Record<string, unknown> {
  const next = { ...payload };
  for (const column of IMMUTABLE_SYNC_COLUMNS) {
    delete next[column];
  }
  return next;
}

export async function pushChanges(
  args: PushChangesArgs
): Promise<SyncPushResponse> {
  const { db, dialect, userId, records } = args;
  const now = args.now ?? defaultNow;
  const recordCount = records.length;
  const startedAtMs = Date.now();

  return startSyncSpan(
    {
      name: 'sync.push',
      op: 'sync.push',
      attributes: { userId, record_count: recordCount },
    },
    async (span) => {
      try {
        const results: SyncPushResult[] = [];
        const conflicts: SyncConflict[] = [];
        let errorCount = 0;

        await dialect.executeInTransaction(db, async (trx) => {
          for (const [index, record] of records.entries()) {
            const outcome = await processRecord({
              trx,
              dialect,
              userId,
              record,
              index,
              now,
            });
            if (outcome.kind === 'conflict') conflicts.push(outcome.conflict);
            if (outcome.kind === 'error') errorCount += 1;
            results.push(outcome.result);
          }
        });

        const durationMs = Math.max(0, Date.now() - startedAtMs);
        const status =
          conflicts.length > 0
            ? 'conflict'
            : errorCount > 0
              ? 'error'
              : 'applied';
        span.setAttribute('status', status);
        span.setAttribute('duration_ms', durationMs);
        span.setAttribute('conflict_count', conflicts.length);
        span.setStatus('ok');

        recordPushMetrics({
          status,
          durationMs,
          recordCount,
          conflictCount: conflicts.length,
          errorCount,
        });
        logSyncEvent({
          event: 'sync.push',
          userId,
          durationMs,
          recordCount,
          conflictCount: conflicts.length,
          errorCount,
        });

        return {
          results,
          conflicts,
          synced_at: now(),
          has_conflicts: conflicts.length > 0,
        };
      } catch (error) {
        const durationMs = Math.max(0, Date.now() - startedAtMs);
        span.setAttribute('status', 'error');
        span.setAttribute('duration_ms', durationMs);
        span.setStatus('error');

        recordPushMetrics({
          status: 'error',
          durationMs,
          recordCount,
          conflictCount: 0,
          errorCount: recordCount,
        });
        captureSyncException(error, {
          event: 'sync.push',
          userId,
          recordCount,
        });
        throw error;
      }
    }
  );
}

async function processRecord(args: {
  trx: DbExecutor;
  dialect: ServerSyncDialect;
  userId: string;
  record: SyncPushRecord;
  index: number;
  now: () => string;
}): Promise<RecordOutcome> {
  const { trx, dialect, userId, record } = args;
  const table = record.table_name;

  if (!isSyncTableName(table)) {
    return errorOutcome(record, 'UNKNOWN_TABLE', `Invalid table name: ${table}`);
  }

  let payload: Record<string, unknown> = {};
  if (record.operation !== 'DELETE') {
    const parsed = parseSyncPayload(table, record.data ?? {});
    if (!parsed.success) {
      return errorOutcome(record, 'INVALID_PAYLOAD', parsed.message);
    }
    payload = parsed.payload;
  }

  try {
    return await dialect.withSavepoint(
      trx,
      `daybook_push_${args.index}`,
      () =>
        applyRecord({
          trx,
          dialect,
          userId,
          table,
          record,
          payload,
          changedAt: args.now(),
        })
    );
  } catch (error) {
    if (error instanceof PushRecordError) {
      return errorOutcome(record, error.code, error.message);
    }
    // Without savepoints the transaction may already be aborted.
    if (!dialect.supportsSavepoints) throw error;
    return classifyStorageError(trx, table, record, userId, error);
  }
}

async function classifyStorageError(
  trx: DbExecutor,
  table: SyncTableName,
  record: SyncPushRecord,
  userId: string,
  error: unknown
): Promise<RecordOutcome> {
  const message = describeError(error);
  if (!isConstraintViolationError(message)) {
    return errorOutcome(record, 'INTERNAL_ERROR', message);
  }

  const code = classifyConstraintViolationCode(message);
  if (code === 'UNIQUE_CONSTRAINT') {
    const owner = await trx
      .selectFrom(table)
      .select('user_id')
      .where('id', '=', record.record_id)
      .executeTakeFirst();
    if (owner && owner.user_id !== userId) {
      return errorOutcome(
        record,
        'RECORD_ID_TAKEN',
        `Record id ${record.record_id} is already in use`
      );
    }
  }
  return errorOutcome(record, code, message);
}

async function applyRecord(args: {
  trx: DbExecutor;
  dialect: ServerSyncDialect;
  userId: string;
  table: SyncTableName;
  record: SyncPushRecord;
  payload: Record<string, unknown>;
  changedAt: string;
}): Promise<RecordOutcome> {
  const { trx, dialect, userId, table, record, payload, changedAt } = args;
  const recordId = record.record_id;

  const stored = await readStoredRecord(trx, dialect, table, recordId, userId, {
    forUpdate: true,
  });

  if (!stored) {
    if (record.operation === 'DELETE') {
      // Nothing to delete; the client's intent already holds.
      return {
        kind: 'applied',
        result: { table_name: table, record_id: recordId, success: true },
      };
    }
    return insertRecord(args);
  }

  const serverVersion = storedVersion(stored);
  const decision = resolveVersionConflict({
    tableName: table,
    recordId,
    operation: record.operation,
    clientVersion: record.client_version,
    serverVersion,
    serverData: decodeRecordRow(table, stored, dialect),
    clientData: record.data ?? undefined,
  });
  if (!decision.accepted) {
    return conflictOutcome(table, recordId, decision.conflict);
  }

  const changes: SyncRecordRow =
    record.operation === 'DELETE'
      ? { deleted_at_utc: changedAt }
      : withoutImmutableColumns(payload);

  const updated = await trx
    .updateTable(table)
    .set(
      encodeRecordRow(
        table,
        {
          ...changes,
          server_version: decision.newVersion,
          sync_status: 'synced',
          updated_at_utc: changedAt,
        },
        dialect
      )
    )
    .where('id', '=', recordId)
    .where('user_id', '=', userId)
    .where('server_version', '=', serverVersion)
    .executeTakeFirst();

  if (Number(updated.numUpdatedRows) === 0) {
    // Another writer committed between the read and the write.
    const current = await readStoredRecord(trx, dialect, table, recordId, userId);
    if (!current) {
      throw new PushRecordError(
        'CONCURRENT_MODIFICATION',
        `Record ${recordId} was removed during the push`
      );
    }
    const retry = resolveVersionConflict({
      tableName: table,
      recordId,
      operation: record.operation,
      clientVersion: record.client_version,
      serverVersion: storedVersion(current),
      serverData: decodeRecordRow(table, current, dialect),
      clientData: record.data ?? undefined,
    });
    if (retry.accepted) {
      throw new PushRecordError(
        'CONCURRENT_MODIFICATION',
        `Record ${recordId} changed during the push`
      );
    }
    return conflictOutcome(table, recordId, retry.conflict);
  }

  await appendChange(trx, {
    userId,
    table,
    recordId,
    operation: record.operation === 'DELETE' ? 'DELETE' : 'UPDATE',
    changedAt,
    newVersion: decision.newVersion,
  });

  return {
    kind: 'applied',
    result: {
      table_name: table,
      record_id: recordId,
      success: true,
      new_version: decision.newVersion,
    },
  };
}

async function insertRecord(args: {
  trx: DbExecutor;
  dialect: ServerSyncDialect;
  userId: string;
  table: SyncTableName;
  record: SyncPushRecord;
  payload: Record<string, unknown>;
  changedAt: string;
}): Promise<RecordOutcome> {
  const { trx, dialect, userId, table, record, payload, changedAt } = args;

  const missing = getRequiredInsertColumns(table).filter(
    (column) => payload[column] === undefined || payload[column] === null
  );
  if (missing.length > 0) {
    throw new PushRecordError(
      'MISSING_REQUIRED_COLUMNS',
      `Missing required columns: ${missing.join(', ')}`
    );
  }

  await trx
    .insertInto(table)
    .values(
      encodeRecordRow(
        table,
        {
          ...payload,
          id: record.record_id,
          user_id: userId,
          server_version: 1,
          sync_status: 'synced',
          created_at_utc: payload.created_at_utc ?? changedAt,
          updated_at_utc: changedAt,
          deleted_at_utc: null,
        },
        dialect
      )
    )
    .execute();

  await appendChange(trx, {
    userId,
    table,
    recordId: record.record_id,
    operation: 'INSERT',
    changedAt,
    newVersion: 1,
  });

  return {
    kind: 'applied',
    result: {
      table_name: table,
      record_id: record.record_id,
      success: true,
      new_version: 1,
    },
  };
}

function conflictOutcome(
  table: SyncTableName,
  recordId: string,
  conflict: SyncConflict
): RecordOutcome {
  return {
    kind: 'conflict',
    result: {
      table_name: table,
      record_id: recordId,
      success: false,
      has_conflict: true,
    },
    conflict,
  };
}
