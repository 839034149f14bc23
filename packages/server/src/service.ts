/**
 * @daybook/server - SyncService
 *
 * Binds the engine operations to one database handle, dialect and clock.
 */

import type {
  SyncDeltaResponse,
  SyncPushRecord,
  SyncPushResponse,
  SyncSnapshotResponse,
} from '@daybook/core';
import type { Kysely } from 'kysely';
import { z } from 'zod';
import type { ServerSyncDialect } from './dialect/types';
import { SyncRequestError } from './errors';
import {
  maybeRunSyncMaintenance,
  type MaintenanceOptions,
  type MaintenanceResult,
} from './prune';
import { pullChanges } from './pull';
import { pushChanges } from './push';
import type { SyncDb } from './schema';
import { exportFullSnapshot } from './snapshot';

export interface SyncServiceOptions {
  db: Kysely<SyncDb>;
  dialect: ServerSyncDialect;
  /** Clock for every server-stamped timestamp. Defaults to the wall clock. */
  now?: () => Date;
  /** Delta row count above which a warning is logged. Default: 5000. */
  largeResponseThreshold?: number;
  maintenance?: MaintenanceOptions;
}

const OffsetDateTimeSchema = z.iso.datetime({ offset: true });
const LocalDateTimeSchema = z.iso.datetime({ local: true });
const DateSchema = z.iso.date();

/**
 * Normalize an ISO-8601 checkpoint to UTC with millisecond precision, or
 * `null` for anything else. Date-times without an offset and plain dates
 * are read as UTC.
 */
export function normalizeCheckpoint(since: string): string | null {
  let utc: string;
  if (OffsetDateTimeSchema.safeParse(since).success) {
    utc = since;
  } else if (LocalDateTimeSchema.safeParse(since).success) {
    utc = `${since}Z`;
  } else if (DateSchema.safeParse(since).success) {
    utc = `${since}T00:00:00Z`;
  } else {
    return null;
  }
  const parsed = new Date(utc);
  return Number.isNaN(parsed.getTime()) ? null : parsed.toISOString();
}

export class SyncService {
  readonly db: Kysely<SyncDb>;
  readonly dialect: ServerSyncDialect;
  private readonly clock: () => Date;
  private readonly largeResponseThreshold: number | undefined;
  private readonly maintenance: MaintenanceOptions | undefined;

  constructor(options: SyncServiceOptions) {
    this.db = options.db;
    this.dialect = options.dialect;
    this.clock = options.now ?? (() => new Date());
    this.largeResponseThreshold = options.largeResponseThreshold;
    this.maintenance = options.maintenance;
  }

  now(): string {
    return this.clock().toISOString();
  }

  /**
   * Changes for `userId` after `since`. The returned `synced_at` lies 1 ms
   * before the read starts, so a change stamped in the same millisecond as
   * the read, or committed while it runs, is returned again on the next
   * pull rather than skipped.
   */
  async getChangesSince(
    userId: string,
    since: string
  ): Promise<SyncDeltaResponse> {
    const checkpoint = normalizeCheckpoint(since);
    if (checkpoint === null) {
      throw new SyncRequestError(`Invalid checkpoint: ${since}`);
    }
    const syncedAt = new Date(this.clock().getTime() - 1).toISOString();
    return pullChanges({
      db: this.db,
      dialect: this.dialect,
      userId,
      since: checkpoint,
      syncedAt,
      largeResponseThreshold: this.largeResponseThreshold,
    });
  }

  async pushChanges(
    userId: string,
    records: readonly SyncPushRecord[]
  ): Promise<SyncPushResponse> {
    return pushChanges({
      db: this.db,
      dialect: this.dialect,
      userId,
      records,
      now: () => this.now(),
    });
  }

  async getFullSnapshot(userId: string): Promise<SyncSnapshotResponse> {
    return exportFullSnapshot({
      db: this.db,
      dialect: this.dialect,
      userId,
      downloadedAt: this.now(),
    });
  }

  async runMaintenance(): Promise<MaintenanceResult> {
    return maybeRunSyncMaintenance(this.db, this.dialect, {
      now: this.now(),
      options: this.maintenance,
    });
  }
}
