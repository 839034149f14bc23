/**
 * @daybook/server - Schema setup
 */

import type { Kysely } from 'kysely';
import type { ServerSyncDialect } from './dialect/types';
import type { SyncDb } from './schema';

/**
 * Ensures the change log and every registry table exist.
 * Safe to call multiple times (idempotent).
 */
export async function ensureSyncSchema(
  db: Kysely<SyncDb>,
  dialect: ServerSyncDialect
): Promise<void> {
  await dialect.ensureSyncSchema(db);
}
