/**
 * @daybook/core - Version conflict resolution
 *
 * Server-authoritative last-write-wins. A push is accepted when the client
 * has seen at least the stored version; otherwise the server row stands and
 * the client receives it back unmerged. Pure: no database access.
 */

import type { SyncConflict, SyncOperationType } from './schemas/sync';

export const CONFLICT_RESOLUTION = 'server_wins' as const;

export interface VersionConflictInput {
  tableName: string;
  recordId: string;
  operation: SyncOperationType;
  clientVersion: number;
  serverVersion: number;
  serverData: Record<string, unknown>;
  clientData?: Record<string, unknown>;
}

export type VersionConflictDecision =
  | { accepted: true; newVersion: number }
  | { accepted: false; conflict: SyncConflict };

export function resolveVersionConflict(
  input: VersionConflictInput
): VersionConflictDecision {
  if (input.clientVersion >= input.serverVersion) {
    return { accepted: true, newVersion: input.serverVersion + 1 };
  }

  const isDelete = input.operation === 'DELETE';
  const conflict: SyncConflict = {
    table_name: input.tableName,
    record_id: input.recordId,
    client_version: input.clientVersion,
    server_version: input.serverVersion,
    server_data: input.serverData,
    is_delete_conflict: isDelete,
    resolution: CONFLICT_RESOLUTION,
  };
  // The rejected payload is echoed for the client to reconcile; DELETE has none.
  if (!isDelete && input.clientData !== undefined) {
    conflict.client_data = input.clientData;
  }
  return { accepted: false, conflict };
}
