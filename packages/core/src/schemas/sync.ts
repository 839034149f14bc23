/**
 * @daybook/core - Sync protocol Zod schemas
 *
 * These schemas define the wire format of the sync endpoints and can be used
 * for:
 * - Runtime validation of push requests
 * - Type inference for responses
 */

import { z } from 'zod';

// ============================================================================
// Operation Types
// ============================================================================

export const SyncOperationTypeSchema = z.enum(['INSERT', 'UPDATE', 'DELETE']);
export type SyncOperationType = z.infer<typeof SyncOperationTypeSchema>;

const requiredString = (field: string) =>
  z
    .string({
      error: (issue) =>
        issue.input === undefined ? `Missing ${field}` : `Invalid ${field}`,
    })
    .min(1, `Empty ${field}`);

const RecordDataSchema = z.record(z.string(), z.unknown());

// ============================================================================
// Push Request/Response Schemas
// ============================================================================

/**
 * One client-submitted mutation. `table_name` is only checked for shape
 * here; membership in the table registry is decided per record.
 */
export const SyncPushRecordSchema = z
  .object({
    table_name: requiredString('table_name'),
    record_id: requiredString('record_id'),
    operation: z.enum(['INSERT', 'UPDATE', 'DELETE'], {
      error: (issue) =>
        issue.input === undefined
          ? 'Missing operation'
          : `Invalid operation: ${String(issue.input)}`,
    }),
    client_version: z
      .number({
        error: (issue) =>
          issue.input === undefined
            ? 'Missing client_version'
            : 'Invalid client_version',
      })
      .int('Invalid client_version'),
    data: RecordDataSchema.nullable().optional(),
  })
  .superRefine((record, ctx) => {
    if (record.operation !== 'DELETE' && record.data == null) {
      ctx.addIssue({
        code: 'custom',
        path: ['data'],
        message: `Missing data for ${record.operation} operation`,
      });
    }
  });

export type SyncPushRecord = z.infer<typeof SyncPushRecordSchema>;

export const SyncPushRequestSchema = z.object({
  records: z.array(SyncPushRecordSchema).min(1),
});

export type SyncPushRequest = z.infer<typeof SyncPushRequestSchema>;

export const SyncConflictSchema = z.object({
  table_name: z.string(),
  record_id: z.string(),
  client_version: z.number().int(),
  server_version: z.number().int(),
  server_data: RecordDataSchema.optional(),
  client_data: RecordDataSchema.optional(),
  is_delete_conflict: z.boolean(),
  resolution: z.literal('server_wins'),
});

export type SyncConflict = z.infer<typeof SyncConflictSchema>;

export const SyncPushResultSchema = z.object({
  table_name: z.string(),
  record_id: z.string(),
  success: z.boolean(),
  new_version: z.number().int().optional(),
  has_conflict: z.boolean().optional(),
  error: z.string().optional(),
  error_code: z.string().optional(),
});

export type SyncPushResult = z.infer<typeof SyncPushResultSchema>;

export const SyncPushResponseSchema = z.object({
  results: z.array(SyncPushResultSchema),
  conflicts: z.array(SyncConflictSchema),
  synced_at: z.string(),
  has_conflicts: z.boolean(),
});

export type SyncPushResponse = z.infer<typeof SyncPushResponseSchema>;

// ============================================================================
// Delta Schemas
// ============================================================================

export const SyncDeltaQuerySchema = z.object({
  since: z.string(),
});

export const SyncDeltaRecordSchema = z.object({
  table_name: z.string(),
  record_id: z.string(),
  operation: SyncOperationTypeSchema,
  changed_at: z.string(),
  version: z.number().int(),
  data: RecordDataSchema.optional(),
});

export type SyncDeltaRecord = z.infer<typeof SyncDeltaRecordSchema>;

export const SyncDeltaResponseSchema = z.object({
  records: z.array(SyncDeltaRecordSchema),
  synced_at: z.string(),
});

export type SyncDeltaResponse = z.infer<typeof SyncDeltaResponseSchema>;

// ============================================================================
// Full Snapshot Schemas
// ============================================================================

export const SyncSnapshotResponseSchema = z.object({
  data: z.record(z.string(), z.array(RecordDataSchema)),
  downloaded_at: z.string(),
  tables: z.array(z.string()),
  record_counts: z.record(z.string(), z.number().int()),
});

export type SyncSnapshotResponse = z.infer<typeof SyncSnapshotResponseSchema>;
