/**
 * @daybook/core - Syncable table registry
 *
 * The closed set of tables clients may read and write through sync. Every
 * table name that arrives from a request body or a change-log row is checked
 * against this registry before it is handed to the query builder.
 *
 * Adding a table is a code change: define its payload schema and column
 * specs below and append the name to `SYNC_TABLE_NAMES`.
 */

import { z } from 'zod';

export const SYNC_TABLE_NAMES = [
  'daily_entries',
  'weekly_briefs',
  'problems',
  'portfolio_versions',
  'board_members',
  'governance_sessions',
  'bets',
  'evidence_items',
  'resetup_triggers',
  'user_preferences',
] as const;

export const SyncTableNameSchema = z.enum(SYNC_TABLE_NAMES);
export type SyncTableName = z.infer<typeof SyncTableNameSchema>;

const syncTableNameSet: ReadonlySet<string> = new Set(SYNC_TABLE_NAMES);

export function isSyncTableName(value: string): value is SyncTableName {
  return syncTableNameSet.has(value);
}

// ============================================================================
// Column specs
// ============================================================================

export type SyncColumnType =
  | 'text'
  | 'integer'
  | 'boolean'
  | 'json'
  | 'timestamp';

export interface SyncColumnSpec {
  type: SyncColumnType;
  nullable: boolean;
  /**
   * Store-side default used when an INSERT omits the column. JSON defaults
   * are given as JSON text.
   */
  defaultValue?: string | number | boolean;
}

function columnSpec(
  type: SyncColumnType,
  options: { nullable?: boolean; defaultValue?: string | number | boolean } = {}
): SyncColumnSpec {
  const spec: SyncColumnSpec = { type, nullable: options.nullable ?? false };
  if (options.defaultValue !== undefined) {
    spec.defaultValue = options.defaultValue;
  }
  return spec;
}

const col = {
  text: (defaultValue?: string) => columnSpec('text', { defaultValue }),
  nullableText: () => columnSpec('text', { nullable: true }),
  integer: (defaultValue?: number) => columnSpec('integer', { defaultValue }),
  nullableInteger: () => columnSpec('integer', { nullable: true }),
  boolean: (defaultValue = false) => columnSpec('boolean', { defaultValue }),
  json: (defaultValue?: string) => columnSpec('json', { defaultValue }),
  timestamp: () => columnSpec('timestamp'),
  nullableTimestamp: () => columnSpec('timestamp', { nullable: true }),
};

/**
 * Columns every syncable table carries in addition to its payload.
 */
export const SYNC_SYSTEM_COLUMNS = {
  id: col.text(),
  user_id: col.text(),
  server_version: col.integer(1),
  sync_status: col.text('synced'),
  created_at_utc: col.timestamp(),
  updated_at_utc: col.timestamp(),
  deleted_at_utc: col.nullableTimestamp(),
} satisfies Record<string, SyncColumnSpec>;

export type SyncSystemColumn = keyof typeof SYNC_SYSTEM_COLUMNS;

/**
 * Fields a client may never change once a record exists.
 */
export const IMMUTABLE_SYNC_COLUMNS = [
  'id',
  'user_id',
  'created_at_utc',
] as const satisfies readonly SyncSystemColumn[];

// ============================================================================
// Payload schemas
// ============================================================================

const timestamp = () => z.iso.datetime({ offset: true });
const jsonObject = () => z.record(z.string(), z.unknown());
const jsonArray = () => z.array(z.unknown());
const jsonValue = () => z.union([jsonObject(), jsonArray()]);

/**
 * Payload fields shared by every table. `created_at_utc` is honoured on
 * INSERT only.
 */
const basePayload = {
  created_at_utc: timestamp().optional(),
};

export const EntryTypeSchema = z.enum(['voice', 'text']);
export const ProblemDirectionSchema = z.enum([
  'appreciating',
  'depreciating',
  'stable',
]);
export const BoardRoleTypeSchema = z.enum([
  'accountability',
  'marketReality',
  'avoidance',
  'longTermPositioning',
  'devilsAdvocate',
  'portfolioDefender',
  'opportunityScout',
]);
export const GovernanceSessionTypeSchema = z.enum([
  'quick',
  'setup',
  'quarterly',
]);
export const BetStatusSchema = z.enum(['open', 'correct', 'wrong', 'expired']);
export const EvidenceTypeSchema = z.enum([
  'decision',
  'artifact',
  'calendar',
  'proxy',
  'none',
]);
export const EvidenceStrengthSchema = z.enum([
  'strong',
  'medium',
  'weak',
  'none',
]);
export const ResetupTriggerTypeSchema = z.enum([
  'role_change',
  'scope_change',
  'direction_shift',
  'time_drift',
  'annual',
]);
export const ResetupActionSchema = z.enum([
  'full_resetup',
  'update_problem',
  'review_health',
]);

const DailyEntryPayloadSchema = z.object({
  ...basePayload,
  transcript_raw: z.string().optional(),
  transcript_edited: z.string().optional(),
  extracted_signals_json: jsonValue().optional(),
  entry_type: EntryTypeSchema.optional(),
  word_count: z.number().int().min(0).optional(),
  duration_seconds: z.number().int().min(0).nullable().optional(),
  created_at_timezone: z.string().max(50).optional(),
});

const WeeklyBriefPayloadSchema = z.object({
  ...basePayload,
  week_start_utc: timestamp().optional(),
  week_end_utc: timestamp().optional(),
  week_timezone: z.string().max(50).optional(),
  brief_markdown: z.string().optional(),
  board_micro_review_markdown: z.string().nullable().optional(),
  entry_count: z.number().int().min(0).optional(),
  regen_count: z.number().int().min(0).optional(),
  regen_options_json: jsonValue().optional(),
  micro_review_collapsed: z.boolean().optional(),
  generated_at_utc: timestamp().optional(),
});

const ProblemPayloadSchema = z.object({
  ...basePayload,
  name: z.string().max(255).optional(),
  what_breaks: z.string().optional(),
  scarcity_signals_json: jsonValue().optional(),
  direction: ProblemDirectionSchema.optional(),
  direction_rationale: z.string().optional(),
  evidence_ai_cheaper: z.string().optional(),
  evidence_error_cost: z.string().optional(),
  evidence_trust_required: z.string().optional(),
  time_allocation_percent: z.number().int().min(0).max(100).optional(),
  display_order: z.number().int().optional(),
});

const PortfolioVersionPayloadSchema = z.object({
  ...basePayload,
  version_number: z.number().int().min(1).optional(),
  problems_snapshot_json: jsonValue().optional(),
  health_snapshot_json: jsonValue().optional(),
  board_anchoring_snapshot_json: jsonValue().optional(),
  triggers_snapshot_json: jsonValue().optional(),
  trigger_reason: z.string().optional(),
});

const BoardMemberPayloadSchema = z.object({
  ...basePayload,
  role_type: BoardRoleTypeSchema.optional(),
  is_growth_role: z.boolean().optional(),
  is_active: z.boolean().optional(),
  anchored_problem_id: z.string().nullable().optional(),
  anchored_demand: z.string().nullable().optional(),
  persona_name: z.string().max(50).optional(),
  persona_background: z.string().max(300).optional(),
  persona_communication_style: z.string().max(200).optional(),
  persona_signature_phrase: z.string().max(100).nullable().optional(),
  original_persona_name: z.string().max(50).optional(),
  original_persona_background: z.string().max(300).optional(),
  original_persona_communication_style: z.string().max(200).optional(),
  original_persona_signature_phrase: z.string().max(100).nullable().optional(),
});

const GovernanceSessionPayloadSchema = z.object({
  ...basePayload,
  session_type: GovernanceSessionTypeSchema.optional(),
  current_state: z.string().max(50).optional(),
  is_completed: z.boolean().optional(),
  abstraction_mode: z.boolean().optional(),
  vagueness_skip_count: z.number().int().min(0).max(2).optional(),
  transcript_json: jsonValue().optional(),
  output_markdown: z.string().nullable().optional(),
  created_portfolio_version_id: z.string().nullable().optional(),
  evaluated_bet_id: z.string().nullable().optional(),
  created_bet_id: z.string().nullable().optional(),
  duration_seconds: z.number().int().min(0).nullable().optional(),
  started_at_utc: timestamp().optional(),
  completed_at_utc: timestamp().nullable().optional(),
});

const BetPayloadSchema = z.object({
  ...basePayload,
  prediction: z.string().optional(),
  wrong_if: z.string().optional(),
  status: BetStatusSchema.optional(),
  source_session_id: z.string().nullable().optional(),
  evaluation_session_id: z.string().nullable().optional(),
  evaluation_notes: z.string().nullable().optional(),
  due_at_utc: timestamp().optional(),
  evaluated_at_utc: timestamp().nullable().optional(),
});

const EvidenceItemPayloadSchema = z.object({
  ...basePayload,
  session_id: z.string().optional(),
  problem_id: z.string().nullable().optional(),
  evidence_type: EvidenceTypeSchema.optional(),
  statement_text: z.string().optional(),
  strength_flag: EvidenceStrengthSchema.optional(),
  context: z.string().nullable().optional(),
});

const ResetupTriggerPayloadSchema = z.object({
  ...basePayload,
  trigger_type: ResetupTriggerTypeSchema.optional(),
  description: z.string().optional(),
  condition: z.string().optional(),
  recommended_action: ResetupActionSchema.optional(),
  is_met: z.boolean().optional(),
  met_at_utc: timestamp().nullable().optional(),
  due_at_utc: timestamp().nullable().optional(),
});

const UserPreferencesPayloadSchema = z.object({
  ...basePayload,
  abstraction_mode_quick: z.boolean().optional(),
  abstraction_mode_setup: z.boolean().optional(),
  abstraction_mode_quarterly: z.boolean().optional(),
  remember_abstraction_choice: z.boolean().optional(),
  analytics_enabled: z.boolean().optional(),
  micro_review_collapsed: z.boolean().optional(),
  onboarding_completed: z.boolean().optional(),
  setup_prompt_dismissed: z.boolean().optional(),
  setup_prompt_last_shown_utc: timestamp().nullable().optional(),
  total_entry_count: z.number().int().min(0).optional(),
});

// ============================================================================
// Table definitions
// ============================================================================

type PayloadColumns<P extends z.ZodObject> = {
  [K in Exclude<keyof z.output<P>, 'created_at_utc'>]-?: SyncColumnSpec;
};

export interface SyncTableDefinition<P extends z.ZodObject = z.ZodObject> {
  name: SyncTableName;
  payload: P;
  /** Payload columns (system columns excluded). */
  columns: Record<string, SyncColumnSpec>;
  /** At most one live row per user (enforced by a unique index). */
  uniquePerUser: boolean;
}

function defineSyncTable<P extends z.ZodObject>(definition: {
  name: SyncTableName;
  payload: P;
  columns: PayloadColumns<P>;
  uniquePerUser?: boolean;
}): SyncTableDefinition<P> {
  return {
    name: definition.name,
    payload: definition.payload,
    columns: definition.columns,
    uniquePerUser: definition.uniquePerUser ?? false,
  };
}

export const SYNC_TABLES = {
  daily_entries: defineSyncTable({
    name: 'daily_entries',
    payload: DailyEntryPayloadSchema,
    columns: {
      transcript_raw: col.text(),
      transcript_edited: col.text(),
      extracted_signals_json: col.json('{}'),
      entry_type: col.text(),
      word_count: col.integer(0),
      duration_seconds: col.nullableInteger(),
      created_at_timezone: col.text(),
    },
  }),
  weekly_briefs: defineSyncTable({
    name: 'weekly_briefs',
    payload: WeeklyBriefPayloadSchema,
    columns: {
      week_start_utc: col.timestamp(),
      week_end_utc: col.timestamp(),
      week_timezone: col.text(),
      brief_markdown: col.text(),
      board_micro_review_markdown: col.nullableText(),
      entry_count: col.integer(0),
      regen_count: col.integer(0),
      regen_options_json: col.json('[]'),
      micro_review_collapsed: col.boolean(),
      generated_at_utc: col.timestamp(),
    },
  }),
  problems: defineSyncTable({
    name: 'problems',
    payload: ProblemPayloadSchema,
    columns: {
      name: col.text(),
      what_breaks: col.text(),
      scarcity_signals_json: col.json(),
      direction: col.text(),
      direction_rationale: col.text(),
      evidence_ai_cheaper: col.text(),
      evidence_error_cost: col.text(),
      evidence_trust_required: col.text(),
      time_allocation_percent: col.integer(),
      display_order: col.integer(0),
    },
  }),
  portfolio_versions: defineSyncTable({
    name: 'portfolio_versions',
    payload: PortfolioVersionPayloadSchema,
    columns: {
      version_number: col.integer(),
      problems_snapshot_json: col.json(),
      health_snapshot_json: col.json(),
      board_anchoring_snapshot_json: col.json(),
      triggers_snapshot_json: col.json(),
      trigger_reason: col.text(),
    },
  }),
  board_members: defineSyncTable({
    name: 'board_members',
    payload: BoardMemberPayloadSchema,
    columns: {
      role_type: col.text(),
      is_growth_role: col.boolean(),
      is_active: col.boolean(true),
      anchored_problem_id: col.nullableText(),
      anchored_demand: col.nullableText(),
      persona_name: col.text(),
      persona_background: col.text(),
      persona_communication_style: col.text(),
      persona_signature_phrase: col.nullableText(),
      original_persona_name: col.text(),
      original_persona_background: col.text(),
      original_persona_communication_style: col.text(),
      original_persona_signature_phrase: col.nullableText(),
    },
  }),
  governance_sessions: defineSyncTable({
    name: 'governance_sessions',
    payload: GovernanceSessionPayloadSchema,
    columns: {
      session_type: col.text(),
      current_state: col.text(),
      is_completed: col.boolean(),
      abstraction_mode: col.boolean(),
      vagueness_skip_count: col.integer(0),
      transcript_json: col.json('[]'),
      output_markdown: col.nullableText(),
      created_portfolio_version_id: col.nullableText(),
      evaluated_bet_id: col.nullableText(),
      created_bet_id: col.nullableText(),
      duration_seconds: col.nullableInteger(),
      started_at_utc: col.timestamp(),
      completed_at_utc: col.nullableTimestamp(),
    },
  }),
  bets: defineSyncTable({
    name: 'bets',
    payload: BetPayloadSchema,
    columns: {
      prediction: col.text(),
      wrong_if: col.text(),
      status: col.text('open'),
      source_session_id: col.nullableText(),
      evaluation_session_id: col.nullableText(),
      evaluation_notes: col.nullableText(),
      due_at_utc: col.timestamp(),
      evaluated_at_utc: col.nullableTimestamp(),
    },
  }),
  evidence_items: defineSyncTable({
    name: 'evidence_items',
    payload: EvidenceItemPayloadSchema,
    columns: {
      session_id: col.text(),
      problem_id: col.nullableText(),
      evidence_type: col.text(),
      statement_text: col.text(),
      strength_flag: col.text(),
      context: col.nullableText(),
    },
  }),
  resetup_triggers: defineSyncTable({
    name: 'resetup_triggers',
    payload: ResetupTriggerPayloadSchema,
    columns: {
      trigger_type: col.text(),
      description: col.text(),
      condition: col.text(),
      recommended_action: col.text(),
      is_met: col.boolean(),
      met_at_utc: col.nullableTimestamp(),
      due_at_utc: col.nullableTimestamp(),
    },
  }),
  user_preferences: defineSyncTable({
    name: 'user_preferences',
    payload: UserPreferencesPayloadSchema,
    uniquePerUser: true,
    columns: {
      abstraction_mode_quick: col.boolean(),
      abstraction_mode_setup: col.boolean(),
      abstraction_mode_quarterly: col.boolean(),
      remember_abstraction_choice: col.boolean(),
      analytics_enabled: col.boolean(true),
      micro_review_collapsed: col.boolean(),
      onboarding_completed: col.boolean(),
      setup_prompt_dismissed: col.boolean(),
      setup_prompt_last_shown_utc: col.nullableTimestamp(),
      total_entry_count: col.integer(0),
    },
  }),
} satisfies Record<SyncTableName, SyncTableDefinition>;

/**
 * Typed payload accepted for a table.
 */
export type SyncTablePayload<T extends SyncTableName> = z.output<
  (typeof SYNC_TABLES)[T]['payload']
>;

export function getSyncTableDefinition(table: SyncTableName): SyncTableDefinition {
  return SYNC_TABLES[table];
}

/**
 * All columns of a table, system columns first.
 */
export function getSyncTableColumns(
  table: SyncTableName
): Record<string, SyncColumnSpec> {
  return { ...SYNC_SYSTEM_COLUMNS, ...SYNC_TABLES[table].columns };
}

/**
 * Payload columns that must be present when a record is first inserted.
 */
export function getRequiredInsertColumns(table: SyncTableName): string[] {
  return Object.entries(SYNC_TABLES[table].columns)
    .filter(([, spec]) => !spec.nullable && spec.defaultValue === undefined)
    .map(([column]) => column);
}

export type SyncPayloadParseResult =
  | { success: true; payload: Record<string, unknown> }
  | { success: false; message: string };

/**
 * Validate a client payload against its table schema. Unknown keys are
 * dropped, so system columns other than `created_at_utc` never pass through.
 */
export function parseSyncPayload(
  table: SyncTableName,
  data: unknown
): SyncPayloadParseResult {
  const result = getSyncTableDefinition(table).payload.safeParse(data);
  if (result.success) {
    return { success: true, payload: result.data };
  }
  const message = result.error.issues
    .map((issue) => {
      const path = issue.path.map(String).join('.');
      return path ? `${path}: ${issue.message}` : issue.message;
    })
    .join('; ');
  return { success: false, message };
}
