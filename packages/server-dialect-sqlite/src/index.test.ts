import { createBetterSqlite3Db } from '@daybook/dialect-better-sqlite3';
import { ensureSyncSchema, type SyncDb } from '@daybook/server';
import { type Kysely, sql } from 'kysely';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { createSqliteServerDialect } from './index';

interface ColumnInfo {
  name: string;
  type: string;
  notnull: number;
  dflt_value: string | null;
  pk: number;
}

describe('SqliteServerSyncDialect', () => {
  let db: Kysely<SyncDb>;
  const dialect = createSqliteServerDialect();

  beforeEach(async () => {
    db = createBetterSqlite3Db<SyncDb>({ path: ':memory:' });
    await ensureSyncSchema(db, dialect);
  });

  afterEach(async () => {
    await db.destroy();
  });

  async function tableNames(): Promise<string[]> {
    const result = await sql<{ name: string }>`
      select name from sqlite_master
      where type = 'table' and name not like 'sqlite_%'
      order by name
    `.execute(db);
    return result.rows.map((row) => row.name);
  }

  async function columns(table: string): Promise<Map<string, ColumnInfo>> {
    const result = await sql<ColumnInfo>`
      select * from pragma_table_info(${table})
    `.execute(db);
    return new Map(result.rows.map((row) => [row.name, row]));
  }

  it('creates the change log and every registry table', async () => {
    expect(await tableNames()).toEqual([
      'bets',
      'board_members',
      'daily_entries',
      'evidence_items',
      'governance_sessions',
      'portfolio_versions',
      'problems',
      'resetup_triggers',
      'sync_log',
      'user_preferences',
      'weekly_briefs',
    ]);
  });

  it('is idempotent', async () => {
    await ensureSyncSchema(db, dialect);
    expect(await tableNames()).toHaveLength(11);
  });

  it('maps column types and defaults to sqlite storage', async () => {
    const cols = await columns('weekly_briefs');

    expect(cols.get('id')?.pk).toBe(1);
    expect(cols.get('server_version')).toMatchObject({
      type: 'integer',
      notnull: 1,
      dflt_value: '1',
    });
    expect(cols.get('sync_status')?.dflt_value).toBe("'synced'");
    expect(cols.get('micro_review_collapsed')).toMatchObject({
      type: 'integer',
      dflt_value: '0',
    });
    expect(cols.get('regen_options_json')).toMatchObject({
      type: 'text',
      dflt_value: "'[]'",
    });
    expect(cols.get('deleted_at_utc')?.notnull).toBe(0);
    expect(cols.get('board_micro_review_markdown')?.notnull).toBe(0);
  });

  it('assigns increasing log ids and a default timestamp', async () => {
    for (const recordId of ['a', 'b']) {
      await db
        .insertInto('sync_log')
        .values({
          user_id: 'user-1',
          table_name: 'bets',
          record_id: recordId,
          operation: 'INSERT',
          new_version: 1,
        })
        .execute();
    }

    const rows = await db
      .selectFrom('sync_log')
      .select(['log_id', 'changed_at_utc'])
      .orderBy('log_id')
      .execute();

    expect(rows.map((row) => row.log_id)).toEqual([1, 2]);
    expect(String(rows[0]?.changed_at_utc)).toMatch(
      /^\d{4}-\d{2}-\d{2}T\d{2}:\d{2}:\d{2}\.\d{3}Z$/
    );
  });

  it('allows a single user_preferences row per user', async () => {
    const row = (id: string) => ({
      id,
      user_id: 'user-1',
      created_at_utc: '2026-01-01T00:00:00.000Z',
      updated_at_utc: '2026-01-01T00:00:00.000Z',
    });

    await db.insertInto('user_preferences').values(row('prefs-1')).execute();
    await expect(
      db.insertInto('user_preferences').values(row('prefs-2')).execute()
    ).rejects.toThrow(/UNIQUE constraint failed/);
  });

  it('rolls back to a savepoint without losing earlier writes', async () => {
    const insertLog = (executor: Kysely<SyncDb>, recordId: string) =>
      executor
        .insertInto('sync_log')
        .values({
          user_id: 'user-1',
          table_name: 'bets',
          record_id: recordId,
          operation: 'INSERT',
          changed_at_utc: '2026-01-01T00:00:00.000Z',
          new_version: 1,
        })
        .execute();

    await dialect.executeInTransaction(db, async (trx) => {
      await insertLog(trx, 'kept');
      await expect(
        dialect.withSavepoint(trx, 'sp_test', async () => {
          await insertLog(trx, 'discarded');
          throw new Error('boom');
        })
      ).rejects.toThrow('boom');
    });

    const rows = await db.selectFrom('sync_log').select('record_id').execute();
    expect(rows.map((row) => row.record_id)).toEqual(['kept']);
  });
});
