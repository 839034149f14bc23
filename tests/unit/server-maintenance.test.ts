import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import {
  betDelete,
  betInsert,
  betUpdate,
  countLogEntries,
  createTestEngine,
  DAY_MS,
  type TestEngine,
} from './test-utils';

describe('SyncService.runMaintenance', () => {
  let engine: TestEngine;

  beforeEach(async () => {
    engine = await createTestEngine('2026-03-01T10:00:00.000Z');
  });

  afterEach(async () => {
    await engine.db.destroy();
  });

  async function betIds(): Promise<string[]> {
    const rows = await engine.db
      .selectFrom('bets')
      .select('id')
      .orderBy('id')
      .execute();
    return rows.map((row) => String(row.id));
  }

  it('purges records soft-deleted more than 30 days ago', async () => {
    await engine.service.pushChanges('user-1', [
      betInsert('bet-live'),
      betInsert('bet-old'),
      betInsert('bet-recent'),
    ]);
    await engine.service.pushChanges('user-1', [betDelete('bet-old', 1)]);
    engine.clock.advance(20 * DAY_MS);
    await engine.service.pushChanges('user-1', [betDelete('bet-recent', 1)]);
    engine.clock.advance(11 * DAY_MS);

    const result = await engine.service.runMaintenance();

    expect(result.purgedRecords.bets).toBe(1);
    expect(result.purgedRecords.daily_entries).toBe(0);
    expect(result.prunedChanges).toBe(0);
    expect(result.expiredBets).toBe(0);
    expect(await betIds()).toEqual(['bet-live', 'bet-recent']);
  });

  it('prunes change log entries older than 90 days', async () => {
    await engine.service.pushChanges('user-1', [
      betInsert('bet-1'),
      betInsert('bet-2'),
    ]);
    engine.clock.advance(91 * DAY_MS);
    await engine.service.pushChanges('user-1', [
      betUpdate('bet-1', 1, { evaluation_notes: 'Still pending' }),
    ]);

    const result = await engine.service.runMaintenance();

    expect(result.prunedChanges).toBe(2);
    expect(await countLogEntries(engine.db, 'user-1')).toBe(1);
    expect(await betIds()).toEqual(['bet-1', 'bet-2']);
  });

  it('expires open bets past their due date', async () => {
    const due = '2026-03-02T00:00:00.000Z';
    await engine.service.pushChanges('user-1', [
      betInsert('bet-due', { due_at_utc: due }),
      betInsert('bet-settled', { due_at_utc: due, status: 'correct' }),
      betInsert('bet-gone', { due_at_utc: due }),
      betInsert('bet-future'),
    ]);
    await engine.service.pushChanges('user-1', [betDelete('bet-gone', 1)]);
    engine.clock.set('2026-03-03T00:00:00.000Z');

    const result = await engine.service.runMaintenance();

    expect(result.expiredBets).toBe(1);
    const rows = await engine.db
      .selectFrom('bets')
      .select(['id', 'status', 'server_version', 'updated_at_utc'])
      .orderBy('id')
      .execute();
    expect(rows).toEqual([
      {
        id: 'bet-due',
        status: 'expired',
        server_version: 2,
        updated_at_utc: '2026-03-03T00:00:00.000Z',
      },
      {
        id: 'bet-future',
        status: 'open',
        server_version: 1,
        updated_at_utc: '2026-03-01T10:00:00.000Z',
      },
      {
        id: 'bet-gone',
        status: 'open',
        server_version: 2,
        updated_at_utc: '2026-03-01T10:00:00.000Z',
      },
      {
        id: 'bet-settled',
        status: 'correct',
        server_version: 1,
        updated_at_utc: '2026-03-01T10:00:00.000Z',
      },
    ]);
  });

  it('publishes expiry through the delta and versions it', async () => {
    await engine.service.pushChanges('user-1', [
      betInsert('bet-due', { due_at_utc: '2026-03-02T00:00:00.000Z' }),
    ]);
    engine.clock.set('2026-03-03T00:00:00.000Z');
    await engine.service.runMaintenance();

    const delta = await engine.service.getChangesSince(
      'user-1',
      '2026-03-02T00:00:00.000Z'
    );
    expect(delta.records).toHaveLength(1);
    expect(delta.records[0]).toMatchObject({
      record_id: 'bet-due',
      operation: 'UPDATE',
      version: 2,
      changed_at: '2026-03-03T00:00:00.000Z',
      data: { status: 'expired' },
    });

    const stale = await engine.service.pushChanges('user-1', [
      betUpdate('bet-due', 1, { status: 'correct' }),
    ]);
    expect(stale.conflicts[0]?.server_version).toBe(2);
  });

  it('shares one run between overlapping callers', async () => {
    const [first, second] = await Promise.all([
      engine.service.runMaintenance(),
      engine.service.runMaintenance(),
    ]);

    expect(second).toBe(first);
  });
});
