import type { SyncPushRecord } from '@daybook/core';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { createTestEngine, type TestEngine } from './test-utils';

function entry(
  operation: SyncPushRecord['operation'],
  clientVersion: number,
  transcript: string
): SyncPushRecord {
  return {
    table_name: 'daily_entries',
    record_id: 'r1',
    operation,
    client_version: clientVersion,
    data: {
      transcript_raw: transcript,
      transcript_edited: transcript,
      entry_type: 'text',
      created_at_timezone: 'America/New_York',
      word_count: transcript.split(' ').length,
    },
  };
}

describe('two devices syncing one journal', () => {
  let engine: TestEngine;

  beforeEach(async () => {
    engine = await createTestEngine('2026-03-01T08:00:00.000Z');
  });

  afterEach(async () => {
    await engine.db.destroy();
  });

  it('creates the first entry at version 1', async () => {
    const response = await engine.service.pushChanges('user-1', [
      entry('INSERT', 1, 'Morning pages'),
    ]);

    expect(response.results).toEqual([
      {
        table_name: 'daily_entries',
        record_id: 'r1',
        success: true,
        new_version: 1,
      },
    ]);
  });

  it('advances the version with each push built on the last response', async () => {
    await engine.service.pushChanges('user-1', [
      entry('INSERT', 1, 'Morning pages'),
    ]);

    const second = await engine.service.pushChanges('user-1', [
      entry('UPDATE', 1, 'Morning pages, edited'),
    ]);
    const third = await engine.service.pushChanges('user-1', [
      entry('UPDATE', 2, 'Morning pages, edited twice'),
    ]);

    expect(second.results[0]?.new_version).toBe(2);
    expect(third.results[0]?.new_version).toBe(3);
  });

  it('rejects an edit from a device that missed the latest version', async () => {
    await engine.service.pushChanges('user-1', [
      entry('INSERT', 1, 'Morning pages'),
    ]);
    await engine.service.pushChanges('user-1', [
      entry('UPDATE', 1, 'Edited on the phone'),
    ]);
    await engine.service.pushChanges('user-1', [
      entry('UPDATE', 2, 'Edited on the laptop'),
    ]);

    const stale = await engine.service.pushChanges('user-1', [
      entry('UPDATE', 2, 'Edited on the tablet'),
    ]);

    expect(stale.has_conflicts).toBe(true);
    expect(stale.conflicts[0]).toMatchObject({
      record_id: 'r1',
      client_version: 2,
      server_version: 3,
      resolution: 'server_wins',
    });
    const row = await engine.db
      .selectFrom('daily_entries')
      .select(['transcript_edited', 'server_version'])
      .where('id', '=', 'r1')
      .executeTakeFirstOrThrow();
    expect(row).toEqual({
      transcript_edited: 'Edited on the laptop',
      server_version: 3,
    });
  });

  it('returns nothing for a checkpoint after every mutation', async () => {
    await engine.service.pushChanges('user-1', [
      entry('INSERT', 1, 'Morning pages'),
    ]);
    engine.clock.advance(1_000);
    const { synced_at } = await engine.service.getChangesSince(
      'user-1',
      '1970-01-01T00:00:00.000Z'
    );

    const delta = await engine.service.getChangesSince('user-1', synced_at);

    expect(delta.records).toEqual([]);
  });

  it('lets a second device catch up from the pushes of the first', async () => {
    await engine.service.pushChanges('user-1', [
      entry('INSERT', 1, 'Morning pages'),
    ]);
    engine.clock.advance(60_000);
    await engine.service.pushChanges('user-1', [
      entry('UPDATE', 1, 'Evening notes'),
    ]);

    const delta = await engine.service.getChangesSince(
      'user-1',
      '2026-03-01T08:00:00.000Z'
    );

    expect(delta.records).toHaveLength(1);
    expect(delta.records[0]).toMatchObject({
      operation: 'UPDATE',
      version: 2,
      data: { transcript_edited: 'Evening notes', word_count: 2 },
    });
  });
});
