import {
  configureSyncTelemetry,
  createDefaultSyncTelemetry,
  ErrorResponseSchema,
  HealthResponseSchema,
  SyncDeltaResponseSchema,
  SyncPushResponseSchema,
  type SyncSnapshotResponse,
  SyncSnapshotResponseSchema,
} from '@daybook/core';
import { createBetterSqlite3Db } from '@daybook/dialect-better-sqlite3';
import {
  ensureSyncSchema,
  type SyncDb,
  SyncService,
} from '@daybook/server';
import { createSqliteServerDialect } from '@daybook/server-dialect-sqlite';
import { Hono } from 'hono';
import type { Kysely } from 'kysely';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { createSyncServer, type SyncServerOptions } from '../create-server';
import { resetRateLimitStore } from '../rate-limit';
import { createSyncRoutes } from '../routes';

const NOW = '2026-03-01T10:00:00.000Z';

const bet = (recordId: string, clientVersion: number, prediction: string) => ({
  table_name: 'bets',
  record_id: recordId,
  operation: clientVersion === 0 ? 'INSERT' : 'UPDATE',
  client_version: clientVersion,
  data: {
    prediction,
    wrong_if: 'Nothing changes',
    due_at_utc: '2026-06-01T00:00:00Z',
  },
});

describe('createSyncRoutes', () => {
  let db: Kysely<SyncDb>;
  const dialect = createSqliteServerDialect();

  beforeEach(async () => {
    configureSyncTelemetry(createDefaultSyncTelemetry({ write: () => {} }));
    db = createBetterSqlite3Db<SyncDb>({ path: ':memory:' });
    await ensureSyncSchema(db, dialect);
  });

  afterEach(async () => {
    resetRateLimitStore();
    await db.destroy();
  });

  function createApp(routes: SyncServerOptions['routes'] = {}): Hono {
    const { syncRoutes } = createSyncServer({
      db,
      dialect,
      now: () => new Date(NOW),
      authenticate: (c) => {
        const userId = c.req.header('x-user-id');
        return userId ? { userId } : null;
      },
      routes,
    });
    const app = new Hono();
    app.route('/sync', syncRoutes);
    return app;
  }

  function push(app: Hono, body: unknown, userId = 'user-1') {
    return app.request('http://localhost/sync', {
      method: 'POST',
      headers: { 'content-type': 'application/json', 'x-user-id': userId },
      body: JSON.stringify(body),
    });
  }

  function get(app: Hono, path: string, userId = 'user-1') {
    return app.request(`http://localhost/sync${path}`, {
      headers: { 'x-user-id': userId },
    });
  }

  // -----------------------------------------------------------
  // Health and auth
  // -----------------------------------------------------------

  it('answers health checks without credentials', async () => {
    const app = createApp();

    const res = await app.request('http://localhost/sync/health');

    expect(res.status).toBe(200);
    const body = HealthResponseSchema.parse(await res.json());
    expect(body.status).toBe('healthy');
    expect(typeof body.timestamp).toBe('string');
  });

  it('rejects unauthenticated sync requests', async () => {
    const app = createApp();

    const res = await app.request(
      'http://localhost/sync?since=2026-01-01T00:00:00Z'
    );

    expect(res.status).toBe(401);
    const body = ErrorResponseSchema.parse(await res.json());
    expect(body).toEqual({
      error: { code: 'UNAUTHORIZED', message: 'Authentication required' },
    });
  });

  // -----------------------------------------------------------
  // GET /sync
  // -----------------------------------------------------------

  it('requires the since parameter', async () => {
    const app = createApp();

    const res = await get(app, '');

    expect(res.status).toBe(400);
    expect(await res.json()).toEqual({
      error: {
        code: 'BAD_REQUEST',
        message: 'Missing required parameter: since',
      },
    });
  });

  it('rejects a since value that is not a timestamp', async () => {
    const app = createApp();

    const res = await get(app, '?since=last-tuesday');

    expect(res.status).toBe(400);
    const body = ErrorResponseSchema.parse(await res.json());
    expect(body.error.message).toBe(
      'Invalid timestamp format. Use ISO 8601 (e.g., 2024-01-15T10:30:00Z)'
    );
  });

  it.each(['1', 'March%207,%202024'])(
    'rejects the loosely formatted since value %s',
    async (since) => {
      const app = createApp();

      const res = await get(app, `?since=${since}`);

      expect(res.status).toBe(400);
      const body = ErrorResponseSchema.parse(await res.json());
      expect(body.error.message).toBe(
        'Invalid timestamp format. Use ISO 8601 (e.g., 2024-01-15T10:30:00Z)'
      );
    }
  );

  it('accepts a date-only since value', async () => {
    const app = createApp();
    await push(app, { records: [bet('bet-1', 0, 'Ship it')] });

    const res = await get(app, '?since=2026-01-01');

    expect(res.status).toBe(200);
    const body = SyncDeltaResponseSchema.parse(await res.json());
    expect(body.records.map((r) => r.record_id)).toEqual(['bet-1']);
  });

  it('returns the delta for the caller', async () => {
    const app = createApp();
    await push(app, { records: [bet('bet-1', 0, 'Ship it')] });
    await push(app, { records: [bet('bet-2', 0, 'Not mine')] }, 'user-2');

    const res = await get(app, '?since=2026-01-01T00:00:00Z');

    expect(res.status).toBe(200);
    const body = SyncDeltaResponseSchema.parse(await res.json());
    expect(body.synced_at).toBe('2026-03-01T09:59:59.999Z');
    expect(body.records).toHaveLength(1);
    expect(body.records[0]).toMatchObject({
      table_name: 'bets',
      record_id: 'bet-1',
      operation: 'INSERT',
      version: 1,
      data: { prediction: 'Ship it' },
    });
  });

  // -----------------------------------------------------------
  // POST /sync
  // -----------------------------------------------------------

  it('returns 200 when every record applies', async () => {
    const app = createApp();

    const res = await push(app, { records: [bet('bet-1', 0, 'Ship it')] });

    expect(res.status).toBe(200);
    const body = SyncPushResponseSchema.parse(await res.json());
    expect(body).toEqual({
      results: [
        {
          table_name: 'bets',
          record_id: 'bet-1',
          success: true,
          new_version: 1,
        },
      ],
      conflicts: [],
      synced_at: NOW,
      has_conflicts: false,
    });
  });

  it('returns 409 with the results when a record conflicts', async () => {
    const app = createApp();
    await push(app, { records: [bet('bet-1', 0, 'Ship it')] });
    await push(app, { records: [bet('bet-1', 1, 'Ship it twice')] });

    const res = await push(app, {
      records: [bet('bet-1', 1, 'Stale'), bet('bet-2', 0, 'Fresh')],
    });

    expect(res.status).toBe(409);
    const body = SyncPushResponseSchema.parse(await res.json());
    expect(body.has_conflicts).toBe(true);
    expect(body.results.map((r) => r.success)).toEqual([false, true]);
    expect(body.conflicts[0]).toMatchObject({
      record_id: 'bet-1',
      client_version: 1,
      server_version: 2,
    });
  });

  it('returns 200 when records fail without conflicts', async () => {
    const app = createApp();

    const res = await push(app, {
      records: [
        {
          table_name: 'accounts',
          record_id: 'acct-1',
          operation: 'DELETE',
          client_version: 0,
        },
      ],
    });

    expect(res.status).toBe(200);
    const body = SyncPushResponseSchema.parse(await res.json());
    expect(body.results[0]?.error_code).toBe('UNKNOWN_TABLE');
  });

  it('rejects a body that is not JSON', async () => {
    const app = createApp();

    const res = await app.request('http://localhost/sync', {
      method: 'POST',
      headers: { 'content-type': 'application/json', 'x-user-id': 'user-1' },
      body: '{"records": [',
    });

    expect(res.status).toBe(400);
    expect(await res.json()).toEqual({
      error: { code: 'BAD_REQUEST', message: 'Invalid JSON body' },
    });
  });

  it('rejects a missing or empty records array', async () => {
    const app = createApp();

    for (const body of [{}, { records: [] }, { records: 'bets' }]) {
      const res = await push(app, body);
      expect(res.status).toBe(400);
      expect(await res.json()).toEqual({
        error: {
          code: 'BAD_REQUEST',
          message: 'Missing or empty records array',
        },
      });
    }
  });

  it('reports invalid records by index', async () => {
    const app = createApp();

    const res = await push(app, {
      records: [
        bet('bet-1', 0, 'Fine'),
        { table_name: 'bets', record_id: 'bet-2', operation: 'DELETE' },
        {
          table_name: 'bets',
          record_id: 'bet-3',
          operation: 'UPSERT',
          client_version: 0,
        },
      ],
    });

    expect(res.status).toBe(400);
    expect(await res.json()).toEqual({
      error: {
        code: 'VALIDATION_ERROR',
        message: 'Validation failed',
        details: {
          'records[1]': 'Missing client_version',
          'records[2]': 'Invalid operation: UPSERT',
        },
      },
    });
    const stored = await db.selectFrom('bets').select('id').execute();
    expect(stored).toEqual([]);
  });

  it('rejects bodies over the size limit', async () => {
    const app = createApp({ maxBodySize: 64 });
    const body = JSON.stringify({ records: [bet('bet-1', 0, 'x'.repeat(200))] });

    const res = await app.request('http://localhost/sync', {
      method: 'POST',
      headers: {
        'content-type': 'application/json',
        'content-length': String(body.length),
        'x-user-id': 'user-1',
      },
      body,
    });

    expect(res.status).toBe(413);
    expect(await res.json()).toEqual({
      error: { code: 'PAYLOAD_TOO_LARGE', message: 'Request body too large' },
    });
  });

  // -----------------------------------------------------------
  // GET /sync/full
  // -----------------------------------------------------------

  it('returns the full snapshot for the caller', async () => {
    const app = createApp();
    await push(app, { records: [bet('bet-1', 0, 'Ship it')] });

    const res = await get(app, '/full');

    expect(res.status).toBe(200);
    const body = SyncSnapshotResponseSchema.parse(await res.json());
    expect(body.downloaded_at).toBe(NOW);
    expect(body.record_counts.bets).toBe(1);
    expect(body.data.bets?.[0]?.id).toBe('bet-1');
  });

  it('hides store failures behind a generic message', async () => {
    class FailingService extends SyncService {
      override async getFullSnapshot(): Promise<SyncSnapshotResponse> {
        throw new Error('disk I/O error');
      }
    }
    const routes = createSyncRoutes({
      service: new FailingService({ db, dialect }),
      authenticate: () => ({ userId: 'user-1' }),
    });

    const res = await routes.request('http://localhost/full');

    expect(res.status).toBe(500);
    expect(await res.json()).toEqual({
      error: { code: 'INTERNAL_ERROR', message: 'Failed to download data' },
    });
  });

  // -----------------------------------------------------------
  // Rate limiting
  // -----------------------------------------------------------

  it('limits each user to the configured request count', async () => {
    const app = createApp({
      rateLimit: { maxRequests: 2, windowMs: 60_000 },
    });

    const first = await get(app, '/full');
    await get(app, '/full');
    const third = await get(app, '/full');
    const otherUser = await get(app, '/full', 'user-2');

    expect(first.headers.get('X-RateLimit-Limit')).toBe('2');
    expect(first.headers.get('X-RateLimit-Remaining')).toBe('1');
    expect(third.status).toBe(429);
    expect(third.headers.get('Retry-After')).not.toBeNull();
    expect(await third.json()).toEqual({
      error: {
        code: 'RATE_LIMITED',
        message: 'Too many requests. Please try again later.',
      },
    });
    expect(otherUser.status).toBe(200);
  });

  it('does not count health checks against the limit', async () => {
    const app = createApp({
      rateLimit: { maxRequests: 1, windowMs: 60_000 },
    });

    await app.request('http://localhost/sync/health');
    await app.request('http://localhost/sync/health');
    const res = await get(app, '/full');

    expect(res.status).toBe(200);
  });
});
