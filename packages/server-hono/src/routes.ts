/**
 * @daybook/server-hono - Sync routes for Hono
 *
 * Provides:
 * - GET  /health
 * - GET  /?since=<ISO-8601>  (delta since a checkpoint)
 * - POST /                   (push a batch of records)
 * - GET  /full               (full snapshot for recovery)
 */

import {
  captureSyncException,
  createSyncTimer,
  describeError,
  type HealthResponse,
  logSyncEvent,
  SyncPushRecordSchema,
  type SyncPushRecord,
} from '@daybook/core';
import { normalizeCheckpoint, type SyncService } from '@daybook/server';
import type { Context } from 'hono';
import { Hono } from 'hono';
import { bodyLimit } from 'hono/body-limit';
import { validator } from 'hono/validator';
import { errorResponse } from './errors';
import {
  createRateLimiter,
  DEFAULT_SYNC_RATE_LIMIT,
  type SyncRateLimitConfig,
} from './rate-limit';

export interface SyncAuthResult {
  userId: string;
}

export const DEFAULT_MAX_BODY_SIZE = 10 * 1024 * 1024;

export interface CreateSyncRoutesOptions {
  service: SyncService;
  /** Resolve the caller; `null` means unauthenticated (401). */
  authenticate: (
    c: Context
  ) => SyncAuthResult | null | Promise<SyncAuthResult | null>;
  /**
   * Maximum request body size in bytes.
   * Default: 10 MiB
   */
  maxBodySize?: number;
  /**
   * Per-user rate limiting. Set to false to disable.
   * Default: 120 requests per minute
   */
  rateLimit?: SyncRateLimitConfig | false;
}

export type SyncRoutesEnv = {
  Variables: {
    userId: string;
  };
};

const INVALID_SINCE_MESSAGE =
  'Invalid timestamp format. Use ISO 8601 (e.g., 2024-01-15T10:30:00Z)';

type PushBodyParseResult =
  | { ok: true; records: SyncPushRecord[] }
  | { ok: false; message: string; details?: Record<string, string> };

/**
 * Validate a decoded push body. Every record is checked so the client gets
 * one message per invalid index.
 */
export function parsePushBody(body: unknown): PushBodyParseResult {
  const rawRecords =
    body !== null && typeof body === 'object' && !Array.isArray(body)
      ? Reflect.get(body, 'records')
      : undefined;
  if (!Array.isArray(rawRecords) || rawRecords.length === 0) {
    return { ok: false, message: 'Missing or empty records array' };
  }

  const records: SyncPushRecord[] = [];
  const details: Record<string, string> = {};
  rawRecords.forEach((raw: unknown, index) => {
    const parsed = SyncPushRecordSchema.safeParse(raw);
    if (parsed.success) {
      records.push(parsed.data);
      return;
    }
    const issue = parsed.error.issues[0];
    details[`records[${index}]`] = issue
      ? issue.message
      : 'Invalid record format';
  });

  if (Object.keys(details).length > 0) {
    return { ok: false, message: 'Validation failed', details };
  }
  return { ok: true, records };
}

export function createSyncRoutes(
  options: CreateSyncRoutesOptions
): Hono<SyncRoutesEnv> {
  const { service } = options;
  const routes = new Hono<SyncRoutesEnv>();

  routes.onError((error, c) => {
    captureSyncException(error, {
      event: 'sync.route.unhandled',
      method: c.req.method,
      path: c.req.path,
    });
    return errorResponse(c, 500, 'INTERNAL_ERROR', 'An internal error occurred');
  });

  const failWith = (
    c: Context<SyncRoutesEnv>,
    error: unknown,
    event: string,
    message: string
  ): Response => {
    captureSyncException(error, {
      event,
      userId: c.get('userId'),
      error: describeError(error),
    });
    return errorResponse(c, 500, 'INTERNAL_ERROR', message);
  };

  // -------------------------------------------------------------------------
  // GET /health
  // -------------------------------------------------------------------------

  routes.get('/health', (c) => {
    const body: HealthResponse = {
      status: 'healthy',
      timestamp: new Date().toISOString(),
    };
    return c.json(body);
  });

  // -------------------------------------------------------------------------
  // Authentication, rate limiting, body size
  // -------------------------------------------------------------------------

  routes.use('*', async (c, next) => {
    const auth = await options.authenticate(c);
    if (!auth) {
      return errorResponse(c, 401, 'UNAUTHORIZED', 'Authentication required');
    }
    c.set('userId', auth.userId);
    return next();
  });

  if (options.rateLimit !== false) {
    routes.use(
      '*',
      createRateLimiter({
        ...(options.rateLimit ?? DEFAULT_SYNC_RATE_LIMIT),
        keyGenerator: (c) => c.get('userId') ?? null,
      })
    );
  }

  routes.post(
    '/',
    bodyLimit({
      maxSize: options.maxBodySize ?? DEFAULT_MAX_BODY_SIZE,
      onError: (c) =>
        errorResponse(c, 413, 'PAYLOAD_TOO_LARGE', 'Request body too large'),
    })
  );

  // -------------------------------------------------------------------------
  // GET /?since=  (delta)
  // -------------------------------------------------------------------------

  routes.get(
    '/',
    validator('query', (value, c) => {
      const since = value.since;
      if (typeof since !== 'string' || since.length === 0) {
        return errorResponse(
          c,
          400,
          'BAD_REQUEST',
          'Missing required parameter: since'
        );
      }
      const normalized = normalizeCheckpoint(since);
      if (normalized === null) {
        return errorResponse(c, 400, 'BAD_REQUEST', INVALID_SINCE_MESSAGE);
      }
      return { since: normalized };
    }),
    async (c) => {
      const userId = c.get('userId');
      const { since } = c.req.valid('query');
      const timer = createSyncTimer();

      try {
        const response = await service.getChangesSince(userId, since);
        logSyncEvent({
          event: 'sync.pull',
          userId,
          durationMs: timer(),
          recordCount: response.records.length,
        });
        return c.json(response, 200);
      } catch (error) {
        return failWith(c, error, 'sync.pull', 'Failed to retrieve changes');
      }
    }
  );

  // -------------------------------------------------------------------------
  // POST /  (push)
  // -------------------------------------------------------------------------

  routes.post('/', async (c) => {
    const userId = c.get('userId');
    // Read errors (including an exceeded body limit) propagate to the limiter.
    const text = await c.req.text();

    let body: unknown;
    try {
      body = JSON.parse(text);
    } catch {
      return errorResponse(c, 400, 'BAD_REQUEST', 'Invalid JSON body');
    }

    const parsed = parsePushBody(body);
    if (!parsed.ok) {
      return parsed.details
        ? errorResponse(
            c,
            400,
            'VALIDATION_ERROR',
            parsed.message,
            parsed.details
          )
        : errorResponse(c, 400, 'BAD_REQUEST', parsed.message);
    }

    try {
      const response = await service.pushChanges(userId, parsed.records);
      return c.json(response, response.has_conflicts ? 409 : 200);
    } catch (error) {
      return failWith(c, error, 'sync.push', 'Failed to push changes');
    }
  });

  // -------------------------------------------------------------------------
  // GET /full  (snapshot)
  // -------------------------------------------------------------------------

  routes.get('/full', async (c) => {
    const userId = c.get('userId');
    try {
      const response = await service.getFullSnapshot(userId);
      return c.json(response, 200);
    } catch (error) {
      return failWith(c, error, 'sync.snapshot', 'Failed to download data');
    }
  });

  return routes;
}
