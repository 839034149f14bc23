/**
 * @daybook/sync-server - Hono application
 */

import type { ServerSyncDialect, SyncDb } from '@daybook/server';
import { createSyncServer, type SyncServerResult } from '@daybook/server-hono';
import { Hono } from 'hono';
import type { Kysely } from 'kysely';
import type { ServerConfig } from './config';

export interface DaybookApp extends SyncServerResult {
  app: Hono;
}

/**
 * Build the HTTP app. The user id is taken from a trusted header set by the
 * authenticating proxy in front of this server.
 */
export function createApp(
  config: ServerConfig,
  db: Kysely<SyncDb>,
  dialect: ServerSyncDialect,
  now?: () => Date
): DaybookApp {
  const { service, syncRoutes } = createSyncServer({
    db,
    dialect,
    now,
    largeResponseThreshold: config.largeResponseThreshold,
    authenticate: (c) => {
      const userId = c.req.header(config.userIdHeader)?.trim();
      return userId ? { userId } : null;
    },
    routes: {
      maxBodySize: config.maxRequestBodySize,
      rateLimit:
        config.rateLimitPerMinute > 0
          ? { maxRequests: config.rateLimitPerMinute, windowMs: 60_000 }
          : false,
    },
  });

  const app = new Hono();
  app.route('/sync', syncRoutes);
  app.notFound((c) =>
    c.json({ error: { code: 'NOT_FOUND', message: 'Not found' } }, 404)
  );

  return { app, service, syncRoutes };
}
