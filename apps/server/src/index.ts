/**
 * @daybook/sync-server - Entry point
 *
 * Loads configuration, migrates the schema, serves `/sync` and runs
 * retention maintenance on an interval.
 */

import {
  captureSyncException,
  configureSyncTelemetry,
  createDefaultSyncTelemetry,
  logSyncEvent,
} from '@daybook/core';
import { ensureSyncSchema } from '@daybook/server';
import { createPostgresServerDialect } from '@daybook/server-dialect-postgres';
import { resetRateLimitStore } from '@daybook/server-hono';
import { serve } from '@hono/node-server';
import { createApp } from './app';
import { loadConfig } from './config';
import { createDatabase, createPool } from './db';

async function main(): Promise<void> {
  const config = loadConfig();
  configureSyncTelemetry(
    createDefaultSyncTelemetry({
      minLevel: config.environment === 'production' ? 'info' : 'debug',
    })
  );

  const pool = createPool(config.database);
  const db = createDatabase(pool);
  const dialect = createPostgresServerDialect();
  await ensureSyncSchema(db, dialect);

  const { app, service } = createApp(config, db, dialect);

  let maintenanceTimer: ReturnType<typeof setInterval> | null = null;
  if (config.maintenanceIntervalMinutes > 0) {
    maintenanceTimer = setInterval(() => {
      service.runMaintenance().catch((error: unknown) => {
        captureSyncException(error, { event: 'sync.maintenance' });
      });
    }, config.maintenanceIntervalMinutes * 60_000);
    maintenanceTimer.unref();
  }

  const server = serve(
    { fetch: app.fetch, hostname: config.host, port: config.port },
    (info) => {
      logSyncEvent({
        event: 'server.started',
        host: info.address,
        port: info.port,
        environment: config.environment,
      });
    }
  );

  let shuttingDown = false;
  const shutdown = (signal: string) => {
    if (shuttingDown) return;
    shuttingDown = true;
    logSyncEvent({ event: 'server.stopping', signal });
    if (maintenanceTimer) clearInterval(maintenanceTimer);
    resetRateLimitStore();
    server.close(() => {
      db.destroy()
        .then(() => process.exit(0))
        .catch((error: unknown) => {
          captureSyncException(error, { event: 'server.shutdown' });
          process.exit(1);
        });
    });
  };

  process.on('SIGINT', () => shutdown('SIGINT'));
  process.on('SIGTERM', () => shutdown('SIGTERM'));
}

main().catch((error: unknown) => {
  process.stderr.write(
    `Failed to start server: ${error instanceof Error ? error.message : String(error)}\n`
  );
  process.exit(1);
});
