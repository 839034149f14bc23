/**
 * Server factory for Hono
 *
 * Wires a `SyncService` over the given database and dialect and mounts its
 * routes in one call.
 */

import {
  type MaintenanceOptions,
  type ServerSyncDialect,
  type SyncDb,
  SyncService,
} from '@daybook/server';
import type { Kysely } from 'kysely';
import { type CreateSyncRoutesOptions, createSyncRoutes } from './routes';

export interface SyncServerOptions {
  /** Kysely database instance */
  db: Kysely<SyncDb>;

  /** Server sync dialect */
  dialect: ServerSyncDialect;

  /** Resolve the calling user from a request */
  authenticate: CreateSyncRoutesOptions['authenticate'];

  /** Route configuration */
  routes?: Omit<CreateSyncRoutesOptions, 'service' | 'authenticate'>;

  /** Delta row count above which a warning is logged */
  largeResponseThreshold?: number;

  /** Retention windows for `service.runMaintenance()` */
  maintenance?: MaintenanceOptions;

  /** Clock override, mainly for tests */
  now?: () => Date;
}

export interface SyncServerResult {
  /** Engine facade bound to `db` */
  service: SyncService;
  /** Sync routes for Hono, to be mounted under `/sync` */
  syncRoutes: ReturnType<typeof createSyncRoutes>;
}

/**
 * Create the sync service and its routes.
 *
 * @example
 * ```typescript
 * const { syncRoutes } = createSyncServer({
 *   db,
 *   dialect: createPostgresServerDialect(),
 *   authenticate: (c) => {
 *     const userId = c.req.header('x-user-id');
 *     return userId ? { userId } : null;
 *   },
 * });
 *
 * app.route('/sync', syncRoutes);
 * ```
 */
export function createSyncServer(options: SyncServerOptions): SyncServerResult {
  const service = new SyncService({
    db: options.db,
    dialect: options.dialect,
    now: options.now,
    largeResponseThreshold: options.largeResponseThreshold,
    maintenance: options.maintenance,
  });

  const syncRoutes = createSyncRoutes({
    ...options.routes,
    service,
    authenticate: options.authenticate,
  });

  return { service, syncRoutes };
}
