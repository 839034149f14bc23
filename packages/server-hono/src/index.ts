/**
 * @daybook/server-hono - Hono adapter for the Daybook sync engine
 *
 * This package provides Hono-specific routes for @daybook/server.
 * Keeps @daybook/server framework-agnostic.
 */

// Error envelope
export * from './errors';

// Server factory
export {
  createSyncServer,
  type SyncServerOptions,
  type SyncServerResult,
} from './create-server';

// Rate limiting
export * from './rate-limit';

// Route types and factory
export {
  type CreateSyncRoutesOptions,
  createSyncRoutes,
  DEFAULT_MAX_BODY_SIZE,
  parsePushBody,
  type SyncAuthResult,
  type SyncRoutesEnv,
} from './routes';
