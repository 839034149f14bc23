/**
 * @daybook/sync-server - Postgres connection
 */

import type { SyncDb } from '@daybook/server';
import { Kysely, PostgresDialect } from 'kysely';
import pg from 'pg';
import type { DatabaseConfig } from './config';

export function createPool(config: DatabaseConfig): pg.Pool {
  const base = {
    max: config.poolSize,
    idleTimeoutMillis: 30_000,
    connectionTimeoutMillis: 5_000,
  };
  return config.connectionString
    ? new pg.Pool({ ...base, connectionString: config.connectionString })
    : new pg.Pool({
        ...base,
        host: config.host,
        port: config.port,
        database: config.database,
        user: config.user,
        password: config.password,
      });
}

export function createDatabase(pool: pg.Pool): Kysely<SyncDb> {
  return new Kysely<SyncDb>({
    dialect: new PostgresDialect({ pool }),
  });
}
