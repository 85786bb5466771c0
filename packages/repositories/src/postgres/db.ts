// Postgres connection for the registry store

import { drizzle } from 'drizzle-orm/postgres-js';
import postgres from 'postgres';
import * as schema from './schema/index.js';

export type DatabaseConfig = {
  connectionString: string;

  /** Pool size; the registry has a single writer, so a small pool is enough (default 2) */
  maxConnections?: number;

  /** Close idle connections after this many seconds (default 30) */
  idleTimeoutSeconds?: number;
};

/**
 * Open a postgres.js pool and wrap it in Drizzle with the registry schema.
 * The caller owns the pool and ends it with `client.end()`.
 */
export function createDatabase(config: DatabaseConfig) {
  const client = postgres(config.connectionString, {
    max: config.maxConnections ?? 2,
    idle_timeout: config.idleTimeoutSeconds ?? 30,
  });

  return { db: drizzle(client, { schema }), client };
}

export type Database = ReturnType<typeof createDatabase>['db'];
