import { createDatabase, type DatabaseConfig } from '../db.js';
import { PgEntityLogStore } from './entity-log-store.js';

/**
 * Create an EntityLogStore backed by Postgres.
 *
 * Usage:
 * ```ts
 * const store = createPgEntityLogStore({ connectionString: process.env.DATABASE_URL });
 * const registry = await EntityRegistry.open({ store });
 * ```
 *
 * Closing the store ends the underlying connection pool.
 */
export function createPgEntityLogStore(config: DatabaseConfig): PgEntityLogStore {
  const { db, client } = createDatabase(config);
  return new PgEntityLogStore(db, async () => {
    await client.end();
  });
}
