// Postgres persistence for the entity registry
export { createDatabase, type Database, type DatabaseConfig } from './db.js';
export * from './schema/index.js';
export * from './repositories/index.js';
export { createPgEntityLogStore } from './repositories/context.js';
