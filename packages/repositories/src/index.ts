// @cmdbridge/repositories
// Persistence contract and implementations for the entity registry.
//
// The registry codes against EntityLogStore only. Implementations
// (filesystem, Postgres, in-memory) can be swapped without changing it.

export * from './interfaces/index.js';
export * from './fs/index.js';
export {
  createInMemoryEntityLogStore,
  type InMemoryEntityLogStore,
  type InMemoryEntityLogData,
} from './in-memory/index.js';
export * as postgres from './postgres/index.js';
