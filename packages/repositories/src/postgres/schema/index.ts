// Re-export all schema tables
export * from './entity-log.js';
