// Re-export all protocol types
export * from './common.js';
export * from './commands.js';
export * from './results.js';
export * from './entities.js';
export * from './resolution.js';
