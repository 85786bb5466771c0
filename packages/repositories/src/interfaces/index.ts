// Repository interfaces
// These define the contracts for registry persistence, enabling substrate independence.

export type { EntityLogStore, EntityLogState, EntityLogBackend } from './entity-log-store.js';
