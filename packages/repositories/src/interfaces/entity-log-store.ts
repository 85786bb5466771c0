import type { EntityLogRecord, EntitySnapshot } from '@cmdbridge/protocol';

/**
 * Persisted registry state as loaded from storage.
 */
export type EntityLogState = {
  /** Latest compacted snapshot, or null if none has been taken */
  snapshot: EntitySnapshot | null;

  /** Log records in append order. May include records already folded into the snapshot. */
  records: EntityLogRecord[];

  /** True if load found an interrupted append and rewrote the log */
  repairedTornWrite: boolean;
};

/**
 * Durable storage for the entity registry: an append-only log of
 * record/touch events plus a periodically compacted snapshot.
 *
 * Implementations are not required to be safe for concurrent writers.
 * The registry serializes every call through its single writer path.
 */
export interface EntityLogStore {
  /**
   * Load the snapshot and log. Called once when the registry opens.
   */
  load(): Promise<EntityLogState>;

  /**
   * Durably append records, preserving order.
   */
  append(records: EntityLogRecord[]): Promise<void>;

  /**
   * Replace the snapshot and discard log records with
   * sequence <= snapshot.lastSequence. A snapshot with no entities
   * is how a session reset is persisted.
   */
  compact(snapshot: EntitySnapshot): Promise<void>;

  /**
   * Release connections or handles.
   */
  close(): Promise<void>;
}

/**
 * Which storage backend to use for the registry.
 */
export type EntityLogBackend = 'file' | 'memory' | 'postgres';
