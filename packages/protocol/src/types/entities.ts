// Entity registry types

import type { Id, Timestamp } from './common.js';

/**
 * A host-side object created by a command and tracked for later reference.
 */
export type Entity = {
  entityId: string;
  entityType: string;
  createdAt: Timestamp;
  lastModifiedAt: Timestamp;

  /** The completed command that last created or modified this entity */
  owningCommandId: Id;

  /**
   * Registry-wide ordinal of the last record or touch.
   * Higher is more recent; used for recency queries and tie-breaks.
   */
  sequence: number;
};

/**
 * One line of the append-only registry log.
 */
export type EntityLogRecord =
  | {
      op: 'record';
      sequence: number;
      entityId: string;
      entityType: string;
      owningCommandId: Id;
      at: Timestamp;
    }
  | {
      op: 'touch';
      sequence: number;
      entityId: string;
      owningCommandId: Id;
      at: Timestamp;
    };

/**
 * Compacted registry state. Log records with a sequence at or below
 * `lastSequence` are already folded into `entities`.
 */
export type EntitySnapshot = {
  version: 1;
  lastSequence: number;
  takenAt: Timestamp;
  entities: Entity[];
};

/**
 * Registry counters.
 */
export type EntityRegistryStats = {
  entityCount: number;
  countsByType: Record<string, number>;
  totalRecords: number;
  totalTouches: number;
  totalLookups: number;
  lastSequence: number;
};

/**
 * Entity reported by a successful command result.
 */
export type ReportedEntity = {
  id: string;
  type: string;
};
