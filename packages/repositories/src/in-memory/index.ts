// In-memory EntityLogStore for development and testing
//
// Keeps the snapshot and log in plain arrays. Data does not persist
// between restarts. The backing data is exposed for inspection.

import type { EntityLogRecord, EntitySnapshot } from '@cmdbridge/protocol';
import type { EntityLogState, EntityLogStore } from '../interfaces/index.js';

/**
 * In-memory data that can be accessed for debugging/inspection.
 */
export interface InMemoryEntityLogData {
  snapshot: EntitySnapshot | null;
  records: EntityLogRecord[];
  appendCalls: number;
  compactCalls: number;
}

export type InMemoryEntityLogStore = EntityLogStore & {
  readonly data: InMemoryEntityLogData;

  /** Make the next append reject with the given error, without writing */
  failNextAppend(error: Error): void;
};

/**
 * Create an in-memory EntityLogStore, optionally seeded with state.
 */
export function createInMemoryEntityLogStore(
  seed: Partial<Pick<InMemoryEntityLogData, 'snapshot' | 'records'>> = {}
): InMemoryEntityLogStore {
  const data: InMemoryEntityLogData = {
    snapshot: seed.snapshot ?? null,
    records: [...(seed.records ?? [])],
    appendCalls: 0,
    compactCalls: 0,
  };
  let pendingFailure: Error | null = null;

  return {
    data,

    failNextAppend(error: Error): void {
      pendingFailure = error;
    },

    async load(): Promise<EntityLogState> {
      return {
        snapshot: data.snapshot ? structuredClone(data.snapshot) : null,
        records: data.records.map((record) => ({ ...record })),
        repairedTornWrite: false,
      };
    },

    async append(records: EntityLogRecord[]): Promise<void> {
      data.appendCalls++;
      if (pendingFailure) {
        const error = pendingFailure;
        pendingFailure = null;
        throw error;
      }
      data.records.push(...records.map((record) => ({ ...record })));
    },

    async compact(snapshot: EntitySnapshot): Promise<void> {
      data.compactCalls++;
      data.snapshot = structuredClone(snapshot);
      data.records = data.records.filter((record) => record.sequence > snapshot.lastSequence);
    },

    async close(): Promise<void> {},
  };
}
