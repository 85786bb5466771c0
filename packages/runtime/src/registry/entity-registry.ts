// Entity registry - tracks host-side objects for later reference
//
// Writes go through one serial lane: assign sequence numbers, append to the
// store, then apply to the in-memory index. If the append fails the index
// is untouched. Reads are synchronous and see the index as of the last
// completed write.
//
// On open the index is rebuilt from the latest snapshot plus every log
// record with a higher sequence.

import type {
  Entity,
  EntityLogRecord,
  EntityRegistryStats,
  EntitySnapshot,
  ReportedEntity,
} from '@cmdbridge/protocol';
import type { EntityLogStore } from '@cmdbridge/repositories';
import { SerialLane } from '../concurrency/serial-lane.js';
import { EntityNotFoundError, RegistryStoreError } from '../errors.js';
import type { BridgeLogger } from '../logger.js';
import { describeError, silentLogger } from '../logger.js';
import { typeMatchesAny } from './type-match.js';

export const DEFAULT_COMPACT_EVERY = 500;

export type EntityRegistryOptions = {
  store: EntityLogStore;
  logger?: BridgeLogger;

  /** Log records between automatic compactions (default 500, 0 disables) */
  compactEvery?: number;

  clock?: () => Date;
};

/**
 * Read side of the registry, as used by the reference resolver.
 */
export type EntityIndexReader = {
  peek(entityId: string): Entity | null;
  mostRecent(typeFilter?: string | readonly string[]): Entity | null;
  recent(limit: number, typeFilter?: string | readonly string[]): Entity[];
};

type Mutation =
  | { op: 'record'; entityId: string; entityType: string; owningCommandId: string }
  | { op: 'touch'; entityId: string; owningCommandId: string };

export class EntityRegistry implements EntityIndexReader {
  private readonly store: EntityLogStore;
  private readonly logger: BridgeLogger;
  private readonly compactEvery: number;
  private readonly clock: () => Date;
  private readonly lane = new SerialLane();

  private entities = new Map<string, Entity>();
  private lastSequence = 0;
  private sinceCompaction = 0;
  private epoch = 0;
  private opened = false;
  private totals = { records: 0, touches: 0, lookups: 0 };

  constructor(options: EntityRegistryOptions) {
    this.store = options.store;
    this.logger = options.logger ?? silentLogger;
    this.compactEvery = options.compactEvery ?? DEFAULT_COMPACT_EVERY;
    this.clock = options.clock ?? (() => new Date());
  }

  /**
   * Create a registry and rebuild its index from the store.
   */
  static async open(options: EntityRegistryOptions): Promise<EntityRegistry> {
    const registry = new EntityRegistry(options);
    await registry.open();
    return registry;
  }

  /**
   * Rebuild the in-memory index from the store. Must be called once
   * before any write.
   */
  async open(): Promise<void> {
    await this.lane.run(async () => {
      if (this.opened) {
        return;
      }

      const state = await this.store.load().catch((error: unknown) => {
        throw new RegistryStoreError('load', error);
      });

      if (state.repairedTornWrite) {
        this.logger.warn('Repaired an interrupted registry log write');
      }

      this.rebuild(state.snapshot, state.records);
      this.opened = true;
      this.logger.info('Entity registry opened', {
        entities: this.entities.size,
        lastSequence: this.lastSequence,
        replayed: state.records.length,
      });
    });
  }

  // Writes

  /**
   * Record a newly created entity. Recording an id that already exists
   * updates its type and modification fields and keeps its creation time.
   *
   * @returns The entity, or null if a clear discarded the write
   */
  async record(
    entityId: string,
    entityType: string,
    owningCommandId: string
  ): Promise<Entity | null> {
    const [entity] = await this.commit([{ op: 'record', entityId, entityType, owningCommandId }]);
    return entity ?? null;
  }

  /**
   * Record several entities reported by one command, in order. Later
   * entries get higher sequence numbers, so the last one listed becomes
   * the most recent.
   */
  async recordMany(entities: ReportedEntity[], owningCommandId: string): Promise<Entity[]> {
    return this.commit(
      entities.map((entity) => ({
        op: 'record' as const,
        entityId: entity.id,
        entityType: entity.type,
        owningCommandId,
      }))
    );
  }

  /**
   * Mark an entity as modified by a command.
   *
   * @returns The entity, or null if a clear discarded the write
   * @throws EntityNotFoundError if the entity is not registered
   */
  async touch(entityId: string, owningCommandId: string): Promise<Entity | null> {
    const [entity] = await this.commit([{ op: 'touch', entityId, owningCommandId }]);
    return entity ?? null;
  }

  /**
   * Empty the registry. The index is cleared immediately; writes queued
   * before this call are discarded. Persisted as an empty snapshot.
   *
   * @returns Number of entities removed
   */
  clear(): Promise<number> {
    const removed = this.entities.size;
    this.epoch++;
    this.entities = new Map();
    this.sinceCompaction = 0;

    return this.lane.run(async () => {
      await this.writeSnapshot();
      this.logger.info('Entity registry cleared', { removed });
      return removed;
    });
  }

  /**
   * Fold the log into a new snapshot now.
   */
  compact(): Promise<void> {
    return this.lane.run(() => this.writeSnapshot());
  }

  /**
   * Resolves once every write scheduled so far has settled.
   */
  whenIdle(): Promise<void> {
    return this.lane.whenIdle();
  }

  // Reads

  /**
   * Get an entity by id, or null.
   */
  get(entityId: string): Entity | null {
    this.totals.lookups++;
    return this.entities.get(entityId) ?? null;
  }

  /**
   * Get an entity by id without counting a lookup.
   */
  peek(entityId: string): Entity | null {
    return this.entities.get(entityId) ?? null;
  }

  /**
   * Get an entity by id.
   *
   * @throws EntityNotFoundError
   */
  lookup(entityId: string): Entity {
    const entity = this.get(entityId);
    if (!entity) {
      throw new EntityNotFoundError(entityId);
    }
    return entity;
  }

  has(entityId: string): boolean {
    return this.entities.has(entityId);
  }

  /**
   * The most recently recorded or touched entity, optionally restricted
   * to entities matching any of the given types.
   */
  mostRecent(typeFilter?: string | readonly string[]): Entity | null {
    let best: Entity | null = null;
    const filter = toFilter(typeFilter);

    for (const entity of this.entities.values()) {
      if (filter && !typeMatchesAny(entity.entityType, filter)) continue;
      if (!best || entity.sequence > best.sequence) {
        best = entity;
      }
    }

    return best;
  }

  /**
   * Up to `limit` entities, most recent first.
   */
  recent(limit: number, typeFilter?: string | readonly string[]): Entity[] {
    const filter = toFilter(typeFilter);
    return this.list()
      .filter((entity) => !filter || typeMatchesAny(entity.entityType, filter))
      .slice(0, limit);
  }

  /**
   * Entities of one type, most recent first.
   */
  findByType(entityType: string, limit = 10): Entity[] {
    return this.recent(limit, entityType);
  }

  /**
   * All entities, most recent first.
   */
  list(): Entity[] {
    return Array.from(this.entities.values()).sort((a, b) => b.sequence - a.sequence);
  }

  /**
   * Distinct entity types, sorted.
   */
  types(): string[] {
    return Array.from(new Set(Array.from(this.entities.values(), (e) => e.entityType))).sort();
  }

  get size(): number {
    return this.entities.size;
  }

  stats(): EntityRegistryStats {
    const countsByType: Record<string, number> = {};
    for (const entity of this.entities.values()) {
      countsByType[entity.entityType] = (countsByType[entity.entityType] ?? 0) + 1;
    }

    return {
      entityCount: this.entities.size,
      countsByType,
      totalRecords: this.totals.records,
      totalTouches: this.totals.touches,
      totalLookups: this.totals.lookups,
      lastSequence: this.lastSequence,
    };
  }

  // Internals

  private commit(mutations: Mutation[]): Promise<Entity[]> {
    const epoch = this.epoch;

    return this.lane.run(async () => {
      if (!this.opened) {
        throw new RegistryStoreError('write', new Error('registry has not been opened'));
      }
      if (epoch !== this.epoch) {
        this.logger.debug('Dropping registry write queued before a clear', {
          mutations: mutations.length,
        });
        return [];
      }

      const records = this.toRecords(mutations);
      if (records.length === 0) {
        return [];
      }

      await this.store.append(records).catch((error: unknown) => {
        throw new RegistryStoreError('append', error);
      });

      this.lastSequence = records[records.length - 1].sequence;
      if (epoch !== this.epoch) {
        // Cleared while appending; the clear's snapshot covers these records.
        return [];
      }

      const applied = records.map((record) => this.apply(record));

      for (const record of records) {
        this.logger.debug(`Entity ${record.op}`, {
          entityId: record.entityId,
          sequence: record.sequence,
          commandId: record.owningCommandId,
        });
      }

      this.sinceCompaction += records.length;
      if (this.compactEvery > 0 && this.sinceCompaction >= this.compactEvery) {
        await this.writeSnapshot().catch((error: unknown) => {
          // The appended records are durable; the next write retries compaction.
          this.logger.error('Entity registry compaction failed', { error: describeError(error) });
        });
      }

      return applied;
    });
  }

  /**
   * Assign sequence numbers and validate touches against the index,
   * including entities recorded earlier in the same batch.
   */
  private toRecords(mutations: Mutation[]): EntityLogRecord[] {
    const at = this.clock().toISOString();
    const known = new Set<string>();
    let sequence = this.lastSequence;

    return mutations.map((mutation): EntityLogRecord => {
      sequence++;

      if (mutation.op === 'record') {
        known.add(mutation.entityId);
        return { ...mutation, sequence, at };
      }

      if (!known.has(mutation.entityId) && !this.entities.has(mutation.entityId)) {
        throw new EntityNotFoundError(mutation.entityId);
      }
      return { ...mutation, sequence, at };
    });
  }

  private apply(record: EntityLogRecord): Entity {
    const existing = this.entities.get(record.entityId);

    let entity: Entity;
    if (record.op === 'record') {
      this.totals.records++;
      entity = {
        entityId: record.entityId,
        entityType: record.entityType,
        createdAt: existing?.createdAt ?? record.at,
        lastModifiedAt: record.at,
        owningCommandId: record.owningCommandId,
        sequence: record.sequence,
      };
    } else {
      if (!existing) {
        throw new EntityNotFoundError(record.entityId);
      }
      this.totals.touches++;
      entity = {
        ...existing,
        lastModifiedAt: record.at,
        owningCommandId: record.owningCommandId,
        sequence: record.sequence,
      };
    }

    const frozen = Object.freeze(entity);
    this.entities.set(entity.entityId, frozen);
    return frozen;
  }

  private rebuild(snapshot: EntitySnapshot | null, records: EntityLogRecord[]): void {
    this.entities = new Map();
    this.lastSequence = snapshot?.lastSequence ?? 0;

    for (const entity of snapshot?.entities ?? []) {
      this.entities.set(entity.entityId, Object.freeze({ ...entity }));
    }

    let skipped = 0;
    for (const record of records) {
      if (record.sequence <= this.lastSequence) continue;

      if (record.op === 'touch' && !this.entities.has(record.entityId)) {
        skipped++;
        this.lastSequence = record.sequence;
        continue;
      }

      this.apply(record);
      this.lastSequence = record.sequence;
    }

    if (skipped > 0) {
      this.logger.warn('Skipped log touches for unknown entities during rebuild', { skipped });
    }

    this.sinceCompaction = records.length;
    this.totals = { records: 0, touches: 0, lookups: 0 };
  }

  private async writeSnapshot(): Promise<void> {
    const snapshot: EntitySnapshot = {
      version: 1,
      lastSequence: this.lastSequence,
      takenAt: this.clock().toISOString(),
      entities: this.list().reverse(),
    };

    await this.store.compact(snapshot).catch((error: unknown) => {
      throw new RegistryStoreError('compact', error);
    });
    this.sinceCompaction = 0;
    this.logger.debug('Entity registry compacted', {
      entities: snapshot.entities.length,
      lastSequence: snapshot.lastSequence,
    });
  }
}

function toFilter(typeFilter?: string | readonly string[]): readonly string[] | null {
  if (typeFilter === undefined) return null;
  if (typeof typeFilter === 'string') return [typeFilter];
  return typeFilter.length > 0 ? typeFilter : null;
}
