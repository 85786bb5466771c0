import { asc, gt, lte } from 'drizzle-orm';
import type { EntityLogRecord, EntitySnapshot } from '@cmdbridge/protocol';
import type { Database } from '../db.js';
import { entityLogRecords, entitySnapshots } from '../schema/index.js';
import type { EntityLogState, EntityLogStore } from '../../interfaces/index.js';

const SNAPSHOT_ROW_ID = 'current';

export type EntityLogRow = typeof entityLogRecords.$inferSelect;
export type EntitySnapshotRow = typeof entitySnapshots.$inferSelect;

export class PgEntityLogStore implements EntityLogStore {
  constructor(
    private db: Database,
    private onClose: () => Promise<void> = async () => {}
  ) {}

  async load(): Promise<EntityLogState> {
    const [snapshotRow] = await this.db
      .select()
      .from(entitySnapshots)
      .limit(1);
    const snapshot = snapshotRow ? rowToSnapshot(snapshotRow) : null;

    const rows = await this.db
      .select()
      .from(entityLogRecords)
      .where(gt(entityLogRecords.sequence, snapshot?.lastSequence ?? 0))
      .orderBy(asc(entityLogRecords.sequence));

    return {
      snapshot,
      records: rows.map(rowToLogRecord),
      repairedTornWrite: false,
    };
  }

  async append(records: EntityLogRecord[]): Promise<void> {
    if (records.length === 0) {
      return;
    }
    await this.db.insert(entityLogRecords).values(records.map(logRecordToRow));
  }

  async compact(snapshot: EntitySnapshot): Promise<void> {
    const row = snapshotToRow(snapshot);

    await this.db.transaction(async (tx) => {
      await tx
        .insert(entitySnapshots)
        .values(row)
        .onConflictDoUpdate({
          target: entitySnapshots.id,
          set: {
            version: row.version,
            lastSequence: row.lastSequence,
            takenAt: row.takenAt,
            entities: row.entities,
          },
        });

      await tx
        .delete(entityLogRecords)
        .where(lte(entityLogRecords.sequence, snapshot.lastSequence));
    });
  }

  async close(): Promise<void> {
    await this.onClose();
  }
}

// Row mapping

export function logRecordToRow(record: EntityLogRecord): EntityLogRow {
  return {
    sequence: record.sequence,
    op: record.op,
    entityId: record.entityId,
    entityType: record.op === 'record' ? record.entityType : null,
    owningCommandId: record.owningCommandId,
    at: new Date(record.at),
  };
}

export function rowToLogRecord(row: EntityLogRow): EntityLogRecord {
  const at = row.at.toISOString();

  if (row.op === 'record') {
    return {
      op: 'record',
      sequence: row.sequence,
      entityId: row.entityId,
      entityType: row.entityType ?? 'unknown',
      owningCommandId: row.owningCommandId,
      at,
    };
  }

  return {
    op: 'touch',
    sequence: row.sequence,
    entityId: row.entityId,
    owningCommandId: row.owningCommandId,
    at,
  };
}

export function snapshotToRow(snapshot: EntitySnapshot): EntitySnapshotRow {
  return {
    id: SNAPSHOT_ROW_ID,
    version: snapshot.version,
    lastSequence: snapshot.lastSequence,
    takenAt: new Date(snapshot.takenAt),
    entities: snapshot.entities,
  };
}

export function rowToSnapshot(row: EntitySnapshotRow): EntitySnapshot {
  return {
    version: 1,
    lastSequence: row.lastSequence,
    takenAt: row.takenAt.toISOString(),
    entities: row.entities,
  };
}
