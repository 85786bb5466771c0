import { pgTable, text, timestamp, jsonb, bigint, integer, index } from 'drizzle-orm/pg-core';
import type { Entity } from '@cmdbridge/protocol';

/**
 * Entity log table - append-only record/touch events for the registry.
 *
 * The registry's in-memory index is rebuilt from the latest snapshot
 * plus every row with a higher sequence.
 */
export const entityLogRecords = pgTable(
  'entity_log_records',
  {
    sequence: bigint('sequence', { mode: 'number' }).primaryKey(),
    op: text('op').$type<'record' | 'touch'>().notNull(),
    entityId: text('entity_id').notNull(),
    entityType: text('entity_type'), // null for touch
    owningCommandId: text('owning_command_id').notNull(),
    at: timestamp('at', { withTimezone: true }).notNull(),
  },
  (table) => [index('entity_log_records_entity_idx').on(table.entityId)]
);

/**
 * Entity snapshots table - a single row holding the compacted registry.
 */
export const entitySnapshots = pgTable('entity_snapshots', {
  id: text('id').primaryKey(), // always 'current'
  version: integer('version').notNull().default(1),
  lastSequence: bigint('last_sequence', { mode: 'number' }).notNull(),
  takenAt: timestamp('taken_at', { withTimezone: true }).notNull(),
  entities: jsonb('entities').$type<Entity[]>().notNull(),
});
