/**
 * Part Revisions Schema
 *
 * Append-only field-level change log. Rows are inserted by the revision store and never
 * updated or deleted.
 */

import { CHANGE_CATEGORY, CHANGE_KIND } from '@revision-log/core';
import { bigserial, index, pgTable, text, varchar } from 'drizzle-orm/pg-core';
import { timestampColumn } from './common.js';

export const partRevisions = pgTable(
  'part_revisions',
  {
    id: bigserial('id', { mode: 'number' }).primaryKey(),
    entityId: varchar('entity_id', { length: 64 }).notNull(),
    fieldName: varchar('field_name', { length: 100 }).notNull(),
    oldValue: text('old_value'),
    newValue: text('new_value').notNull(),
    changeKind: varchar('change_kind', { length: 16, enum: [CHANGE_KIND.CREATED, CHANGE_KIND.UPDATED] }).notNull(),
    category: varchar('category', {
      length: 16,
      enum: [CHANGE_CATEGORY.VALUE, CHANGE_CATEGORY.IMAGE, CHANGE_CATEGORY.GEOMETRY],
    }).notNull(),
    changedAt: timestampColumn('changed_at').notNull(),
    changedBy: varchar('changed_by', { length: 100 }).notNull(),
    notes: text('notes'),
    batchId: varchar('batch_id', { length: 32 }).notNull(),
  },
  (table) => [
    // History queries: one entity, oldest first
    index('part_revisions_history_idx').on(table.entityId, table.changedAt, table.id),
    index('part_revisions_batch_idx').on(table.batchId),
  ],
);

export type PartRevisionRow = typeof partRevisions.$inferSelect;
export type NewPartRevisionRow = typeof partRevisions.$inferInsert;
