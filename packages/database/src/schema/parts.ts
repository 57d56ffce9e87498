/**
 * Parts Schema
 *
 * Quotation parts: the business records whose tracked fields feed the revision log.
 */

import { DATA_SOURCES, DEGATE_OPTIONS, EOAT_TYPES, GEOMETRY_MODES, SURFACE_FINISHES } from '@revision-log/core';
import { boolean, doublePrecision, integer, pgTable, serial, text, varchar } from 'drizzle-orm/pg-core';
import { recordTimestamps } from './common.js';

export const parts = pgTable('parts', {
  id: serial('id').primaryKey(),
  name: varchar('name', { length: 200 }).notNull(),
  partNumber: varchar('part_number', { length: 100 }),
  materialId: integer('material_id'),

  // Geometry
  weightG: doublePrecision('weight_g'),
  volumeCm3: doublePrecision('volume_cm3'),
  projectedAreaCm2: doublePrecision('projected_area_cm2'),
  wallThicknessMm: doublePrecision('wall_thickness_mm'),
  wallThicknessSource: varchar('wall_thickness_source', { length: 16, enum: DATA_SOURCES }),
  geometryMode: varchar('geometry_mode', { length: 16, enum: GEOMETRY_MODES }),
  boxLengthMm: doublePrecision('box_length_mm'),
  boxWidthMm: doublePrecision('box_width_mm'),
  boxEffectivePercent: doublePrecision('box_effective_percent'),

  // Production
  partsOverRuntime: integer('parts_over_runtime'),
  assembly: boolean('assembly').notNull().default(false),
  degate: varchar('degate', { length: 16, enum: DEGATE_OPTIONS }),
  overmold: boolean('overmold').notNull().default(false),
  eoatType: varchar('eoat_type', { length: 16, enum: EOAT_TYPES }),
  surfaceFinish: varchar('surface_finish', { length: 32, enum: SURFACE_FINISHES }),
  surfaceFinishDetail: varchar('surface_finish_detail', { length: 200 }),

  notes: text('notes'),
  remarks: text('remarks'),
  imageFilename: varchar('image_filename', { length: 255 }),

  ...recordTimestamps,
});

export type Part = typeof parts.$inferSelect;
export type NewPart = typeof parts.$inferInsert;
