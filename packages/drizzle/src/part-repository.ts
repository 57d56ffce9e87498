/**
 * Part Repository
 *
 * Reads and writes parts, and materializes them into plain snapshots keyed by the tracked
 * field names of `PART_FIELD_SCHEMA`.
 */

import {
  type DATA_SOURCES,
  type DEGATE_OPTIONS,
  type EOAT_TYPES,
  type GEOMETRY_MODES,
  NotFoundError,
  type Snapshot,
  type SURFACE_FINISHES,
} from '@revision-log/core';
import { type NewPart, type Part, parts, type RevisionDatabase } from '@revision-log/database';
import { eq } from 'drizzle-orm';

/** Editable fields of a part */
export interface PartInput {
  name: string;
  partNumber?: string | null;
  materialId?: number | null;
  weightG?: number | null;
  volumeCm3?: number | null;
  projectedAreaCm2?: number | null;
  wallThicknessMm?: number | null;
  wallThicknessSource?: (typeof DATA_SOURCES)[number] | null;
  geometryMode?: (typeof GEOMETRY_MODES)[number] | null;
  boxLengthMm?: number | null;
  boxWidthMm?: number | null;
  boxEffectivePercent?: number | null;
  partsOverRuntime?: number | null;
  assembly?: boolean;
  degate?: (typeof DEGATE_OPTIONS)[number] | null;
  overmold?: boolean;
  eoatType?: (typeof EOAT_TYPES)[number] | null;
  surfaceFinish?: (typeof SURFACE_FINISHES)[number] | null;
  surfaceFinishDetail?: string | null;
  notes?: string | null;
  remarks?: string | null;
  imageFilename?: string | null;
}

export interface PartRepository {
  findById(db: RevisionDatabase, id: number): Promise<Part | null>;
  insert(db: RevisionDatabase, input: PartInput): Promise<Part>;
  /** @throws {NotFoundError} When no part has this id */
  update(db: RevisionDatabase, id: number, changes: Partial<PartInput>): Promise<Part>;
}

/**
 * Plain snapshot of a part for the diff engine
 *
 * Missing optional values read as `null`; missing flags read as `false` (the column default).
 */
export const toPartSnapshot = (part: PartInput): Snapshot => ({
  name: part.name,
  part_number: part.partNumber ?? null,
  material_id: part.materialId ?? null,
  weight_g: part.weightG ?? null,
  volume_cm3: part.volumeCm3 ?? null,
  projected_area_cm2: part.projectedAreaCm2 ?? null,
  wall_thickness_mm: part.wallThicknessMm ?? null,
  wall_thickness_source: part.wallThicknessSource ?? null,
  geometry_mode: part.geometryMode ?? null,
  box_length_mm: part.boxLengthMm ?? null,
  box_width_mm: part.boxWidthMm ?? null,
  box_effective_percent: part.boxEffectivePercent ?? null,
  parts_over_runtime: part.partsOverRuntime ?? null,
  assembly: part.assembly ?? false,
  degate: part.degate ?? null,
  overmold: part.overmold ?? false,
  eoat_type: part.eoatType ?? null,
  surface_finish: part.surfaceFinish ?? null,
  surface_finish_detail: part.surfaceFinishDetail ?? null,
  notes: part.notes ?? null,
  remarks: part.remarks ?? null,
  image_filename: part.imageFilename ?? null,
});

const keepUnlessUndefined = <T>(next: T | undefined, current: T): T => (next === undefined ? current : next);

/**
 * Applies edits to a part; a key set to `undefined` leaves the field as it is
 *
 * The result is both what the update writes and what the diff engine sees.
 */
export const applyPartChanges = (existing: PartInput, changes: Partial<PartInput>): PartInput => ({
  name: keepUnlessUndefined(changes.name, existing.name),
  partNumber: keepUnlessUndefined(changes.partNumber, existing.partNumber),
  materialId: keepUnlessUndefined(changes.materialId, existing.materialId),
  weightG: keepUnlessUndefined(changes.weightG, existing.weightG),
  volumeCm3: keepUnlessUndefined(changes.volumeCm3, existing.volumeCm3),
  projectedAreaCm2: keepUnlessUndefined(changes.projectedAreaCm2, existing.projectedAreaCm2),
  wallThicknessMm: keepUnlessUndefined(changes.wallThicknessMm, existing.wallThicknessMm),
  wallThicknessSource: keepUnlessUndefined(changes.wallThicknessSource, existing.wallThicknessSource),
  geometryMode: keepUnlessUndefined(changes.geometryMode, existing.geometryMode),
  boxLengthMm: keepUnlessUndefined(changes.boxLengthMm, existing.boxLengthMm),
  boxWidthMm: keepUnlessUndefined(changes.boxWidthMm, existing.boxWidthMm),
  boxEffectivePercent: keepUnlessUndefined(changes.boxEffectivePercent, existing.boxEffectivePercent),
  partsOverRuntime: keepUnlessUndefined(changes.partsOverRuntime, existing.partsOverRuntime),
  assembly: keepUnlessUndefined(changes.assembly, existing.assembly),
  degate: keepUnlessUndefined(changes.degate, existing.degate),
  overmold: keepUnlessUndefined(changes.overmold, existing.overmold),
  eoatType: keepUnlessUndefined(changes.eoatType, existing.eoatType),
  surfaceFinish: keepUnlessUndefined(changes.surfaceFinish, existing.surfaceFinish),
  surfaceFinishDetail: keepUnlessUndefined(changes.surfaceFinishDetail, existing.surfaceFinishDetail),
  notes: keepUnlessUndefined(changes.notes, existing.notes),
  remarks: keepUnlessUndefined(changes.remarks, existing.remarks),
  imageFilename: keepUnlessUndefined(changes.imageFilename, existing.imageFilename),
});

const toPartValues = (input: PartInput): NewPart => ({
  name: input.name,
  partNumber: input.partNumber,
  materialId: input.materialId,
  weightG: input.weightG,
  volumeCm3: input.volumeCm3,
  projectedAreaCm2: input.projectedAreaCm2,
  wallThicknessMm: input.wallThicknessMm,
  wallThicknessSource: input.wallThicknessSource,
  geometryMode: input.geometryMode,
  boxLengthMm: input.boxLengthMm,
  boxWidthMm: input.boxWidthMm,
  boxEffectivePercent: input.boxEffectivePercent,
  partsOverRuntime: input.partsOverRuntime,
  assembly: input.assembly,
  degate: input.degate,
  overmold: input.overmold,
  eoatType: input.eoatType,
  surfaceFinish: input.surfaceFinish,
  surfaceFinishDetail: input.surfaceFinishDetail,
  notes: input.notes,
  remarks: input.remarks,
  imageFilename: input.imageFilename,
});

export const createPartRepository = (): PartRepository => ({
  findById: async (db, id) => {
    const [part] = await db.select().from(parts).where(eq(parts.id, id)).limit(1);
    return part ?? null;
  },

  insert: async (db, input) => {
    const [part] = await db.insert(parts).values(toPartValues(input)).returning();
    if (!part) {
      throw new Error('Part insert returned no row');
    }
    return part;
  },

  update: async (db, id, changes) => {
    const [part] = await db
      .update(parts)
      .set({ ...changes, updatedAt: new Date() })
      .where(eq(parts.id, id))
      .returning();
    if (!part) {
      throw new NotFoundError('Part', String(id));
    }
    return part;
  },
});
