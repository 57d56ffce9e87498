/**
 * Tracked fields of a quotation part, in the order the part form lays them out.
 */

import { defineFieldSchema } from './field-schema.js';
import { boolean, decimal, enumeration, integer, reference, text } from './serializers.js';

export const DEGATE_OPTIONS = ['yes', 'no', 'maybe'] as const;
export const EOAT_TYPES = ['standard', 'complex'] as const;
export const GEOMETRY_MODES = ['direct', 'box'] as const;
export const DATA_SOURCES = ['data', 'bom', 'estimated'] as const;
export const SURFACE_FINISHES = ['draw_polish', 'polish', 'high_polish', 'grain', 'technical_polish', 'edm'] as const;

export const PART_FIELD_SCHEMA = defineFieldSchema([
  { name: 'name', label: 'Name', serializer: text(), required: true, maxLength: 200 },
  { name: 'part_number', label: 'Part number', serializer: text(), maxLength: 100 },
  { name: 'material_id', label: 'Material', serializer: reference() },
  { name: 'weight_g', label: 'Weight (g)', serializer: decimal({ zeroIsEmpty: true }) },
  { name: 'volume_cm3', label: 'Volume (cm³)', serializer: decimal({ zeroIsEmpty: true }), category: 'geometry' },
  {
    name: 'projected_area_cm2',
    label: 'Projected area (cm²)',
    serializer: decimal({ zeroIsEmpty: true }),
    category: 'geometry',
  },
  {
    name: 'wall_thickness_mm',
    label: 'Wall thickness (mm)',
    serializer: decimal({ zeroIsEmpty: true }),
    category: 'geometry',
  },
  { name: 'wall_thickness_source', label: 'Wall thickness source', serializer: enumeration(DATA_SOURCES) },
  { name: 'geometry_mode', label: 'Geometry mode', serializer: enumeration(GEOMETRY_MODES), category: 'geometry' },
  { name: 'box_length_mm', label: 'Box length (mm)', serializer: decimal({ zeroIsEmpty: true }), category: 'geometry' },
  { name: 'box_width_mm', label: 'Box width (mm)', serializer: decimal({ zeroIsEmpty: true }), category: 'geometry' },
  { name: 'box_effective_percent', label: 'Box effective (%)', serializer: decimal(), category: 'geometry' },
  { name: 'parts_over_runtime', label: 'Parts over runtime', serializer: integer({ zeroIsEmpty: true }) },
  { name: 'assembly', label: 'Assembly', serializer: boolean() },
  { name: 'degate', label: 'Degate', serializer: enumeration(DEGATE_OPTIONS) },
  { name: 'overmold', label: 'Overmold', serializer: boolean() },
  { name: 'eoat_type', label: 'EOAT', serializer: enumeration(EOAT_TYPES) },
  { name: 'surface_finish', label: 'Surface finish', serializer: enumeration(SURFACE_FINISHES) },
  { name: 'surface_finish_detail', label: 'Surface finish detail', serializer: text(), maxLength: 200 },
  { name: 'notes', label: 'Notes', serializer: text() },
  { name: 'remarks', label: 'Remarks', serializer: text() },
  { name: 'image_filename', label: 'Image', serializer: text(), category: 'image', maxLength: 255 },
]);
