/** Constants and Configuration Values for Revision Logging */

/** Kind of a logged field mutation */
export type ChangeKind = 'CREATED' | 'UPDATED';

/** Change kind constants */
export const CHANGE_KIND = {
  CREATED: 'CREATED',
  UPDATED: 'UPDATED',
} as const satisfies Record<string, ChangeKind>;

/**
 * Category of a tracked field
 *
 * - `value`: plain business data (dimensions, options, text)
 * - `image`: the part picture
 * - `geometry`: inputs of the weight/volume estimation
 */
export type ChangeCategory = 'value' | 'image' | 'geometry';

export const CHANGE_CATEGORY = {
  VALUE: 'value',
  IMAGE: 'image',
  GEOMETRY: 'geometry',
} as const satisfies Record<string, ChangeCategory>;

/**
 * Stored form of "no prior value".
 *
 * Persisted as SQL NULL; rendered as {@link DEFAULTS.EMPTY_DISPLAY} in history views.
 */
export const ABSENT = null;

/** Default configuration values */
export const DEFAULTS = {
  /** Serialized values are cut to this many characters before they are stored */
  MAX_VALUE_LENGTH: 500,
  /** Reference time zone for grouping history by calendar date */
  TIME_ZONE: 'UTC',
  /** Placeholder shown for absent or empty values */
  EMPTY_DISPLAY: '-',
  /** Number of fraction digits numeric values are rounded to before rendering */
  DECIMAL_PRECISION: 10,
} as const;
