/**
 * Shared column definitions
 */

import { timestamp } from 'drizzle-orm/pg-core';

/** Timestamp with time zone, read back as a Date */
export const timestampColumn = (name: string) => timestamp(name, { withTimezone: true, mode: 'date' });

export const recordTimestamps = {
  createdAt: timestampColumn('created_at').notNull().defaultNow(),
  updatedAt: timestampColumn('updated_at').notNull().defaultNow(),
};
