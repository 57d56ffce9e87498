import { DEFAULTS, ValidationError } from '@revision-log/core';
import { z } from 'zod';

const databaseEnvSchema = z.object({
  DATABASE_URL: z.string().url(),
  DATABASE_MAX_CONNECTIONS: z.coerce.number().int().positive().default(10),
  /** Reference time zone of history views */
  REVISION_LOG_TIME_ZONE: z.string().min(1).default(DEFAULTS.TIME_ZONE),
});

export type DatabaseEnv = z.infer<typeof databaseEnvSchema>;

/**
 * Reads and validates the database settings
 *
 * @throws {ValidationError} One issue per invalid or missing variable
 */
export const loadDatabaseEnv = (source: NodeJS.ProcessEnv = process.env): DatabaseEnv => {
  const parsed = databaseEnvSchema.safeParse(source);
  if (!parsed.success) {
    throw new ValidationError(
      parsed.error.issues.map((issue) => ({ field: issue.path.join('.'), message: issue.message })),
    );
  }
  return parsed.data;
};
