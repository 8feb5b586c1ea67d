// Database configuration

import { z } from 'zod';

export type DatabaseConfig = {
  connectionString: string;
  maxConnections?: number;
};

const DatabaseEnvSchema = z.object({
  DATABASE_URL: z.string().url(),
  DATABASE_MAX_CONNECTIONS: z.coerce.number().int().positive().optional(),
});

/**
 * Read database settings from environment variables.
 *
 * - `DATABASE_URL` (required): postgres connection string
 * - `DATABASE_MAX_CONNECTIONS` (optional): pool size, defaults to 10 in createDatabase
 *
 * @throws ZodError when a variable is missing or malformed
 */
export function databaseConfigFromEnv(
  env: Record<string, string | undefined> = process.env
): DatabaseConfig {
  const parsed = DatabaseEnvSchema.parse(env);

  return {
    connectionString: parsed.DATABASE_URL,
    ...(parsed.DATABASE_MAX_CONNECTIONS !== undefined
      ? { maxConnections: parsed.DATABASE_MAX_CONNECTIONS }
      : {}),
  };
}
