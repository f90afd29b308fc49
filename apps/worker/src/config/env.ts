import { fileURLToPath } from 'node:url';
import { z } from 'zod';
import dotenv from 'dotenv';
import { ConfigurationError } from '../utils/errors.js';

const envSchema = z.object({
  NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),
  DATABASE_URL: z.string().min(1),
  BATCH_SIZE: z.coerce.number().int().positive().default(500),
  AI_CHUNK_SIZE: z.coerce.number().int().positive().default(10),
  AI_MAX_ITEMS: z.coerce.number().int().positive().default(20),
  LOG_LEVEL: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']).default('info'),
  LOG_SQL_QUERIES: z.enum(['true', 'false']).default('false').transform((v) => v === 'true'),
  TASK_LOCK_TIMEOUT_MS: z.coerce.number().int().positive().default(5 * 60 * 1000),
  SYNC_CRON: z.string().default('*/5 * * * *'),
  AI_CRON: z.string().default('* * * * *'),
});

export type Env = z.infer<typeof envSchema>;

/**
 * Validate settings from the given source. Throws a ConfigurationError
 * listing every offending key.
 */
export function parseEnv(source: NodeJS.ProcessEnv): Env {
  const result = envSchema.safeParse(source);
  if (!result.success) {
    const details = result.error.issues
      .map((issue) => `${issue.path.join('.')}: ${issue.message}`)
      .join('; ');
    throw new ConfigurationError(`Invalid environment variables: ${details}`);
  }
  return result.data;
}

const ROOT_ENV_FILE = fileURLToPath(new URL('../../../../.env', import.meta.url));

/**
 * Read a .env file (the repository root's by default) into process.env and
 * validate it. Variables already set in the environment win.
 */
export function loadEnv(path: string = ROOT_ENV_FILE): Env {
  dotenv.config({ path });
  return parseEnv(process.env);
}
