import type { Pool } from 'pg';
import { loadEnv, type Env } from './config/env.js';
import { connectDatabase } from './db/client.js';
import { DrizzleTaskStore } from './store/drizzle-task-store.js';
import type { TaskStore } from './store/task-store.js';
import { ConfigurationError, ConnectivityError, describeError } from './utils/errors.js';
import { configureLogger, logger, type Logger } from './utils/logger.js';
import { createWorkerId } from './utils/worker-id.js';

export interface WorkerContext {
  env: Env;
  store: TaskStore;
  workerId: string;
  logger: Logger;
  pool: Pool;
}

/**
 * Loads and validates settings, then applies the configured log level.
 */
export function loadSettings(envPath?: string): Env {
  const env = loadEnv(envPath);
  configureLogger(env.LOG_LEVEL);
  return env;
}

/**
 * Loads settings and connects to the local store. Configuration and
 * connectivity failures propagate to the caller.
 */
export async function bootstrap(name: string): Promise<WorkerContext> {
  const env = loadSettings();
  const { db, pool } = await connectDatabase(env.DATABASE_URL, { logQueries: env.LOG_SQL_QUERIES });
  const workerId = createWorkerId();

  return {
    env,
    store: new DrizzleTaskStore(db, { lockTimeoutMs: env.TASK_LOCK_TIMEOUT_MS }),
    workerId,
    logger: logger.child({ entry: name, workerId }),
    pool,
  };
}

/**
 * Runs one command against a freshly bootstrapped context and closes the
 * pool afterwards. Sets exit status 1 on configuration or connectivity
 * failure only; task-level failures end up in the task's error log.
 */
export async function runCommand(name: string, command: (context: WorkerContext) => Promise<void>): Promise<void> {
  let context: WorkerContext;
  try {
    context = await bootstrap(name);
  } catch (error) {
    if (error instanceof ConfigurationError || error instanceof ConnectivityError) {
      logger.fatal({ error: describeError(error), code: error.code }, `${name}: startup failed`);
      process.exitCode = 1;
      return;
    }
    throw error;
  }

  try {
    await command(context);
  } catch (error) {
    context.logger.fatal({ error: describeError(error) }, `${name}: aborted`);
    process.exitCode = 1;
  } finally {
    await context.pool.end();
  }
}
