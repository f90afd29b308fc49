import pg, { type Pool as PgPool } from 'pg';
import { drizzle, type NodePgDatabase, type NodePgQueryResultHKT } from 'drizzle-orm/node-postgres';
import type { Logger as DrizzleLogger } from 'drizzle-orm';
import type { PgDatabase } from 'drizzle-orm/pg-core';
import * as schema from './schema/index.js';
import { logger } from '../utils/logger.js';
import { ConnectivityError, describeError } from '../utils/errors.js';

const { Pool } = pg;

export type Schema = typeof schema;
export type Database = NodePgDatabase<Schema>;
/** The root database or an open transaction. */
export type Executor = PgDatabase<NodePgQueryResultHKT, Schema>;

class PinoQueryLogger implements DrizzleLogger {
  logQuery(query: string, params: unknown[]): void {
    logger.debug({ query, params }, 'SQL query');
  }
}

export interface DatabaseHandle {
  db: Database;
  pool: PgPool;
}

/**
 * Open a pool against the local store and verify it answers before any
 * task is touched.
 */
export async function connectDatabase(url: string, options: { logQueries?: boolean } = {}): Promise<DatabaseHandle> {
  const pool = new Pool({ connectionString: url });
  pool.on('error', (err) => {
    logger.error({ error: err.message }, 'Idle local store connection error');
  });

  try {
    await pool.query('SELECT 1');
  } catch (error) {
    await pool.end();
    throw new ConnectivityError(`Cannot connect to the local store: ${describeError(error)}`);
  }

  const db = drizzle(pool, {
    schema,
    logger: options.logQueries ? new PinoQueryLogger() : false,
  });

  const { hostname, port, pathname } = new URL(url);
  logger.info({ host: hostname, port: port || '5432', database: pathname.slice(1) }, 'Connected to local store');

  return { db, pool };
}
