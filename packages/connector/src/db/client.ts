/**
 * PostgreSQL connection pool
 *
 * One pool per process, created on first use from DATABASE_URL.
 */

import pg from "pg";
import { requireConfig } from "../lib/config.js";
import { setupLogger } from "../lib/logger.js";

const { Pool } = pg;
const logger = setupLogger("db");

export interface QueryResult<R = Record<string, unknown>> {
  rows: R[];
  rowCount: number | null;
}

/**
 * Anything that runs parameterized SQL: pg.Pool, pg.PoolClient, test fakes.
 */
export interface Queryable {
  query(text: string, values?: unknown[]): Promise<QueryResult>;
}

let pool: pg.Pool | null = null;

export function getDbClient(): pg.Pool {
  if (pool !== null) {
    return pool;
  }

  const connectionString = requireConfig("DATABASE_URL");
  pool = new Pool({ connectionString, max: 10 });
  pool.on("error", (err) => {
    logger.error(`Idle client error: ${err.message}`);
  });
  logger.debug("Connection pool created");
  return pool;
}

export async function closeDbClient(): Promise<void> {
  if (pool === null) {
    return;
  }
  const current = pool;
  pool = null;
  await current.end();
  logger.debug("Connection pool closed");
}

/**
 * Run fn inside BEGIN/COMMIT on a dedicated connection; ROLLBACK on error.
 */
export async function withTransaction<T>(fn: (client: Queryable) => Promise<T>): Promise<T> {
  const client = await getDbClient().connect();
  try {
    await client.query("BEGIN");
    const result = await fn(client);
    await client.query("COMMIT");
    return result;
  } catch (error) {
    await client.query("ROLLBACK");
    throw error;
  } finally {
    client.release();
  }
}
