/**
 * SQL migration runner
 *
 * Applies *.sql files from a directory in name order, once each, recording
 * them in schema_migrations.
 */

import { readdir, readFile } from "node:fs/promises";
import { join } from "node:path";
import { getDbClient, withTransaction, type Queryable } from "./client.js";
import { setupLogger } from "../lib/logger.js";

const logger = setupLogger("migrate");

export interface MigrateResult {
  applied: string[];
  skipped: string[];
}

export type Transaction = <T>(fn: (client: Queryable) => Promise<T>) => Promise<T>;

export async function migrate(
  dir: string,
  db: Queryable = getDbClient(),
  transaction: Transaction = withTransaction
): Promise<MigrateResult> {
  await db.query(
    `CREATE TABLE IF NOT EXISTS schema_migrations (
      name TEXT PRIMARY KEY,
      applied_at TIMESTAMPTZ NOT NULL DEFAULT now()
    )`
  );

  const existing = await db.query("SELECT name FROM schema_migrations");
  const done = new Set(existing.rows.map((row) => String(row.name)));

  const files = (await readdir(dir)).filter((f) => f.endsWith(".sql")).sort();
  const result: MigrateResult = { applied: [], skipped: [] };

  for (const file of files) {
    if (done.has(file)) {
      logger.debug(`Skipping ${file} (already applied)`);
      result.skipped.push(file);
      continue;
    }

    logger.info(`Applying ${file}`);
    const sql = await readFile(join(dir, file), "utf-8");
    await transaction(async (client) => {
      await client.query(sql);
      await client.query("INSERT INTO schema_migrations (name) VALUES ($1)", [file]);
    });
    result.applied.push(file);
  }

  logger.info(`Migrations complete`, { applied: result.applied.length, skipped: result.skipped.length });
  return result;
}
