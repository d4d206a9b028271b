/**
 * Raw layer database client
 *
 * Archives API payloads into raw.{service}__{endpoint} tables before they
 * are mapped onto records.
 */

import { getDbClient, type Queryable } from "./client.js";
import { setupLogger } from "../lib/logger.js";

const logger = setupLogger("raw-client");

// Types
export interface UpsertResult {
  table: string;
  inserted: number;
  updated: number;
  total: number;
}

export interface RawRecord {
  sourceId: string;
  data: unknown;
}

function emptyResult(tableName: string): UpsertResult {
  return { table: tableName, inserted: 0, updated: 0, total: 0 };
}

/**
 * UPSERT records to raw layer table
 *
 * @param tableName - Table name without schema (e.g., "ramp__transactions")
 * @param apiVersion - Kept from the previous row when omitted
 */
export async function upsertRaw(
  tableName: string,
  records: RawRecord[],
  apiVersion?: string,
  db?: Queryable
): Promise<UpsertResult> {
  if (records.length === 0) {
    return emptyResult(tableName);
  }

  const client = db ?? getDbClient();
  const now = new Date().toISOString();

  // ON CONFLICT cannot touch the same row twice in one statement; last one wins
  const unique = [...new Map(records.map((record) => [String(record.sourceId), record])).values()];
  if (unique.length < records.length) {
    logger.debug(`Dropped ${records.length - unique.length} duplicate records for raw.${tableName}`);
  }

  // Build VALUES for batch insert
  const values: unknown[] = [];
  const placeholders: string[] = [];
  let paramIndex = 1;

  for (const record of unique) {
    placeholders.push(
      `($${paramIndex}, $${paramIndex + 1}, $${paramIndex + 2}, $${paramIndex + 3})`
    );
    values.push(String(record.sourceId), JSON.stringify(record.data), now, apiVersion ?? null);
    paramIndex += 4;
  }

  // xmax = 0 only for freshly inserted rows
  const sql = `
    INSERT INTO raw.${tableName} (source_id, data, synced_at, api_version)
    VALUES ${placeholders.join(", ")}
    ON CONFLICT (source_id) DO UPDATE SET
      data = EXCLUDED.data,
      synced_at = EXCLUDED.synced_at,
      api_version = COALESCE(EXCLUDED.api_version, raw.${tableName}.api_version)
    RETURNING (xmax = 0) AS inserted
  `;

  const result = await client.query(sql, values);
  const inserted = result.rows.filter((row) => row.inserted === true).length;
  const total = result.rowCount ?? unique.length;
  logger.info(`Upserted ${unique.length} records to raw.${tableName}`, { inserted });

  return { table: tableName, inserted, updated: total - inserted, total };
}

/**
 * UPSERT large batch of records (splits into batches)
 */
export async function upsertRawBatch(
  tableName: string,
  records: RawRecord[],
  apiVersion?: string,
  batchSize: number = 1000,
  db?: Queryable
): Promise<UpsertResult> {
  const totals = emptyResult(tableName);

  for (let i = 0; i < records.length; i += batchSize) {
    const batch = records.slice(i, i + batchSize);
    const result = await upsertRaw(tableName, batch, apiVersion, db);
    totals.inserted += result.inserted;
    totals.updated += result.updated;
    totals.total += result.total;
  }

  return totals;
}
