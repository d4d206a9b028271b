/**
 * Record store
 *
 * CRUD for a Postgres table described by a zod schema, plus mirroring of
 * its rows to an Airtable table. A record definition names the table, the
 * columns that identify a row (matchOn) and, optionally, the Airtable table
 * that mirrors it.
 *
 * The database is the source of truth; Airtable is a view of it.
 */

import { z } from "zod";
import type { Queryable } from "./client.js";
import { buildDelete, buildInsert, buildSelect, buildUpdate, type Row, type SelectOptions } from "./sql.js";
import { NotFoundError } from "../lib/errors.js";
import { setupLogger, type Logger } from "../lib/logger.js";
import type {
  AirtableFields,
  AirtableRecord,
  AirtableTableClient,
  RecordUpdate,
} from "../services/airtable/types.js";

/** Columns every stored record carries on top of its schema */
export interface RecordMeta {
  id: number;
  airtable_record_id: string;
}

export type Stored<N> = N & RecordMeta;

const RecordMetaSchema = z.object({
  id: z.coerce.number().int(),
  airtable_record_id: z.string().nullable().transform((v) => v ?? ""),
});

export interface AirtableHookContext {
  /** Fields of the Airtable record being updated, null when creating */
  existing: AirtableFields | null;
  db: Queryable;
}

export interface AirtableOptions<N> {
  /** Logical base name, resolved to a base id by the caller's Airtable client */
  base: string;
  table: string;
  view?: string;
  /** Columns that are not sent to Airtable */
  exclude?: readonly (keyof N & string)[];
  /** Adjust the outgoing fields (linked records, truncation, ...) */
  beforeUpdate?: (
    record: Stored<N>,
    fields: AirtableFields,
    context: AirtableHookContext
  ) => AirtableFields | Promise<AirtableFields>;
}

export interface RecordDefinition<N extends Row> {
  name: string;
  table: string;
  schema: z.ZodType<N, z.ZodTypeDef, unknown>;
  columns: readonly string[];
  matchOn: readonly (keyof N & string)[];
  airtable?: AirtableOptions<N>;
}

export interface DefineRecordOptions<N extends Row> {
  name: string;
  table: string;
  schema: z.ZodType<N, z.ZodTypeDef, unknown>;
  matchOn: readonly (keyof N & string)[];
  airtable?: AirtableOptions<N>;
}

export function defineRecord<N extends Row>(options: DefineRecordOptions<N>): RecordDefinition<N> {
  if (!(options.schema instanceof z.ZodObject)) {
    throw new Error(`${options.name}: record schema must be a zod object`);
  }
  const columns = Object.keys(options.schema.shape);
  for (const column of options.matchOn) {
    if (!columns.includes(column)) {
      throw new Error(`${options.name}: matchOn column ${column} is not in the schema`);
    }
  }
  return { ...options, columns };
}

export interface AirtableSyncResult {
  created: number;
  updated: number;
  unchanged: number;
  deleted: number;
}

function toFieldValue(value: unknown): unknown {
  if (value instanceof Date) {
    return value.toISOString();
  }
  return value;
}

function isEmptyField(value: unknown): boolean {
  return (
    value === undefined ||
    value === null ||
    value === "" ||
    value === false ||
    (Array.isArray(value) && value.length === 0)
  );
}

/**
 * Airtable omits empty cells and echoes numbers/strings back as sent.
 */
export function fieldsEqual(desired: AirtableFields, existing: AirtableFields): boolean {
  for (const [key, value] of Object.entries(desired)) {
    const current = existing[key];
    if (isEmptyField(value) && isEmptyField(current)) continue;
    if (JSON.stringify(value) !== JSON.stringify(current)) {
      return false;
    }
  }
  return true;
}

export class RecordStore<N extends Row> {
  readonly definition: RecordDefinition<N>;
  private readonly db: Queryable;
  private readonly logger: Logger;

  constructor(definition: RecordDefinition<N>, db: Queryable) {
    this.definition = definition;
    this.db = db;
    this.logger = setupLogger(`db:${definition.table}`);
  }

  // ===========================================================================
  // Rows
  // ===========================================================================

  parseRow(row: unknown): Stored<N> {
    const data = this.definition.schema.parse(row);
    const meta = RecordMetaSchema.parse(row);
    return { ...data, ...meta };
  }

  /** Strip id and airtable_record_id */
  toNew(record: N | Stored<N>): N {
    return this.definition.schema.parse(record);
  }

  private toRow(record: N): Row {
    const row: Row = {};
    const source: Row = record;
    for (const column of this.definition.columns) {
      if (column in source) {
        row[column] = source[column];
      }
    }
    return row;
  }

  private matchFor(record: N): Row {
    const source: Row = record;
    const match: Row = {};
    for (const column of this.definition.matchOn) {
      match[column] = source[column];
    }
    return match;
  }

  private describe(record: N): string {
    return Object.entries(this.matchFor(record))
      .map(([k, v]) => `${k}=${String(toFieldValue(v))}`)
      .join(" ");
  }

  async create(input: N): Promise<Stored<N>> {
    const record = this.toNew(input);
    const statement = buildInsert(this.definition.table, this.toRow(record));
    const result = await this.db.query(statement.text, statement.values);
    const row = result.rows[0];
    if (row === undefined) {
      throw new Error(`Creating ${this.definition.name} returned no row (${this.describe(record)})`);
    }
    return this.parseRow(row);
  }

  async upsert(input: N): Promise<Stored<N>> {
    const record = this.toNew(input);
    const label = this.describe(record);
    this.logger.debug(`Upserting ${this.definition.name} ${label}`);

    const existing = await this.getFromDb(record);
    if (existing !== null) {
      this.logger.debug(`Found existing ${this.definition.name} ${existing.id}. Performing update`);
      return this.update({ ...record, id: existing.id, airtable_record_id: existing.airtable_record_id });
    }

    this.logger.debug(`No existing ${this.definition.name} found for ${label}. Performing create`);
    return this.create(record);
  }

  async update(record: Stored<N>): Promise<Stored<N>> {
    const row = { ...this.toRow(this.toNew(record)), airtable_record_id: record.airtable_record_id };
    const statement = buildUpdate(this.definition.table, row, { id: record.id });
    const result = await this.db.query(statement.text, statement.values);
    const updated = result.rows[0];
    if (updated === undefined) {
      throw new NotFoundError(this.definition.name, `id=${record.id}`);
    }
    return this.parseRow(updated);
  }

  /**
   * First row matching every matchOn column of the given record.
   */
  async getFromDb(match: N): Promise<Stored<N> | null> {
    const rows = await this.select(this.matchFor(match), { limit: 1 });
    return rows[0] ?? null;
  }

  async getById(id: number): Promise<Stored<N>> {
    const rows = await this.select({ id }, { limit: 1 });
    const record = rows[0];
    if (record === undefined) {
      throw new NotFoundError(this.definition.name, `id=${id}`);
    }
    return record;
  }

  async getByAirtableId(airtableRecordId: string): Promise<Stored<N>> {
    const rows = await this.select({ airtable_record_id: airtableRecordId }, { limit: 1 });
    const record = rows[0];
    if (record === undefined) {
      throw new NotFoundError(this.definition.name, `airtable_record_id=${airtableRecordId}`);
    }
    return record;
  }

  async delete(record: RecordMeta): Promise<void> {
    const statement = buildDelete(this.definition.table, { id: record.id });
    await this.db.query(statement.text, statement.values);
  }

  async listForCompany(cioCompanyId: number): Promise<Stored<N>[]> {
    return this.select({ cio_company_id: cioCompanyId }, { orderBy: "id", descending: true });
  }

  async list(): Promise<Stored<N>[]> {
    return this.select({}, { orderBy: "id", descending: true });
  }

  async select(where: Row, options: SelectOptions = {}): Promise<Stored<N>[]> {
    const statement = buildSelect(this.definition.table, where, options);
    return this.query(statement.text, statement.values);
  }

  /**
   * Run custom SQL returning rows of this table.
   */
  async query(text: string, values: unknown[] = []): Promise<Stored<N>[]> {
    const result = await this.db.query(text, values);
    return result.rows.map((row) => this.parseRow(row));
  }

  // ===========================================================================
  // Airtable
  // ===========================================================================

  private airtableOptions(): AirtableOptions<N> {
    const options = this.definition.airtable;
    if (options === undefined) {
      throw new Error(`${this.definition.name} is not mirrored to Airtable`);
    }
    return options;
  }

  toAirtableFields(record: Stored<N>): AirtableFields {
    const exclude = new Set<string>(this.airtableOptions().exclude ?? []);
    const source: Row = record;
    const fields: AirtableFields = { id: record.id };
    for (const column of this.definition.columns) {
      if (exclude.has(column)) continue;
      fields[column] = toFieldValue(source[column]);
    }
    return fields;
  }

  private async prepareFields(record: Stored<N>, existing: AirtableFields | null): Promise<AirtableFields> {
    const fields = this.toAirtableFields(record);
    const hook = this.airtableOptions().beforeUpdate;
    if (hook === undefined) {
      return fields;
    }
    return hook(record, fields, { existing, db: this.db });
  }

  /**
   * Parse Airtable fields into a new record; null when they do not validate.
   */
  fromAirtableFields(fields: AirtableFields): N | null {
    const parsed = this.definition.schema.safeParse(fields);
    if (!parsed.success) {
      this.logger.debug(`Airtable fields do not form a ${this.definition.name}: ${parsed.error.issues[0]?.message}`);
      return null;
    }
    return parsed.data;
  }

  async upsertInAirtable(airtable: AirtableTableClient, record: Stored<N>): Promise<Stored<N>> {
    const { table } = this.airtableOptions();

    if (record.airtable_record_id !== "") {
      const existing = await airtable.getRecord(table, record.airtable_record_id);
      if (existing !== null) {
        const fields = await this.prepareFields(record, existing.fields);
        await airtable.updateRecords(table, [{ id: record.airtable_record_id, fields }]);
        this.logger.debug(`Updated Airtable record ${record.airtable_record_id}`);
        return record;
      }
      this.logger.debug(`Airtable record ${record.airtable_record_id} is gone, creating it again`);
    }

    const fields = await this.prepareFields(record, null);
    const [created] = await airtable.createRecords(table, [fields]);
    if (created === undefined) {
      throw new Error(`Airtable returned no record when creating ${this.definition.name} ${record.id}`);
    }
    return this.update({ ...record, airtable_record_id: created.id });
  }

  async deleteFromAirtable(airtable: AirtableTableClient, record: Stored<N>): Promise<void> {
    if (record.airtable_record_id === "") {
      return;
    }
    const { table } = this.airtableOptions();
    await airtable.deleteRecords(table, [record.airtable_record_id]);
  }

  /**
   * Mirror the given records to the Airtable table: update what changed,
   * create what is missing, delete what no longer exists in the database.
   */
  async updateAirtable(airtable: AirtableTableClient, records: Stored<N>[]): Promise<AirtableSyncResult> {
    const { table, view } = this.airtableOptions();
    const existing = await airtable.listRecords(table, view ? { view } : {});
    this.logger.debug(`Found ${existing.length} Airtable records in ${table}`);

    const byId = new Map<number, AirtableRecord>();
    const byRecordId = new Map<string, AirtableRecord>();
    for (const airtableRecord of existing) {
      const id = airtableRecord.fields.id;
      if (typeof id === "number" && !byId.has(id)) {
        byId.set(id, airtableRecord);
      } else {
        byRecordId.set(airtableRecord.id, airtableRecord);
      }
    }

    const matched = new Set<string>();
    const updates: RecordUpdate[] = [];
    const creates: { record: Stored<N>; fields: AirtableFields }[] = [];
    let unchanged = 0;

    for (const record of records) {
      const match = byId.get(record.id) ?? byRecordId.get(record.airtable_record_id);
      if (match === undefined || matched.has(match.id)) {
        creates.push({ record, fields: await this.prepareFields(record, null) });
        continue;
      }
      matched.add(match.id);

      const fields = await this.prepareFields(record, match.fields);
      if (fieldsEqual(fields, match.fields)) {
        unchanged++;
      } else {
        updates.push({ id: match.id, fields });
      }

      if (record.airtable_record_id !== match.id) {
        await this.update({ ...record, airtable_record_id: match.id });
      }
    }

    if (updates.length > 0) {
      await airtable.updateRecords(table, updates);
    }

    if (creates.length > 0) {
      const created = await airtable.createRecords(
        table,
        creates.map((c) => c.fields)
      );
      for (const [index, airtableRecord] of created.entries()) {
        const pending = creates[index];
        if (pending !== undefined) {
          await this.update({ ...pending.record, airtable_record_id: airtableRecord.id });
        }
      }
    }

    const orphans = existing.filter((r) => !matched.has(r.id)).map((r) => r.id);
    if (orphans.length > 0) {
      this.logger.debug(`Deleting ${orphans.length} orphan Airtable records from ${table}`);
      await airtable.deleteRecords(table, orphans);
    }

    const result = {
      created: creates.length,
      updated: updates.length,
      unchanged,
      deleted: orphans.length,
    };
    this.logger.info(`Airtable ${table} mirrored`, { ...result });
    return result;
  }
}
