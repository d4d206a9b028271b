/**
 * Airtable API types
 */

import { z } from "zod";

export type AirtableFields = Record<string, unknown>;

export const AirtableRecordSchema = z.object({
  id: z.string(),
  createdTime: z.string().optional(),
  fields: z.record(z.unknown()).default({}),
});

export type AirtableRecord = z.infer<typeof AirtableRecordSchema>;

export const AirtableListResponseSchema = z.object({
  records: z.array(AirtableRecordSchema),
  offset: z.string().optional(),
});

export const AirtableRecordsResponseSchema = z.object({
  records: z.array(AirtableRecordSchema),
});

export const AirtableDeleteResponseSchema = z.object({
  records: z.array(z.object({ id: z.string(), deleted: z.boolean() })),
});

export interface ListRecordsOptions {
  view?: string;
  fields?: string[];
  filterByFormula?: string;
}

export interface RecordUpdate {
  id: string;
  fields: AirtableFields;
}

/**
 * Table operations of one base. AirtableClient implements it; the record
 * store depends only on this.
 */
export interface AirtableTableClient {
  listRecords(table: string, options?: ListRecordsOptions): Promise<AirtableRecord[]>;
  getRecord(table: string, recordId: string): Promise<AirtableRecord | null>;
  createRecords(table: string, records: AirtableFields[]): Promise<AirtableRecord[]>;
  updateRecords(table: string, updates: RecordUpdate[]): Promise<AirtableRecord[]>;
  deleteRecords(table: string, recordIds: string[]): Promise<void>;
}

export const EnterpriseUserSchema = z
  .object({
    id: z.string(),
    email: z.string(),
    name: z.string().optional(),
    state: z.string().optional(),
    createdTime: z.string().optional(),
    lastActivityTime: z.string().nullable().optional(),
  })
  .passthrough();

export type EnterpriseUser = z.infer<typeof EnterpriseUserSchema>;

export const EnterpriseAccountSchema = z
  .object({
    id: z.string(),
    userIds: z.array(z.string()).default([]),
  })
  .passthrough();
