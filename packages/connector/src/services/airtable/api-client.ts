/**
 * Airtable API Client
 *
 * Records API (per base) and the enterprise account API.
 * Data fetching only, no DB operations.
 *
 * Write limits:
 * - create/update/delete take at most 10 records per request
 */

import { z } from "zod";
import { ApiClient, bearer } from "../../lib/http-client.js";
import type { RetryOptions } from "../../lib/http-client.js";
import { AirtableScimClient } from "./scim.js";
import {
  AirtableDeleteResponseSchema,
  AirtableListResponseSchema,
  AirtableRecordSchema,
  AirtableRecordsResponseSchema,
  EnterpriseAccountSchema,
  EnterpriseUserSchema,
  type AirtableFields,
  type AirtableRecord,
  type AirtableTableClient,
  type EnterpriseUser,
  type ListRecordsOptions,
  type RecordUpdate,
} from "./types.js";
import { isNotFound } from "../../lib/errors.js";

export const AIRTABLE_API_BASE = "https://api.airtable.com/v0/";
const PAGE_SIZE = 100;
export const WRITE_BATCH_SIZE = 10;

export interface AirtableClientOptions {
  apiKey: string;
  baseId: string;
  enterpriseAccountId?: string;
  retry?: Omit<RetryOptions, "service" | "logger">;
}

export function chunk<T>(items: T[], size: number): T[][] {
  const chunks: T[][] = [];
  for (let i = 0; i < items.length; i += size) {
    chunks.push(items.slice(i, i + size));
  }
  return chunks;
}

export class AirtableClient extends ApiClient implements AirtableTableClient {
  readonly baseId: string;
  private readonly apiKey: string;
  private readonly enterpriseAccountId: string;

  constructor(options: AirtableClientOptions) {
    super("airtable", AIRTABLE_API_BASE, options.retry);
    this.apiKey = options.apiKey;
    this.baseId = options.baseId;
    this.enterpriseAccountId = options.enterpriseAccountId ?? "";
  }

  protected async getAuthHeaders(): Promise<Record<string, string>> {
    return { Authorization: bearer(this.apiKey) };
  }

  /**
   * Same credentials, another base
   */
  withBase(baseId: string): AirtableClient {
    return new AirtableClient({
      apiKey: this.apiKey,
      baseId,
      enterpriseAccountId: this.enterpriseAccountId,
      retry: { sleep: this.retry.sleep, maxRateLimitRetries: this.retry.maxRateLimitRetries },
    });
  }

  get scim(): AirtableScimClient {
    return new AirtableScimClient(this.apiKey, this.retry);
  }

  private tablePath(table: string, recordId?: string): string {
    const path = `${this.baseId}/${encodeURIComponent(table)}`;
    return recordId ? `${path}/${recordId}` : path;
  }

  /**
   * List every record of a table, following offset pagination.
   */
  async listRecords(table: string, options: ListRecordsOptions = {}): Promise<AirtableRecord[]> {
    const records: AirtableRecord[] = [];
    let offset: string | undefined;

    do {
      const page = await this.getJson(AirtableListResponseSchema, this.tablePath(table), {
        pageSize: PAGE_SIZE,
        view: options.view,
        "fields[]": options.fields,
        filterByFormula: options.filterByFormula,
        offset,
      });
      records.push(...page.records);
      offset = page.offset;
      this.logger.debug(`Fetched ${page.records.length} records from ${table}`, { offset });
    } while (offset);

    return records;
  }

  /**
   * Get one record; null when it does not exist.
   */
  async getRecord(table: string, recordId: string): Promise<AirtableRecord | null> {
    try {
      return await this.getJson(AirtableRecordSchema, this.tablePath(table, recordId));
    } catch (error) {
      if (isNotFound(error)) {
        return null;
      }
      throw error;
    }
  }

  async createRecords(table: string, records: AirtableFields[]): Promise<AirtableRecord[]> {
    const created: AirtableRecord[] = [];
    for (const batch of chunk(records, WRITE_BATCH_SIZE)) {
      const response = await this.requestJson(AirtableRecordsResponseSchema, "POST", this.tablePath(table), {
        json: { records: batch.map((fields) => ({ fields })), typecast: true },
      });
      created.push(...response.records);
    }
    return created;
  }

  async updateRecords(table: string, updates: RecordUpdate[]): Promise<AirtableRecord[]> {
    const updated: AirtableRecord[] = [];
    for (const batch of chunk(updates, WRITE_BATCH_SIZE)) {
      const response = await this.requestJson(AirtableRecordsResponseSchema, "PATCH", this.tablePath(table), {
        json: { records: batch, typecast: true },
      });
      updated.push(...response.records);
    }
    return updated;
  }

  async deleteRecords(table: string, recordIds: string[]): Promise<void> {
    for (const batch of chunk(recordIds, WRITE_BATCH_SIZE)) {
      await this.requestJson(AirtableDeleteResponseSchema, "DELETE", this.tablePath(table), {
        query: { "records[]": batch },
      });
    }
  }

  // ===========================================================================
  // Enterprise
  // ===========================================================================

  private requireEnterpriseAccount(): string {
    if (!this.enterpriseAccountId) {
      throw new Error("Airtable enterprise account id is not configured");
    }
    return this.enterpriseAccountId;
  }

  /**
   * Users of the enterprise account.
   */
  async listUsers(): Promise<EnterpriseUser[]> {
    const accountId = this.requireEnterpriseAccount();
    const account = await this.getJson(EnterpriseAccountSchema, `meta/enterpriseAccounts/${accountId}`);
    const users: EnterpriseUser[] = [];

    for (const ids of chunk(account.userIds, PAGE_SIZE)) {
      const response = await this.getJson(
        z.object({ users: z.array(EnterpriseUserSchema) }),
        `meta/enterpriseAccounts/${accountId}/users`,
        { "id[]": ids }
      );
      users.push(...response.users);
    }

    this.logger.debug(`Fetched ${users.length} enterprise users`);
    return users;
  }
}
