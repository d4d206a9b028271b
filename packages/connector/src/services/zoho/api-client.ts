/**
 * Zoho CRM API Client
 *
 * CRM v2 module records (Leads, Notes, ...).
 * OAuth2 authorization code flow with offline refresh tokens. Requests
 * authenticate with a `Zoho-oauthtoken` header.
 */

import { z } from "zod";
import { ApiClient, type Query, type RetryOptions } from "../../lib/http-client.js";
import {
  authorizationUrl,
  exchangeAuthorizationCode,
  refreshTokenGrant,
  type AccessTokenSource,
  type TokenGrant,
  type TokenSet,
} from "../../lib/oauth.js";

export const ZOHO_CRM_BASE = "https://www.zohoapis.com/crm/v2/";
export const ZOHO_ACCOUNTS_BASE = "https://accounts.zoho.com/oauth/v2/";
export const ZOHO_TOKEN_URL = `${ZOHO_ACCOUNTS_BASE}token`;
export const ZOHO_DEFAULT_SCOPE = "ZohoCRM.modules.ALL";
const DEFAULT_PER_PAGE = 200;

export interface ZohoOAuthConfig {
  clientId: string;
  clientSecret: string;
  redirectUri: string;
  scope?: string;
}

export function zohoConsentUrl(config: ZohoOAuthConfig): string {
  return authorizationUrl(`${ZOHO_ACCOUNTS_BASE}auth`, {
    scope: config.scope ?? ZOHO_DEFAULT_SCOPE,
    client_id: config.clientId,
    response_type: "code",
    access_type: "offline",
    redirect_uri: config.redirectUri,
  });
}

export async function zohoExchangeCode(config: ZohoOAuthConfig, code: string): Promise<TokenSet> {
  return exchangeAuthorizationCode(ZOHO_TOKEN_URL, { ...config, code }, { service: "zoho" });
}

export function zohoRefreshGrant(config: ZohoOAuthConfig): TokenGrant {
  return refreshTokenGrant(ZOHO_TOKEN_URL, config, { service: "zoho" });
}

export const ZohoRecordSchema = z.object({ id: z.string() }).passthrough();

export type ZohoRecord = z.infer<typeof ZohoRecordSchema>;

/** Fields of a record to insert or update */
export type ZohoInput = Record<string, unknown>;

const PaginationSchema = z
  .object({
    per_page: z.number(),
    count: z.number(),
    page: z.number(),
    more_records: z.boolean(),
  })
  .passthrough();

// 204 No Content when a module has no records
const ListResponseSchema = z.union([
  z.object({ data: z.array(ZohoRecordSchema), info: PaginationSchema }),
  z.undefined(),
]);

export const EntryResultSchema = z
  .object({
    code: z.string(),
    status: z.string(),
    message: z.string().default(""),
    details: z.record(z.unknown()).default({}),
  })
  .passthrough();

export type EntryResult = z.infer<typeof EntryResultSchema>;

const EntryResultsSchema = z.object({ data: z.array(EntryResultSchema) });

/**
 * The record id of a result entry, on success or for a duplicate.
 */
export function resultId(entry: EntryResult): string | null {
  const id = entry.details.id;
  return typeof id === "string" && id !== "" ? id : null;
}

export interface ListRecordsParams {
  fields?: string[];
  sortBy?: string;
  sortOrder?: "asc" | "desc";
  converted?: "true" | "false" | "both";
  cvid?: string;
  page?: number;
  perPage?: number;
}

export interface ListRecordsPage {
  data: ZohoRecord[];
  moreRecords: boolean;
  page: number;
}

function listQuery(params: ListRecordsParams): Query {
  return {
    fields: params.fields?.join(","),
    sort_by: params.sortBy,
    sort_order: params.sortOrder,
    converted: params.converted,
    cvid: params.cvid,
    page: params.page,
    per_page: params.perPage,
  };
}

/**
 * Records of one CRM module
 */
export class ZohoModule {
  constructor(
    private readonly client: ZohoClient,
    readonly module: string
  ) {}

  async list(params: ListRecordsParams = {}): Promise<ListRecordsPage> {
    const response = await this.client.fetch(ListResponseSchema, "GET", this.module, { query: listQuery(params) });
    if (response === undefined) {
      return { data: [], moreRecords: false, page: params.page ?? 1 };
    }
    return { data: response.data, moreRecords: response.info.more_records, page: response.info.page };
  }

  /**
   * Every record, following `info.more_records`.
   */
  async all(params: Omit<ListRecordsParams, "page"> = {}): Promise<ZohoRecord[]> {
    const records: ZohoRecord[] = [];
    let page = 1;
    while (true) {
      const result = await this.list({ ...params, page, perPage: params.perPage ?? DEFAULT_PER_PAGE });
      records.push(...result.data);
      if (!result.moreRecords) {
        return records;
      }
      page++;
    }
  }

  async get(id: string): Promise<ZohoRecord | null> {
    const response = await this.client.fetch(ListResponseSchema, "GET", `${this.module}/${id}`);
    return response?.data[0] ?? null;
  }

  async insert(records: ZohoInput[], trigger?: string[]): Promise<EntryResult[]> {
    return this.write("POST", this.module, { data: records, trigger });
  }

  async update(records: ZohoInput[], trigger?: string[]): Promise<EntryResult[]> {
    return this.write("PUT", this.module, { data: records, trigger });
  }

  async upsert(records: ZohoInput[], duplicateCheckFields?: string[], trigger?: string[]): Promise<EntryResult[]> {
    return this.write("POST", `${this.module}/upsert`, {
      data: records,
      duplicate_check_fields: duplicateCheckFields,
      trigger,
    });
  }

  async delete(ids: string[], wfTrigger = false): Promise<EntryResult[]> {
    const response = await this.client.fetch(EntryResultsSchema, "DELETE", this.module, {
      query: { ids: ids.join(","), wf_trigger: String(wfTrigger) },
    });
    return response.data;
  }

  private async write(method: string, path: string, json: Record<string, unknown>): Promise<EntryResult[]> {
    const response = await this.client.fetch(EntryResultsSchema, method, path, { json });
    return response.data;
  }
}

export class ZohoClient extends ApiClient {
  private readonly tokens: AccessTokenSource;

  constructor(tokens: AccessTokenSource, retry: Omit<RetryOptions, "service" | "logger"> = {}) {
    super("zoho", ZOHO_CRM_BASE, retry);
    this.tokens = tokens;
  }

  protected async getAuthHeaders(): Promise<Record<string, string>> {
    return { Authorization: `Zoho-oauthtoken ${await this.tokens.accessToken()}` };
  }

  records(module: string): ZohoModule {
    return new ZohoModule(this, module);
  }

  /** @internal used by ZohoModule */
  async fetch<S extends z.ZodTypeAny>(
    schema: S,
    method: string,
    path: string,
    options: { query?: Query; json?: unknown } = {}
  ): Promise<z.output<S>> {
    return this.requestJson(schema, method, path, options);
  }
}
