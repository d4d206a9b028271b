/**
 * QuickBooks Online API Client
 *
 * Accounting query API: bill payments, purchases, items, attachments.
 * OAuth2 authorization code flow; the token endpoint takes HTTP Basic
 * client auth.
 */

import { z } from "zod";
import { ApiClient, bearer, type RetryOptions } from "../../lib/http-client.js";
import {
  authorizationUrl,
  exchangeAuthorizationCode,
  refreshTokenGrant,
  type AccessTokenSource,
  type TokenGrant,
  type TokenSet,
} from "../../lib/oauth.js";

export const QUICKBOOKS_API_BASE = "https://quickbooks.api.intuit.com/v3/";
export const QUICKBOOKS_TOKEN_URL = "https://oauth.platform.intuit.com/oauth2/v1/tokens/bearer";
export const QUICKBOOKS_CONSENT_URL = "https://appcenter.intuit.com/connect/oauth2";
export const QUICKBOOKS_SCOPE = "com.intuit.quickbooks.accounting";
const MAX_RESULTS = 1000;

export interface QuickBooksOAuthConfig {
  clientId: string;
  clientSecret: string;
  redirectUri: string;
}

export function quickbooksConsentUrl(config: QuickBooksOAuthConfig, state = "cio"): string {
  return authorizationUrl(QUICKBOOKS_CONSENT_URL, {
    client_id: config.clientId,
    response_type: "code",
    scope: QUICKBOOKS_SCOPE,
    redirect_uri: config.redirectUri,
    state,
  });
}

export async function quickbooksExchangeCode(config: QuickBooksOAuthConfig, code: string): Promise<TokenSet> {
  return exchangeAuthorizationCode(QUICKBOOKS_TOKEN_URL, { ...config, code }, { service: "quickbooks", clientAuth: "basic" });
}

export function quickbooksRefreshGrant(config: QuickBooksOAuthConfig): TokenGrant {
  return refreshTokenGrant(QUICKBOOKS_TOKEN_URL, config, { service: "quickbooks", clientAuth: "basic" });
}

const RefSchema = z.object({ value: z.string(), name: z.string().default("") }).passthrough();

export type Ref = z.infer<typeof RefSchema>;

const MetaDataSchema = z
  .object({
    CreateTime: z.coerce.date().optional(),
    LastUpdatedTime: z.coerce.date().optional(),
  })
  .passthrough();

export const BillPaymentSchema = z
  .object({
    Id: z.string(),
    DocNumber: z.string().default(""),
    TxnDate: z.string(),
    TotalAmt: z.number(),
    PayType: z.string().default(""),
    PrivateNote: z.string().default(""),
    VendorRef: RefSchema.optional(),
    CheckPayment: z.object({ BankAccountRef: RefSchema.optional(), PrintStatus: z.string().optional() }).passthrough().optional(),
    CreditCardPayment: z.object({ CCAccountRef: RefSchema.optional() }).passthrough().optional(),
    Line: z
      .array(
        z
          .object({
            Amount: z.number(),
            LinkedTxn: z.array(z.object({ TxnId: z.string(), TxnType: z.string() })).default([]),
          })
          .passthrough()
      )
      .default([]),
    MetaData: MetaDataSchema.optional(),
  })
  .passthrough();

export type BillPayment = z.infer<typeof BillPaymentSchema>;

export const PurchaseSchema = z
  .object({
    Id: z.string(),
    DocNumber: z.string().default(""),
    TxnDate: z.string(),
    TotalAmt: z.number(),
    PaymentType: z.string().default(""),
    PrivateNote: z.string().default(""),
    AccountRef: RefSchema.optional(),
    EntityRef: RefSchema.optional(),
    Line: z
      .array(z.object({ Amount: z.number().default(0), Description: z.string().default("") }).passthrough())
      .default([]),
    MetaData: MetaDataSchema.optional(),
  })
  .passthrough();

export type Purchase = z.infer<typeof PurchaseSchema>;

export const ItemSchema = z
  .object({
    Id: z.string(),
    Name: z.string(),
    Type: z.string().default(""),
    Active: z.boolean().default(true),
    Description: z.string().default(""),
    UnitPrice: z.number().default(0),
  })
  .passthrough();

export type Item = z.infer<typeof ItemSchema>;

export const AttachableSchema = z
  .object({
    Id: z.string(),
    FileName: z.string().default(""),
    ContentType: z.string().default(""),
    Size: z.number().default(0),
    TempDownloadUri: z.string().default(""),
    Note: z.string().default(""),
  })
  .passthrough();

export type Attachable = z.infer<typeof AttachableSchema>;

const QueryResponseSchema = z.object({
  QueryResponse: z.record(z.unknown()).default({}),
});

/** Quote a value for a QuickBooks query literal */
export function queryLiteral(value: string): string {
  return `'${value.replace(/\\/g, "\\\\").replace(/'/g, "\\'")}'`;
}

export class QuickBooksClient extends ApiClient {
  private readonly tokens: AccessTokenSource;
  readonly realmId: string;

  constructor(tokens: AccessTokenSource, realmId: string, retry: Omit<RetryOptions, "service" | "logger"> = {}) {
    super("quickbooks", QUICKBOOKS_API_BASE, retry);
    this.tokens = tokens;
    this.realmId = realmId;
  }

  protected async getAuthHeaders(): Promise<Record<string, string>> {
    return { Authorization: bearer(await this.tokens.accessToken()) };
  }

  /**
   * Run `SELECT * FROM <entity> [WHERE ...]`, paging with STARTPOSITION and
   * MAXRESULTS until a short page.
   */
  async query<T extends z.ZodTypeAny>(entity: string, item: T, where?: string): Promise<z.output<T>[]> {
    const rows = z.array(item).default([]);
    const results: z.output<T>[] = [];
    let start = 1;

    while (true) {
      const statement = [
        `SELECT * FROM ${entity}`,
        where ? `WHERE ${where}` : "",
        `STARTPOSITION ${start} MAXRESULTS ${MAX_RESULTS}`,
      ]
        .filter(Boolean)
        .join(" ");

      const response = await this.getJson(QueryResponseSchema, `company/${this.realmId}/query`, { query: statement });
      const page = rows.parse(response.QueryResponse[entity]);
      results.push(...page);

      if (page.length < MAX_RESULTS) {
        return results;
      }
      start += MAX_RESULTS;
    }
  }

  async listBillPayments(): Promise<BillPayment[]> {
    return this.query("BillPayment", BillPaymentSchema);
  }

  async listPurchases(): Promise<Purchase[]> {
    return this.query("Purchase", PurchaseSchema);
  }

  async listItems(): Promise<Item[]> {
    return this.query("Item", ItemSchema);
  }

  /**
   * Attachments linked to a transaction, e.g. ("Bill", "146").
   */
  async getAttachmentsForEntity(entityType: string, entityId: string): Promise<Attachable[]> {
    return this.query(
      "Attachable",
      AttachableSchema,
      `AttachableRef.EntityRef.Type = ${queryLiteral(entityType)} AND AttachableRef.EntityRef.value = ${queryLiteral(entityId)}`
    );
  }
}
