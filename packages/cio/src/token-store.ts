/**
 * OAuth tokens persisted as APIToken rows of a company
 */

import { RecordStore, type Queryable, type TokenSet, type TokenStore } from "@cio/connector";
import { ApiTokens, expand, type ApiToken, type NewApiToken } from "./records/api-tokens.js";
import type { Company } from "./records/companies.js";

/** Product-specific values kept beside the token */
export interface TokenDetails {
  /** Provider-side account: QuickBooks realm, Gusto company, ... */
  company_id?: string;
  item_id?: string;
  user_email?: string;
  endpoint?: string;
}

export function tokenSetFrom(token: ApiToken): TokenSet {
  return {
    accessToken: token.access_token,
    refreshToken: token.refresh_token,
    expiresAt: token.expires_date,
    expiresIn: token.expires_in,
    refreshTokenExpiresIn: token.refresh_token_expires_in,
    tokenType: token.token_type || undefined,
  };
}

export class ApiTokenStore implements TokenStore {
  private readonly store: RecordStore<NewApiToken>;
  private readonly company: Company;
  private readonly now: () => Date;

  constructor(db: Queryable, company: Company, now: () => Date = () => new Date()) {
    this.store = new RecordStore(ApiTokens, db);
    this.company = company;
    this.now = now;
  }

  async get(product: string): Promise<ApiToken | null> {
    const [token] = await this.store.select({ auth_company_id: this.company.id, product }, { limit: 1 });
    return token ?? null;
  }

  async load(product: string): Promise<TokenSet | null> {
    const token = await this.get(product);
    if (token === null || token.access_token === "") {
      return null;
    }
    return tokenSetFrom(token);
  }

  async save(product: string, tokens: TokenSet): Promise<void> {
    await this.saveWithDetails(product, tokens);
  }

  /**
   * Upsert the token, keeping details already stored when none are given.
   */
  async saveWithDetails(product: string, tokens: TokenSet, details: TokenDetails = {}): Promise<ApiToken> {
    const existing = await this.get(product);
    const record = expand({
      product,
      company_id: details.company_id ?? existing?.company_id ?? "",
      item_id: details.item_id ?? existing?.item_id ?? "",
      user_email: details.user_email ?? existing?.user_email ?? "",
      token_type: tokens.tokenType ?? existing?.token_type ?? "",
      access_token: tokens.accessToken,
      expires_in: tokens.expiresIn,
      refresh_token: tokens.refreshToken || (existing?.refresh_token ?? ""),
      refresh_token_expires_in: tokens.refreshTokenExpiresIn,
      expires_date: tokens.expiresAt,
      refresh_token_expires_date: existing?.refresh_token_expires_date ?? null,
      endpoint: details.endpoint ?? existing?.endpoint ?? "",
      last_updated_at: this.now(),
      company: existing?.company ?? [],
      auth_company_id: this.company.id,
      cio_company_id: this.company.id,
    });
    return this.store.upsert(record);
  }
}
