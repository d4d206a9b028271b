/**
 * OAuth2 token helpers
 *
 * Token endpoint grants (authorization code, refresh token, client
 * credentials), consent URLs, and a session that keeps a token fresh and
 * persists it through a TokenStore.
 */

import { z } from "zod";
import { basicAuth, readJson, requestWithRetry, type RetryOptions } from "./http-client.js";
import { ApiError } from "./errors.js";
import { setupLogger } from "./logger.js";

const logger = setupLogger("oauth");

/** Refresh when the access token expires within this many minutes */
export const DEFAULT_REFRESH_THRESHOLD_MINUTES = 5;

export interface TokenSet {
  accessToken: string;
  refreshToken: string;
  /** null when the provider did not say */
  expiresAt: Date | null;
  expiresIn: number;
  refreshTokenExpiresIn: number;
  scope?: string;
  tokenType?: string;
}

export interface ClientCredentials {
  clientId: string;
  clientSecret: string;
}

export interface TokenRequestOptions {
  /** "basic": client id/secret in an Authorization header; "body": in the form body */
  clientAuth?: "basic" | "body";
  service?: string;
  now?: () => Date;
  retry?: Omit<RetryOptions, "service">;
}

const TokenResponseSchema = z
  .object({
    access_token: z.string().optional(),
    refresh_token: z.string().optional(),
    expires_in: z.coerce.number().optional(),
    refresh_token_expires_in: z.coerce.number().optional(),
    // QuickBooks
    x_refresh_token_expires_in: z.coerce.number().optional(),
    scope: z.union([z.string(), z.array(z.string())]).optional(),
    token_type: z.string().optional(),
    error: z.string().optional(),
    error_description: z.string().optional(),
  })
  .passthrough();

export function expiresAtFrom(expiresIn: number | undefined, now: Date = new Date()): Date | null {
  if (expiresIn === undefined || expiresIn <= 0) {
    return null;
  }
  return new Date(now.getTime() + expiresIn * 1000);
}

/**
 * A missing expiry counts as expiring.
 */
export function isExpiring(
  expiresAt: Date | null,
  thresholdMinutes: number = DEFAULT_REFRESH_THRESHOLD_MINUTES,
  now: Date = new Date()
): boolean {
  if (expiresAt === null) {
    return true;
  }
  return expiresAt.getTime() - now.getTime() <= thresholdMinutes * 60 * 1000;
}

export function authorizationUrl(base: string, params: Record<string, string | undefined>): string {
  const search = new URLSearchParams();
  for (const [key, value] of Object.entries(params)) {
    if (value !== undefined) {
      search.append(key, value);
    }
  }
  return `${base}?${search.toString()}`;
}

/**
 * POST a grant to a token endpoint and normalize the response.
 *
 * `previousRefreshToken` is kept when the provider does not rotate it.
 */
export async function requestToken(
  tokenUrl: string,
  grant: Record<string, string>,
  client: ClientCredentials,
  options: TokenRequestOptions = {},
  previousRefreshToken = ""
): Promise<TokenSet> {
  const service = options.service ?? "oauth";
  const form = new URLSearchParams(grant);
  const headers: Record<string, string> = {
    Accept: "application/json",
    "Content-Type": "application/x-www-form-urlencoded",
  };

  if ((options.clientAuth ?? "body") === "basic") {
    headers.Authorization = basicAuth(client.clientId, client.clientSecret);
  } else {
    form.set("client_id", client.clientId);
    form.set("client_secret", client.clientSecret);
  }

  logger.debug(`POST ${tokenUrl}`, { grant_type: grant.grant_type });
  const response = await requestWithRetry(
    "POST",
    tokenUrl,
    { headers, body: form.toString() },
    { ...options.retry, service }
  );

  const parsed = TokenResponseSchema.safeParse(await readJson(response));
  if (!parsed.success) {
    throw new Error(`${service} token response was not understood: ${parsed.error.message}`);
  }
  const data = parsed.data;

  // Some providers answer 200 with an error payload
  if (data.access_token === undefined) {
    const detail = data.error_description ?? data.error ?? "no access_token";
    throw new ApiError(service, response.status, detail, tokenUrl);
  }

  const now = options.now?.() ?? new Date();
  const expiresIn = data.expires_in ?? 0;
  return {
    accessToken: data.access_token,
    refreshToken: data.refresh_token ?? previousRefreshToken,
    expiresAt: expiresAtFrom(expiresIn, now),
    expiresIn,
    refreshTokenExpiresIn: data.refresh_token_expires_in ?? data.x_refresh_token_expires_in ?? 0,
    scope: Array.isArray(data.scope) ? data.scope.join(" ") : data.scope,
    tokenType: data.token_type,
  };
}

export async function exchangeAuthorizationCode(
  tokenUrl: string,
  params: ClientCredentials & { code: string; redirectUri: string },
  options: TokenRequestOptions = {}
): Promise<TokenSet> {
  return requestToken(
    tokenUrl,
    { grant_type: "authorization_code", code: params.code, redirect_uri: params.redirectUri },
    params,
    options
  );
}

export async function refreshAccessToken(
  tokenUrl: string,
  params: ClientCredentials & { refreshToken: string },
  options: TokenRequestOptions = {}
): Promise<TokenSet> {
  return requestToken(
    tokenUrl,
    { grant_type: "refresh_token", refresh_token: params.refreshToken },
    params,
    options,
    params.refreshToken
  );
}

export async function clientCredentialsToken(
  tokenUrl: string,
  params: ClientCredentials & { scope?: string },
  options: TokenRequestOptions = {}
): Promise<TokenSet> {
  const grant: Record<string, string> = { grant_type: "client_credentials" };
  if (params.scope) {
    grant.scope = params.scope;
  }
  return requestToken(tokenUrl, grant, params, options);
}

// =============================================================================
// Sessions
// =============================================================================

/**
 * Persistence for tokens, keyed by product name ("gusto", "quickbooks", ...).
 */
export interface TokenStore {
  load(product: string): Promise<TokenSet | null>;
  save(product: string, tokens: TokenSet): Promise<void>;
}

/**
 * What API clients need from a session
 */
export interface AccessTokenSource {
  accessToken(): Promise<string>;
}

/** Obtain a new token set, given the current one (if any). */
export type TokenGrant = (current: TokenSet | null) => Promise<TokenSet>;

export interface OAuthSessionOptions {
  product: string;
  grant: TokenGrant;
  store?: TokenStore;
  initial?: TokenSet;
  thresholdMinutes?: number;
  now?: () => Date;
}

/**
 * Grant that refreshes the current token set with its refresh token.
 */
export function refreshTokenGrant(
  tokenUrl: string,
  client: ClientCredentials,
  options: TokenRequestOptions = {}
): TokenGrant {
  return async (current) => {
    if (current === null || current.refreshToken === "") {
      throw new Error(`${options.service ?? "oauth"}: no refresh token available, complete the consent flow first`);
    }
    return refreshAccessToken(tokenUrl, { ...client, refreshToken: current.refreshToken }, options);
  };
}

export function clientCredentialsGrant(
  tokenUrl: string,
  params: ClientCredentials & { scope?: string },
  options: TokenRequestOptions = {}
): TokenGrant {
  return async () => clientCredentialsToken(tokenUrl, params, options);
}

/**
 * Holds a token set for one product and refreshes it when it is expiring.
 */
export class OAuthSession implements AccessTokenSource {
  readonly product: string;
  private readonly grant: TokenGrant;
  private readonly store: TokenStore | undefined;
  private readonly thresholdMinutes: number;
  private readonly now: () => Date;
  private current: TokenSet | null;
  private loaded: boolean;

  constructor(options: OAuthSessionOptions) {
    this.product = options.product;
    this.grant = options.grant;
    this.store = options.store;
    this.thresholdMinutes = options.thresholdMinutes ?? DEFAULT_REFRESH_THRESHOLD_MINUTES;
    this.now = options.now ?? (() => new Date());
    this.current = options.initial ?? null;
    this.loaded = options.initial !== undefined;
  }

  async getTokens(): Promise<TokenSet> {
    if (!this.loaded && this.store) {
      this.current = await this.store.load(this.product);
      this.loaded = true;
    }

    if (this.current !== null && !isExpiring(this.current.expiresAt, this.thresholdMinutes, this.now())) {
      return this.current;
    }

    logger.info(`Refreshing ${this.product} access token`);
    const tokens = await this.grant(this.current);
    this.current = tokens;
    if (this.store) {
      await this.store.save(this.product, tokens);
    }
    return tokens;
  }

  async accessToken(): Promise<string> {
    return (await this.getTokens()).accessToken;
  }

  /**
   * Drop the cached token set (for testing, or after a 401)
   */
  reset(): void {
    this.current = null;
    this.loaded = false;
  }
}
