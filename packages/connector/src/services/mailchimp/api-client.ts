/**
 * MailChimp API Client
 *
 * Marketing API v3: list members.
 * OAuth2 authorization code flow; tokens do not expire. The account's
 * data center endpoint is discovered through the metadata endpoint.
 */

import { z } from "zod";
import { ApiClient, bearer, readJson, requestWithRetry, type RetryOptions } from "../../lib/http-client.js";
import { authorizationUrl, exchangeAuthorizationCode, type AccessTokenSource, type TokenSet } from "../../lib/oauth.js";

export const MAILCHIMP_AUTHORIZE_URL = "https://login.mailchimp.com/oauth2/authorize";
export const MAILCHIMP_TOKEN_URL = "https://login.mailchimp.com/oauth2/token";
export const MAILCHIMP_METADATA_URL = "https://login.mailchimp.com/oauth2/metadata";
const PAGE_COUNT = 1000;

export interface MailchimpOAuthConfig {
  clientId: string;
  clientSecret: string;
  redirectUri: string;
}

export function mailchimpConsentUrl(config: MailchimpOAuthConfig): string {
  return authorizationUrl(MAILCHIMP_AUTHORIZE_URL, {
    response_type: "code",
    client_id: config.clientId,
    redirect_uri: config.redirectUri,
  });
}

export async function mailchimpExchangeCode(config: MailchimpOAuthConfig, code: string): Promise<TokenSet> {
  return exchangeAuthorizationCode(MAILCHIMP_TOKEN_URL, { ...config, code }, { service: "mailchimp" });
}

export const MetadataSchema = z
  .object({
    dc: z.string(),
    api_endpoint: z.string(),
    accountname: z.string().optional(),
  })
  .passthrough();

export type Metadata = z.infer<typeof MetadataSchema>;

/**
 * Discover the data center endpoint for an access token.
 */
export async function mailchimpMetadata(
  accessToken: string,
  retry: Omit<RetryOptions, "service"> = {}
): Promise<Metadata> {
  const response = await requestWithRetry(
    "GET",
    MAILCHIMP_METADATA_URL,
    { headers: { Accept: "application/json", Authorization: `OAuth ${accessToken}` } },
    { ...retry, service: "mailchimp" }
  );
  return MetadataSchema.parse(await readJson(response));
}

const optionalText = z
  .string()
  .nullable()
  .optional()
  .transform((v) => v ?? "");

export const MemberAddressSchema = z
  .object({
    addr1: optionalText,
    addr2: optionalText,
    city: optionalText,
    state: optionalText,
    zip: optionalText,
    country: optionalText,
  })
  .passthrough();

export type MemberAddress = z.infer<typeof MemberAddressSchema>;

export const MergeFieldsSchema = z
  .object({
    FNAME: optionalText,
    LNAME: optionalText,
    NAME: optionalText,
    COMPANY: optionalText,
    CNAME: optionalText,
    CSIZE: optionalText,
    INTEREST: optionalText,
    NOTES: optionalText,
    PHONE: optionalText,
    // An empty address comes back as ""
    ADDRESS: z.union([MemberAddressSchema, z.string()]).optional(),
  })
  .passthrough();

export const MemberSchema = z
  .object({
    id: z.string(),
    email_address: z.string(),
    status: z.string().default(""),
    list_id: z.string().default(""),
    merge_fields: MergeFieldsSchema.default({}),
    interests: z.record(z.boolean()).default({}),
    timestamp_signup: optionalText,
    timestamp_opt: optionalText,
    last_changed: optionalText,
    ip_signup: optionalText,
    source: optionalText,
    tags: z.array(z.object({ id: z.number().optional(), name: z.string() })).default([]),
    last_note: z
      .object({ note: optionalText })
      .passthrough()
      .nullable()
      .optional(),
  })
  .passthrough();

export type Member = z.infer<typeof MemberSchema>;

const ListMembersResponseSchema = z.object({
  members: z.array(MemberSchema),
  list_id: z.string().optional(),
  total_items: z.number(),
});

export class MailchimpClient extends ApiClient {
  private readonly tokens: AccessTokenSource;

  constructor(tokens: AccessTokenSource, apiEndpoint: string, retry: Omit<RetryOptions, "service" | "logger"> = {}) {
    super("mailchimp", `${apiEndpoint.replace(/\/$/, "")}/3.0/`, retry);
    this.tokens = tokens;
  }

  /**
   * Create a client for the data center of the token's account.
   */
  static async connect(
    tokens: AccessTokenSource,
    retry: Omit<RetryOptions, "service" | "logger"> = {}
  ): Promise<MailchimpClient> {
    const metadata = await mailchimpMetadata(await tokens.accessToken(), retry);
    return new MailchimpClient(tokens, metadata.api_endpoint, retry);
  }

  protected async getAuthHeaders(): Promise<Record<string, string>> {
    return { Authorization: bearer(await this.tokens.accessToken()) };
  }

  /**
   * All members of a list, paging by offset until total_items is reached.
   */
  async getSubscribers(listId: string): Promise<Member[]> {
    const members: Member[] = [];
    let total = Infinity;

    while (members.length < total) {
      const page = await this.getJson(ListMembersResponseSchema, `lists/${listId}/members`, {
        count: PAGE_COUNT,
        offset: members.length,
      });
      members.push(...page.members);
      total = page.total_items;
      this.logger.debug(`Fetched ${members.length}/${total} members of list ${listId}`);
      if (page.members.length === 0) {
        break;
      }
    }

    return members;
  }
}
