/**
 * Gusto API Client
 *
 * Payroll: current user, company employees.
 * OAuth2 authorization code flow with refresh tokens.
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

export const GUSTO_API_BASE = "https://api.gusto.com/";
export const GUSTO_TOKEN_URL = "https://api.gusto.com/oauth/token";
const PER_PAGE = 100;

export interface GustoOAuthConfig {
  clientId: string;
  clientSecret: string;
  redirectUri: string;
}

export function gustoConsentUrl(config: GustoOAuthConfig): string {
  return authorizationUrl(`${GUSTO_API_BASE}oauth/authorize`, {
    client_id: config.clientId,
    response_type: "code",
    redirect_uri: config.redirectUri,
  });
}

export async function gustoExchangeCode(config: GustoOAuthConfig, code: string): Promise<TokenSet> {
  return exchangeAuthorizationCode(GUSTO_TOKEN_URL, { ...config, code }, { service: "gusto" });
}

export function gustoRefreshGrant(config: GustoOAuthConfig): TokenGrant {
  return refreshTokenGrant(GUSTO_TOKEN_URL, config, { service: "gusto" });
}

const AddressSchema = z
  .object({
    street_1: z.string().nullable().default(""),
    street_2: z.string().nullable().default(""),
    city: z.string().nullable().default(""),
    state: z.string().nullable().default(""),
    zip: z.string().nullable().default(""),
    country: z.string().nullable().default(""),
  })
  .passthrough();

const JobSchema = z
  .object({
    id: z.union([z.number(), z.string()]),
    title: z.string().nullable().default(""),
    hire_date: z.string().nullable().default(""),
    primary: z.boolean().default(false),
    rate: z.string().nullable().optional(),
    payment_unit: z.string().nullable().optional(),
  })
  .passthrough();

export const GustoEmployeeSchema = z
  .object({
    id: z.union([z.number(), z.string()]).transform(String),
    uuid: z.string().optional(),
    first_name: z.string(),
    middle_initial: z.string().nullable().default(""),
    last_name: z.string(),
    preferred_first_name: z.string().nullable().optional(),
    email: z.string().nullable().default(""),
    phone: z.string().nullable().optional(),
    department: z.string().nullable().default(""),
    manager_id: z.union([z.number(), z.string()]).nullable().optional(),
    date_of_birth: z.string().nullable().optional(),
    jobs: z.array(JobSchema).default([]),
    home_address: AddressSchema.nullable().optional(),
    onboarded: z.boolean().default(false),
    terminated: z.boolean().default(false),
  })
  .passthrough();

export type GustoEmployee = z.infer<typeof GustoEmployeeSchema>;

export const CurrentUserSchema = z
  .object({
    email: z.string(),
    roles: z
      .object({
        payroll_admin: z
          .object({
            companies: z.array(z.object({ id: z.union([z.number(), z.string()]).transform(String), name: z.string() }).passthrough()),
          })
          .optional(),
      })
      .passthrough()
      .default({}),
  })
  .passthrough();

export type CurrentUser = z.infer<typeof CurrentUserSchema>;

export class GustoClient extends ApiClient {
  private readonly tokens: AccessTokenSource;

  constructor(tokens: AccessTokenSource, retry: Omit<RetryOptions, "service" | "logger"> = {}) {
    super("gusto", GUSTO_API_BASE, retry);
    this.tokens = tokens;
  }

  protected async getAuthHeaders(): Promise<Record<string, string>> {
    return { Authorization: bearer(await this.tokens.accessToken()) };
  }

  async currentUser(): Promise<CurrentUser> {
    return this.getJson(CurrentUserSchema, "v1/me");
  }

  /**
   * Company id of the first payroll-admin company of the token's user
   */
  async companyId(): Promise<string> {
    const user = await this.currentUser();
    const company = user.roles.payroll_admin?.companies[0];
    if (!company) {
      throw new Error(`Gusto user ${user.email} is not a payroll admin of any company`);
    }
    return company.id;
  }

  /**
   * List all employees, requesting pages until a short page.
   */
  async listEmployees(companyId: string): Promise<GustoEmployee[]> {
    const employees: GustoEmployee[] = [];
    let page = 1;

    while (true) {
      const batch = await this.getJson(z.array(GustoEmployeeSchema), `v1/companies/${companyId}/employees`, {
        page,
        per: PER_PAGE,
      });
      employees.push(...batch);
      this.logger.debug(`Fetched employees page ${page}`, { count: batch.length });
      if (batch.length < PER_PAGE) {
        break;
      }
      page++;
    }

    return employees;
  }
}
