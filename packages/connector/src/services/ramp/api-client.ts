/**
 * Ramp API Client
 *
 * Corporate card transactions, users and departments.
 * OAuth2 client credentials.
 */

import { randomUUID } from "node:crypto";
import { z } from "zod";
import { ApiClient, bearer, type Query, type RetryOptions } from "../../lib/http-client.js";
import { clientCredentialsGrant, type AccessTokenSource, type ClientCredentials, type TokenGrant } from "../../lib/oauth.js";

export const RAMP_API_BASE = "https://api.ramp.com/developer/v1/";
export const RAMP_TOKEN_URL = "https://api.ramp.com/developer/v1/token";
export const RAMP_DEFAULT_SCOPES = ["transactions:read", "users:read", "users:write", "departments:read"];

export function rampGrant(client: ClientCredentials, scopes: string[] = RAMP_DEFAULT_SCOPES): TokenGrant {
  return clientCredentialsGrant(
    RAMP_TOKEN_URL,
    { ...client, scope: scopes.join(" ") },
    { service: "ramp", clientAuth: "basic" }
  );
}

const text = z
  .string()
  .nullable()
  .optional()
  .transform((v) => v ?? "");

export const TransactionSchema = z
  .object({
    id: z.string(),
    amount: z.number(),
    card_id: text,
    merchant_id: text,
    merchant_name: text,
    memo: text,
    receipts: z.array(z.string()).default([]),
    sk_category_id: z.number().nullable().optional(),
    sk_category_name: text,
    state: text,
    user_transaction_time: z.coerce.date().nullable().optional(),
    card_holder: z
      .object({
        user_id: text,
        first_name: text,
        last_name: text,
        department_id: text,
        department_name: text,
        location_id: text,
        location_name: text,
      })
      .passthrough(),
  })
  .passthrough();

export type Transaction = z.infer<typeof TransactionSchema>;

export const UserRoleSchema = z.enum(["BUSINESS_ADMIN", "BUSINESS_OWNER", "BUSINESS_USER", "BUSINESS_BOOKKEEPER"]);

/** Roles an API client may assign */
export type WriteableRole = Exclude<z.infer<typeof UserRoleSchema>, "BUSINESS_OWNER">;

export const RampUserSchema = z
  .object({
    id: z.string(),
    business_id: text,
    department_id: text,
    location_id: text,
    manager_id: z.string().nullable().optional(),
    email: z.string(),
    first_name: text,
    last_name: text,
    phone: z.string().nullable().optional(),
    status: text,
    role: z.string(),
    is_manager: z.boolean().default(false),
  })
  .passthrough();

export type RampUser = z.infer<typeof RampUserSchema>;

export const DepartmentSchema = z.object({ id: z.string(), name: z.string() });

export type Department = z.infer<typeof DepartmentSchema>;

function pageOf<T extends z.ZodTypeAny>(item: T) {
  return z.object({
    data: z.array(item),
    page: z.object({ next: z.string().nullable().optional() }).default({}),
  });
}

export interface ListTransactionsQuery {
  fromDate?: Date;
  toDate?: Date;
  departmentId?: string;
  state?: string;
  pageSize?: number;
}

export interface InviteUser {
  email: string;
  firstName: string;
  lastName: string;
  phone?: string;
  role: WriteableRole;
  departmentId?: string;
  locationId?: string;
  directManagerId?: string;
}

export class RampClient extends ApiClient {
  private readonly tokens: AccessTokenSource;

  constructor(tokens: AccessTokenSource, retry: Omit<RetryOptions, "service" | "logger"> = {}) {
    super("ramp", RAMP_API_BASE, retry);
    this.tokens = tokens;
  }

  protected async getAuthHeaders(): Promise<Record<string, string>> {
    return { Authorization: bearer(await this.tokens.accessToken()) };
  }

  /**
   * Follow `page.next` (an absolute URL) until it is empty or repeats.
   */
  private async listAll<T extends z.ZodTypeAny>(item: T, path: string, query?: Query): Promise<z.output<T>[]> {
    const schema = pageOf(item);
    const results: z.output<T>[] = [];
    const seen = new Set<string>();

    let response = await this.getJson(schema, path, query);
    while (true) {
      results.push(...response.data);
      const next = response.page.next;
      if (!next || seen.has(next)) {
        return results;
      }
      seen.add(next);
      response = await this.getJson(schema, next);
    }
  }

  async listTransactions(query: ListTransactionsQuery = {}): Promise<Transaction[]> {
    return this.listAll(TransactionSchema, "transactions", {
      from_date: query.fromDate?.toISOString(),
      to_date: query.toDate?.toISOString(),
      department_id: query.departmentId,
      state: query.state,
      page_size: query.pageSize,
    });
  }

  async getTransaction(id: string): Promise<Transaction> {
    return this.getJson(TransactionSchema, `transactions/${id}`);
  }

  async listUsers(): Promise<RampUser[]> {
    return this.listAll(RampUserSchema, "users");
  }

  async getUser(id: string): Promise<RampUser> {
    return this.getJson(RampUserSchema, `users/${id}`);
  }

  async listDepartments(): Promise<Department[]> {
    return this.listAll(DepartmentSchema, "departments");
  }

  /**
   * Invite a user. Ramp creates the user asynchronously and returns a task id.
   */
  async inviteUser(user: InviteUser): Promise<string> {
    const response = await this.requestJson(z.object({ id: z.string() }), "POST", "users/deferred", {
      json: {
        idempotency_key: randomUUID(),
        email: user.email,
        first_name: user.firstName,
        last_name: user.lastName,
        phone: user.phone ?? "",
        role: user.role,
        department_id: user.departmentId,
        location_id: user.locationId,
        direct_manager_id: user.directManagerId,
      },
    });
    return response.id;
  }

  async updateUser(
    id: string,
    update: { departmentId?: string; locationId?: string; directManagerId?: string; role?: WriteableRole }
  ): Promise<void> {
    await this.send("PATCH", `users/${id}`, {
      json: {
        department_id: update.departmentId,
        location_id: update.locationId,
        direct_manager_id: update.directManagerId,
        role: update.role,
      },
    });
  }
}
