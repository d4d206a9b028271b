/**
 * Airtable SCIM API Client
 *
 * User and group provisioning for the enterprise account.
 */

import { z } from "zod";
import { ApiClient, bearer, type RetryOptions } from "../../lib/http-client.js";
import { ApiError } from "../../lib/errors.js";

export const AIRTABLE_SCIM_BASE = "https://airtable.com/scim/v2/";

export const SCIM_USER_SCHEMA = "urn:ietf:params:scim:schemas:core:2.0:User";
export const SCIM_GROUP_SCHEMA = "urn:ietf:params:scim:schemas:core:2.0:Group";

export class ScimError extends Error {
  readonly status: number;
  readonly detail: string;

  constructor(status: number, detail: string) {
    super(`Airtable SCIM error (${status}): ${detail}`);
    this.name = "ScimError";
    this.status = status;
    this.detail = detail;
  }
}

const ScimErrorBodySchema = z.object({ detail: z.string() });
const EnterpriseErrorBodySchema = z.object({ error: z.object({ message: z.string() }) });

/**
 * 401s carry the enterprise API error shape, everything else the SCIM one.
 */
export function toScimError(error: ApiError): ScimError {
  let body: unknown;
  try {
    body = JSON.parse(error.body);
  } catch {
    return new ScimError(error.status, error.body);
  }

  if (error.status === 401) {
    const parsed = EnterpriseErrorBodySchema.safeParse(body);
    return new ScimError(error.status, parsed.success ? parsed.data.error.message : error.body);
  }
  const parsed = ScimErrorBodySchema.safeParse(body);
  return new ScimError(error.status, parsed.success ? parsed.data.detail : error.body);
}

export const ScimNameSchema = z.object({
  familyName: z.string(),
  givenName: z.string(),
});

export const ScimUserSchema = z
  .object({
    schemas: z.array(z.string()),
    id: z.string(),
    userName: z.string(),
    name: ScimNameSchema,
    active: z.boolean(),
    emails: z.array(z.object({ value: z.string() })).default([]),
    meta: z
      .object({
        created: z.string().optional(),
        resourceType: z.string().optional(),
        location: z.string().optional(),
      })
      .optional(),
  })
  .passthrough();

export type ScimUser = z.infer<typeof ScimUserSchema>;

export interface ScimCreateUser {
  userName: string;
  name: z.infer<typeof ScimNameSchema>;
  title?: string;
}

export interface ScimUpdateUser {
  userName?: string;
  name?: z.infer<typeof ScimNameSchema>;
  title?: string;
  active?: boolean;
}

const ScimGroupMemberSchema = z.object({ value: z.string() });

export const ScimGroupSchema = z
  .object({
    schemas: z.array(z.string()),
    id: z.string(),
    displayName: z.string(),
    members: z.array(ScimGroupMemberSchema).default([]),
  })
  .passthrough();

export type ScimGroup = z.infer<typeof ScimGroupSchema>;

export interface ScimUpdateGroup {
  displayName?: string;
  members?: { value: string }[];
}

function listResponse<T extends z.ZodTypeAny>(resource: T) {
  return z.object({
    schemas: z.array(z.string()).default([]),
    totalResults: z.number(),
    startIndex: z.number().default(1),
    itemsPerPage: z.number().default(0),
    Resources: z.array(resource).default([]),
  });
}

export const ScimUserListSchema = listResponse(ScimUserSchema);
export const ScimGroupListSchema = listResponse(ScimGroupSchema);

export class AirtableScimClient extends ApiClient {
  private readonly apiKey: string;

  constructor(apiKey: string, retry: Omit<RetryOptions, "service" | "logger"> = {}) {
    super("airtable-scim", AIRTABLE_SCIM_BASE, { sleep: retry.sleep, maxRateLimitRetries: retry.maxRateLimitRetries });
    this.apiKey = apiKey;
  }

  protected async getAuthHeaders(): Promise<Record<string, string>> {
    return { Authorization: bearer(this.apiKey) };
  }

  private async scim<S extends z.ZodTypeAny>(
    schema: S,
    method: string,
    path: string,
    json?: unknown
  ): Promise<z.output<S>> {
    try {
      return await this.requestJson(schema, method, path, {
        json,
        headers: { Accept: "application/scim+json" },
      });
    } catch (error) {
      if (error instanceof ApiError) {
        throw toScimError(error);
      }
      throw error;
    }
  }

  private async getOrNull<S extends z.ZodTypeAny>(schema: S, path: string): Promise<z.output<S> | null> {
    try {
      return await this.scim(schema, "GET", path);
    } catch (error) {
      if (error instanceof ScimError && error.status === 404) {
        return null;
      }
      throw error;
    }
  }

  readonly users = {
    list: async (): Promise<ScimUser[]> => (await this.scim(ScimUserListSchema, "GET", "Users")).Resources,
    get: async (id: string): Promise<ScimUser | null> => this.getOrNull(ScimUserSchema, `Users/${id}`),
    create: async (user: ScimCreateUser): Promise<ScimUser> =>
      this.scim(ScimUserSchema, "POST", "Users", { schemas: [SCIM_USER_SCHEMA], ...user }),
    update: async (id: string, user: ScimUpdateUser): Promise<ScimUser> =>
      this.scim(ScimUserSchema, "PUT", `Users/${id}`, { schemas: [SCIM_USER_SCHEMA], ...user }),
  };

  readonly groups = {
    list: async (): Promise<ScimGroup[]> => (await this.scim(ScimGroupListSchema, "GET", "Groups")).Resources,
    get: async (id: string): Promise<ScimGroup | null> => this.getOrNull(ScimGroupSchema, `Groups/${id}`),
    create: async (displayName: string): Promise<ScimGroup> =>
      this.scim(ScimGroupSchema, "POST", "Groups", { schemas: [SCIM_GROUP_SCHEMA], displayName }),
    update: async (id: string, group: ScimUpdateGroup): Promise<ScimGroup> =>
      this.scim(ScimGroupSchema, "PUT", `Groups/${id}`, { schemas: [SCIM_GROUP_SCHEMA], ...group }),
  };
}
