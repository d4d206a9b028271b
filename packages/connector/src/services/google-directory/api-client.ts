/**
 * Google Admin SDK Directory API Client
 *
 * Workspace users, groups and group membership.
 */

import { z } from "zod";
import { ApiError } from "../../lib/errors.js";
import { ApiClient, bearer, type Query, type RetryOptions } from "../../lib/http-client.js";
import type { AccessTokenSource } from "../../lib/oauth.js";

export const DIRECTORY_API_BASE = "https://admin.googleapis.com/admin/directory/v1/";
const MAX_RESULTS = 500;

export const UserNameSchema = z
  .object({
    givenName: z.string().default(""),
    familyName: z.string().default(""),
    fullName: z.string().default(""),
  })
  .passthrough();

export const DirectoryUserSchema = z
  .object({
    id: z.string(),
    primaryEmail: z.string(),
    name: UserNameSchema.default({}),
    isAdmin: z.boolean().default(false),
    suspended: z.boolean().default(false),
    archived: z.boolean().default(false),
    orgUnitPath: z.string().default("/"),
    aliases: z.array(z.string()).default([]),
    creationTime: z.string().optional(),
    lastLoginTime: z.string().optional(),
    recoveryEmail: z.string().optional(),
    recoveryPhone: z.string().optional(),
  })
  .passthrough();

export type DirectoryUser = z.infer<typeof DirectoryUserSchema>;

export const GroupSchema = z
  .object({
    id: z.string(),
    email: z.string(),
    name: z.string().default(""),
    description: z.string().default(""),
    directMembersCount: z.coerce.number().default(0),
    aliases: z.array(z.string()).default([]),
  })
  .passthrough();

export type Group = z.infer<typeof GroupSchema>;

export const MemberSchema = z
  .object({
    id: z.string().optional(),
    email: z.string(),
    role: z.string().default("MEMBER"),
    type: z.string().default("USER"),
    status: z.string().optional(),
  })
  .passthrough();

export type GroupMember = z.infer<typeof MemberSchema>;

export type GroupRole = "OWNER" | "MANAGER" | "MEMBER";

export interface CreateDirectoryUser {
  primaryEmail: string;
  givenName: string;
  familyName: string;
  password: string;
  changePasswordAtNextLogin?: boolean;
  orgUnitPath?: string;
  recoveryEmail?: string;
}

const PageSchema = z.object({ nextPageToken: z.string().optional() }).passthrough();

export class GoogleDirectoryClient extends ApiClient {
  private readonly tokens: AccessTokenSource;

  constructor(tokens: AccessTokenSource, retry: Omit<RetryOptions, "service" | "logger"> = {}) {
    super("google-directory", DIRECTORY_API_BASE, retry);
    this.tokens = tokens;
  }

  protected async getAuthHeaders(): Promise<Record<string, string>> {
    return { Authorization: bearer(await this.tokens.accessToken()) };
  }

  private async listAll<T extends z.ZodTypeAny>(
    key: string,
    item: T,
    path: string,
    query: Query
  ): Promise<z.output<T>[]> {
    const rows = z.array(item).default([]);
    const results: z.output<T>[] = [];
    let pageToken: string | undefined;

    do {
      const page = await this.getJson(PageSchema, path, { ...query, maxResults: MAX_RESULTS, pageToken });
      results.push(...rows.parse(page[key]));
      pageToken = page.nextPageToken;
    } while (pageToken);

    return results;
  }

  async listUsers(domain: string): Promise<DirectoryUser[]> {
    return this.listAll("users", DirectoryUserSchema, "users", { domain, orderBy: "email" });
  }

  async getUser(userKey: string): Promise<DirectoryUser | null> {
    try {
      return await this.getJson(DirectoryUserSchema, `users/${encodeURIComponent(userKey)}`);
    } catch (error) {
      if (error instanceof ApiError && error.isNotFound) {
        return null;
      }
      throw error;
    }
  }

  async createUser(user: CreateDirectoryUser): Promise<DirectoryUser> {
    return this.requestJson(DirectoryUserSchema, "POST", "users", {
      json: {
        primaryEmail: user.primaryEmail,
        name: { givenName: user.givenName, familyName: user.familyName },
        password: user.password,
        changePasswordAtNextLogin: user.changePasswordAtNextLogin ?? true,
        orgUnitPath: user.orgUnitPath,
        recoveryEmail: user.recoveryEmail,
      },
    });
  }

  /**
   * PATCH semantics: only the given fields change.
   */
  async updateUser(userKey: string, update: Record<string, unknown>): Promise<DirectoryUser> {
    return this.requestJson(DirectoryUserSchema, "PATCH", `users/${encodeURIComponent(userKey)}`, { json: update });
  }

  async listGroups(domain: string): Promise<Group[]> {
    return this.listAll("groups", GroupSchema, "groups", { domain });
  }

  async listGroupMembers(groupKey: string): Promise<GroupMember[]> {
    return this.listAll("members", MemberSchema, `groups/${encodeURIComponent(groupKey)}/members`, {});
  }

  /**
   * Add a member; an existing member has their role updated instead.
   */
  async addGroupMember(groupKey: string, email: string, role: GroupRole = "MEMBER"): Promise<GroupMember> {
    const group = encodeURIComponent(groupKey);
    try {
      return await this.requestJson(MemberSchema, "POST", `groups/${group}/members`, { json: { email, role } });
    } catch (error) {
      if (error instanceof ApiError && error.status === 409) {
        this.logger.debug(`${email} is already in ${groupKey}, updating role`);
        return this.requestJson(MemberSchema, "PATCH", `groups/${group}/members/${encodeURIComponent(email)}`, {
          json: { role },
        });
      }
      throw error;
    }
  }

  async removeGroupMember(groupKey: string, email: string): Promise<void> {
    await this.send("DELETE", `groups/${encodeURIComponent(groupKey)}/members/${encodeURIComponent(email)}`);
  }
}
