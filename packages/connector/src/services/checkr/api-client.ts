/**
 * Checkr API Client
 *
 * Background check candidates, invitations and reports.
 * Basic auth with the API key as username and an empty password.
 */

import { createHmac, timingSafeEqual } from "node:crypto";
import { z } from "zod";
import { ApiClient, basicAuth, type RetryOptions } from "../../lib/http-client.js";

export const CHECKR_API_BASE = "https://api.checkr.com/v1/";

export const CandidateSchema = z
  .object({
    id: z.string(),
    object: z.string().optional(),
    first_name: z.string().nullable().default(""),
    middle_name: z.string().nullable().default(""),
    last_name: z.string().nullable().default(""),
    email: z.string().nullable().default(""),
    phone: z.union([z.string(), z.number()]).nullable().optional(),
    zipcode: z.union([z.string(), z.number()]).nullable().optional(),
    custom_id: z.string().nullable().optional(),
    report_ids: z.array(z.string()).default([]),
    geo_ids: z.array(z.string()).default([]),
    adjudication: z.string().nullable().optional(),
    created_at: z.string().optional(),
  })
  .passthrough();

export type Candidate = z.infer<typeof CandidateSchema>;

const CandidatesResponseSchema = z.object({
  data: z.array(CandidateSchema),
  next_href: z.string().nullable().optional(),
  count: z.number().optional(),
});

export const ReportSchema = z
  .object({
    id: z.string(),
    status: z.string(),
    result: z.string().nullable().optional(),
    adjudication: z.string().nullable().optional(),
    package: z.string(),
    candidate_id: z.string(),
    created_at: z.string(),
    completed_at: z.string().nullable().optional(),
    turnaround_time: z.number().nullable().optional(),
  })
  .passthrough();

export type Report = z.infer<typeof ReportSchema>;

export const InvitationSchema = z
  .object({
    id: z.string(),
    status: z.string(),
    invitation_url: z.string().optional(),
    candidate_id: z.string(),
    package: z.string(),
    created_at: z.string().optional(),
  })
  .passthrough();

export type Invitation = z.infer<typeof InvitationSchema>;

export interface NewCandidate {
  first_name: string;
  last_name: string;
  email: string;
  phone?: string;
  zipcode?: string;
  custom_id?: string;
}

/**
 * Webhook event body (report.* and candidate.* events)
 */
export const WebhookEventSchema = z
  .object({
    id: z.string(),
    object: z.string().optional(),
    type: z.string(),
    created_at: z.string().optional(),
    data: z.object({ object: z.record(z.unknown()) }),
  })
  .passthrough();

export type WebhookEvent = z.infer<typeof WebhookEventSchema>;

export class CheckrClient extends ApiClient {
  private readonly apiKey: string;

  constructor(apiKey: string, retry: Omit<RetryOptions, "service" | "logger"> = {}) {
    super("checkr", CHECKR_API_BASE, retry);
    this.apiKey = apiKey;
  }

  protected async getAuthHeaders(): Promise<Record<string, string>> {
    return { Authorization: basicAuth(this.apiKey, "") };
  }

  /**
   * List all candidates, following next_href.
   */
  async listCandidates(): Promise<Candidate[]> {
    const candidates: Candidate[] = [];
    let next: string | null | undefined = "candidates";

    while (next) {
      const page: z.infer<typeof CandidatesResponseSchema> = await this.getJson(CandidatesResponseSchema, next);
      candidates.push(...page.data);
      next = page.next_href;
    }

    this.logger.debug(`Fetched ${candidates.length} candidates`);
    return candidates;
  }

  async getCandidate(id: string): Promise<Candidate> {
    return this.getJson(CandidateSchema, `candidates/${id}`);
  }

  async createCandidate(candidate: NewCandidate): Promise<Candidate> {
    return this.requestJson(CandidateSchema, "POST", "candidates", { json: candidate });
  }

  async createInvitation(candidateId: string, packageName: string): Promise<Invitation> {
    return this.requestJson(InvitationSchema, "POST", "invitations", {
      json: { candidate_id: candidateId, package: packageName },
    });
  }

  async getReport(id: string): Promise<Report> {
    return this.getJson(ReportSchema, `reports/${id}`);
  }
}

/**
 * Verify an X-Checkr-Signature header: hex HMAC-SHA256 of the raw body
 * keyed with the API key. A "sha256=" prefix is accepted.
 */
export function verifyWebhookSignature(key: string, signature: string, body: string): boolean {
  const hex = signature.trim().replace(/^sha256=?/, "");
  if (!/^[0-9a-fA-F]+$/.test(hex) || hex.length % 2 !== 0) {
    return false;
  }

  const expected = createHmac("sha256", key).update(body).digest();
  const actual = Buffer.from(hex, "hex");
  return actual.length === expected.length && timingSafeEqual(actual, expected);
}
