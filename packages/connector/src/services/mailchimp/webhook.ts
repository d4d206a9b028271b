/**
 * MailChimp webhook payloads
 *
 * MailChimp posts application/x-www-form-urlencoded bodies with bracketed
 * keys: type, fired_at, data[list_id], data[merges][EMAIL], ...
 */

import { z } from "zod";

export interface WebhookGrouping {
  id: string;
  unique_id: string;
  name: string;
  groups?: string;
}

export interface WebhookMerges {
  EMAIL?: string;
  FNAME?: string;
  LNAME?: string;
  NAME?: string;
  ADDRESS?: string;
  PHONE?: string;
  COMPANY?: string;
  CSIZE?: string;
  INTEREST?: string;
  NOTES?: string;
  BIRTHDAY?: string;
  GROUPINGS?: WebhookGrouping[];
}

export interface WebhookData {
  id?: string;
  list_id?: string;
  email?: string;
  email_type?: string;
  ip_opt?: string;
  ip_signup?: string;
  reason?: string;
  status?: string;
  web_id?: string;
  merges?: WebhookMerges;
}

export interface Webhook {
  type: string;
  fired_at: Date;
  data: WebhookData;
}

const FIRED_AT_PATTERN = /^(\d{4})-(\d{2})-(\d{2}) (\d{2}):(\d{2}):(\d{2})$/;

/**
 * fired_at is "YYYY-MM-DD HH:MM:SS" in UTC.
 */
export function parseFiredAt(value: string): Date {
  const match = FIRED_AT_PATTERN.exec(value.trim());
  if (!match) {
    throw new Error(`Invalid MailChimp fired_at: ${value}`);
  }
  const [, year, month, day, hour, minute, second] = match.map(Number);
  return new Date(Date.UTC(year ?? 0, (month ?? 1) - 1, day, hour, minute, second));
}

const GroupingSchema = z.object({
  id: z.string().default(""),
  unique_id: z.string().default(""),
  name: z.string().default(""),
  groups: z.string().optional(),
});

const MERGE_KEYS = [
  "EMAIL",
  "FNAME",
  "LNAME",
  "NAME",
  "ADDRESS",
  "PHONE",
  "COMPANY",
  "CSIZE",
  "INTEREST",
  "NOTES",
  "BIRTHDAY",
] as const;

const DATA_KEYS = ["id", "list_id", "email", "email_type", "ip_opt", "ip_signup", "reason", "status", "web_id"] as const;

/**
 * Parse a form-encoded webhook body.
 */
export function parseWebhook(body: string | URLSearchParams): Webhook {
  const form = typeof body === "string" ? new URLSearchParams(body) : body;

  const type = form.get("type");
  const firedAt = form.get("fired_at");
  if (!type || !firedAt) {
    throw new Error("MailChimp webhook is missing type or fired_at");
  }

  const data: WebhookData = {};
  for (const key of DATA_KEYS) {
    const value = form.get(`data[${key}]`);
    if (value !== null) {
      data[key] = value;
    }
  }

  const merges: WebhookMerges = {};
  let hasMerges = false;
  for (const key of MERGE_KEYS) {
    const value = form.get(`data[merges][${key}]`);
    if (value !== null) {
      merges[key] = value;
      hasMerges = true;
    }
  }
  // CNAME is an older name for COMPANY
  const cname = form.get("data[merges][CNAME]");
  if (merges.COMPANY === undefined && cname !== null) {
    merges.COMPANY = cname;
    hasMerges = true;
  }

  const groupings = new Map<number, Record<string, string>>();
  for (const [key, value] of form.entries()) {
    const match = /^data\[merges\]\[GROUPINGS\]\[(\d+)\]\[(\w+)\]$/.exec(key);
    if (!match) continue;
    const index = Number(match[1]);
    const entry = groupings.get(index) ?? {};
    entry[match[2] ?? ""] = value;
    groupings.set(index, entry);
  }
  if (groupings.size > 0) {
    merges.GROUPINGS = [...groupings.entries()]
      .sort(([a], [b]) => a - b)
      .map(([, entry]) => GroupingSchema.parse(entry));
    hasMerges = true;
  }

  if (hasMerges) {
    data.merges = merges;
  }

  return { type, fired_at: parseFiredAt(firedAt), data };
}
