/**
 * API tokens
 *
 * OAuth tokens per company and product, written by the consent callbacks
 * and the refresh job.
 */

import { z } from "zod";
import { RecordStore, defineRecord, type Stored } from "@cio/connector";
import { Companies } from "./companies.js";
import { amount, companyId, list, optionalTimestamp, text, timestamp } from "./fields.js";

const EXPIRY_MARGIN_HOURS = 10;

export const NewApiTokenSchema = z.object({
  product: z.string(),
  company_id: text,
  item_id: text,
  user_email: text,
  token_type: text,
  access_token: text,
  expires_in: amount,
  refresh_token: text,
  refresh_token_expires_in: amount,
  expires_date: optionalTimestamp,
  refresh_token_expires_date: optionalTimestamp,
  endpoint: text,
  last_updated_at: timestamp,
  company: list,
  auth_company_id: companyId,
  cio_company_id: companyId,
});

export type NewApiToken = z.infer<typeof NewApiTokenSchema>;
export type ApiToken = Stored<NewApiToken>;

export const ApiTokens = defineRecord({
  name: "APIToken",
  table: "api_tokens",
  schema: NewApiTokenSchema,
  matchOn: ["auth_company_id", "product"],
  airtable: {
    base: "cio",
    table: "API Tokens",
    exclude: ["access_token", "refresh_token"],
    beforeUpdate: async (record, fields, { db }) => {
      const company = await new RecordStore(Companies, db).getById(record.auth_company_id);
      return {
        ...fields,
        company: company.airtable_record_id ? [company.airtable_record_id] : [],
      };
    },
  },
});

function addSeconds(date: Date, seconds: number): Date {
  return new Date(date.getTime() + seconds * 1000);
}

/**
 * Fill the expiry dates from the lifetimes, counted from last_updated_at.
 */
export function expand<T extends NewApiToken>(token: T): T {
  return {
    ...token,
    expires_date: token.expires_in > 0 ? addSeconds(token.last_updated_at, token.expires_in) : token.expires_date,
    refresh_token_expires_date:
      token.refresh_token_expires_in > 0
        ? addSeconds(token.last_updated_at, token.refresh_token_expires_in)
        : token.refresh_token_expires_date,
  };
}

/**
 * Unknown expiry counts as expired, and so does anything expiring within
 * the next ten hours (a job run can take that long).
 */
export function isExpired(token: NewApiToken, now: Date = new Date()): boolean {
  if (token.expires_date === null) {
    return true;
  }
  return token.expires_date.getTime() - now.getTime() <= EXPIRY_MARGIN_HOURS * 60 * 60 * 1000;
}
