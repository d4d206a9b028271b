/**
 * Named jobs
 */

import type { JobContext } from "./context.js";
import { syncApiTokens } from "./sync-api-tokens.js";
import { syncBackgroundChecks } from "./sync-background-checks.js";
import { syncCompanies } from "./sync-companies.js";
import { syncEmployees } from "./sync-employees.js";
import { syncFinance } from "./sync-finance.js";
import { syncFunctions } from "./sync-functions.js";
import { syncMailingLists } from "./sync-mailing-lists.js";
import { syncRecordedMeetings } from "./sync-recorded-meetings.js";
import { syncTravel } from "./sync-travel.js";
import { syncVendors } from "./sync-vendors.js";
import { syncZoho } from "./sync-zoho.js";

export interface Job {
  description: string;
  run: (ctx: JobContext) => Promise<unknown>;
}

export const JOBS = {
  "sync-api-tokens": { description: "Refresh expiring OAuth tokens", run: (ctx) => syncApiTokens(ctx) },
  "sync-companies": { description: "Refresh companies from Airtable", run: syncCompanies },
  "sync-finance": { description: "Ramp transactions and QuickBooks bill payments", run: syncFinance },
  "sync-functions": { description: "Time out stale job runs", run: syncFunctions },
  "sync-mailing-lists": { description: "MailChimp mailing list and rack line subscribers", run: syncMailingLists },
  "sync-recorded-meetings": { description: "Move Zoom recordings to Google Drive", run: syncRecordedMeetings },
  "sync-travel": { description: "TripActions bookings", run: syncTravel },
  "sync-zoho": { description: "Push rack line signups to Zoho as leads", run: syncZoho },
  "sync-background-checks": { description: "Checkr background checks", run: syncBackgroundChecks },
  "sync-employees": { description: "Gusto employees", run: syncEmployees },
  "sync-vendors": { description: "Software vendor seats and costs", run: syncVendors },
} satisfies Record<string, Job>;

export type JobName = keyof typeof JOBS;

export const JOB_NAMES = Object.keys(JOBS).filter(isJobName);

export function isJobName(name: string): name is JobName {
  return Object.prototype.hasOwnProperty.call(JOBS, name);
}

export function getJob(name: JobName): Job {
  return JOBS[name];
}
