/**
 * Checkr reports into the hiring base
 */

import { RecordStore, setupLogger, type checkr } from "@cio/connector";
import { BackgroundChecks, backgroundCheckFromReport, type BackgroundCheck } from "../records/background-checks.js";
import { mirrorToAirtable, type JobContext } from "./context.js";

const logger = setupLogger("sync-background-checks");

/**
 * Upsert the check for one report, fetching its candidate.
 */
export async function refreshBackgroundCheck(
  ctx: JobContext,
  report: checkr.Report,
  candidate?: checkr.Candidate
): Promise<BackgroundCheck> {
  const client = await ctx.clients.checkr();
  const owner = candidate ?? (await client.getCandidate(report.candidate_id));
  const store = new RecordStore(BackgroundChecks, ctx.db);
  return store.upsert(backgroundCheckFromReport(owner, report, ctx.company.id));
}

export async function syncBackgroundChecks(ctx: JobContext): Promise<number> {
  const client = await ctx.clients.checkr();
  const candidates = await client.listCandidates();

  let reports = 0;
  for (const candidate of candidates) {
    for (const reportId of candidate.report_ids) {
      await refreshBackgroundCheck(ctx, await client.getReport(reportId), candidate);
      reports++;
    }
  }
  logger.info(`Synced ${reports} Checkr reports of ${candidates.length} candidates`);

  await mirrorToAirtable(ctx, BackgroundChecks);
  return reports;
}
