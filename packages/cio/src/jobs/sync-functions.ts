import { RecordStore, setupLogger } from "@cio/connector";
import { Functions } from "../records/functions.js";
import { mirrorToAirtable, type JobContext } from "./context.js";

const logger = setupLogger("sync-functions");

const TIMEOUT_MS = 24 * 60 * 60 * 1000;

/**
 * Close out runs that never finished: in progress for more than a day
 * becomes timed_out, completed without a conclusion becomes neutral.
 */
export async function syncFunctions(ctx: JobContext): Promise<void> {
  const store = new RecordStore(Functions, ctx.db);
  const cutoff = ctx.now().getTime() - TIMEOUT_MS;

  const running = await store.select({ status: "in_progress", cio_company_id: ctx.company.id });
  let timedOut = 0;
  for (const fn of running) {
    if (fn.created_at.getTime() >= cutoff) continue;
    await store.update({ ...fn, status: "completed", conclusion: "timed_out", completed_at: ctx.now() });
    timedOut++;
  }

  const unconcluded = await store.select({ status: "completed", conclusion: "", cio_company_id: ctx.company.id });
  for (const fn of unconcluded) {
    await store.update({ ...fn, conclusion: "neutral" });
  }

  logger.info(`Closed stale functions`, { timed_out: timedOut, neutral: unconcluded.length });
  await mirrorToAirtable(ctx, Functions);
}
