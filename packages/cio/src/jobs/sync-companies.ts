import { setupLogger } from "@cio/connector";
import { refreshCompanies } from "../records/companies.js";
import type { JobContext } from "./context.js";

const logger = setupLogger("sync-companies");

/**
 * Companies are maintained in Airtable; pull them in.
 */
export async function syncCompanies(ctx: JobContext): Promise<void> {
  const companies = await refreshCompanies(ctx.db, ctx.airtable("cio"));
  logger.info(`Synced ${companies.length} companies`);
}
