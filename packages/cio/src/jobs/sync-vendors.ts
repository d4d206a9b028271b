/**
 * Software vendors
 *
 * Vendors are maintained by hand in the finance base. Seat counts of the
 * vendors we can ask are refreshed before the totals are recomputed.
 */

import { RecordStore, setupLogger } from "@cio/connector";
import { googleDomain } from "../clients.js";
import { SoftwareVendors, totalCostPerMonth, type NewSoftwareVendor } from "../records/finance.js";
import { mirrorToAirtable, type JobContext } from "./context.js";

const logger = setupLogger("sync-vendors");

type SeatCounter = (ctx: JobContext) => Promise<number>;

export const SEAT_COUNTERS: ReadonlyMap<string, SeatCounter> = new Map<string, SeatCounter>([
  [
    "Google Workspace",
    async (ctx) => {
      const directory = await ctx.clients.googleDirectory();
      const users = await directory.listUsers(googleDomain(ctx.company));
      return users.filter((user) => !user.suspended && !user.archived).length;
    },
  ],
  [
    "Zoom",
    async (ctx) => {
      const zoom = await ctx.clients.zoom();
      return (await zoom.listUsers()).length;
    },
  ],
  [
    "Airtable",
    async (ctx) => {
      const airtable = await ctx.clients.airtableEnterprise();
      return (await airtable.listUsers()).length;
    },
  ],
]);

export interface PulledVendor {
  vendor: NewSoftwareVendor;
  airtableRecordId: string;
}

/**
 * Vendors as they are in Airtable, for this company.
 */
export async function pullVendors(ctx: JobContext): Promise<PulledVendor[]> {
  const store = new RecordStore(SoftwareVendors, ctx.db);
  const records = await ctx.airtable("finance").listRecords("Vendors");
  const vendors: PulledVendor[] = [];

  for (const record of records) {
    const vendor = store.fromAirtableFields({ ...record.fields, cio_company_id: ctx.company.id });
    if (vendor === null) {
      logger.debug(`Skipping Airtable vendor record ${record.id}`);
      continue;
    }
    vendors.push({ vendor, airtableRecordId: record.id });
  }
  return vendors;
}

export async function syncVendors(ctx: JobContext): Promise<number> {
  const store = new RecordStore(SoftwareVendors, ctx.db);
  const pulled = await pullVendors(ctx);

  for (const { vendor, airtableRecordId } of pulled) {
    const countSeats = SEAT_COUNTERS.get(vendor.name);
    const users = countSeats === undefined ? vendor.users : await countSeats(ctx);
    if (users !== vendor.users) {
      logger.info(`${vendor.name} has ${users} users`, { previous: vendor.users });
    }

    const stored = await store.upsert({ ...vendor, users, total_cost_per_month: totalCostPerMonth({ ...vendor, users }) });
    if (stored.airtable_record_id !== airtableRecordId) {
      await store.update({ ...stored, airtable_record_id: airtableRecordId });
    }
  }
  logger.info(`Synced ${pulled.length} software vendors`);

  await mirrorToAirtable(ctx, SoftwareVendors);
  return pulled.length;
}
