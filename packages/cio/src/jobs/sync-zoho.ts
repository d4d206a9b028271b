/**
 * Rack line signups pushed to Zoho CRM as leads
 */

import { RecordStore, errorMessage, setupLogger, zoho } from "@cio/connector";
import { RackLineSubscribers, type RackLineSubscriber } from "../records/rack-line.js";
import { mirrorToAirtable, type JobContext } from "./context.js";

const logger = setupLogger("sync-zoho");

export const LEAD_SOURCE = "Rack Line Waitlist";
const LEAD_BATCH = 100;
// Signups younger than this may still be receiving MailChimp updates
const SETTLE_MS = 5 * 60 * 1000;

/**
 * "Ada King Lovelace" -> ["Ada King", "Lovelace"], "Cher" -> ["", "Cher"]
 */
export function splitName(name: string): [string, string] {
  const trimmed = name.trim();
  const at = trimmed.lastIndexOf(" ");
  if (at === -1) {
    return ["", trimmed];
  }
  return [trimmed.slice(0, at).trim(), trimmed.slice(at + 1)];
}

/** "1,000+ employees" -> 1000 */
export function employeeCount(companySize: string): number | undefined {
  const count = parseInt(companySize.replace(/[A-Za-z ~.,+<>]/g, ""), 10);
  return Number.isNaN(count) ? undefined : count;
}

export function leadFromSubscriber(subscriber: RackLineSubscriber): zoho.ZohoInput | null {
  const [firstName, lastName] = splitName(subscriber.name);
  if (lastName === "") {
    return null;
  }

  const lead: zoho.ZohoInput = {
    Last_Name: lastName,
    Email: subscriber.email,
    Company: subscriber.company,
    Lead_Source: LEAD_SOURCE,
    Submitted_Interest: subscriber.interest,
    Airtable_Lead_Record_Id: subscriber.airtable_record_id,
    Tag: subscriber.tags.map((name) => ({ name })),
  };
  if (firstName !== "") {
    lead.First_Name = firstName;
  }
  const count = employeeCount(subscriber.company_size);
  if (count !== undefined) {
    lead.No_of_Employees = count;
  }
  return lead;
}

/**
 * A failed insert that only reports an existing lead still yields its id.
 */
function leadId(entry: zoho.EntryResult): string | null {
  if (entry.status === "success" || entry.message.toLowerCase().includes("duplicate data")) {
    return zoho.resultId(entry);
  }
  return null;
}

export async function pendingLeads(ctx: JobContext): Promise<RackLineSubscriber[]> {
  const store = new RecordStore(RackLineSubscribers, ctx.db);
  return store.query(
    `SELECT * FROM "rack_line_subscribers"
     WHERE "zoho_lead_id" = '' AND "zoho_lead_exclude" = false AND "date_added" <= $1
     ORDER BY "id" LIMIT ${LEAD_BATCH}`,
    [new Date(ctx.now().getTime() - SETTLE_MS)]
  );
}

export async function pushLeads(ctx: JobContext): Promise<number> {
  const pending = await pendingLeads(ctx);
  if (pending.length === 0) {
    logger.info("No rack line signups to push to Zoho");
    return 0;
  }

  const subscribers: RackLineSubscriber[] = [];
  const leads: zoho.ZohoInput[] = [];
  for (const subscriber of pending) {
    const lead = leadFromSubscriber(subscriber);
    if (lead === null) {
      logger.info(`Rack line signup ${subscriber.email} has no last name, not creating a lead`);
      continue;
    }
    subscribers.push(subscriber);
    leads.push(lead);
  }

  if (leads.length === 0) {
    logger.warn(`All ${pending.length} rack line signups were dropped`);
    return 0;
  }
  logger.info(`Pushing ${leads.length} rack line signups to Zoho`);

  const client = await ctx.clients.zoho();
  const results = await client.records("Leads").insert(leads);
  const store = new RecordStore(RackLineSubscribers, ctx.db);
  const notes: zoho.ZohoInput[] = [];
  let created = 0;

  for (const [index, entry] of results.entries()) {
    const subscriber = subscribers[index];
    if (subscriber === undefined) continue;

    const id = leadId(entry);
    if (id === null) {
      logger.warn(`Zoho rejected the lead for ${subscriber.email}: ${entry.code} ${entry.message}`);
      continue;
    }

    try {
      await store.update({ ...subscriber, zoho_lead_id: id });
      created++;
    } catch (error) {
      logger.error(`Failed to save Zoho lead ${id} for ${subscriber.email}: ${errorMessage(error)}`);
      continue;
    }

    if (subscriber.notes !== "") {
      notes.push({ Note_Content: subscriber.notes, Parent_Id: id, se_module: "Leads" });
    }
  }

  if (notes.length > 0) {
    const noteResults = await client.records("Notes").insert(notes);
    for (const entry of noteResults) {
      if (entry.status !== "success") {
        logger.warn(`Zoho rejected a lead note: ${entry.code} ${entry.message}`);
      }
    }
  }

  return created;
}

export async function syncZoho(ctx: JobContext): Promise<void> {
  await pushLeads(ctx);
  await mirrorToAirtable(ctx, RackLineSubscribers);
}
