/**
 * What a job runs against: one company, its database rows, its Airtable
 * bases and its API clients.
 */

import { RecordStore, type AirtableSyncResult, type Queryable, type RecordDefinition, type Row } from "@cio/connector";
import { companyAirtable, type AirtableResolver } from "../airtable.js";
import { createClients, type Clients } from "../clients.js";
import type { Company } from "../records/companies.js";

export interface JobContext {
  db: Queryable;
  company: Company;
  airtable: AirtableResolver;
  clients: Clients;
  now: () => Date;
}

export function createJobContext(db: Queryable, company: Company): JobContext {
  return {
    db,
    company,
    airtable: companyAirtable(company),
    clients: createClients(db, company),
    now: () => new Date(),
  };
}

/**
 * Mirror every row of the company for a record type to its Airtable table.
 */
export async function mirrorToAirtable<N extends Row>(
  ctx: JobContext,
  definition: RecordDefinition<N>
): Promise<AirtableSyncResult> {
  if (definition.airtable === undefined) {
    throw new Error(`${definition.name} is not mirrored to Airtable`);
  }
  const store = new RecordStore(definition, ctx.db);
  const records = await store.listForCompany(ctx.company.id);
  return store.updateAirtable(ctx.airtable(definition.airtable.base), records);
}
