/**
 * Companies
 *
 * One row per company the service works for. Edited by hand in the cio
 * Airtable base and refreshed from there; secrets stay in the database.
 */

import { z } from "zod";
import { RecordStore, defineRecord, setupLogger, type AirtableTableClient, type Queryable, type Stored } from "@cio/connector";
import { text } from "./fields.js";

const logger = setupLogger("companies");

export const NewCompanySchema = z.object({
  name: z.string(),
  gsuite_domain: text,
  github_org: text,
  website: text,
  domain: text,
  gsuite_account_id: text,
  gsuite_subject: text,
  phone: text,
  mailchimp_list_id: text,
  checkr_api_key: text,
  airtable_base_id_cio: text,
  airtable_base_id_finance: text,
  airtable_base_id_travel: text,
  airtable_base_id_customer_leads: text,
  airtable_base_id_directory: text,
  airtable_base_id_hiring: text,
  airtable_base_id_misc: text,
});

export type NewCompany = z.infer<typeof NewCompanySchema>;
export type Company = Stored<NewCompany>;

export const Companies = defineRecord({
  name: "Company",
  table: "companys",
  schema: NewCompanySchema,
  matchOn: ["name"],
  airtable: {
    base: "cio",
    table: "Companies",
    exclude: ["checkr_api_key"],
  },
});

export async function getCompanyByName(db: Queryable, name: string): Promise<Company | null> {
  const [company] = await new RecordStore(Companies, db).select({ name }, { limit: 1 });
  return company ?? null;
}

export async function getCompanyByMailchimpList(db: Queryable, listId: string): Promise<Company | null> {
  const [company] = await new RecordStore(Companies, db).select({ mailchimp_list_id: listId }, { limit: 1 });
  return company ?? null;
}

/**
 * Pull the Companies table into the database. Records without a name or
 * website are skipped; fields that are never mirrored keep their stored
 * value.
 */
export async function refreshCompanies(db: Queryable, airtable: AirtableTableClient): Promise<Company[]> {
  const store = new RecordStore(Companies, db);
  const records = await airtable.listRecords("Companies", { view: "Grid view" });
  const companies: Company[] = [];

  for (const record of records) {
    const company = store.fromAirtableFields(record.fields);
    if (company === null || company.name.trim() === "" || company.website.trim() === "") {
      logger.debug(`Skipping Airtable company ${record.id}`);
      continue;
    }

    const existing = await store.getFromDb(company);
    const upserted = await store.upsert({
      ...company,
      checkr_api_key: company.checkr_api_key || (existing?.checkr_api_key ?? ""),
    });
    if (upserted.airtable_record_id !== record.id) {
      companies.push(await store.update({ ...upserted, airtable_record_id: record.id }));
    } else {
      companies.push(upserted);
    }
  }

  logger.info(`Refreshed ${companies.length} companies from Airtable`);
  return companies;
}
