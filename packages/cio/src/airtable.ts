/**
 * Airtable bases
 *
 * Each company keeps its mirrored tables in a handful of bases whose ids
 * are stored on the company row.
 */

import { airtable, requireConfig, getConfig, type AirtableTableClient } from "@cio/connector";
import type { Company } from "./records/companies.js";

export const AIRTABLE_BASES = ["cio", "finance", "travel", "customer_leads", "directory", "hiring", "misc"] as const;

export type AirtableBase = (typeof AIRTABLE_BASES)[number];

export function isAirtableBase(value: string): value is AirtableBase {
  return (AIRTABLE_BASES as readonly string[]).includes(value);
}

export function airtableBaseId(company: Company, base: AirtableBase): string {
  const ids: Record<AirtableBase, string> = {
    cio: company.airtable_base_id_cio,
    finance: company.airtable_base_id_finance,
    travel: company.airtable_base_id_travel,
    customer_leads: company.airtable_base_id_customer_leads,
    directory: company.airtable_base_id_directory,
    hiring: company.airtable_base_id_hiring,
    misc: company.airtable_base_id_misc,
  };
  const id = ids[base];
  if (id === "") {
    throw new Error(`Company ${company.name} has no Airtable ${base} base`);
  }
  return id;
}

/** Resolves the base named by a record definition */
export type AirtableResolver = (base: string) => AirtableTableClient;

export function companyAirtable(company: Company, apiKey: string = requireConfig("AIRTABLE_API_KEY")): AirtableResolver {
  return (base) => {
    if (!isAirtableBase(base)) {
      throw new Error(`Unknown Airtable base: ${base}`);
    }
    return new airtable.AirtableClient({
      apiKey,
      baseId: airtableBaseId(company, base),
      enterpriseAccountId: getConfig().AIRTABLE_ENTERPRISE_ACCOUNT_ID,
    });
  };
}
