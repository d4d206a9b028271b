/**
 * Test fixtures: a company row, clients on a static token and a job
 * context over in-process stand-ins.
 */

import {
  RecordStore,
  airtable,
  checkr,
  googleDirectory,
  googleDrive,
  gusto,
  mailchimp,
  quickbooks,
  ramp,
  tripactions,
  zoho,
  zoom,
  type AccessTokenSource,
} from "@cio/connector";
import { MemoryAirtable, MemoryDb } from "@cio/connector/testing";
import type { Clients } from "./clients.js";
import type { JobContext } from "./jobs/context.js";
import { Companies, type Company, type NewCompany } from "./records/companies.js";

export const TEST_NOW = new Date("2024-03-01T12:00:00Z");

export const MAILCHIMP_ENDPOINT = "https://us1.api.mailchimp.com";

const staticToken: AccessTokenSource = { accessToken: async () => "test-token" };

export function seedCompany(
  db: MemoryDb,
  overrides: Partial<NewCompany> & { airtable_record_id?: string } = {}
): Company {
  const [row] = db.seed("companys", [
    {
      name: "Oxide",
      gsuite_domain: "example.com",
      github_org: "",
      website: "https://example.com",
      domain: "example.com",
      gsuite_account_id: "",
      gsuite_subject: "",
      phone: "",
      mailchimp_list_id: "list-1",
      checkr_api_key: "test-checkr-key",
      airtable_base_id_cio: "app-cio",
      airtable_base_id_finance: "app-finance",
      airtable_base_id_travel: "app-travel",
      airtable_base_id_customer_leads: "app-leads",
      airtable_base_id_directory: "app-directory",
      airtable_base_id_hiring: "app-hiring",
      airtable_base_id_misc: "app-misc",
      ...overrides,
    },
  ]);
  return new RecordStore(Companies, db).parseRow(row);
}

/**
 * Real API clients on a static token; tests answer their requests with
 * stubFetch.
 */
export function staticClients(): Clients {
  return {
    airtableEnterprise: async () =>
      new airtable.AirtableClient({ apiKey: "test-key", baseId: "app-cio", enterpriseAccountId: "ent-1" }),
    checkr: async () => new checkr.CheckrClient("test-checkr-key"),
    googleDirectory: async () => new googleDirectory.GoogleDirectoryClient(staticToken),
    googleDrive: async () => new googleDrive.GoogleDriveClient(staticToken),
    gusto: async () => new gusto.GustoClient(staticToken),
    mailchimp: async () => new mailchimp.MailchimpClient(staticToken, MAILCHIMP_ENDPOINT),
    quickbooks: async () => new quickbooks.QuickBooksClient(staticToken, "realm-1"),
    ramp: async () => new ramp.RampClient(staticToken),
    tripactions: async () => new tripactions.TripActionsClient(staticToken),
    zoho: async () => new zoho.ZohoClient(staticToken),
    zoom: async () => new zoom.ZoomClient(staticToken),
  };
}

export interface TestContext extends JobContext {
  db: MemoryDb;
  /** One MemoryAirtable per base, created on first use */
  bases: Map<string, MemoryAirtable>;
}

export function testContext(db: MemoryDb = new MemoryDb(), company: Company = seedCompany(db)): TestContext {
  const bases = new Map<string, MemoryAirtable>();
  return {
    db,
    company,
    bases,
    airtable: (base) => {
      let client = bases.get(base);
      if (client === undefined) {
        client = new MemoryAirtable();
        bases.set(base, client);
      }
      return client;
    },
    clients: staticClients(),
    now: () => TEST_NOW,
  };
}

/** The MemoryAirtable of a base, creating it when the test seeds first */
export function base(ctx: TestContext, name: string): MemoryAirtable {
  ctx.airtable(name);
  const client = ctx.bases.get(name);
  if (client === undefined) {
    throw new Error(`No Airtable base ${name}`);
  }
  return client;
}
