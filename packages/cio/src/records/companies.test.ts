import { describe, it, expect, vi, beforeEach } from "vitest";
import { MemoryAirtable, MemoryDb } from "@cio/connector/testing";
import { seedCompany } from "../testing.js";
import { getCompanyByMailchimpList, getCompanyByName, refreshCompanies } from "./companies.js";

describe("companies", () => {
  let db: MemoryDb;
  let airtable: MemoryAirtable;

  beforeEach(() => {
    vi.spyOn(console, "log").mockImplementation(() => {});
    db = new MemoryDb();
    airtable = new MemoryAirtable();
  });

  it("should look companies up by name and MailChimp list", async () => {
    const company = seedCompany(db, { mailchimp_list_id: "list-9" });

    expect((await getCompanyByName(db, "Oxide"))?.id).toBe(company.id);
    expect((await getCompanyByMailchimpList(db, "list-9"))?.id).toBe(company.id);
    expect(await getCompanyByName(db, "Nobody")).toBeNull();
  });

  it("should refresh companies from Airtable and skip incomplete rows", async () => {
    airtable.seed("Companies", [
      { name: "Oxide", website: "https://example.com", airtable_base_id_cio: "app-new" },
      { name: "No Website" },
      { website: "https://nameless.example.com" },
    ]);

    const companies = await refreshCompanies(db, airtable);

    expect(companies.map((c) => c.name)).toEqual(["Oxide"]);
    expect(companies[0]?.airtable_base_id_cio).toBe("app-new");
    expect(companies[0]?.airtable_record_id).toBe("rec001");
  });

  it("should keep the stored Checkr key", async () => {
    seedCompany(db, { checkr_api_key: "test-checkr-key" });
    airtable.seed("Companies", [{ name: "Oxide", website: "https://example.com" }]);

    const [company] = await refreshCompanies(db, airtable);

    expect(company?.checkr_api_key).toBe("test-checkr-key");
    expect(db.rows("companys")).toHaveLength(1);
  });
});
