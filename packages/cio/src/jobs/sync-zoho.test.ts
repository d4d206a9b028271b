import { describe, it, expect, vi, beforeEach } from "vitest";
import { RecordStore } from "@cio/connector";
import { stubFetch } from "@cio/connector/testing";
import { RackLineSubscribers, type NewRackLineSubscriber } from "../records/rack-line.js";
import { TEST_NOW, base, testContext, type TestContext } from "../testing.js";
import { employeeCount, leadFromSubscriber, splitName, syncZoho } from "./sync-zoho.js";

const LEADS_URL = "https://www.zohoapis.com/crm/v2/Leads";
const NOTES_URL = "https://www.zohoapis.com/crm/v2/Notes";

describe("sync-zoho", () => {
  describe("splitName", () => {
    it("should split on the last space", () => {
      expect(splitName(" Ada King Lovelace ")).toEqual(["Ada King", "Lovelace"]);
      expect(splitName("Cher")).toEqual(["", "Cher"]);
      expect(splitName("  ")).toEqual(["", ""]);
    });
  });

  describe("employeeCount", () => {
    it("should read a company size", () => {
      expect(employeeCount("1,000+")).toBe(1000);
      expect(employeeCount("~50 employees")).toBe(50);
      expect(employeeCount("lots")).toBeUndefined();
    });
  });

  describe("syncZoho", () => {
    let ctx: TestContext;
    let store: RecordStore<NewRackLineSubscriber>;

    const signup = (name: string, email: string, overrides: Partial<NewRackLineSubscriber> = {}) =>
      store.create({
        email,
        name,
        company: "Engines Ltd",
        company_size: "",
        interest: "",
        date_added: new Date("2024-02-01T00:00:00Z"),
        date_optin: new Date("2024-02-01T00:00:00Z"),
        date_last_changed: new Date("2024-02-01T00:00:00Z"),
        notes: "",
        tags: [],
        link_to_people: [],
        zoho_lead_id: "",
        zoho_lead_exclude: false,
        cio_company_id: ctx.company.id,
        ...overrides,
      });

    beforeEach(() => {
      vi.spyOn(console, "log").mockImplementation(() => {});
      ctx = testContext();
      store = new RecordStore(RackLineSubscribers, ctx.db);
      ctx.db.onQuery(/WHERE "zoho_lead_id" = '' AND "zoho_lead_exclude" = false/, (values, db) => {
        const [cutoff] = values;
        const rows = db
          .rows("rack_line_subscribers")
          .filter(
            (row) =>
              row.zoho_lead_id === "" &&
              row.zoho_lead_exclude === false &&
              row.date_added instanceof Date &&
              cutoff instanceof Date &&
              row.date_added.getTime() <= cutoff.getTime()
          )
          .map((row) => ({ ...row }));
        return { rows, rowCount: rows.length };
      });
    });

    it("should push settled signups as leads with their notes", async () => {
      const ada = await signup("Ada Lovelace", "ada@example.com", { company_size: "1,000+", notes: "call me", tags: ["vip"] });
      const dan = await signup("Dan Duplicate", "dan@example.com");
      const bob = await signup("Bob Rejected", "bob@example.com");
      const cher = await signup("Cher", "cher@example.com");
      await signup(" ", "nobody@example.com");
      await signup("Grace Hopper", "grace@example.com", { date_added: new Date(TEST_NOW.getTime() - 60 * 1000) });
      await signup("Alan Turing", "alan@example.com", { zoho_lead_exclude: true });

      const calls = stubFetch([
        {
          method: "POST",
          url: LEADS_URL,
          json: {
            data: [
              { code: "SUCCESS", status: "success", message: "record added", details: { id: "z-1" } },
              { code: "DUPLICATE_DATA", status: "error", message: "duplicate data", details: { id: "z-2" } },
              { code: "INVALID_DATA", status: "error", message: "invalid data", details: {} },
              { code: "SUCCESS", status: "success", message: "record added", details: { id: "z-4" } },
            ],
          },
        },
        {
          method: "POST",
          url: NOTES_URL,
          json: { data: [{ code: "SUCCESS", status: "success", message: "record added", details: { id: "n-1" } }] },
        },
      ]);

      await syncZoho(ctx);

      expect(calls[0]?.headers.authorization).toBe("Zoho-oauthtoken test-token");
      expect(JSON.parse(calls[0]?.body ?? "{}").data[0]).toEqual({
        First_Name: "Ada",
        Last_Name: "Lovelace",
        Email: "ada@example.com",
        Company: "Engines Ltd",
        Lead_Source: "Rack Line Waitlist",
        Submitted_Interest: "",
        Airtable_Lead_Record_Id: "",
        Tag: [{ name: "vip" }],
        No_of_Employees: 1000,
      });
      expect(JSON.parse(calls[0]?.body ?? "{}").data).toHaveLength(4);
      expect(JSON.parse(calls[0]?.body ?? "{}").data[3]).toEqual({
        Last_Name: "Cher",
        Email: "cher@example.com",
        Company: "Engines Ltd",
        Lead_Source: "Rack Line Waitlist",
        Submitted_Interest: "",
        Airtable_Lead_Record_Id: "",
        Tag: [],
      });
      expect(JSON.parse(calls[1]?.body ?? "{}")).toEqual({
        data: [{ Note_Content: "call me", Parent_Id: "z-1", se_module: "Leads" }],
      });
      expect((await store.getById(ada.id)).zoho_lead_id).toBe("z-1");
      expect((await store.getById(dan.id)).zoho_lead_id).toBe("z-2");
      expect((await store.getById(bob.id)).zoho_lead_id).toBe("");
      expect((await store.getById(cher.id)).zoho_lead_id).toBe("z-4");
      expect(base(ctx, "customer_leads").records("Rack Line Signups")).toHaveLength(7);
    });

    it("should not call Zoho without pending signups", async () => {
      await signup("Cher", "cher@example.com", { date_added: TEST_NOW });
      const calls = stubFetch([]);

      await syncZoho(ctx);

      expect(calls).toHaveLength(0);
    });
  });

  it("should leave the employee count out when it is unknown", () => {
    const lead = leadFromSubscriber({
      id: 1,
      airtable_record_id: "recLead",
      email: "ada@example.com",
      name: "Ada Lovelace",
      company: "",
      company_size: "",
      interest: "Racks",
      date_added: TEST_NOW,
      date_optin: TEST_NOW,
      date_last_changed: TEST_NOW,
      notes: "",
      tags: [],
      link_to_people: [],
      zoho_lead_id: "",
      zoho_lead_exclude: false,
      cio_company_id: 1,
    });

    expect(lead).not.toBeNull();
    expect(lead).not.toHaveProperty("No_of_Employees");
    expect(lead?.Airtable_Lead_Record_Id).toBe("recLead");
  });
});
