import { describe, it, expect, vi, beforeEach, afterEach } from "vitest";
import { resetConfig } from "@cio/connector";
import { MemoryDb, stubFetch, type FetchRoute } from "@cio/connector/testing";
import { MAILCHIMP_ENDPOINT, base, seedCompany, testContext, type TestContext } from "../testing.js";
import { syncMailingList, syncMailingLists, syncRackLine } from "./sync-mailing-lists.js";

function membersRoute(listId: string, members: unknown[]): FetchRoute {
  return {
    url: new RegExp(`^${MAILCHIMP_ENDPOINT.replace(/\./g, "\\.")}/3\\.0/lists/${listId}/members\\?`),
    json: { members, total_items: members.length },
  };
}

const subscriber = {
  id: "m-1",
  email_address: "ada@example.com",
  merge_fields: { FNAME: "Ada", LNAME: "Lovelace", COMPANY: "Engines Ltd" },
  timestamp_signup: "2024-02-01T00:00:00+00:00",
};

const waitlisted = {
  id: "m-2",
  email_address: "grace@example.com",
  merge_fields: { NAME: "Grace Hopper", CSIZE: "50" },
};

describe("mailing lists", () => {
  let ctx: TestContext;

  beforeEach(() => {
    vi.spyOn(console, "log").mockImplementation(() => {});
    ctx = testContext();
  });

  afterEach(() => {
    resetConfig();
  });

  it("should sync the company's list and keep linked people", async () => {
    stubFetch([membersRoute("list-1", [subscriber])]);

    expect(await syncMailingList(ctx)).toBe(1);
    const [record] = base(ctx, "customer_leads").records("Mailing List Signups");
    expect(record?.fields).toMatchObject({ email: "ada@example.com", name: "Ada Lovelace", company: "Engines Ltd" });
    if (record !== undefined) {
      record.fields.link_to_people = ["recPerson"];
      record.fields.company = "Old Co";
    }

    await syncMailingList(ctx);

    const [updated] = base(ctx, "customer_leads").records("Mailing List Signups");
    expect(updated?.fields.company).toBe("Engines Ltd");
    expect(updated?.fields.link_to_people).toEqual(["recPerson"]);
  });

  it("should skip a company without a list", async () => {
    const db = new MemoryDb();
    const noList = testContext(db, seedCompany(db, { mailchimp_list_id: "" }));

    expect(await syncMailingList(noList)).toBe(0);
  });

  it("should sync the rack line list", async () => {
    stubFetch([membersRoute("list-rack", [waitlisted])]);

    expect(await syncRackLine(ctx, "list-rack")).toBe(1);
    expect(ctx.db.rows("rack_line_subscribers")[0]).toMatchObject({
      email: "grace@example.com",
      name: "Grace Hopper",
      company_size: "50",
      zoho_lead_id: "",
    });
    expect(base(ctx, "customer_leads").records("Rack Line Signups")).toHaveLength(1);
  });

  it("should read the rack line list from the environment", async () => {
    vi.stubEnv("MAILCHIMP_LIST_ID_RACK_LINE", "list-rack");
    resetConfig();
    stubFetch([membersRoute("list-1", [subscriber]), membersRoute("list-rack", [waitlisted])]);

    await syncMailingLists(ctx);

    expect(ctx.db.rows("mailing_list_subscribers")).toHaveLength(1);
    expect(ctx.db.rows("rack_line_subscribers")).toHaveLength(1);
  });
});
