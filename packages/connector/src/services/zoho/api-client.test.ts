import { describe, it, expect, vi, beforeEach } from "vitest";
import { ZohoClient, resultId, zohoConsentUrl } from "./api-client.js";
import { stubFetch } from "../../testing/fetch.js";

const tokens = { accessToken: async () => "zoho-token" };

describe("zoho api-client", () => {
  beforeEach(() => {
    vi.spyOn(console, "log").mockImplementation(() => {});
  });

  it("should build an offline consent URL", () => {
    expect(
      zohoConsentUrl({ clientId: "cid", clientSecret: "test-secret", redirectUri: "https://cio.example.com/cb" })
    ).toBe(
      "https://accounts.zoho.com/oauth/v2/auth?scope=ZohoCRM.modules.ALL&client_id=cid&response_type=code&access_type=offline&redirect_uri=https%3A%2F%2Fcio.example.com%2Fcb"
    );
  });

  it("should follow more_records", async () => {
    const calls = stubFetch([
      {
        url: "https://www.zohoapis.com/crm/v2/Leads?page=1&per_page=200",
        json: { data: [{ id: "1", Email: "a@example.com" }], info: { per_page: 200, count: 1, page: 1, more_records: true } },
      },
      {
        url: "https://www.zohoapis.com/crm/v2/Leads?page=2&per_page=200",
        json: { data: [{ id: "2" }], info: { per_page: 200, count: 1, page: 2, more_records: false } },
      },
    ]);

    const leads = await new ZohoClient(tokens).records("Leads").all();

    expect(leads.map((l) => l.id)).toEqual(["1", "2"]);
    expect(leads[0]?.Email).toBe("a@example.com");
    expect(calls[0]?.headers.authorization).toBe("Zoho-oauthtoken zoho-token");
  });

  it("should treat No Content as an empty module", async () => {
    stubFetch([{ url: /\/crm\/v2\/Leads/, status: 204 }]);

    expect(await new ZohoClient(tokens).records("Leads").list()).toEqual({ data: [], moreRecords: false, page: 1 });
    expect(await new ZohoClient(tokens).records("Leads").get("9")).toBeNull();
  });

  it("should return per-entry results on insert", async () => {
    const calls = stubFetch([
      {
        method: "POST",
        url: "https://www.zohoapis.com/crm/v2/Leads",
        json: {
          data: [
            { code: "SUCCESS", status: "success", message: "record added", details: { id: "555" } },
            { code: "DUPLICATE_DATA", status: "error", message: "duplicate data", details: { id: "444" } },
            { code: "INVALID_DATA", status: "error", message: "invalid data", details: {} },
          ],
        },
      },
    ]);

    const results = await new ZohoClient(tokens).records("Leads").insert([{ Last_Name: "Lee" }]);

    expect(results.map(resultId)).toEqual(["555", "444", null]);
    expect(JSON.parse(calls[0]?.body ?? "")).toEqual({ data: [{ Last_Name: "Lee" }] });
  });

  it("should delete by comma-joined ids", async () => {
    const calls = stubFetch([
      {
        method: "DELETE",
        url: "https://www.zohoapis.com/crm/v2/Leads?ids=1%2C2&wf_trigger=false",
        json: { data: [{ code: "SUCCESS", status: "success", message: "deleted", details: { id: "1" } }] },
      },
    ]);

    const results = await new ZohoClient(tokens).records("Leads").delete(["1", "2"]);

    expect(results).toHaveLength(1);
    expect(calls).toHaveLength(1);
  });
});
