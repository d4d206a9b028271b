import { describe, it, expect, vi, beforeEach } from "vitest";
import { AirtableClient, chunk } from "./api-client.js";
import { ScimError } from "./scim.js";
import { stubFetch } from "../../testing/fetch.js";

const BASE = "https://api.airtable.com/v0/appTest";

function client(): AirtableClient {
  return new AirtableClient({
    apiKey: "test-key",
    baseId: "appTest",
    enterpriseAccountId: "entTest",
    retry: { sleep: async () => {} },
  });
}

describe("airtable api-client", () => {
  beforeEach(() => {
    vi.spyOn(console, "log").mockImplementation(() => {});
  });

  it("should chunk lists", () => {
    expect(chunk([1, 2, 3, 4, 5], 2)).toEqual([[1, 2], [3, 4], [5]]);
    expect(chunk([], 10)).toEqual([]);
  });

  describe("listRecords", () => {
    it("should follow offset pagination", async () => {
      const calls = stubFetch([
        {
          url: `${BASE}/Bookings?pageSize=100&view=Grid+view`,
          json: { records: [{ id: "rec1", fields: { id: 1 } }], offset: "itr2" },
        },
        {
          url: `${BASE}/Bookings?pageSize=100&view=Grid+view&offset=itr2`,
          json: { records: [{ id: "rec2", fields: { id: 2 } }] },
        },
      ]);

      const records = await client().listRecords("Bookings", { view: "Grid view" });

      expect(records.map((r) => r.id)).toEqual(["rec1", "rec2"]);
      expect(calls).toHaveLength(2);
      expect(calls[0]?.headers.authorization).toBe("Bearer test-key");
    });

    it("should encode table names", async () => {
      const calls = stubFetch([{ url: `${BASE}/API%20Tokens?pageSize=100`, json: { records: [] } }]);

      expect(await client().listRecords("API Tokens")).toEqual([]);
      expect(calls).toHaveLength(1);
    });
  });

  it("should return null for a missing record", async () => {
    stubFetch([{ url: `${BASE}/Bookings/recGone`, status: 404, json: { error: "NOT_FOUND" } }]);

    expect(await client().getRecord("Bookings", "recGone")).toBeNull();
  });

  it("should create in batches of 10 with typecast", async () => {
    const calls = stubFetch([
      { method: "POST", url: `${BASE}/Bookings`, json: { records: [{ id: "recA", fields: {} }] } },
    ]);

    const fields = Array.from({ length: 12 }, (_, i) => ({ id: i }));
    const created = await client().createRecords("Bookings", fields);

    expect(calls).toHaveLength(2);
    expect(created).toHaveLength(2);
    const firstBody: unknown = JSON.parse(calls[0]?.body ?? "{}");
    expect(firstBody).toMatchObject({ typecast: true });
    expect(JSON.parse(calls[1]?.body ?? "{}")).toEqual({ records: [{ fields: { id: 10 } }, { fields: { id: 11 } }], typecast: true });
  });

  it("should send PATCH updates", async () => {
    const calls = stubFetch([
      { method: "PATCH", url: `${BASE}/Bookings`, json: { records: [{ id: "rec1", fields: { a: 1 } }] } },
    ]);

    await client().updateRecords("Bookings", [{ id: "rec1", fields: { a: 1 } }]);

    expect(JSON.parse(calls[0]?.body ?? "{}")).toEqual({ records: [{ id: "rec1", fields: { a: 1 } }], typecast: true });
  });

  it("should delete with records[] query params", async () => {
    const calls = stubFetch([
      {
        method: "DELETE",
        url: `${BASE}/Bookings?records%5B%5D=rec1&records%5B%5D=rec2`,
        json: { records: [{ id: "rec1", deleted: true }, { id: "rec2", deleted: true }] },
      },
    ]);

    await client().deleteRecords("Bookings", ["rec1", "rec2"]);

    expect(calls).toHaveLength(1);
  });

  it("should list enterprise users", async () => {
    stubFetch([
      {
        url: "https://api.airtable.com/v0/meta/enterpriseAccounts/entTest",
        json: { id: "entTest", userIds: ["usr1", "usr2"] },
      },
      {
        url: "https://api.airtable.com/v0/meta/enterpriseAccounts/entTest/users?id%5B%5D=usr1&id%5B%5D=usr2",
        json: {
          users: [
            { id: "usr1", email: "a@example.com", state: "provisioned" },
            { id: "usr2", email: "b@example.com", state: "deactivated" },
          ],
        },
      },
    ]);

    const users = await client().listUsers();

    expect(users.map((u) => u.email)).toEqual(["a@example.com", "b@example.com"]);
  });

  describe("scim", () => {
    it("should list users", async () => {
      stubFetch([
        {
          url: "https://airtable.com/scim/v2/Users",
          json: {
            schemas: ["urn:ietf:params:scim:api:messages:2.0:ListResponse"],
            totalResults: 1,
            startIndex: 1,
            itemsPerPage: 1,
            Resources: [
              {
                schemas: ["urn:ietf:params:scim:schemas:core:2.0:User"],
                id: "usr1",
                userName: "a@example.com",
                name: { familyName: "A", givenName: "Ann" },
                active: true,
              },
            ],
          },
        },
      ]);

      const users = await client().scim.users.list();

      expect(users).toHaveLength(1);
      expect(users[0]?.emails).toEqual([]);
    });

    it("should map a 401 to the enterprise error message", async () => {
      stubFetch([
        {
          url: "https://airtable.com/scim/v2/Users",
          status: 401,
          json: { error: { type: "AUTHENTICATION_REQUIRED", message: "Authentication required" } },
        },
      ]);

      const error = await client().scim.users.list().catch((e: unknown) => e);

      expect(error).toBeInstanceOf(ScimError);
      expect(error instanceof ScimError && error.detail).toBe("Authentication required");
    });

    it("should map other errors to the SCIM detail and 404 to null", async () => {
      stubFetch([
        {
          method: "POST",
          url: "https://airtable.com/scim/v2/Groups",
          status: 400,
          json: { schemas: [], status: 400, detail: "displayName is required" },
        },
        { url: "https://airtable.com/scim/v2/Groups/grpGone", status: 404, json: { status: 404, detail: "Not found" } },
      ]);

      await expect(client().scim.groups.create("")).rejects.toThrow("Airtable SCIM error (400): displayName is required");
      expect(await client().scim.groups.get("grpGone")).toBeNull();
    });
  });
});
