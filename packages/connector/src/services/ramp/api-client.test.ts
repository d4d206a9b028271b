import { describe, it, expect, vi, beforeEach } from "vitest";
import { RampClient, rampGrant } from "./api-client.js";
import { stubFetch } from "../../testing/fetch.js";

const tokens = { accessToken: async () => "ramp-token" };

function transaction(id: string) {
  return {
    id,
    amount: 12.5,
    merchant_name: "Example Hardware",
    memo: null,
    state: "CLEARED",
    user_transaction_time: "2024-02-03T04:05:06Z",
    card_holder: { first_name: "Ann", last_name: "Lee", department_name: "Engineering" },
  };
}

describe("ramp api-client", () => {
  beforeEach(() => {
    vi.spyOn(console, "log").mockImplementation(() => {});
  });

  it("should follow page.next until it is empty", async () => {
    const calls = stubFetch([
      {
        url: "https://api.ramp.com/developer/v1/transactions?from_date=2024-01-01T00%3A00%3A00.000Z",
        json: { data: [transaction("t1")], page: { next: "https://api.ramp.com/developer/v1/transactions?start=t1" } },
      },
      {
        url: "https://api.ramp.com/developer/v1/transactions?start=t1",
        json: { data: [transaction("t2")], page: { next: null } },
      },
    ]);

    const transactions = await new RampClient(tokens).listTransactions({ fromDate: new Date("2024-01-01T00:00:00Z") });

    expect(transactions.map((t) => t.id)).toEqual(["t1", "t2"]);
    expect(transactions[0]).toMatchObject({ memo: "", user_transaction_time: new Date("2024-02-03T04:05:06Z") });
    expect(calls[1]?.headers.authorization).toBe("Bearer ramp-token");
  });

  it("should stop when page.next repeats", async () => {
    const calls = stubFetch([
      {
        url: "https://api.ramp.com/developer/v1/users",
        json: { data: [{ id: "u1", email: "a@example.com", role: "BUSINESS_USER" }], page: { next: "https://api.ramp.com/developer/v1/users?start=u1" } },
      },
      {
        url: "https://api.ramp.com/developer/v1/users?start=u1",
        json: { data: [], page: { next: "https://api.ramp.com/developer/v1/users?start=u1" } },
      },
    ]);

    const users = await new RampClient(tokens).listUsers();

    expect(users.map((u) => u.email)).toEqual(["a@example.com"]);
    expect(calls).toHaveLength(2);
  });

  it("should invite a user through the deferred endpoint", async () => {
    const calls = stubFetch([
      { method: "POST", url: "https://api.ramp.com/developer/v1/users/deferred", json: { id: "task-1" } },
    ]);

    const id = await new RampClient(tokens).inviteUser({
      email: "ann@example.com",
      firstName: "Ann",
      lastName: "Lee",
      role: "BUSINESS_USER",
    });

    expect(id).toBe("task-1");
    expect(JSON.parse(calls[0]?.body ?? "")).toMatchObject({
      email: "ann@example.com",
      first_name: "Ann",
      last_name: "Lee",
      phone: "",
      role: "BUSINESS_USER",
    });
  });

  it("should request scoped client credentials", async () => {
    const calls = stubFetch([
      { method: "POST", url: "https://api.ramp.com/developer/v1/token", json: { access_token: "t", expires_in: 864000 } },
    ]);

    await rampGrant({ clientId: "cid", clientSecret: "test-secret" }, ["users:read"])(null);

    expect(calls[0]?.body).toBe("grant_type=client_credentials&scope=users%3Aread");
  });
});
