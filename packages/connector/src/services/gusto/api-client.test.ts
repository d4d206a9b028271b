import { describe, it, expect, vi, beforeEach } from "vitest";
import { GustoClient, gustoConsentUrl, gustoExchangeCode } from "./api-client.js";
import { stubFetch } from "../../testing/fetch.js";

const tokens = { accessToken: async () => "gusto-token" };

function employee(id: number) {
  return { id, first_name: "First", last_name: `Last${id}`, email: `e${id}@example.com` };
}

describe("gusto api-client", () => {
  beforeEach(() => {
    vi.spyOn(console, "log").mockImplementation(() => {});
  });

  it("should build the consent URL", () => {
    expect(
      gustoConsentUrl({ clientId: "cid", clientSecret: "test-secret", redirectUri: "https://cio.example.com/cb" })
    ).toBe(
      "https://api.gusto.com/oauth/authorize?client_id=cid&response_type=code&redirect_uri=https%3A%2F%2Fcio.example.com%2Fcb"
    );
  });

  it("should exchange a code for tokens", async () => {
    const calls = stubFetch([
      {
        method: "POST",
        url: "https://api.gusto.com/oauth/token",
        json: { access_token: "a", refresh_token: "r", expires_in: 7200 },
      },
    ]);

    const result = await gustoExchangeCode(
      { clientId: "cid", clientSecret: "test-secret", redirectUri: "https://cio.example.com/cb" },
      "code-1"
    );

    expect(result.refreshToken).toBe("r");
    expect(calls[0]?.body).toContain("grant_type=authorization_code&code=code-1");
  });

  it("should page employees until a short page", async () => {
    const calls = stubFetch([
      {
        url: "https://api.gusto.com/v1/companies/77/employees?page=1&per=100",
        json: Array.from({ length: 100 }, (_, i) => employee(i + 1)),
      },
      {
        url: "https://api.gusto.com/v1/companies/77/employees?page=2&per=100",
        json: [employee(101)],
      },
    ]);

    const employees = await new GustoClient(tokens).listEmployees("77");

    expect(employees).toHaveLength(101);
    expect(employees[100]).toMatchObject({ id: "101", last_name: "Last101", terminated: false });
    expect(calls[0]?.headers.authorization).toBe("Bearer gusto-token");
  });

  it("should find the payroll admin company", async () => {
    stubFetch([
      {
        url: "https://api.gusto.com/v1/me",
        json: { email: "admin@example.com", roles: { payroll_admin: { companies: [{ id: 77, name: "Example" }] } } },
      },
    ]);

    expect(await new GustoClient(tokens).companyId()).toBe("77");
  });
});
