import { describe, it, expect, vi, beforeEach } from "vitest";
import { checkr } from "@cio/connector";
import { stubFetch } from "@cio/connector/testing";
import { base, testContext, type TestContext } from "../testing.js";
import { refreshBackgroundCheck, syncBackgroundChecks } from "./sync-background-checks.js";

const candidate = {
  id: "c-1",
  first_name: "Ada",
  last_name: "Lovelace",
  email: "ada@example.com",
  report_ids: ["r-1", "r-2"],
};

function report(id: string, packageName: string, status: string) {
  return { id, status, package: packageName, candidate_id: "c-1", created_at: "2024-02-01T00:00:00Z" };
}

describe("background checks", () => {
  let ctx: TestContext;

  beforeEach(() => {
    vi.spyOn(console, "log").mockImplementation(() => {});
    ctx = testContext();
  });

  it("should sync every report of every candidate", async () => {
    const calls = stubFetch([
      { url: "https://api.checkr.com/v1/candidates", json: { data: [candidate], next_href: null } },
      { url: "https://api.checkr.com/v1/reports/r-1", json: report("r-1", "premium_criminal", "clear") },
      { url: "https://api.checkr.com/v1/reports/r-2", json: report("r-2", "driver_motor_vehicle", "pending") },
    ]);

    const reports = await syncBackgroundChecks(ctx);

    expect(reports).toBe(2);
    expect(calls[0]?.headers.authorization).toBe(`Basic ${Buffer.from("test-checkr-key:").toString("base64")}`);
    expect(ctx.db.rows("background_checks").map((row) => [row.report_id, row.check_type, row.status])).toEqual([
      ["r-1", "criminal", "clear"],
      ["r-2", "motor_vehicle", "pending"],
    ]);
    expect(base(ctx, "hiring").records("Background Checks")).toHaveLength(2);
  });

  it("should fetch the candidate of a single report", async () => {
    stubFetch([{ url: "https://api.checkr.com/v1/candidates/c-1", json: candidate }]);
    const first = checkr.ReportSchema.parse(report("r-1", "premium_criminal", "pending"));

    const created = await refreshBackgroundCheck(ctx, first);
    const updated = await refreshBackgroundCheck(ctx, { ...first, status: "complete", result: "clear" });

    expect(created.email).toBe("ada@example.com");
    expect(updated.id).toBe(created.id);
    expect(updated).toMatchObject({ status: "complete", result: "clear" });
  });
});
