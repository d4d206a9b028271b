import { describe, it, expect, vi, beforeEach } from "vitest";
import { completeFunction, getFunctionBySagaId, startFunction } from "../records/functions.js";
import { TEST_NOW, base, testContext, type TestContext } from "../testing.js";
import { syncFunctions } from "./sync-functions.js";

const hoursAgo = (hours: number): Date => new Date(TEST_NOW.getTime() - hours * 60 * 60 * 1000);

describe("syncFunctions", () => {
  let ctx: TestContext;

  beforeEach(() => {
    vi.spyOn(console, "log").mockImplementation(() => {});
    ctx = testContext();
  });

  it("should time out runs older than a day", async () => {
    const stale = await startFunction(ctx.db, "sync-travel", ctx.company.id, hoursAgo(24 + 1 / 60));
    const fresh = await startFunction(ctx.db, "sync-travel", ctx.company.id, hoursAgo(23));

    await syncFunctions(ctx);

    expect(await getFunctionBySagaId(ctx.db, stale.saga_id)).toMatchObject({
      status: "completed",
      conclusion: "timed_out",
      completed_at: TEST_NOW,
    });
    expect((await getFunctionBySagaId(ctx.db, fresh.saga_id))?.status).toBe("in_progress");
  });

  it("should conclude completed runs without a conclusion as neutral", async () => {
    const fn = await startFunction(ctx.db, "sync-zoho", ctx.company.id, hoursAgo(1));
    await completeFunction(ctx.db, fn, "success", "", TEST_NOW);
    const unconcluded = await startFunction(ctx.db, "sync-zoho", ctx.company.id, hoursAgo(1));
    ctx.db.rows("functions").forEach((row) => {
      if (row.saga_id === unconcluded.saga_id) {
        row.status = "completed";
      }
    });

    await syncFunctions(ctx);

    expect((await getFunctionBySagaId(ctx.db, unconcluded.saga_id))?.conclusion).toBe("neutral");
    expect((await getFunctionBySagaId(ctx.db, fn.saga_id))?.conclusion).toBe("success");
    expect(base(ctx, "cio").records("Functions")).toHaveLength(2);
  });
});
