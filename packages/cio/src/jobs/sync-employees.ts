/**
 * Gusto employees into the directory base
 */

import { RecordStore, setupLogger } from "@cio/connector";
import { Employees, employeeFromGusto } from "../records/employees.js";
import { mirrorToAirtable, type JobContext } from "./context.js";

const logger = setupLogger("sync-employees");

export async function syncEmployees(ctx: JobContext): Promise<number> {
  const gusto = await ctx.clients.gusto();
  const employees = await gusto.listEmployees(await gusto.companyId());

  const store = new RecordStore(Employees, ctx.db);
  let synced = 0;
  for (const employee of employees) {
    const record = employeeFromGusto(employee, ctx.company.id);
    if (record === null) {
      logger.warn(`Gusto employee ${employee.id} has no email, skipping`);
      continue;
    }
    await store.upsert(record);
    synced++;
  }
  logger.info(`Synced ${synced} of ${employees.length} Gusto employees`);

  await mirrorToAirtable(ctx, Employees);
  return synced;
}
