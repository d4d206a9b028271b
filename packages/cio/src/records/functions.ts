/**
 * Functions
 *
 * One row per job run. The job runner creates it in progress and completes
 * it with the captured logs.
 */

import { randomUUID } from "node:crypto";
import { z } from "zod";
import { RecordStore, defineRecord, type Queryable, type Stored } from "@cio/connector";
import { companyId, optionalTimestamp, text, timestamp } from "./fields.js";

export const MAX_LOGS_LENGTH = 100_000;

export const FunctionStatus = z.enum(["in_progress", "completed"]);
export type FunctionStatus = z.infer<typeof FunctionStatus>;

export const FunctionConclusion = z.enum(["success", "failure", "timed_out", "neutral", ""]);
export type FunctionConclusion = z.infer<typeof FunctionConclusion>;

export const NewFunctionSchema = z.object({
  name: z.string(),
  status: FunctionStatus,
  conclusion: FunctionConclusion.default(""),
  created_at: timestamp,
  completed_at: optionalTimestamp,
  logs: text,
  saga_id: z.string(),
  cio_company_id: companyId,
});

export type NewFunction = z.infer<typeof NewFunctionSchema>;
export type FunctionRecord = Stored<NewFunction>;

export function truncateLogs(logs: string): string {
  return logs.length > MAX_LOGS_LENGTH ? logs.slice(0, MAX_LOGS_LENGTH) : logs;
}

export const Functions = defineRecord({
  name: "Function",
  table: "functions",
  schema: NewFunctionSchema,
  matchOn: ["saga_id"],
  airtable: {
    base: "cio",
    table: "Functions",
    beforeUpdate: (record, fields) => ({ ...fields, logs: truncateLogs(record.logs) }),
  },
});

export type StatusColor = "blue" | "green" | "red" | "yellow";

export function statusColor(status: FunctionStatus, conclusion: FunctionConclusion): StatusColor {
  if (status === "in_progress") return "blue";
  if (conclusion === "success") return "green";
  if (conclusion === "failure" || conclusion === "timed_out") return "red";
  return "yellow";
}

export async function startFunction(
  db: Queryable,
  name: string,
  cioCompanyId: number,
  now: Date = new Date()
): Promise<FunctionRecord> {
  return new RecordStore(Functions, db).create({
    name,
    status: "in_progress",
    conclusion: "",
    created_at: now,
    completed_at: null,
    logs: "",
    saga_id: randomUUID(),
    cio_company_id: cioCompanyId,
  });
}

export async function completeFunction(
  db: Queryable,
  fn: FunctionRecord,
  conclusion: Exclude<FunctionConclusion, "">,
  logs: string,
  now: Date = new Date()
): Promise<FunctionRecord> {
  return new RecordStore(Functions, db).update({
    ...fn,
    status: "completed",
    conclusion,
    completed_at: now,
    logs,
  });
}

export async function getFunctionBySagaId(db: Queryable, sagaId: string): Promise<FunctionRecord | null> {
  const [fn] = await new RecordStore(Functions, db).select({ saga_id: sagaId }, { limit: 1 });
  return fn ?? null;
}

/**
 * Most recent run of a job that is still in progress.
 */
export async function getRunningFunction(db: Queryable, name: string): Promise<FunctionRecord | null> {
  const [fn] = await new RecordStore(Functions, db).select(
    { name, status: "in_progress" },
    { orderBy: "id", descending: true, limit: 1 }
  );
  return fn ?? null;
}
