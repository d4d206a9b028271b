/**
 * Background checks from Checkr, one per candidate report
 */

import { z } from "zod";
import { defineRecord, type Stored, type checkr } from "@cio/connector";
import { companyId, optionalTimestamp, text } from "./fields.js";

export const CheckType = z.enum(["criminal", "motor_vehicle", "other"]);
export type CheckType = z.infer<typeof CheckType>;

export const NewBackgroundCheckSchema = z.object({
  candidate_id: z.string(),
  report_id: z.string(),
  email: text,
  first_name: text,
  last_name: text,
  status: text,
  result: text,
  adjudication: text,
  package: text,
  check_type: CheckType.default("other"),
  created_at: optionalTimestamp,
  completed_at: optionalTimestamp,
  cio_company_id: companyId,
});

export type NewBackgroundCheck = z.infer<typeof NewBackgroundCheckSchema>;
export type BackgroundCheck = Stored<NewBackgroundCheck>;

export const BackgroundChecks = defineRecord({
  name: "BackgroundCheck",
  table: "background_checks",
  schema: NewBackgroundCheckSchema,
  matchOn: ["cio_company_id", "candidate_id", "report_id"],
  airtable: {
    base: "hiring",
    table: "Background Checks",
  },
});

export function checkTypeOf(packageName: string): CheckType {
  if (packageName.includes("premium_criminal")) return "criminal";
  if (packageName.includes("motor_vehicle")) return "motor_vehicle";
  return "other";
}

function optionalDate(value: string | null | undefined): Date | null {
  return value ? new Date(value) : null;
}

export function backgroundCheckFromReport(
  candidate: checkr.Candidate,
  report: checkr.Report,
  cioCompanyId: number
): NewBackgroundCheck {
  return {
    candidate_id: candidate.id,
    report_id: report.id,
    email: candidate.email ?? "",
    first_name: candidate.first_name ?? "",
    last_name: candidate.last_name ?? "",
    status: report.status,
    result: report.result ?? "",
    adjudication: report.adjudication ?? candidate.adjudication ?? "",
    package: report.package,
    check_type: checkTypeOf(report.package),
    created_at: optionalDate(report.created_at),
    completed_at: optionalDate(report.completed_at),
    cio_company_id: cioCompanyId,
  };
}
