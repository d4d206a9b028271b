/**
 * Employees from Gusto payroll
 */

import { z } from "zod";
import { defineRecord, type Stored, type gusto } from "@cio/connector";
import { companyId, flag, text } from "./fields.js";

export const NewEmployeeSchema = z.object({
  email: z.string(),
  gusto_id: text,
  first_name: text,
  last_name: text,
  preferred_name: text,
  department: text,
  job_title: text,
  start_date: text,
  phone: text,
  manager_gusto_id: text,
  onboarded: flag,
  terminated: flag,
  cio_company_id: companyId,
});

export type NewEmployee = z.infer<typeof NewEmployeeSchema>;
export type EmployeeRecord = Stored<NewEmployee>;

export const Employees = defineRecord({
  name: "Employee",
  table: "employees",
  schema: NewEmployeeSchema,
  matchOn: ["cio_company_id", "email"],
  airtable: {
    base: "directory",
    table: "Employees",
  },
});

/**
 * The primary job carries the title and start date; null without an email.
 */
export function employeeFromGusto(employee: gusto.GustoEmployee, cioCompanyId: number): NewEmployee | null {
  const email = (employee.email ?? "").trim().toLowerCase();
  if (email === "") {
    return null;
  }

  const job = employee.jobs.find((j) => j.primary) ?? employee.jobs[0];
  return {
    email,
    gusto_id: employee.id,
    first_name: employee.first_name,
    last_name: employee.last_name,
    preferred_name: employee.preferred_first_name ?? "",
    department: employee.department ?? "",
    job_title: job?.title ?? "",
    start_date: job?.hire_date ?? "",
    phone: employee.phone ?? "",
    manager_gusto_id: employee.manager_id == null ? "" : String(employee.manager_id),
    onboarded: employee.onboarded,
    terminated: employee.terminated,
    cio_company_id: cioCompanyId,
  };
}
