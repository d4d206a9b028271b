/**
 * Column types shared by the record schemas
 *
 * Rows come from pg (numeric as string, timestamptz as Date) and from
 * Airtable (empty cells omitted, dates as ISO strings); both parse here.
 */

import { z } from "zod";

export const text = z
  .string()
  .nullable()
  .optional()
  .transform((v) => v ?? "");

export const flag = z
  .boolean()
  .nullable()
  .optional()
  .transform((v) => v ?? false);

export const amount = z
  .union([z.number(), z.string()])
  .nullable()
  .optional()
  .transform((v) => (v === null || v === undefined || v === "" ? 0 : Number(v)));

export const count = amount.transform((v) => Math.trunc(v));

export const timestamp = z.coerce.date();

export const optionalTimestamp = z.coerce
  .date()
  .nullable()
  .optional()
  .transform((v) => v ?? null);

export const list = z
  .array(z.string())
  .nullable()
  .optional()
  .transform((v) => v ?? []);

export const companyId = z.coerce.number().int();
