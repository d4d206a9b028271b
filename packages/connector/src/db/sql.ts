/**
 * Parameterized SQL builders for the record store
 */

export interface Statement {
  text: string;
  values: unknown[];
}

export type Row = Record<string, unknown>;

export function quoteIdent(name: string): string {
  return `"${name.replace(/"/g, '""')}"`;
}

/**
 * Table names may be schema-qualified ("raw.ramp__transactions").
 */
export function quoteTable(name: string): string {
  return name.split(".").map(quoteIdent).join(".");
}

function whereClause(where: Row, startIndex: number): { text: string; values: unknown[] } {
  const entries = Object.entries(where);
  if (entries.length === 0) {
    return { text: "", values: [] };
  }
  const values: unknown[] = [];
  const conditions = entries.map(([column, value]) => {
    if (value === null) {
      return `${quoteIdent(column)} IS NULL`;
    }
    values.push(value);
    return `${quoteIdent(column)} = $${startIndex + values.length - 1}`;
  });
  return { text: ` WHERE ${conditions.join(" AND ")}`, values };
}

export function buildInsert(table: string, row: Row): Statement {
  const columns = Object.keys(row);
  const placeholders = columns.map((_, i) => `$${i + 1}`);
  return {
    text: `INSERT INTO ${quoteTable(table)} (${columns.map(quoteIdent).join(", ")}) VALUES (${placeholders.join(", ")}) RETURNING *`,
    values: columns.map((c) => row[c]),
  };
}

export function buildUpdate(table: string, row: Row, where: Row): Statement {
  const columns = Object.keys(row);
  const assignments = columns.map((c, i) => `${quoteIdent(c)} = $${i + 1}`);
  const filter = whereClause(where, columns.length + 1);
  return {
    text: `UPDATE ${quoteTable(table)} SET ${assignments.join(", ")}${filter.text} RETURNING *`,
    values: [...columns.map((c) => row[c]), ...filter.values],
  };
}

export interface SelectOptions {
  orderBy?: string;
  descending?: boolean;
  limit?: number;
}

export function buildSelect(table: string, where: Row = {}, options: SelectOptions = {}): Statement {
  const filter = whereClause(where, 1);
  let text = `SELECT * FROM ${quoteTable(table)}${filter.text}`;
  if (options.orderBy) {
    text += ` ORDER BY ${quoteIdent(options.orderBy)}${options.descending ? " DESC" : ""}`;
  }
  const values = [...filter.values];
  if (options.limit !== undefined) {
    values.push(options.limit);
    text += ` LIMIT $${values.length}`;
  }
  return { text, values };
}

export function buildDelete(table: string, where: Row): Statement {
  const filter = whereClause(where, 1);
  return { text: `DELETE FROM ${quoteTable(table)}${filter.text}`, values: filter.values };
}
