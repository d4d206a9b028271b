/**
 * In-process stand-in for Postgres
 *
 * Understands the statements built by db/sql.ts. Anything else must be
 * answered by a handler registered with onQuery().
 */

import type { QueryResult, Queryable } from "../db/client.js";
import type { Row } from "../db/sql.js";

type Handler = (values: unknown[], db: MemoryDb) => QueryResult | Promise<QueryResult>;

interface Condition {
  column: string;
  param: number | null;
}

function idents(text: string): string[] {
  return Array.from(text.matchAll(/"((?:[^"]|"")+)"/g), (m) => (m[1] ?? "").replace(/""/g, '"'));
}

function parseConditions(clause: string | undefined): Condition[] {
  if (!clause) return [];
  return clause.split(" AND ").map((part) => {
    const [column = ""] = idents(part);
    const param = /\$(\d+)/.exec(part);
    return { column, param: param ? parseInt(param[1] ?? "0", 10) : null };
  });
}

function matches(row: Row, conditions: Condition[], values: unknown[]): boolean {
  return conditions.every(({ column, param }) => {
    const value = row[column];
    if (param === null) {
      return value === null || value === undefined;
    }
    const expected = values[param - 1];
    if (value instanceof Date && expected instanceof Date) {
      return value.getTime() === expected.getTime();
    }
    return value === expected;
  });
}

export class MemoryDb implements Queryable {
  readonly statements: { text: string; values: unknown[] }[] = [];
  private readonly tables = new Map<string, Row[]>();
  private readonly sequences = new Map<string, number>();
  private readonly handlers: { pattern: RegExp; handle: Handler }[] = [];

  rows(table: string): Row[] {
    let rows = this.tables.get(table);
    if (rows === undefined) {
      rows = [];
      this.tables.set(table, rows);
    }
    return rows;
  }

  private nextId(table: string): number {
    const id = (this.sequences.get(table) ?? 0) + 1;
    this.sequences.set(table, id);
    return id;
  }

  /** Insert rows directly, assigning ids */
  seed(table: string, rows: Row[]): Row[] {
    return rows.map((row) => {
      const stored = { airtable_record_id: "", ...row, id: this.nextId(table) };
      this.rows(table).push(stored);
      return stored;
    });
  }

  onQuery(pattern: RegExp, handle: Handler): void {
    this.handlers.push({ pattern, handle });
  }

  async query(text: string, values: unknown[] = []): Promise<QueryResult> {
    this.statements.push({ text, values });

    for (const handler of this.handlers) {
      if (handler.pattern.test(text)) {
        return handler.handle(values, this);
      }
    }

    const insert = /^INSERT INTO ("[^(]+") \((.+)\) VALUES \((.+)\) RETURNING \*$/.exec(text);
    if (insert) {
      const [table = ""] = idents(insert[1] ?? "");
      const columns = idents(insert[2] ?? "");
      const row: Row = { airtable_record_id: "" };
      columns.forEach((column, i) => {
        row[column] = values[i];
      });
      row.id = this.nextId(table);
      this.rows(table).push(row);
      return { rows: [{ ...row }], rowCount: 1 };
    }

    const update = /^UPDATE ("[^ ]+") SET (.+?)(?: WHERE (.+))? RETURNING \*$/.exec(text);
    if (update) {
      const [table = ""] = idents(update[1] ?? "");
      const assignments = parseConditions(update[2]?.split(", ").join(" AND "));
      const conditions = parseConditions(update[3]);
      const updated: Row[] = [];
      for (const row of this.rows(table)) {
        if (!matches(row, conditions, values)) continue;
        for (const { column, param } of assignments) {
          row[column] = param === null ? null : values[param - 1];
        }
        updated.push({ ...row });
      }
      return { rows: updated, rowCount: updated.length };
    }

    const select = /^SELECT \* FROM ("[^ ]+")(?: WHERE (.+?))?(?: ORDER BY "(\w+)"( DESC)?)?(?: LIMIT \$(\d+))?$/.exec(text);
    if (select) {
      const [table = ""] = idents(select[1] ?? "");
      let rows = this.rows(table).filter((row) => matches(row, parseConditions(select[2]), values));
      const orderBy = select[3];
      if (orderBy) {
        const direction = select[4] ? -1 : 1;
        rows = [...rows].sort((a, b) => (Number(a[orderBy]) - Number(b[orderBy])) * direction);
      }
      if (select[5]) {
        rows = rows.slice(0, Number(values[parseInt(select[5], 10) - 1]));
      }
      return { rows: rows.map((row) => ({ ...row })), rowCount: rows.length };
    }

    const del = /^DELETE FROM ("[^ ]+")(?: WHERE (.+))?$/.exec(text);
    if (del) {
      const [table = ""] = idents(del[1] ?? "");
      const conditions = parseConditions(del[2]);
      const rows = this.rows(table);
      const kept = rows.filter((row) => !matches(row, conditions, values));
      const removed = rows.length - kept.length;
      this.tables.set(table, kept);
      return { rows: [], rowCount: removed };
    }

    throw new Error(`MemoryDb cannot run: ${text}`);
  }
}
