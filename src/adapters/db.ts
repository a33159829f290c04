import type { DatabaseError } from "../errors";

export type Scalar = string | number | boolean | null;

export type Row = Record<string, Scalar>;

/** Rows keyed by column name; `rowCount` always equals `rows.length`. */
export type TabularResult = {
  columns: string[];
  rows: Row[];
  rowCount: number;
};

export type ExecutionOutcome =
  | { ok: true; result: TabularResult }
  | { ok: false; error: DatabaseError };

/** Raw result set in array mode, as returned by a driver connection. */
export type RawResultSet = {
  fields: string[];
  rows: unknown[][];
};

export interface SqlConnection {
  connect(): Promise<void>;
  run(sql: string): Promise<RawResultSet>;
  end(): Promise<void>;
}

export interface QueryGateway {
  execute(sql: string): Promise<ExecutionOutcome>;
}

export type SizeCheck = {
  isTooLarge: boolean;
  message: string;
};

export function tooLargeMessage(maxRows: number): string {
  return `Too many records found for the prompt (exceeds ${maxRows} records). Please refine your query.`;
}

export function checkSize(result: TabularResult, maxRows: number): SizeCheck {
  if (result.rowCount > maxRows) {
    return { isTooLarge: true, message: tooLargeMessage(maxRows) };
  }
  return { isTooLarge: false, message: "Result size is acceptable." };
}

export function toScalar(value: unknown): Scalar {
  if (value === null || value === undefined) return null;
  if (typeof value === "string" || typeof value === "boolean") return value;
  if (typeof value === "number") return Number.isFinite(value) ? value : String(value);
  if (typeof value === "bigint") return value.toString();
  if (value instanceof Date) return Number.isNaN(value.getTime()) ? null : value.toISOString();
  if (Buffer.isBuffer(value)) return value.toString("hex");
  if (typeof value === "object") return JSON.stringify(value);
  return String(value);
}

export function uniqueColumnNames(fields: string[]): string[] {
  const taken = new Set<string>();
  return fields.map((f) => {
    let name = f;
    for (let n = 2; taken.has(name); n++) name = `${f}_${n}`;
    taken.add(name);
    return name;
  });
}

export function toTabular(raw: RawResultSet): TabularResult {
  const columns = uniqueColumnNames(raw.fields);
  const rows = raw.rows.map((values) => {
    const row: Row = {};
    columns.forEach((col, i) => {
      row[col] = toScalar(values[i]);
    });
    return row;
  });
  return { columns, rows, rowCount: rows.length };
}
