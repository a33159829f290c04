import { readFileSync } from "fs";
import { resolve } from "path";

export type ColumnMeta = {
  name: string;
  type: string;
  pk: boolean;
};

export type TableCard = {
  name: string;
  columns: ColumnMeta[];
};

export type ReconciliationSchema = {
  ddl: string;
  tables: TableCard[];
  joinHints: string[];
};

export const PROVIDER_TABLE = "provider_payment_transaction";
export const BANK_TABLE = "bank_payment_transaction";
export const JOIN_KEY = "psp_reference";

export const PROVIDER_STATUSES = ["Refused", "Settled", "Cancelled", "SettledExternally", "Authorised"] as const;
export const BANK_TRANSACTION_TYPES = ["Authorize", "Void", "Capture"] as const;

export const DEFAULT_SCHEMA_PATH = resolve(__dirname, "../../schema/reconciliation.sql");

const TABLE_RE = /CREATE TABLE\s+(\w+)\s*\(([\s\S]*?)\n\);/gi;
const COLUMN_RE = /^\s*(\w+)\s+([A-Z]+(?:\s*\([\d,\s]+\))?)(.*)$/i;

export function parseTables(ddl: string): TableCard[] {
  const tables: TableCard[] = [];
  for (const m of ddl.matchAll(TABLE_RE)) {
    const columns: ColumnMeta[] = [];
    for (const line of m[2].split("\n")) {
      const c = line.match(COLUMN_RE);
      if (!c) continue;
      columns.push({
        name: c[1],
        type: c[2].replace(/\s+/g, ""),
        pk: /primary key/i.test(c[3]),
      });
    }
    tables.push({ name: m[1], columns });
  }
  return tables;
}

export function buildSchema(ddl: string): ReconciliationSchema {
  const tables = parseTables(ddl);
  const names = new Set(tables.map((t) => t.name));
  for (const required of [PROVIDER_TABLE, BANK_TABLE]) {
    if (!names.has(required)) throw new Error(`Schema is missing table ${required}`);
  }
  return {
    ddl: ddl.trim(),
    tables,
    joinHints: [`${BANK_TABLE}.${JOIN_KEY} -> ${PROVIDER_TABLE}.${JOIN_KEY}`],
  };
}

export function loadSchema(path: string = DEFAULT_SCHEMA_PATH): ReconciliationSchema {
  return buildSchema(readFileSync(path, "utf8"));
}

export function columnNames(schema: ReconciliationSchema, table: string): string[] {
  return schema.tables.find((t) => t.name === table)?.columns.map((c) => c.name) ?? [];
}
