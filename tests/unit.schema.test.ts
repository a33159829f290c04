import { describe, it, expect } from "vitest";
import {
  BANK_TABLE,
  PROVIDER_TABLE,
  buildSchema,
  columnNames,
  loadSchema,
  parseTables,
} from "../src/schema/reconciliation";

describe("reconciliation schema", () => {
  const schema = loadSchema();

  it("loads both tables from the bundled DDL", () => {
    expect(schema.tables.map((t) => t.name)).toEqual([PROVIDER_TABLE, BANK_TABLE]);
    expect(schema.joinHints).toEqual([
      "bank_payment_transaction.psp_reference -> provider_payment_transaction.psp_reference",
    ]);
  });

  it("keys both tables by psp_reference", () => {
    for (const table of schema.tables) {
      expect(table.columns.filter((c) => c.pk).map((c) => c.name)).toEqual(["psp_reference"]);
    }
  });

  it("lists provider columns in declaration order", () => {
    expect(columnNames(schema, PROVIDER_TABLE)).toEqual([
      "psp_reference",
      "merchant_reference",
      "transaction_datetime",
      "timezone",
      "payment_amount",
      "currency",
      "payment_method",
      "payment_status",
      "risk_score",
    ]);
    expect(columnNames(schema, BANK_TABLE)).toHaveLength(23);
  });

  it("parses column types", () => {
    const [table] = parseTables("CREATE TABLE t (\n  id INTEGER PRIMARY KEY,\n  amount NUMERIC(10, 2)\n);");
    expect(table.columns).toEqual([
      { name: "id", type: "INTEGER", pk: true },
      { name: "amount", type: "NUMERIC(10,2)", pk: false },
    ]);
  });

  it("rejects a schema without the two transaction tables", () => {
    expect(() => buildSchema("CREATE TABLE t (\n  id INTEGER\n);")).toThrow(
      "Schema is missing table provider_payment_transaction",
    );
  });
});
