import { describe, it, expect } from "vitest";
import {
  capLimit,
  hasWriteKeyword,
  isSafeSelect,
  isSingleStatement,
  limitValue,
  maskQuoted,
  selectsStar,
  stripSqlDecoration,
} from "../src/guards/sqlGuard";

describe("sqlGuard", () => {
  it("accepts simple SELECT", () => {
    expect(isSafeSelect("SELECT 1")).toBe(true);
  });
  it("accepts CTEs", () => {
    expect(isSafeSelect("WITH t AS (SELECT 1 AS n) SELECT n FROM t")).toBe(true);
  });
  it("rejects writes and DDL", () => {
    expect(isSafeSelect("DELETE FROM x")).toBe(false);
    expect(isSafeSelect("CREATE TABLE x()")).toBe(false);
    expect(isSafeSelect("WITH d AS (DELETE FROM x RETURNING id) SELECT id FROM d")).toBe(false);
  });
  it("rejects semicolons between statements", () => {
    expect(isSafeSelect("SELECT 1; SELECT 2")).toBe(false);
    expect(isSingleStatement("SELECT 1;")).toBe(true);
  });
  it("rejects system schemas", () => {
    expect(isSafeSelect("SELECT relname FROM pg_catalog.pg_class")).toBe(false);
  });
  it("does not mistake column names for keywords", () => {
    expect(hasWriteKeyword("SELECT created_at, last_updated FROM t")).toBe(false);
    expect(hasWriteKeyword("select 1; drop table t")).toBe(true);
  });
  it("detects SELECT *", () => {
    expect(selectsStar("SELECT * FROM t")).toBe(true);
    expect(selectsStar("select distinct * from t")).toBe(true);
    expect(selectsStar("SELECT COUNT(*) FROM t")).toBe(false);
  });
  it("strips fences, language tags and trailing semicolons", () => {
    expect(stripSqlDecoration("```sql\nSELECT a FROM t;\n```")).toBe("SELECT a FROM t");
    expect(stripSqlDecoration("`SELECT a FROM t`")).toBe("SELECT a FROM t");
    expect(stripSqlDecoration("sql SELECT a FROM t;;")).toBe("SELECT a FROM t");
  });
  it("caps a trailing limit above the maximum", () => {
    expect(capLimit("SELECT a FROM t LIMIT 5000", 1000)).toBe("SELECT a FROM t LIMIT 1000");
    expect(limitValue("SELECT a FROM t limit 20")).toBe(20);
  });
  it("does not change a limit within bounds", () => {
    expect(capLimit("SELECT a FROM t LIMIT 5", 100)).toBe("SELECT a FROM t LIMIT 5");
    expect(capLimit("SELECT a FROM t LIMIT 5 OFFSET 40", 100)).toBe("SELECT a FROM t LIMIT 5 OFFSET 40");
  });
  it("appends a limit when there is none", () => {
    expect(capLimit("SELECT a FROM t", 100)).toBe("SELECT a FROM t LIMIT 100");
    expect(capLimit("SELECT a FROM t ORDER BY a OFFSET 20", 100)).toBe("SELECT a FROM t ORDER BY a OFFSET 20 LIMIT 100");
    expect(capLimit("SELECT a FROM (SELECT a FROM t LIMIT 5000) s", 100)).toBe(
      "SELECT a FROM (SELECT a FROM t LIMIT 5000) s LIMIT 100",
    );
    expect(capLimit("SELECT a FROM t -- newest first", 100)).toBe("SELECT a FROM t -- newest first\nLIMIT 100");
    expect(capLimit("SELECT a FROM t WHERE b = 'x'", 100)).toBe("SELECT a FROM t WHERE b = 'x' LIMIT 100");
  });
  it("lowers limits followed by an offset, LIMIT ALL and FETCH FIRST", () => {
    expect(capLimit("SELECT a FROM t LIMIT 5000 OFFSET 20", 1000)).toBe("SELECT a FROM t LIMIT 1000 OFFSET 20");
    expect(capLimit("SELECT a FROM t LIMIT ALL", 600)).toBe("SELECT a FROM t LIMIT 600");
    expect(capLimit("SELECT a FROM t FETCH FIRST 900 ROWS ONLY", 600)).toBe("SELECT a FROM t FETCH FIRST 600 ROWS ONLY");
    expect(limitValue("SELECT a FROM t LIMIT 30 OFFSET 10")).toBe(30);
  });
  it("ignores semicolons and keywords inside literals", () => {
    expect(isSafeSelect("SELECT psp_reference FROM bank_payment_transaction WHERE channel_name = 'a;b'")).toBe(true);
    expect(isSafeSelect(`SELECT "note;x" FROM t WHERE reason = 'delete requested'`)).toBe(true);
    expect(isSafeSelect("SELECT $$a;b$$ AS v")).toBe(true);
    expect(isSafeSelect("SELECT 'it''s; fine' AS v")).toBe(true);
  });
  it("still finds statements hidden behind quotes in comments", () => {
    expect(isSafeSelect("SELECT 1 -- it's\n; DELETE FROM t -- '")).toBe(false);
    expect(isSafeSelect("SELECT $$ ' $$; DELETE FROM t; -- '")).toBe(false);
    expect(isSafeSelect("SELECT 'a; DROP TABLE t")).toBe(false);
  });
  it("masks quoted text without moving offsets", () => {
    expect(maskQuoted("a = 'x;y' -- c")).toBe("a = '   '     ");
    expect(maskQuoted("$q$ab$q$")).toBe("$q$  $q$");
  });
});
