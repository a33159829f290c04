import type { Limits } from "../config";
import { capLimit, isSafeSelect, selectsStar, stripSqlDecoration } from "../guards/sqlGuard";
import type { ChatModel } from "../llm/llm";
import {
  LIST_SQL_TEMPLATE,
  REPHRASE_SYSTEM,
  REPHRASE_TEMPLATE,
  SQL_SYSTEM,
  SQL_TEMPLATE,
  type SynthesisMode,
} from "../llm/prompts";
import { BANK_TABLE, PROVIDER_TABLE, columnNames, type ReconciliationSchema } from "../schema/reconciliation";
import type { Outcome } from "../types";
import { errorMessage, logger as rootLogger, type Logger } from "../utils/logger";
import { formatHistory, type ChatTurn } from "./history";

export type SynthesisFailure = "model_error" | "empty_output" | "unsafe_sql";

export type SynthesisOutcome = Outcome<string, SynthesisFailure>;

export const FALLBACK_SQL =
  `SELECT psp_reference, merchant_reference, transaction_datetime, payment_amount, currency, payment_method, payment_status ` +
  `FROM ${PROVIDER_TABLE} ORDER BY transaction_datetime DESC LIMIT 10`;

const LIST_PROVIDER_COLUMNS = [
  "psp_reference",
  "merchant_reference",
  "transaction_datetime",
  "payment_amount",
  "currency",
  "payment_method",
  "payment_status",
  "risk_score",
];

const LIST_BANK_COLUMNS = [
  "store_number",
  "channel_name",
  "transaction_number",
  "transaction_datetime",
  "captured_amount",
  "transaction_type",
  "psp_reference",
  "payment_method",
  "settlement_date",
];

type SynthesisLimits = Pick<Limits, "summaryRowCap" | "listRowCap">;

class SynthesisError extends Error {
  constructor(readonly reason: SynthesisFailure, message: string) {
    super(message);
    this.name = "SynthesisError";
  }
}

/**
 * Two-stage text-to-SQL: the question is first restated against the fixed
 * schema, then translated into one read-only statement. Any failure yields
 * FALLBACK_SQL.
 */
export class SqlSynthesizer {
  private listProviderColumns: string[];
  private listBankColumns: string[];

  constructor(
    private model: ChatModel,
    private schema: ReconciliationSchema,
    private limits: SynthesisLimits,
    private log: Logger = rootLogger,
  ) {
    const provider = new Set(columnNames(schema, PROVIDER_TABLE));
    const bank = new Set(columnNames(schema, BANK_TABLE));
    this.listProviderColumns = LIST_PROVIDER_COLUMNS.filter((c) => provider.has(c));
    this.listBankColumns = LIST_BANK_COLUMNS.filter((c) => bank.has(c));
  }

  generateQuery(question: string, history: ChatTurn[]): Promise<SynthesisOutcome> {
    return this.synthesize("summary", question, history);
  }

  generateListQuery(question: string, history: ChatTurn[]): Promise<SynthesisOutcome> {
    return this.synthesize("list", question, history);
  }

  private async synthesize(mode: SynthesisMode, question: string, history: ChatTurn[]): Promise<SynthesisOutcome> {
    const formatted = formatHistory(history);
    const cap = mode === "list" ? this.limits.listRowCap : this.limits.summaryRowCap;
    try {
      const rephrased = await this.model.complete({
        task: "rephrase",
        question,
        system: REPHRASE_SYSTEM,
        prompt: REPHRASE_TEMPLATE(mode, this.schema, formatted, question),
      });
      if (!rephrased.trim()) throw new SynthesisError("empty_output", "Rephrased question is empty");
      this.log.debug("sql_rephrased", { mode, rephrased });

      const raw = await this.model.complete({
        task: mode === "list" ? "list_sql" : "sql",
        question,
        system: SQL_SYSTEM,
        prompt:
          mode === "list"
            ? LIST_SQL_TEMPLATE(this.schema, formatted, rephrased.trim(), cap, this.listProviderColumns, this.listBankColumns)
            : SQL_TEMPLATE(this.schema, formatted, rephrased.trim(), cap),
      });

      const sql = stripSqlDecoration(raw);
      if (!sql) throw new SynthesisError("empty_output", "Model returned no SQL");
      if (!isSafeSelect(sql)) throw new SynthesisError("unsafe_sql", "Generated SQL is not a single read-only SELECT");
      if (selectsStar(sql)) throw new SynthesisError("unsafe_sql", "Generated SQL uses SELECT *");

      const capped = capLimit(sql, cap);
      this.log.info("sql_generated", { mode, sql: capped });
      return { ok: true, value: capped };
    } catch (err) {
      const reason = err instanceof SynthesisError ? err.reason : "model_error";
      const error = errorMessage(err);
      this.log.error("sql_generation_failed", { mode, reason, error });
      return { ok: false, value: FALLBACK_SQL, reason, error };
    }
  }
}
