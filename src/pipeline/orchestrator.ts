import type { Limits } from "../config";
import { checkSize, type ExecutionOutcome, type QueryGateway } from "../adapters/db";
import type { ExportWriter } from "../export/csvExport";
import type { QueryRequest, ResponseEnvelope } from "../types";
import { logger as rootLogger, type Logger } from "../utils/logger";
import type { QueryClassifier } from "./classifier";
import type { AnswerComposer } from "./composer";
import type { SqlSynthesizer } from "./synthesizer";

const EXPORT_HINTS = ["list", "all transactions", "download", "csv", "excel", "export"];

/** Substring match, so "exported", "CSVs" and "listing" count too. */
export function wantsExport(question: string): boolean {
  const q = question.toLowerCase();
  return EXPORT_HINTS.some((hint) => q.includes(hint));
}

export function shouldExport(question: string, execution: ExecutionOutcome, rowThreshold: number): boolean {
  if (!execution.ok) return false;
  return wantsExport(question) || execution.result.rowCount > rowThreshold;
}

export interface ReconAgentDeps {
  classifier: QueryClassifier;
  synthesizer: SqlSynthesizer;
  gateway: QueryGateway;
  exporter: ExportWriter;
  composer: AnswerComposer;
  limits: Pick<Limits, "tooLargeRowCount" | "exportRowThreshold">;
  logger?: Logger;
}

/** Runs one request: classify, then early exit, list branch or query branch. */
export class ReconAgent {
  private log: Logger;

  constructor(private deps: ReconAgentDeps) {
    this.log = deps.logger ?? rootLogger;
  }

  async handle(request: QueryRequest, log: Logger = this.log): Promise<ResponseEnvelope> {
    const { question, chatHistory, requesterName } = request;
    const { classifier, synthesizer } = this.deps;

    const classification = await classifier.classify(question, chatHistory, requesterName);
    if (!classification.ok) {
      log.warn("classification_defaulted", { reason: classification.reason });
    }
    const { isRelevant, isListRequest, greeting } = classification.value;

    if (!isRelevant) {
      log.info("branch", { branch: "early_exit" });
      return { answer: greeting ?? "", exportUrl: null, branch: "early_exit" };
    }

    const branch = isListRequest ? "list" : "query";
    log.info("branch", { branch });

    const synthesis = isListRequest
      ? await synthesizer.generateListQuery(question, chatHistory)
      : await synthesizer.generateQuery(question, chatHistory);
    if (!synthesis.ok) {
      log.warn("sql_fallback_used", { reason: synthesis.reason });
    }
    const sql = synthesis.value;

    const execution = await this.deps.gateway.execute(sql);
    const tooLarge = execution.ok && checkSize(execution.result, this.deps.limits.tooLargeRowCount).isTooLarge;
    if (tooLarge) log.warn("result_too_large", { rowCount: execution.ok ? execution.result.rowCount : 0 });

    const attemptExport =
      !tooLarge &&
      (isListRequest || shouldExport(question, execution, this.deps.limits.exportRowThreshold));
    const exportUrl = attemptExport ? await this.deps.exporter.export(execution) : null;

    const answer = await this.deps.composer.compose({ question, execution, sql, chatHistory, exportUrl });
    log.info("responded", { branch, exported: exportUrl !== null });
    return { answer, exportUrl, branch };
  }
}
