import type { Limits } from "../config";
import { tooLargeMessage, type ExecutionOutcome } from "../adapters/db";
import type { ChatModel } from "../llm/llm";
import { ANSWER_SYSTEM, ANSWER_TEMPLATE } from "../llm/prompts";
import { errorMessage, logger as rootLogger, type Logger } from "../utils/logger";
import { formatHistory, type ChatTurn } from "./history";

export const NO_DATA_MESSAGE = "No data found for the prompt.";
export const DATABASE_ERROR_MESSAGE =
  "I couldn't run that query against the reconciliation database just now. Please try again in a moment or rephrase your question.";
export const COMPOSE_ERROR_MESSAGE =
  "I apologize, but I encountered an error while preparing the answer. Please try again or rephrase your question.";

export const DOWNLOAD_MARKER = "Download URL:";

export type ComposeInput = {
  question: string;
  execution: ExecutionOutcome;
  sql: string;
  chatHistory: ChatTurn[];
  exportUrl: string | null;
};

type ComposerLimits = Pick<Limits, "tooLargeRowCount" | "answerSampleRows">;

export function withDownloadUrl(text: string, exportUrl: string | null): string {
  if (!exportUrl || text.includes(DOWNLOAD_MARKER)) return text;
  return `${text}\n\n${DOWNLOAD_MARKER} ${exportUrl}`;
}

export class AnswerComposer {
  constructor(private model: ChatModel, private limits: ComposerLimits, private log: Logger = rootLogger) {}

  async compose(input: ComposeInput): Promise<string> {
    const { execution, exportUrl } = input;
    if (!execution.ok) {
      this.log.warn("compose_database_error", { stage: execution.error.stage });
      return DATABASE_ERROR_MESSAGE;
    }
    const { result } = execution;
    if (result.rowCount === 0) return NO_DATA_MESSAGE;
    if (result.rowCount > this.limits.tooLargeRowCount) return tooLargeMessage(this.limits.tooLargeRowCount);

    // Only a sample goes to the model; the total is passed separately.
    const sample = result.rows.slice(0, this.limits.answerSampleRows);
    let text: string;
    try {
      text = await this.model.complete({
        task: "answer",
        question: input.question,
        system: ANSWER_SYSTEM,
        prompt: ANSWER_TEMPLATE({
          history: formatHistory(input.chatHistory),
          question: input.question,
          sql: input.sql,
          sampleJson: JSON.stringify(sample, null, 2),
          sampleSize: sample.length,
          columns: result.columns,
          rowCount: result.rowCount,
          exportUrl,
        }),
      });
    } catch (err) {
      this.log.error("compose_failed", { error: errorMessage(err) });
      text = COMPOSE_ERROR_MESSAGE;
    }
    return withDownloadUrl(text, exportUrl);
  }
}
