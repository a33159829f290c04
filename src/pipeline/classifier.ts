import { z } from "zod";
import type { ChatModel } from "../llm/llm";
import { CLASSIFY_SYSTEM, CLASSIFY_TEMPLATE } from "../llm/prompts";
import type { Outcome } from "../types";
import { errorMessage, logger as rootLogger, type Logger } from "../utils/logger";
import { formatHistory, lastInteraction, type ChatTurn } from "./history";

export type ClassificationResult = {
  isRelevant: boolean;
  isListRequest: boolean;
  greeting?: string;
  refersToPrevious?: boolean;
  reasoning?: string;
};

export type ClassificationFailure = "model_error" | "invalid_output";

export type ClassificationOutcome = Outcome<ClassificationResult, ClassificationFailure>;

const modelReplySchema = z.object({
  is_relevant: z.boolean(),
  is_list_request: z.boolean().nullish(),
  response: z.string().nullish(),
  refers_to_previous: z.boolean().nullish(),
  list_reasoning: z.string().nullish(),
});

/** Used when classification fails: answer from the database rather than drop the question. */
export const FAIL_OPEN: ClassificationResult = { isRelevant: true, isListRequest: false };

export function defaultGreeting(name: string): string {
  const suffix = name.trim() ? `, ${name.trim()}` : "";
  return `Hi${suffix}! I'm your Financial Reconciliation Agent. How can I help you with your transaction data today?`;
}

export function followUpGreeting(name: string, previousQuestion: string): string {
  const suffix = name.trim() ? `, ${name.trim()}` : "";
  return (
    `Hi${suffix}! I'm your Financial Reconciliation Agent. In our previous conversation, you asked about: ${previousQuestion}\n` +
    `How can I help you with your financial data analysis today?`
  );
}

function parseReply(text: string): z.infer<typeof modelReplySchema> | undefined {
  let raw: unknown;
  try {
    raw = JSON.parse(text);
  } catch {
    return undefined;
  }
  const parsed = modelReplySchema.safeParse(raw);
  return parsed.success ? parsed.data : undefined;
}

export class QueryClassifier {
  constructor(private model: ChatModel, private log: Logger = rootLogger) {}

  async classify(question: string, history: ChatTurn[], requesterName: string): Promise<ClassificationOutcome> {
    let text: string;
    try {
      text = await this.model.complete({
        task: "classify",
        question,
        system: CLASSIFY_SYSTEM,
        prompt: CLASSIFY_TEMPLATE(formatHistory(history), question),
        json: true,
      });
    } catch (err) {
      const error = errorMessage(err);
      this.log.error("classify_failed", { reason: "model_error", error });
      return { ok: false, value: FAIL_OPEN, reason: "model_error", error };
    }

    const reply = parseReply(text);
    if (!reply) {
      this.log.error("classify_failed", { reason: "invalid_output", output: text.slice(0, 200) });
      return { ok: false, value: FAIL_OPEN, reason: "invalid_output", error: "Classifier reply is not valid JSON" };
    }

    const value: ClassificationResult = {
      isRelevant: reply.is_relevant,
      isListRequest: reply.is_relevant && reply.is_list_request === true,
      refersToPrevious: reply.refers_to_previous ?? undefined,
      reasoning: reply.list_reasoning ?? undefined,
    };

    if (!value.isRelevant) {
      const previous = lastInteraction(history);
      const modelGreeting = reply.response?.trim();
      value.greeting = previous
        ? followUpGreeting(requesterName, previous.question)
        : modelGreeting || defaultGreeting(requesterName);
    }

    this.log.info("classified", {
      isRelevant: value.isRelevant,
      isListRequest: value.isListRequest,
      reasoning: value.reasoning,
    });
    return { ok: true, value };
  }
}
