import { z } from "zod";
import type { ChatTurn } from "./pipeline/history";

/** A value, or a fallback value together with the reason it was substituted. */
export type Outcome<T, R extends string> =
  | { ok: true; value: T }
  | { ok: false; value: T; reason: R; error: string };

const optionalText = z
  .string()
  .nullish()
  .transform((v) => v ?? "");

export const reconRequestSchema = z.object({
  chat_input: z
    .string({ required_error: "Please provide a valid question in the request body" })
    .trim()
    .min(1, "Please provide a valid question in the request body"),
  chat_history: z
    .array(z.object({ question: optionalText, answer: optionalText }))
    .nullish()
    .transform((v) => v ?? []),
  user_name: optionalText,
});

export type ReconRequestBody = z.input<typeof reconRequestSchema>;

export type ReconRequestPayload = z.output<typeof reconRequestSchema>;

export type ReconResponseBody = {
  chat_output: string;
  csv_url: string | null;
};

export type QueryRequest = {
  question: string;
  chatHistory: ChatTurn[];
  requesterName: string;
};

export type Branch = "early_exit" | "list" | "query";

export type ResponseEnvelope = {
  answer: string;
  exportUrl: string | null;
  branch: Branch;
};
