import { z } from "zod";
import type { LlmConfig } from "../config";
import { BANK_TABLE, PROVIDER_TABLE } from "../schema/reconciliation";

export type CompletionTask = "classify" | "rephrase" | "sql" | "list_sql" | "answer";

export interface CompletionRequest {
  task: CompletionTask;
  /** The user's original question, for logs and the mock model. */
  question: string;
  system: string;
  prompt: string;
  /** Ask the provider for a JSON object response. */
  json?: boolean;
}

export interface ChatModel {
  complete(req: CompletionRequest): Promise<string>;
}

const completionSchema = z.object({
  choices: z
    .array(z.object({ message: z.object({ content: z.string().nullish() }) }))
    .min(1),
});

const providerErrorSchema = z.object({
  error: z.object({
    code: z.string().nullish(),
    param: z.string().nullish(),
  }),
});

function parseJson(text: string): unknown {
  try {
    return JSON.parse(text);
  } catch {
    return undefined;
  }
}

export interface OpenAIChatModelOptions {
  apiKey: string;
  model: string;
  baseUrl: string;
  timeoutMs: number;
  azure?: { endpoint: string; deployment: string; apiVersion: string };
  fetchImpl?: typeof fetch;
}

/** Chat completions over the OpenAI or Azure OpenAI REST API. */
export class OpenAIChatModel implements ChatModel {
  private fetchImpl: typeof fetch;

  constructor(private options: OpenAIChatModelOptions) {
    if (!options.apiKey) throw new Error("LLM API key missing");
    if (options.azure && !options.azure.deployment) throw new Error("AZURE_OPENAI_DEPLOYMENT missing");
    this.fetchImpl = options.fetchImpl ?? fetch;
  }

  endpoint(): string {
    const { azure, baseUrl } = this.options;
    if (azure) {
      const base = azure.endpoint.replace(/\/+$/, "");
      return `${base}/openai/deployments/${encodeURIComponent(azure.deployment)}/chat/completions?api-version=${encodeURIComponent(azure.apiVersion)}`;
    }
    return `${baseUrl.replace(/\/+$/, "")}/chat/completions`;
  }

  private headers(): Record<string, string> {
    if (this.options.azure) return { "content-type": "application/json", "api-key": this.options.apiKey };
    return { "content-type": "application/json", authorization: `Bearer ${this.options.apiKey}` };
  }

  async complete(req: CompletionRequest): Promise<string> {
    const makeBody = (withTemperature: boolean) => ({
      model: this.options.model,
      ...(withTemperature ? { temperature: 0 } : {}),
      ...(req.json ? { response_format: { type: "json_object" } } : {}),
      messages: [
        { role: "system", content: req.system },
        { role: "user", content: req.prompt },
      ],
    });

    const doRequest = (withTemperature: boolean) =>
      this.fetchImpl(this.endpoint(), {
        method: "POST",
        headers: this.headers(),
        body: JSON.stringify(makeBody(withTemperature)),
        signal: AbortSignal.timeout(this.options.timeoutMs),
      });

    // First try with temperature: 0 (deterministic). Some models reject the
    // temperature parameter; retry once without it.
    let resp = await doRequest(true);
    if (!resp.ok) {
      const text = await resp.text();
      const parsed = providerErrorSchema.safeParse(parseJson(text));
      const isTempUnsupported =
        parsed.success && parsed.data.error.code === "unsupported_value" && parsed.data.error.param === "temperature";
      if (!isTempUnsupported) throw new Error(`LLM error: ${resp.status} ${text}`);
      resp = await doRequest(false);
      if (!resp.ok) throw new Error(`LLM error: ${resp.status} ${await resp.text()}`);
    }

    const data = completionSchema.safeParse(await resp.json());
    if (!data.success) throw new Error("LLM response has no choices");
    const content = data.data.choices[0].message.content?.trim();
    if (!content) throw new Error("LLM returned empty content");
    return content;
  }
}

const GREETING = /^(hi|hello|hey|hiya|good (morning|afternoon|evening)|thanks|thank you|how are you)\b[\s!.,?]*/i;
const LIST_WORDS = /\b(list|show all|display all|give me all|all transactions)\b/i;

// Deterministic mock for tests/dev
export class MockChatModel implements ChatModel {
  async complete(req: CompletionRequest): Promise<string> {
    const q = req.question.trim();
    switch (req.task) {
      case "classify": {
        const bareGreeting = GREETING.test(q) && q.replace(GREETING, "").trim() === "";
        return JSON.stringify({
          is_relevant: !bareGreeting,
          is_list_request: !bareGreeting && LIST_WORDS.test(q),
          response: "",
          refers_to_previous: false,
          list_reasoning: "keyword heuristic",
        });
      }
      case "rephrase":
        return `Summarize ${q}`;
      case "sql":
        return [
          "```sql",
          `SELECT p.payment_status, COUNT(*) AS transactions, SUM(p.payment_amount) AS total_amount`,
          `FROM ${PROVIDER_TABLE} p LEFT JOIN ${BANK_TABLE} b ON b.psp_reference = p.psp_reference`,
          `GROUP BY p.payment_status ORDER BY transactions DESC LIMIT 600`,
          "```",
        ].join("\n");
      case "list_sql":
        return (
          `SELECT p.psp_reference, p.transaction_datetime, p.payment_amount, p.payment_status, b.store_number, b.captured_amount ` +
          `FROM ${PROVIDER_TABLE} p LEFT JOIN ${BANK_TABLE} b ON b.psp_reference = p.psp_reference ` +
          `ORDER BY p.transaction_datetime DESC LIMIT 1000`
        );
      case "answer":
        return `Here is what I found for "${q}".`;
    }
  }
}

export function getChatModel(config: LlmConfig): ChatModel {
  if (config.provider === "mock") return new MockChatModel();
  return new OpenAIChatModel({
    apiKey: config.apiKey,
    model: config.model,
    baseUrl: config.baseUrl,
    timeoutMs: config.timeoutMs,
    azure:
      config.provider === "azure"
        ? { endpoint: config.azureEndpoint, deployment: config.azureDeployment, apiVersion: config.azureApiVersion }
        : undefined,
  });
}
