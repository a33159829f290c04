import { describe, it, expect } from "vitest";
import { FAIL_OPEN, QueryClassifier, defaultGreeting, followUpGreeting } from "../src/pipeline/classifier";
import { createLogger } from "../src/utils/logger";
import { ScriptedModel } from "./helpers";

const log = createLogger("silent");

const reply = (fields: Record<string, unknown>) => JSON.stringify(fields);

describe("QueryClassifier", () => {
  it("marks data questions relevant and passes the list flag through", async () => {
    const model = new ScriptedModel({
      classify: reply({ is_relevant: true, is_list_request: true, response: "", list_reasoning: "asks for all rows" }),
    });
    const outcome = await new QueryClassifier(model, log).classify("list all refused transactions in April", [], "");

    expect(outcome).toEqual({
      ok: true,
      value: { isRelevant: true, isListRequest: true, refersToPrevious: undefined, reasoning: "asks for all rows" },
    });
    expect(model.calls[0].json).toBe(true);
  });

  it("never reports a list request for an irrelevant question", async () => {
    const model = new ScriptedModel({ classify: reply({ is_relevant: false, is_list_request: true, response: "" }) });
    const outcome = await new QueryClassifier(model, log).classify("hello", [], "Dana");
    expect(outcome.value.isListRequest).toBe(false);
    expect(outcome.value.greeting).toBe(defaultGreeting("Dana"));
  });

  it("prefers the model's greeting when there is no previous conversation", async () => {
    const model = new ScriptedModel({ classify: reply({ is_relevant: false, response: "Hello there!" }) });
    const outcome = await new QueryClassifier(model, log).classify("hi", [], "");
    expect(outcome.value.greeting).toBe("Hello there!");
  });

  it("reminds the user of their previous question", async () => {
    const model = new ScriptedModel({ classify: reply({ is_relevant: false, response: "Hello there!" }) });
    const history = [
      { question: "how many refunds last week?", answer: "There were 12 refunds." },
      { question: "  ", answer: "" },
    ];
    const outcome = await new QueryClassifier(model, log).classify("thanks", history, "Dana");
    expect(outcome.value.greeting).toBe(
      "Hi, Dana! I'm your Financial Reconciliation Agent. In our previous conversation, you asked about: how many refunds last week?\n" +
        "How can I help you with your financial data analysis today?",
    );
  });

  it("fails open when the model errors", async () => {
    const model = new ScriptedModel({ classify: new Error("LLM error: 503 unavailable") });
    const outcome = await new QueryClassifier(model, log).classify("how many chargebacks?", [], "");
    expect(outcome).toEqual({ ok: false, value: FAIL_OPEN, reason: "model_error", error: "LLM error: 503 unavailable" });
  });

  it("fails open when the reply is not the expected JSON", async () => {
    for (const bad of ["not json", reply({ relevant: "yes" }), "[]"]) {
      const outcome = await new QueryClassifier(new ScriptedModel({ classify: bad }), log).classify("q", [], "");
      expect(outcome.ok).toBe(false);
      if (outcome.ok) continue;
      expect(outcome.reason).toBe("invalid_output");
      expect(outcome.value).toEqual({ isRelevant: true, isListRequest: false });
    }
  });
});

describe("greetings", () => {
  it("omits the name when it is blank", () => {
    expect(defaultGreeting(" ")).toBe(
      "Hi! I'm your Financial Reconciliation Agent. How can I help you with your transaction data today?",
    );
    expect(followUpGreeting("", "refunds")).toBe(
      "Hi! I'm your Financial Reconciliation Agent. In our previous conversation, you asked about: refunds\n" +
        "How can I help you with your financial data analysis today?",
    );
  });
});
