import express from "express";
import { randomUUID } from "crypto";
import type { ReconAgent } from "./pipeline/orchestrator";
import type { ReconciliationSchema } from "./schema/reconciliation";
import { reconRequestSchema, type ReconResponseBody } from "./types";
import { errorHandler } from "./middleware/error";
import { logger as rootLogger, type Logger } from "./utils/logger";

export interface AppDeps {
  agent: ReconAgent;
  schema: ReconciliationSchema;
  logger?: Logger;
}

export function createApp({ agent, schema, logger = rootLogger }: AppDeps) {
  const app = express();
  app.use(express.json({ limit: "1mb" }));

  app.get("/healthz", (_req, res) => res.json({ ok: true }));

  app.get("/schema", (_req, res) => {
    res.json({ tables: schema.tables, joinHints: schema.joinHints, ddl: schema.ddl });
  });

  app.post("/recon_agent", async (req, res, next) => {
    const started = Date.now();
    try {
      const body = reconRequestSchema.parse(req.body ?? {});
      const log = logger.child({ requestId: randomUUID() });
      log.info("request_received", { user: body.user_name || undefined, question: body.chat_input });

      const envelope = await agent.handle(
        {
          question: body.chat_input,
          chatHistory: body.chat_history,
          requesterName: body.user_name,
        },
        log,
      );

      const response: ReconResponseBody = { chat_output: envelope.answer, csv_url: envelope.exportUrl };
      log.info("request_ok", { branch: envelope.branch, durationMs: Date.now() - started });
      res.json(response);
    } catch (err) {
      next(err);
    }
  });

  app.use(errorHandler);
  return app;
}
