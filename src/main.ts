import "dotenv/config";
import type { Server } from "http";
import { buildAgent } from "./agent";
import { loadConfig } from "./config";
import { loadSchema } from "./schema/reconciliation";
import { createApp } from "./server";
import { errorMessage, logger } from "./utils/logger";

function main() {
  const config = loadConfig();
  const schema = loadSchema();
  const app = createApp({ agent: buildAgent(config, schema), schema });
  const server: Server = app.listen(config.port, () => {
    logger.info("server_listening", { port: config.port, llm: config.llm.provider });
  });

  const shutdown = (signal: string) => {
    logger.info("server_stopping", { signal });
    server.close((err) => {
      if (err) logger.error("server_close_failed", { error: errorMessage(err) });
      process.exit(err ? 1 : 0);
    });
  };
  process.on("SIGTERM", () => shutdown("SIGTERM"));
  process.on("SIGINT", () => shutdown("SIGINT"));
}

try {
  main();
} catch (err) {
  logger.error("startup_failed", { error: errorMessage(err) });
  process.exitCode = 1;
}
