import type { AppConfig } from "./config";
import { VercelBlobStore } from "./adapters/blob";
import { PostgresGateway } from "./adapters/postgres";
import { CsvExportWriter } from "./export/csvExport";
import { getChatModel } from "./llm/llm";
import { QueryClassifier } from "./pipeline/classifier";
import { AnswerComposer } from "./pipeline/composer";
import { ReconAgent } from "./pipeline/orchestrator";
import { SqlSynthesizer } from "./pipeline/synthesizer";
import { loadSchema } from "./schema/reconciliation";

/** Wires the production collaborators from configuration. */
export function buildAgent(config: AppConfig, schema = loadSchema()): ReconAgent {
  if (!config.db.url) throw new Error("PG_URL missing");
  const model = getChatModel(config.llm);
  return new ReconAgent({
    classifier: new QueryClassifier(model),
    synthesizer: new SqlSynthesizer(model, schema, config.limits),
    gateway: PostgresGateway.fromUrl(config.db.url, {
      connectTimeoutMs: config.db.connectTimeoutMs,
      statementTimeoutMs: config.db.statementTimeoutMs,
      readOnly: config.db.readOnly,
    }),
    exporter: new CsvExportWriter(new VercelBlobStore(config.storage.token), {
      tmpDir: config.storage.tmpDir,
      prefix: config.storage.prefix,
      uploadTimeoutMs: config.storage.uploadTimeoutMs,
    }),
    composer: new AnswerComposer(model, config.limits),
    limits: config.limits,
  });
}
