import { env } from "process";
import { tmpdir } from "os";

type Env = Record<string, string | undefined>;

function intFromEnv(source: Env, name: string, def: number): number {
  const v = source[name];
  if (!v) return def;
  const n = parseInt(v, 10);
  return Number.isFinite(n) ? n : def;
}

function boolFromEnv(source: Env, name: string, def: boolean): boolean {
  const v = source[name];
  if (!v) return def;
  const normalized = v.trim().toLowerCase();
  return normalized === "1" || normalized === "true" || normalized === "yes";
}

export const LOG_LEVEL = (env.LOG_LEVEL || "info").toLowerCase();

export type LlmProvider = "openai" | "azure" | "mock";

export interface LlmConfig {
  provider: LlmProvider;
  apiKey: string;
  model: string;
  baseUrl: string;
  azureEndpoint: string;
  azureDeployment: string;
  azureApiVersion: string;
  timeoutMs: number;
}

export interface DbConfig {
  url: string;
  connectTimeoutMs: number;
  statementTimeoutMs: number;
  readOnly: boolean;
}

export interface StorageConfig {
  token: string;
  prefix: string;
  tmpDir: string;
  uploadTimeoutMs: number;
}

/** Row-count thresholds shared by the pipeline stages. */
export interface Limits {
  tooLargeRowCount: number;
  exportRowThreshold: number;
  answerSampleRows: number;
  summaryRowCap: number;
  listRowCap: number;
}

export interface AppConfig {
  port: number;
  llm: LlmConfig;
  db: DbConfig;
  storage: StorageConfig;
  limits: Limits;
}

export const DEFAULT_LIMITS: Limits = {
  tooLargeRowCount: 10_000,
  exportRowThreshold: 20,
  answerSampleRows: 50,
  summaryRowCap: 600,
  listRowCap: 1000,
};

function pickProvider(source: Env): LlmProvider {
  if (boolFromEnv(source, "MOCK_LLM", false)) return "mock";
  if (source.AZURE_OPENAI_ENDPOINT) return "azure";
  return "openai";
}

export function loadConfig(source: Env = env): AppConfig {
  const provider = pickProvider(source);
  return {
    port: intFromEnv(source, "PORT", 7071),
    llm: {
      provider,
      apiKey: (provider === "azure" ? source.AZURE_OPENAI_API_KEY : source.OPENAI_API_KEY) || "",
      model: source.LLM_MODEL || "gpt-4o-mini",
      baseUrl: source.OPENAI_BASE_URL || "https://api.openai.com/v1",
      azureEndpoint: source.AZURE_OPENAI_ENDPOINT || "",
      azureDeployment: source.AZURE_OPENAI_DEPLOYMENT || "",
      azureApiVersion: source.AZURE_OPENAI_API_VERSION || "2024-06-01",
      timeoutMs: intFromEnv(source, "LLM_TIMEOUT_MS", 30_000),
    },
    db: {
      url: source.PG_URL || "",
      connectTimeoutMs: intFromEnv(source, "DB_CONNECT_TIMEOUT_MS", 10_000),
      statementTimeoutMs: intFromEnv(source, "STATEMENT_TIMEOUT_MS", 15_000),
      readOnly: boolFromEnv(source, "DB_READ_ONLY", true),
    },
    storage: {
      token: source.BLOB_READ_WRITE_TOKEN || "",
      prefix: source.EXPORT_PREFIX ?? "recon-exports/",
      tmpDir: source.EXPORT_TMP_DIR || tmpdir(),
      uploadTimeoutMs: intFromEnv(source, "UPLOAD_TIMEOUT_MS", 30_000),
    },
    limits: {
      tooLargeRowCount: intFromEnv(source, "TOO_LARGE_ROW_COUNT", DEFAULT_LIMITS.tooLargeRowCount),
      exportRowThreshold: intFromEnv(source, "EXPORT_ROW_THRESHOLD", DEFAULT_LIMITS.exportRowThreshold),
      answerSampleRows: intFromEnv(source, "ANSWER_SAMPLE_ROWS", DEFAULT_LIMITS.answerSampleRows),
      summaryRowCap: intFromEnv(source, "SUMMARY_ROW_CAP", DEFAULT_LIMITS.summaryRowCap),
      listRowCap: intFromEnv(source, "LIST_ROW_CAP", DEFAULT_LIMITS.listRowCap),
    },
  };
}
