import { LOG_LEVEL } from "../config";

type Level = "debug" | "info" | "warn" | "error";
type Threshold = Level | "silent";
type Fields = Record<string, unknown>;

const levelOrder: Record<Threshold, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: 100,
};

function parseThreshold(value: string): Threshold {
  if (value === "debug" || value === "info" || value === "warn" || value === "error" || value === "silent") return value;
  return "info";
}

export interface Logger {
  debug(msg: string, extra?: Fields): void;
  info(msg: string, extra?: Fields): void;
  warn(msg: string, extra?: Fields): void;
  error(msg: string, extra?: Fields): void;
  /** Returns a logger that adds `bound` to every line. */
  child(bound: Fields): Logger;
}

export function createLogger(level: string = LOG_LEVEL, bound: Fields = {}): Logger {
  const threshold = parseThreshold(level);

  function log(lvl: Level, msg: string, extra?: Fields) {
    if (levelOrder[lvl] < levelOrder[threshold]) return;
    const payload = {
      ts: new Date().toISOString(),
      level: lvl,
      msg,
      ...bound,
      ...extra,
    };
    // eslint-disable-next-line no-console
    console.log(JSON.stringify(payload));
  }

  return {
    debug: (msg, extra) => log("debug", msg, extra),
    info: (msg, extra) => log("info", msg, extra),
    warn: (msg, extra) => log("warn", msg, extra),
    error: (msg, extra) => log("error", msg, extra),
    child: (more) => createLogger(threshold, { ...bound, ...more }),
  };
}

export const logger = createLogger();

export function errorMessage(err: unknown): string {
  if (err instanceof Error) return err.message;
  return String(err);
}
