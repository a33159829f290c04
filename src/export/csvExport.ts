import Papa from "papaparse";
import { randomUUID } from "crypto";
import { readFile, rm, writeFile } from "fs/promises";
import { join } from "path";
import type { ObjectStore } from "../adapters/blob";
import type { ExecutionOutcome, Row } from "../adapters/db";
import { errorMessage, logger as rootLogger, type Logger } from "../utils/logger";
import { withTimeout } from "../utils/timeout";

export interface ExportWriter {
  /** Returns the address of the published file, or null when nothing was exported. */
  export(execution: ExecutionOutcome): Promise<string | null>;
}

export interface CsvExportOptions {
  tmpDir: string;
  prefix: string;
  uploadTimeoutMs: number;
  logger?: Logger;
  now?: () => Date;
}

export function toCsv(columns: string[], rows: Row[]): string {
  return Papa.unparse({
    fields: columns,
    data: rows.map((row) => columns.map((c) => row[c])),
  });
}

/** `20240403_091500` for 2024-04-03T09:15:00Z. */
export function formatStamp(d: Date): string {
  return d.toISOString().replace(/[-:]/g, "").replace("T", "_").slice(0, 15);
}

export class CsvExportWriter implements ExportWriter {
  private log: Logger;
  private now: () => Date;

  constructor(private store: ObjectStore, private options: CsvExportOptions) {
    this.log = options.logger ?? rootLogger;
    this.now = options.now ?? (() => new Date());
  }

  async export(execution: ExecutionOutcome): Promise<string | null> {
    if (!execution.ok || execution.result.rowCount === 0) return null;
    const { columns, rows, rowCount } = execution.result;

    const stamp = formatStamp(this.now());
    const fileName = `query_results_${stamp}_${randomUUID().slice(0, 8)}.csv`;
    const localPath = join(this.options.tmpDir, fileName);
    const objectName = `${this.options.prefix}${stamp}_${fileName}`;

    try {
      await writeFile(localPath, toCsv(columns, rows), "utf8");
      const body = await readFile(localPath);
      const url = await withTimeout(
        this.store.upload(objectName, body, "text/csv"),
        this.options.uploadTimeoutMs,
        "export upload",
      );
      this.log.info("export_ok", { objectName, rowCount, url });
      return url;
    } catch (err) {
      this.log.error("export_failed", { objectName, error: errorMessage(err) });
      return null;
    } finally {
      await this.removeLocal(localPath);
    }
  }

  private async removeLocal(path: string): Promise<void> {
    try {
      await rm(path, { force: true });
    } catch (err) {
      this.log.warn("export_cleanup_failed", { path, error: errorMessage(err) });
    }
  }
}
