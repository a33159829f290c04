import { Client, type ClientConfig } from "pg";
import { DatabaseError, type DatabaseStage } from "../errors";
import { isSingleStatement, stripSqlDecoration } from "../guards/sqlGuard";
import { errorMessage, logger as rootLogger, type Logger } from "../utils/logger";
import { toTabular, type ExecutionOutcome, type QueryGateway, type RawResultSet, type SqlConnection } from "./db";

export class PgConnection implements SqlConnection {
  private client: Client;

  constructor(config: ClientConfig) {
    this.client = new Client(config);
  }

  connect(): Promise<void> {
    return this.client.connect();
  }

  async run(sql: string): Promise<RawResultSet> {
    const res = await this.client.query<unknown[]>({ text: sql, rowMode: "array" });
    return { fields: (res.fields ?? []).map((f) => f.name), rows: res.rows };
  }

  end(): Promise<void> {
    return this.client.end();
  }
}

export type ConnectionFactory = () => SqlConnection;

export interface PostgresGatewayOptions {
  statementTimeoutMs: number;
  readOnly: boolean;
  logger?: Logger;
}

export interface PgGatewayOptions extends PostgresGatewayOptions {
  connectTimeoutMs: number;
}

/** Client-side wait past statement_timeout before pg gives up on a reply. */
export const QUERY_TIMEOUT_MARGIN_MS = 5_000;

export function pgClientConfig(url: string, options: PgGatewayOptions): ClientConfig {
  return {
    connectionString: url,
    connectionTimeoutMillis: options.connectTimeoutMs,
    query_timeout: options.statementTimeoutMs + QUERY_TIMEOUT_MARGIN_MS,
  };
}

/**
 * Runs one statement per call on a fresh connection. Each call opens its own
 * transaction (read-only unless configured otherwise), bounds it with a local
 * statement_timeout and always rolls back and disconnects.
 */
export class PostgresGateway implements QueryGateway {
  private log: Logger;

  constructor(private openConnection: ConnectionFactory, private options: PostgresGatewayOptions) {
    this.log = options.logger ?? rootLogger;
  }

  static fromUrl(url: string, options: PgGatewayOptions): PostgresGateway {
    const config = pgClientConfig(url, options);
    return new PostgresGateway(() => new PgConnection(config), options);
  }

  async execute(sqlText: string): Promise<ExecutionOutcome> {
    const sql = stripSqlDecoration(sqlText);
    if (!sql) return this.fail(new Error("No SQL statement to execute"), "execute", sql);
    if (!isSingleStatement(sql)) {
      return this.fail(new Error("Only one SQL statement can be executed per request"), "execute", sql);
    }

    const conn = this.openConnection();
    try {
      try {
        await conn.connect();
      } catch (err) {
        return this.fail(err, "connect", sql);
      }
      try {
        this.log.info("sql_try", { sql });
        const raw = await this.inTransaction(conn, () => conn.run(sql));
        const result = toTabular(raw);
        this.log.info("sql_ok", { rowCount: result.rowCount, columns: result.columns.length });
        return { ok: true, result };
      } catch (err) {
        return this.fail(err, "execute", sql);
      }
    } finally {
      await this.close(conn);
    }
  }

  private async inTransaction<T>(conn: SqlConnection, fn: () => Promise<T>): Promise<T> {
    await conn.run(this.options.readOnly ? "BEGIN TRANSACTION READ ONLY" : "BEGIN");
    try {
      // SET does not take bind parameters; the value is a plain integer.
      const timeout = Math.max(0, Math.floor(Number(this.options.statementTimeoutMs) || 0));
      await conn.run(`SET LOCAL statement_timeout TO ${timeout}`);
      return await fn();
    } finally {
      try {
        await conn.run("ROLLBACK");
      } catch (err) {
        this.log.warn("sql_rollback_failed", { error: errorMessage(err) });
      }
    }
  }

  private async close(conn: SqlConnection): Promise<void> {
    try {
      await conn.end();
    } catch (err) {
      this.log.warn("sql_close_failed", { error: errorMessage(err) });
    }
  }

  private fail(err: unknown, stage: DatabaseStage, sql: string): ExecutionOutcome {
    const message = errorMessage(err);
    this.log.error("sql_error", { stage, sql, error: message });
    return { ok: false, error: new DatabaseError(message, stage) };
  }
}
