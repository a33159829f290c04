import type { ObjectStore } from "../src/adapters/blob";
import type { ExecutionOutcome, QueryGateway, RawResultSet, Row, SqlConnection, TabularResult } from "../src/adapters/db";
import type { ChatModel, CompletionRequest, CompletionTask } from "../src/llm/llm";

type Reply = string | Error | ((req: CompletionRequest) => string);

/** Chat model that answers each task from a script and records every request. */
export class ScriptedModel implements ChatModel {
  calls: CompletionRequest[] = [];

  constructor(private script: Partial<Record<CompletionTask, Reply>>) {}

  async complete(req: CompletionRequest): Promise<string> {
    this.calls.push(req);
    const reply = this.script[req.task];
    if (reply === undefined) throw new Error(`no scripted reply for ${req.task}`);
    if (reply instanceof Error) throw reply;
    return typeof reply === "function" ? reply(req) : reply;
  }

  tasks(): CompletionTask[] {
    return this.calls.map((c) => c.task);
  }
}

export function makeResult(count: number): TabularResult {
  const rows: Row[] = [];
  for (let i = 1; i <= count; i++) {
    rows.push({ psp_reference: `PSP${i}`, payment_amount: i * 10, payment_status: "Refused" });
  }
  return { columns: ["psp_reference", "payment_amount", "payment_status"], rows, rowCount: rows.length };
}

export class FakeGateway implements QueryGateway {
  executed: string[] = [];

  constructor(private outcome: ExecutionOutcome) {}

  async execute(sql: string): Promise<ExecutionOutcome> {
    this.executed.push(sql);
    return this.outcome;
  }
}

export class MemoryStore implements ObjectStore {
  objects = new Map<string, string>();

  constructor(private failWith?: Error) {}

  async upload(name: string, body: Buffer, _contentType: string): Promise<string> {
    if (this.failWith) throw this.failWith;
    this.objects.set(name, body.toString("utf8"));
    return `https://blob.test/${name}`;
  }
}

type ConnectionScript = {
  failConnect?: Error;
  failOn?: (sql: string) => Error | undefined;
  result?: RawResultSet;
};

export class FakeConnection implements SqlConnection {
  statements: string[] = [];
  connected = false;
  ended = false;

  constructor(private script: ConnectionScript = {}) {}

  async connect(): Promise<void> {
    if (this.script.failConnect) throw this.script.failConnect;
    this.connected = true;
  }

  async run(sql: string): Promise<RawResultSet> {
    this.statements.push(sql);
    const failure = this.script.failOn?.(sql);
    if (failure) throw failure;
    if (/^(BEGIN|SET|ROLLBACK)\b/i.test(sql)) return { fields: [], rows: [] };
    return this.script.result ?? { fields: [], rows: [] };
  }

  async end(): Promise<void> {
    this.ended = true;
  }
}
