export type HttpError = Error & { status: number };

export function httpError(status: number, message: string): HttpError {
  return Object.assign(new Error(message), { status });
}

export function isHttpError(err: unknown): err is HttpError {
  return err instanceof Error && "status" in err && typeof err.status === "number";
}

export type DatabaseStage = "connect" | "execute";

/** Connection or execution failure reported by the database gateway. */
export class DatabaseError extends Error {
  constructor(message: string, readonly stage: DatabaseStage) {
    super(message);
    this.name = "DatabaseError";
  }
}

export class TimeoutError extends Error {
  constructor(label: string, ms: number) {
    super(`${label} timed out after ${ms}ms`);
    this.name = "TimeoutError";
  }
}
