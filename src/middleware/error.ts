import type { Request, Response, NextFunction } from "express";
import { ZodError } from "zod";
import { isHttpError } from "../errors";
import { errorMessage, logger } from "../utils/logger";

function statusOf(err: unknown): number {
  if (err instanceof ZodError) return 400;
  if (isHttpError(err)) return err.status;
  // body-parser sets `status` and `type` on malformed JSON
  if (typeof err === "object" && err !== null && "status" in err && typeof err.status === "number") return err.status;
  return 500;
}

function clientMessage(err: unknown, status: number): string {
  if (status >= 500) return "Error processing request";
  if (err instanceof ZodError) return err.issues[0]?.message ?? "Invalid request body";
  const message = errorMessage(err);
  return message || "Invalid request";
}

export function errorHandler(err: unknown, req: Request, res: Response, _next: NextFunction) {
  const status = statusOf(err);
  const message = clientMessage(err, status);
  logger.error("request_error", { status, path: req.path, error: errorMessage(err) });
  res.status(status).json({ error: message });
}
