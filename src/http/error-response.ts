import type { Response } from "express";
import { type Logger, logContext } from "../config/logger";
import {
  InvalidRecordError,
  MalformedInputError,
  NotFoundError,
  UnauthorizedError,
  UpstreamError,
  errorMessage,
} from "../shared/errors";

export function statusForError(error: unknown): number {
  if (error instanceof UnauthorizedError) {
    return 401;
  }
  if (error instanceof NotFoundError) {
    return 404;
  }
  if (error instanceof InvalidRecordError) {
    return 500;
  }
  if (error instanceof MalformedInputError) {
    return 400;
  }
  if (error instanceof UpstreamError) {
    return 502;
  }
  return 500;
}

export function sendError(response: Response, error: unknown, logger: Logger, route: string): void {
  const status = statusForError(error);
  const failed = status >= 500;
  logContext(
    logger,
    failed ? "error" : "warn",
    failed ? "Request failed" : "Request rejected",
    { route, status, error_code: error instanceof Error ? error.name : "UnknownError" },
    { error: errorMessage(error) },
  );
  response.status(status).json({
    success: false,
    error: status === 500 ? "Internal server error" : errorMessage(error),
  });
}

/** Reads an optional non-negative integer query parameter. */
export function parseLimit(value: unknown, fallback: number): number {
  if (value === undefined || value === "") {
    return fallback;
  }
  const parsed = typeof value === "string" ? Number(value) : Number.NaN;
  if (!Number.isInteger(parsed) || parsed < 0) {
    throw new MalformedInputError(`limit must be a non-negative integer, got ${String(value)}`, "limit");
  }
  return parsed;
}
