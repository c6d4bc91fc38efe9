export class NotFoundError extends Error {
  constructor(
    message: string,
    public readonly resource: string,
  ) {
    super(message);
    this.name = "NotFoundError";
  }
}

/** A value the gateway refuses to guess around; never clamped silently. */
export class MalformedInputError extends Error {
  constructor(
    message: string,
    public readonly field: string,
  ) {
    super(message);
    this.name = "MalformedInputError";
  }
}

/**
 * Malformed input that came from the store rather than the caller, e.g. a
 * negative experience value on a profile or posting row.
 */
export class InvalidRecordError extends MalformedInputError {
  constructor(message: string, field: string) {
    super(message, field);
    this.name = "InvalidRecordError";
  }
}

export class UnauthorizedError extends Error {
  constructor(message = "Unauthorized") {
    super(message);
    this.name = "UnauthorizedError";
  }
}

export class UpstreamError extends Error {
  constructor(
    message: string,
    public readonly statusCode?: number,
  ) {
    super(message);
    this.name = "UpstreamError";
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : "Unknown error";
}
