/**
 * Typed errors shared by the reader, writer and orchestrator.
 */

export type ErrorCode =
  | "NOT_FOUND"
  | "INVALID_ARGUMENT"
  | "IO_ERROR"
  | "INVALID_DATE";

export class RedateError extends Error {
  constructor(
    message: string,
    public readonly code: ErrorCode,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = this.constructor.name;
  }
}

export class NotFoundError extends RedateError {
  constructor(public readonly path: string, what: string = "Path") {
    super(`${what} not found: ${path}`, "NOT_FOUND");
  }
}

export class InvalidArgumentError extends RedateError {
  constructor(message: string) {
    super(message, "INVALID_ARGUMENT");
  }
}

export class IOError extends RedateError {
  constructor(public readonly path: string, message: string, cause?: unknown) {
    super(`${path}: ${message}`, "IO_ERROR", { cause });
  }
}

export class InvalidDateError extends RedateError {
  constructor(message: string) {
    super(message, "INVALID_DATE");
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
