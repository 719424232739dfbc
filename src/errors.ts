import type { ZodError } from "zod";

export type ErrorCode =
  | "DECODE_FAILED"
  | "ENCODE_FAILED"
  | "WRITE_FAILED"
  | "INVALID_OPTIONS";

export class ImgdateError extends Error {
  public code: ErrorCode;
  public details?: unknown;

  constructor(message: string, code: ErrorCode, options?: { cause?: unknown; details?: unknown }) {
    super(message, { cause: options?.cause });
    this.name = "ImgdateError";
    this.code = code;
    this.details = options?.details;
    Error.captureStackTrace(this, this.constructor);
  }
}

/** Source bytes are not a readable image. */
export class DecodeError extends ImgdateError {
  constructor(message: string, cause?: unknown) {
    super(message, "DECODE_FAILED", { cause });
    this.name = "DecodeError";
  }
}

export class EncodeError extends ImgdateError {
  constructor(message: string, cause?: unknown) {
    super(message, "ENCODE_FAILED", { cause });
    this.name = "EncodeError";
  }
}

export class WriteError extends ImgdateError {
  constructor(message: string, cause?: unknown) {
    super(message, "WRITE_FAILED", { cause });
    this.name = "WriteError";
  }
}

export class ValidationError extends ImgdateError {
  constructor(message: string, details?: unknown) {
    super(message, "INVALID_OPTIONS", { details });
    this.name = "ValidationError";
  }
}

export function fromZodError(err: ZodError, message = "Validation failed"): ValidationError {
  const summary = err.issues
    .map((issue) => (issue.path.length > 0 ? `${issue.path.join(".")}: ${issue.message}` : issue.message))
    .join("; ");
  return new ValidationError(`${message}: ${summary}`, { issues: err.issues });
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
