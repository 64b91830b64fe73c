import { MODEL_RETRY_AFTER_SECONDS } from "./constants.js";

export type ErrorKind =
  | "InvalidRequest"
  | "UnsupportedFormat"
  | "Unauthorized"
  | "Forbidden"
  | "FileTooLarge"
  | "StorageError"
  | "ModelUnavailable"
  | "InferenceError";

/**
 * Base for every failure that maps to a single HTTP outcome. The error
 * handler in app.ts renders `kind` and `message` as the response body.
 */
export class ServiceError extends Error {
  readonly kind: ErrorKind;
  readonly statusCode: number;

  constructor(kind: ErrorKind, statusCode: number, message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = kind;
    this.kind = kind;
    this.statusCode = statusCode;
  }
}

export class InvalidRequestError extends ServiceError {
  constructor(message: string) {
    super("InvalidRequest", 400, message);
  }
}

export class UnsupportedFormatError extends ServiceError {
  readonly extension: string | null;
  readonly allowedFormats: readonly string[];

  constructor(extension: string | null, allowedFormats: readonly string[]) {
    super(
      "UnsupportedFormat",
      400,
      extension === null
        ? "File must have a filename"
        : `Unsupported audio format: ${extension || "none"}. Allowed formats: ${allowedFormats.join(", ")}`
    );
    this.extension = extension;
    this.allowedFormats = allowedFormats;
  }
}

export class UnauthorizedError extends ServiceError {
  constructor(message: string) {
    super("Unauthorized", 401, message);
  }
}

export class ForbiddenError extends ServiceError {
  constructor(message: string) {
    super("Forbidden", 403, message);
  }
}

export class FileTooLargeError extends ServiceError {
  readonly limitBytes: number;

  constructor(limitBytes: number) {
    super("FileTooLarge", 413, `File too large. Maximum size: ${formatMegabytes(limitBytes)}MB`);
    this.limitBytes = limitBytes;
  }
}

export class StorageError extends ServiceError {
  constructor(message: string, options?: ErrorOptions) {
    super("StorageError", 500, message, options);
  }
}

export type ModelUnavailableReason = "loading_timeout" | "load_failed";

export class ModelUnavailableError extends ServiceError {
  readonly reason: ModelUnavailableReason;
  // Only set while warming up; a failed load needs an operator, not a retry
  readonly retryAfterSeconds?: number;

  private constructor(reason: ModelUnavailableReason, message: string, retryAfterSeconds?: number) {
    super("ModelUnavailable", 503, message);
    this.reason = reason;
    this.retryAfterSeconds = retryAfterSeconds;
  }

  static timeout(timeoutMs: number): ModelUnavailableError {
    return new ModelUnavailableError(
      "loading_timeout",
      `Model is still loading after ${timeoutMs} ms. Retry in ${MODEL_RETRY_AFTER_SECONDS} seconds.`,
      MODEL_RETRY_AFTER_SECONDS
    );
  }

  static loadFailed(message: string): ModelUnavailableError {
    return new ModelUnavailableError("load_failed", `Model failed to load: ${message}`);
  }
}

export class InferenceError extends ServiceError {
  constructor(message: string, options?: ErrorOptions) {
    super("InferenceError", 500, `Transcription failed: ${message}`, options);
  }
}

/**
 * Temp file removal failed. Logged and counted, never thrown to a caller.
 */
export class CleanupWarning extends Error {
  readonly path: string;

  constructor(path: string, cause: unknown) {
    super(`Failed to remove temp file ${path}: ${errorMessage(cause)}`, { cause });
    this.name = "CleanupWarning";
    this.path = path;
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

function formatMegabytes(bytes: number): string {
  const mb = bytes / (1024 * 1024);
  return Number.isInteger(mb) ? String(mb) : mb.toFixed(2);
}
