/**
 * Error taxonomy for the photo storage workflow.
 *
 * Callers branch on `kind`, never on message text. Operation boundaries turn
 * these into an OperationFailure so nothing here reaches the transport raw.
 */

export type StorageErrorKind = "configuration" | "storage" | "not_found";

export abstract class PhotoStorageError extends Error {
  abstract readonly kind: StorageErrorKind;
}

/** Missing or invalid settings. Never retried; an operator has to fix it. */
export class ConfigurationError extends PhotoStorageError {
  readonly kind = "configuration";

  constructor(message: string) {
    super(message);
    this.name = "ConfigurationError";
  }
}

/** I/O or provider failure. `code` is the errno or provider error code when known. */
export class StorageError extends PhotoStorageError {
  readonly kind = "storage";
  readonly code: string | undefined;

  constructor(message: string, options: { code?: string; cause?: unknown } = {}) {
    super(message, { cause: options.cause });
    this.name = "StorageError";
    this.code = options.code;
  }
}

export class NotFoundError extends PhotoStorageError {
  readonly kind = "not_found";

  constructor(message: string) {
    super(message);
    this.name = "NotFoundError";
  }
}

export interface OperationFailure {
  success: false;
  message: string;
  errorKind: StorageErrorKind;
}

/**
 * Convert any thrown value into a failure result. NotFoundError keeps its own
 * message; everything else is prefixed with what was being attempted.
 */
export function failureFrom(error: unknown, prefix: string): OperationFailure {
  if (error instanceof NotFoundError) {
    return { success: false, message: error.message, errorKind: error.kind };
  }
  if (error instanceof PhotoStorageError) {
    return { success: false, message: `${prefix}: ${error.message}`, errorKind: error.kind };
  }
  const message = error instanceof Error ? error.message : String(error);
  return { success: false, message: `${prefix}: ${message}`, errorKind: "storage" };
}

/** Extract an errno-style or provider error code from a thrown value. */
export function errorCode(error: unknown): string | undefined {
  if (typeof error !== "object" || error === null) return undefined;
  if ("code" in error && typeof error.code === "string") return error.code;
  if ("name" in error && typeof error.name === "string" && error.name !== "Error") return error.name;
  return undefined;
}
