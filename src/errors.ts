/**
 * Error taxonomy for the library core. Every error carries a stable `code` so
 * the tool layer can map it to a response without `instanceof` chains.
 */
export type LibraryErrorCode =
  | "SOURCE_UNAVAILABLE"
  | "AUTH_EXPIRED"
  | "NOT_FOUND"
  | "TREE_INCONSISTENT"
  | "EXTRACTION_FAILED"
  | "INDEX_CORRUPT"
  | "CONFIG";

export class LibraryError extends Error {
  public readonly code: LibraryErrorCode;

  constructor(code: LibraryErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.code = code;
    this.name = "LibraryError";
  }
}

/** Transient network/server failure that outlived every retry. Try again later. */
export class SourceUnavailableError extends LibraryError {
  /** HTTP status of the last attempt, if any response was received. */
  public readonly status?: number;
  public readonly attempts: number;

  constructor(message: string, attempts: number, status?: number, options?: { cause?: unknown }) {
    super("SOURCE_UNAVAILABLE", message, options);
    this.name = "SourceUnavailableError";
    this.attempts = attempts;
    this.status = status;
  }
}

/** Credential rejected even after a refresh. The user must re-register. */
export class AuthExpiredError extends LibraryError {
  constructor(message = "Credential rejected after refresh; re-register the device.") {
    super("AUTH_EXPIRED", message);
    this.name = "AuthExpiredError";
  }
}

export class NotFoundError extends LibraryError {
  constructor(message: string) {
    super("NOT_FOUND", message);
    this.name = "NotFoundError";
  }
}

/** Cycle or dangling parent detected while validating a fetched tree. */
export class TreeInconsistentError extends LibraryError {
  public readonly itemIds: readonly string[];

  constructor(message: string, itemIds: readonly string[]) {
    super("TREE_INCONSISTENT", message);
    this.name = "TreeInconsistentError";
    this.itemIds = itemIds;
  }
}

export class ExtractionFailedError extends LibraryError {
  public readonly documentId?: string;

  constructor(message: string, documentId?: string, options?: { cause?: unknown }) {
    super("EXTRACTION_FAILED", message, options);
    this.name = "ExtractionFailedError";
    this.documentId = documentId;
  }
}

export class IndexCorruptError extends LibraryError {
  constructor(message: string, options?: { cause?: unknown }) {
    super("INDEX_CORRUPT", message, options);
    this.name = "IndexCorruptError";
  }
}

export class ConfigError extends LibraryError {
  constructor(message: string) {
    super("CONFIG", message);
    this.name = "ConfigError";
  }
}

export function isLibraryError(e: unknown): e is LibraryError {
  return e instanceof LibraryError;
}

/** True for errors raised because an AbortSignal fired. */
export function isAbortError(e: unknown): boolean {
  return e instanceof Error && (e.name === "AbortError" || e.name === "TimeoutError");
}

/** Create the error thrown when an operation is cancelled through its signal. */
export function abortError(signal?: AbortSignal): Error {
  const reason: unknown = signal?.reason;
  if (reason instanceof Error) return reason;
  const err = new Error("The operation was aborted");
  err.name = "AbortError";
  return err;
}
