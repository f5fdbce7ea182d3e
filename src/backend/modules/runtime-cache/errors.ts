/**
 * Error taxonomy for runtime resolution.
 *
 * Every error carries a stable `code` so the HTTP adapter and the resolver
 * can branch on it without instanceof chains across module boundaries.
 */

export type RuntimeErrorCode =
  | "NetworkError"
  | "IntegrityError"
  | "NotFoundError"
  | "DiskError"
  | "Cancelled"
  | "Busy"
  | "RuntimeUnavailable"
  | "AlreadyInstalling"
  | "InvalidState";

export class RuntimeError extends Error {
  readonly code: RuntimeErrorCode;

  constructor(code: RuntimeErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = code;
    this.code = code;
  }
}

export class NetworkError extends RuntimeError {
  /** HTTP status when the failure came from a response, null for transport errors. */
  readonly status: number | null;
  readonly retryable: boolean;

  constructor(message: string, opts: { status?: number | null; retryable: boolean; cause?: unknown }) {
    super("NetworkError", message, { cause: opts.cause });
    this.status = opts.status ?? null;
    this.retryable = opts.retryable;
  }
}

export class IntegrityError extends RuntimeError {
  constructor(message: string) {
    super("IntegrityError", message);
  }
}

export class NotFoundError extends RuntimeError {
  constructor(message: string) {
    super("NotFoundError", message);
  }
}

export class DiskError extends RuntimeError {
  constructor(message: string, cause?: unknown) {
    super("DiskError", message, { cause });
  }
}

export class CancelledError extends RuntimeError {
  constructor(message = "Operation cancelled") {
    super("Cancelled", message);
  }
}

export class BusyError extends RuntimeError {
  constructor(message: string) {
    super("Busy", message);
  }
}

export class RuntimeUnavailableError extends RuntimeError {
  constructor(message: string) {
    super("RuntimeUnavailable", message);
  }
}

export class AlreadyInstallingError extends RuntimeError {
  constructor(versionId: string) {
    super("AlreadyInstalling", `Runtime "${versionId}" is already being installed`);
  }
}

export class InvalidStateError extends RuntimeError {
  constructor(message: string) {
    super("InvalidState", message);
  }
}

// ---------------------------------------------------------------------------
// Classification helpers
// ---------------------------------------------------------------------------

const DISK_ERROR_CODES = new Set(["ENOSPC", "EDQUOT", "EACCES", "EPERM", "EROFS", "EMFILE", "EIO"]);

/** Reads the `code` property Node attaches to system errors. */
export function errnoCode(err: unknown): string | undefined {
  if (err instanceof Error && "code" in err && typeof err.code === "string") {
    return err.code;
  }
  return undefined;
}

export function isDiskFailure(err: unknown): boolean {
  const code = errnoCode(err);
  return code !== undefined && DISK_ERROR_CODES.has(code);
}

export function isAbortError(err: unknown): boolean {
  return err instanceof Error && (err.name === "AbortError" || errnoCode(err) === "ABORT_ERR");
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

/**
 * Normalises anything thrown below the coordinator into a RuntimeError.
 * Whatever is left after fetch/network classification came from the
 * filesystem (staging, unpack, rename), so it is reported as DiskError.
 */
export function toRuntimeError(err: unknown): RuntimeError {
  if (err instanceof RuntimeError) return err;
  if (isAbortError(err)) return new CancelledError();
  return new DiskError(errorMessage(err), err);
}
