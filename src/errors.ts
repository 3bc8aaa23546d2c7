import { ScanErrorCause } from "./types";

/**
 * Base class for failures that cross the engine boundary. Per-file problems
 * are never thrown; they become {@link ScanErrorRecord} values instead.
 */
export class DupsieveError extends Error {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = new.target.name;
  }
}

/** The scan request is invalid; no scan was started. */
export class ConfigurationError extends DupsieveError {}

/** A scan is already running on this controller. */
export class ScanBusyError extends DupsieveError {
  constructor() {
    super("A scan is already in progress.");
  }
}

/** Something invalidated the whole scan, e.g. the root vanished. */
export class FatalScanError extends DupsieveError {
  constructor(message: string, readonly path: string) {
    super(message);
  }
}

/**
 * An I/O failure pinned to the file it happened on, for operations that touch
 * more than one file. The original error is kept as `cause`.
 */
export class FileAccessError extends DupsieveError {
  constructor(readonly path: string, cause: unknown) {
    super(`${path}: ${errorMessage(cause)}`, { cause });
  }
}

export function toError(err: unknown): Error {
  return err instanceof Error ? err : new Error(String(err));
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

/** Returns the errno code (e.g. "ENOENT") carried by a Node.js system error. */
function errorCode(err: unknown): string | undefined {
  if (typeof err === "object" && err !== null && "code" in err) {
    const code = err.code;
    return typeof code === "string" ? code : undefined;
  }
  return undefined;
}

/** Maps a thrown file-system error to the cause recorded against a path. */
export function causeOf(err: unknown): ScanErrorCause {
  switch (errorCode(err)) {
    case "EACCES":
    case "EPERM":
    case "EBUSY":
      return "access-denied";
    case "ENOENT":
    case "ENOTDIR":
      return "not-found";
    default:
      return "io";
  }
}
