export type LauncherErrorCode =
  | "MISSING_SCOPE"
  | "NOT_FOUND"
  | "CANCELED"
  | "INCOMPLETE_TRANSFER"
  | "STDIN_CLOSED"
  | "PROCESS_EXIT"
  | "ALREADY_STARTED"
  | "NOT_STARTED"
  | "INVALID_CONFIG"
  | "UNKNOWN";

export class LauncherError extends Error {
  readonly code: LauncherErrorCode;

  constructor(message: string, code: LauncherErrorCode, options?: ErrorOptions) {
    super(message, options);
    this.name = "LauncherError";
    this.code = code;
  }
}

// ── Construction ──

export class MissingScopeError extends LauncherError {
  constructor() {
    super("a parent cancellation scope must be provided", "MISSING_SCOPE");
    this.name = "MissingScopeError";
  }
}

export class NotFoundError extends LauncherError {
  readonly file: string;

  constructor(file: string, options?: ErrorOptions) {
    super(`executable file not found: ${file}`, "NOT_FOUND", options);
    this.name = "NotFoundError";
    this.file = file;
  }
}

export class ConfigError extends LauncherError {
  constructor(message: string, options?: ErrorOptions) {
    super(message, "INVALID_CONFIG", options);
    this.name = "ConfigError";
  }
}

// ── Cancellation ──

export class CanceledError extends LauncherError {
  /** True when the scope ended because a deadline elapsed. */
  readonly timedOut: boolean;

  constructor(reason?: unknown) {
    const timedOut = isTimeoutReason(reason);
    super(timedOut ? "scope deadline exceeded" : "scope canceled", "CANCELED", {
      cause: reason,
    });
    this.name = "CanceledError";
    this.timedOut = timedOut;
  }
}

// ── Lifecycle ──

export class AlreadyStartedError extends LauncherError {
  constructor() {
    super("process has already been started", "ALREADY_STARTED");
    this.name = "AlreadyStartedError";
  }
}

export class NotStartedError extends LauncherError {
  constructor() {
    super("process has not been started", "NOT_STARTED");
    this.name = "NotStartedError";
  }
}

export class ExitError extends LauncherError {
  readonly exitCode: number | null;
  readonly signal: NodeJS.Signals | null;

  constructor(exitCode: number | null, signal: NodeJS.Signals | null) {
    super(
      signal ? `process terminated by signal ${signal}` : `process exited with code ${exitCode}`,
      "PROCESS_EXIT",
    );
    this.name = "ExitError";
    this.exitCode = exitCode;
    this.signal = signal;
  }
}

// ── Stdin transfer ──

export class IncompleteTransferError extends LauncherError {
  constructor(options?: ErrorOptions) {
    super("command did not receive all bytes sent to stdin", "INCOMPLETE_TRANSFER", options);
    this.name = "IncompleteTransferError";
  }
}

export class StdinClosedError extends LauncherError {
  constructor() {
    super("stdin writer has been released", "STDIN_CLOSED");
    this.name = "StdinClosedError";
  }
}

// ── Utilities ──

/** Whether a thrown value reports cancellation rather than a genuine fault. */
export function isCanceled(value: unknown): value is CanceledError {
  return value instanceof CanceledError;
}

/** Coerce unknown thrown value to LauncherError (preserves cause chain). */
export function toLauncherError(value: unknown): LauncherError {
  if (value instanceof LauncherError) return value;
  if (value instanceof Error) return new LauncherError(value.message, "UNKNOWN", { cause: value });
  return new LauncherError(String(value ?? "Unknown error"), "UNKNOWN");
}

/** Extract error message string from unknown thrown value. */
export function errorMessage(value: unknown): string {
  if (value instanceof Error) return value.message;
  if (value == null) return "Unknown error";
  return String(value);
}

// AbortSignal.timeout() aborts with a DOMException named "TimeoutError".
function isTimeoutReason(reason: unknown): boolean {
  return (
    typeof reason === "object" &&
    reason !== null &&
    "name" in reason &&
    reason.name === "TimeoutError"
  );
}
