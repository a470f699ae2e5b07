/** Fields attached to a log line. */
export type LogContext = Record<string, unknown>;

export type LogLevel = "debug" | "info" | "warn" | "error";

/**
 * Logger the launcher and adapters write through.
 *
 * `child` returns a logger whose lines carry `bindings` in addition to their own
 * context; a launcher binds `file` at construction and `pid` once spawned.
 */
export interface Logger {
  debug(msg: string, ctx?: LogContext): void;
  info(msg: string, ctx?: LogContext): void;
  warn(msg: string, ctx?: LogContext): void;
  error(msg: string, ctx?: LogContext): void;
  child(bindings: LogContext): Logger;
}
