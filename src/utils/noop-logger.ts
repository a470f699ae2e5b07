import type { LogContext, Logger } from "../interfaces/logger.js";

/** Discards every line; children are the same instance. */
export class NoopLogger implements Logger {
  debug(_msg: string, _ctx?: LogContext): void {}
  info(_msg: string, _ctx?: LogContext): void {}
  warn(_msg: string, _ctx?: LogContext): void {}
  error(_msg: string, _ctx?: LogContext): void {}

  child(_bindings: LogContext): Logger {
    return this;
  }
}

export const noopLogger: Logger = new NoopLogger();
