import type { LogContext, Logger, LogLevel } from "../interfaces/logger.js";

const SEVERITY: Record<LogLevel, number> = { debug: 10, info: 20, warn: 30, error: 40 };

export interface StructuredLoggerOptions {
  /** Receives one serialized line per entry (default: stderr) */
  writer?: (line: string) => void;
  /** Lowest level written (default: "info") */
  level?: LogLevel;
  /** Set as `component` on every line */
  component?: string;
}

interface LoggerCore {
  writer: (line: string) => void;
  threshold: number;
  component: string | undefined;
}

/**
 * JSON-lines logger. Stderr by default, leaving stdout to the child's output.
 *
 * Line layout: `time`, `level`, `msg`, `component`, then the bindings of every
 * ancestor `child()` call, then the call's own context. Later keys win over
 * earlier ones, except that the four header keys cannot be overridden.
 */
export class StructuredLogger implements Logger {
  private core: LoggerCore;
  private bindings: LogContext;

  constructor(options: StructuredLoggerOptions = {}) {
    this.core = {
      writer: options.writer ?? ((line) => process.stderr.write(`${line}\n`)),
      threshold: SEVERITY[options.level ?? "info"],
      component: options.component,
    };
    this.bindings = {};
  }

  debug(msg: string, ctx?: LogContext): void {
    this.write("debug", msg, ctx);
  }

  info(msg: string, ctx?: LogContext): void {
    this.write("info", msg, ctx);
  }

  warn(msg: string, ctx?: LogContext): void {
    this.write("warn", msg, ctx);
  }

  error(msg: string, ctx?: LogContext): void {
    this.write("error", msg, ctx);
  }

  /** Shares the writer, level and component of this logger. */
  child(bindings: LogContext): StructuredLogger {
    const child = new StructuredLogger();
    child.core = this.core;
    child.bindings = { ...this.bindings, ...bindings };
    return child;
  }

  isLevelEnabled(level: LogLevel): boolean {
    return SEVERITY[level] >= this.core.threshold;
  }

  private write(level: LogLevel, msg: string, ctx: LogContext | undefined): void {
    if (!this.isLevelEnabled(level)) return;

    const header: LogContext = { time: new Date().toISOString(), level, msg };
    if (this.core.component) header.component = this.core.component;

    const fields: LogContext = {};
    for (const source of [this.bindings, ctx ?? {}]) {
      for (const [key, value] of Object.entries(source)) {
        if (key in header || key === "component") continue;
        fields[key] = value instanceof Error ? serializeError(value) : value;
      }
    }

    let line: string;
    try {
      line = JSON.stringify({ ...header, ...fields });
    } catch {
      // Circular or BigInt values: keep the line, drop the fields
      line = JSON.stringify({ ...header, serializationError: true });
    }
    this.core.writer(line);
  }
}

/** Errors become `{ name, message, code?, stack, cause? }`. */
function serializeError(err: Error): LogContext {
  const out: LogContext = { name: err.name, message: err.message };
  if ("code" in err && err.code !== undefined) out.code = err.code;
  out.stack = err.stack;
  if (err.cause instanceof Error) out.cause = serializeError(err.cause);
  else if (err.cause !== undefined) out.cause = err.cause;
  return out;
}
