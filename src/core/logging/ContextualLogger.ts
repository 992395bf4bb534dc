/**
 * Build logging.
 *
 * Every entry is a flat record: timestamp, level, message, then whatever the
 * logger was bound to (correlation id, step name) and the call-site fields.
 * An `error` field is expanded into `errorCode`/`errorMessage`, plus stack
 * and cause when debugging. A {@link LogSink} decides where entries go.
 *
 * @module
 */

import { BuildError } from "../errors/errors.js";

export type LogLevel = "debug" | "info" | "notice" | "warn" | "error";

export interface LogEntry {
  ts: string;
  level: LogLevel;
  msg: string;
  /** Id of the `build()` run that wrote the entry. */
  correlationId?: string;
  step?: string;
  errorCode?: string;
  errorMessage?: string;
  /** Only with `debug` on. */
  stack?: string;
  /** Only with `debug` on. */
  cause?: string;
  [key: string]: unknown;
}

export interface LogSink {
  write(entry: LogEntry): void;
}

export interface LogContext {
  correlationId?: string;
  step?: string;
  [key: string]: unknown;
}

export interface CreateLoggerOptions {
  /** Defaults to JSON lines on stdout. */
  sink?: LogSink;
  /** Defaults to "info". */
  minLevel?: LogLevel;
  /** Attach stacks and causes to error entries. */
  debug?: boolean;
  context?: LogContext;
}

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  notice: 2,
  warn: 3,
  error: 4,
};

function shouldLog(level: LogLevel, minLevel: LogLevel): boolean {
  return LEVEL_ORDER[level] >= LEVEL_ORDER[minLevel];
}

class StdoutJsonSink implements LogSink {
  write(entry: LogEntry): void {
    process.stdout.write(JSON.stringify(entry) + "\n");
  }
}

/** Discards everything; handy for library use and tests. */
export const NULL_SINK: LogSink = {
  write: () => undefined,
};

/**
 * The Builder binds a correlation id per run and each step binds its name:
 *
 * ```typescript
 * const stepLogger = logger.withContext({ correlationId, step: "Rendering pages" });
 * stepLogger.notice("Rendering pages", { stepIndex: 11, stepTotal: 12 });
 * ```
 */
export class ContextualLogger {
  private readonly sink: LogSink;
  private readonly minLevel: LogLevel;
  private readonly debugMode: boolean;
  private readonly context: LogContext;

  constructor(options: CreateLoggerOptions = {}) {
    this.sink = options.sink ?? new StdoutJsonSink();
    this.minLevel = options.minLevel ?? "info";
    this.debugMode = options.debug ?? false;
    this.context = options.context ?? {};
  }

  withContext(ctx: LogContext): ContextualLogger {
    return new ContextualLogger({
      sink: this.sink,
      minLevel: this.minLevel,
      debug: this.debugMode,
      context: { ...this.context, ...ctx },
    });
  }

  isDebug(): boolean {
    return this.debugMode;
  }

  debug(msg: string, ctx?: Record<string, unknown>): void {
    this.log("debug", msg, ctx);
  }

  info(msg: string, ctx?: Record<string, unknown>): void {
    this.log("info", msg, ctx);
  }

  /** Step progress; shown by the CLI at its default level. */
  notice(msg: string, ctx?: Record<string, unknown>): void {
    this.log("notice", msg, ctx);
  }

  warn(msg: string, ctx?: Record<string, unknown>): void {
    this.log("warn", msg, ctx);
  }

  error(msg: string, ctx?: Record<string, unknown>): void {
    this.log("error", msg, ctx);
  }

  private log(
    level: LogLevel,
    msg: string,
    ctx?: Record<string, unknown>
  ): void {
    if (!shouldLog(level, this.minLevel)) {
      return;
    }

    const entry: LogEntry = { ts: new Date().toISOString(), level, msg };

    // Call-site fields override bound ones; `error` expands into error fields
    for (const [key, value] of Object.entries({ ...this.context, ...ctx })) {
      if (value === undefined) {
        continue;
      }
      if (key === "error" && value instanceof Error) {
        this.enrichWithError(entry, value);
      } else {
        entry[key] = value;
      }
    }

    this.sink.write(entry);
  }

  private enrichWithError(entry: LogEntry, error: Error): void {
    if (error instanceof BuildError) {
      entry.errorCode = error.code;
    }
    entry.errorMessage = error.message;

    if (!this.debugMode) {
      return;
    }
    if (error.stack) {
      entry.stack = error.stack;
    }
    if (error instanceof BuildError && error.cause) {
      entry.cause = error.cause.message;
    }
  }
}

export function createLogger(options: CreateLoggerOptions = {}): ContextualLogger {
  return new ContextualLogger(options);
}
