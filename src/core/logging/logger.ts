export type LogLevel = "silent" | "error" | "warn" | "info" | "debug";

export type LogContext = Record<string, unknown>;

export interface LogRecord {
  timestamp: string;
  level: Exclude<LogLevel, "silent">;
  message: string;
  context?: LogContext;
}

export interface Logger {
  error(message: string, context?: LogContext): void;
  warn(message: string, context?: LogContext): void;
  info(message: string, context?: LogContext): void;
  debug(message: string, context?: LogContext): void;
  child(context: LogContext): Logger;
}

export type LogSink = (record: LogRecord) => void;

export interface StructuredLoggerOptions {
  level: LogLevel;
  sink: LogSink;
  nowIso?: () => string;
  /** Receives failures thrown by the sink. Logging itself never throws. */
  onSinkError?: (error: unknown) => void;
  bindings?: LogContext;
}

const LEVEL_WEIGHT: Record<LogLevel, number> = {
  silent: 0,
  error: 1,
  warn: 2,
  info: 3,
  debug: 4
};

export class StructuredLogger implements Logger {
  private readonly options: StructuredLoggerOptions;

  public constructor(options: StructuredLoggerOptions) {
    this.options = options;
  }

  public error(message: string, context?: LogContext): void {
    this.emit("error", message, context);
  }

  public warn(message: string, context?: LogContext): void {
    this.emit("warn", message, context);
  }

  public info(message: string, context?: LogContext): void {
    this.emit("info", message, context);
  }

  public debug(message: string, context?: LogContext): void {
    this.emit("debug", message, context);
  }

  public child(context: LogContext): Logger {
    return new StructuredLogger({
      ...this.options,
      bindings: {
        ...this.options.bindings,
        ...context
      }
    });
  }

  private emit(level: LogRecord["level"], message: string, context?: LogContext): void {
    if (LEVEL_WEIGHT[level] > LEVEL_WEIGHT[this.options.level]) {
      return;
    }

    const merged = mergeContext(this.options.bindings, context);
    const record: LogRecord = {
      timestamp: (this.options.nowIso ?? defaultNowIso)(),
      level,
      message,
      ...(merged ? { context: merged } : {})
    };

    try {
      this.options.sink(record);
    } catch (error) {
      (this.options.onSinkError ?? ignoreSinkError)(error);
    }
  }
}

export function createNoopLogger(): Logger {
  const logger: Logger = {
    error: () => undefined,
    warn: () => undefined,
    info: () => undefined,
    debug: () => undefined,
    child: () => logger
  };
  return logger;
}

export function isLogLevel(value: unknown): value is LogLevel {
  return typeof value === "string" && Object.hasOwn(LEVEL_WEIGHT, value);
}

function mergeContext(bindings?: LogContext, context?: LogContext): LogContext | undefined {
  if (!bindings && !context) {
    return undefined;
  }
  return { ...bindings, ...context };
}

function defaultNowIso(): string {
  return new Date().toISOString();
}

function ignoreSinkError(_error: unknown): void {
  return undefined;
}
