import { createWriteStream } from "node:fs";
import { StructuredLogger, createNoopLogger, type LogRecord } from "../../core/logging/index.js";
import type { LogLevel, Logger } from "../../core/logging/index.js";

export interface NodeLoggerConfig {
  level: LogLevel;
  stream?: NodeJS.WritableStream;
}

export interface FileLoggerConfig {
  filePath: string;
  level?: LogLevel;
}

export interface FileLoggerHandle {
  logger: Logger;
  filePath: string;
  close(): Promise<void>;
}

const LEVEL_LABELS: Record<LogRecord["level"], string> = {
  debug: "DEBUG",
  info: "INFO",
  warn: "WARNING",
  error: "ERROR"
};

export function createNodeLogger(config: NodeLoggerConfig): Logger {
  if (config.level === "silent") {
    return createNoopLogger();
  }

  const stream = config.stream ?? process.stderr;

  return new StructuredLogger({
    level: config.level,
    sink: (record) => {
      stream.write(renderRecord(record));
    },
    onSinkError: reportSinkError
  });
}

/**
 * Opens `filePath` for appending and returns a logger bound to it. The caller
 * owns the handle and must `close()` it at shutdown. One handle per file:
 * concurrent writers are not coordinated.
 */
export function createFileLogger(config: FileLoggerConfig): FileLoggerHandle {
  const stream = createWriteStream(config.filePath, { flags: "a", encoding: "utf-8" });
  let closed: Promise<void> | undefined;
  stream.on("error", reportSinkError);

  const logger = createNodeLogger({
    level: config.level ?? "info",
    stream
  });

  return {
    logger,
    filePath: config.filePath,
    close(): Promise<void> {
      closed ??= new Promise<void>((resolve) => {
        stream.end(() => resolve());
      });
      return closed;
    }
  };
}

/** One record per line; the message is folded onto that line. */
function renderRecord(record: LogRecord): string {
  const message = record.message.replace(/\r?\n/g, " ");
  return `${formatLocalTimestamp(record.timestamp)} - ${LEVEL_LABELS[record.level]} - ${message}\n`;
}

/** `YYYY-MM-DD HH:MM:SS` in local time; unparseable input is kept as is. */
export function formatLocalTimestamp(iso: string): string {
  const date = new Date(iso);
  if (Number.isNaN(date.getTime())) {
    return iso;
  }
  const pad = (value: number) => String(value).padStart(2, "0");
  const day = `${date.getFullYear()}-${pad(date.getMonth() + 1)}-${pad(date.getDate())}`;
  const time = `${pad(date.getHours())}:${pad(date.getMinutes())}:${pad(date.getSeconds())}`;
  return `${day} ${time}`;
}

function reportSinkError(error: unknown): void {
  const reason = error instanceof Error ? error.message : String(error);
  process.stderr.write(`datasink: failed to write log record: ${reason}\n`);
}
