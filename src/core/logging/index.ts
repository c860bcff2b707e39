export {
  StructuredLogger,
  createNoopLogger,
  isLogLevel
} from "./logger.js";
export type {
  LogContext,
  LogLevel,
  LogRecord,
  LogSink,
  Logger,
  StructuredLoggerOptions
} from "./logger.js";
