export {
  StructuredLogger,
  ConsoleTransport,
  MemoryTransport,
  createLogger,
  createDefaultFormatter,
  getLogger,
  setRootLogger,
  parseLogLevel,
  shouldLog,
  LOG_LEVELS,
} from "./logger.js";
export type { Logger, LogLevel, LogEntry, LogContext, LogTransport, LogFormatter, LoggerOptions } from "./logger.js";
