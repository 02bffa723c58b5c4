/**
 * Logging Subsystem
 *
 * Structured, leveled logging with named subsystems, contextual fields,
 * secret redaction and pluggable transports. Output goes to stderr so that
 * CLI commands can keep stdout for their JSON results.
 */

// =============================================================================
// Logger Types
// =============================================================================

export type LogLevel = "trace" | "debug" | "info" | "warn" | "error" | "fatal";

export const LOG_LEVELS: readonly LogLevel[] = ["trace", "debug", "info", "warn", "error", "fatal"];

export type LogEntry = {
  timestamp: Date;
  level: LogLevel;
  subsystem: string;
  message: string;
  metadata?: Record<string, unknown>;
  context?: LogContext;
};

export type LogFormatter = (entry: LogEntry) => string;

export interface LogTransport {
  name: string;
  write(entry: LogEntry): void;
}

/**
 * Fields attached to every entry written by a contextual logger, e.g. the
 * subscription or the query being served.
 */
export type LogContext = {
  subscriptionId?: string;
  requestId?: string;
  [key: string]: unknown;
};

export interface Logger {
  readonly subsystem: string;

  trace(message: string, meta?: Record<string, unknown>): void;
  debug(message: string, meta?: Record<string, unknown>): void;
  info(message: string, meta?: Record<string, unknown>): void;
  warn(message: string, meta?: Record<string, unknown>): void;
  error(message: string, meta?: Record<string, unknown>): void;
  fatal(message: string, meta?: Record<string, unknown>): void;

  child(name: string): Logger;
  withContext(context: LogContext): Logger;
  setLevel(level: LogLevel): void;
  getLevel(): LogLevel;
  isLevelEnabled(level: LogLevel): boolean;
}

// =============================================================================
// Log Level Utilities
// =============================================================================

const LOG_LEVEL_PRIORITY: Record<LogLevel, number> = {
  trace: 0,
  debug: 1,
  info: 2,
  warn: 3,
  error: 4,
  fatal: 5,
};

export function shouldLog(level: LogLevel, minLevel: LogLevel): boolean {
  return LOG_LEVEL_PRIORITY[level] >= LOG_LEVEL_PRIORITY[minLevel];
}

export function isLogLevel(value: string): value is LogLevel {
  return LOG_LEVELS.some((level) => level === value);
}

/**
 * Accepts both lower-case levels and the upper-case names used in
 * environment variables (`LOG_LEVEL=WARNING`).
 */
export function parseLogLevel(value: string | undefined, fallback: LogLevel = "info"): LogLevel {
  if (!value) return fallback;
  const normalized = value.trim().toLowerCase();
  if (normalized === "warning") return "warn";
  if (normalized === "critical") return "fatal";
  return isLogLevel(normalized) ? normalized : fallback;
}

// =============================================================================
// Default Log Formatter
// =============================================================================

const COLORS = {
  reset: "\x1b[0m",
  dim: "\x1b[2m",
  cyan: "\x1b[36m",
  green: "\x1b[32m",
  yellow: "\x1b[33m",
  red: "\x1b[31m",
  magenta: "\x1b[35m",
  blue: "\x1b[34m",
};

const LEVEL_COLORS: Record<LogLevel, string> = {
  trace: COLORS.dim,
  debug: COLORS.cyan,
  info: COLORS.green,
  warn: COLORS.yellow,
  error: COLORS.red,
  fatal: COLORS.magenta,
};

export function createDefaultFormatter(options?: {
  colors?: boolean;
  timestamps?: boolean;
  includeMetadata?: boolean;
}): LogFormatter {
  const {
    colors = process.stderr.isTTY ?? false,
    timestamps = true,
    includeMetadata = true,
  } = options ?? {};

  const paint = (color: string, text: string) => (colors ? `${color}${text}${COLORS.reset}` : text);

  return (entry: LogEntry): string => {
    const parts: string[] = [];

    if (timestamps) parts.push(paint(COLORS.dim, entry.timestamp.toISOString()));
    parts.push(paint(LEVEL_COLORS[entry.level], entry.level.toUpperCase().padEnd(5)));
    parts.push(paint(COLORS.blue, `[${entry.subsystem}]`));
    parts.push(entry.message);

    if (entry.context && Object.keys(entry.context).length > 0) {
      const ctx = Object.entries(entry.context)
        .map(([key, value]) => `${key}=${String(value)}`)
        .join(" ");
      parts.push(paint(COLORS.dim, `(${ctx})`));
    }

    if (includeMetadata && entry.metadata && Object.keys(entry.metadata).length > 0) {
      parts.push(paint(COLORS.dim, JSON.stringify(entry.metadata)));
    }

    return parts.join(" ");
  };
}

// =============================================================================
// Transports
// =============================================================================

export class ConsoleTransport implements LogTransport {
  name = "console";
  private formatter: LogFormatter;

  constructor(options?: { formatter?: LogFormatter }) {
    this.formatter = options?.formatter ?? createDefaultFormatter();
  }

  write(entry: LogEntry): void {
    process.stderr.write(`${this.formatter(entry)}\n`);
  }
}

/**
 * Keeps entries in memory. Used by tests to assert on emitted warnings.
 */
export class MemoryTransport implements LogTransport {
  name = "memory";
  readonly entries: LogEntry[] = [];

  write(entry: LogEntry): void {
    this.entries.push(entry);
  }

  messages(level?: LogLevel): string[] {
    return this.entries.filter((e) => level === undefined || e.level === level).map((e) => e.message);
  }

  clear(): void {
    this.entries.length = 0;
  }
}

// =============================================================================
// Logger Implementation
// =============================================================================

export type LoggerOptions = {
  subsystem: string;
  level?: LogLevel;
  transports?: LogTransport[];
  context?: LogContext;
  redactPatterns?: string[];
};

export class StructuredLogger implements Logger {
  readonly subsystem: string;
  private level: LogLevel;
  private transports: LogTransport[];
  private context: LogContext;
  private redactPatterns: RegExp[];

  constructor(options: LoggerOptions) {
    this.subsystem = options.subsystem;
    this.level = options.level ?? "info";
    this.transports = options.transports ?? [new ConsoleTransport()];
    this.context = options.context ?? {};
    this.redactPatterns = (options.redactPatterns ?? []).map((p) => new RegExp(p, "gi"));
  }

  trace(message: string, meta?: Record<string, unknown>): void {
    this.log("trace", message, meta);
  }

  debug(message: string, meta?: Record<string, unknown>): void {
    this.log("debug", message, meta);
  }

  info(message: string, meta?: Record<string, unknown>): void {
    this.log("info", message, meta);
  }

  warn(message: string, meta?: Record<string, unknown>): void {
    this.log("warn", message, meta);
  }

  error(message: string, meta?: Record<string, unknown>): void {
    this.log("error", message, meta);
  }

  fatal(message: string, meta?: Record<string, unknown>): void {
    this.log("fatal", message, meta);
  }

  child(name: string): Logger {
    return this.derive({ subsystem: `${this.subsystem}/${name}` });
  }

  withContext(context: LogContext): Logger {
    return this.derive({ context: { ...this.context, ...context } });
  }

  setLevel(level: LogLevel): void {
    this.level = level;
  }

  getLevel(): LogLevel {
    return this.level;
  }

  isLevelEnabled(level: LogLevel): boolean {
    return shouldLog(level, this.level);
  }

  private derive(overrides: Partial<LoggerOptions>): Logger {
    return new StructuredLogger({
      subsystem: this.subsystem,
      level: this.level,
      transports: this.transports,
      context: this.context,
      redactPatterns: this.redactPatterns.map((r) => r.source),
      ...overrides,
    });
  }

  private log(level: LogLevel, message: string, meta?: Record<string, unknown>): void {
    if (!shouldLog(level, this.level)) return;

    const entry: LogEntry = {
      timestamp: new Date(),
      level,
      subsystem: this.subsystem,
      message: this.redact(message),
      metadata: meta ? this.redactObject(meta) : undefined,
      context: Object.keys(this.context).length > 0 ? this.context : undefined,
    };

    for (const transport of this.transports) {
      transport.write(entry);
    }
  }

  private redact(value: string): string {
    let result = value;
    for (const pattern of this.redactPatterns) {
      result = result.replace(pattern, "[REDACTED]");
    }
    return result;
  }

  private redactObject(obj: Record<string, unknown>): Record<string, unknown> {
    const result: Record<string, unknown> = {};
    for (const [key, value] of Object.entries(obj)) {
      if (typeof value === "string") {
        result[key] = this.redact(value);
      } else if (isPlainRecord(value)) {
        result[key] = this.redactObject(value);
      } else {
        result[key] = value;
      }
    }
    return result;
  }
}

function isPlainRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value) && !(value instanceof Error);
}

// =============================================================================
// Logger Factory
// =============================================================================

const ROOT_SUBSYSTEM = "vnet-topology";

const DEFAULT_REDACT_PATTERNS = [
  "(client_?secret|api_?key|password)=[^\\s&]+",
  "Bearer\\s+[A-Za-z0-9._~+/=-]+",
];

export function createLogger(
  subsystem: string,
  options?: Omit<LoggerOptions, "subsystem">,
): Logger {
  return new StructuredLogger({
    subsystem: `${ROOT_SUBSYSTEM}/${subsystem}`,
    redactPatterns: DEFAULT_REDACT_PATTERNS,
    ...options,
  });
}

let rootLogger: Logger | null = null;

/**
 * Get the process-wide logger, or a child of it for a subsystem.
 */
export function getLogger(subsystem?: string): Logger {
  if (!rootLogger) {
    rootLogger = new StructuredLogger({
      subsystem: ROOT_SUBSYSTEM,
      level: parseLogLevel(process.env.LOG_LEVEL),
      redactPatterns: DEFAULT_REDACT_PATTERNS,
    });
  }
  return subsystem ? rootLogger.child(subsystem) : rootLogger;
}

export function setRootLogger(logger: Logger): void {
  rootLogger = logger;
}
