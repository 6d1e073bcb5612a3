/**
 * Agent Logging Subsystem
 *
 * Structured, subsystem-scoped logging with pluggable transports and
 * redaction. There is no process-wide logger: the root logger is built once
 * with the agent context and handed to each component, which derives a
 * child for its own subsystem.
 */

import { formatErrorMessage } from "../errors.js";

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
  requestId?: string;
  service?: string;
  operationType?: string;
};

export type LogFormatter = (entry: LogEntry) => string;

export interface LogTransport {
  name: string;
  write(entry: LogEntry): void;
}

/**
 * Context stamped onto every entry of a contextual logger
 */
export type LogContext = {
  requestId?: string;
  service?: string;
  operationType?: string;
};

export interface AgentLogger {
  readonly subsystem: string;

  trace(message: string, meta?: Record<string, unknown>): void;
  debug(message: string, meta?: Record<string, unknown>): void;
  info(message: string, meta?: Record<string, unknown>): void;
  warn(message: string, meta?: Record<string, unknown>): void;
  error(message: string, meta?: Record<string, unknown>): void;
  fatal(message: string, meta?: Record<string, unknown>): void;

  child(name: string): AgentLogger;
  withContext(context: LogContext): AgentLogger;
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

export function isLogLevel(value: unknown): value is LogLevel {
  return typeof value === "string" && value in LOG_LEVEL_PRIORITY;
}

/**
 * Check if a level should be logged given a minimum level
 */
export function shouldLog(level: LogLevel, minLevel: LogLevel): boolean {
  return LOG_LEVEL_PRIORITY[level] >= LOG_LEVEL_PRIORITY[minLevel];
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

    if (timestamps) {
      parts.push(paint(COLORS.dim, entry.timestamp.toISOString()));
    }

    parts.push(paint(LEVEL_COLORS[entry.level], entry.level.toUpperCase().padEnd(5)));
    parts.push(paint(COLORS.blue, `[${entry.subsystem}]`));
    parts.push(entry.message);

    const contextParts: string[] = [];
    if (entry.requestId) contextParts.push(`request=${entry.requestId}`);
    if (entry.service) contextParts.push(`service=${entry.service}`);
    if (entry.operationType) contextParts.push(`operation=${entry.operationType}`);
    if (contextParts.length > 0) {
      parts.push(paint(COLORS.dim, `(${contextParts.join(" ")})`));
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

/**
 * Console transport. Everything goes to stderr so that CLI output on stdout
 * stays machine-readable.
 */
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
 * In-memory transport, used by tests and by callers that want to inspect
 * what a request logged.
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

export class AgentLoggerImpl implements AgentLogger {
  readonly subsystem: string;
  private level: LogLevel;
  private transports: LogTransport[];
  private context: LogContext;
  private redactPatterns: RegExp[];

  constructor(options: {
    subsystem: string;
    level?: LogLevel;
    transports?: LogTransport[];
    context?: LogContext;
    redactPatterns?: string[];
  }) {
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

  child(name: string): AgentLogger {
    return this.derive(`${this.subsystem}/${name}`, this.context);
  }

  withContext(context: LogContext): AgentLogger {
    return this.derive(this.subsystem, { ...this.context, ...context });
  }

  getLevel(): LogLevel {
    return this.level;
  }

  isLevelEnabled(level: LogLevel): boolean {
    return shouldLog(level, this.level);
  }

  private derive(subsystem: string, context: LogContext): AgentLogger {
    return new AgentLoggerImpl({
      subsystem,
      level: this.level,
      transports: this.transports,
      context,
      redactPatterns: this.redactPatterns.map((r) => r.source),
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
      requestId: this.context.requestId,
      service: this.context.service,
      operationType: this.context.operationType,
    };

    for (const transport of this.transports) {
      try {
        transport.write(entry);
      } catch (err) {
        process.stderr.write(`[logging] transport "${transport.name}" failed: ${formatErrorMessage(err)}\n`);
      }
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
      result[key] = this.redactValue(value);
    }
    return result;
  }

  private redactValue(value: unknown): unknown {
    if (typeof value === "string") return this.redact(value);
    if (Array.isArray(value)) return value.map((item) => this.redactValue(item));
    if (typeof value === "object" && value !== null) {
      return this.redactObject(Object.fromEntries(Object.entries(value)));
    }
    return value;
  }
}

// =============================================================================
// Logger Factory
// =============================================================================

/**
 * Access keys and secrets that must never reach a log line
 */
export const DEFAULT_REDACT_PATTERNS = [
  "AKIA[0-9A-Z]{16}",
  "(?<=aws_secret_access_key[\"'=: ]{1,4})[A-Za-z0-9/+=]{40}",
];

export function createAgentLogger(
  subsystem: string,
  options: { level?: LogLevel; transports?: LogTransport[]; redactPatterns?: string[] } = {},
): AgentLogger {
  return new AgentLoggerImpl({
    subsystem,
    level: options.level ?? "info",
    transports: options.transports,
    redactPatterns: options.redactPatterns ?? DEFAULT_REDACT_PATTERNS,
  });
}

/**
 * Logger tagged with a request id; the logger itself when there is none
 */
export function forRequest(logger: AgentLogger, requestId: string | undefined): AgentLogger {
  return requestId ? logger.withContext({ requestId }) : logger;
}
