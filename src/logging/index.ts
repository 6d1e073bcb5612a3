/**
 * Agent Logging Module Index
 */

export {
  type LogLevel,
  type LogEntry,
  type LogFormatter,
  type LogTransport,
  type AgentLogger,
  type LogContext,
  LOG_LEVELS,
  isLogLevel,
  shouldLog,
  createDefaultFormatter,
  ConsoleTransport,
  MemoryTransport,
  AgentLoggerImpl,
  createAgentLogger,
  forRequest,
  DEFAULT_REDACT_PATTERNS,
} from "./logger.js";
