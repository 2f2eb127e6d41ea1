/**
 * Logging Types
 *
 * Shared by every workspace package. Entries carry the request id and
 * channel a broker operation ran under, so one generation can be followed
 * across channel and credential attempts.
 */

// ============================================
// LOG LEVELS
// ============================================

export const LOG_LEVELS = {
  trace: 0,
  debug: 1,
  info: 2,
  warn: 3,
  error: 4,
  fatal: 5,
  silent: 6
} as const;

export type LogLevel = keyof typeof LOG_LEVELS;

export function isLogLevel(value: string): value is LogLevel {
  return Object.prototype.hasOwnProperty.call(LOG_LEVELS, value);
}

// ============================================
// LOG ENTRY
// ============================================

export interface LogContext {
  /** Dotted component path, e.g. "server.broker.engine" */
  component?: string;
  /** Generation request the entry belongs to */
  requestId?: string;
  /** Channel the entry concerns */
  channel?: string;
}

export interface LogEntry {
  /** ISO timestamp */
  timestamp: string;
  level: LogLevel;
  component: string;
  message: string;
  data?: Record<string, unknown>;
  error?: {
    name: string;
    message: string;
    stack?: string;
  };
  requestId?: string;
  channel?: string;
}

// ============================================
// TRANSPORT INTERFACE
// ============================================

export interface LogTransport {
  /** Transport name, used when reporting transport failures */
  name: string;
  minLevel: LogLevel;
  log(entry: LogEntry): void;
  /** Flush buffered output (graceful shutdown) */
  flush?(): Promise<void>;
  close?(): Promise<void>;
}

// ============================================
// LOGGER CONFIG
// ============================================

export interface LoggerConfig {
  /** Entries below this level are dropped before reaching any transport */
  minLevel: LogLevel;
  component: string;
  defaultContext?: Omit<LogContext, "component">;
  transports: LogTransport[];
  /** Data keys whose values are replaced with "[REDACTED]" */
  redactPatterns?: RegExp[];
  /** Keep the last N entries in memory for the admin log endpoint */
  ringBufferSize?: number;
  /** Secret registry shared with child loggers */
  secrets?: SecretRegistry;
}

// ============================================
// LOGGER INTERFACE
// ============================================

export interface ILogger {
  trace(message: string, data?: Record<string, unknown>): void;
  debug(message: string, data?: Record<string, unknown>): void;
  info(message: string, data?: Record<string, unknown>): void;
  warn(message: string, data?: Record<string, unknown>): void;
  error(message: string, error?: unknown, data?: Record<string, unknown>): void;
  fatal(message: string, error?: unknown, data?: Record<string, unknown>): void;

  /** Create a child logger that adds to (or overrides) this logger's context */
  child(context: LogContext): ILogger;

  /** Scrub this value from every message and string field logged from now on */
  registerSecret(value: string): void;

  getRecentLogs(count?: number): LogEntry[];

  flush(): Promise<void>;
}

// ============================================
// SECRET REGISTRY
// ============================================

export interface SecretRegistry {
  add(value: string): void;
  scrub(text: string): string;
}

// ============================================
// SENSITIVE FIELD PATTERNS
// ============================================

export const DEFAULT_REDACT_PATTERNS = [
  /apiKey/i,
  /api_key/i,
  /secret/i,
  /token/i,
  /authorization/i,
  /password/i,
];
