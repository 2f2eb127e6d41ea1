/**
 * Core Logger Implementation
 *
 * Structured logging with pluggable transports, a ring buffer of recent
 * entries, key-based redaction and scrubbing of registered secret values.
 */

import { LOG_LEVELS, DEFAULT_REDACT_PATTERNS } from "./types.js";
import type {
  LogLevel,
  LogEntry,
  LogContext,
  LoggerConfig,
  ILogger,
  SecretRegistry
} from "./types.js";

const SECRET_PLACEHOLDER = "[SECRET]";

/** Secrets shorter than this are not scrubbed (would mangle ordinary words) */
const MIN_SECRET_LENGTH = 6;

// ============================================
// RING BUFFER
// ============================================

class RingBuffer<T> {
  private buffer: (T | undefined)[];
  private head = 0;
  private count = 0;

  constructor(private capacity: number) {
    this.buffer = new Array<T | undefined>(capacity);
  }

  push(item: T): void {
    this.buffer[this.head] = item;
    this.head = (this.head + 1) % this.capacity;
    if (this.count < this.capacity) this.count++;
  }

  getLast(n: number): T[] {
    const ordered = this.count < this.capacity
      ? this.buffer.slice(0, this.count)
      : [...this.buffer.slice(this.head), ...this.buffer.slice(0, this.head)];
    return ordered.filter((item): item is T => item !== undefined).slice(-n);
  }
}

// ============================================
// SECRET SCRUBBING
// ============================================

export class SecretScrubber implements SecretRegistry {
  private secrets = new Set<string>();

  add(value: string): void {
    if (value.length >= MIN_SECRET_LENGTH) this.secrets.add(value);
  }

  scrub(text: string): string {
    let out = text;
    for (const secret of this.secrets) {
      if (out.includes(secret)) out = out.split(secret).join(SECRET_PLACEHOLDER);
    }
    return out;
  }
}

// ============================================
// LOGGER IMPLEMENTATION
// ============================================

export class Logger implements ILogger {
  private config: LoggerConfig;
  private redactPatterns: RegExp[];
  private secrets: SecretRegistry;
  private ringBuffer: RingBuffer<LogEntry>;
  private context: Omit<LogContext, "component">;

  constructor(config: LoggerConfig, ringBuffer?: RingBuffer<LogEntry>) {
    this.config = config;
    this.redactPatterns = config.redactPatterns || DEFAULT_REDACT_PATTERNS;
    this.secrets = config.secrets || new SecretScrubber();
    // Children share the parent's buffer so recent logs cover every component
    this.ringBuffer = ringBuffer || new RingBuffer<LogEntry>(config.ringBufferSize || 1000);
    this.context = { ...config.defaultContext };
  }

  // ----------------------------------------
  // Log Methods
  // ----------------------------------------

  trace(message: string, data?: Record<string, unknown>): void {
    this.log("trace", message, data);
  }

  debug(message: string, data?: Record<string, unknown>): void {
    this.log("debug", message, data);
  }

  info(message: string, data?: Record<string, unknown>): void {
    this.log("info", message, data);
  }

  warn(message: string, data?: Record<string, unknown>): void {
    this.log("warn", message, data);
  }

  error(message: string, error?: unknown, data?: Record<string, unknown>): void {
    this.log("error", message, data, error);
  }

  fatal(message: string, error?: unknown, data?: Record<string, unknown>): void {
    this.log("fatal", message, data, error);
  }

  // ----------------------------------------
  // Core Logging
  // ----------------------------------------

  private log(
    level: LogLevel,
    message: string,
    data?: Record<string, unknown>,
    error?: unknown
  ): void {
    if (LOG_LEVELS[level] < LOG_LEVELS[this.config.minLevel]) {
      return;
    }

    const entry: LogEntry = {
      timestamp: new Date().toISOString(),
      level,
      component: this.config.component,
      message: this.secrets.scrub(message),
    };
    if (this.context.requestId) entry.requestId = this.context.requestId;
    if (this.context.channel) entry.channel = this.context.channel;

    if (data) {
      entry.data = this.redact(data);
    }

    if (error !== undefined) {
      entry.error = error instanceof Error
        ? { name: error.name, message: this.secrets.scrub(error.message), stack: error.stack }
        : { name: "Unknown", message: this.secrets.scrub(String(error)) };
    }

    this.ringBuffer.push(entry);

    for (const transport of this.config.transports) {
      if (LOG_LEVELS[level] >= LOG_LEVELS[transport.minLevel]) {
        try {
          transport.log(entry);
        } catch (e) {
          console.error(`[Logger] Transport ${transport.name} failed:`, e);
        }
      }
    }
  }

  // ----------------------------------------
  // Redaction
  // ----------------------------------------

  private redact(data: Record<string, unknown>): Record<string, unknown> {
    const result: Record<string, unknown> = {};

    for (const [key, value] of Object.entries(data)) {
      if (this.redactPatterns.some(pattern => pattern.test(key))) {
        result[key] = "[REDACTED]";
      } else if (typeof value === "string") {
        result[key] = this.secrets.scrub(value);
      } else if (isPlainRecord(value)) {
        result[key] = this.redact(value);
      } else {
        result[key] = value;
      }
    }

    return result;
  }

  // ----------------------------------------
  // Context Management
  // ----------------------------------------

  child(context: LogContext): ILogger {
    const { component, ...rest } = context;
    return new Logger({
      ...this.config,
      component: component || this.config.component,
      secrets: this.secrets,
      redactPatterns: this.redactPatterns,
      defaultContext: { ...this.context, ...rest },
    }, this.ringBuffer);
  }

  registerSecret(value: string): void {
    this.secrets.add(value);
  }

  getRecentLogs(count: number = 100): LogEntry[] {
    return this.ringBuffer.getLast(count);
  }

  // ----------------------------------------
  // Lifecycle
  // ----------------------------------------

  async flush(): Promise<void> {
    await Promise.all(this.config.transports.map(t => t.flush?.()));
  }

  async close(): Promise<void> {
    await this.flush();
    await Promise.all(this.config.transports.map(t => t.close?.()));
  }
}

function isPlainRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value)
    && Object.getPrototypeOf(value) === Object.prototype;
}

// ============================================
// GLOBAL LOGGER SINGLETON
// ============================================

let globalLogger: Logger | null = null;

export function initLogger(config: LoggerConfig): Logger {
  globalLogger = new Logger(config);
  return globalLogger;
}

export function getLogger(): Logger {
  if (!globalLogger) {
    throw new Error("Logger not initialized. Call initLogger() first.");
  }
  return globalLogger;
}

export function log(): Logger {
  return getLogger();
}
