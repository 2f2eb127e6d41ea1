/**
 * Centralized Logging System
 *
 * Usage:
 *
 * ```typescript
 * import { initLogger, log, ConsoleTransport, FileTransport } from "@pixelrelay/shared/logging";
 *
 * // Initialize once at startup
 * initLogger({
 *   minLevel: "info",
 *   component: "server",
 *   transports: [
 *     new ConsoleTransport(),
 *     new FileTransport({ logDir: "/var/log/pixelrelay" })
 *   ]
 * });
 *
 * // Scoped child loggers carry request and channel tags
 * const attemptLog = log().child({ component: "server.broker.engine", requestId, channel: "google" });
 * attemptLog.warn("Retryable failure", { reason: "rate_limit" });
 * ```
 */

export {
  LOG_LEVELS,
  DEFAULT_REDACT_PATTERNS,
  isLogLevel,
  type LogLevel,
  type LogEntry,
  type LogContext,
  type LogTransport,
  type LoggerConfig,
  type ILogger,
  type SecretRegistry
} from "./types.js";

export {
  Logger,
  SecretScrubber,
  initLogger,
  getLogger,
  log
} from "./logger.js";

export {
  ConsoleTransport,
  FileTransport,
  MemoryTransport,
  type ConsoleTransportOptions,
  type FileTransportOptions
} from "./transports/index.js";
