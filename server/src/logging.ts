/**
 * Logging Setup for the Broker Server
 *
 * Initializes the centralized logging system with console and (optionally)
 * file transports.
 */

import {
  initLogger,
  isLogLevel,
  ConsoleTransport,
  FileTransport,
} from "@pixelrelay/shared/logging";
import type { Logger, ILogger, LogLevel, LogTransport } from "@pixelrelay/shared/logging";

// ============================================
// CONFIGURATION
// ============================================

export interface LoggingOptions {
  /** Minimum level to log (default: LOG_LEVEL, else "debug" in dev, "info" in prod) */
  minLevel?: LogLevel;
  /** Enable console output (default: true) */
  console?: boolean;
  /** Directory for rotating log files (default: LOG_DIR; unset disables files) */
  logDir?: string;
  /** Extra transports, e.g. a MemoryTransport in tests */
  transports?: LogTransport[];
}

function defaultLevel(): LogLevel {
  const fromEnv = process.env.LOG_LEVEL;
  if (fromEnv && isLogLevel(fromEnv)) return fromEnv;
  return process.env.NODE_ENV === "production" ? "info" : "debug";
}

// ============================================
// INITIALIZATION
// ============================================

let logger: Logger | null = null;

/**
 * Initialize the logging system for the server.
 */
export function initServerLogging(options: LoggingOptions = {}): Logger {
  const minLevel = options.minLevel || defaultLevel();
  const transports: LogTransport[] = [];

  if (options.console !== false) {
    transports.push(new ConsoleTransport({
      minLevel,
      prettyPrint: process.env.NODE_ENV !== "production",
    }));
  }

  const logDir = options.logDir ?? process.env.LOG_DIR;
  if (logDir) {
    transports.push(new FileTransport({
      minLevel: "debug",
      logDir,
      filename: "server",
      maxSize: 10 * 1024 * 1024,
      maxFiles: 10,
    }));
  }

  transports.push(...(options.transports || []));

  logger = initLogger({
    minLevel,
    component: "server",
    transports,
    ringBufferSize: 2000,
  });

  return logger;
}

/**
 * Get the server logger instance. Auto-initializes if not already done.
 */
export function getServerLogger(): Logger {
  return logger ?? initServerLogging();
}

/**
 * Create a namespaced logger for a specific component.
 *
 * Resolution is deferred to each call so loggers created at module load
 * follow a later initServerLogging().
 */
export function createComponentLogger(component: string): ILogger {
  const name = `server.${component}`;
  const resolve = (): ILogger => getServerLogger().child({ component: name });
  return {
    trace: (message, data) => resolve().trace(message, data),
    debug: (message, data) => resolve().debug(message, data),
    info: (message, data) => resolve().info(message, data),
    warn: (message, data) => resolve().warn(message, data),
    error: (message, error, data) => resolve().error(message, error, data),
    fatal: (message, error, data) => resolve().fatal(message, error, data),
    child: (context) => getServerLogger().child({ component: name, ...context }),
    registerSecret: (value) => getServerLogger().registerSecret(value),
    getRecentLogs: (count) => getServerLogger().getRecentLogs(count),
    flush: () => getServerLogger().flush(),
  };
}
