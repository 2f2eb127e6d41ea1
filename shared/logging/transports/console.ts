/**
 * Console Transport
 *
 * One line per entry: time, level, component, request/channel tags,
 * message, then compact data. ANSI colors only on a TTY.
 */

import type { LogTransport, LogEntry, LogLevel } from "../types.js";

const COLORS = {
  reset: "\x1b[0m",
  dim: "\x1b[2m",
  red: "\x1b[31m",
  yellow: "\x1b[33m",
  blue: "\x1b[34m",
  magenta: "\x1b[35m",
  cyan: "\x1b[36m",
  white: "\x1b[37m",
  gray: "\x1b[90m",
  bgRed: "\x1b[41m",
};

const LEVEL_COLORS: Record<LogLevel, string> = {
  trace: COLORS.gray,
  debug: COLORS.cyan,
  info: COLORS.blue,
  warn: COLORS.yellow,
  error: COLORS.red,
  fatal: COLORS.bgRed + COLORS.white,
  silent: COLORS.reset,
};

const LEVEL_LABELS: Record<LogLevel, string> = {
  trace: "TRC",
  debug: "DBG",
  info: "INF",
  warn: "WRN",
  error: "ERR",
  fatal: "FTL",
  silent: "   ",
};

export interface ConsoleTransportOptions {
  minLevel?: LogLevel;
  /** Default: true when stdout is a TTY */
  colors?: boolean;
  /** Pretty print data objects across several lines (default: false) */
  prettyPrint?: boolean;
  /** Where formatted lines go; defaults to the console method matching the level */
  write?: (line: string, level: LogLevel) => void;
}

export class ConsoleTransport implements LogTransport {
  name = "console";
  minLevel: LogLevel;
  private colors: boolean;
  private prettyPrint: boolean;
  private write: (line: string, level: LogLevel) => void;

  constructor(options: ConsoleTransportOptions = {}) {
    this.minLevel = options.minLevel || "debug";
    this.colors = options.colors ?? process.stdout.isTTY === true;
    this.prettyPrint = options.prettyPrint ?? false;
    this.write = options.write || writeToConsole;
  }

  log(entry: LogEntry): void {
    this.write(this.format(entry), entry.level);
  }

  format(entry: LogEntry): string {
    const time = entry.timestamp.slice(11, 19); // HH:MM:SS
    const parts = [
      this.colorize(time, COLORS.dim),
      this.colorize(LEVEL_LABELS[entry.level], LEVEL_COLORS[entry.level]),
      this.colorize(`[${entry.component}]`, COLORS.magenta),
    ];

    const tags: string[] = [];
    if (entry.requestId) tags.push(entry.requestId);
    if (entry.channel) tags.push(`#${entry.channel}`);
    if (tags.length > 0) parts.push(this.colorize(`(${tags.join(" ")})`, COLORS.dim));

    parts.push(entry.message);
    let output = parts.join(" ");

    if (entry.data && Object.keys(entry.data).length > 0) {
      const json = this.prettyPrint ? JSON.stringify(entry.data, null, 2) : JSON.stringify(entry.data);
      output += (this.prettyPrint ? "\n" : " ") + this.colorize(json, COLORS.dim);
    }

    if (entry.error) {
      output += "\n" + this.colorize(`${entry.error.name}: ${entry.error.message}`, COLORS.red);
      if (entry.error.stack && (entry.level === "error" || entry.level === "fatal")) {
        output += "\n" + this.colorize(entry.error.stack, COLORS.dim);
      }
    }

    return output;
  }

  private colorize(text: string, color: string): string {
    if (!this.colors) return text;
    return `${color}${text}${COLORS.reset}`;
  }
}

function writeToConsole(line: string, level: LogLevel): void {
  switch (level) {
    case "trace":
    case "debug":
      console.debug(line);
      break;
    case "info":
      console.info(line);
      break;
    case "warn":
      console.warn(line);
      break;
    case "error":
    case "fatal":
      console.error(line);
      break;
    case "silent":
      break;
  }
}
