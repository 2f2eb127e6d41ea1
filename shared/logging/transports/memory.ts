/**
 * Memory Transport
 *
 * Keeps entries in an array. Used by tests to assert on what was logged.
 */

import type { LogTransport, LogEntry, LogLevel } from "../types.js";

export class MemoryTransport implements LogTransport {
  name = "memory";
  minLevel: LogLevel;
  readonly entries: LogEntry[] = [];

  constructor(minLevel: LogLevel = "trace") {
    this.minLevel = minLevel;
  }

  log(entry: LogEntry): void {
    this.entries.push(entry);
  }

  messages(): string[] {
    return this.entries.map(e => e.message);
  }

  clear(): void {
    this.entries.length = 0;
  }
}
