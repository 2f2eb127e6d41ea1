/**
 * File Transport
 *
 * JSON-lines log files, one per day, rotated by size.
 * Node.js only.
 */

import * as fs from "fs";
import * as path from "path";
import type { LogTransport, LogEntry, LogLevel } from "../types.js";

export interface FileTransportOptions {
  minLevel?: LogLevel;
  logDir: string;
  /** Base filename (default: "pixelrelay") */
  filename?: string;
  /** Max file size in bytes before rotation (default: 10MB) */
  maxSize?: number;
  /** Rotated files kept per day (default: 5) */
  maxFiles?: number;
}

export class FileTransport implements LogTransport {
  name = "file";
  minLevel: LogLevel;
  private logDir: string;
  private filename: string;
  private maxSize: number;
  private maxFiles: number;
  private currentPath = "";
  private stream: fs.WriteStream | null = null;
  private currentSize = 0;

  constructor(options: FileTransportOptions) {
    this.minLevel = options.minLevel || "info";
    this.logDir = options.logDir;
    this.filename = options.filename || "pixelrelay";
    this.maxSize = options.maxSize || 10 * 1024 * 1024;
    this.maxFiles = options.maxFiles || 5;

    fs.mkdirSync(this.logDir, { recursive: true });
    this.open();
  }

  log(entry: LogEntry): void {
    const line = JSON.stringify(entry) + "\n";
    const bytes = Buffer.byteLength(line);

    if (this.pathForToday() !== this.currentPath) {
      this.open();
    } else if (this.currentSize + bytes > this.maxSize) {
      this.rotate();
    }

    this.stream?.write(line);
    this.currentSize += bytes;
  }

  private pathForToday(): string {
    const date = new Date().toISOString().slice(0, 10); // YYYY-MM-DD
    return path.join(this.logDir, `${this.filename}-${date}.log`);
  }

  private open(): void {
    this.stream?.end();
    this.currentPath = this.pathForToday();
    this.currentSize = fs.existsSync(this.currentPath) ? fs.statSync(this.currentPath).size : 0;
    this.stream = fs.createWriteStream(this.currentPath, { flags: "a" });
    this.stream.on("error", (err: Error) => {
      console.error("[FileTransport] Write error:", err);
    });
  }

  private rotate(): void {
    this.stream?.end();
    this.stream = null;

    // name.log.(n-1) → name.log.n, dropping the oldest
    const oldest = `${this.currentPath}.${this.maxFiles}`;
    if (fs.existsSync(oldest)) fs.unlinkSync(oldest);
    for (let i = this.maxFiles - 1; i >= 1; i--) {
      const from = `${this.currentPath}.${i}`;
      if (fs.existsSync(from)) fs.renameSync(from, `${this.currentPath}.${i + 1}`);
    }
    if (fs.existsSync(this.currentPath)) {
      fs.renameSync(this.currentPath, `${this.currentPath}.1`);
    }

    this.open();
  }

  async flush(): Promise<void> {
    const stream = this.stream;
    if (!stream || stream.writableLength === 0) return;
    await new Promise<void>((resolve) => stream.once("drain", () => resolve()));
  }

  async close(): Promise<void> {
    const stream = this.stream;
    this.stream = null;
    if (!stream) return;
    await new Promise<void>((resolve) => stream.end(() => resolve()));
  }
}
