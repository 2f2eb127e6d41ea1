/**
 * Database Manager
 *
 * SQLite database holding channels, credentials and named prompts.
 */

import Database from "better-sqlite3";
import * as path from "path";
import * as fs from "fs";
import { runMigrations } from "./migrations.js";
import { createComponentLogger } from "../logging.js";

const log = createComponentLogger("db");

export const DB_FILENAME = "pixelrelay.db";

// ============================================
// DATABASE SETUP
// ============================================

let db: Database.Database | null = null;

export function getDatabase(): Database.Database {
  if (!db) {
    throw new Error("Database not initialized. Call initDatabase() first.");
  }
  return db;
}

/**
 * Open (or create) the database and bring its schema up to date.
 * Pass ":memory:" for a throwaway database.
 */
export function openDatabase(location: string): Database.Database {
  if (location !== ":memory:") {
    fs.mkdirSync(path.dirname(location), { recursive: true });
  }

  const handle = new Database(location);
  handle.pragma("journal_mode = WAL");
  handle.pragma("foreign_keys = ON");

  // Creates tables on a fresh DB, evolves the schema on an existing one
  runMigrations(handle);
  return handle;
}

export function initDatabase(dbDir: string): Database.Database {
  const dbPath = path.join(dbDir, DB_FILENAME);
  db = openDatabase(dbPath);
  log.info(`Database initialized at ${dbPath}`);
  return db;
}

export function closeDatabase(): void {
  if (db) {
    db.close();
    db = null;
  }
}
