/**
 * Database Migrations
 *
 * Sequential, numbered migrations that bring the database schema
 * from any prior version to the current version. Runs at startup
 * after the database file is opened.
 *
 * Rules:
 * - Migrations are append-only. Never edit a shipped migration.
 * - Each migration runs inside a transaction.
 * - To evolve the schema, add a new function to the `migrations` array.
 */

import type Database from "better-sqlite3";
import { createComponentLogger } from "../logging.js";

const log = createComponentLogger("db");

// ============================================
// MIGRATION RUNNER
// ============================================

type Migration = (db: Database.Database) => void;

/**
 * Run all pending migrations against the open database.
 * Already-applied migrations are skipped.
 */
export function runMigrations(db: Database.Database): void {
  // Ensure the version-tracking table exists (bootstrap)
  db.exec(`
    CREATE TABLE IF NOT EXISTS schema_version (
      version INTEGER PRIMARY KEY,
      applied_at TEXT NOT NULL DEFAULT (datetime('now'))
    );
  `);

  const currentVersion = schemaVersion(db);
  if (currentVersion >= migrations.length - 1) {
    return;
  }

  log.info(`Schema at v${currentVersion}, target v${migrations.length - 1}`, {
    pending: migrations.length - 1 - currentVersion,
  });

  const stamp = db.prepare(
    "INSERT INTO schema_version (version, applied_at) VALUES (?, datetime('now'))",
  );

  for (let i = currentVersion + 1; i < migrations.length; i++) {
    const txn = db.transaction(() => {
      migrations[i](db);
      stamp.run(i);
    });
    txn();
    log.info(`Applied migration ${i}`);
  }
}

/** Highest applied migration, or -1 on a fresh database */
export function schemaVersion(db: Database.Database): number {
  const row = db.prepare<[], { v: number | null }>("SELECT MAX(version) AS v FROM schema_version").get();
  return row?.v ?? -1;
}

export function latestSchemaVersion(): number {
  return migrations.length - 1;
}

// ============================================
// MIGRATIONS
// ============================================

const migrations: Migration[] = [
  // ── v0: Baseline ──────────────────────────────────────────────────
  function v0_baseline(db) {
    db.exec(`
      CREATE TABLE IF NOT EXISTS channels (
        name TEXT PRIMARY KEY,
        position INTEGER NOT NULL,
        kind TEXT NOT NULL,
        enabled INTEGER NOT NULL DEFAULT 1,
        streaming INTEGER NOT NULL DEFAULT 0,
        endpoint TEXT NOT NULL,
        model TEXT
      );

      CREATE TABLE IF NOT EXISTS credentials (
        id TEXT PRIMARY KEY,
        channel TEXT NOT NULL,
        position INTEGER NOT NULL,
        value TEXT NOT NULL,
        threshold INTEGER NOT NULL,
        failure_count INTEGER NOT NULL DEFAULT 0,
        FOREIGN KEY (channel) REFERENCES channels(name) ON DELETE CASCADE
      );

      CREATE TABLE IF NOT EXISTS prompts (
        name TEXT PRIMARY KEY,
        content TEXT NOT NULL
      );
    `);
  },

  // ── v1: Ordered credential lookups per channel ────────────────────
  function v1_credential_order_index(db) {
    db.exec(`
      CREATE INDEX IF NOT EXISTS idx_credentials_channel_position
        ON credentials (channel, position);
    `);
  },
];
