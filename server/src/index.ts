/**
 * pixelrelay Server - Main Entry Point
 *
 * Loads configuration, restores broker state from SQLite and serves the
 * generation and admin HTTP API.
 */

import { serve } from "@hono/node-server";
import { createApp } from "./app.js";
import { createBroker } from "./broker/broker.js";
import { SqliteStateStore } from "./broker/state/sqlite-store.js";
import { loadConfig } from "./config.js";
import { closeDatabase, initDatabase } from "./db/index.js";
import { initServerLogging } from "./logging.js";

// ============================================
// CONFIGURATION
// ============================================

const config = loadConfig();
const logger = initServerLogging();
const log = logger.child({ component: "server.main" });

for (const warning of config.warnings) {
  log.warn(warning);
}

// ============================================
// BROKER
// ============================================

const db = initDatabase(config.dbDir);

const broker = createBroker({
  store: new SqliteStateStore(db),
  defaultThreshold: config.defaultThreshold,
  requestTimeoutMs: config.requestTimeoutMs,
  streamTimeoutMs: config.streamTimeoutMs,
  channelPriority: config.channelPriority,
  thirdPartyKeyPrefix: config.thirdPartyKeyPrefix,
  firstPartyChannel: config.firstPartyChannel,
  thirdPartyChannel: config.thirdPartyChannel,
});

if (config.firstPartyEndpoint) {
  broker.seedFirstPartyChannel(config.firstPartyEndpoint);
}

const summaries = broker.channelSummaries();
log.info(`Loaded ${summaries.length} channel(s)`, {
  channels: summaries.map(s => `${s.name} ${s.active}/${s.total}${s.enabled ? "" : " (disabled)"}`),
});
if (!config.adminToken) {
  log.warn("ADMIN_TOKEN not set; admin API is unauthenticated");
}

// ============================================
// HTTP API
// ============================================

const app = createApp(broker, { adminToken: config.adminToken });

const server = serve({ fetch: app.fetch, port: config.port }, (info) => {
  log.info(`HTTP server running on http://localhost:${info.port}`);
});

// ============================================
// SHUTDOWN
// ============================================

let shuttingDown = false;

async function shutdown(signal: string): Promise<void> {
  if (shuttingDown) return;
  shuttingDown = true;
  log.info(`Received ${signal}, shutting down`);

  await new Promise<void>((resolve) => server.close(() => resolve()));
  broker.close();
  closeDatabase();
  await logger.close();
  process.exit(0);
}

for (const signal of ["SIGINT", "SIGTERM"] as const) {
  process.on(signal, () => {
    shutdown(signal).catch((err) => {
      log.fatal("Shutdown failed", err);
      process.exit(1);
    });
  });
}
