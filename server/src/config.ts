/**
 * Server Configuration
 *
 * Environment variables for the HTTP surface, persistence, timeouts and
 * credential defaults. Importable by any module that needs config without
 * pulling in the full server.
 */

import { config } from "dotenv";
import { resolve, dirname, join } from "path";
import { homedir } from "os";
import { fileURLToPath } from "url";
import { UNLIMITED_THRESHOLD } from "./broker/types.js";

// Load .env from project root (ESM compatible)
const __filename = fileURLToPath(import.meta.url);
const __dirname = dirname(__filename);
config({ path: resolve(__dirname, "../../.env") });

// ============================================
// TYPES
// ============================================

export interface BrokerConfig {
  port: number;
  dbDir: string;
  adminToken: string | null;
  requestTimeoutMs: number;
  streamTimeoutMs: number;
  defaultThreshold: number;
  channelPriority: string[];
  thirdPartyKeyPrefix: string;
  firstPartyChannel: string;
  thirdPartyChannel: string;
  firstPartyEndpoint: string | null;
  /** Problems found while reading the environment; defaults were used instead */
  warnings: string[];
}

type Env = Record<string, string | undefined>;

// ============================================
// LOADING
// ============================================

function readInt(env: Env, name: string, fallback: number, warnings: string[], min = 1): number {
  const raw = env[name]?.trim();
  if (!raw) return fallback;
  const value = Number(raw);
  if (!Number.isInteger(value) || value < min) {
    warnings.push(`${name}="${raw}" is not an integer >= ${min}; using ${fallback}`);
    return fallback;
  }
  return value;
}

function readList(raw: string | undefined): string[] {
  if (!raw) return [];
  return raw.split(",").map(s => s.trim()).filter(Boolean);
}

export function loadConfig(env: Env = process.env): BrokerConfig {
  const warnings: string[] = [];

  const thresholdRaw = env.DEFAULT_FAILURE_THRESHOLD?.trim();
  let defaultThreshold = 5;
  if (thresholdRaw) {
    const parsed = Number(thresholdRaw);
    if (!Number.isInteger(parsed) || (parsed < 0 && parsed !== UNLIMITED_THRESHOLD)) {
      throw new Error(
        `DEFAULT_FAILURE_THRESHOLD must be a non-negative integer or ${UNLIMITED_THRESHOLD} (got "${thresholdRaw}")`,
      );
    }
    defaultThreshold = parsed;
  }

  return {
    port: readInt(env, "PORT", 3000, warnings),
    dbDir: env.DB_DIR || join(homedir(), ".pixelrelay", "data"),
    adminToken: env.ADMIN_TOKEN || null,
    requestTimeoutMs: readInt(env, "REQUEST_TIMEOUT_MS", 120_000, warnings),
    streamTimeoutMs: readInt(env, "STREAM_TIMEOUT_MS", 180_000, warnings),
    defaultThreshold,
    channelPriority: readList(env.CHANNEL_PRIORITY),
    thirdPartyKeyPrefix: env.THIRD_PARTY_KEY_PREFIX || "sk-",
    firstPartyChannel: env.FIRST_PARTY_CHANNEL || "google",
    thirdPartyChannel: env.THIRD_PARTY_CHANNEL || "proxy",
    firstPartyEndpoint: env.FIRST_PARTY_ENDPOINT || null,
    warnings,
  };
}
