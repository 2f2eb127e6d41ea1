/**
 * Admin Routes
 *
 * Channel, credential and prompt administration, plus recent logs. Guarded
 * by a bearer token when ADMIN_TOKEN is configured.
 */

import type { Hono } from "hono";
import type { Broker } from "../broker/broker.js";
import { ValidationError } from "../broker/errors.js";
import { isFormatKind } from "../broker/registry/validation.js";
import { createComponentLogger } from "../logging.js";
import {
  optionalBoolean,
  optionalString,
  parseIndex,
  parseJsonObject,
  readJsonBody,
  requireBoolean,
  requireInteger,
  requireString,
  requireStringArray,
} from "./errors.js";

const log = createComponentLogger("http.admin");

// ============================================
// AUTH MIDDLEWARE
// ============================================

export function registerAdminMiddleware(app: Hono, adminToken: string | null): void {
  app.use("/api/admin/*", async (c, next) => {
    // No token configured: admin API is open (local use)
    if (!adminToken) {
      return next();
    }

    const authHeader = c.req.header("Authorization");
    if (!authHeader || !authHeader.startsWith("Bearer ")) {
      return c.json({ error: "unauthorized", message: "Bearer token required" }, 401);
    }

    const token = authHeader.substring(7);
    if (token !== adminToken) {
      log.warn("Rejected admin request with invalid token", { path: c.req.path });
      return c.json({ error: "unauthorized", message: "Invalid token" }, 401);
    }

    return next();
  });
}

// ============================================
// ROUTES
// ============================================

export function registerAdminRoutes(app: Hono, broker: Broker): void {
  const { registry, pool, prompts } = broker;

  // ── Channels ──────────────────────────────────────────────────────

  app.get("/api/admin/channels", (c) => c.json(broker.channelSummaries()));

  app.post("/api/admin/channels", async (c) => {
    const body = await readJsonBody(c);
    const kind = requireString(body, "kind");
    if (!isFormatKind(kind)) throw new ValidationError(`Unknown format kind "${kind}"`);

    const channel = registry.addChannel({
      name: requireString(body, "name"),
      kind,
      endpoint: requireString(body, "endpoint"),
      model: optionalString(body, "model"),
      enabled: optionalBoolean(body, "enabled"),
      streaming: optionalBoolean(body, "streaming"),
    });
    return c.json(channel, 201);
  });

  app.delete("/api/admin/channels/:name", (c) => {
    const channel = registry.removeChannel(c.req.param("name"));
    return c.json({ removed: channel.name });
  });

  app.post("/api/admin/channels/:name/enable", (c) => c.json(registry.setEnabled(c.req.param("name"), true)));

  app.post("/api/admin/channels/:name/disable", (c) => c.json(registry.setEnabled(c.req.param("name"), false)));

  app.put("/api/admin/channels/:name/streaming", async (c) => {
    const body = await readJsonBody(c);
    return c.json(registry.setStreaming(c.req.param("name"), requireBoolean(body, "streaming")));
  });

  app.put("/api/admin/channels/:name/model", async (c) => {
    const body = await readJsonBody(c);
    return c.json(registry.updateModel(c.req.param("name"), requireString(body, "model")));
  });

  // ── Credentials ───────────────────────────────────────────────────

  app.get("/api/admin/channels/:name/credentials", (c) => {
    const name = c.req.param("name");
    const credentials = pool.listCredentials(name);
    return c.json({
      channel: name,
      active: credentials.filter(cred => cred.active).length,
      total: credentials.length,
      credentials,
    });
  });

  app.post("/api/admin/channels/:name/credentials", async (c) => {
    const body = await readJsonBody(c);
    const values = requireStringArray(body, "values");
    const threshold = body.threshold === undefined ? undefined : requireInteger(body, "threshold");
    const added = pool.addCredentials(c.req.param("name"), values, threshold);
    return c.json({ added, skipped: values.length - added });
  });

  app.post("/api/admin/credentials/auto", async (c) => {
    const body = await readJsonBody(c);
    return c.json(broker.addCredentialsByClass(requireStringArray(body, "values")));
  });

  app.delete("/api/admin/channels/:name/credentials/:index", (c) => {
    const removed = pool.removeCredential(c.req.param("name"), parseIndex(c.req.param("index")));
    return c.json({ removed: removed.keyMask });
  });

  app.put("/api/admin/channels/:name/credentials/:index/threshold", async (c) => {
    const body = await readJsonBody(c);
    const view = pool.setThreshold(
      c.req.param("name"),
      parseIndex(c.req.param("index")),
      requireInteger(body, "threshold"),
    );
    return c.json(view);
  });

  app.post("/api/admin/channels/:name/credentials/reset", async (c) => {
    // Body is optional here; an empty request resets the whole channel
    const text = await c.req.text();
    const body: Record<string, unknown> = text.trim() ? parseJsonObject(text) : {};
    const index = body.index === undefined ? undefined : requireInteger(body, "index");
    return c.json({ reset: pool.resetFailures(c.req.param("name"), index) });
  });

  app.post("/api/admin/credentials/reset", (c) => c.json({ reset: pool.resetAll() }));

  // ── Prompts ───────────────────────────────────────────────────────

  app.get("/api/admin/prompts", (c) => c.json(prompts.list()));

  app.post("/api/admin/prompts", async (c) => {
    const body = await readJsonBody(c);
    const name = requireString(body, "name");
    prompts.add(name, requireString(body, "content"));
    return c.json({ name: name.trim() }, 201);
  });

  app.get("/api/admin/prompts/:name", (c) => {
    const name = c.req.param("name");
    const content = prompts.get(name);
    if (content === undefined) return c.json({ error: "not_found", message: `Unknown prompt "${name}"` }, 404);
    return c.json({ name, content });
  });

  app.delete("/api/admin/prompts/:name", (c) => {
    const name = c.req.param("name");
    if (!prompts.remove(name)) return c.json({ error: "not_found", message: `Unknown prompt "${name}"` }, 404);
    return c.json({ removed: name });
  });

  // ── Logs ──────────────────────────────────────────────────────────

  app.get("/api/admin/logs", (c) => {
    const count = Number(c.req.query("count") ?? "100");
    if (!Number.isInteger(count) || count < 1) throw new ValidationError(`Invalid count "${c.req.query("count")}"`);
    return c.json(log.getRecentLogs(count));
  });
}
