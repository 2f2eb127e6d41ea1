/**
 * Admin Route Tests
 *
 * Drives the Hono app in process with app.request(); no port is opened.
 */

import { describe, it, expect, beforeEach } from "vitest";
import { createApp } from "../app.js";
import { createBroker } from "../broker/broker.js";
import type { Broker } from "../broker/broker.js";

const TOKEN = "test-secret";
const NATIVE_ENDPOINT = "https://gen.example.test/v1beta/models/m:generateContent";

let broker: Broker;
let app: ReturnType<typeof createApp>;

beforeEach(() => {
  broker = createBroker({ defaultThreshold: 3 });
  app = createApp(broker, { adminToken: TOKEN });
});

async function call(method: string, path: string, body?: unknown, token: string | null = TOKEN): Promise<Response> {
  const headers: Record<string, string> = {};
  if (token) headers.Authorization = `Bearer ${token}`;
  if (body !== undefined) headers["Content-Type"] = "application/json";
  return app.request(path, {
    method,
    headers,
    body: body === undefined ? undefined : typeof body === "string" ? body : JSON.stringify(body),
  });
}

async function addProxy(): Promise<void> {
  const res = await call("POST", "/api/admin/channels", {
    name: "proxy",
    kind: "chat-completions",
    endpoint: "https://proxy.example.test/v1/chat/completions",
    model: "m",
  });
  expect(res.status).toBe(201);
}

describe("auth", () => {
  it("requires the bearer token", async () => {
    const missing = await call("GET", "/api/admin/channels", undefined, null);
    expect(missing.status).toBe(401);
    expect(await missing.json()).toEqual({ error: "unauthorized", message: "Bearer token required" });

    const wrong = await call("GET", "/api/admin/channels", undefined, "other-secret");
    expect(wrong.status).toBe(401);
    expect(await wrong.json()).toEqual({ error: "unauthorized", message: "Invalid token" });
  });

  it("is open when no token is configured", async () => {
    const open = createApp(broker, { adminToken: null });
    const res = await open.request("/api/admin/channels");
    expect(res.status).toBe(200);
    expect(await res.json()).toEqual([]);
  });
});

describe("channels", () => {
  it("adds, lists and removes a channel", async () => {
    await addProxy();

    const list = await call("GET", "/api/admin/channels");
    expect(await list.json()).toEqual([{
      name: "proxy",
      kind: "chat-completions",
      enabled: true,
      streaming: false,
      endpoint: "https://proxy.example.test/v1/chat/completions",
      model: "m",
      active: 0,
      total: 0,
      inFlight: 0,
    }]);

    const removed = await call("DELETE", "/api/admin/channels/proxy");
    expect(await removed.json()).toEqual({ removed: "proxy" });
    expect(broker.registry.has("proxy")).toBe(false);
  });

  it("rejects bad input with 400", async () => {
    const badKind = await call("POST", "/api/admin/channels", { name: "x", kind: "fax", endpoint: "https://x.example.test" });
    expect(badKind.status).toBe(400);
    expect(await badKind.json()).toEqual({ error: "validation", message: 'Unknown format kind "fax"' });

    const badJson = await call("POST", "/api/admin/channels", "{not json");
    expect(badJson.status).toBe(400);
    expect(await badJson.json()).toEqual({ error: "validation", message: "Request body must be valid JSON" });

    const unknown = await call("DELETE", "/api/admin/channels/missing");
    expect(unknown.status).toBe(400);
    expect(await unknown.json()).toEqual({ error: "validation", message: 'Unknown channel "missing"' });
  });

  it("toggles enabled and streaming", async () => {
    await addProxy();

    const disabled = await call("POST", "/api/admin/channels/proxy/disable");
    expect(await disabled.json()).toMatchObject({ name: "proxy", enabled: false });

    const streaming = await call("PUT", "/api/admin/channels/proxy/streaming", { streaming: true });
    expect(await streaming.json()).toMatchObject({ streaming: true });

    const notBoolean = await call("PUT", "/api/admin/channels/proxy/streaming", { streaming: "yes" });
    expect(notBoolean.status).toBe(400);
  });

  it("rewrites the endpoint when a native channel's model changes", async () => {
    broker.seedFirstPartyChannel(NATIVE_ENDPOINT);
    const res = await call("PUT", "/api/admin/channels/google/model", { model: "image-model-2" });
    expect(await res.json()).toMatchObject({
      model: "image-model-2",
      endpoint: "https://gen.example.test/v1beta/models/image-model-2:generateContent",
    });
  });
});

describe("credentials", () => {
  beforeEach(addProxy);

  it("adds and lists masked credentials", async () => {
    const added = await call("POST", "/api/admin/channels/proxy/credentials", {
      values: ["sk-a-test-secret", "sk-b-test-secret", "sk-a-test-secret"],
    });
    expect(await added.json()).toEqual({ added: 2, skipped: 1 });

    const list = await call("GET", "/api/admin/channels/proxy/credentials");
    expect(await list.json()).toEqual({
      channel: "proxy",
      active: 2,
      total: 2,
      credentials: [
        { index: 1, keyMask: "sk-a-tes...cret", failureCount: 0, threshold: 3, active: true },
        { index: 2, keyMask: "sk-b-tes...cret", failureCount: 0, threshold: 3, active: true },
      ],
    });
  });

  it("sets thresholds, resets and removes by 1-based index", async () => {
    await call("POST", "/api/admin/channels/proxy/credentials", { values: ["sk-a-test-secret"], threshold: 1 });
    broker.pool.reportOutcome(broker.pool.acquire("proxy"), { success: false });

    const threshold = await call("PUT", "/api/admin/channels/proxy/credentials/1/threshold", { threshold: 2 });
    expect(await threshold.json()).toEqual({ index: 1, keyMask: "sk-a-tes...cret", failureCount: 1, threshold: 2, active: true });

    const reset = await call("POST", "/api/admin/channels/proxy/credentials/reset");
    expect(await reset.json()).toEqual({ reset: 1 });

    const resetOne = await call("POST", "/api/admin/channels/proxy/credentials/reset", { index: 1 });
    expect(await resetOne.json()).toEqual({ reset: 0 });

    const badIndex = await call("DELETE", "/api/admin/channels/proxy/credentials/0");
    expect(badIndex.status).toBe(400);

    const removed = await call("DELETE", "/api/admin/channels/proxy/credentials/1");
    expect(await removed.json()).toEqual({ removed: "sk-a-tes...cret" });
  });

  it("routes credentials by class", async () => {
    const res = await call("POST", "/api/admin/credentials/auto", { values: ["sk-test-secret", "test-secret"] });
    expect(await res.json()).toEqual({ added: { proxy: 1 }, unrouted: { "first-party": 1 } });
  });

  it("resets every channel", async () => {
    await call("POST", "/api/admin/channels/proxy/credentials", { values: ["sk-a-test-secret"] });
    broker.pool.reportOutcome(broker.pool.acquire("proxy"), { success: false });

    const res = await call("POST", "/api/admin/credentials/reset");
    expect(await res.json()).toEqual({ reset: 1 });
  });
});

describe("prompts", () => {
  it("adds, reads and deletes prompts", async () => {
    const created = await call("POST", "/api/admin/prompts", { name: " poster ", content: "Make it a poster" });
    expect(created.status).toBe(201);
    expect(await created.json()).toEqual({ name: "poster" });

    const duplicate = await call("POST", "/api/admin/prompts", { name: "poster", content: "again" });
    expect(duplicate.status).toBe(400);

    const read = await call("GET", "/api/admin/prompts/poster");
    expect(await read.json()).toEqual({ name: "poster", content: "Make it a poster" });

    const list = await call("GET", "/api/admin/prompts");
    expect(await list.json()).toEqual({ poster: "Make it a poster" });

    const removed = await call("DELETE", "/api/admin/prompts/poster");
    expect(await removed.json()).toEqual({ removed: "poster" });

    const missing = await call("GET", "/api/admin/prompts/poster");
    expect(missing.status).toBe(404);
    expect(await missing.json()).toEqual({ error: "not_found", message: 'Unknown prompt "poster"' });
  });

  it("answers 404 when deleting an unknown prompt", async () => {
    const res = await call("DELETE", "/api/admin/prompts/nope");
    expect(res.status).toBe(404);
    expect(await res.json()).toEqual({ error: "not_found", message: 'Unknown prompt "nope"' });
  });
});

describe("logs", () => {
  it("returns recent entries and validates the count", async () => {
    const res = await call("GET", "/api/admin/logs?count=5");
    expect(res.status).toBe(200);
    expect(Array.isArray(await res.json())).toBe(true);

    const bad = await call("GET", "/api/admin/logs?count=zero");
    expect(bad.status).toBe(400);
  });
});

describe("fallbacks", () => {
  it("answers unknown routes with JSON 404", async () => {
    const res = await call("GET", "/nope");
    expect(res.status).toBe(404);
    expect(await res.json()).toEqual({ error: "not_found", message: "No route for GET /nope" });
  });
});
