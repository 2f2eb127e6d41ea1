import { describe, it, expect, beforeEach, vi } from "vitest";
import { createApp } from "../app.js";
import { createBroker } from "../broker/broker.js";
import type { Broker } from "../broker/broker.js";

const PNG = Buffer.from([0x89, 0x50, 0x4e, 0x47, 0x0d, 0x0a, 0x1a, 0x0a, 0x07]);

let broker: Broker;
let app: ReturnType<typeof createApp>;

beforeEach(() => {
  broker = createBroker();
  broker.seedFirstPartyChannel("https://gen.example.test/v1beta/models/m:generateContent");
  app = createApp(broker, { adminToken: "test-secret" });
});

function generate(body: unknown): Promise<Response> {
  return Promise.resolve(app.request("/api/generate", {
    method: "POST",
    headers: { "Content-Type": "application/json" },
    body: JSON.stringify(body),
  }));
}

describe("GET /", () => {
  it("reports service status", async () => {
    const res = await app.request("/");
    expect(await res.json()).toEqual({ service: "pixelrelay", version: "0.1.0", status: "running", channels: 1 });
  });
});

describe("POST /api/generate", () => {
  it("returns the image as base64 with its metadata", async () => {
    broker.pool.addCredentials("google", ["test-secret-a-0001"]);
    const fetchMock = vi.fn(async () => Response.json({
      candidates: [{ content: { parts: [{ inlineData: { mimeType: "image/png", data: PNG.toString("base64") } }] } }],
    }));
    vi.stubGlobal("fetch", fetchMock);

    const res = await generate({ prompt: "a cat", images: [{ data: PNG.toString("base64"), mimeType: "image/png" }] });

    expect(res.status).toBe(200);
    expect(await res.json()).toMatchObject({
      image: PNG.toString("base64"),
      mimeType: "image/png",
      channel: "google",
      keyMask: "test-sec...0001",
      attempts: 1,
    });
    expect(fetchMock).toHaveBeenCalledTimes(1);
  });

  it("answers 400 for a missing prompt or bad images", async () => {
    const noPrompt = await generate({ prompt: "" });
    expect(noPrompt.status).toBe(400);
    expect(await noPrompt.json()).toEqual({
      error: "validation",
      message: '"prompt" is required and must be a non-empty string',
    });

    const badImage = await generate({ prompt: "a cat", images: [{ data: "not base64!", mimeType: "image/png" }] });
    expect(await badImage.json()).toEqual({ error: "validation", message: "images[0].data must be base64" });

    const badType = await generate({ prompt: "a cat", images: [{ data: "QUJD", mimeType: "text/plain" }] });
    expect(await badType.json()).toEqual({ error: "validation", message: "images[0].mimeType must be an image type" });
  });

  it("answers 503 when no credential is available", async () => {
    const res = await generate({ prompt: "a cat" });
    expect(res.status).toBe(503);
    expect(await res.json()).toEqual({
      error: "no_available_credential",
      message: "No available credential in channel(s): google",
      channels: ["google"],
    });
  });

  it("answers 502 with the backend reason on a non-retryable failure", async () => {
    broker.pool.addCredentials("google", ["test-secret-a-0001"]);
    vi.stubGlobal("fetch", vi.fn(async () => new Response("invalid key", { status: 403 })));

    const res = await generate({ prompt: "a cat" });

    expect(res.status).toBe(502);
    expect(await res.json()).toEqual({
      error: "non_retryable_backend",
      message: "HTTP 403: invalid key",
      reason: "auth",
      status: 403,
      channel: "google",
    });
  });

  it("answers 502 with the attempt tally when every channel fails", async () => {
    broker.pool.addCredentials("google", ["test-secret-a-0001"]);
    vi.stubGlobal("fetch", vi.fn(async () => new Response("down", { status: 500 })));

    const res = await generate({ prompt: "a cat" });

    expect(res.status).toBe(502);
    expect(await res.json()).toMatchObject({
      error: "all_channels_exhausted",
      attempts: 1,
      tally: [{ channel: "google", attempts: 1, failures: 1 }],
      lastError: { reason: "server", status: 500 },
    });
  });
});
