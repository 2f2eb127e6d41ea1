/**
 * Format Adapter Tests
 *
 * Covers:
 * - Wire encoding for each format kind (URL, auth, body)
 * - Streaming variants
 * - Single vs several source images for image-generation
 */

import { describe, it, expect } from "vitest";
import { FORMAT_ADAPTERS, adapterFor } from "./index.js";
import { nativeRequestUrl } from "./native-generate.js";
import type { Channel, SourceImage } from "../types.js";

const PNG: SourceImage = { data: Buffer.from("png-bytes"), mimeType: "image/png" };
const JPEG: SourceImage = { data: Buffer.from("jpeg-bytes"), mimeType: "image/jpeg" };
const PNG_B64 = Buffer.from("png-bytes").toString("base64");
const JPEG_B64 = Buffer.from("jpeg-bytes").toString("base64");

function channel(overrides: Partial<Channel> & Pick<Channel, "kind" | "endpoint">): Channel {
  return { name: "test", enabled: true, streaming: false, ...overrides };
}

describe("FORMAT_ADAPTERS", () => {
  it("has one adapter per kind", () => {
    for (const [kind, adapter] of Object.entries(FORMAT_ADAPTERS)) {
      expect(adapter.kind).toBe(kind);
    }
    expect(adapterFor("native-generate")).toBe(FORMAT_ADAPTERS["native-generate"]);
  });
});

describe("chat-completions", () => {
  const ch = channel({ kind: "chat-completions", endpoint: "https://proxy.example.test/v1/chat/completions", model: "img-chat" });

  it("sends a bearer token and text plus data-URL image parts", () => {
    const wire = adapterFor("chat-completions").encode(ch, "sk-test-secret", { prompt: "a cat", images: [PNG] });

    expect(wire.url).toBe("https://proxy.example.test/v1/chat/completions");
    expect(wire.headers).toEqual({ "Content-Type": "application/json", Authorization: "Bearer sk-test-secret" });
    expect(wire.body).toEqual({
      model: "img-chat",
      messages: [{
        role: "user",
        content: [
          { type: "text", text: "a cat" },
          { type: "image_url", image_url: { url: `data:image/png;base64,${PNG_B64}` } },
        ],
      }],
      stream: false,
    });
  });

  it("follows the channel's streaming flag", () => {
    const wire = adapterFor("chat-completions").encode({ ...ch, streaming: true }, "sk-test-secret", { prompt: "p", images: [] });
    expect(wire.body.stream).toBe(true);
  });
});

describe("native-generate", () => {
  const endpoint = "https://gen.example.test/v1beta/models/image-model-1:generateContent";

  it("puts the key in the query string and the images inline", () => {
    const wire = adapterFor("native-generate").encode(
      channel({ kind: "native-generate", endpoint }),
      "test-secret",
      { prompt: "a dog", images: [JPEG] },
    );

    expect(wire.url).toBe(`${endpoint}?key=test-secret`);
    expect(wire.headers).toEqual({ "Content-Type": "application/json" });
    expect(wire.body).toEqual({
      contents: [{
        role: "user",
        parts: [{ text: "a dog" }, { inline_data: { mime_type: "image/jpeg", data: JPEG_B64 } }],
      }],
      generationConfig: { responseModalities: ["IMAGE", "TEXT"] },
    });
  });

  it("switches to the SSE method when streaming", () => {
    expect(nativeRequestUrl(endpoint, "test-secret", true))
      .toBe("https://gen.example.test/v1beta/models/image-model-1:streamGenerateContent?alt=sse&key=test-secret");
  });
});

describe("image-generation", () => {
  const ch = channel({ kind: "image-generation", endpoint: "https://ark.example.test/api/v3/images/generations", model: "seed-1" });

  it("sends a text-only request without an image field", () => {
    const wire = adapterFor("image-generation").encode(ch, "test-secret", { prompt: "a boat", images: [] });
    expect(wire.headers.Authorization).toBe("Bearer test-secret");
    expect(wire.body).toEqual({
      model: "seed-1",
      prompt: "a boat",
      response_format: "url",
      size: "2k",
      stream: false,
      watermark: false,
    });
  });

  it("sends one image as a string and several as an array", () => {
    const adapter = adapterFor("image-generation");
    expect(adapter.encode(ch, "test-secret", { prompt: "p", images: [PNG] }).body.image)
      .toBe(`data:image/png;base64,${PNG_B64}`);
    expect(adapter.encode(ch, "test-secret", { prompt: "p", images: [PNG, JPEG] }).body.image)
      .toEqual([`data:image/png;base64,${PNG_B64}`, `data:image/jpeg;base64,${JPEG_B64}`]);
  });
});
