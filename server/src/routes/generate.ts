/**
 * Generation Routes
 *
 * Health check and the image generation endpoint.
 */

import type { Hono } from "hono";
import type { Broker } from "../broker/broker.js";
import { ValidationError } from "../broker/errors.js";
import type { SourceImage } from "../broker/types.js";
import { isRecord, optionalString, readJsonBody, requireString } from "./errors.js";

const BASE64 = /^[A-Za-z0-9+/]+={0,2}$/;

function parseImages(value: unknown): SourceImage[] {
  if (value === undefined) return [];
  if (!Array.isArray(value)) throw new ValidationError(`"images" must be an array`);

  return value.map((item, i) => {
    if (!isRecord(item)) throw new ValidationError(`images[${i}] must be an object`);
    const data = typeof item.data === "string" ? item.data.replace(/\s+/g, "") : "";
    const mimeType = typeof item.mimeType === "string" ? item.mimeType : "";
    if (!data || !BASE64.test(data)) throw new ValidationError(`images[${i}].data must be base64`);
    if (!mimeType.startsWith("image/")) throw new ValidationError(`images[${i}].mimeType must be an image type`);
    return { data: Buffer.from(data, "base64"), mimeType };
  });
}

export function registerGenerateRoutes(app: Hono, broker: Broker): void {
  app.get("/", (c) => c.json({
    service: "pixelrelay",
    version: "0.1.0",
    status: "running",
    channels: broker.registry.list().length,
  }));

  app.post("/api/generate", async (c) => {
    const body = await readJsonBody(c);
    const result = await broker.generate({
      prompt: requireString(body, "prompt"),
      images: parseImages(body.images),
      channel: optionalString(body, "channel"),
      // Client disconnects abort the request
      signal: c.req.raw.signal,
    });

    return c.json({
      image: result.image.toString("base64"),
      mimeType: result.mimeType,
      channel: result.channel,
      keyMask: result.keyMask,
      attempts: result.attempts,
      elapsedMs: result.elapsedMs,
      requestId: result.requestId,
    });
  });
}
