/**
 * Backend Transport
 *
 * Sends a wire request with the global fetch, reads either a JSON body or
 * an SSE stream until the first image, and turns the resulting reference
 * into bytes. Every step shares one AbortSignal, so the per-call timeout
 * and caller cancellation cover the download as well.
 */

import { createComponentLogger } from "../../logging.js";
import { classifyHttpFailure, malformedResponse } from "../adapters/classify.js";
import type { ImageReference, StreamDecoder, WireRequest } from "../adapters/types.js";
import { RetryableBackendError } from "../errors.js";

const log = createComponentLogger("broker.transport");

export interface ImageBytes {
  data: Buffer;
  mimeType: string;
}

// ============================================
// SIGNALS
// ============================================

/** Abort on the per-call timeout or when the caller gives up, whichever comes first */
export function attemptSignal(timeoutMs: number, caller?: AbortSignal): AbortSignal {
  const timeout = AbortSignal.timeout(timeoutMs);
  return caller ? AbortSignal.any([timeout, caller]) : timeout;
}

// ============================================
// REQUEST
// ============================================

/** POST the wire request; non-2xx responses become classified failures */
export async function send(wire: WireRequest, signal: AbortSignal): Promise<Response> {
  const response = await fetch(wire.url, {
    method: "POST",
    headers: wire.headers,
    body: JSON.stringify(wire.body),
    signal,
  });

  if (!response.ok) {
    const body = await response.text();
    throw classifyHttpFailure(response.status, body);
  }
  return response;
}

export async function readJsonImage(
  response: Response,
  decode: (payload: unknown) => ImageReference | null,
): Promise<ImageReference> {
  const text = await response.text();
  let payload: unknown;
  try {
    payload = JSON.parse(text);
  } catch {
    throw malformedResponse(`Response is not JSON: ${text.slice(0, 120)}`, undefined, response.status);
  }

  const reference = decode(payload);
  if (!reference) {
    throw malformedResponse("No image found in response", undefined, response.status);
  }
  return reference;
}

/**
 * Read `data:` events until one yields an image or the stream ends. The
 * reader is cancelled and released on every way out, including an abort
 * of `signal` while a read is pending.
 */
export async function readSseImage(
  response: Response,
  decoder: StreamDecoder,
  signal?: AbortSignal,
): Promise<ImageReference> {
  if (!response.body) {
    throw malformedResponse("Streaming response has no body", undefined, response.status);
  }

  const reader = response.body.getReader();
  const textDecoder = new TextDecoder();
  let buffer = "";
  let events = 0;

  const handleLine = (rawLine: string): ImageReference | "done" | null => {
    const line = rawLine.trim();
    if (!line.startsWith("data:")) return null;
    const data = line.slice(5).trim();
    if (!data) return null;
    if (data === "[DONE]") return "done";

    events++;
    let payload: unknown;
    try {
      payload = JSON.parse(data);
    } catch {
      log.debug("Skipping non-JSON stream event", { preview: data.slice(0, 80) });
      return null;
    }
    return decoder.push(payload);
  };

  const cancel = async (reason?: unknown): Promise<void> => {
    try {
      await reader.cancel(reason);
    } catch (err) {
      log.debug("Stream cancel failed", { error: err instanceof Error ? err.message : String(err) });
    }
  };
  // Settles a pending read() with done, after which the abort reason is thrown
  const onAbort = () => {
    void cancel(signal?.reason);
  };
  signal?.addEventListener("abort", onAbort, { once: true });

  try {
    signal?.throwIfAborted();
    while (true) {
      const { done, value } = await reader.read();
      signal?.throwIfAborted();
      buffer += done ? textDecoder.decode() : textDecoder.decode(value, { stream: true });

      const lines = buffer.split("\n");
      // The last piece may be half a line unless the stream is over
      buffer = done ? "" : lines.pop() ?? "";

      for (const line of lines) {
        const result = handleLine(line);
        if (result === "done") {
          const last = decoder.finish();
          if (last) return last;
          throw malformedResponse(`Stream finished after ${events} event(s) without an image`);
        }
        if (result) return result;
      }

      if (done) break;
    }
  } finally {
    signal?.removeEventListener("abort", onAbort);
    await cancel();
    reader.releaseLock();
  }

  const last = decoder.finish();
  if (last) return last;
  throw malformedResponse(
    events === 0 ? "Stream ended without any events" : `Stream ended after ${events} event(s) without an image`,
  );
}

// ============================================
// IMAGE BYTES
// ============================================

const SIGNATURES: { mimeType: string; matches: (b: Buffer) => boolean }[] = [
  { mimeType: "image/png", matches: b => b.length >= 8 && b.subarray(0, 8).equals(Buffer.from([0x89, 0x50, 0x4e, 0x47, 0x0d, 0x0a, 0x1a, 0x0a])) },
  { mimeType: "image/jpeg", matches: b => b.length >= 3 && b[0] === 0xff && b[1] === 0xd8 && b[2] === 0xff },
  { mimeType: "image/gif", matches: b => b.length >= 6 && (b.subarray(0, 6).toString("latin1") === "GIF87a" || b.subarray(0, 6).toString("latin1") === "GIF89a") },
  { mimeType: "image/webp", matches: b => b.length >= 12 && b.subarray(0, 4).toString("latin1") === "RIFF" && b.subarray(8, 12).toString("latin1") === "WEBP" },
];

export function sniffMimeType(data: Buffer): string | undefined {
  return SIGNATURES.find(s => s.matches(data))?.mimeType;
}

export async function downloadImage(url: string, signal: AbortSignal): Promise<ImageBytes> {
  const response = await fetch(url, { signal });
  if (!response.ok) {
    throw new RetryableBackendError(`Image download failed: HTTP ${response.status}`, {
      reason: response.status >= 500 ? "server" : "malformed_response",
      status: response.status,
    });
  }

  const data = Buffer.from(await response.arrayBuffer());
  if (data.length === 0) throw malformedResponse("Downloaded image is empty");

  const declared = response.headers.get("content-type")?.split(";")[0].trim();
  return {
    data,
    mimeType: sniffMimeType(data) ?? (declared?.startsWith("image/") ? declared : "image/png"),
  };
}

/** Decode inline base64 or fetch a URL reference */
export async function resolveImage(reference: ImageReference, signal: AbortSignal): Promise<ImageBytes> {
  if (reference.type === "url") {
    if (!/^https?:\/\//i.test(reference.url)) {
      throw malformedResponse(`Unsupported image reference: ${reference.url.slice(0, 80)}`);
    }
    log.debug("Downloading generated image", { url: reference.url.slice(0, 120) });
    return downloadImage(reference.url, signal);
  }

  const data = Buffer.from(reference.data.replace(/\s+/g, ""), "base64");
  if (data.length === 0) throw malformedResponse("Inline image data is empty");
  return {
    data,
    mimeType: sniffMimeType(data) ?? reference.mimeType ?? "image/png",
  };
}
