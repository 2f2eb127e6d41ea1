/**
 * Native Generate Adapter
 *
 * `models/<model>:generateContent` endpoints. The key travels as a query
 * parameter and the model lives in the path. Streaming switches the method
 * to `:streamGenerateContent` with `alt=sse`.
 */

import { eventStreamDecoder, extractImage } from "./extract.js";
import type { RequestAdapter } from "./types.js";

export function nativeRequestUrl(endpoint: string, secret: string, streaming: boolean): string {
  const url = new URL(endpoint);
  if (streaming) {
    url.pathname = url.pathname.replace(":generateContent", ":streamGenerateContent");
    url.searchParams.set("alt", "sse");
  }
  url.searchParams.set("key", secret);
  return url.toString();
}

export const nativeGenerateAdapter: RequestAdapter = {
  kind: "native-generate",

  encode(channel, secret, request) {
    const parts: Record<string, unknown>[] = [{ text: request.prompt }];
    for (const image of request.images) {
      parts.push({ inline_data: { mime_type: image.mimeType, data: image.data.toString("base64") } });
    }

    return {
      url: nativeRequestUrl(channel.endpoint, secret, channel.streaming),
      headers: { "Content-Type": "application/json" },
      body: {
        contents: [{ role: "user", parts }],
        generationConfig: { responseModalities: ["IMAGE", "TEXT"] },
      },
    };
  },

  decode: extractImage,
  streamDecoder: () => eventStreamDecoder(extractImage),
};
