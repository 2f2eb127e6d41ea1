/**
 * Chat Completions Adapter
 *
 * OpenAI-compatible `/chat/completions` endpoints that return the image
 * inside the assistant message (image parts, markdown links, data URLs).
 */

import { chatStreamDecoder, extractImage } from "./extract.js";
import { bearerHeaders, requireModel, toDataUrl } from "./shared.js";
import type { RequestAdapter } from "./types.js";

export const chatCompletionsAdapter: RequestAdapter = {
  kind: "chat-completions",

  encode(channel, secret, request) {
    const content: Record<string, unknown>[] = [{ type: "text", text: request.prompt }];
    for (const image of request.images) {
      content.push({ type: "image_url", image_url: { url: toDataUrl(image) } });
    }

    return {
      url: channel.endpoint,
      headers: bearerHeaders(secret),
      body: {
        model: requireModel(channel),
        messages: [{ role: "user", content }],
        stream: channel.streaming,
      },
    };
  },

  decode: extractImage,
  streamDecoder: chatStreamDecoder,
};
