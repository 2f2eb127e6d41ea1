/**
 * Image Generation Adapter
 *
 * `/images/generations` endpoints. Source images go in `image`: a single
 * data URL, or an array of them when there are several.
 */

import { eventStreamDecoder, extractImage } from "./extract.js";
import { bearerHeaders, requireModel, toDataUrl } from "./shared.js";
import type { RequestAdapter } from "./types.js";

export const imageGenerationAdapter: RequestAdapter = {
  kind: "image-generation",

  encode(channel, secret, request) {
    const body: Record<string, unknown> = {
      model: requireModel(channel),
      prompt: request.prompt,
      response_format: "url",
      size: "2k",
      stream: channel.streaming,
      watermark: false,
    };

    const images = request.images.map(toDataUrl);
    if (images.length === 1) body.image = images[0];
    else if (images.length > 1) body.image = images;

    return { url: channel.endpoint, headers: bearerHeaders(secret), body };
  },

  decode: extractImage,
  streamDecoder: () => eventStreamDecoder(extractImage),
};
