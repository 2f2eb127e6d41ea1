/**
 * Format adapters, one per FormatKind.
 */

import type { FormatKind } from "../types.js";
import { chatCompletionsAdapter } from "./chat-completions.js";
import { imageGenerationAdapter } from "./image-generation.js";
import { nativeGenerateAdapter } from "./native-generate.js";
import type { RequestAdapter } from "./types.js";

export const FORMAT_ADAPTERS: Readonly<Record<FormatKind, RequestAdapter>> = {
  "chat-completions": chatCompletionsAdapter,
  "native-generate": nativeGenerateAdapter,
  "image-generation": imageGenerationAdapter,
};

export function adapterFor(kind: FormatKind): RequestAdapter {
  return FORMAT_ADAPTERS[kind];
}

export { chatStreamDecoder, eventStreamDecoder, extractImage, toReference } from "./extract.js";
export { classifyError, classifyHttpFailure, malformedResponse } from "./classify.js";
export type { BackendFailure } from "./classify.js";
export { nativeRequestUrl } from "./native-generate.js";
export type { EncodableRequest, ImageReference, RequestAdapter, StreamDecoder, WireRequest } from "./types.js";
