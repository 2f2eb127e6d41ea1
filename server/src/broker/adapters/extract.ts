/**
 * Image Extraction
 *
 * Backends disagree on where a generated image goes. The shapes below are
 * tried in order and the first hit wins:
 *
 *   data[].url | data[].b64_json           image-generation responses
 *   url | b64_json                         image-generation stream events
 *   choices[0].message.images[]            some chat proxies
 *   choices[0].delta|message .content      chat content, array or string
 *   candidates[0].content.parts[]          native generateContent
 */

import type { ImageReference, StreamDecoder } from "./types.js";

const MARKDOWN_IMAGE = /!\[[^\]]*?\]\((.*?)\)/;
const IMAGE_SUFFIX_URL = /https?:\/\/[^\s]+\.(?:png|jpe?g|gif|webp|bmp|ico|tiff?)(?:\?[^\s]*)?/i;
const ANY_URL = /https?:\/\/[^\s]+/;
const EMBEDDED_DATA_URL = /data:(image\/\w+);base64,([a-zA-Z0-9+/=\n]+)/;
const NOT_AN_IMAGE_PAGE = ["dashboard", "login", "signin", "register", "admin"];

// ============================================
// UNKNOWN-VALUE HELPERS
// ============================================

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function records(value: unknown): Record<string, unknown>[] {
  return Array.isArray(value) ? value.filter(isRecord) : [];
}

function nonEmptyString(value: unknown): string | undefined {
  return typeof value === "string" && value.length > 0 ? value : undefined;
}

function firstRecord(value: unknown): Record<string, unknown> | undefined {
  return Array.isArray(value) && isRecord(value[0]) ? value[0] : undefined;
}

// ============================================
// REFERENCES
// ============================================

/** Data URLs become inline base64; anything else is fetched later */
export function toReference(value: string): ImageReference {
  const match = /^data:(image\/[\w.+-]+)?[^,]*?base64,(.*)$/s.exec(value);
  if (match) {
    return match[1] ? { type: "base64", data: match[2], mimeType: match[1] } : { type: "base64", data: match[2] };
  }
  return { type: "url", url: value };
}

/** Raw base64, unless it is already a data URL */
function fromInline(value: string): ImageReference {
  return value.startsWith("data:") ? toReference(value) : { type: "base64", data: value };
}

function fromData(value: unknown): ImageReference | null {
  const items = records(value);
  for (const item of items) {
    const url = nonEmptyString(item.url);
    if (url) return toReference(url);
    const b64 = nonEmptyString(item.b64_json);
    if (b64) return fromInline(b64);
  }
  return null;
}

function fromMessageImages(value: unknown): ImageReference | null {
  for (const item of records(value)) {
    const nested = isRecord(item.image_url) ? nonEmptyString(item.image_url.url) : undefined;
    const url = nested ?? nonEmptyString(item.url);
    if (url) return toReference(url);
  }
  return null;
}

function fromContentArray(items: Record<string, unknown>[]): ImageReference | null {
  for (const item of items) {
    if (item.type === "image" && isRecord(item.image)) {
      const data = nonEmptyString(item.image.data);
      if (data) return fromInline(data);
      const url = nonEmptyString(item.image.url);
      if (url) return toReference(url);
    }
    if (item.type === "image_url" && isRecord(item.image_url)) {
      const url = nonEmptyString(item.image_url.url);
      if (url) return toReference(url);
    }
    if (item.type === "text" && typeof item.text === "string") {
      const markdown = MARKDOWN_IMAGE.exec(item.text);
      if (markdown?.[1]) return toReference(markdown[1]);
    }
  }
  return null;
}

/**
 * Find an image in assistant text. With `partial`, the text is a stream
 * still arriving: a URL or data URL that runs to the end of it may be cut
 * off, so it only counts once something follows it.
 */
export function fromContentString(text: string, partial = false): ImageReference | null {
  const complete = (match: RegExpExecArray): boolean => !partial || match.index + match[0].length < text.length;

  const markdown = MARKDOWN_IMAGE.exec(text);
  if (markdown?.[1]) return toReference(markdown[1]);

  const suffixed = IMAGE_SUFFIX_URL.exec(text);
  if (suffixed && complete(suffixed)) return { type: "url", url: suffixed[0] };

  const bare = ANY_URL.exec(text);
  if (bare && complete(bare)) {
    const lower = bare[0].toLowerCase();
    if (!NOT_AN_IMAGE_PAGE.some(word => lower.includes(word))) {
      return { type: "url", url: bare[0] };
    }
  }

  const embedded = EMBEDDED_DATA_URL.exec(text);
  if (embedded && complete(embedded)) return { type: "base64", data: embedded[2], mimeType: embedded[1] };

  return null;
}

function fromChoices(value: unknown): ImageReference | null {
  const choice = firstRecord(value);
  if (!choice) return null;

  const delta = isRecord(choice.delta) ? choice.delta : undefined;
  const message = isRecord(choice.message) ? choice.message : undefined;

  if (message) {
    const image = fromMessageImages(message.images);
    if (image) return image;
  }

  const content = delta?.content ?? message?.content;
  if (Array.isArray(content)) return fromContentArray(records(content));
  if (typeof content === "string") return fromContentString(content);
  return null;
}

function fromCandidates(value: unknown): ImageReference | null {
  const candidate = firstRecord(value);
  const content = candidate && isRecord(candidate.content) ? candidate.content : undefined;
  if (!content) return null;

  for (const part of records(content.parts)) {
    const inline = isRecord(part.inlineData) ? part.inlineData : isRecord(part.inline_data) ? part.inline_data : undefined;
    if (inline) {
      const data = nonEmptyString(inline.data);
      if (data) {
        const mimeType = nonEmptyString(inline.mimeType) ?? nonEmptyString(inline.mime_type);
        return mimeType ? { type: "base64", data, mimeType } : { type: "base64", data };
      }
    }
    if (typeof part.text === "string") {
      const embedded = EMBEDDED_DATA_URL.exec(part.text);
      if (embedded) return { type: "base64", data: embedded[2], mimeType: embedded[1] };
    }
  }
  return null;
}

// ============================================
// ENTRY POINT
// ============================================

export function extractImage(payload: unknown): ImageReference | null {
  if (!isRecord(payload)) return null;

  return fromData(payload.data)
    ?? fromTopLevel(payload)
    ?? fromChoices(payload.choices)
    ?? fromCandidates(payload.candidates);
}

function fromTopLevel(payload: Record<string, unknown>): ImageReference | null {
  const url = nonEmptyString(payload.url);
  if (url) return toReference(url);
  const b64 = nonEmptyString(payload.b64_json);
  if (b64) return fromInline(b64);
  return null;
}

// ============================================
// STREAMS
// ============================================

/** Each event stands alone (image-generation events, native chunks) */
export function eventStreamDecoder(decode: (payload: unknown) => ImageReference | null): StreamDecoder {
  return {
    push: decode,
    finish: () => null,
  };
}

function deltaText(payload: unknown): string | undefined {
  if (!isRecord(payload)) return undefined;
  const choice = firstRecord(payload.choices);
  const delta = choice && isRecord(choice.delta) ? choice.delta : undefined;
  return typeof delta?.content === "string" ? delta.content : undefined;
}

/**
 * Chat streams spread the answer over `delta.content` strings. They are
 * joined before matching, so a link split across events is read whole.
 */
export function chatStreamDecoder(): StreamDecoder {
  let text = "";
  return {
    push(payload) {
      const delta = deltaText(payload);
      if (delta === undefined) return extractImage(payload);
      text += delta;
      return fromContentString(text, true);
    },
    finish: () => (text ? fromContentString(text) : null),
  };
}
