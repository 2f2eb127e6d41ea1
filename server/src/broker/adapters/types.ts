/**
 * Request Adapter Types
 */

import type { Channel, FormatKind, SourceImage } from "../types.js";

export type ImageReference =
  | { type: "base64"; data: string; mimeType?: string }
  | { type: "url"; url: string };

export interface WireRequest {
  url: string;
  headers: Record<string, string>;
  body: Record<string, unknown>;
}

/** What an adapter needs from a generation request */
export interface EncodableRequest {
  prompt: string;
  images: readonly SourceImage[];
}

/**
 * Reads the events of one SSE response. Created per response, since some
 * formats spread an answer over several events.
 */
export interface StreamDecoder {
  /** One parsed SSE event; returns the image once it is complete */
  push(payload: unknown): ImageReference | null;
  /** The stream ended without an image from push() */
  finish(): ImageReference | null;
}

/**
 * One strategy per format kind. Adapters are stateless: encode a logical
 * request for a channel, and pull an image reference out of a response.
 */
export interface RequestAdapter {
  readonly kind: FormatKind;
  encode(channel: Channel, secret: string, request: EncodableRequest): WireRequest;
  /** Complete JSON response body */
  decode(payload: unknown): ImageReference | null;
  streamDecoder(): StreamDecoder;
}
