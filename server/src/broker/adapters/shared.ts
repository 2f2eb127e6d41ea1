/**
 * Helpers shared by the format adapters.
 */

import { ValidationError } from "../errors.js";
import type { Channel, SourceImage } from "../types.js";

export function toDataUrl(image: SourceImage): string {
  return `data:${image.mimeType};base64,${image.data.toString("base64")}`;
}

export function bearerHeaders(secret: string): Record<string, string> {
  return {
    "Content-Type": "application/json",
    Authorization: `Bearer ${secret}`,
  };
}

/** Registration guarantees a model for these kinds; this narrows the type */
export function requireModel(channel: Channel): string {
  if (!channel.model) {
    throw new ValidationError(`Channel "${channel.name}" has no model configured`);
  }
  return channel.model;
}
