/**
 * Channel Definition Validation
 *
 * Each format kind pins the path its endpoint must contain and whether a
 * model is passed separately or lives inside the URL.
 */

import { ValidationError } from "../errors.js";
import { FORMAT_KINDS } from "../types.js";
import type { Channel, ChannelDefinition, FormatKind } from "../types.js";

interface FormatRule {
  /** Substring the endpoint must contain */
  marker: string;
  /** "separate": model required as its own field; "in-url": carried by the endpoint */
  model: "separate" | "in-url";
}

export const FORMAT_RULES: Record<FormatKind, FormatRule> = {
  "chat-completions": { marker: "/chat/completions", model: "separate" },
  "native-generate": { marker: ":generateContent", model: "in-url" },
  "image-generation": { marker: "/images/generations", model: "separate" },
};

const NATIVE_MODEL_SEGMENT = /(\/models\/)([^/:?]+)(:generateContent)/;

export function isFormatKind(value: string): value is FormatKind {
  return (FORMAT_KINDS as readonly string[]).includes(value);
}

/** Model id embedded in a native-generate endpoint, if any */
export function modelFromNativeEndpoint(endpoint: string): string | undefined {
  return NATIVE_MODEL_SEGMENT.exec(endpoint)?.[2];
}

/** Replace the model segment of a native-generate endpoint */
export function rewriteNativeModel(endpoint: string, model: string): string {
  if (!NATIVE_MODEL_SEGMENT.test(endpoint)) {
    throw new ValidationError(`Endpoint has no /models/<model>:generateContent segment to update: ${endpoint}`);
  }
  return endpoint.replace(NATIVE_MODEL_SEGMENT, `$1${model}$3`);
}

export function validateChannelName(name: string): string {
  const trimmed = name.trim();
  if (!trimmed) throw new ValidationError("Channel name is required");
  if (/\s/.test(trimmed)) throw new ValidationError(`Channel name must not contain whitespace: "${trimmed}"`);
  return trimmed;
}

export function validateModel(model: string): string {
  const trimmed = model.trim();
  if (!trimmed) throw new ValidationError("Model is required");
  if (/\s/.test(trimmed)) throw new ValidationError(`Model must not contain whitespace: "${trimmed}"`);
  return trimmed;
}

/**
 * Validate a channel definition and normalise it into a Channel.
 * Throws ValidationError describing the first problem found.
 */
export function validateChannelDefinition(def: ChannelDefinition): Channel {
  const name = validateChannelName(def.name);

  if (!isFormatKind(def.kind)) {
    throw new ValidationError(`Unknown format kind "${String(def.kind)}"; expected one of ${FORMAT_KINDS.join(", ")}`);
  }
  const rule = FORMAT_RULES[def.kind];

  const endpoint = def.endpoint.trim();
  let parsed: URL;
  try {
    parsed = new URL(endpoint);
  } catch {
    throw new ValidationError(`Endpoint is not a valid URL: "${endpoint}"`);
  }
  if (parsed.protocol !== "http:" && parsed.protocol !== "https:") {
    throw new ValidationError(`Endpoint must use http or https: "${endpoint}"`);
  }
  if (!endpoint.includes(rule.marker)) {
    throw new ValidationError(`A ${def.kind} endpoint must contain "${rule.marker}": "${endpoint}"`);
  }

  let model: string | undefined;
  if (rule.model === "separate") {
    if (def.model === undefined) {
      throw new ValidationError(`A ${def.kind} channel requires a model`);
    }
    model = validateModel(def.model);
  } else {
    const embedded = modelFromNativeEndpoint(endpoint);
    if (def.model !== undefined && def.model.trim() !== embedded) {
      throw new ValidationError(`A ${def.kind} channel takes its model from the endpoint URL; do not pass one separately`);
    }
    model = embedded;
  }

  return Object.freeze({
    name,
    kind: def.kind,
    enabled: def.enabled ?? true,
    streaming: def.streaming ?? false,
    endpoint,
    ...(model !== undefined ? { model } : {}),
  });
}
