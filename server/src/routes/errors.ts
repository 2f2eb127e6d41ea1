/**
 * HTTP Error Mapping
 *
 * Broker errors render as their toJSON() body with a status chosen by kind.
 * Anything else is an internal error and is logged.
 */

import type { Context } from "hono";
import { isBrokerError, ValidationError } from "../broker/errors.js";
import type { BrokerErrorKind } from "../broker/errors.js";
import { createComponentLogger } from "../logging.js";

const log = createComponentLogger("http");

/** 499: client closed the request before we answered */
const STATUS_BY_KIND: Record<BrokerErrorKind, number> = {
  validation: 400,
  no_available_credential: 503,
  retryable_backend: 502,
  non_retryable_backend: 502,
  all_channels_exhausted: 502,
  cancelled: 499,
};

export function statusFor(kind: BrokerErrorKind): number {
  return STATUS_BY_KIND[kind];
}

export function errorResponse(err: unknown): Response {
  if (isBrokerError(err)) {
    return Response.json(err.toJSON(), { status: statusFor(err.kind) });
  }
  log.error("Unhandled error in request", err);
  return Response.json({ error: "internal", message: "Internal server error" }, { status: 500 });
}

// ============================================
// REQUEST BODY HELPERS
// ============================================

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

export function parseJsonObject(text: string): Record<string, unknown> {
  let body: unknown;
  try {
    body = JSON.parse(text);
  } catch {
    throw new ValidationError("Request body must be valid JSON");
  }
  if (!isRecord(body)) throw new ValidationError("Request body must be a JSON object");
  return body;
}

export async function readJsonBody(c: Context): Promise<Record<string, unknown>> {
  return parseJsonObject(await c.req.text());
}

export function requireString(body: Record<string, unknown>, field: string): string {
  const value = body[field];
  if (typeof value !== "string" || !value.trim()) {
    throw new ValidationError(`"${field}" is required and must be a non-empty string`);
  }
  return value;
}

export function optionalString(body: Record<string, unknown>, field: string): string | undefined {
  const value = body[field];
  if (value === undefined || value === null) return undefined;
  if (typeof value !== "string") throw new ValidationError(`"${field}" must be a string`);
  return value;
}

export function requireBoolean(body: Record<string, unknown>, field: string): boolean {
  const value = body[field];
  if (typeof value !== "boolean") throw new ValidationError(`"${field}" must be true or false`);
  return value;
}

export function optionalBoolean(body: Record<string, unknown>, field: string): boolean | undefined {
  const value = body[field];
  if (value === undefined) return undefined;
  if (typeof value !== "boolean") throw new ValidationError(`"${field}" must be true or false`);
  return value;
}

export function requireInteger(body: Record<string, unknown>, field: string): number {
  const value = body[field];
  if (typeof value !== "number" || !Number.isInteger(value)) {
    throw new ValidationError(`"${field}" must be an integer`);
  }
  return value;
}

export function requireStringArray(body: Record<string, unknown>, field: string): string[] {
  const value = body[field];
  if (!Array.isArray(value) || !value.every((v): v is string => typeof v === "string")) {
    throw new ValidationError(`"${field}" must be an array of strings`);
  }
  return value;
}

/** 1-based index from a path segment */
export function parseIndex(raw: string): number {
  const index = Number(raw);
  if (!Number.isInteger(index) || index < 1) {
    throw new ValidationError(`Invalid credential index "${raw}"`);
  }
  return index;
}
