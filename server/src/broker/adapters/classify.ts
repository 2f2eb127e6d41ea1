/**
 * Failure Classification
 *
 * Decides whether a failed call is worth another credential or channel
 * (retryable) or should reach the caller as-is (non-retryable), and tags it
 * with a reason the pool and the logs can use.
 */

import {
  NonRetryableBackendError,
  RetryableBackendError,
} from "../errors.js";
import type { FailureReason } from "../errors.js";

export type BackendFailure = RetryableBackendError | NonRetryableBackendError;

// ============================================
// HTTP STATUS
// ============================================

const AUTH_STATUS = [401, 403];
const BAD_REQUEST_STATUS = [400, 404, 405, 413, 415, 422];

/** Phrases in a 429 body that mean the account is out of quota, not just throttled */
const QUOTA_PATTERNS = [
  "quota",
  "billing",
  "insufficient_balance",
  "insufficient balance",
  "credit balance",
  "exceeded your current",
];

/** Longest slice of a response body carried into an error message */
const BODY_EXCERPT = 300;

function excerpt(body: string): string {
  const flat = body.replace(/\s+/g, " ").trim();
  return flat.length > BODY_EXCERPT ? `${flat.slice(0, BODY_EXCERPT)}...` : flat;
}

function mentionsQuota(body: string): boolean {
  const lower = body.toLowerCase();
  return QUOTA_PATTERNS.some(p => lower.includes(p));
}

export function classifyHttpFailure(status: number, body: string, channel?: string): BackendFailure {
  const message = `HTTP ${status}${body ? `: ${excerpt(body)}` : ""}`;
  const nonRetryable = (reason: FailureReason) =>
    new NonRetryableBackendError(message, { reason, status, channel });
  const retryable = (reason: FailureReason) =>
    new RetryableBackendError(message, { reason, status, channel });

  if (AUTH_STATUS.includes(status)) return nonRetryable("auth");
  if (status === 402) return nonRetryable("quota");
  if (status === 429) return mentionsQuota(body) ? nonRetryable("quota") : retryable("rate_limit");
  if (BAD_REQUEST_STATUS.includes(status)) return nonRetryable("bad_request");
  if (status === 408) return retryable("timeout");
  if (status >= 500) return retryable("server");
  return retryable("unknown");
}

// ============================================
// THROWN ERRORS
// ============================================

const NETWORK_PATTERNS = [
  "fetch failed",
  "econnrefused",
  "econnreset",
  "enotfound",
  "eai_again",
  "socket hang up",
  "network",
  "terminated",
];

const TIMEOUT_PATTERNS = ["timeout", "timed out", "etimedout"];

function errorName(error: unknown): string | undefined {
  return typeof error === "object" && error !== null && "name" in error && typeof error.name === "string"
    ? error.name
    : undefined;
}

function describe(error: unknown): string {
  if (!(error instanceof Error)) return String(error);
  // undici hides the interesting part (ECONNRESET etc.) in `cause`
  const cause = error.cause instanceof Error ? ` (${error.cause.message})` : "";
  return `${error.message}${cause}`;
}

/**
 * Map anything thrown while sending or reading a call to a backend failure.
 * Backend failures pass through with the channel filled in.
 */
export function classifyError(error: unknown, channel?: string): BackendFailure {
  if (error instanceof RetryableBackendError || error instanceof NonRetryableBackendError) {
    error.channel ??= channel;
    return error;
  }

  const message = describe(error);
  const lower = message.toLowerCase();

  // AbortSignal.timeout() rejects with a DOMException named TimeoutError
  if (errorName(error) === "TimeoutError") {
    return new RetryableBackendError(`Request timed out: ${message}`, { reason: "timeout", channel });
  }
  if (TIMEOUT_PATTERNS.some(p => lower.includes(p))) {
    return new RetryableBackendError(message, { reason: "timeout", channel });
  }
  if (NETWORK_PATTERNS.some(p => lower.includes(p))) {
    return new RetryableBackendError(message, { reason: "network", channel });
  }
  if (error instanceof SyntaxError) {
    return new RetryableBackendError(`Invalid response body: ${message}`, { reason: "malformed_response", channel });
  }
  return new RetryableBackendError(message, { reason: "unknown", channel });
}

export function malformedResponse(message: string, channel?: string, status?: number): RetryableBackendError {
  return new RetryableBackendError(message, { reason: "malformed_response", channel, status });
}
