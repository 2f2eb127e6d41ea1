import { describe, it, expect } from "vitest";
import { classifyError, classifyHttpFailure } from "./classify.js";
import { NonRetryableBackendError, RetryableBackendError } from "../errors.js";

describe("classifyHttpFailure", () => {
  it.each([
    [401, "", "auth"],
    [403, "forbidden", "auth"],
    [402, "payment required", "quota"],
    [429, '{"error":{"message":"You exceeded your current quota"}}', "quota"],
    [400, "bad prompt", "bad_request"],
    [404, "model not found", "bad_request"],
    [422, "", "bad_request"],
  ])("treats %i as non-retryable (%s)", (status, body, reason) => {
    const failure = classifyHttpFailure(status, body, "proxy");
    expect(failure).toBeInstanceOf(NonRetryableBackendError);
    expect(failure).toMatchObject({ reason, status, channel: "proxy" });
  });

  it.each([
    [429, "slow down", "rate_limit"],
    [408, "", "timeout"],
    [500, "boom", "server"],
    [503, "", "server"],
    [302, "", "unknown"],
  ])("treats %i as retryable (%s)", (status, body, reason) => {
    const failure = classifyHttpFailure(status, body);
    expect(failure).toBeInstanceOf(RetryableBackendError);
    expect(failure.reason).toBe(reason);
  });

  it("only disables the credential for quota failures", () => {
    expect(classifyHttpFailure(402, "").kind).toBe("non_retryable_backend");
    const quota = classifyHttpFailure(402, "");
    const auth = classifyHttpFailure(401, "");
    expect(quota instanceof NonRetryableBackendError && quota.disablesCredential).toBe(true);
    expect(auth instanceof NonRetryableBackendError && auth.disablesCredential).toBe(false);
  });

  it("keeps a short excerpt of the body in the message", () => {
    expect(classifyHttpFailure(500, "upstream\n  exploded").message).toBe("HTTP 500: upstream exploded");
    expect(classifyHttpFailure(500, "x".repeat(400)).message).toBe(`HTTP 500: ${"x".repeat(300)}...`);
  });
});

describe("classifyError", () => {
  it("maps timeouts", () => {
    const timeout = new DOMException("The operation was aborted due to timeout", "TimeoutError");
    expect(classifyError(timeout, "google").reason).toBe("timeout");
  });

  it("maps network failures, including the cause", () => {
    const err = new TypeError("fetch failed", { cause: new Error("read ECONNRESET") });
    expect(classifyError(err)).toMatchObject({ kind: "retryable_backend", reason: "network", message: "fetch failed (read ECONNRESET)" });
  });

  it("passes backend failures through and fills in the channel", () => {
    const original = classifyHttpFailure(401, "");
    const result = classifyError(original, "proxy");
    expect(result).toBe(original);
    expect(result.channel).toBe("proxy");
  });

  it("treats anything else as retryable unknown", () => {
    expect(classifyError("weird")).toMatchObject({ kind: "retryable_backend", reason: "unknown" });
  });
});
