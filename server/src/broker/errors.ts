/**
 * Broker Errors
 *
 * Every failure the broker surfaces is a BrokerError with a `kind`
 * discriminant, so callers (and the HTTP layer) switch on the kind instead
 * of parsing messages.
 */

export type BrokerErrorKind =
  | "validation"
  | "no_available_credential"
  | "retryable_backend"
  | "non_retryable_backend"
  | "all_channels_exhausted"
  | "cancelled";

export type FailureReason =
  | "auth"
  | "quota"
  | "bad_request"
  | "rate_limit"
  | "timeout"
  | "server"
  | "network"
  | "malformed_response"
  | "unknown";

export abstract class BrokerError extends Error {
  abstract readonly kind: BrokerErrorKind;

  toJSON(): Record<string, unknown> {
    return { error: this.kind, message: this.message };
  }
}

export class ValidationError extends BrokerError {
  readonly kind = "validation";

  constructor(message: string) {
    super(message);
    this.name = "ValidationError";
  }
}

export class NoAvailableCredentialError extends BrokerError {
  readonly kind = "no_available_credential";

  constructor(readonly channels: string[]) {
    super(channels.length === 0
      ? "No enabled channels"
      : `No available credential in channel(s): ${channels.join(", ")}`);
    this.name = "NoAvailableCredentialError";
  }

  override toJSON(): Record<string, unknown> {
    return { ...super.toJSON(), channels: this.channels };
  }
}

interface BackendFailureDetails {
  reason: FailureReason;
  channel?: string;
  status?: number;
}

abstract class BackendError extends BrokerError {
  readonly reason: FailureReason;
  readonly status?: number;
  channel?: string;

  constructor(message: string, details: BackendFailureDetails) {
    super(message);
    this.reason = details.reason;
    this.status = details.status;
    this.channel = details.channel;
  }

  override toJSON(): Record<string, unknown> {
    return {
      ...super.toJSON(),
      reason: this.reason,
      ...(this.status !== undefined ? { status: this.status } : {}),
      ...(this.channel ? { channel: this.channel } : {}),
    };
  }
}

export class RetryableBackendError extends BackendError {
  readonly kind = "retryable_backend";

  constructor(message: string, details: BackendFailureDetails) {
    super(message, details);
    this.name = "RetryableBackendError";
  }
}

export class NonRetryableBackendError extends BackendError {
  readonly kind = "non_retryable_backend";

  constructor(message: string, details: BackendFailureDetails) {
    super(message, details);
    this.name = "NonRetryableBackendError";
  }

  /** Quota exhaustion takes the credential out of rotation immediately */
  get disablesCredential(): boolean {
    return this.reason === "quota";
  }
}

export interface ChannelTally {
  channel: string;
  attempts: number;
  failures: number;
}

export class AllChannelsExhaustedError extends BrokerError {
  readonly kind = "all_channels_exhausted";

  constructor(
    readonly lastError: RetryableBackendError,
    readonly attempts: number,
    readonly tally: ChannelTally[],
  ) {
    super(`All channels exhausted after ${attempts} attempt(s); last error: ${lastError.message}`);
    this.name = "AllChannelsExhaustedError";
  }

  override toJSON(): Record<string, unknown> {
    return {
      ...super.toJSON(),
      attempts: this.attempts,
      lastError: this.lastError.toJSON(),
      tally: this.tally,
    };
  }
}

export class RequestCancelledError extends BrokerError {
  readonly kind = "cancelled";

  constructor() {
    super("Request cancelled by caller");
    this.name = "RequestCancelledError";
  }
}

export function isBrokerError(error: unknown): error is BrokerError {
  return error instanceof BrokerError;
}
