/**
 * Dispatch Engine
 *
 * Two-level failover: channels in priority order, and within a channel up
 * to one draw per credential that was active when the channel's turn began,
 * never the same credential twice in one request.
 * Retryable failures move on; a non-retryable failure ends the request.
 */

import { nanoid } from "nanoid";
import { createComponentLogger } from "../../logging.js";
import { adapterFor } from "../adapters/index.js";
import { classifyError } from "../adapters/classify.js";
import {
  AllChannelsExhaustedError,
  NoAvailableCredentialError,
  NonRetryableBackendError,
  RequestCancelledError,
  ValidationError,
} from "../errors.js";
import type { ChannelTally, RetryableBackendError } from "../errors.js";
import type { CredentialLease, CredentialPool } from "../pool/credential-pool.js";
import type { ChannelRegistry } from "../registry/channel-registry.js";
import {
  attemptSignal,
  readJsonImage,
  readSseImage,
  resolveImage,
  send,
} from "../transport/http.js";
import type { ImageBytes } from "../transport/http.js";
import type { Channel, GenerationRequest, GenerationResult } from "../types.js";

const log = createComponentLogger("broker.engine");

export interface DispatchEngineOptions {
  /** Per-call timeout for JSON responses (default: 120s) */
  requestTimeoutMs?: number;
  /** Per-call timeout for SSE responses (default: 180s) */
  streamTimeoutMs?: number;
  /** Channel names tried first, in this order; the rest follow in registration order */
  channelPriority?: readonly string[];
}

function throwIfCancelled(signal: AbortSignal | undefined): void {
  if (signal?.aborted) throw new RequestCancelledError();
}

export class DispatchEngine {
  private readonly requestTimeoutMs: number;
  private readonly streamTimeoutMs: number;
  private readonly channelPriority: readonly string[];

  constructor(
    private readonly registry: ChannelRegistry,
    private readonly pool: CredentialPool,
    options: DispatchEngineOptions = {},
  ) {
    this.requestTimeoutMs = options.requestTimeoutMs ?? 120_000;
    this.streamTimeoutMs = options.streamTimeoutMs ?? 180_000;
    this.channelPriority = options.channelPriority ?? [];
  }

  /**
   * Channels a request may use, in the order they are tried. An explicit
   * channel must exist and be enabled.
   */
  candidates(request: Pick<GenerationRequest, "channel">): Channel[] {
    if (request.channel !== undefined) {
      const channel = this.registry.require(request.channel);
      if (!channel.enabled) {
        throw new ValidationError(`Channel "${channel.name}" is disabled`);
      }
      return [channel];
    }

    const enabled = this.registry.enabledChannels();
    const rank = (c: Channel): number => {
      const i = this.channelPriority.indexOf(c.name);
      return i === -1 ? this.channelPriority.length : i;
    };
    // Array.prototype.sort is stable, so unlisted channels keep registration order
    return [...enabled].sort((a, b) => rank(a) - rank(b));
  }

  async generate(request: GenerationRequest): Promise<GenerationResult> {
    const requestId = request.requestId ?? `gen_${nanoid(12)}`;
    const started = Date.now();
    const reqLog = log.child({ requestId });

    if (!request.prompt.trim()) throw new ValidationError("Prompt is required");
    throwIfCancelled(request.signal);

    const channels = this.candidates(request);
    if (channels.length === 0) throw new NoAvailableCredentialError([]);

    let attempts = 0;
    let lastError: RetryableBackendError | undefined;
    const tally: ChannelTally[] = [];

    for (const channel of channels) {
      const entry: ChannelTally = { channel: channel.name, attempts: 0, failures: 0 };
      tally.push(entry);

      const chLog = reqLog.child({ channel: channel.name });
      const budget = this.pool.activeCount(channel.name);
      const tried = new Set<string>();

      for (let draw = 0; draw < budget; draw++) {
        throwIfCancelled(request.signal);

        // Other requests move the shared cursor too, so skip what this one already tried
        let lease: CredentialLease;
        try {
          lease = this.pool.acquire(channel.name, tried);
        } catch (err) {
          if (err instanceof NoAvailableCredentialError) break;
          throw err;
        }
        tried.add(lease.credentialId);
        attempts++;
        entry.attempts++;

        let image: ImageBytes;
        try {
          image = await this.attempt(channel, lease, request);
        } catch (err) {
          if (request.signal?.aborted) {
            lease.release();
            chLog.info("Request cancelled by caller", { keyMask: lease.keyMask });
            throw new RequestCancelledError();
          }
          if (err instanceof ValidationError) {
            lease.release();
            throw err;
          }

          const failure = classifyError(err, channel.name);
          entry.failures++;

          if (failure instanceof NonRetryableBackendError) {
            this.pool.reportOutcome(lease, { success: false, disable: failure.disablesCredential });
            chLog.warn("Non-retryable failure", { keyMask: lease.keyMask, reason: failure.reason, status: failure.status });
            throw failure;
          }

          this.pool.reportOutcome(lease, { success: false });
          lastError = failure;
          chLog.warn("Retryable failure, rotating", {
            keyMask: lease.keyMask,
            reason: failure.reason,
            status: failure.status,
            attempt: attempts,
          });
          continue;
        }

        this.pool.reportOutcome(lease, { success: true });
        const elapsedMs = Date.now() - started;
        chLog.info("Image generated", { keyMask: lease.keyMask, attempts, elapsedMs, bytes: image.data.length });
        return {
          image: image.data,
          mimeType: image.mimeType,
          channel: channel.name,
          keyMask: lease.keyMask,
          attempts,
          elapsedMs,
          requestId,
        };
      }

      if (entry.attempts === 0) {
        chLog.debug("No usable credential, skipping channel");
      }
    }

    if (!lastError) {
      reqLog.warn("No channel had a usable credential", { channels: channels.map(c => c.name) });
      throw new NoAvailableCredentialError(channels.map(c => c.name));
    }

    reqLog.error("All channels exhausted", undefined, { attempts, tally });
    throw new AllChannelsExhaustedError(lastError, attempts, tally);
  }

  /** One call: encode, send, read the stream or body, fetch the bytes */
  private async attempt(channel: Channel, lease: CredentialLease, request: GenerationRequest): Promise<ImageBytes> {
    const adapter = adapterFor(channel.kind);
    const wire = adapter.encode(channel, lease.secret, { prompt: request.prompt, images: request.images ?? [] });
    const signal = attemptSignal(channel.streaming ? this.streamTimeoutMs : this.requestTimeoutMs, request.signal);

    const response = await send(wire, signal);
    // Some backends ignore `stream: true` and answer with plain JSON
    const contentType = response.headers.get("content-type") ?? "";
    const reference = channel.streaming && !contentType.includes("application/json")
      ? await readSseImage(response, adapter.streamDecoder(), signal)
      : await readJsonImage(response, adapter.decode);

    return resolveImage(reference, signal);
  }
}
