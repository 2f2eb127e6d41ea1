/**
 * Credential Pool
 *
 * Per-channel ordered credentials with failure counters, thresholds and a
 * round-robin cursor. Every method is synchronous, so on the event loop a
 * mutation never interleaves with another and counters cannot tear.
 *
 * A credential is active iff its threshold is UNLIMITED_THRESHOLD or its
 * failure count is below the threshold. Nothing else stores "active".
 */

import { nanoid } from "nanoid";
import { createComponentLogger } from "../../logging.js";
import { NoAvailableCredentialError, ValidationError } from "../errors.js";
import type { ChannelRegistry } from "../registry/channel-registry.js";
import {
  DEFAULT_THRESHOLD,
  UNLIMITED_THRESHOLD,
} from "../types.js";
import type { CredentialRecord, CredentialView, Outcome } from "../types.js";
import { maskSecret } from "./mask.js";

const log = createComponentLogger("broker.pool");

// ============================================
// TYPES
// ============================================

export interface CredentialLease {
  readonly channel: string;
  readonly credentialId: string;
  readonly secret: string;
  readonly keyMask: string;
  /** Drop the lease without reporting an outcome. Safe to call twice. */
  release(): void;
}

export type PoolChange = "added" | "removed" | "threshold" | "reset" | "outcome" | "restored";

export interface PoolEvent {
  channel: string;
  change: PoolChange;
}

export type PoolListener = (event: PoolEvent) => void;

export interface CredentialPoolOptions {
  defaultThreshold?: number;
}

interface Bucket {
  credentials: CredentialRecord[];
  /** Position of the credential handed out last; -1 before the first acquire */
  cursor: number;
  inFlight: number;
}

// ============================================
// HELPERS
// ============================================

export function isActive(record: Pick<CredentialRecord, "threshold" | "failureCount">): boolean {
  return record.threshold === UNLIMITED_THRESHOLD || record.failureCount < record.threshold;
}

export function isValidThreshold(value: number): boolean {
  return Number.isInteger(value) && (value >= 0 || value === UNLIMITED_THRESHOLD);
}

function toView(record: CredentialRecord, position: number): CredentialView {
  return {
    index: position + 1,
    keyMask: maskSecret(record.value),
    failureCount: record.failureCount,
    threshold: record.threshold,
    active: isActive(record),
  };
}

// ============================================
// POOL
// ============================================

export class CredentialPool {
  private buckets = new Map<string, Bucket>();
  private listeners = new Set<PoolListener>();
  private leases = new WeakMap<CredentialLease, Bucket>();
  private readonly defaultThreshold: number;

  constructor(private readonly registry: ChannelRegistry, options: CredentialPoolOptions = {}) {
    this.defaultThreshold = options.defaultThreshold ?? DEFAULT_THRESHOLD;
    if (!isValidThreshold(this.defaultThreshold)) {
      throw new ValidationError(`Invalid default threshold: ${this.defaultThreshold}`);
    }

    // Credentials go with their channel. Leases still out keep pointing at
    // the orphaned bucket, so their reports land nowhere.
    registry.onChange((event) => {
      if (event.type === "removed") this.buckets.delete(event.channel.name);
    });
  }

  // ----------------------------------------
  // Administration
  // ----------------------------------------

  /**
   * Add secrets to a channel. Values are trimmed; empty values and values
   * already present (in the channel or earlier in the same call) are skipped.
   * Returns the number actually added.
   */
  addCredentials(channel: string, values: readonly string[], threshold = this.defaultThreshold): number {
    if (!isValidThreshold(threshold)) {
      throw new ValidationError(`Threshold must be an integer >= 0 or ${UNLIMITED_THRESHOLD}`);
    }
    const bucket = this.bucketFor(channel);
    const seen = new Set(bucket.credentials.map(c => c.value));
    let added = 0;

    for (const raw of values) {
      const value = raw.trim();
      if (!value || seen.has(value)) continue;
      seen.add(value);
      log.registerSecret(value);
      bucket.credentials.push({ id: `cred_${nanoid(10)}`, value, threshold, failureCount: 0 });
      added++;
    }

    if (added > 0) {
      log.info(`Added ${added} credential(s)`, { channel, skipped: values.length - added });
      this.emit({ channel, change: "added" });
    }
    return added;
  }

  listCredentials(channel: string): CredentialView[] {
    return this.bucketFor(channel).credentials.map(toView);
  }

  /** Remove by 1-based index as shown by listCredentials(). Returns the removed credential's view. */
  removeCredential(channel: string, index: number): CredentialView {
    const bucket = this.bucketFor(channel);
    const position = this.position(bucket, channel, index);
    const [removed] = bucket.credentials.splice(position, 1);
    // Keep the rotation pointing at the same next credential
    if (position <= bucket.cursor) bucket.cursor--;

    const view = toView(removed, position);
    log.info("Credential removed", { channel, keyMask: view.keyMask });
    this.emit({ channel, change: "removed" });
    return view;
  }

  setThreshold(channel: string, index: number, threshold: number): CredentialView {
    if (!isValidThreshold(threshold)) {
      throw new ValidationError(`Threshold must be an integer >= 0 or ${UNLIMITED_THRESHOLD}`);
    }
    const bucket = this.bucketFor(channel);
    const position = this.position(bucket, channel, index);
    const record = bucket.credentials[position];
    record.threshold = threshold;
    this.emit({ channel, change: "threshold" });
    return toView(record, position);
  }

  /**
   * Clear failure counters for one credential, or the whole channel when
   * index is omitted. Returns how many credentials actually changed.
   */
  resetFailures(channel: string, index?: number): number {
    const bucket = this.bucketFor(channel);
    const targets = index === undefined
      ? bucket.credentials
      : [bucket.credentials[this.position(bucket, channel, index)]];

    let changed = 0;
    for (const record of targets) {
      if (record.failureCount !== 0) {
        record.failureCount = 0;
        changed++;
      }
    }
    if (changed > 0) {
      log.info(`Reset ${changed} credential(s)`, { channel });
      this.emit({ channel, change: "reset" });
    }
    return changed;
  }

  resetAll(): number {
    let changed = 0;
    for (const channel of this.buckets.keys()) {
      changed += this.resetFailures(channel);
    }
    return changed;
  }

  // ----------------------------------------
  // Dispatch
  // ----------------------------------------

  /**
   * Hand out the next active credential after the one returned last,
   * passing over any id in `exclude` (the ones a request already tried).
   * Leases are not exclusive; two requests may hold the same credential.
   */
  acquire(channel: string, exclude?: ReadonlySet<string>): CredentialLease {
    const bucket = this.registry.has(channel) ? this.buckets.get(channel) : undefined;
    if (!bucket) throw new NoAvailableCredentialError([channel]);

    const total = bucket.credentials.length;
    for (let step = 1; step <= total; step++) {
      const position = (bucket.cursor + step) % total;
      const record = bucket.credentials[position];
      if (!isActive(record) || exclude?.has(record.id)) continue;

      bucket.cursor = position;
      bucket.inFlight++;
      return this.lease(channel, bucket, record);
    }

    throw new NoAvailableCredentialError([channel]);
  }

  /**
   * Record the result of a call made with a lease and release it. Outcomes
   * for credentials or channels removed since acquisition are ignored.
   */
  reportOutcome(lease: CredentialLease, outcome: Outcome): void {
    lease.release();

    const bucket = this.buckets.get(lease.channel);
    const record = bucket?.credentials.find(c => c.id === lease.credentialId);
    // A lease belongs to the bucket it was drawn from, not a same-named successor
    if (!bucket || !record || this.leases.get(lease) !== bucket) {
      log.debug("Ignoring outcome for a removed credential", { channel: lease.channel, keyMask: lease.keyMask });
      return;
    }

    if (outcome.success) {
      if (record.failureCount === 0) return;
      record.failureCount = 0;
      this.emit({ channel: lease.channel, change: "outcome" });
      return;
    }

    const wasActive = isActive(record);
    if (outcome.disable && record.threshold !== UNLIMITED_THRESHOLD) {
      record.failureCount = Math.max(record.failureCount, record.threshold);
    } else {
      record.failureCount++;
    }

    if (wasActive && !isActive(record)) {
      log.warn("Credential disabled", {
        channel: lease.channel,
        keyMask: lease.keyMask,
        failureCount: record.failureCount,
        threshold: record.threshold,
        forced: outcome.disable === true,
      });
    }
    this.emit({ channel: lease.channel, change: "outcome" });
  }

  activeCount(channel: string): number {
    return this.buckets.get(channel)?.credentials.filter(isActive).length ?? 0;
  }

  totalCount(channel: string): number {
    return this.buckets.get(channel)?.credentials.length ?? 0;
  }

  inFlight(channel: string): number {
    return this.buckets.get(channel)?.inFlight ?? 0;
  }

  // ----------------------------------------
  // Persistence
  // ----------------------------------------

  /** Replace a channel's credentials with persisted records */
  restore(channel: string, records: readonly CredentialRecord[]): void {
    const bucket = this.bucketFor(channel);
    bucket.credentials = records.map(r => {
      if (!isValidThreshold(r.threshold)) {
        throw new ValidationError(`Persisted credential ${r.id} in "${channel}" has invalid threshold ${r.threshold}`);
      }
      log.registerSecret(r.value);
      return { ...r };
    });
    bucket.cursor = -1;
    this.emit({ channel, change: "restored" });
  }

  exportRecords(channel: string): CredentialRecord[] {
    return (this.buckets.get(channel)?.credentials ?? []).map(r => ({ ...r }));
  }

  onChange(listener: PoolListener): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  // ----------------------------------------
  // Internals
  // ----------------------------------------

  private bucketFor(channel: string): Bucket {
    this.registry.require(channel);
    let bucket = this.buckets.get(channel);
    if (!bucket) {
      bucket = { credentials: [], cursor: -1, inFlight: 0 };
      this.buckets.set(channel, bucket);
    }
    return bucket;
  }

  private position(bucket: Bucket, channel: string, index: number): number {
    if (!Number.isInteger(index) || index < 1 || index > bucket.credentials.length) {
      throw new ValidationError(
        `Invalid credential index ${index} for channel "${channel}" (has ${bucket.credentials.length})`,
      );
    }
    return index - 1;
  }

  private lease(channel: string, bucket: Bucket, record: CredentialRecord): CredentialLease {
    let released = false;
    const lease: CredentialLease = {
      channel,
      credentialId: record.id,
      secret: record.value,
      keyMask: maskSecret(record.value),
      release: () => {
        if (released) return;
        released = true;
        bucket.inFlight--;
      },
    };
    this.leases.set(lease, bucket);
    return lease;
  }

  private emit(event: PoolEvent): void {
    for (const listener of this.listeners) {
      try {
        listener(event);
      } catch (err) {
        log.error("Pool listener failed", err, { ...event });
      }
    }
  }
}
