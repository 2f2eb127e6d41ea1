/**
 * Broker
 *
 * Wires the registry, pool, engine and prompt book together, restores them
 * from a StateStore and saves a fresh snapshot after every mutation. This
 * is the object the HTTP layer talks to.
 */

import { createComponentLogger } from "../logging.js";
import { DispatchEngine } from "./engine/dispatch-engine.js";
import type { DispatchEngineOptions } from "./engine/dispatch-engine.js";
import { CredentialPool } from "./pool/credential-pool.js";
import { classifyCredential } from "./pool/mask.js";
import { PromptBook } from "./prompts.js";
import { ChannelRegistry } from "./registry/channel-registry.js";
import type { StateStore } from "./state/store.js";
import type {
  BrokerSnapshot,
  Channel,
  CredentialClass,
  GenerationRequest,
  GenerationResult,
} from "./types.js";

const log = createComponentLogger("broker");

// ============================================
// TYPES
// ============================================

export interface BrokerOptions extends DispatchEngineOptions {
  store?: StateStore;
  defaultThreshold?: number;
  /** Values starting with this are third-party keys (default "sk-") */
  thirdPartyKeyPrefix?: string;
  /** Where first-party keys go when added by classification (default "google") */
  firstPartyChannel?: string;
  /** Where third-party keys go when added by classification (default "proxy") */
  thirdPartyChannel?: string;
}

export interface ChannelSummary extends Channel {
  active: number;
  total: number;
  inFlight: number;
}

export interface ClassifiedAddResult {
  /** Credentials added per target channel */
  added: Record<string, number>;
  /** Values whose target channel does not exist, by class */
  unrouted: Partial<Record<CredentialClass, number>>;
}

// ============================================
// BROKER
// ============================================

export class Broker {
  readonly registry: ChannelRegistry;
  readonly pool: CredentialPool;
  readonly engine: DispatchEngine;
  readonly prompts: PromptBook;

  private readonly store: StateStore | undefined;
  private readonly routes: Record<CredentialClass, string>;
  private readonly thirdPartyKeyPrefix: string;
  private readonly unsubscribers: (() => void)[] = [];
  private restoring = false;

  constructor(options: BrokerOptions = {}) {
    this.registry = new ChannelRegistry();
    this.pool = new CredentialPool(this.registry, { defaultThreshold: options.defaultThreshold });
    this.engine = new DispatchEngine(this.registry, this.pool, options);
    this.prompts = new PromptBook();
    this.store = options.store;
    this.thirdPartyKeyPrefix = options.thirdPartyKeyPrefix ?? "sk-";
    this.routes = {
      "first-party": options.firstPartyChannel ?? "google",
      "third-party": options.thirdPartyChannel ?? "proxy",
    };

    if (this.store) {
      this.restore(this.store.load());
      const persist = () => this.persist();
      this.unsubscribers.push(
        this.registry.onChange(persist),
        this.pool.onChange(persist),
        this.prompts.onChange(persist),
      );
    }
  }

  generate(request: GenerationRequest): Promise<GenerationResult> {
    return this.engine.generate(request);
  }

  /**
   * Route each value to the first- or third-party channel by its prefix.
   * Values whose channel is not registered are counted, not added.
   */
  addCredentialsByClass(values: readonly string[]): ClassifiedAddResult {
    const groups = new Map<CredentialClass, string[]>();
    for (const raw of values) {
      const value = raw.trim();
      if (!value) continue;
      const cls = classifyCredential(value, this.thirdPartyKeyPrefix);
      groups.set(cls, [...(groups.get(cls) ?? []), value]);
    }

    const result: ClassifiedAddResult = { added: {}, unrouted: {} };
    for (const [cls, group] of groups) {
      const channel = this.routes[cls];
      if (!this.registry.has(channel)) {
        log.warn(`No "${channel}" channel for ${group.length} ${cls} credential(s)`);
        result.unrouted[cls] = group.length;
        continue;
      }
      result.added[channel] = (result.added[channel] ?? 0) + this.pool.addCredentials(channel, group);
    }
    return result;
  }

  /**
   * Register the first-party native channel from configuration, unless a
   * channel with that name already exists (configured or restored).
   */
  seedFirstPartyChannel(endpoint: string): Channel | null {
    const name = this.routes["first-party"];
    if (this.registry.has(name)) return null;
    const channel = this.registry.addChannel({ name, kind: "native-generate", endpoint });
    log.info("Seeded first-party channel", { channel: name });
    return channel;
  }

  channelSummaries(): ChannelSummary[] {
    return this.registry.list().map(channel => ({
      ...channel,
      active: this.pool.activeCount(channel.name),
      total: this.pool.totalCount(channel.name),
      inFlight: this.pool.inFlight(channel.name),
    }));
  }

  snapshot(): BrokerSnapshot {
    return {
      channels: this.registry.list().map(channel => ({
        name: channel.name,
        kind: channel.kind,
        enabled: channel.enabled,
        streaming: channel.streaming,
        endpoint: channel.endpoint,
        ...(channel.model !== undefined ? { model: channel.model } : {}),
        credentials: this.pool.exportRecords(channel.name),
      })),
      prompts: this.prompts.list(),
    };
  }

  /** Stop persisting; the store stays open for its owner to close */
  close(): void {
    for (const unsubscribe of this.unsubscribers.splice(0)) unsubscribe();
  }

  private restore(snapshot: BrokerSnapshot | null): void {
    if (!snapshot) return;
    this.restoring = true;
    try {
      for (const persisted of snapshot.channels) {
        this.registry.addChannel(persisted);
        this.pool.restore(persisted.name, persisted.credentials);
      }
      this.prompts.restore(snapshot.prompts);
    } finally {
      this.restoring = false;
    }
    log.info("Restored state", { channels: snapshot.channels.length, prompts: Object.keys(snapshot.prompts).length });
  }

  private persist(): void {
    if (this.restoring || !this.store) return;
    try {
      this.store.save(this.snapshot());
    } catch (err) {
      // The in-memory state stays authoritative; the next mutation retries the save
      log.error("Failed to persist broker state", err);
    }
  }
}

export function createBroker(options: BrokerOptions = {}): Broker {
  return new Broker(options);
}
