/**
 * Channel Registry
 *
 * Holds the configured channels in insertion order. Channels are frozen;
 * every mutation swaps in a new object so a reader holding a channel never
 * sees it change underneath it.
 */

import { createComponentLogger } from "../../logging.js";
import { ValidationError } from "../errors.js";
import type { Channel, ChannelDefinition } from "../types.js";
import {
  FORMAT_RULES,
  rewriteNativeModel,
  validateChannelDefinition,
  validateModel,
} from "./validation.js";

const log = createComponentLogger("broker.registry");

export type RegistryEvent =
  | { type: "added"; channel: Channel }
  | { type: "updated"; channel: Channel; previous: Channel }
  | { type: "removed"; channel: Channel };

export type RegistryListener = (event: RegistryEvent) => void;

export class ChannelRegistry {
  private channels = new Map<string, Channel>();
  private listeners = new Set<RegistryListener>();

  addChannel(def: ChannelDefinition): Channel {
    const channel = validateChannelDefinition(def);
    if (this.channels.has(channel.name)) {
      throw new ValidationError(`Channel "${channel.name}" already exists`);
    }
    this.channels.set(channel.name, channel);
    log.info("Channel added", { channel: channel.name, kind: channel.kind, enabled: channel.enabled });
    this.emit({ type: "added", channel });
    return channel;
  }

  removeChannel(name: string): Channel {
    const channel = this.require(name);
    this.channels.delete(name);
    log.info("Channel removed", { channel: name });
    this.emit({ type: "removed", channel });
    return channel;
  }

  setEnabled(name: string, enabled: boolean): Channel {
    return this.update(name, { enabled });
  }

  setStreaming(name: string, streaming: boolean): Channel {
    return this.update(name, { streaming });
  }

  /**
   * Change the model a channel requests. Native channels carry the model in
   * the endpoint path, so the URL is rewritten as well.
   */
  updateModel(name: string, model: string): Channel {
    const current = this.require(name);
    const next = validateModel(model);
    if (FORMAT_RULES[current.kind].model === "in-url") {
      return this.update(name, { model: next, endpoint: rewriteNativeModel(current.endpoint, next) });
    }
    return this.update(name, { model: next });
  }

  get(name: string): Channel | undefined {
    return this.channels.get(name);
  }

  has(name: string): boolean {
    return this.channels.has(name);
  }

  require(name: string): Channel {
    const channel = this.channels.get(name);
    if (!channel) throw new ValidationError(`Unknown channel "${name}"`);
    return channel;
  }

  list(): Channel[] {
    return [...this.channels.values()];
  }

  enabledChannels(): Channel[] {
    return this.list().filter(c => c.enabled);
  }

  /** Returns an unsubscribe function */
  onChange(listener: RegistryListener): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  private update(name: string, patch: Partial<Pick<Channel, "enabled" | "streaming" | "model" | "endpoint">>): Channel {
    const previous = this.require(name);
    const channel: Channel = Object.freeze({ ...previous, ...patch });
    this.channels.set(name, channel);
    log.debug("Channel updated", { channel: name, ...patch });
    this.emit({ type: "updated", channel, previous });
    return channel;
  }

  private emit(event: RegistryEvent): void {
    for (const listener of this.listeners) {
      try {
        listener(event);
      } catch (err) {
        log.error("Registry listener failed", err, { event: event.type, channel: event.channel.name });
      }
    }
  }
}
