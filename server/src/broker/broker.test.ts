/**
 * Broker Tests
 *
 * Covers:
 * - Snapshot persistence on every mutation and restore on startup
 * - Adding credentials by class
 * - First-party channel seeding
 */

import { describe, it, expect } from "vitest";
import { createBroker } from "./broker.js";
import { MemoryStateStore } from "./state/store.js";
import type { StateStore } from "./state/store.js";
import type { BrokerSnapshot } from "./types.js";

const NATIVE_ENDPOINT = "https://gen.example.test/v1beta/models/m:generateContent";
const PROXY = { name: "proxy", kind: "chat-completions", endpoint: "https://proxy.example.test/v1/chat/completions", model: "m" } as const;

describe("persistence", () => {
  it("saves a snapshot after every mutation", () => {
    const store = new MemoryStateStore();
    const broker = createBroker({ store, defaultThreshold: 4 });

    broker.seedFirstPartyChannel(NATIVE_ENDPOINT);
    broker.pool.addCredentials("google", ["test-secret-a"]);
    broker.prompts.add("poster", "Make it a poster");
    expect(store.saves).toBe(3);

    broker.pool.reportOutcome(broker.pool.acquire("google"), { success: false });
    expect(store.saves).toBe(4);
    expect(store.load()?.channels[0].credentials[0]).toMatchObject({ value: "test-secret-a", failureCount: 1, threshold: 4 });
  });

  it("restores channels, credentials and prompts without saving", () => {
    const store = new MemoryStateStore();
    const first = createBroker({ store });
    first.registry.addChannel(PROXY);
    first.registry.setStreaming("proxy", true);
    first.pool.addCredentials("proxy", ["sk-test-secret-1", "sk-test-secret-2"]);
    first.prompts.add("anime", "Anime style");
    const saved: BrokerSnapshot = first.snapshot();
    const saves = store.saves;

    const second = createBroker({ store });

    expect(store.saves).toBe(saves);
    expect(second.snapshot()).toEqual(saved);
    expect(second.registry.require("proxy").streaming).toBe(true);
    expect(second.prompts.get("anime")).toBe("Anime style");
  });

  it("stops saving after close", () => {
    const store = new MemoryStateStore();
    const broker = createBroker({ store });
    broker.close();
    broker.registry.addChannel(PROXY);
    expect(store.saves).toBe(0);
  });

  it("keeps working when a save fails", () => {
    const failing: StateStore = {
      load: () => null,
      save: () => {
        throw new Error("disk full");
      },
    };
    const broker = createBroker({ store: failing });
    expect(() => broker.registry.addChannel(PROXY)).not.toThrow();
    expect(broker.registry.has("proxy")).toBe(true);
  });
});

describe("addCredentialsByClass", () => {
  it("routes by prefix and counts values without a target channel", () => {
    const broker = createBroker();
    broker.seedFirstPartyChannel(NATIVE_ENDPOINT);

    const result = broker.addCredentialsByClass(["test-secret-a", "sk-test-secret", " ", "test-secret-a", "test-secret-b"]);

    expect(result).toEqual({ added: { google: 2 }, unrouted: { "third-party": 1 } });
    expect(broker.pool.totalCount("google")).toBe(2);
  });

  it("honours custom channel names and prefix", () => {
    const broker = createBroker({ thirdPartyKeyPrefix: "px-", thirdPartyChannel: "relay", firstPartyChannel: "gemini" });
    broker.registry.addChannel({ ...PROXY, name: "relay" });
    broker.seedFirstPartyChannel(NATIVE_ENDPOINT);

    expect(broker.addCredentialsByClass(["px-test-secret", "sk-test-secret"]))
      .toEqual({ added: { relay: 1, gemini: 1 }, unrouted: {} });
  });
});

describe("seedFirstPartyChannel", () => {
  it("registers the native channel once", () => {
    const broker = createBroker();
    const channel = broker.seedFirstPartyChannel(NATIVE_ENDPOINT);

    expect(channel).toMatchObject({ name: "google", kind: "native-generate", model: "m", enabled: true, streaming: false });
    expect(broker.seedFirstPartyChannel(NATIVE_ENDPOINT)).toBeNull();
  });
});

describe("channelSummaries", () => {
  it("adds pool counts to each channel", () => {
    const broker = createBroker({ defaultThreshold: 1 });
    broker.registry.addChannel(PROXY);
    broker.pool.addCredentials("proxy", ["sk-test-secret-1", "sk-test-secret-2"]);
    broker.pool.reportOutcome(broker.pool.acquire("proxy"), { success: false });
    broker.pool.acquire("proxy");

    expect(broker.channelSummaries()).toEqual([
      { ...broker.registry.require("proxy"), active: 1, total: 2, inFlight: 1 },
    ]);
  });
});
