/**
 * Broker
 *
 * Credential pooling and multi-backend dispatch for image generation.
 */

export { Broker, createBroker } from "./broker.js";
export type { BrokerOptions, ChannelSummary, ClassifiedAddResult } from "./broker.js";

export { ChannelRegistry } from "./registry/channel-registry.js";
export type { RegistryEvent, RegistryListener } from "./registry/channel-registry.js";
export { validateChannelDefinition, rewriteNativeModel, isFormatKind } from "./registry/validation.js";

export { CredentialPool, isActive, isValidThreshold } from "./pool/credential-pool.js";
export type { CredentialLease, PoolEvent, PoolListener } from "./pool/credential-pool.js";
export { maskSecret, classifyCredential } from "./pool/mask.js";

export { DispatchEngine } from "./engine/dispatch-engine.js";
export type { DispatchEngineOptions } from "./engine/dispatch-engine.js";

export { FORMAT_ADAPTERS, adapterFor } from "./adapters/index.js";
export type { ImageReference, RequestAdapter, WireRequest } from "./adapters/index.js";

export { PromptBook } from "./prompts.js";
export { MemoryStateStore } from "./state/store.js";
export type { StateStore } from "./state/store.js";
export { SqliteStateStore } from "./state/sqlite-store.js";

export * from "./errors.js";
export * from "./types.js";
