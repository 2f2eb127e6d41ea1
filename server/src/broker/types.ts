/**
 * Broker Type Definitions
 *
 * Pure types and constants for channels, credentials and generation
 * requests. Behaviour lives in the registry, pool, adapters and engine.
 */

// ============================================
// CHANNELS
// ============================================

/** Wire format a channel speaks. Closed set; each has one adapter. */
export type FormatKind = "chat-completions" | "native-generate" | "image-generation";

export const FORMAT_KINDS: readonly FormatKind[] = ["chat-completions", "native-generate", "image-generation"];

export interface Channel {
  readonly name: string;
  readonly kind: FormatKind;
  readonly enabled: boolean;
  readonly streaming: boolean;
  readonly endpoint: string;
  /** Separate model id; for native-generate the model lives in the endpoint */
  readonly model?: string;
}

export interface ChannelDefinition {
  name: string;
  kind: FormatKind;
  endpoint: string;
  model?: string;
  enabled?: boolean;
  streaming?: boolean;
}

// ============================================
// CREDENTIALS
// ============================================

/** Threshold sentinel: failures never disable the credential */
export const UNLIMITED_THRESHOLD = -1;

export const DEFAULT_THRESHOLD = 5;

export type CredentialClass = "first-party" | "third-party";

export interface CredentialRecord {
  id: string;
  value: string;
  threshold: number;
  failureCount: number;
}

/** What the pool exposes about a credential; never the raw secret */
export interface CredentialView {
  /** 1-based position within the channel, as used by admin operations */
  index: number;
  keyMask: string;
  failureCount: number;
  threshold: number;
  active: boolean;
}

export type Outcome =
  | { success: true }
  | { success: false; disable?: boolean };

// ============================================
// GENERATION
// ============================================

export interface SourceImage {
  data: Buffer;
  mimeType: string;
}

export interface GenerationRequest {
  prompt: string;
  images?: SourceImage[];
  /** Pin to one channel; omit for automatic selection across enabled channels */
  channel?: string;
  signal?: AbortSignal;
  requestId?: string;
}

export interface GenerationResult {
  image: Buffer;
  mimeType: string;
  channel: string;
  keyMask: string;
  attempts: number;
  elapsedMs: number;
  requestId: string;
}

// ============================================
// PERSISTENCE
// ============================================

export interface PersistedChannel {
  name: string;
  kind: FormatKind;
  enabled: boolean;
  streaming: boolean;
  endpoint: string;
  model?: string;
  credentials: CredentialRecord[];
}

export interface BrokerSnapshot {
  channels: PersistedChannel[];
  prompts: Record<string, string>;
}
