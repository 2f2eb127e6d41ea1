/**
 * Credential masking and classification.
 */

import type { CredentialClass } from "../types.js";

/** "AIzaSyAb...wxyz"; short values keep only their first two characters */
export function maskSecret(value: string): string {
  if (value.length <= 12) return `${value.slice(0, 2)}...`;
  return `${value.slice(0, 8)}...${value.slice(-4)}`;
}

export function classifyCredential(value: string, thirdPartyPrefix = "sk-"): CredentialClass {
  return value.trim().startsWith(thirdPartyPrefix) ? "third-party" : "first-party";
}
