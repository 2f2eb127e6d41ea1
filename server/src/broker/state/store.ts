/**
 * State Store Contract
 *
 * The broker persists one snapshot: every channel with its ordered
 * credentials, plus the named prompts. `save` replaces the whole snapshot
 * at once; a reader never observes half of a save.
 */

import type { BrokerSnapshot } from "../types.js";

export interface StateStore {
  /** Last saved snapshot, or null when nothing was ever saved */
  load(): BrokerSnapshot | null;
  save(snapshot: BrokerSnapshot): void;
}

/** In-process store for tests and embedding */
export class MemoryStateStore implements StateStore {
  private snapshot: BrokerSnapshot | null;
  saves = 0;

  constructor(initial: BrokerSnapshot | null = null) {
    this.snapshot = initial ? structuredClone(initial) : null;
  }

  load(): BrokerSnapshot | null {
    return this.snapshot ? structuredClone(this.snapshot) : null;
  }

  save(snapshot: BrokerSnapshot): void {
    this.snapshot = structuredClone(snapshot);
    this.saves++;
  }
}
