/**
 * Prompt Book
 *
 * Named prompt templates kept next to the channels. The engine never reads
 * them; they are stored and handed back as given.
 */

import { ValidationError } from "./errors.js";

export type PromptListener = () => void;

export class PromptBook {
  private prompts = new Map<string, string>();
  private listeners = new Set<PromptListener>();

  add(name: string, content: string): void {
    const key = name.trim();
    if (!key) throw new ValidationError("Prompt name is required");
    if (!content.trim()) throw new ValidationError("Prompt content is required");
    if (this.prompts.has(key)) throw new ValidationError(`Prompt "${key}" already exists`);

    this.prompts.set(key, content);
    this.emit();
  }

  /** Returns false when no prompt had that name */
  remove(name: string): boolean {
    const removed = this.prompts.delete(name.trim());
    if (removed) this.emit();
    return removed;
  }

  get(name: string): string | undefined {
    return this.prompts.get(name.trim());
  }

  list(): Record<string, string> {
    return Object.fromEntries(this.prompts);
  }

  /** Replace every prompt, e.g. from a persisted snapshot. Does not notify. */
  restore(prompts: Record<string, string>): void {
    this.prompts = new Map(Object.entries(prompts));
  }

  onChange(listener: PromptListener): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  private emit(): void {
    for (const listener of this.listeners) listener();
  }
}
