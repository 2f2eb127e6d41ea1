/**
 * SQLite State Store
 *
 * Snapshot persistence on better-sqlite3. A save rewrites the three tables
 * inside one transaction, so the stored state is always a whole snapshot.
 * The database handle belongs to the caller (see db/index.ts).
 */

import type Database from "better-sqlite3";
import { isFormatKind } from "../registry/validation.js";
import type { BrokerSnapshot, CredentialRecord, PersistedChannel } from "../types.js";
import type { StateStore } from "./store.js";

interface ChannelRow {
  name: string;
  kind: string;
  enabled: number;
  streaming: number;
  endpoint: string;
  model: string | null;
}

interface CredentialRow {
  id: string;
  channel: string;
  value: string;
  threshold: number;
  failure_count: number;
}

interface PromptRow {
  name: string;
  content: string;
}

export class SqliteStateStore implements StateStore {
  constructor(private readonly db: Database.Database) {}

  load(): BrokerSnapshot | null {
    const channelRows = this.db
      .prepare<[], ChannelRow>("SELECT name, kind, enabled, streaming, endpoint, model FROM channels ORDER BY position")
      .all();
    const credentialRows = this.db
      .prepare<[], CredentialRow>("SELECT id, channel, value, threshold, failure_count FROM credentials ORDER BY channel, position")
      .all();
    const promptRows = this.db
      .prepare<[], PromptRow>("SELECT name, content FROM prompts ORDER BY name")
      .all();

    if (channelRows.length === 0 && promptRows.length === 0) return null;

    const credentialsByChannel = new Map<string, CredentialRecord[]>();
    for (const row of credentialRows) {
      const list = credentialsByChannel.get(row.channel) ?? [];
      list.push({ id: row.id, value: row.value, threshold: row.threshold, failureCount: row.failure_count });
      credentialsByChannel.set(row.channel, list);
    }

    const channels: PersistedChannel[] = channelRows.map(row => {
      if (!isFormatKind(row.kind)) {
        throw new Error(`Stored channel "${row.name}" has unknown kind "${row.kind}"`);
      }
      return {
        name: row.name,
        kind: row.kind,
        enabled: row.enabled === 1,
        streaming: row.streaming === 1,
        endpoint: row.endpoint,
        ...(row.model !== null ? { model: row.model } : {}),
        credentials: credentialsByChannel.get(row.name) ?? [],
      };
    });

    const prompts: Record<string, string> = {};
    for (const row of promptRows) prompts[row.name] = row.content;

    return { channels, prompts };
  }

  save(snapshot: BrokerSnapshot): void {
    const insertChannel = this.db.prepare(
      "INSERT INTO channels (name, position, kind, enabled, streaming, endpoint, model) VALUES (?, ?, ?, ?, ?, ?, ?)",
    );
    const insertCredential = this.db.prepare(
      "INSERT INTO credentials (id, channel, position, value, threshold, failure_count) VALUES (?, ?, ?, ?, ?, ?)",
    );
    const insertPrompt = this.db.prepare("INSERT INTO prompts (name, content) VALUES (?, ?)");

    const swap = this.db.transaction((next: BrokerSnapshot) => {
      this.db.exec("DELETE FROM credentials; DELETE FROM channels; DELETE FROM prompts;");

      next.channels.forEach((channel, position) => {
        insertChannel.run(
          channel.name,
          position,
          channel.kind,
          channel.enabled ? 1 : 0,
          channel.streaming ? 1 : 0,
          channel.endpoint,
          channel.model ?? null,
        );
        channel.credentials.forEach((cred, credPosition) => {
          insertCredential.run(cred.id, channel.name, credPosition, cred.value, cred.threshold, cred.failureCount);
        });
      });

      for (const [name, content] of Object.entries(next.prompts)) {
        insertPrompt.run(name, content);
      }
    });

    swap(snapshot);
  }
}
