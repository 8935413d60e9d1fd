/**
 * Memory Store
 * In-process IStore for tests and throwaway runs
 */

import type { IStore } from "./types.js";

export class MemoryStore implements IStore {
  // Serialized so callers never share references with the store
  private readonly documents = new Map<string, string>();

  async read(key: string): Promise<unknown> {
    const raw = this.documents.get(key);
    if (raw === undefined) {
      return null;
    }
    const parsed: unknown = JSON.parse(raw);
    return parsed;
  }

  async write(key: string, data: unknown): Promise<void> {
    this.documents.set(key, JSON.stringify(data));
  }

  async exists(key: string): Promise<boolean> {
    return this.documents.has(key);
  }

  async delete(key: string): Promise<boolean> {
    return this.documents.delete(key);
  }

  async list(prefix = ""): Promise<string[]> {
    return [...this.documents.keys()].filter((key) => key.startsWith(prefix)).sort();
  }
}
