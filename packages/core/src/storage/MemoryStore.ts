import type { KeyValueStore } from "./KeyValueStore.js";

/**
 * In-process store. Values are kept as JSON text, so callers get the same
 * copies-not-references behavior as from a file.
 */
export class MemoryStore implements KeyValueStore {
  private readonly entries = new Map<string, string>();

  async read(key: string): Promise<unknown> {
    const raw = this.entries.get(key);
    return raw === undefined ? undefined : JSON.parse(raw);
  }

  async write(key: string, value: unknown): Promise<void> {
    this.entries.set(key, JSON.stringify(value));
  }

  async remove(key: string): Promise<void> {
    this.entries.delete(key);
  }

  has(key: string): boolean {
    return this.entries.has(key);
  }
}
