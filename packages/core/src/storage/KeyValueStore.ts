/**
 * Durable storage for small JSON documents, addressed by key.
 * `read` resolves to undefined when nothing usable is stored under the key.
 */
export interface KeyValueStore {
  read(key: string): Promise<unknown>;
  write(key: string, value: unknown): Promise<void>;
  remove(key: string): Promise<void>;
}
