/**
 * Key-value persistence used by the outbox, the offline message queue and
 * the table cache. Values are JSON strings.
 *
 * @see {@link database.ts} for the IndexedDB-backed implementation
 */

export interface KeyValueStore {
  get(key: string): Promise<string | null>;
  set(key: string, value: string): Promise<void>;
  delete(key: string): Promise<void>;
}

/**
 * Process-local store. State lives as long as the instance; used by
 * default and in tests.
 */
export class MemoryKeyValueStore implements KeyValueStore {
  private readonly entries = new Map<string, string>();

  async get(key: string): Promise<string | null> {
    return this.entries.get(key) ?? null;
  }

  async set(key: string, value: string): Promise<void> {
    this.entries.set(key, value);
  }

  async delete(key: string): Promise<void> {
    this.entries.delete(key);
  }

  /** Keys currently stored, in insertion order. */
  keys(): string[] {
    return [...this.entries.keys()];
  }
}
