import type { KeyValueStore } from './types.js';

/**
 * In-memory store.
 *
 * Used for local runs without Redis (`STORE=memory`) and by the test
 * suite. Contents are lost on exit.
 */
export class MemoryStore implements KeyValueStore {
  private readonly entries: Map<string, string> = new Map();

  /** Number of `get` calls served, so tests can tell cache hits from store reads. */
  reads = 0;

  constructor(initial?: Record<string, string>) {
    for (const [key, value] of Object.entries(initial ?? {})) {
      this.entries.set(key, value);
    }
  }

  async get(key: string): Promise<string | null> {
    this.reads++;
    return this.entries.get(key) ?? null;
  }

  async set(key: string, value: string): Promise<void> {
    this.entries.set(key, value);
  }

  async keys(prefix: string): Promise<string[]> {
    return [...this.entries.keys()].filter((k) => k.startsWith(prefix));
  }

  /** For testing: raw access that bypasses the read counter. */
  peek(key: string): string | undefined {
    return this.entries.get(key);
  }
}
