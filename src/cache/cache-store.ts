export type CacheBackend = 'file' | 'redis' | 'memory';

/**
 * Raw storage for serialized cache entries, addressed by fingerprint.
 *
 * Stores only move strings around: validation, TTL and error swallowing
 * belong to the MetricCache. Any method may throw.
 */
export interface CacheStore {
  readonly backend: CacheBackend;

  /** Serialized entry, or null when absent */
  read(fingerprint: string): Promise<string | null>;

  /** Create or overwrite */
  write(fingerprint: string, content: string): Promise<void>;

  /** True when something was deleted */
  remove(fingerprint: string): Promise<boolean>;

  /** Fingerprints of every stored entry */
  list(): Promise<string[]>;

  describe(): string;
}

/**
 * Map-backed store, for tests and for running without a cache directory
 */
export class MemoryCacheStore implements CacheStore {
  readonly backend = 'memory';
  readonly entries = new Map<string, string>();

  async read(fingerprint: string): Promise<string | null> {
    return this.entries.get(fingerprint) ?? null;
  }

  async write(fingerprint: string, content: string): Promise<void> {
    this.entries.set(fingerprint, content);
  }

  async remove(fingerprint: string): Promise<boolean> {
    return this.entries.delete(fingerprint);
  }

  async list(): Promise<string[]> {
    return [...this.entries.keys()];
  }

  describe(): string {
    return `memory (${this.entries.size} entries)`;
  }
}
