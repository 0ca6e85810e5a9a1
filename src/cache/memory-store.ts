import type { CacheEntry } from './types.js';
import { AbstractCacheStore, type CacheStoreOptions } from './cache-store.js';

/** Process-local store. Expired entries are dropped when read. */
export class MemoryCacheStore extends AbstractCacheStore {
  private readonly entries = new Map<string, CacheEntry>();

  constructor(options: CacheStoreOptions = {}) {
    super(options);
  }

  protected override async readEntry(key: string): Promise<CacheEntry | null> {
    const entry = this.entries.get(key);
    if (entry === undefined) return null;
    if (entry.expiresAt <= this.clock.now().getTime()) {
      this.entries.delete(key);
      return null;
    }
    return { ...entry, value: structuredClone(entry.value) };
  }

  protected override async writeEntry(key: string, entry: CacheEntry): Promise<void> {
    this.entries.set(key, { ...entry, value: structuredClone(entry.value) });
  }

  override async forget(key: string): Promise<boolean> {
    return this.entries.delete(key);
  }

  async flush(): Promise<void> {
    this.entries.clear();
  }

  get size(): number {
    return this.entries.size;
  }
}
