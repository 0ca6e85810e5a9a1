/** Seconds, or a `[fresh, stale]` pair where `stale` is the total lifetime. */
export type CacheTtl = number | readonly [fresh: number, stale: number];

export type ComputeFn = () => Promise<unknown>;

export interface CacheEntry {
  value: unknown;
  /** Epoch milliseconds when the value was written. */
  storedAt: number;
  /** Epoch milliseconds after which the entry is gone. */
  expiresAt: number;
}

export interface CacheStore {
  get(key: string): Promise<unknown>;
  put(key: string, value: unknown, ttlSeconds: number): Promise<void>;
  forget(key: string): Promise<boolean>;
  /** Returns the cached value, or computes and stores it for `ttlSeconds`. */
  remember(key: string, ttlSeconds: number, compute: ComputeFn): Promise<unknown>;
  /**
   * Stale-while-revalidate read: fresh hits return directly, stale hits
   * return the old value and refresh it in the background, misses compute.
   */
  flexible(key: string, ttl: readonly [number, number], compute: ComputeFn): Promise<unknown>;
}

export interface CacheResolver {
  store(driver?: string): CacheStore;
}

/** Per-builder cache settings; unset fields inherit the injected config. */
export interface CacheDescriptor {
  enabled: boolean;
  clear: boolean;
  ttl?: CacheTtl;
  prefix?: string;
  driver?: string;
}
