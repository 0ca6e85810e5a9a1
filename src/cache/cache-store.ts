import type { Clock } from '../clock.js';
import { systemClock } from '../clock.js';
import { consoleLogger, type Logger } from '../logging.js';
import type { CacheEntry, CacheStore, ComputeFn } from './types.js';

export interface CacheStoreOptions {
  clock?: Clock;
  logger?: Logger;
}

/**
 * remember() and flexible() on top of three storage primitives. Concrete
 * stores only decide where entries live.
 */
export abstract class AbstractCacheStore implements CacheStore {
  protected readonly clock: Clock;
  protected readonly logger: Logger;
  private readonly refreshing = new Map<string, Promise<void>>();

  protected constructor(options: CacheStoreOptions = {}) {
    this.clock = options.clock ?? systemClock;
    this.logger = options.logger ?? consoleLogger;
  }

  /** Returns the entry, or null when it is missing or expired. */
  protected abstract readEntry(key: string): Promise<CacheEntry | null>;

  protected abstract writeEntry(key: string, entry: CacheEntry): Promise<void>;

  abstract forget(key: string): Promise<boolean>;

  async get(key: string): Promise<unknown> {
    const entry = await this.readEntry(key);
    return entry === null ? undefined : entry.value;
  }

  async put(key: string, value: unknown, ttlSeconds: number): Promise<void> {
    const storedAt = this.clock.now().getTime();
    await this.writeEntry(key, { value, storedAt, expiresAt: storedAt + ttlSeconds * 1000 });
  }

  async remember(key: string, ttlSeconds: number, compute: ComputeFn): Promise<unknown> {
    const entry = await this.readEntry(key);
    if (entry !== null) {
      return entry.value;
    }
    const value = await compute();
    await this.put(key, value, ttlSeconds);
    return value;
  }

  /**
   * `ttl[0]` seconds fresh, then stale until `ttl[1]` seconds after the
   * write. A stale read returns the old value and starts at most one
   * background refresh per key.
   */
  async flexible(key: string, ttl: readonly [number, number], compute: ComputeFn): Promise<unknown> {
    const [fresh, total] = ttl;
    const entry = await this.readEntry(key);
    if (entry !== null) {
      const age = this.clock.now().getTime() - entry.storedAt;
      if (age >= fresh * 1000) {
        this.refreshInBackground(key, total, compute);
      }
      return entry.value;
    }
    const value = await compute();
    await this.put(key, value, total);
    return value;
  }

  /** Resolves once every background refresh started so far has finished. */
  async settle(): Promise<void> {
    await Promise.all([...this.refreshing.values()]);
  }

  private refreshInBackground(key: string, ttlSeconds: number, compute: ComputeFn): void {
    if (this.refreshing.has(key)) {
      return;
    }
    const refresh = compute()
      .then((value) => this.put(key, value, ttlSeconds))
      .catch((err: unknown) => {
        this.logger.error({ key, err }, 'background cache refresh failed');
      })
      .finally(() => {
        this.refreshing.delete(key);
      });
    this.refreshing.set(key, refresh);
  }
}
