import { ConfigurationError } from '../errors.js';
import type { CacheResolver, CacheStore } from './types.js';

export interface CacheManagerConfig {
  /** Driver name that `'default'` resolves to. */
  defaultStore: string;
  stores: Record<string, CacheStore>;
}

/** Resolves a builder's cache driver name to a registered store. */
export class CacheManager implements CacheResolver {
  private readonly stores: Map<string, CacheStore>;
  private readonly defaultStore: string;

  constructor(config: CacheManagerConfig) {
    this.stores = new Map(Object.entries(config.stores));
    this.defaultStore = config.defaultStore;
  }

  store(driver: string = 'default'): CacheStore {
    const name = driver === 'default' ? this.defaultStore : driver;
    const store = this.stores.get(name);
    if (store === undefined) {
      throw new ConfigurationError(`Cache store [${name}] not configured.`);
    }
    return store;
  }

  register(name: string, store: CacheStore): this {
    this.stores.set(name, store);
    return this;
  }

  storeNames(): string[] {
    return [...this.stores.keys()];
  }
}
