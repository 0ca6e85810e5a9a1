import type { Executable } from '../types.js';
import type { CacheStore, CacheTtl } from './types.js';

export interface CachePolicy {
  key: string;
  /** Forget the entry before reading it. */
  clear: boolean;
  ttl: CacheTtl;
  store: CacheStore;
}

/**
 * Decorates an Executable with the cache policy. Only `execute` is
 * intercepted; `build` and `indexes` go straight to the target.
 */
export class CachedExecutor<TBody, TResult> implements Executable<TBody, TResult> {
  constructor(
    private readonly target: Executable<TBody, TResult>,
    private readonly policy: CachePolicy,
    private readonly accepts: (value: unknown) => value is TResult,
  ) {}

  build(): TBody {
    return this.target.build();
  }

  indexes(): string[] {
    return this.target.indexes();
  }

  async execute(): Promise<TResult> {
    const { key, store } = this.policy;
    if (this.policy.clear) {
      await store.forget(key);
    }

    const cached = await this.read();
    if (this.accepts(cached)) {
      return cached;
    }

    // The entry does not hold a response (written by something else): replace it.
    await store.forget(key);
    const result = await this.target.execute();
    await store.put(key, result, lifetime(this.policy.ttl));
    return result;
  }

  private read(): Promise<unknown> {
    const { key, store, ttl } = this.policy;
    const compute = (): Promise<TResult> => this.target.execute();
    if (typeof ttl === 'number') {
      return store.remember(key, ttl, compute);
    }
    return store.flexible(key, [ttl[0], ttl[1]], compute);
  }
}

export function lifetime(ttl: CacheTtl): number {
  return typeof ttl === 'number' ? ttl : ttl[1];
}
