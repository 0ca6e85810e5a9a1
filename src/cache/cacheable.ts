import { ConfigurationError } from '../errors.js';
import { hashBody } from '../query/canonical.js';
import type { BuilderContext } from '../query/context.js';
import type { Executable, SearchClient } from '../types.js';
import { CachedExecutor } from './cached-executor.js';
import type { CacheDescriptor, CacheTtl } from './types.js';

/**
 * Shared base of the query and multi-query builders: holds the execution
 * context, the per-builder cache descriptor and the caching `execute()`.
 *
 * @example
 * const results = await search.index('posts')
 *   .match('title', 'typescript')
 *   .cache()
 *   .setCacheTtl([300, 600])
 *   .execute();
 */
export abstract class CacheableBuilder<TBody, TResult> implements Executable<TBody, TResult> {
  protected cacheDescriptor: CacheDescriptor = { enabled: false, clear: false };

  protected constructor(protected readonly context: BuilderContext) {}

  abstract build(): TBody;

  /** Sorted, de-duplicated index names this request touches. */
  abstract indexes(): string[];

  /** Runs the request against the bound client, bypassing the cache. */
  protected abstract run(): Promise<TResult>;

  protected abstract acceptsCached(value: unknown): value is TResult;

  /** Alias for build(), for inspection. */
  toArray(): TBody {
    return this.build();
  }

  cache(): this {
    return this.setCacheEnabled(true);
  }

  setCacheEnabled(enabled = true): this {
    this.cacheDescriptor.enabled = enabled;
    return this;
  }

  isCacheEnabled(): boolean {
    return this.cacheDescriptor.enabled;
  }

  /** Forget the cached entry before the next read. */
  clearCache(): this {
    return this.setCacheClear(true);
  }

  setCacheClear(clear = true): this {
    this.cacheDescriptor.clear = clear;
    return this;
  }

  getCacheClear(): boolean {
    return this.cacheDescriptor.clear;
  }

  /**
   * A single value caches for that many seconds. A `[fresh, stale]` pair
   * serves the entry as-is for `fresh` seconds, then serves it stale while
   * refreshing in the background until `stale` seconds have passed.
   */
  setCacheTtl(ttl: CacheTtl): this {
    const values = typeof ttl === 'number' ? [ttl] : [ttl[0], ttl[1]];
    if (values.some((v) => !Number.isFinite(v) || v < 0)) {
      throw new RangeError(`Cache TTL must be non-negative seconds, got ${JSON.stringify(ttl)}`);
    }
    this.cacheDescriptor.ttl = typeof ttl === 'number' ? ttl : [ttl[0], ttl[1]];
    return this;
  }

  getCacheTtl(): CacheTtl {
    return this.cacheDescriptor.ttl ?? this.context.config.cache.ttl;
  }

  setCachePrefix(prefix: string): this {
    this.cacheDescriptor.prefix = prefix;
    return this;
  }

  getCachePrefix(): string {
    return this.cacheDescriptor.prefix ?? this.context.config.cache.prefix;
  }

  setCacheDriver(driver: string): this {
    this.cacheDescriptor.driver = driver;
    return this;
  }

  getCacheDriver(): string {
    return this.cacheDescriptor.driver ?? 'default';
  }

  /**
   * prefix + index names joined by ':' + ':' + SHA-1 of the key-sorted body.
   * Clause order is part of the body, so the same calls in a different
   * order may give a different key.
   */
  cacheKey(): string {
    const hash = hashBody(this.build());
    const indexes = this.indexes();
    const indexSegment = indexes.length > 0 ? `${indexes.join(':')}:` : '';
    return `${this.getCachePrefix()}${indexSegment}${hash}`;
  }

  async execute(): Promise<TResult> {
    this.requireClient();
    if (!this.cacheDescriptor.enabled) {
      return this.run();
    }
    return this.cached().execute();
  }

  /** The cache decorator around this builder, with the policy resolved now. */
  cached(): CachedExecutor<TBody, TResult> {
    const caches = this.context.caches;
    if (caches === undefined) {
      throw new ConfigurationError('Cache resolver not available. Cannot cache query results.');
    }
    const target: Executable<TBody, TResult> = {
      build: () => this.build(),
      indexes: () => this.indexes(),
      execute: () => this.run(),
    };
    return new CachedExecutor(
      target,
      {
        key: this.cacheKey(),
        clear: this.cacheDescriptor.clear,
        ttl: this.getCacheTtl(),
        store: caches.store(this.getCacheDriver()),
      },
      (value): value is TResult => this.acceptsCached(value),
    );
  }

  protected requireClient(): SearchClient {
    const client = this.context.client;
    if (client === undefined) {
      throw new ConfigurationError('Search client not set. Cannot execute query.');
    }
    return client;
  }

  protected contextFor(connection: string): BuilderContext {
    const resolver = this.context.connections;
    if (resolver === undefined) {
      throw new ConfigurationError('Connection resolver not available. Cannot switch connections.');
    }
    return { ...this.context, client: resolver.resolve(connection) };
  }

  protected copyCacheDescriptorTo(target: CacheableBuilder<TBody, TResult>): void {
    target.cacheDescriptor = { ...this.cacheDescriptor };
  }

  /** Times a backend call and applies the query / slow-query logging settings. */
  protected async timed<T>(operation: 'search' | 'msearch', body: unknown, call: () => Promise<T>): Promise<T> {
    const { logging } = this.context.config;
    if (!logging.enabled) {
      return call();
    }
    const indexes = this.indexes();
    if (logging.logQueries) {
      this.context.logger.debug({ operation, indexes, body }, 'executing search request');
    }
    const started = performance.now();
    const result = await call();
    const tookMs = Math.round(performance.now() - started);
    if (logging.logSlowQueries && tookMs >= logging.slowQueryThresholdMs) {
      this.context.logger.warn(
        { operation, indexes, tookMs, thresholdMs: logging.slowQueryThresholdMs },
        'slow search request',
      );
    }
    return result;
  }
}
