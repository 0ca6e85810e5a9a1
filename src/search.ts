import type pg from 'pg';
import { CacheManager } from './cache/cache-manager.js';
import { MemoryCacheStore } from './cache/memory-store.js';
import { PostgresCacheStore } from './cache/postgres-store.js';
import type { CacheResolver } from './cache/types.js';
import type { Clock } from './clock.js';
import { resolveConfig, type ResolvedSearchConfig, type SearchConfig } from './config.js';
import { ConnectionManager } from './connection/manager.js';
import { consoleLogger, type Logger } from './logging.js';
import type { BuilderContext } from './query/context.js';
import { MultiQueryBuilder } from './query/multi-query-builder.js';
import { QueryBuilder } from './query/query-builder.js';
import type { IndexSelector } from './query/types.js';
import type { ConnectionResolver, SearchClient } from './types.js';

export interface CreateSearchOptions {
  config?: SearchConfig;
  /** Used as-is instead of the default connection. */
  client?: SearchClient;
  connections?: ConnectionResolver;
  caches?: CacheResolver;
  /** Registers a `postgres` cache store on this pool. */
  cachePool?: pg.Pool;
  logger?: Logger;
  clock?: Clock;
}

export interface Search {
  readonly config: ResolvedSearchConfig;
  readonly connections: ConnectionResolver;
  readonly caches: CacheResolver;
  query(): QueryBuilder;
  index(selector: IndexSelector): QueryBuilder;
  multi(): MultiQueryBuilder;
  connection(name: string): QueryBuilder;
}

function defaultCaches(options: CreateSearchOptions, config: ResolvedSearchConfig, logger: Logger): CacheManager {
  const storeOptions = {
    logger,
    ...(options.clock !== undefined ? { clock: options.clock } : {}),
  };
  const manager = new CacheManager({
    defaultStore: config.cache.store,
    stores: { memory: new MemoryCacheStore(storeOptions) },
  });
  if (options.cachePool !== undefined) {
    manager.register('postgres', new PostgresCacheStore({ ...storeOptions, pool: options.cachePool }));
  }
  return manager;
}

/**
 * Entry point: wires configuration, connections and cache stores, and hands
 * out builders that share them.
 *
 * @example
 * const search = createSearch({ config: loadConfigFromEnv() });
 * const result = await search.index('posts').match('title', 'typescript').size(10).execute();
 */
export function createSearch(options: CreateSearchOptions = {}): Search {
  const config = resolveConfig(options.config);
  const logger = options.logger ?? consoleLogger;
  const connections = options.connections ?? new ConnectionManager({ config, logger });
  const caches = options.caches ?? defaultCaches(options, config, logger);

  let client = options.client;
  const context = (): BuilderContext => {
    client ??= connections.resolve(config.defaultConnection);
    return { client, connections, caches, config, logger };
  };

  return {
    config,
    connections,
    caches,
    query: () => new QueryBuilder(context()),
    index: (selector) => new QueryBuilder(context()).index(selector),
    multi: () => new MultiQueryBuilder(context()),
    // Only the requested connection is resolved, never the default one.
    connection: (name) => new QueryBuilder({ client: connections.resolve(name), connections, caches, config, logger }),
  };
}
