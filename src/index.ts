export { createSearch } from './search.js';
export type { Search, CreateSearchOptions } from './search.js';
export { QueryBuilder } from './query/query-builder.js';
export type { BoolCallback } from './query/query-builder.js';
export { MultiQueryBuilder } from './query/multi-query-builder.js';
export { BoolQueryBuilder } from './query/bool-builder.js';
export type { QueryCallback } from './query/bool-builder.js';
export { RangeQueryBuilder } from './query/range-builder.js';
export type { RangeHost, RangeValue, RangeComparator } from './query/range-builder.js';
export { AggregationBuilder } from './query/aggregation-builder.js';
export type { AggregationCallback, RangeBucket } from './query/aggregation-builder.js';
export type { BuilderContext, BuilderContextInput } from './query/context.js';
export type {
  AggregationSpec,
  HighlightSpec,
  IndexSelector,
  JsonObject,
  JsonValue,
  MultiSearchHeader,
  MultiSearchLine,
  QueryClause,
  SearchBody,
  SortDirection,
  SortSpec,
  SourceSpec,
} from './query/types.js';
export type {
  SearchClient,
  SearchParams,
  SearchResponse,
  MultiSearchParams,
  MultiSearchResponse,
  NamedMultiSearchResponse,
  ConnectionResolver,
  Executable,
} from './types.js';
export { CacheableBuilder } from './cache/cacheable.js';
export { CachedExecutor } from './cache/cached-executor.js';
export type { CachePolicy } from './cache/cached-executor.js';
export { AbstractCacheStore } from './cache/cache-store.js';
export type { CacheStoreOptions } from './cache/cache-store.js';
export { MemoryCacheStore } from './cache/memory-store.js';
export { PostgresCacheStore } from './cache/postgres-store.js';
export type { PostgresCacheStoreConfig } from './cache/postgres-store.js';
export { applyCacheSchema, DEFAULT_CACHE_TABLE } from './cache/schema.js';
export { CacheManager } from './cache/cache-manager.js';
export type { CacheManagerConfig } from './cache/cache-manager.js';
export type { CacheStore, CacheResolver, CacheTtl, CacheDescriptor, CacheEntry } from './cache/types.js';
export { ConnectionManager } from './connection/manager.js';
export type { ClientFactory, ConnectionManagerConfig } from './connection/manager.js';
export { ElasticsearchSearchClient } from './connection/elasticsearch-client.js';
export type { ManagedSearchClient } from './connection/elasticsearch-client.js';
export { resolveConfig, loadConfigFromEnv, parseCacheTtl, DEFAULT_CACHE_TTL } from './config.js';
export type {
  SearchConfig,
  ResolvedSearchConfig,
  ConnectionConfig,
  CacheConfig,
  LoggingConfig,
} from './config.js';
export { consoleLogger, silentLogger } from './logging.js';
export type { Logger } from './logging.js';
export type { Clock } from './clock.js';
export { systemClock } from './clock.js';
export { paginate, pageOffset, totalHits } from './pagination/paginator.js';
export type { Page } from './pagination/paginator.js';
export { ConfigurationError, SearchBackendError, CacheStoreError } from './errors.js';
