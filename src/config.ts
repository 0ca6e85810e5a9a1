import type { CacheTtl } from './cache/types.js';

export interface ConnectionConfig {
  hosts: string[];
  username?: string;
  password?: string;
  apiKey?: string;
  cloudId?: string;
  /** Set to false to accept self-signed certificates. */
  sslVerification?: boolean;
}

export interface CacheConfig {
  /** Seconds, or `[fresh, stale]` for stale-while-revalidate reads. */
  ttl?: CacheTtl;
  prefix?: string;
  /** Driver name that `'default'` resolves to. */
  store?: string;
}

export interface LoggingConfig {
  enabled?: boolean;
  logQueries?: boolean;
  logSlowQueries?: boolean;
  slowQueryThresholdMs?: number;
}

export interface SearchConfig {
  defaultConnection?: string;
  connections?: Record<string, ConnectionConfig>;
  cache?: CacheConfig;
  logging?: LoggingConfig;
}

export interface ResolvedSearchConfig {
  defaultConnection: string;
  connections: Record<string, ConnectionConfig>;
  cache: Required<CacheConfig>;
  logging: Required<LoggingConfig>;
}

export const DEFAULT_CACHE_TTL: CacheTtl = [300, 600];

export function resolveConfig(config: SearchConfig = {}): ResolvedSearchConfig {
  return {
    defaultConnection: config.defaultConnection ?? 'default',
    connections: config.connections ?? { default: { hosts: ['http://localhost:9200'] } },
    cache: {
      ttl: config.cache?.ttl ?? DEFAULT_CACHE_TTL,
      prefix: config.cache?.prefix ?? 'search:',
      store: config.cache?.store ?? 'memory',
    },
    logging: {
      enabled: config.logging?.enabled ?? false,
      logQueries: config.logging?.logQueries ?? false,
      logSlowQueries: config.logging?.logSlowQueries ?? true,
      slowQueryThresholdMs: config.logging?.slowQueryThresholdMs ?? 1000,
    },
  };
}

function parseBoolean(raw: string | undefined, fallback: boolean): boolean {
  if (raw === undefined || raw.trim() === '') return fallback;
  return ['1', 'true', 'yes', 'on'].includes(raw.trim().toLowerCase());
}

function parseNumber(name: string, raw: string): number {
  const n = Number(raw.trim());
  if (!Number.isFinite(n) || n < 0) {
    throw new Error(`${name} must be a non-negative number, got "${raw}"`);
  }
  return n;
}

/**
 * Parses `"300"` into a single TTL and `"300,600"` into a fresh/stale pair.
 */
export function parseCacheTtl(raw: string): CacheTtl {
  const parts = raw.split(',').map((p) => p.trim()).filter((p) => p !== '');
  const [first, second] = parts;
  if (parts.length === 1 && first !== undefined) {
    return parseNumber('SEARCH_CACHE_TTL', first);
  }
  if (parts.length === 2 && first !== undefined && second !== undefined) {
    return [parseNumber('SEARCH_CACHE_TTL', first), parseNumber('SEARCH_CACHE_TTL', second)];
  }
  throw new Error(`SEARCH_CACHE_TTL must be "<seconds>" or "<fresh>,<stale>", got "${raw}"`);
}

/**
 * Builds a SearchConfig for the default connection from environment
 * variables. Unset variables are left out so resolveConfig() defaults apply.
 */
export function loadConfigFromEnv(env: NodeJS.ProcessEnv = process.env): SearchConfig {
  const hostsRaw = env['ELASTICSEARCH_HOSTS'] ?? env['ELASTICSEARCH_HOST'] ?? 'localhost:9200';
  const connection: ConnectionConfig = {
    hosts: hostsRaw.split(',').map((h) => h.trim()).filter((h) => h !== ''),
    sslVerification: parseBoolean(env['ELASTICSEARCH_SSL_VERIFICATION'], true),
  };
  const username = env['ELASTICSEARCH_USERNAME'];
  const password = env['ELASTICSEARCH_PASSWORD'];
  const apiKey = env['ELASTICSEARCH_API_KEY'];
  const cloudId = env['ELASTICSEARCH_CLOUD_ID'];
  if (username) connection.username = username;
  if (password) connection.password = password;
  if (apiKey) connection.apiKey = apiKey;
  if (cloudId) connection.cloudId = cloudId;

  const defaultConnection = env['ELASTICSEARCH_DEFAULT_CONNECTION'] || 'default';

  const cache: CacheConfig = {};
  const ttl = env['SEARCH_CACHE_TTL'];
  if (ttl) cache.ttl = parseCacheTtl(ttl);
  const prefix = env['SEARCH_CACHE_PREFIX'];
  if (prefix !== undefined) cache.prefix = prefix;
  const store = env['SEARCH_CACHE_STORE'];
  if (store) cache.store = store;

  const logging: LoggingConfig = {
    enabled: parseBoolean(env['SEARCH_LOGGING_ENABLED'], false),
    logQueries: parseBoolean(env['SEARCH_LOG_QUERIES'], false),
    logSlowQueries: parseBoolean(env['SEARCH_LOG_SLOW_QUERIES'], true),
  };
  const threshold = env['SEARCH_SLOW_QUERY_THRESHOLD'];
  if (threshold) logging.slowQueryThresholdMs = parseNumber('SEARCH_SLOW_QUERY_THRESHOLD', threshold);

  return {
    defaultConnection,
    connections: { [defaultConnection]: connection },
    cache,
    logging,
  };
}
