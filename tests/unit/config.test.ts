import { describe, it, expect } from 'vitest';
import { DEFAULT_CACHE_TTL, loadConfigFromEnv, parseCacheTtl, resolveConfig } from '../../src/config.js';

describe('resolveConfig()', () => {
  it('fills every default', () => {
    expect(resolveConfig()).toEqual({
      defaultConnection: 'default',
      connections: { default: { hosts: ['http://localhost:9200'] } },
      cache: { ttl: [300, 600], prefix: 'search:', store: 'memory' },
      logging: { enabled: false, logQueries: false, logSlowQueries: true, slowQueryThresholdMs: 1000 },
    });
    expect(DEFAULT_CACHE_TTL).toEqual([300, 600]);
  });

  it('keeps given values and defaults the rest', () => {
    const config = resolveConfig({ cache: { ttl: 60 }, logging: { enabled: true } });
    expect(config.cache).toEqual({ ttl: 60, prefix: 'search:', store: 'memory' });
    expect(config.logging.enabled).toBe(true);
    expect(config.logging.slowQueryThresholdMs).toBe(1000);
  });

  it('keeps an empty prefix', () => {
    expect(resolveConfig({ cache: { prefix: '' } }).cache.prefix).toBe('');
  });
});

describe('parseCacheTtl()', () => {
  it('parses a single number of seconds', () => {
    expect(parseCacheTtl('300')).toBe(300);
  });

  it('parses a fresh,stale pair', () => {
    expect(parseCacheTtl('300, 600')).toEqual([300, 600]);
  });

  it('rejects other shapes', () => {
    expect(() => parseCacheTtl('1,2,3')).toThrow('SEARCH_CACHE_TTL must be "<seconds>" or "<fresh>,<stale>", got "1,2,3"');
    expect(() => parseCacheTtl('')).toThrow(/SEARCH_CACHE_TTL must be/);
  });

  it('rejects negative or non-numeric values', () => {
    expect(() => parseCacheTtl('-1')).toThrow('SEARCH_CACHE_TTL must be a non-negative number, got "-1"');
    expect(() => parseCacheTtl('soon')).toThrow(/non-negative number/);
  });
});

describe('loadConfigFromEnv()', () => {
  it('returns the default connection on localhost with no variables set', () => {
    expect(loadConfigFromEnv({})).toEqual({
      defaultConnection: 'default',
      connections: { default: { hosts: ['localhost:9200'], sslVerification: true } },
      cache: {},
      logging: { enabled: false, logQueries: false, logSlowQueries: true },
    });
  });

  it('reads connection variables', () => {
    const config = loadConfigFromEnv({
      ELASTICSEARCH_HOSTS: 'es1:9200, es2:9200',
      ELASTICSEARCH_USERNAME: 'elastic',
      ELASTICSEARCH_PASSWORD: 'test-secret',
      ELASTICSEARCH_API_KEY: 'test-key',
      ELASTICSEARCH_CLOUD_ID: 'test-cloud',
      ELASTICSEARCH_SSL_VERIFICATION: 'false',
      ELASTICSEARCH_DEFAULT_CONNECTION: 'main',
    });
    expect(config.defaultConnection).toBe('main');
    expect(config.connections).toEqual({
      main: {
        hosts: ['es1:9200', 'es2:9200'],
        sslVerification: false,
        username: 'elastic',
        password: 'test-secret',
        apiKey: 'test-key',
        cloudId: 'test-cloud',
      },
    });
  });

  it('falls back to ELASTICSEARCH_HOST', () => {
    expect(loadConfigFromEnv({ ELASTICSEARCH_HOST: 'search:9200' }).connections?.['default']?.hosts).toEqual([
      'search:9200',
    ]);
  });

  it('reads cache and logging variables', () => {
    const config = loadConfigFromEnv({
      SEARCH_CACHE_TTL: '60,120',
      SEARCH_CACHE_PREFIX: 'app:',
      SEARCH_CACHE_STORE: 'postgres',
      SEARCH_LOGGING_ENABLED: 'true',
      SEARCH_LOG_QUERIES: '1',
      SEARCH_LOG_SLOW_QUERIES: 'off',
      SEARCH_SLOW_QUERY_THRESHOLD: '250',
    });
    expect(config.cache).toEqual({ ttl: [60, 120], prefix: 'app:', store: 'postgres' });
    expect(config.logging).toEqual({
      enabled: true,
      logQueries: true,
      logSlowQueries: false,
      slowQueryThresholdMs: 250,
    });
  });

  it('resolves to a complete configuration', () => {
    const config = resolveConfig(loadConfigFromEnv({ SEARCH_CACHE_TTL: '90' }));
    expect(config.cache.ttl).toBe(90);
    expect(config.connections['default']).toEqual({ hosts: ['localhost:9200'], sslVerification: true });
  });
});
