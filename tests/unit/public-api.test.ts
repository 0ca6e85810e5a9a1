import { describe, it, expect } from 'vitest';

describe('Public API surface', () => {
  it('exports createSearch', async () => {
    const { createSearch } = await import('../../src/index.js');
    expect(typeof createSearch).toBe('function');
  });

  it('exports the builders as classes', async () => {
    const api = await import('../../src/index.js');
    for (const name of [
      'QueryBuilder',
      'MultiQueryBuilder',
      'BoolQueryBuilder',
      'RangeQueryBuilder',
      'AggregationBuilder',
    ] as const) {
      expect(typeof api[name]).toBe('function');
    }
  });

  it('exports the cache stores and resolver', async () => {
    const { MemoryCacheStore, PostgresCacheStore, CacheManager, CachedExecutor } = await import('../../src/index.js');
    expect(typeof MemoryCacheStore).toBe('function');
    expect(typeof PostgresCacheStore).toBe('function');
    expect(typeof CacheManager).toBe('function');
    expect(typeof CachedExecutor).toBe('function');
  });

  it('exports error classes usable with instanceof', async () => {
    const { ConfigurationError, SearchBackendError, CacheStoreError } = await import('../../src/index.js');
    expect(new ConfigurationError('x')).toBeInstanceOf(ConfigurationError);
    expect(new SearchBackendError('x')).toBeInstanceOf(SearchBackendError);
    expect(new CacheStoreError('x')).toBeInstanceOf(CacheStoreError);
  });

  it('does NOT export canonical hashing helpers (internal)', async () => {
    const api = await import('../../src/index.js');
    expect((api as Record<string, unknown>)['hashBody']).toBeUndefined();
    expect((api as Record<string, unknown>)['sortKeysDeep']).toBeUndefined();
  });

  it('does NOT export createContext (internal)', async () => {
    const api = await import('../../src/index.js');
    expect((api as Record<string, unknown>)['createContext']).toBeUndefined();
  });
});
