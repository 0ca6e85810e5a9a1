import pg from 'pg';
import { CacheStoreError } from '../errors.js';
import { AbstractCacheStore, type CacheStoreOptions } from './cache-store.js';
import { DEFAULT_CACHE_TABLE, applyCacheSchema, assertTableName } from './schema.js';
import type { CacheEntry } from './types.js';

export interface PostgresCacheStoreConfig extends CacheStoreOptions {
  pool: pg.Pool;
  /** Defaults to `search_cache`. */
  table?: string;
}

export type CacheRow = {
  value: unknown;          // pg auto-parses JSONB
  stored_at: string;       // pg returns BIGINT as string by default
  expires_at: string;
};

/**
 * Keeps cache entries in a PostgreSQL table. Expiry is checked on read;
 * purgeExpired() deletes what is left behind.
 */
export class PostgresCacheStore extends AbstractCacheStore {
  private readonly pool: pg.Pool;
  private readonly table: string;

  constructor(config: PostgresCacheStoreConfig) {
    super(config);
    this.pool = config.pool;
    this.table = assertTableName(config.table ?? DEFAULT_CACHE_TABLE);
  }

  async initializeSchema(): Promise<void> {
    const client = await this.pool.connect();
    try {
      await applyCacheSchema(client, this.table);
    } finally {
      client.release();
    }
  }

  protected override async readEntry(key: string): Promise<CacheEntry | null> {
    let result: pg.QueryResult<CacheRow>;
    try {
      result = await this.pool.query<CacheRow>(
        `SELECT value, stored_at, expires_at FROM ${this.table} WHERE key = $1 AND expires_at > $2`,
        [key, this.clock.now().getTime()],
      );
    } catch (err) {
      throw new CacheStoreError(`Failed to read cache entry: ${String(err)}`, err);
    }
    const row = result.rows[0];
    if (row === undefined) return null;
    return { value: row.value, storedAt: Number(row.stored_at), expiresAt: Number(row.expires_at) };
  }

  protected override async writeEntry(key: string, entry: CacheEntry): Promise<void> {
    const sql = `INSERT INTO ${this.table} (key, value, stored_at, expires_at)
      VALUES ($1, $2::jsonb, $3, $4)
      ON CONFLICT (key) DO UPDATE
        SET value = EXCLUDED.value, stored_at = EXCLUDED.stored_at, expires_at = EXCLUDED.expires_at`;
    try {
      // Serialize explicitly: pg would turn a top-level array into a PostgreSQL array literal.
      await this.pool.query(sql, [key, JSON.stringify(entry.value), entry.storedAt, entry.expiresAt]);
    } catch (err) {
      throw new CacheStoreError(`Failed to write cache entry: ${String(err)}`, err);
    }
  }

  override async forget(key: string): Promise<boolean> {
    try {
      const result = await this.pool.query(`DELETE FROM ${this.table} WHERE key = $1`, [key]);
      return (result.rowCount ?? 0) > 0;
    } catch (err) {
      throw new CacheStoreError(`Failed to forget cache entry: ${String(err)}`, err);
    }
  }

  /** Deletes expired rows and returns how many were removed. */
  async purgeExpired(): Promise<number> {
    try {
      const result = await this.pool.query(`DELETE FROM ${this.table} WHERE expires_at <= $1`, [
        this.clock.now().getTime(),
      ]);
      return result.rowCount ?? 0;
    } catch (err) {
      throw new CacheStoreError(`Failed to purge cache entries: ${String(err)}`, err);
    }
  }

  async close(): Promise<void> {
    await this.pool.end();
  }
}
