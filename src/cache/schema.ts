import type pg from 'pg';

export const DEFAULT_CACHE_TABLE = 'search_cache';

const TABLE_NAME_PATTERN = /^[a-zA-Z_][a-zA-Z0-9_]{0,62}$/;

export function assertTableName(table: string): string {
  if (!TABLE_NAME_PATTERN.test(table)) {
    throw new Error(`Cache table name "${table}" must match ${TABLE_NAME_PATTERN.source}`);
  }
  return table;
}

export function ddlCreateTable(table: string): string {
  return `
CREATE TABLE IF NOT EXISTS ${table} (
  key         TEXT    PRIMARY KEY,
  value       JSONB   NOT NULL,
  stored_at   BIGINT  NOT NULL,
  expires_at  BIGINT  NOT NULL
)
`.trim();
}

export function ddlCreateExpiryIndex(table: string): string {
  return `
CREATE INDEX IF NOT EXISTS idx_${table}_expires_at
  ON ${table} (expires_at)
`.trim();
}

export async function applyCacheSchema(client: pg.ClientBase, table: string = DEFAULT_CACHE_TABLE): Promise<void> {
  const name = assertTableName(table);
  await client.query(ddlCreateTable(name));
  await client.query(ddlCreateExpiryIndex(name));
}
