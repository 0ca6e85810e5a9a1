import { vi } from 'vitest';
import { createSearch, silentLogger, type SearchClient } from 'fluent-search-builder';
import { buildServer } from '../../src/api/server.js';

export function makeFakeClient() {
  return {
    search: vi.fn<SearchClient['search']>().mockResolvedValue({ hits: { total: { value: 0 }, hits: [] } }),
    msearch: vi.fn<SearchClient['msearch']>().mockResolvedValue({ responses: [] }),
  };
}

export function makeApp(client: SearchClient = makeFakeClient()) {
  const search = createSearch({ client, logger: silentLogger });
  return buildServer(search, { logger: false });
}
