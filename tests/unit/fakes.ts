import { vi } from 'vitest';
import type { Clock } from '../../src/clock.js';
import type { MultiSearchResponse, SearchClient, SearchResponse } from '../../src/types.js';

export function makeFakeClient(
  searchResult: SearchResponse = { hits: { total: { value: 0 }, hits: [] } },
  msearchResult: MultiSearchResponse = { responses: [] },
) {
  const client = {
    search: vi.fn<SearchClient['search']>().mockResolvedValue(searchResult),
    msearch: vi.fn<SearchClient['msearch']>().mockResolvedValue(msearchResult),
  };
  return client;
}

export class FakeClock implements Clock {
  constructor(private current: number = Date.parse('2024-01-01T00:00:00Z')) {}

  now(): Date {
    return new Date(this.current);
  }

  advanceSeconds(seconds: number): void {
    this.current += seconds * 1000;
  }
}
