import type { MultiSearchLine, SearchBody } from './query/types.js';

export interface SearchParams {
  index?: string | string[];
  body?: SearchBody;
}

export interface MultiSearchParams {
  body: MultiSearchLine[];
}

/** Raw engine response; passed through unmodified. */
export type SearchResponse = Record<string, unknown>;

export interface MultiSearchResponse {
  responses: unknown[];
  [key: string]: unknown;
}

/**
 * Multi-search result with `responses` keyed by entry name. A batch with no
 * entries is never sent and yields `{ responses: [] }`.
 */
export interface NamedMultiSearchResponse {
  responses: Record<string, unknown> | unknown[];
  [key: string]: unknown;
}

export interface SearchClient {
  search(params: SearchParams): Promise<SearchResponse>;
  msearch(params: MultiSearchParams): Promise<MultiSearchResponse>;
}

export interface ConnectionResolver {
  resolve(name: string): SearchClient;
}

/** Anything that can render itself as a request body and run it. */
export interface Executable<TBody, TResult> {
  build(): TBody;
  execute(): Promise<TResult>;
  indexes(): string[];
}
