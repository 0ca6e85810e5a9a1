export type JsonPrimitive = string | number | boolean | null;
export type JsonValue = JsonPrimitive | JsonValue[] | JsonObject;
export type JsonObject = { [key: string]: JsonValue };

/**
 * One leaf or compound query expression, e.g. `{ match: { title: { query: 'x' } } }`.
 * Builders never mutate a clause after it has been emitted.
 */
export type QueryClause = JsonObject;

export type IndexSelector = string | readonly string[];

export type SortDirection = 'asc' | 'desc';
export type SortSpec = JsonObject;

/**
 * `_source` filtering: a field list, one field, `false` to drop the source,
 * or an include/exclude mapping.
 */
export type SourceSpec =
  | boolean
  | string
  | string[]
  | { includes?: string[]; excludes?: string[] };

export type HighlightSpec = JsonObject;

/** One definition key (`terms`, `avg`, ...) plus optional nested `aggs`. */
export type AggregationSpec = { [key: string]: JsonValue };

export type SearchBody = {
  query?: QueryClause;
  size?: number;
  from?: number;
  sort?: SortSpec[];
  _source?: SourceSpec;
  highlight?: HighlightSpec;
  aggs?: Record<string, AggregationSpec>;
};

export type MultiSearchHeader = { index?: string };
export type MultiSearchLine = MultiSearchHeader | SearchBody;

export function isJsonObject(value: unknown): value is JsonObject {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}
