import { CacheableBuilder } from '../cache/cacheable.js';
import type { SearchParams, SearchResponse } from '../types.js';
import { AggregationBuilder, type AggregationCallback } from './aggregation-builder.js';
import { BoolQueryBuilder, type QueryCallback } from './bool-builder.js';
import { uniqueIndexes } from './canonical.js';
import { createContext, type BuilderContextInput } from './context.js';
import { RangeQueryBuilder } from './range-builder.js';
import {
  isJsonObject,
  type AggregationSpec,
  type HighlightSpec,
  type IndexSelector,
  type JsonObject,
  type JsonValue,
  type QueryClause,
  type SearchBody,
  type SortDirection,
  type SortSpec,
  type SourceSpec,
} from './types.js';

export type BoolCallback = (bool: BoolQueryBuilder) => void;

function assertNonNegativeInteger(name: string, value: number): void {
  if (!Number.isInteger(value) || value < 0) {
    throw new RangeError(`${name} must be a non-negative integer, got ${value}`);
  }
}

/**
 * Fluent, mutable builder for a single search request. Every chainable
 * method mutates this builder and returns it; `build()` assembles the body.
 *
 * @example
 * const body = new QueryBuilder()
 *   .index('posts')
 *   .match('title', 'typescript')
 *   .filter((q) => q.term('status', 'published'))
 *   .sort('created_at', 'desc')
 *   .size(10)
 *   .build();
 */
export class QueryBuilder extends CacheableBuilder<SearchBody, SearchResponse> {
  private clauses: QueryClause[] = [];
  private filters: QueryClause[] = [];
  private aggregations = new Map<string, AggregationSpec>();
  private sorts: SortSpec[] = [];
  private sourceSpec: SourceSpec | undefined;
  private highlightSpec: HighlightSpec | undefined;
  private indexSelector: IndexSelector | undefined;
  private sizeValue: number | undefined;
  private fromValue: number | undefined;

  constructor(context: BuilderContextInput = {}) {
    super(createContext(context));
  }

  /** One index name or several; existence is left to the engine. */
  index(selector: IndexSelector): this {
    this.indexSelector = typeof selector === 'string' ? selector : [...selector];
    return this;
  }

  setIndex(selector: IndexSelector): this {
    return this.index(selector);
  }

  getIndex(): IndexSelector | undefined {
    return this.indexSelector;
  }

  override indexes(): string[] {
    return uniqueIndexes([this.indexSelector]);
  }

  /**
   * A new, empty builder bound to the named connection. Nothing accumulated
   * on this builder is carried over; see cloneWithConnection().
   */
  withConnection(name: string): QueryBuilder {
    return new QueryBuilder(this.contextFor(name));
  }

  connection(name: string): QueryBuilder {
    return this.withConnection(name);
  }

  /** A copy of this builder, with all accumulated state, bound to the named connection. */
  cloneWithConnection(name: string): QueryBuilder {
    const clone = new QueryBuilder(this.contextFor(name));
    clone.clauses = [...this.clauses];
    clone.filters = [...this.filters];
    clone.aggregations = new Map(this.aggregations);
    clone.sorts = [...this.sorts];
    clone.sourceSpec = this.sourceSpec;
    clone.highlightSpec = this.highlightSpec;
    clone.indexSelector = this.indexSelector;
    clone.sizeValue = this.sizeValue;
    clone.fromValue = this.fromValue;
    this.copyCacheDescriptorTo(clone);
    return clone;
  }

  /** Full-text match; `options` (operator, fuzziness, ...) are merged over `query`. */
  match(field: string, value: JsonValue, options: JsonObject = {}): this {
    return this.addQuery({ match: { [field]: { query: value, ...options } } });
  }

  matchPhrase(field: string, value: JsonValue, options: JsonObject = {}): this {
    return this.addQuery({ match_phrase: { [field]: { query: value, ...options } } });
  }

  /** Exact value on a keyword field. */
  term(field: string, value: JsonValue): this {
    return this.addQuery({ term: { [field]: value } });
  }

  terms(field: string, values: readonly JsonValue[]): this {
    return this.addQuery({ terms: { [field]: [...values] } });
  }

  /** `*` matches any run of characters, `?` exactly one. */
  wildcard(field: string, pattern: string): this {
    return this.addQuery({ wildcard: { [field]: pattern } });
  }

  fuzzy(field: string, value: JsonValue, options: JsonObject = {}): this {
    return this.addQuery({ fuzzy: { [field]: { value, ...options } } });
  }

  exists(field: string): this {
    return this.addQuery({ exists: { field } });
  }

  /**
   * Range conditions on `field`. If the field already has a range clause,
   * the returned builder continues it instead of adding a second one.
   */
  range(field: string): RangeQueryBuilder {
    const existing = this.clauses[this.lastRangeIndex(field)];
    const range = existing?.['range'];
    const conditions = isJsonObject(range) ? range[field] : undefined;
    return new RangeQueryBuilder(this, field, isJsonObject(conditions) ? conditions : undefined);
  }

  /**
   * With a callback the bool clause is built and appended immediately and
   * this builder is returned. Without one, the sub-builder is returned and
   * the caller appends it, e.g. `q.addQuery(bool.build())`.
   */
  bool(): BoolQueryBuilder;
  bool(callback: BoolCallback): this;
  bool(callback?: BoolCallback): this | BoolQueryBuilder {
    const bool = new BoolQueryBuilder(() => this.spawn());
    if (callback === undefined) {
      return bool;
    }
    callback(bool);
    return this.addQuery(bool.build());
  }

  /** Query over nested objects at `path`. */
  nested(path: string, callback: QueryCallback): this {
    const query = this.subQuery(callback);
    if (query === undefined) return this;
    return this.addQuery({ nested: { path, query } });
  }

  /** Non-scoring clause; the body is wrapped in `bool.filter`. */
  filter(callback: QueryCallback): this {
    const query = this.subQuery(callback);
    if (query !== undefined) {
      this.filters.push(query);
    }
    return this;
  }

  size(size: number): this {
    assertNonNegativeInteger('size', size);
    this.sizeValue = size;
    return this;
  }

  from(from: number): this {
    assertNonNegativeInteger('from', from);
    this.fromValue = from;
    return this;
  }

  /** Appends a sort key; the first call is the primary key. */
  sort(field: string | SortSpec, direction: SortDirection = 'asc'): this {
    this.sorts.push(typeof field === 'string' ? { [field]: { order: direction } } : structuredClone(field));
    return this;
  }

  source(source: SourceSpec): this {
    this.sourceSpec = structuredClone(source);
    return this;
  }

  /**
   * @param fields - per-field highlight settings, e.g. `{ title: {} }`
   * @param options - global settings such as `pre_tags` / `post_tags`
   */
  highlight(fields: JsonObject, options: JsonObject = {}): this {
    this.highlightSpec = structuredClone({ ...options, fields });
    return this;
  }

  aggregation(name: string, callback: AggregationCallback): this {
    const aggregation = new AggregationBuilder();
    callback(aggregation);
    this.aggregations.set(name, aggregation.build());
    return this;
  }

  addQuery(clause: QueryClause): this {
    this.clauses.push(clause);
    return this;
  }

  /**
   * Replaces the last range clause on `field` in place. Appends when the
   * field has no range clause yet.
   */
  updateLastRangeQuery(field: string, clause: QueryClause): this {
    const position = this.lastRangeIndex(field);
    if (position === -1) {
      return this.addQuery(clause);
    }
    this.clauses[position] = clause;
    return this;
  }

  override build(): SearchBody {
    const body: SearchBody = {};
    const query = this.composeQuery();
    if (query !== undefined) body.query = query;
    if (this.sizeValue !== undefined) body.size = this.sizeValue;
    if (this.fromValue !== undefined) body.from = this.fromValue;
    if (this.sorts.length > 0) body.sort = this.sorts;
    if (this.sourceSpec !== undefined) body._source = this.sourceSpec;
    if (this.highlightSpec !== undefined) body.highlight = this.highlightSpec;
    if (this.aggregations.size > 0) body.aggs = Object.fromEntries(this.aggregations);
    // Callers get their own copy; later mutation of it never reaches this builder.
    return structuredClone(body);
  }

  protected override async run(): Promise<SearchResponse> {
    const client = this.requireClient();
    const body = this.build();
    const params: SearchParams = {};
    const selector = this.indexSelector;
    if (selector !== undefined && selector.length > 0) {
      params.index = typeof selector === 'string' ? selector : [...selector];
    }
    if (Object.keys(body).length > 0) {
      params.body = body;
    }
    return this.timed('search', body, () => client.search(params));
  }

  protected override acceptsCached(value: unknown): value is SearchResponse {
    return typeof value === 'object' && value !== null && !Array.isArray(value);
  }

  private composeQuery(): QueryClause | undefined {
    const [first] = this.clauses;
    const single = this.clauses.length === 1 ? first : undefined;

    if (this.filters.length > 0) {
      const bool: JsonObject = {};
      if (single !== undefined) {
        bool['must'] = single;
      } else if (this.clauses.length > 1) {
        bool['must'] = [...this.clauses];
      }
      bool['filter'] = [...this.filters];
      return { bool };
    }

    if (single !== undefined) {
      return single;
    }
    if (this.clauses.length > 1) {
      return { bool: { must: [...this.clauses] } };
    }
    return undefined;
  }

  private lastRangeIndex(field: string): number {
    for (let i = this.clauses.length - 1; i >= 0; i--) {
      const range = this.clauses[i]?.['range'];
      if (isJsonObject(range) && Object.hasOwn(range, field)) {
        return i;
      }
    }
    return -1;
  }

  private spawn(): QueryBuilder {
    return new QueryBuilder(this.context);
  }

  private subQuery(callback: QueryCallback): QueryClause | undefined {
    const query = this.spawn();
    callback(query);
    return query.build().query;
  }
}
