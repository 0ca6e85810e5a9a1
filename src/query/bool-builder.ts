import type { JsonObject, QueryClause } from './types.js';
import type { QueryBuilder } from './query-builder.js';

export type QueryCallback = (query: QueryBuilder) => void;
type Occurrence = 'must' | 'should' | 'filter' | 'must_not';

/**
 * Composes a `bool` clause. Each callback receives a fresh QueryBuilder and
 * contributes that builder's `query`.
 *
 * @example
 * builder.bool((b) => {
 *   b.must((q) => q.match('title', 'search'));
 *   b.filter((q) => q.term('status', 'published'));
 *   b.should([(q) => q.term('featured', true), (q) => q.exists('cover')]).minimumShouldMatch(1);
 * });
 */
export class BoolQueryBuilder {
  private readonly groups: Record<Occurrence, QueryClause[]> = {
    must: [],
    should: [],
    filter: [],
    must_not: [],
  };
  private minimumShouldMatchValue: number | undefined;

  constructor(private readonly spawn: () => QueryBuilder) {}

  must(callbacks: QueryCallback | QueryCallback[]): this {
    return this.collect('must', callbacks);
  }

  should(callbacks: QueryCallback | QueryCallback[]): this {
    return this.collect('should', callbacks);
  }

  filter(callbacks: QueryCallback | QueryCallback[]): this {
    return this.collect('filter', callbacks);
  }

  mustNot(callbacks: QueryCallback | QueryCallback[]): this {
    return this.collect('must_not', callbacks);
  }

  minimumShouldMatch(value: number): this {
    this.minimumShouldMatchValue = value;
    return this;
  }

  /**
   * Single must/should/must_not entries are unwrapped; `filter` is always a
   * list, as in the top-level query. `{ bool: {} }` when nothing was added.
   */
  build(): QueryClause {
    const bool: JsonObject = {};
    for (const occurrence of ['must', 'should', 'filter', 'must_not'] as const) {
      const clauses = this.groups[occurrence];
      const [only] = clauses;
      if (occurrence === 'filter' && clauses.length > 0) {
        bool[occurrence] = [...clauses];
      } else if (clauses.length === 1 && only !== undefined) {
        bool[occurrence] = only;
      } else if (clauses.length > 1) {
        bool[occurrence] = [...clauses];
      }
    }
    if (this.minimumShouldMatchValue !== undefined) {
      bool['minimum_should_match'] = this.minimumShouldMatchValue;
    }
    return { bool };
  }

  private collect(occurrence: Occurrence, callbacks: QueryCallback | QueryCallback[]): this {
    const list = Array.isArray(callbacks) ? callbacks : [callbacks];
    for (const callback of list) {
      const query = this.spawn();
      callback(query);
      const clause = query.build().query;
      if (clause !== undefined) {
        this.groups[occurrence].push(clause);
      }
    }
    return this;
  }
}
