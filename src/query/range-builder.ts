import type { JsonObject, QueryClause } from './types.js';

export type RangeValue = string | number;
export type RangeComparator = 'gt' | 'gte' | 'lt' | 'lte';

/** What a range sub-builder needs from the builder that owns it. */
export interface RangeHost {
  addQuery(clause: QueryClause): unknown;
  updateLastRangeQuery(field: string, clause: QueryClause): unknown;
}

/**
 * Builds `{ range: { field: { gte, lte, ... } } }` one comparator at a time.
 * The first comparator appends the clause to the owner; later ones replace
 * that clause in place.
 *
 * @example
 * builder.range('price').gte(100).lt(500);
 */
export class RangeQueryBuilder {
  private readonly conditions: JsonObject;
  private emitted: boolean;

  constructor(
    private readonly owner: RangeHost,
    readonly field: string,
    existing?: JsonObject,
  ) {
    this.conditions = existing === undefined ? {} : { ...existing };
    this.emitted = existing !== undefined;
  }

  gt(value: RangeValue): this {
    return this.set('gt', value);
  }

  gte(value: RangeValue): this {
    return this.set('gte', value);
  }

  lt(value: RangeValue): this {
    return this.set('lt', value);
  }

  lte(value: RangeValue): this {
    return this.set('lte', value);
  }

  build(): QueryClause {
    return { range: { [this.field]: { ...this.conditions } } };
  }

  private set(comparator: RangeComparator, value: RangeValue): this {
    this.conditions[comparator] = value;
    if (this.emitted) {
      this.owner.updateLastRangeQuery(this.field, this.build());
    } else {
      this.owner.addQuery(this.build());
      this.emitted = true;
    }
    return this;
  }
}
