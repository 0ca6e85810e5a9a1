import type { AggregationSpec, JsonObject, JsonValue } from './types.js';

export type AggregationCallback = (aggregation: AggregationBuilder) => void;

export interface RangeBucket {
  key?: string;
  from?: number | string;
  to?: number | string;
}

/**
 * Builds one named aggregation: a single bucket or metric definition,
 * optionally with nested sub-aggregations.
 *
 * @example
 * builder.aggregation('categories', (agg) =>
 *   agg.terms('category.keyword').size(10)
 *     .subAggregation('avg_price', (sub) => sub.avg('price')),
 * );
 */
export class AggregationBuilder {
  private kind: string | undefined;
  private definition: JsonObject = {};
  private readonly children = new Map<string, AggregationSpec>();

  // Bucket aggregations

  terms(field: string, options: JsonObject = {}): this {
    return this.define('terms', { field, ...options });
  }

  /** `interval` is a calendar interval such as `'day'` or `'1M'`. */
  dateHistogram(field: string, interval: string, options: JsonObject = {}): this {
    return this.define('date_histogram', { field, calendar_interval: interval, ...options });
  }

  histogram(field: string, interval: number, options: JsonObject = {}): this {
    return this.define('histogram', { field, interval, ...options });
  }

  range(field: string, ranges: RangeBucket[], options: JsonObject = {}): this {
    const buckets: JsonValue[] = ranges.map((r) => {
      const bucket: JsonObject = {};
      if (r.key !== undefined) bucket['key'] = r.key;
      if (r.from !== undefined) bucket['from'] = r.from;
      if (r.to !== undefined) bucket['to'] = r.to;
      return bucket;
    });
    return this.define('range', { field, ranges: buckets, ...options });
  }

  // Metric aggregations

  avg(field: string, options: JsonObject = {}): this {
    return this.define('avg', { field, ...options });
  }

  sum(field: string, options: JsonObject = {}): this {
    return this.define('sum', { field, ...options });
  }

  min(field: string, options: JsonObject = {}): this {
    return this.define('min', { field, ...options });
  }

  max(field: string, options: JsonObject = {}): this {
    return this.define('max', { field, ...options });
  }

  count(field: string, options: JsonObject = {}): this {
    return this.define('value_count', { field, ...options });
  }

  cardinality(field: string, options: JsonObject = {}): this {
    return this.define('cardinality', { field, ...options });
  }

  // Refinements of the current definition

  size(size: number): this {
    return this.refine('size', size);
  }

  order(order: JsonObject | JsonObject[]): this {
    return this.refine('order', order);
  }

  subAggregation(name: string, callback: AggregationCallback): this {
    const sub = new AggregationBuilder();
    callback(sub);
    this.children.set(name, sub.build());
    return this;
  }

  build(): AggregationSpec {
    const spec: AggregationSpec = {};
    if (this.kind !== undefined) {
      spec[this.kind] = { ...this.definition };
    }
    if (this.children.size > 0) {
      spec['aggs'] = Object.fromEntries(this.children);
    }
    return structuredClone(spec);
  }

  /** Replaces any earlier definition: a spec holds exactly one. */
  private define(kind: string, definition: JsonObject): this {
    this.kind = kind;
    this.definition = definition;
    return this;
  }

  private refine(key: string, value: JsonValue): this {
    if (this.kind === undefined) {
      throw new Error(`Aggregation ${key}() needs a bucket or metric definition first`);
    }
    this.definition[key] = value;
    return this;
  }
}
