import { describe, it, expect } from 'vitest';
import { AggregationBuilder } from '../../src/query/aggregation-builder.js';
import { QueryBuilder } from '../../src/query/query-builder.js';

describe('AggregationBuilder', () => {
  describe('bucket aggregations', () => {
    it('terms with size', () => {
      expect(new AggregationBuilder().terms('category.keyword').size(10).build())
        .toEqual({ terms: { field: 'category.keyword', size: 10 } });
    });

    it('dateHistogram uses calendar_interval', () => {
      expect(new AggregationBuilder().dateHistogram('created_at', 'month', { format: 'yyyy-MM' }).build())
        .toEqual({ date_histogram: { field: 'created_at', calendar_interval: 'month', format: 'yyyy-MM' } });
    });

    it('histogram', () => {
      expect(new AggregationBuilder().histogram('price', 50).build())
        .toEqual({ histogram: { field: 'price', interval: 50 } });
    });

    it('range keeps only the bounds that were given', () => {
      const spec = new AggregationBuilder()
        .range('price', [{ to: 100 }, { from: 100, to: 200 }, { key: 'expensive', from: 200 }])
        .build();
      expect(spec).toEqual({
        range: {
          field: 'price',
          ranges: [{ to: 100 }, { from: 100, to: 200 }, { key: 'expensive', from: 200 }],
        },
      });
    });

    it('order refines the current definition', () => {
      expect(new AggregationBuilder().terms('tags').order({ _count: 'desc' }).build())
        .toEqual({ terms: { field: 'tags', order: { _count: 'desc' } } });
    });
  });

  describe('metric aggregations', () => {
    it.each([
      ['avg', 'avg'],
      ['sum', 'sum'],
      ['min', 'min'],
      ['max', 'max'],
      ['cardinality', 'cardinality'],
    ] as const)('%s emits %s', (method, key) => {
      expect(new AggregationBuilder()[method]('price').build()).toEqual({ [key]: { field: 'price' } });
    });

    it('count emits value_count', () => {
      expect(new AggregationBuilder().count('id').build()).toEqual({ value_count: { field: 'id' } });
    });
  });

  it('a new definition replaces the previous one', () => {
    expect(new AggregationBuilder().avg('price').sum('price').build()).toEqual({ sum: { field: 'price' } });
  });

  it('size before any definition throws', () => {
    expect(() => new AggregationBuilder().size(5)).toThrow('Aggregation size() needs a bucket or metric definition first');
  });

  it('nests sub-aggregations to any depth', () => {
    const spec = new AggregationBuilder()
      .terms('category')
      .subAggregation('by_month', (month) =>
        month.dateHistogram('created_at', 'month').subAggregation('revenue', (r) => r.sum('price')),
      )
      .subAggregation('avg_price', (a) => a.avg('price'))
      .build();
    expect(spec).toEqual({
      terms: { field: 'category' },
      aggs: {
        by_month: {
          date_histogram: { field: 'created_at', calendar_interval: 'month' },
          aggs: { revenue: { sum: { field: 'price' } } },
        },
        avg_price: { avg: { field: 'price' } },
      },
    });
  });

  it('is stored under its name in the query body', () => {
    const body = new QueryBuilder()
      .aggregation('categories', (agg) => agg.terms('category.keyword').size(10))
      .aggregation('avg_price', (agg) => agg.avg('price'))
      .build();
    expect(body.aggs).toEqual({
      categories: { terms: { field: 'category.keyword', size: 10 } },
      avg_price: { avg: { field: 'price' } },
    });
    expect(Object.keys(body.aggs ?? {})).toEqual(['categories', 'avg_price']);
  });
});
