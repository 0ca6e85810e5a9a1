import { describe, it, expect } from 'vitest';
import { BoolQueryBuilder } from '../../src/query/bool-builder.js';
import { QueryBuilder } from '../../src/query/query-builder.js';

function makeBool() {
  return new BoolQueryBuilder(() => new QueryBuilder());
}

describe('BoolQueryBuilder', () => {
  it('builds { bool: {} } when empty', () => {
    expect(makeBool().build()).toEqual({ bool: {} });
  });

  it('unwraps single must/should/must_not entries', () => {
    const clause = makeBool()
      .must((q) => q.match('title', 'x'))
      .should((q) => q.term('featured', true))
      .mustNot((q) => q.term('status', 'draft'))
      .build();
    expect(clause).toEqual({
      bool: {
        must: { match: { title: { query: 'x' } } },
        should: { term: { featured: true } },
        must_not: { term: { status: 'draft' } },
      },
    });
  });

  it('always emits filter as a list', () => {
    expect(makeBool().filter((q) => q.term('b', 'y')).build()).toEqual({
      bool: { filter: [{ term: { b: 'y' } }] },
    });
  });

  it('accepts a list of callbacks and keeps their order', () => {
    const clause = makeBool()
      .should([(q) => q.term('a', 1), (q) => q.term('b', 2)])
      .should((q) => q.term('c', 3))
      .minimumShouldMatch(2)
      .build();
    expect(clause).toEqual({
      bool: {
        should: [{ term: { a: 1 } }, { term: { b: 2 } }, { term: { c: 3 } }],
        minimum_should_match: 2,
      },
    });
  });

  it('minimumShouldMatch overwrites', () => {
    const clause = makeBool().minimumShouldMatch(1).minimumShouldMatch(3).build();
    expect(clause).toEqual({ bool: { minimum_should_match: 3 } });
  });

  it('skips callbacks that add nothing', () => {
    const clause = makeBool().must(() => undefined).must((q) => q.exists('a')).build();
    expect(clause).toEqual({ bool: { must: { exists: { field: 'a' } } } });
  });

  it('nests bool clauses', () => {
    const builder = new QueryBuilder().bool((b) => {
      b.must((q) => q.bool((inner) => {
        inner.should([(s) => s.term('a', 1), (s) => s.term('b', 2)]);
      }));
    });
    expect(builder.build().query).toEqual({
      bool: { must: { bool: { should: [{ term: { a: 1 } }, { term: { b: 2 } }] } } },
    });
  });
});
