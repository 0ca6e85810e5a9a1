import { describe, it, expect } from 'vitest';
import { pageOffset, paginate, totalHits } from '../../src/pagination/paginator.js';

function response(total: unknown, count: number) {
  return { hits: { total, hits: Array.from({ length: count }, (_, i) => ({ _id: String(i) })) } };
}

describe('totalHits()', () => {
  it('reads { value } totals', () => {
    expect(totalHits(response({ value: 42, relation: 'eq' }, 0))).toBe(42);
  });

  it('reads bare number totals', () => {
    expect(totalHits(response(17, 0))).toBe(17);
  });

  it('is 0 when the response has no hits', () => {
    expect(totalHits({})).toBe(0);
  });
});

describe('pageOffset()', () => {
  it('is 0 for the first page', () => {
    expect(pageOffset(1, 15)).toBe(0);
  });

  it('skips the earlier pages', () => {
    expect(pageOffset(3, 15)).toBe(30);
  });

  it('treats pages below 1 as the first page', () => {
    expect(pageOffset(0, 15)).toBe(0);
  });
});

describe('paginate()', () => {
  it('describes a middle page', () => {
    const page = paginate(response({ value: 45 }, 10), 10, 2);
    expect(page).toEqual({
      items: response({ value: 45 }, 10).hits.hits,
      total: 45,
      perPage: 10,
      currentPage: 2,
      lastPage: 5,
      from: 11,
      to: 20,
    });
  });

  it('describes a short last page', () => {
    const page = paginate(response({ value: 45 }, 5), 10, 5);
    expect(page.from).toBe(41);
    expect(page.to).toBe(45);
  });

  it('has null bounds and one page when there are no hits', () => {
    const page = paginate(response({ value: 0 }, 0), 10);
    expect(page).toMatchObject({ items: [], total: 0, currentPage: 1, lastPage: 1, from: null, to: null });
  });

  it('rejects perPage below 1', () => {
    expect(() => paginate({}, 0)).toThrow(RangeError);
  });
});
