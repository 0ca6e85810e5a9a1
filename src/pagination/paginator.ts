export interface Page<T = unknown> {
  items: T[];
  total: number;
  perPage: number;
  currentPage: number;
  lastPage: number;
  /** 1-based position of the first item on the page, or null when empty. */
  from: number | null;
  to: number | null;
}

function field(value: unknown, key: string): unknown {
  return typeof value === 'object' && value !== null ? Reflect.get(value, key) : undefined;
}

/** `hits.total` is `{ value }` in current engines and a bare number in old ones. */
export function totalHits(response: unknown): number {
  const total = field(field(response, 'hits'), 'total');
  if (typeof total === 'number') return total;
  const value = field(total, 'value');
  return typeof value === 'number' ? value : 0;
}

/** Offset (`from`) of the first hit on `page`. */
export function pageOffset(page: number, perPage: number): number {
  return Math.max(0, Math.floor(page) - 1) * perPage;
}

/** Accepts a search response, or one entry of a multi-search response. */
export function paginate(response: unknown, perPage: number, currentPage: number = 1): Page {
  if (!Number.isInteger(perPage) || perPage < 1) {
    throw new RangeError(`perPage must be a positive integer, got ${perPage}`);
  }
  const hits = field(field(response, 'hits'), 'hits');
  const items: unknown[] = Array.isArray(hits) ? hits : [];
  const total = totalHits(response);
  const page = Math.max(1, Math.floor(currentPage));
  const first = pageOffset(page, perPage) + 1;
  return {
    items,
    total,
    perPage,
    currentPage: page,
    lastPage: Math.max(1, Math.ceil(total / perPage)),
    from: items.length > 0 ? first : null,
    to: items.length > 0 ? first + items.length - 1 : null,
  };
}
