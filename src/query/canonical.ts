import { createHash } from 'node:crypto';

/**
 * Copies a value with every object's keys sorted, recursively. Array order
 * is kept: clause order is meaningful to the engine.
 */
export function sortKeysDeep(value: unknown): unknown {
  if (Array.isArray(value)) {
    return value.map(sortKeysDeep);
  }
  if (typeof value === 'object' && value !== null) {
    const sorted: Record<string, unknown> = {};
    for (const key of Object.keys(value).sort()) {
      sorted[key] = sortKeysDeep(Reflect.get(value, key));
    }
    return sorted;
  }
  return value;
}

/** Stable JSON: two structurally equal values always serialize the same. */
export function canonicalJson(value: unknown): string {
  return JSON.stringify(sortKeysDeep(value)) ?? 'null';
}

export function hashBody(value: unknown): string {
  return createHash('sha1').update(canonicalJson(value)).digest('hex');
}

/** Flattens selectors into the sorted, de-duplicated index list used in cache keys. */
export function uniqueIndexes(selectors: ReadonlyArray<string | readonly string[] | undefined>): string[] {
  const names = new Set<string>();
  for (const selector of selectors) {
    if (selector === undefined) continue;
    if (typeof selector === 'string') {
      names.add(selector);
    } else {
      for (const name of selector) names.add(name);
    }
  }
  return [...names].sort();
}

export function compareNames(a: string, b: string): number {
  if (a < b) return -1;
  if (a > b) return 1;
  return 0;
}
