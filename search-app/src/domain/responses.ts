function property(value: unknown, key: string): unknown {
  return typeof value === 'object' && value !== null ? Reflect.get(value, key) : undefined;
}

export interface BucketCount {
  key: string;
  count: number;
}

/** `aggregations.<name>.buckets` as key/count pairs; empty when absent. */
export function bucketCounts(response: unknown, aggregation: string): BucketCount[] {
  const buckets = property(property(property(response, 'aggregations'), aggregation), 'buckets');
  if (!Array.isArray(buckets)) return [];
  return buckets.flatMap((bucket: unknown) => {
    const key = property(bucket, 'key');
    const count = property(bucket, 'doc_count');
    return typeof key === 'string' && typeof count === 'number' ? [{ key, count }] : [];
  });
}
