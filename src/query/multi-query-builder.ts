import { CacheableBuilder } from '../cache/cacheable.js';
import type { NamedMultiSearchResponse } from '../types.js';
import type { QueryCallback } from './bool-builder.js';
import { compareNames, uniqueIndexes } from './canonical.js';
import { createContext, type BuilderContextInput } from './context.js';
import { QueryBuilder } from './query-builder.js';
import type { MultiSearchHeader, MultiSearchLine } from './types.js';

/**
 * Batches several named searches into one `_msearch` round trip and maps the
 * positional responses back onto the names.
 *
 * Entries are always emitted in ascending name order, whatever order they
 * were added in, so the wire body and the cache key are reproducible.
 *
 * @example
 * const { responses } = await search.multi()
 *   .add('posts', (q) => q.index('posts').match('title', 'typescript'))
 *   .add('users', (q) => q.index('users').term('active', true))
 *   .execute();
 * responses['posts'];
 */
export class MultiQueryBuilder extends CacheableBuilder<MultiSearchLine[], NamedMultiSearchResponse> {
  private entries = new Map<string, QueryBuilder>();

  constructor(context: BuilderContextInput = {}) {
    super(createContext(context));
  }

  /**
   * Adds or replaces the entry `name`. A builder is kept by reference, so
   * changes made to it before build() are included.
   */
  add(name: string, query: QueryCallback | QueryBuilder): this {
    if (query instanceof QueryBuilder) {
      this.entries.set(name, query);
      return this;
    }
    const builder = new QueryBuilder(this.context);
    query(builder);
    this.entries.set(name, builder);
    return this;
  }

  count(): number {
    return this.entries.size;
  }

  /** Entry names in batch order. */
  names(): string[] {
    return [...this.entries.keys()].sort(compareNames);
  }

  withConnection(name: string): MultiQueryBuilder {
    return new MultiQueryBuilder(this.contextFor(name));
  }

  connection(name: string): MultiQueryBuilder {
    return this.withConnection(name);
  }

  /**
   * Keeps the entries. Entries created from callbacks stay bound to the
   * client they were created with; the batch itself is sent on `name`.
   */
  cloneWithConnection(name: string): MultiQueryBuilder {
    const clone = new MultiQueryBuilder(this.contextFor(name));
    clone.entries = new Map(this.entries);
    this.copyCacheDescriptorTo(clone);
    return clone;
  }

  override indexes(): string[] {
    return uniqueIndexes([...this.entries.values()].map((builder) => builder.getIndex()));
  }

  /** Alternating header/body lines: `{ index: 'a,b' }` then the entry's body. */
  override build(): MultiSearchLine[] {
    const lines: MultiSearchLine[] = [];
    for (const name of this.names()) {
      const builder = this.entries.get(name);
      if (builder === undefined) continue;
      const header: MultiSearchHeader = {};
      const selector = builder.getIndex();
      if (selector !== undefined) {
        header.index = typeof selector === 'string' ? selector : selector.join(',');
      }
      lines.push(header, builder.build());
    }
    return lines;
  }

  protected override async run(): Promise<NamedMultiSearchResponse> {
    const client = this.requireClient();
    if (this.entries.size === 0) {
      return { responses: [] };
    }

    const names = this.names();
    const body = this.build();
    const result = await this.timed('msearch', body, () => client.msearch({ body }));

    const responses: Record<string, unknown> = {};
    names.forEach((name, position) => {
      responses[name] = result.responses[position] ?? null;
    });
    return { ...result, responses };
  }

  protected override acceptsCached(value: unknown): value is NamedMultiSearchResponse {
    if (typeof value !== 'object' || value === null) return false;
    const responses: unknown = Reflect.get(value, 'responses');
    return typeof responses === 'object' && responses !== null;
  }
}
