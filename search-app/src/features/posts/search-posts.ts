import { paginate, pageOffset, type Page, type QueryBuilder, type Search } from 'fluent-search-builder';
import { POSTS_INDEX } from '../../domain/indexes.js';
import { bucketCounts, type BucketCount } from '../../domain/responses.js';

export interface PostSearchQuery {
  q?: string;
  category?: string;
  page: number;
  perPage: number;
}

export interface PostSearchResult extends Page {
  categories: BucketCount[];
}

export function buildPostSearch(search: Search, params: PostSearchQuery): QueryBuilder {
  const builder = search.index(POSTS_INDEX);
  if (params.q !== undefined) {
    builder.match('title', params.q, { operator: 'and' });
  }
  builder.filter((q) => q.term('status', 'published'));
  const category = params.category;
  if (category !== undefined) {
    builder.filter((q) => q.term('category.keyword', category));
  }
  return builder
    .sort('published_at', 'desc')
    .from(pageOffset(params.page, params.perPage))
    .size(params.perPage)
    .highlight({ title: {} })
    .aggregation('categories', (agg) => agg.terms('category.keyword').size(10))
    .cache()
    .setCacheTtl([60, 300]);
}

export async function searchPosts(search: Search, params: PostSearchQuery): Promise<PostSearchResult> {
  const response = await buildPostSearch(search, params).execute();
  return {
    ...paginate(response, params.perPage, params.page),
    categories: bucketCounts(response, 'categories'),
  };
}
