import { paginate, totalHits, type MultiQueryBuilder, type Search } from 'fluent-search-builder';
import { POSTS_INDEX, USERS_INDEX } from '../../domain/indexes.js';

const RECENT_POSTS = 5;

export interface Dashboard {
  activeUsers: number;
  recentPosts: unknown[];
}

export function buildDashboardSearch(search: Search): MultiQueryBuilder {
  return search
    .multi()
    .add('recent_posts', (q) =>
      q.index(POSTS_INDEX)
        .filter((f) => f.term('status', 'published'))
        .sort('published_at', 'desc')
        .size(RECENT_POSTS),
    )
    .add('active_users', (q) => q.index(USERS_INDEX).term('active', true).size(0))
    .cache()
    .setCacheTtl(30);
}

export async function loadDashboard(search: Search): Promise<Dashboard> {
  const { responses } = await buildDashboardSearch(search).execute();
  if (Array.isArray(responses)) {
    return { activeUsers: 0, recentPosts: [] };
  }
  return {
    activeUsers: totalHits(responses['active_users']),
    recentPosts: paginate(responses['recent_posts'], RECENT_POSTS).items,
  };
}
