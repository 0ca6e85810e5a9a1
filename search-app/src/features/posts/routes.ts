import type { FastifyInstance } from 'fastify';
import type { Search } from 'fluent-search-builder';
import { searchPosts, type PostSearchQuery } from './search-posts.js';

const querystring = {
  type: 'object',
  properties: {
    q: { type: 'string', minLength: 1 },
    category: { type: 'string', minLength: 1 },
    page: { type: 'integer', minimum: 1, default: 1 },
    perPage: { type: 'integer', minimum: 1, maximum: 100, default: 10 },
  },
} as const;

export async function registerPostRoutes(app: FastifyInstance, search: Search): Promise<void> {
  // GET /posts/search: full-text search over published posts
  app.get<{ Querystring: PostSearchQuery }>('/posts/search', { schema: { querystring } }, async (request, reply) => {
    const result = await searchPosts(search, request.query);
    return reply.status(200).send(result);
  });
}
