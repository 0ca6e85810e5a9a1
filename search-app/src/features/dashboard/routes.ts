import type { FastifyInstance } from 'fastify';
import type { Search } from 'fluent-search-builder';
import { loadDashboard } from './load-dashboard.js';

export async function registerDashboardRoutes(app: FastifyInstance, search: Search): Promise<void> {
  // GET /dashboard: recent posts and active user count in one round trip
  app.get('/dashboard', async (_request, reply) => {
    const dashboard = await loadDashboard(search);
    return reply.status(200).send(dashboard);
  });
}
