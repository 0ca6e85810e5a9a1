import Fastify from 'fastify';
import { v4 as uuidv4 } from 'uuid';
import type { Search } from 'fluent-search-builder';
import { registerErrorHandler } from './middleware/error-handler.js';
import { registerPostRoutes } from '../features/posts/routes.js';
import { registerDashboardRoutes } from '../features/dashboard/routes.js';

export interface ServerOptions {
  logger?: boolean;
}

export function buildServer(search: Search, options: ServerOptions = {}) {
  const app = Fastify({ logger: options.logger ?? true, genReqId: () => uuidv4() });

  registerErrorHandler(app);

  app.addHook('onSend', async (request, reply) => {
    reply.header('x-request-id', request.id);
  });

  const prefix = '/api/v1';

  app.register(async (instance) => {
    await registerPostRoutes(instance, search);
    await registerDashboardRoutes(instance, search);
  }, { prefix });

  return app;
}
