import type { FastifyInstance } from 'fastify';
import { CacheStoreError, ConfigurationError, SearchBackendError } from 'fluent-search-builder';

function statusCodeOf(error: Error): number | undefined {
  const statusCode: unknown = Reflect.get(error, 'statusCode');
  return typeof statusCode === 'number' ? statusCode : undefined;
}

export function registerErrorHandler(app: FastifyInstance): void {
  app.setErrorHandler((unknownError, _request, reply) => {
    // Ensure we always deal with an Error object
    const error = unknownError instanceof Error ? unknownError : new Error(String(unknownError));

    // Search engine unreachable or rejected the request → 502
    if (error instanceof SearchBackendError) {
      app.log.error({ err: error, statusCode: error.statusCode }, 'search backend failed');
      return reply.status(502).send({ error: 'SearchBackendError', message: 'Search backend unavailable' });
    }

    // Wiring and cache infrastructure errors → 500
    if (error instanceof ConfigurationError || error instanceof CacheStoreError) {
      app.log.error(error);
      return reply.status(500).send({ error: 'InternalError', message: 'Internal server error' });
    }

    // Fastify built-in errors (validation, not found) carry their status
    const statusCode = statusCodeOf(error);
    if (statusCode !== undefined) {
      return reply.status(statusCode).send({ error: error.name, message: error.message });
    }

    app.log.error(error);
    return reply.status(500).send({ error: 'InternalError', message: 'Internal server error' });
  });
}
