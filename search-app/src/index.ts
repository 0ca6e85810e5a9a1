import pg from 'pg';
import {
  CacheManager,
  ConnectionManager,
  MemoryCacheStore,
  PostgresCacheStore,
  createSearch,
  loadConfigFromEnv,
  resolveConfig,
} from 'fluent-search-builder';
import { buildServer } from './api/server.js';

const PORT = parseInt(process.env['PORT'] ?? '3000', 10);
const DATABASE_URL = process.env['DATABASE_URL'];

const config = resolveConfig(loadConfigFromEnv());
const connections = new ConnectionManager({ config });
const caches = new CacheManager({
  defaultStore: config.cache.store,
  stores: { memory: new MemoryCacheStore() },
});

// Shared cache across instances when a database is configured
let postgresCache: PostgresCacheStore | undefined;
if (DATABASE_URL) {
  postgresCache = new PostgresCacheStore({ pool: new pg.Pool({ connectionString: DATABASE_URL }) });
  await postgresCache.initializeSchema();
  caches.register('postgres', postgresCache);
}

const search = createSearch({ config, connections, caches });
const app = buildServer(search);

async function shutdown(): Promise<void> {
  await app.close();
  await connections.disconnect();
  await postgresCache?.close();
}

try {
  await app.listen({ port: PORT, host: '0.0.0.0' });
} catch (err) {
  app.log.error(err);
  await shutdown();
  process.exit(1);
}

process.on('SIGTERM', () => {
  shutdown().catch((err: unknown) => app.log.error(err));
});
