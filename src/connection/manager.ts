import { Client, type ClientOptions } from '@elastic/elasticsearch';
import type { ConnectionConfig, ResolvedSearchConfig } from '../config.js';
import { ConfigurationError } from '../errors.js';
import { consoleLogger, type Logger } from '../logging.js';
import type { ConnectionResolver } from '../types.js';
import { ElasticsearchSearchClient, type ManagedSearchClient } from './elasticsearch-client.js';

export type ClientFactory = (name: string, config: ConnectionConfig) => ManagedSearchClient;

export interface ConnectionManagerConfig {
  config: Pick<ResolvedSearchConfig, 'defaultConnection' | 'connections'>;
  /** Defaults to an ElasticsearchSearchClient per connection. */
  clientFactory?: ClientFactory;
  logger?: Logger;
}

/** `localhost:9200` → `http://localhost:9200`; URLs with a scheme are kept. */
export function normalizeHost(host: string): string {
  return /^[a-z][a-z0-9+.-]*:\/\//i.test(host) ? host : `http://${host}`;
}

export function clientOptions(config: ConnectionConfig): ClientOptions {
  const options: ClientOptions = {};
  if (config.cloudId) {
    options.cloud = { id: config.cloudId };
  } else {
    options.nodes = config.hosts.map(normalizeHost);
  }
  if (config.apiKey) {
    options.auth = { apiKey: config.apiKey };
  } else if (config.username && config.password) {
    options.auth = { username: config.username, password: config.password };
  }
  if (config.sslVerification === false) {
    options.tls = { rejectUnauthorized: false };
  }
  return options;
}

const elasticsearchFactory: ClientFactory = (_name, config) =>
  new ElasticsearchSearchClient(new Client(clientOptions(config)));

/**
 * Named connections from configuration. Clients are created on first use
 * and reused until purged.
 */
export class ConnectionManager implements ConnectionResolver {
  private readonly clients = new Map<string, ManagedSearchClient>();
  private readonly factory: ClientFactory;
  private readonly logger: Logger;

  constructor(private readonly options: ConnectionManagerConfig) {
    this.factory = options.clientFactory ?? elasticsearchFactory;
    this.logger = options.logger ?? consoleLogger;
  }

  /** The client for `name`, or for the default connection when omitted. */
  connection(name?: string): ManagedSearchClient {
    const resolved = name || this.defaultConnection();
    const existing = this.clients.get(resolved);
    if (existing !== undefined) {
      return existing;
    }
    const config = this.connectionConfig(resolved);
    this.logger.debug(
      { connection: resolved, hosts: config.cloudId ? [] : config.hosts },
      'creating search connection',
    );
    const client = this.factory(resolved, config);
    this.clients.set(resolved, client);
    return client;
  }

  resolve(name: string): ManagedSearchClient {
    return this.connection(name);
  }

  defaultConnection(): string {
    return this.options.config.defaultConnection;
  }

  connectionNames(): string[] {
    return Object.keys(this.options.config.connections);
  }

  /** Drops the cached client; the next use creates a new one. */
  async purge(name: string): Promise<void> {
    const client = this.clients.get(name);
    this.clients.delete(name);
    if (client !== undefined) {
      await client.close();
    }
  }

  async disconnect(): Promise<void> {
    const clients = [...this.clients.values()];
    this.clients.clear();
    await Promise.all(clients.map((client) => client.close()));
  }

  private connectionConfig(name: string): ConnectionConfig {
    const config = this.options.config.connections[name];
    if (config === undefined) {
      throw new ConfigurationError(`Search connection [${name}] not configured.`);
    }
    return config;
  }
}
