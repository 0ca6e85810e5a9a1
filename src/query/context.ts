import type { CacheResolver } from '../cache/types.js';
import { resolveConfig, type ResolvedSearchConfig } from '../config.js';
import { consoleLogger, type Logger } from '../logging.js';
import type { ConnectionResolver, SearchClient } from '../types.js';

/**
 * Collaborators shared by a builder and every builder spawned from it
 * (nested, filter, bool and multi-search entries).
 */
export interface BuilderContext {
  client?: SearchClient;
  connections?: ConnectionResolver;
  caches?: CacheResolver;
  config: ResolvedSearchConfig;
  logger: Logger;
}

export type BuilderContextInput = Partial<BuilderContext>;

export function createContext(input: BuilderContextInput = {}): BuilderContext {
  return {
    ...input,
    config: input.config ?? resolveConfig(),
    logger: input.logger ?? consoleLogger,
  };
}
