/**
 * Process-wide services shared by every MCP server instance
 */

import type { Config } from './config.js';
import { EntityResolver } from './entities/index.js';
import { NodeEnricher } from './enrichment/index.js';
import { silentLogger, type Logger } from './logger.js';
import { NameResolverClient, NodeNormalizerClient, ResponseCache } from './services/index.js';
import type { ServiceClientOptions } from './services/index.js';
import { createTypeReducer, type TaxonomyModel, type TypeReducer } from './taxonomy/index.js';

export interface ServerContext {
  config: Config;
  model: TaxonomyModel;
  reduce: TypeReducer;
  /** Upstream responses, shared by both clients */
  cache: ResponseCache;
  nameResolver: NameResolverClient;
  nodeNormalizer: NodeNormalizerClient;
  resolver: EntityResolver;
  enricher: NodeEnricher;
  logger: Logger;
}

export interface ServerContextOptions {
  logger?: Logger;
  /** Overrides for the upstream clients (fetch implementation, retries) */
  clientOptions?: Omit<ServiceClientOptions, 'cache'>;
}

export function createServerContext(
  config: Config,
  model: TaxonomyModel,
  options: ServerContextOptions = {}
): ServerContext {
  const logger = options.logger ?? silentLogger;
  const cache = new ResponseCache({ ttlMs: config.cache.ttlMs, maxSize: config.cache.maxSize });
  const clientOptions: ServiceClientOptions = {
    userAgent: config.services.userAgent,
    cache,
    logger: logger.child('http'),
    ...options.clientOptions,
  };

  const reduce = createTypeReducer(model, {
    rootType: config.taxonomy.rootType,
    logger: logger.child('reducer'),
  });
  const nameResolver = new NameResolverClient(config.services.nameResolverUrl, clientOptions);
  const nodeNormalizer = new NodeNormalizerClient(config.services.nodeNormalizerUrl, clientOptions);
  const resolver = new EntityResolver({
    nameResolver,
    nodeNormalizer,
    reduce,
    rootType: config.taxonomy.rootType,
    logger: logger.child('resolver'),
  });
  const enricher = new NodeEnricher({ model, resolver, reduce, logger: logger.child('enrichment') });

  return { config, model, reduce, cache, nameResolver, nodeNormalizer, resolver, enricher, logger };
}
