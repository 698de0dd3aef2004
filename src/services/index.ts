/**
 * Upstream Service Clients
 */

export { ServiceClient, ServiceApiError } from './client.js';
export type { ServiceClientOptions, ServiceResponse } from './client.js';
export { ResponseCache, entryAge } from './cache.js';
export type { CacheConfig, CacheEntry, CacheStats } from './cache.js';
export { NameResolverClient, DEFAULT_NAME_RESOLVER_URL } from './name-resolver.js';
export {
  NodeNormalizerClient,
  DEFAULT_NODE_NORMALIZER_URL,
  formatNormalizedNodes,
  collectTypes,
} from './node-normalizer.js';
export type {
  QueryParams,
  LookupParams,
  LookupResult,
  NormalizationFlags,
  NormalizedNode,
  NormalizedNodesResponse,
  EquivalentIdentifier,
} from './types.js';
