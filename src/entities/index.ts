/**
 * Entity Resolution Module
 */

export { EntityResolver } from './entity-resolver.js';
export type { EntityResolverDeps } from './entity-resolver.js';
export type { EntityResolutionOptions, NameLookup, NodeNormalization } from './types.js';
