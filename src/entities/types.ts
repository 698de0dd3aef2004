/**
 * Types for entity resolution
 */

import type {
  LookupParams,
  LookupResult,
  NormalizationFlags,
  NormalizedNodesResponse,
} from '../services/types.js';

/** Name lookup as provided by NameResolverClient */
export interface NameLookup {
  lookup(params: LookupParams): Promise<LookupResult[]>;
}

/** Identifier normalization as provided by NodeNormalizerClient */
export interface NodeNormalization {
  getNormalizedNodes(curies: readonly string[], flags?: NormalizationFlags): Promise<NormalizedNodesResponse>;
}

export interface EntityResolutionOptions {
  limit?: number;          // Name lookup results to consider (default: 5)
  biolinkType?: string;    // Filter lookups to a Biolink type
  onlyPrefixes?: readonly string[];
}
