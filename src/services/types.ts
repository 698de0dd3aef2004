/**
 * Name Resolution and Node Normalization API types
 *
 * Response bodies are validated with zod before they reach callers; unknown
 * fields pass through untouched.
 */

import { z } from 'zod';

/** Query parameters as ordered pairs, so a name may repeat (`curie=…&curie=…`) */
export type QueryParams = ReadonlyArray<readonly [string, string]>;

// ============================================
// Name Resolution Service
// ============================================

export const lookupResultSchema = z
  .object({
    curie: z.string().nullish(),
    label: z.string().nullish(),
    synonyms: z.array(z.string()).nullish(),
    types: z.array(z.string()).nullish(),
    score: z.number().nullish(),
    taxa: z.array(z.string()).nullish(),
    clique_identifier_count: z.number().nullish(),
  })
  .passthrough();

export type LookupResult = z.infer<typeof lookupResultSchema>;

export const lookupResponseSchema = z.array(lookupResultSchema).nullable();

export interface LookupParams {
  /** Free-text name, e.g. "aspirin" */
  string: string;
  limit?: number;
  /** Restrict results to a Biolink type, e.g. "Disease" or "biolink:Gene" */
  biolinkType?: string;
  /** Restrict results to identifier namespaces, e.g. ["MONDO", "HGNC"] */
  onlyPrefixes?: readonly string[];
  autocomplete?: boolean;
  highlighting?: boolean;
}

// ============================================
// Node Normalization Service
// ============================================

const typeFieldSchema = z.union([z.array(z.string()), z.string()]);

export const equivalentIdentifierSchema = z
  .object({
    identifier: z.string(),
    label: z.string().nullish(),
    description: z.string().nullish(),
    type: typeFieldSchema.nullish(),
  })
  .passthrough();

export const normalizedNodeSchema = z
  .object({
    id: z
      .object({
        identifier: z.string().nullish(),
        label: z.string().nullish(),
        description: z.string().nullish(),
      })
      .passthrough()
      .nullish(),
    type: typeFieldSchema.nullish(),
    equivalent_identifiers: z.array(equivalentIdentifierSchema).nullish(),
    information_content: z.number().nullish(),
  })
  .passthrough();

export type EquivalentIdentifier = z.infer<typeof equivalentIdentifierSchema>;
export type NormalizedNode = z.infer<typeof normalizedNodeSchema>;

/** CURIE -> normalized node, `null` for CURIEs the service does not know */
export const normalizedNodesResponseSchema = z.record(z.string(), normalizedNodeSchema.nullable());

export type NormalizedNodesResponse = z.infer<typeof normalizedNodesResponseSchema>;

export interface NormalizationFlags {
  /** Gene/protein conflation (default: true) */
  conflate?: boolean;
  /** Drug/chemical conflation (default: true) */
  drugChemicalConflate?: boolean;
  /** Return descriptions when available (default: false) */
  description?: boolean;
  /** Return types of each equivalent identifier (default: false) */
  individualTypes?: boolean;
}
