/**
 * Node Enrichment Module
 */

export { getNodePropertiesForClass } from './node-properties.js';
export { NodeEnricher, mapRowToProperties, normalizeColumnName } from './node-enricher.js';
export type { NodeEnricherDeps } from './node-enricher.js';
export type {
  NodeProperty,
  RowData,
  RowValue,
  MappedValue,
  MappedData,
  EnrichOptions,
  EnrichmentResult,
  EnrichedNode,
  EnrichmentUnresolved,
  EnrichmentMissingName,
} from './types.js';
