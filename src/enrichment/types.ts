/**
 * Types for node enrichment
 */

import type { EntityResolutionOptions } from '../entities/types.js';
import type { TypeLabel } from '../taxonomy/types.js';

export interface NodeProperty {
  /** Bare slot name, e.g. `has_chemical_formula` */
  property: string;
  /** Primitive value type, e.g. `string`, `uriorcurie` */
  type: string;
  /** Description of the value type, when the model has one */
  description: string | null;
}

/** One already-parsed CSV row: column name -> cell */
export type RowData = Record<string, string | number | boolean | null>;

export type RowValue = RowData[string];

export interface MappedValue {
  csv_column: string;
  value: RowValue;
  property_type: string;
}

/** Property -> mapped cell; `xref` collects every identifier-like column */
export interface MappedData {
  xref?: MappedValue[];
  [property: string]: MappedValue | MappedValue[] | undefined;
}

export interface EnrichOptions extends EntityResolutionOptions {
  /** Column holding the entity name (default: 'name') */
  nameColumn?: string;
}

export interface EnrichmentMissingName {
  error: string;
  row_data: RowData;
}

export interface EnrichmentUnresolved {
  entity: string;
  curie: string | null;
  type: TypeLabel;
  properties: NodeProperty[];
  mapped_data: MappedData;
  error: string;
}

export interface EnrichedNode {
  entity: string;
  curie: string;
  type: TypeLabel;
  all_curies: string[];
  all_types: TypeLabel[];
  valid_properties: NodeProperty[];
  mapped_data: MappedData;
  unmapped_columns: string[];
}

export type EnrichmentResult = EnrichmentMissingName | EnrichmentUnresolved | EnrichedNode;
