/**
 * CSV row enrichment
 *
 * Resolves the entity named in a row, picks its most specific Biolink type
 * and maps the remaining columns onto that type's node properties.
 */

import { UnknownTypeError } from '../errors.js';
import { silentLogger, type Logger } from '../logger.js';
import type { EntityResolver } from '../entities/entity-resolver.js';
import type { TaxonomyModel } from '../taxonomy/model.js';
import type { TypeReducer } from '../taxonomy/reducer.js';
import { getNodePropertiesForClass } from './node-properties.js';
import type {
  EnrichOptions,
  EnrichmentResult,
  MappedData,
  MappedValue,
  NodeProperty,
  RowData,
} from './types.js';

/** `CAS ID` -> `cas_id`, `Full-Name` -> `full_name` */
export function normalizeColumnName(column: string): string {
  return column.toLowerCase().replace(/ /g, '_').replace(/-/g, '_');
}

function mappedColumns(mapped: MappedData): Set<string> {
  const columns = new Set<string>();
  for (const entry of Object.values(mapped)) {
    if (entry === undefined) continue;
    for (const value of Array.isArray(entry) ? entry : [entry]) {
      columns.add(value.csv_column);
    }
  }
  return columns;
}

/**
 * Map row cells to properties. An exact (normalized) column match wins;
 * otherwise a column mentioning `description` fills `description`, and
 * identifier-like columns are collected under `xref`.
 */
export function mapRowToProperties(
  row: RowData,
  properties: readonly NodeProperty[],
  nameColumn: string
): MappedData {
  const typeOf = new Map(properties.map((p) => [p.property, p.type]));
  const mapped: MappedData = {};

  for (const [column, value] of Object.entries(row)) {
    if (column === nameColumn || !value) {
      continue;
    }

    const normalized = normalizeColumnName(column);
    const directType = typeOf.get(normalized);

    if (directType !== undefined && normalized === 'xref') {
      mapped.xref = [...(mapped.xref ?? []), { csv_column: column, value, property_type: directType }];
    } else if (directType !== undefined) {
      mapped[normalized] = { csv_column: column, value, property_type: directType };
    } else if (normalized.includes('description') && typeOf.has('description')) {
      mapped.description = { csv_column: column, value, property_type: typeOf.get('description') ?? 'unknown' };
    } else if ((normalized.includes('id') || normalized.includes('identifier')) && typeOf.has('xref')) {
      const entry: MappedValue = { csv_column: column, value, property_type: 'string' };
      mapped.xref = [...(mapped.xref ?? []), entry];
    }
  }

  return mapped;
}

export interface NodeEnricherDeps {
  model: TaxonomyModel;
  resolver: EntityResolver;
  reduce: TypeReducer;
  logger?: Logger;
}

export class NodeEnricher {
  private readonly model: TaxonomyModel;
  private readonly resolver: EntityResolver;
  private readonly reduce: TypeReducer;
  private readonly logger: Logger;

  constructor(deps: NodeEnricherDeps) {
    this.model = deps.model;
    this.resolver = deps.resolver;
    this.reduce = deps.reduce;
    this.logger = deps.logger ?? silentLogger;
  }

  getNodePropertiesForClass(className: string): NodeProperty[] {
    return getNodePropertiesForClass(this.model, className);
  }

  /** Properties of the chosen type; empty when the model does not know the type */
  private propertiesForType(type: string): NodeProperty[] {
    try {
      return this.getNodePropertiesForClass(type);
    } catch (error) {
      if (error instanceof UnknownTypeError) {
        this.logger.warn(`Type '${type}' is not in taxonomy ${this.model.version}; no properties to map`);
        return [];
      }
      throw error;
    }
  }

  async enrichNodeFromRow(row: RowData, options: EnrichOptions = {}): Promise<EnrichmentResult> {
    const { nameColumn = 'name', limit = 1, biolinkType, onlyPrefixes } = options;
    const rootType = this.resolver.rootType;

    const cell = row[nameColumn];
    if (!cell) {
      return { error: `No value found in column '${nameColumn}'`, row_data: row };
    }
    const entity = String(cell);

    const curies = await this.resolver.resolveEntityToCuries(entity, { limit, biolinkType, onlyPrefixes });
    if (curies.length === 0) {
      return { entity, curie: null, type: rootType, properties: [], mapped_data: {}, error: 'No CURIEs found' };
    }

    const curie = curies[0];
    const types = await this.resolver.getTypesForCuries([curie]);
    if (types.length === 0) {
      return { entity, curie, type: rootType, properties: [], mapped_data: {}, error: 'No types found' };
    }

    const [type = rootType] = this.reduce(types);
    const properties = this.propertiesForType(type);
    const mapped = mapRowToProperties(row, properties, nameColumn);
    const used = mappedColumns(mapped);

    return {
      entity,
      curie,
      type,
      all_curies: curies,
      all_types: types,
      valid_properties: properties,
      mapped_data: mapped,
      unmapped_columns: Object.keys(row).filter((column) => column !== nameColumn && !used.has(column)),
    };
  }
}
