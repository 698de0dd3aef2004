/**
 * Entity Resolution Service
 *
 * Chains the upstream services with the type reducer:
 * name -> CURIEs (Name Resolver) -> Biolink types (Node Normalizer) -> most specific types.
 */

import { silentLogger, type Logger } from '../logger.js';
import { collectTypes } from '../services/node-normalizer.js';
import type { TypeReducer } from '../taxonomy/reducer.js';
import type { TypeLabel } from '../taxonomy/types.js';
import type { EntityResolutionOptions, NameLookup, NodeNormalization } from './types.js';

export interface EntityResolverDeps {
  nameResolver: NameLookup;
  nodeNormalizer: NodeNormalization;
  reduce: TypeReducer;
  /** Answer when nothing resolves (default: 'biolink:NamedThing') */
  rootType?: TypeLabel;
  logger?: Logger;
}

export class EntityResolver {
  readonly rootType: TypeLabel;
  private readonly nameResolver: NameLookup;
  private readonly nodeNormalizer: NodeNormalization;
  private readonly reduce: TypeReducer;
  private readonly logger: Logger;

  constructor(deps: EntityResolverDeps) {
    this.nameResolver = deps.nameResolver;
    this.nodeNormalizer = deps.nodeNormalizer;
    this.reduce = deps.reduce;
    this.rootType = deps.rootType ?? 'biolink:NamedThing';
    this.logger = deps.logger ?? silentLogger;
  }

  /**
   * CURIEs for a free-text name, in the Name Resolver's ranking order
   */
  async resolveEntityToCuries(entity: string, options: EntityResolutionOptions = {}): Promise<string[]> {
    const results = await this.nameResolver.lookup({
      string: entity,
      limit: options.limit ?? 5,
      biolinkType: options.biolinkType,
      onlyPrefixes: options.onlyPrefixes,
    });

    const curies: string[] = [];
    for (const result of results) {
      if (result.curie) {
        curies.push(result.curie);
      }
    }
    this.logger.debug(`'${entity}' resolved to ${curies.length} CURIE(s)`);
    return curies;
  }

  /**
   * Unique Biolink types over the normalized nodes of `curies`
   */
  async getTypesForCuries(curies: readonly string[]): Promise<TypeLabel[]> {
    if (curies.length === 0) {
      return [];
    }
    const nodes = await this.nodeNormalizer.getNormalizedNodes(curies, {
      conflate: true,
      drugChemicalConflate: true,
      description: false,
      individualTypes: false,
    });
    return collectTypes(curies, nodes);
  }

  async findMostSpecificTypeForEntity(
    entity: string,
    options: EntityResolutionOptions = {}
  ): Promise<TypeLabel[]> {
    const curies = await this.resolveEntityToCuries(entity, options);
    if (curies.length === 0) {
      return [this.rootType];
    }

    const types = await this.getTypesForCuries(curies);
    if (types.length === 0) {
      return [this.rootType];
    }

    return this.reduce(types);
  }
}
