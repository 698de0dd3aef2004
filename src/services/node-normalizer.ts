/**
 * Node Normalization Service client
 *
 * CURIEs -> preferred identifier, equivalent identifiers and Biolink types,
 * optionally with gene/protein and drug/chemical conflation.
 */

import { ValidationError } from '../errors.js';
import { ServiceClient, booleanParam, type ServiceClientOptions } from './client.js';
import {
  normalizedNodesResponseSchema,
  type NormalizationFlags,
  type NormalizedNodesResponse,
  type QueryParams,
} from './types.js';

export const DEFAULT_NODE_NORMALIZER_URL = 'https://nodenormalization-sri.renci.org';

const MAX_EQUIVALENT_IDS = 5;

type ResolvedFlags = Required<NormalizationFlags>;

function resolveFlags(flags: NormalizationFlags): ResolvedFlags {
  return {
    conflate: flags.conflate ?? true,
    drugChemicalConflate: flags.drugChemicalConflate ?? true,
    description: flags.description ?? false,
    individualTypes: flags.individualTypes ?? false,
  };
}

export class NodeNormalizerClient extends ServiceClient {
  constructor(baseUrl: string = DEFAULT_NODE_NORMALIZER_URL, options: ServiceClientOptions = {}) {
    super('Node Normalizer', baseUrl, options);
  }

  static buildParams(curies: readonly string[], flags: NormalizationFlags = {}): QueryParams {
    const resolved = resolveFlags(flags);
    return [
      ...curies.map((curie): [string, string] => ['curie', curie]),
      ['conflate', booleanParam(resolved.conflate)],
      ['drug_chemical_conflate', booleanParam(resolved.drugChemicalConflate)],
      ['description', booleanParam(resolved.description)],
      ['individual_types', booleanParam(resolved.individualTypes)],
    ];
  }

  async getNormalizedNodes(
    curies: readonly string[],
    flags: NormalizationFlags = {}
  ): Promise<NormalizedNodesResponse> {
    if (curies.length === 0) {
      throw new ValidationError('No CURIEs provided');
    }
    const { data } = await this.get(
      '/get_normalized_nodes',
      NodeNormalizerClient.buildParams(curies, flags),
      normalizedNodesResponseSchema
    );
    return data;
  }
}

function typeList(value: string | string[] | null | undefined): string[] {
  if (value === null || value === undefined) {
    return [];
  }
  return typeof value === 'string' ? [value] : value;
}

/**
 * Human-readable report of a normalization call, one block per requested CURIE
 * in request order.
 */
export function formatNormalizedNodes(
  curies: readonly string[],
  results: NormalizedNodesResponse,
  flags: NormalizationFlags = {}
): string {
  const resolved = resolveFlags(flags);

  const settings: string[] = [];
  if (resolved.conflate) settings.push('gene/protein conflation: ON');
  if (resolved.drugChemicalConflate) settings.push('drug/chemical conflation: ON');
  if (resolved.description) settings.push('descriptions: ON');
  if (resolved.individualTypes) settings.push('individual types: ON');
  const settingsText = settings.length > 0 ? ` (${settings.join('; ')})` : '';

  let text = `Normalized ${curies.length} CURIE(s)${settingsText}:\n\n`;

  for (const curie of curies) {
    if (!Object.hasOwn(results, curie)) {
      text += `**${curie}:** Not found in response\n\n`;
      continue;
    }
    const node = results[curie];
    if (!node) {
      text += `**${curie}:** Not found\n\n`;
      continue;
    }

    const normalizedId = node.id?.identifier ?? 'Unknown';
    const label = node.id?.label ?? '';

    text += `**${curie}** → **${normalizedId}**`;
    if (label) {
      text += ` (${label})`;
    }
    text += '\n';

    const description = node.id?.description;
    if (resolved.description && description) {
      text += `   Description: ${description}\n`;
    }

    const equivalents = node.equivalent_identifiers ?? [];
    if (equivalents.length > 1) {
      const otherIds = equivalents.map((eq) => eq.identifier).filter((id) => id !== normalizedId);
      if (otherIds.length > 0) {
        text += `   Equivalent IDs: ${otherIds.slice(0, MAX_EQUIVALENT_IDS).join(', ')}`;
        if (otherIds.length > MAX_EQUIVALENT_IDS) {
          text += ` (+${otherIds.length - MAX_EQUIVALENT_IDS} more)`;
        }
        text += '\n';
      }
    }

    if (resolved.individualTypes && equivalents.length > 0) {
      const typesFound = new Set(equivalents.flatMap((eq) => typeList(eq.type)));
      if (typesFound.size > 0) {
        text += `   Types: ${[...typesFound].sort().join(', ')}\n`;
      }
    }

    text += '\n';
  }

  return text;
}

/** Unique Biolink types over the nodes of `curies`, in first-seen order */
export function collectTypes(curies: readonly string[], results: NormalizedNodesResponse): string[] {
  const types = new Set<string>();
  for (const curie of curies) {
    const node = Object.hasOwn(results, curie) ? results[curie] : null;
    for (const type of typeList(node?.type)) {
      types.add(type);
    }
  }
  return [...types];
}
