/**
 * Shared test fixtures
 */

import { readFileSync } from 'node:fs';
import { UnknownTypeError } from '../src/errors.js';
import { BUNDLED_MODEL_PATH, LINKML_TYPES_PATH, buildTaxonomy } from '../src/taxonomy/loader.js';
import type { TaxonomyModel } from '../src/taxonomy/model.js';
import type { AncestorQueryOptions, TaxonomyOracle } from '../src/taxonomy/types.js';

let bundled: TaxonomyModel | null = null;

/** The bundled Biolink subset, parsed once per test file */
export function bundledModel(): TaxonomyModel {
  if (!bundled) {
    bundled = buildTaxonomy(
      readFileSync(BUNDLED_MODEL_PATH, 'utf-8'),
      BUNDLED_MODEL_PATH,
      readFileSync(LINKML_TYPES_PATH, 'utf-8')
    );
  }
  return bundled;
}

/**
 * Hand-built oracle over a parent map keyed by formatted label. Unprefixed
 * labels are read as `biolink:<label>`; labels missing from the map are unknown.
 */
export function createMockOracle(parents: Record<string, string[]>): TaxonomyOracle & { calls: string[] } {
  const calls: string[] = [];
  const canonicalize = (label: string): string => (label.includes(':') ? label : `biolink:${label}`);

  return {
    namespace: 'biolink',
    calls,
    canonicalize,
    ancestors(label: string, options: AncestorQueryOptions = {}): string[] {
      const start = canonicalize(label);
      calls.push(start);
      if (!(start in parents)) {
        throw new UnknownTypeError(label);
      }
      const seen = new Set<string>([start]);
      const result = options.reflexive === false ? [] : [start];
      const queue = [start];
      while (queue.length > 0) {
        const current = queue.shift() ?? '';
        for (const parent of parents[current] ?? []) {
          if (!seen.has(parent)) {
            seen.add(parent);
            result.push(parent);
            queue.push(parent);
          }
        }
      }
      return result;
    },
  };
}

/** Small Biolink-like graph: Disease < DiseaseOrPhenotypicFeature < BiologicalEntity < NamedThing */
export const MOCK_TAXONOMY: Record<string, string[]> = {
  'biolink:Entity': [],
  'biolink:NamedThing': ['biolink:Entity'],
  'biolink:BiologicalEntity': ['biolink:NamedThing', 'biolink:ThingWithTaxon'],
  'biolink:ThingWithTaxon': [],
  'biolink:DiseaseOrPhenotypicFeature': ['biolink:BiologicalEntity'],
  'biolink:Disease': ['biolink:DiseaseOrPhenotypicFeature'],
  'biolink:PhenotypicFeature': ['biolink:DiseaseOrPhenotypicFeature'],
  'biolink:GeneOrGeneProduct': [],
  'biolink:Gene': ['biolink:BiologicalEntity', 'biolink:GeneOrGeneProduct'],
  'biolink:ChemicalEntity': ['biolink:NamedThing'],
  'biolink:SmallMolecule': ['biolink:ChemicalEntity'],
};

export function jsonResponse(body: unknown, init: ResponseInit = {}): Response {
  return new Response(JSON.stringify(body), {
    status: 200,
    headers: { 'Content-Type': 'application/json' },
    ...init,
  });
}

export function createFetchMock() {
  return jest.fn<Promise<Response>, Parameters<typeof fetch>>();
}

/** Request URL of the n-th fetch call */
export function requestedUrl(fetchMock: ReturnType<typeof createFetchMock>, call = 0): string {
  const input = fetchMock.mock.calls[call][0];
  return typeof input === 'string' ? input : input instanceof URL ? input.toString() : input.url;
}
