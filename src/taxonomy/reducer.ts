/**
 * Most-specific-type reduction
 *
 * Given candidate type labels, keep those that are not an ancestor of any
 * other candidate. Every tool that narrows a set of types goes through here.
 */

import { UnknownTypeError } from '../errors.js';
import type { Logger } from '../logger.js';
import { withPrefix } from './labels.js';
import type { TaxonomyOracle, TypeLabel } from './types.js';

export type TypeLabelInput = TypeLabel | readonly TypeLabel[];

export interface ReducerOptions {
  /** Result for an empty candidate list (default: `<namespace>:NamedThing`) */
  rootType?: TypeLabel;
  /** Receives a warning when the frontier comes out empty */
  logger?: Pick<Logger, 'warn'>;
}

export type TypeReducer = (candidates: TypeLabelInput) => TypeLabel[];

export function toLabelList(input: TypeLabelInput): TypeLabel[] {
  return typeof input === 'string' ? [input] : [...input];
}

/**
 * Canonical reflexive, mixin-inclusive ancestor set. Unknown labels have
 * no ancestors: they are never excluded by, and never exclude, another candidate.
 */
function ancestorSet(oracle: TaxonomyOracle, canonical: TypeLabel): ReadonlySet<TypeLabel> {
  try {
    const ancestors = oracle.ancestors(canonical, { reflexive: true, mixins: true, formatted: true });
    return new Set(ancestors.map((label) => oracle.canonicalize(label)));
  } catch (error) {
    if (error instanceof UnknownTypeError) {
      return new Set();
    }
    throw error;
  }
}

function compareCodeUnits(a: string, b: string): number {
  if (a < b) return -1;
  if (a > b) return 1;
  return 0;
}

export function findMostSpecificTypes(
  input: TypeLabelInput,
  oracle: TaxonomyOracle,
  options: ReducerOptions = {}
): TypeLabel[] {
  const candidates = toLabelList(input);

  if (candidates.length === 0) {
    return [options.rootType ?? withPrefix(oracle.namespace, 'NamedThing')];
  }

  // canonical form -> spelling of its first occurrence
  const spellings = new Map<TypeLabel, TypeLabel>();
  for (const candidate of candidates) {
    const canonical = oracle.canonicalize(candidate);
    if (!spellings.has(canonical)) {
      spellings.set(canonical, candidate);
    }
  }

  const canonicals = [...spellings.keys()];
  const ancestry = new Map(canonicals.map((c) => [c, ancestorSet(oracle, c)] as const));

  const frontier = canonicals.filter(
    (candidate) => !canonicals.some((other) => other !== candidate && ancestry.get(other)?.has(candidate))
  );

  if (frontier.length === 0) {
    const fallback = candidates[candidates.length - 1];
    options.logger?.warn(
      `No most-specific type among [${canonicals.join(', ')}]; ancestor data is inconsistent, falling back to '${fallback}'`
    );
    return [fallback];
  }

  return frontier.sort(compareCodeUnits).map((canonical) => spellings.get(canonical) ?? canonical);
}

export function createTypeReducer(oracle: TaxonomyOracle, options: ReducerOptions = {}): TypeReducer {
  return (candidates) => findMostSpecificTypes(candidates, oracle, options);
}
