/**
 * Types for the type taxonomy (Biolink model)
 */

/**
 * Identifier of a class, slot or type in the taxonomy.
 * Accepted as a model name (`named thing`), bare (`NamedThing`, `related_to`)
 * or formatted (`biolink:NamedThing`).
 */
export type TypeLabel = string;

export type ElementKind = 'class' | 'slot' | 'type';

export interface AncestorQueryOptions {
  /** Include the queried element itself (default: true) */
  reflexive?: boolean;
  /** Follow mixin parents as well as is_a (default: true) */
  mixins?: boolean;
  /** Return namespaced labels such as `biolink:Gene` (default: false) */
  formatted?: boolean;
}

export interface FormatOptions {
  formatted?: boolean;
}

/**
 * The query contract the reducer depends on. TaxonomyModel implements it;
 * tests plug in small hand-built graphs.
 */
export interface TaxonomyOracle {
  /** Prefix used for formatted labels, e.g. `biolink` */
  readonly namespace: string;
  /**
   * Ancestor set of a label, ordered breadth-first from the element itself.
   * @throws UnknownTypeError when the label is not part of the taxonomy
   */
  ancestors(label: TypeLabel, options?: AncestorQueryOptions): TypeLabel[];
  /** Formatted form used for every comparison between labels */
  canonicalize(label: TypeLabel): TypeLabel;
}

/** A class, slot or type definition as read from the model, extra keys passed through */
export interface ElementDefinition {
  name: string;
  element_type: ElementKind;
  is_a?: string;
  mixins?: string[];
  mixin?: boolean;
  abstract?: boolean;
  description?: string;
  domain?: string;
  range?: string;
  multivalued?: boolean;
  typeof?: string;
  slots?: string[];
  exact_mappings?: string[];
  close_mappings?: string[];
  narrow_mappings?: string[];
  broad_mappings?: string[];
  related_mappings?: string[];
  [key: string]: unknown;
}
