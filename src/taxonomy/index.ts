/**
 * Taxonomy Module
 */

export { TaxonomyModel } from './model.js';
export type { TaxonomyModelOptions, TaxonomyStats } from './model.js';
export { findMostSpecificTypes, createTypeReducer, toLabelList } from './reducer.js';
export type { ReducerOptions, TypeReducer, TypeLabelInput } from './reducer.js';
export {
  loadTaxonomy,
  getTaxonomy,
  resetTaxonomy,
  buildTaxonomy,
  parseSchema,
  resolveTaxonomySource,
  BUNDLED_MODEL_PATH,
} from './loader.js';
export type { TaxonomySource, LoadTaxonomyOptions } from './loader.js';
export { splitPrefix, toModelName, toClassName, toSlotName, syntacticCanonical } from './labels.js';
export type {
  TypeLabel,
  ElementKind,
  ElementDefinition,
  AncestorQueryOptions,
  FormatOptions,
  TaxonomyOracle,
} from './types.js';
