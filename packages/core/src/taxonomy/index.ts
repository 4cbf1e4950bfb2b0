/**
 * Category Taxonomy
 *
 * Exports taxonomy construction, resolution, errors and types.
 */

export {
  createTaxonomy,
  createDefaultTaxonomy,
  extendTaxonomy,
  resolveCategory,
  hasCategory,
  foldCategory,
} from './category-taxonomy.js';

export { TaxonomyDefinitionSchema, UNCATEGORIZED } from './taxonomy-types.js';
export type {
  CategoryTaxonomy,
  CategoryResolution,
  TaxonomyDefinition,
  TaxonomyDefinitionInput,
} from './taxonomy-types.js';

export {
  TaxonomyError,
  UnknownCategoryLabelError,
  SynonymConflictError,
  InvalidTaxonomyError,
} from './taxonomy-errors.js';
