/**
 * Taxonomy Domain Errors
 */

export class TaxonomyError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'TaxonomyError';
  }
}

export class UnknownCategoryLabelError extends TaxonomyError {
  constructor(label: string) {
    super(`Synonyms reference an unknown category label: ${label}`);
    this.name = 'UnknownCategoryLabelError';
  }
}

export class SynonymConflictError extends TaxonomyError {
  constructor(term: string, existing: string, requested: string) {
    super(`"${term}" already resolves to ${existing} and cannot be remapped to ${requested}`);
    this.name = 'SynonymConflictError';
  }
}

export class InvalidTaxonomyError extends TaxonomyError {
  constructor(message: string) {
    super(message);
    this.name = 'InvalidTaxonomyError';
  }
}
