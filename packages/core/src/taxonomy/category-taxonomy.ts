/**
 * Category Taxonomy
 *
 * Builds immutable, versioned taxonomy snapshots and resolves free-text
 * category guesses against them. Snapshots are passed explicitly to the
 * normalizer; there is no ambient "current" taxonomy.
 */

import defaultTaxonomyData from './default-taxonomy.json' with { type: 'json' };
import {
  InvalidTaxonomyError,
  SynonymConflictError,
  UnknownCategoryLabelError,
} from './taxonomy-errors.js';
import {
  TaxonomyDefinitionSchema,
  UNCATEGORIZED,
  type CategoryResolution,
  type CategoryTaxonomy,
  type TaxonomyDefinition,
  type TaxonomyDefinitionInput,
} from './taxonomy-types.js';

/**
 * Case-fold a category name or synonym for lookup
 */
export function foldCategory(value: string): string {
  return value.normalize('NFKC').trim().replace(/\s+/g, ' ').toLowerCase();
}

/**
 * Create a taxonomy snapshot from a definition
 *
 * @throws InvalidTaxonomyError if the definition does not match the schema
 * @throws UnknownCategoryLabelError if synonyms point at a label that is not defined
 * @throws SynonymConflictError if a term would resolve to two labels
 */
export function createTaxonomy(input: TaxonomyDefinitionInput, version = 1): CategoryTaxonomy {
  const definition = parseDefinition(input);
  return buildTaxonomy(definition.labels, Object.entries(definition.synonyms), version);
}

/**
 * The taxonomy shipped with the ledger
 */
export function createDefaultTaxonomy(): CategoryTaxonomy {
  return createTaxonomy(defaultTaxonomyData);
}

/**
 * Grow a taxonomy. Existing labels and synonyms keep resolving exactly as
 * before; the result carries the next version number, or is the same
 * snapshot when nothing new was added.
 */
export function extendTaxonomy(
  taxonomy: CategoryTaxonomy,
  additions: TaxonomyDefinitionInput
): CategoryTaxonomy {
  const extra = parseDefinition(additions);

  // Existing synonyms are claimed first so conflicts are reported against them
  const next = buildTaxonomy(
    [...taxonomy.labels, ...extra.labels],
    [...Object.entries(taxonomy.synonyms), ...Object.entries(extra.synonyms)],
    taxonomy.version + 1
  );

  const unchanged =
    next.labels.length === taxonomy.labels.length && next.lookup.size === taxonomy.lookup.size;
  return unchanged ? taxonomy : next;
}

/**
 * Resolve an untrusted category value to a canonical label. Never fails:
 * anything unknown becomes `Uncategorized`.
 */
export function resolveCategory(taxonomy: CategoryTaxonomy, raw: unknown): CategoryResolution {
  if (typeof raw !== 'string') {
    return { category: UNCATEGORIZED, resolved: false };
  }

  const key = foldCategory(raw);
  if (!key) {
    return { category: UNCATEGORIZED, resolved: false };
  }

  // Plural fallback: "utilities" -> "utility"
  const match =
    taxonomy.lookup.get(key) ??
    (key.endsWith('s') ? taxonomy.lookup.get(key.slice(0, -1)) : undefined);
  if (match) {
    return { category: match, resolved: true };
  }

  return { category: UNCATEGORIZED, resolved: false };
}

export function hasCategory(taxonomy: CategoryTaxonomy, label: string): boolean {
  return taxonomy.labels.includes(label);
}

function parseDefinition(input: TaxonomyDefinitionInput): TaxonomyDefinition {
  const result = TaxonomyDefinitionSchema.safeParse(input);

  if (!result.success) {
    const errors = result.error.errors.map((e) => `${e.path.join('.')}: ${e.message}`).join(', ');
    throw new InvalidTaxonomyError(`Invalid taxonomy definition: ${errors}`);
  }

  return result.data;
}

function buildTaxonomy(
  definedLabels: readonly string[],
  synonymGroups: ReadonlyArray<readonly [string, readonly string[]]>,
  version: number
): CategoryTaxonomy {
  const labels: string[] = [];
  const labelByFold = new Map<string, string>([[foldCategory(UNCATEGORIZED), UNCATEGORIZED]]);

  for (const label of definedLabels) {
    const key = foldCategory(label);
    if (!labelByFold.has(key)) {
      labelByFold.set(key, label);
      labels.push(label);
    }
  }
  labels.push(UNCATEGORIZED);

  const lookup = new Map(labelByFold);
  const synonyms: Record<string, string[]> = {};

  for (const [label, terms] of synonymGroups) {
    const canonical = labelByFold.get(foldCategory(label));
    if (!canonical) {
      throw new UnknownCategoryLabelError(label);
    }

    const known = synonyms[canonical] ?? [];
    for (const term of terms) {
      const key = foldCategory(term);
      const existing = lookup.get(key);
      if (existing && existing !== canonical) {
        throw new SynonymConflictError(term, existing, canonical);
      }
      lookup.set(key, canonical);
      if (!known.some((candidate) => foldCategory(candidate) === key)) {
        known.push(term);
      }
    }
    synonyms[canonical] = known;
  }

  return Object.freeze({
    version,
    labels: Object.freeze(labels),
    lookup,
    synonyms: Object.freeze(synonyms),
  });
}
