/**
 * Category Taxonomy Types
 */

import { z } from 'zod';

/**
 * Reserved label for anything the taxonomy cannot resolve
 */
export const UNCATEGORIZED = 'Uncategorized';

/**
 * Zod schema for taxonomy definitions and additions: canonical labels plus
 * synonyms keyed by the label they resolve to
 */
export const TaxonomyDefinitionSchema = z
  .object({
    labels: z.array(z.string().trim().min(1).max(64)).default([]),
    synonyms: z.record(z.string().trim().min(1), z.array(z.string().trim().min(1).max(64))).default({}),
  })
  .strict();

export type TaxonomyDefinition = z.infer<typeof TaxonomyDefinitionSchema>;
export type TaxonomyDefinitionInput = z.input<typeof TaxonomyDefinitionSchema>;

/**
 * Immutable taxonomy snapshot. A new version is produced whenever labels or
 * synonyms are added; nothing is ever removed.
 */
export interface CategoryTaxonomy {
  readonly version: number;
  /**
   * Canonical labels in definition order, `Uncategorized` included
   */
  readonly labels: readonly string[];
  /**
   * Folded label or synonym -> canonical label
   */
  readonly lookup: ReadonlyMap<string, string>;
  /**
   * Synonyms as defined, keyed by canonical label
   */
  readonly synonyms: Readonly<Record<string, readonly string[]>>;
}

export interface CategoryResolution {
  category: string;
  resolved: boolean;
}
