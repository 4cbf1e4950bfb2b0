import type { CategoryTaxonomy, LedgerEntry } from '@tally/core';
import type { CategoriesResponse, EntryResponse } from '@tally/types';

export function toEntryResponse(entry: LedgerEntry): EntryResponse {
  return {
    id: entry.id,
    timestamp: entry.timestamp.toISOString(),
    description: entry.description,
    category: entry.category,
    amount: entry.amount,
    type: entry.type,
  };
}

export function toCategoriesResponse(taxonomy: CategoryTaxonomy): CategoriesResponse {
  const synonyms: Record<string, string[]> = {};
  for (const [label, terms] of Object.entries(taxonomy.synonyms)) {
    synonyms[label] = [...terms];
  }
  return { version: taxonomy.version, labels: [...taxonomy.labels], synonyms };
}
