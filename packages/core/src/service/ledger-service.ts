/**
 * Ledger Service
 *
 * Boundary operations of the ledger: log a free-text message, and read the
 * summary, breakdown and entries. Every failure path comes back as a typed
 * result; the ledger changes only on a committed append.
 */

import { breakdown } from '../aggregation/breakdown.js';
import { summary } from '../aggregation/summary.js';
import type { BreakdownView, SummaryView } from '../aggregation/aggregation-types.js';
import type { LedgerEventEmitter } from '../events/ledger-events.js';
import type { CandidateExtractor } from '../extraction/extraction-types.js';
import { PersistenceError } from '../ledger/ledger-errors.js';
import type { LedgerStore } from '../ledger/ledger-store.js';
import type { LedgerEntry } from '../ledger/ledger-types.js';
import { normalize } from '../normalization/normalizer.js';
import type { RejectionReason } from '../normalization/normalization-types.js';
import { extendTaxonomy } from '../taxonomy/category-taxonomy.js';
import type { CategoryTaxonomy, TaxonomyDefinitionInput } from '../taxonomy/taxonomy-types.js';
import { UNCATEGORIZED } from '../taxonomy/taxonomy-types.js';
import {
  DEFAULT_EXTRACTION_TIMEOUT_MS,
  type LedgerServiceOptions,
  type ListEntriesParams,
  type LogEntryResult,
} from './ledger-service-types.js';

// Bounds of the ECMAScript time value range
const EARLIEST = new Date(-8.64e15);
const LATEST = new Date(8.64e15);

export class LedgerService {
  private taxonomy: CategoryTaxonomy;
  private readonly clock: () => Date;

  constructor(
    private extractor: CandidateExtractor,
    private store: LedgerStore,
    taxonomy: CategoryTaxonomy,
    private events: Pick<LedgerEventEmitter, 'emit'>,
    private options: LedgerServiceOptions = {}
  ) {
    this.taxonomy = taxonomy;
    this.clock = options.clock ?? (() => new Date());
  }

  /**
   * Log one free-text message
   *
   * Flow:
   * - Blank text is rejected without calling the extractor
   * - The extractor runs under a timeout and outside the store's append lock
   * - The candidate is normalized against the current taxonomy snapshot
   * - The draft is appended; a storage error leaves the ledger untouched
   *
   * @throws whatever the store throws that is not a PersistenceError
   */
  async logEntry(rawText: string): Promise<LogEntryResult> {
    if (!rawText.trim()) {
      return this.reject({ code: 'EmptyDescription', message: 'Message is empty' });
    }

    const taxonomy = this.taxonomy;
    const extraction = await this.extractor.extract(rawText, {
      signal: AbortSignal.timeout(
        this.options.extractionTimeoutMs ?? DEFAULT_EXTRACTION_TIMEOUT_MS
      ),
      categoryHints: taxonomy.labels.filter((label) => label !== UNCATEGORIZED),
    });

    if (!extraction.ok) {
      this.events.emit({
        type: 'extraction.failed',
        metadata: {
          kind: extraction.failure.kind,
          message: extraction.failure.message,
          ...(extraction.failure.status !== undefined && { status: extraction.failure.status }),
        },
      });
      return { status: 'extraction_failed', failure: extraction.failure };
    }

    const normalized = normalize(extraction.candidate, {
      now: this.clock(),
      rawText,
      taxonomy,
      ...(this.options.maxDescriptionLength !== undefined && {
        maxDescriptionLength: this.options.maxDescriptionLength,
      }),
    });

    if (!normalized.ok) {
      return this.reject(normalized.reason);
    }

    let entry: LedgerEntry;
    try {
      entry = await this.store.append(normalized.entry);
    } catch (error) {
      if (error instanceof PersistenceError) {
        this.events.emit({ type: 'persistence.failed', metadata: { message: error.message } });
        return { status: 'persistence_failed', error: { message: error.message } };
      }
      throw error;
    }

    this.events.emit({
      type: 'entry.committed',
      metadata: {
        entryId: entry.id,
        entryType: entry.type,
        category: entry.category,
        amount: entry.amount,
        warnings: normalized.warnings,
      },
    });

    return { status: 'committed', entry, warnings: normalized.warnings };
  }

  async getSummary(): Promise<SummaryView> {
    return summary(await this.store.readAll());
  }

  async getBreakdown(): Promise<BreakdownView> {
    return breakdown(await this.store.readAll());
  }

  /**
   * Entries in append order, optionally limited to an inclusive time range
   */
  async listEntries(params: ListEntriesParams = {}): Promise<readonly LedgerEntry[]> {
    const { from, to } = params;
    if (!from && !to) {
      return this.store.readAll();
    }
    return this.store.readRange(from ?? EARLIEST, to ?? LATEST);
  }

  getTaxonomy(): CategoryTaxonomy {
    return this.taxonomy;
  }

  /**
   * Grow the taxonomy used for future entries. Committed entries keep the
   * label they were stored with.
   *
   * @throws TaxonomyError if the additions conflict with existing terms
   */
  extendTaxonomy(additions: TaxonomyDefinitionInput): CategoryTaxonomy {
    const next = extendTaxonomy(this.taxonomy, additions);
    if (next !== this.taxonomy) {
      this.taxonomy = next;
      this.events.emit({
        type: 'taxonomy.extended',
        metadata: { version: next.version, labelCount: next.labels.length },
      });
    }
    return next;
  }

  private reject(reason: RejectionReason): LogEntryResult {
    this.events.emit({
      type: 'entry.rejected',
      metadata: { code: reason.code, message: reason.message },
    });
    return { status: 'rejected', reason };
  }
}
