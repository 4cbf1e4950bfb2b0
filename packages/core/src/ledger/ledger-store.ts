/**
 * Ledger Store
 *
 * Append-only, time-ordered collection of committed entries on top of a
 * tabular store. The store is the only writer: it assigns ids, keeps
 * timestamps non-decreasing (stored rows included) and serializes appends.
 */

import { PersistenceError } from './ledger-errors.js';
import { decodeRow, encodeRow, indexColumns, type ColumnIndex } from './ledger-rows.js';
import type { LedgerTable } from './ledger-table.js';
import { LEDGER_COLUMNS, type LedgerEntry, type LedgerEntryDraft } from './ledger-types.js';
import { toMajor } from './money.js';

export interface InvalidRowIssue {
  /**
   * 1-based data row number (the header is row 0)
   */
  rowNumber: number;
  values: string[];
  reason: string;
}

export interface LedgerStoreOptions {
  /**
   * Called for every stored row that cannot be read back as an entry.
   * Such rows are left out of the ledger.
   */
  onInvalidRow?: (issue: InvalidRowIssue) => void;
}

interface TableLayout {
  columns: ColumnIndex;
  width: number;
}

export class LedgerStore {
  private entries: LedgerEntry[] = [];
  private layout: TableLayout | null = null;
  private loading: Promise<TableLayout> | null = null;
  private tail: Promise<unknown> = Promise.resolve();

  constructor(
    private table: LedgerTable,
    private options: LedgerStoreOptions = {}
  ) {}

  /**
   * Commit a draft. Resolves with the committed entry once its row is
   * written; on PersistenceError the ledger is left as it was.
   */
  append(draft: LedgerEntryDraft): Promise<LedgerEntry> {
    return this.exclusive(async () => {
      const layout = await this.ensureLoaded();
      const previous = this.entries[this.entries.length - 1];
      const entry = freezeEntry(clampAfter(previous, draft), (previous?.id ?? 0) + 1);

      try {
        await this.table.appendRow(encodeRow(entry, layout.columns, layout.width));
      } catch (error) {
        if (error instanceof PersistenceError) {
          throw error;
        }
        throw new PersistenceError('Failed to append ledger entry', { cause: error });
      }

      this.entries = [...this.entries, entry];
      return entry;
    });
  }

  /**
   * Every entry in append order
   */
  async readAll(): Promise<readonly LedgerEntry[]> {
    await this.ensureLoaded();
    return this.entries;
  }

  /**
   * Entries with `start <= timestamp <= end`, in append order
   */
  async readRange(start: Date, end: Date): Promise<readonly LedgerEntry[]> {
    const entries = await this.readAll();
    const from = start.getTime();
    const to = end.getTime();
    if (from > to) {
      return [];
    }
    return entries.filter((entry) => {
      const time = entry.timestamp.getTime();
      return time >= from && time <= to;
    });
  }

  private ensureLoaded(): Promise<TableLayout> {
    if (this.layout) {
      return Promise.resolve(this.layout);
    }
    if (!this.loading) {
      this.loading = this.load().catch((error: unknown) => {
        this.loading = null;
        throw error;
      });
    }
    return this.loading;
  }

  private async load(): Promise<TableLayout> {
    const snapshot = await this.table.load(LEDGER_COLUMNS);
    const columns = indexColumns(snapshot.header);
    const entries: LedgerEntry[] = [];

    snapshot.rows.forEach((values, index) => {
      const decoded = decodeRow(values, columns);
      if (!decoded.ok) {
        this.options.onInvalidRow?.({ rowNumber: index + 1, values, reason: decoded.reason });
        return;
      }
      const previous = entries[entries.length - 1];
      entries.push(freezeEntry(clampAfter(previous, decoded.draft), entries.length + 1));
    });

    const layout = { columns, width: snapshot.header.length };
    this.entries = entries;
    this.layout = layout;
    return layout;
  }

  /**
   * Run `task` after every previously queued append has settled
   */
  private exclusive<T>(task: () => Promise<T>): Promise<T> {
    const run = this.tail.then(task, task);
    // The queue only tracks completion; `run` carries the outcome to the caller.
    this.tail = run.then(
      () => undefined,
      () => undefined
    );
    return run;
  }
}

/**
 * Hold a draft's timestamp at its predecessor's when it would go backwards
 */
function clampAfter(previous: LedgerEntry | undefined, draft: LedgerEntryDraft): LedgerEntryDraft {
  if (previous && draft.timestamp.getTime() < previous.timestamp.getTime()) {
    return { ...draft, timestamp: previous.timestamp };
  }
  return draft;
}

function freezeEntry(draft: LedgerEntryDraft, id: number): LedgerEntry {
  return Object.freeze({
    id,
    timestamp: new Date(draft.timestamp.getTime()),
    description: draft.description,
    category: draft.category,
    amountMinor: draft.amountMinor,
    amount: toMajor(draft.amountMinor),
    type: draft.type,
  });
}
