/**
 * Tabular storage capability behind the ledger store.
 *
 * A table is header-described: the first row names the columns and fixes
 * their order for every row after it. Tables only ever grow.
 */

export interface LedgerTableSnapshot {
  header: string[];
  rows: string[][];
}

export interface LedgerTable {
  /**
   * Read the header and every data row. A missing table is created with
   * `defaultHeader`.
   */
  load(defaultHeader: readonly string[]): Promise<LedgerTableSnapshot>;

  /**
   * Append one row. Must either write the whole row or throw.
   */
  appendRow(values: readonly string[]): Promise<void>;
}

/**
 * In-process table for tests and ephemeral runs
 */
export class MemoryLedgerTable implements LedgerTable {
  private header: string[] | null;
  private rows: string[][];

  constructor(initial?: LedgerTableSnapshot) {
    this.header = initial ? [...initial.header] : null;
    this.rows = initial ? initial.rows.map((row) => [...row]) : [];
  }

  async load(defaultHeader: readonly string[]): Promise<LedgerTableSnapshot> {
    if (!this.header) {
      this.header = [...defaultHeader];
    }
    return {
      header: [...this.header],
      rows: this.rows.map((row) => [...row]),
    };
  }

  async appendRow(values: readonly string[]): Promise<void> {
    this.rows.push([...values]);
  }

  /**
   * Raw rows as written, for assertions
   */
  dump(): LedgerTableSnapshot {
    return {
      header: this.header ? [...this.header] : [],
      rows: this.rows.map((row) => [...row]),
    };
  }
}
