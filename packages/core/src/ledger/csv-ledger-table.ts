/**
 * CSV file table
 *
 * Stores the ledger as a header-described CSV file. Rows are appended with a
 * single write call; the file is never rewritten. A file whose last record
 * has no trailing line break gets one before the first appended row.
 */

import { appendFile, mkdir, readFile, writeFile } from 'node:fs/promises';
import { dirname } from 'node:path';
import { encodeCsvRecord, parseCsv } from './csv.js';
import type { LedgerTable, LedgerTableSnapshot } from './ledger-table.js';
import { PersistenceError } from './ledger-errors.js';

export class CsvLedgerTable implements LedgerTable {
  // False when the file's last record has no line break after it
  private endsWithLineBreak = true;

  constructor(private filePath: string) {}

  async load(defaultHeader: readonly string[]): Promise<LedgerTableSnapshot> {
    let text: string;
    try {
      text = await readFile(this.filePath, 'utf8');
    } catch (error) {
      if (isMissingFile(error)) {
        await this.create(defaultHeader);
        this.endsWithLineBreak = true;
        return { header: [...defaultHeader], rows: [] };
      }
      throw new PersistenceError(`Failed to read ledger file ${this.filePath}`, { cause: error });
    }

    let parsed: string[][];
    try {
      parsed = parseCsv(text);
    } catch (error) {
      throw new PersistenceError(`Ledger file ${this.filePath} is not valid CSV`, { cause: error });
    }

    const [header, ...rows] = parsed;
    if (!header) {
      await this.write(encodeCsvRecord(defaultHeader), 'Failed to initialise ledger file');
      this.endsWithLineBreak = true;
      return { header: [...defaultHeader], rows: [] };
    }

    this.endsWithLineBreak = /[\r\n]$/.test(text);

    return { header: header.map((column) => column.trim()), rows };
  }

  async appendRow(values: readonly string[]): Promise<void> {
    try {
      const line = encodeCsvRecord(values);
      await appendFile(this.filePath, this.endsWithLineBreak ? line : `\n${line}`, 'utf8');
      this.endsWithLineBreak = true;
    } catch (error) {
      throw new PersistenceError(`Failed to append to ledger file ${this.filePath}`, {
        cause: error,
      });
    }
  }

  private async create(header: readonly string[]): Promise<void> {
    try {
      await mkdir(dirname(this.filePath), { recursive: true });
    } catch (error) {
      throw new PersistenceError(`Failed to create ledger directory for ${this.filePath}`, {
        cause: error,
      });
    }
    await this.write(encodeCsvRecord(header), 'Failed to create ledger file');
  }

  private async write(content: string, message: string): Promise<void> {
    try {
      await writeFile(this.filePath, content, 'utf8');
    } catch (error) {
      throw new PersistenceError(`${message} ${this.filePath}`, { cause: error });
    }
  }
}

function isMissingFile(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}
