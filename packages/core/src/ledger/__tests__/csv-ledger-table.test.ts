import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtemp, readFile, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { CsvLedgerTable } from '../csv-ledger-table.js';
import { LedgerStore } from '../ledger-store.js';
import { PersistenceError } from '../ledger-errors.js';
import { LEDGER_COLUMNS } from '../ledger-types.js';

describe('CsvLedgerTable', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), 'tally-ledger-'));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it('should create a missing file and its directory with the header', async () => {
    const filePath = join(dir, 'nested', 'ledger.csv');
    const table = new CsvLedgerTable(filePath);

    const snapshot = await table.load(LEDGER_COLUMNS);

    expect(snapshot).toEqual({ header: [...LEDGER_COLUMNS], rows: [] });
    expect(await readFile(filePath, 'utf8')).toBe('timestamp,description,category,amount,type\n');
  });

  it('should write the header into an empty file', async () => {
    const filePath = join(dir, 'ledger.csv');
    await writeFile(filePath, '');

    await new CsvLedgerTable(filePath).load(LEDGER_COLUMNS);

    expect(await readFile(filePath, 'utf8')).toBe('timestamp,description,category,amount,type\n');
  });

  it('should append quoted rows', async () => {
    const filePath = join(dir, 'ledger.csv');
    const table = new CsvLedgerTable(filePath);
    await table.load(LEDGER_COLUMNS);

    await table.appendRow([
      '2024-05-14T09:30:00.000Z',
      'Milk, eggs',
      'Groceries & Home Needs',
      '120.00',
      'expense',
    ]);

    expect(await readFile(filePath, 'utf8')).toBe(
      'timestamp,description,category,amount,type\n' +
        '2024-05-14T09:30:00.000Z,"Milk, eggs",Groceries & Home Needs,120.00,expense\n'
    );
  });

  it('should strip a byte order mark and trim header names', async () => {
    const filePath = join(dir, 'ledger.csv');
    await writeFile(
      filePath,
      '\uFEFFTimestamp, Description,Category,Amount,Type\n2024-05-01 10:00:00,Rent,Rent,15000,Expense\n'
    );

    const snapshot = await new CsvLedgerTable(filePath).load(LEDGER_COLUMNS);

    expect(snapshot).toEqual({
      header: ['Timestamp', 'Description', 'Category', 'Amount', 'Type'],
      rows: [['2024-05-01 10:00:00', 'Rent', 'Rent', '15000', 'Expense']],
    });
  });

  it('should report unreadable CSV as a persistence failure', async () => {
    const filePath = join(dir, 'ledger.csv');
    await writeFile(filePath, 'timestamp,description\n"unterminated\n');

    await expect(new CsvLedgerTable(filePath).load(LEDGER_COLUMNS)).rejects.toBeInstanceOf(
      PersistenceError
    );
  });

  it('should report failed appends as persistence failures', async () => {
    const blocker = join(dir, 'not-a-directory');
    await writeFile(blocker, 'x');

    const table = new CsvLedgerTable(join(blocker, 'ledger.csv'));

    await expect(table.appendRow(['a'])).rejects.toBeInstanceOf(PersistenceError);
  });

  it('should start a new line when the file lacks a trailing line break', async () => {
    const filePath = join(dir, 'ledger.csv');
    await writeFile(
      filePath,
      'timestamp,description,category,amount,type\n2024-05-01T10:00:00.000Z,May rent,Rent,15000,expense'
    );
    const writer = new LedgerStore(new CsvLedgerTable(filePath));

    const committed = await writer.append({
      timestamp: new Date('2024-05-14T09:30:00.000Z'),
      description: 'Diapers',
      category: 'Baby Care',
      amountMinor: 30000,
      type: 'expense',
    });

    const skipped: string[] = [];
    const reader = new LedgerStore(new CsvLedgerTable(filePath), {
      onInvalidRow: (issue) => skipped.push(issue.reason),
    });
    const entries = await reader.readAll();

    expect(committed.id).toBe(2);
    expect(entries.map((entry) => [entry.id, entry.description])).toEqual([
      [1, 'May rent'],
      [2, 'Diapers'],
    ]);
    expect(skipped).toEqual([]);
    expect(await readFile(filePath, 'utf8')).toBe(
      'timestamp,description,category,amount,type\n' +
        '2024-05-01T10:00:00.000Z,May rent,Rent,15000,expense\n' +
        '2024-05-14T09:30:00.000Z,Diapers,Baby Care,300.00,expense\n'
    );
  });

  it('should append LF rows to a CRLF file and read them all back', async () => {
    const filePath = join(dir, 'ledger.csv');
    await writeFile(
      filePath,
      'timestamp,description,category,amount,type\r\n2024-05-01T10:00:00.000Z,May rent,Rent,15000,expense\r\n'
    );
    const writer = new LedgerStore(new CsvLedgerTable(filePath));
    await writer.append({
      timestamp: new Date('2024-05-14T09:30:00.000Z'),
      description: 'Diapers',
      category: 'Baby Care',
      amountMinor: 30000,
      type: 'expense',
    });

    const entries = await new LedgerStore(new CsvLedgerTable(filePath)).readAll();

    expect(entries.map((entry) => entry.description)).toEqual(['May rent', 'Diapers']);
  });

  it('should give a new store the entries an earlier store committed', async () => {
    const filePath = join(dir, 'ledger.csv');
    const writer = new LedgerStore(new CsvLedgerTable(filePath));
    await writer.append({
      timestamp: new Date('2024-05-14T09:30:00.000Z'),
      description: 'Milk, "full cream"',
      category: 'Groceries & Home Needs',
      amountMinor: 6050,
      type: 'expense',
    });

    const reader = new LedgerStore(new CsvLedgerTable(filePath));
    const entries = await reader.readAll();

    expect(entries).toHaveLength(1);
    expect(entries[0]).toMatchObject({
      id: 1,
      description: 'Milk, "full cream"',
      category: 'Groceries & Home Needs',
      amountMinor: 6050,
      amount: 60.5,
      type: 'expense',
    });
    expect(entries[0]?.timestamp.toISOString()).toBe('2024-05-14T09:30:00.000Z');
  });
});
