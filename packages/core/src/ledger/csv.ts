/**
 * CSV codec for the ledger file, on top of csv-parse and csv-stringify
 */

import { parse } from 'csv-parse/sync';
import { stringify } from 'csv-stringify/sync';
import { z } from 'zod';

// Files exported by spreadsheets may use any of these; appends always use LF
const RECORD_DELIMITERS = ['\r\n', '\n', '\r'];

// Quoted on top of the library's own rules so values read back unchanged
const QUOTE_ALSO = /^\s|\s$|\r/;

const RecordsSchema = z.array(z.array(z.string()));

/**
 * Encode one record as a CSV line, line break included
 */
export function encodeCsvRecord(values: readonly string[]): string {
  return stringify([[...values]], { quoted_match: QUOTE_ALSO, record_delimiter: 'unix' });
}

/**
 * Parse CSV text into records of fields. A leading byte order mark and blank
 * lines are dropped; records may differ in width.
 *
 * @throws CsvError from csv-parse when the text is not valid CSV
 */
export function parseCsv(text: string): string[][] {
  const records: unknown = parse(text, {
    bom: true,
    record_delimiter: RECORD_DELIMITERS,
    relax_column_count: true,
    relax_quotes: true,
    skip_empty_lines: true,
  });
  return RecordsSchema.parse(records);
}
