/**
 * CSV helpers shared by every reader and the template writer.
 */

import { CsvError } from 'csv-parse';
import { parse } from 'csv-parse/sync';
import { stringify } from 'csv-stringify/sync';
import { z } from 'zod';
import { ValidationError } from './errors.js';
import type { CsvRow } from '../types/index.js';

const CsvRowsSchema = z.array(z.array(z.string()));

/**
 * Split CSV text into raw rows.
 *
 * Rows keep their own width; quotes inside unquoted fields are taken
 * literally, and blank lines produce no row. A record the parser rejects is
 * dropped. A quote left open runs to the end of the input, so that record
 * takes the rest of the file with it.
 */
export function parseCsvRows(text: string, source = 'CSV input'): CsvRow[] {
  let records: unknown;
  try {
    records = parse(text, {
      bom: true,
      relax_column_count: true,
      relax_quotes: true,
      skip_empty_lines: true,
      skip_records_with_error: true,
    });
  } catch (error) {
    if (error instanceof CsvError) {
      throw new ValidationError(`Malformed CSV in ${source}: ${error.message}`, {
        operation: 'parseCsvRows',
        filePath: source,
        csvCode: error.code,
      });
    }
    throw error;
  }
  return CsvRowsSchema.parse(records);
}

/**
 * Split rows into the header and the remaining data rows.
 */
export function splitHeader(rows: CsvRow[]): { header: CsvRow | null; rows: CsvRow[] } {
  if (rows.length === 0) {
    return { header: null, rows: [] };
  }
  return { header: rows[0], rows: rows.slice(1) };
}

/** True for `[]` and for rows whose cells are all blank */
export function isBlankRow(row: CsvRow): boolean {
  return row.every((cell) => cell.trim() === '');
}

const UTF8_BOM = '\uFEFF';
// The BOM's three bytes decoded one byte per character
const UTF8_BOM_AS_LATIN1 = '\u00EF\u00BB\u00BF';

export function stripByteOrderMark(cell: string): string {
  let s = cell;
  if (s.startsWith(UTF8_BOM)) {
    s = s.slice(UTF8_BOM.length);
  }
  if (s.startsWith(UTF8_BOM_AS_LATIN1)) {
    s = s.slice(UTF8_BOM_AS_LATIN1.length);
  }
  return s;
}

/** Header cell as compared against known column names */
export function normalizeHeaderCell(cell: string): string {
  return stripByteOrderMark(cell.trim()).trim().toLowerCase();
}

/**
 * Comma-separated output with CRLF after every row, quoting only the
 * fields that need it.
 */
export function formatCsv(rows: CsvRow[]): string {
  return stringify(rows, { record_delimiter: 'windows' });
}
