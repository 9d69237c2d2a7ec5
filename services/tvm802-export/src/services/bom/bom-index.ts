/**
 * BOM Index
 *
 * Reads a BOM CSV into a reference -> component key map. A BOM row covers
 * every designator listed in its Designator cell ("C1, C2, C3"), and all of
 * them share the row's "<footprint> <value>" key.
 */

import { isBlankRow, normalizeHeaderCell, parseCsvRows, splitHeader } from '../../utils/csv.js';
import { DuplicateKeyError } from '../../utils/errors.js';
import type { BomIndex, CsvRow, ReaderOptions } from '../../types/index.js';

interface BomColumns {
  designator: number;
  footprint: number;
  value: number;
}

function locateColumns(header: CsvRow): BomColumns {
  const names = header.map(normalizeHeaderCell);
  return {
    designator: names.indexOf('designator'),
    footprint: names.indexOf('footprint'),
    value: names.indexOf('value'),
  };
}

function cellAt(row: CsvRow, index: number): string {
  return index >= 0 && index < row.length ? row[index].trim() : '';
}

/** "C1, C2,,C3 " -> ["C1", "C2", "C3"] */
export function splitDesignators(cell: string): string[] {
  return cell
    .replace(/\s+/g, '')
    .split(',')
    .map((token) => token.trim())
    .filter((token) => token.length > 0);
}

export function buildBomIndex(text: string, options: ReaderOptions = {}): BomIndex {
  const index = new Map<string, string>();
  const { header, rows } = splitHeader(parseCsvRows(text, options.source));
  if (!header) {
    return index;
  }

  const columns = locateColumns(header);
  if (columns.designator < 0) {
    return index;
  }

  for (const row of rows) {
    if (isBlankRow(row)) {
      continue;
    }
    const designators = splitDesignators(cellAt(row, columns.designator));
    if (designators.length === 0) {
      continue;
    }

    const key = `${cellAt(row, columns.footprint)} ${cellAt(row, columns.value)}`.trim();
    for (const ref of designators) {
      if (options.duplicates === 'error' && index.has(ref)) {
        throw new DuplicateKeyError('BOM designator', ref, { operation: 'buildBomIndex' });
      }
      index.set(ref, key);
    }
  }

  return index;
}
