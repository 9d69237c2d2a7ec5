/**
 * Feeder Catalog
 *
 * Feeders CSV is positional: key, feeder, nozzle, speed, height. Its first
 * row is always a header and is never inspected.
 */

import { isBlankRow, parseCsvRows } from '../../utils/csv.js';
import { DuplicateKeyError } from '../../utils/errors.js';
import type { FeederAssignment, FeederCatalog, ReaderOptions } from '../../types/index.js';

const FEEDER_COLUMNS = 5;

export const EMPTY_ASSIGNMENT: Readonly<FeederAssignment> = Object.freeze({
  feeder: '',
  nozzle: '',
  speed: '',
  height: '',
});

export function buildFeederCatalog(text: string, options: ReaderOptions = {}): FeederCatalog {
  const catalog = new Map<string, FeederAssignment>();

  for (const row of parseCsvRows(text, options.source).slice(1)) {
    if (isBlankRow(row) || row.length < FEEDER_COLUMNS) {
      continue;
    }
    const [key, feeder, nozzle, speed, height] = row.map((cell) => cell.trim());
    if (!key) {
      continue;
    }
    if (options.duplicates === 'error' && catalog.has(key)) {
      throw new DuplicateKeyError('feeder', key, { operation: 'buildFeederCatalog' });
    }
    catalog.set(key, { feeder, nozzle, speed, height });
  }

  return catalog;
}

export function lookupFeeder(catalog: FeederCatalog, key: string): Readonly<FeederAssignment> {
  return catalog.get(key) ?? EMPTY_ASSIGNMENT;
}
