/**
 * Position Reader
 *
 * Turns placement CSV rows into canonical PlacementRecords. This is the only
 * place that knows where each schema keeps its columns; everything
 * downstream works on records.
 */

import { isBlankRow, parseCsvRows, splitHeader } from '../../utils/csv.js';
import { detectPositionSchema } from './format-detector.js';
import type {
  CsvRow,
  PlacementReadMode,
  PlacementRecord,
  PlacementTable,
  PositionSchema,
} from '../../types/index.js';

/** Minimum row width per schema and read mode */
const MIN_COLUMNS: Record<PositionSchema, Record<PlacementReadMode, number>> = {
  kicad_pos: { placement: 6, keys: 3 },
  unknown: { placement: 6, keys: 3 },
  positions: { placement: 5, keys: 5 },
};

/**
 * Parse placement CSV text and classify its header.
 *
 * An empty file yields schema `unknown` and no rows.
 */
export function parsePlacementTable(text: string, source?: string): PlacementTable {
  const { header, rows } = splitHeader(parseCsvRows(text, source));
  return {
    schema: header ? detectPositionSchema(header) : 'unknown',
    header,
    rows,
  };
}

/**
 * Map a single data row to a record, or null when the row is too short
 * or has no reference.
 */
export function toPlacementRecord(
  row: CsvRow,
  schema: PositionSchema,
  mode: PlacementReadMode = 'placement'
): PlacementRecord | null {
  if (isBlankRow(row) || row.length < MIN_COLUMNS[schema][mode]) {
    return null;
  }

  const cells = row.map((cell) => cell.trim());
  const ref = cells[0];
  if (!ref) {
    return null;
  }

  if (schema === 'positions') {
    return {
      ref,
      value: '',
      package: '',
      x: cells[1],
      y: cells[2],
      rotation: cells[3],
      schema,
    };
  }

  return {
    ref,
    value: cells[1],
    package: cells[2],
    x: cells[3] ?? '',
    y: cells[4] ?? '',
    rotation: cells[5] ?? '',
    schema,
  };
}

/**
 * Lazily yield the records of a parsed table. Each call starts over.
 */
export function* readPlacementRecords(
  table: Pick<PlacementTable, 'schema' | 'rows'>,
  mode: PlacementReadMode = 'placement'
): Generator<PlacementRecord> {
  for (const row of table.rows) {
    const record = toPlacementRecord(row, table.schema, mode);
    if (record) {
      yield record;
    }
  }
}

/**
 * Reference designators of every data row that has one, whatever the schema.
 */
export function* readPlacementRefs(table: Pick<PlacementTable, 'rows'>): Generator<string> {
  for (const row of table.rows) {
    const ref = row.length > 0 ? row[0].trim() : '';
    if (ref) {
      yield ref;
    }
  }
}
