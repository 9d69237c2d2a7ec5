/**
 * Placement header classification.
 *
 * KiCad's own POS export starts `Ref,Val,Package,...`; positions.csv-style
 * exports start `Designator,"Mid X",...`. The first cell frequently carries
 * a UTF-8 BOM.
 */

import { normalizeHeaderCell } from '../../utils/csv.js';
import type { PositionSchema } from '../../types/index.js';

const KICAD_REF_COLUMNS = new Set(['ref', 'reference']);
const POSITIONS_REF_COLUMNS = new Set(['designator', 'ref']);

export function detectPositionSchema(header: readonly string[]): PositionSchema {
  const cells = header.map(normalizeHeaderCell);

  if (
    cells.length >= 3 &&
    KICAD_REF_COLUMNS.has(cells[0]) &&
    cells[1] === 'val' &&
    cells[2] === 'package'
  ) {
    return 'kicad_pos';
  }

  if (
    cells.length >= 5 &&
    POSITIONS_REF_COLUMNS.has(cells[0]) &&
    cells[1].startsWith('mid x') &&
    cells[2].startsWith('mid y') &&
    cells[3].startsWith('rotation')
  ) {
    return 'positions';
  }

  return 'unknown';
}
