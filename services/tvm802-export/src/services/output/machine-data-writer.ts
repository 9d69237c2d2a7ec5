/**
 * Machine Data Writer
 *
 * Renders the TVM802 "Pick Place" file: tab separated, CRLF rows, a blank
 * spacer row under the header and a bare LF at the very end, which is what
 * the machine's own exports look like.
 *
 * Fiducials never become placement rows. The two chosen as board marks
 * contribute their coordinates to the result instead.
 */

import { config } from '../../config.js';
import { isFiducialRef } from '../placement/fiducial-extractor.js';
import { resolveComponentKey } from '../feeders/component-key-resolver.js';
import { lookupFeeder } from '../feeders/feeder-catalog.js';
import type {
  BomIndex,
  FeederCatalog,
  MachineDataResult,
  MachineRowDefaults,
  MarkCoordinate,
  PlacementRecord,
} from '../../types/index.js';

export const MACHINE_COLUMNS = [
  'Designator',
  'NozzleNum',
  'StackNum',
  'Mid X',
  'Mid Y',
  'Rotation',
  'Height',
  'Speed',
  'Vision',
  'Check',
  'Explanation',
] as const;

const CRLF = '\r\n';
const VISION = 'Accurate';
const CHECK = 'Vision';
const DEFAULT_MARK1_REFS = ['FID01', 'FID1'];
const DEFAULT_MARK2_REFS = ['FID02', 'FID2'];
const UNSET_COORDINATE = '0.00';

export interface MachineDataOptions {
  /** Fiducial used as mark 1; FID01/FID1 when omitted */
  markRef1?: string | null;
  /** Fiducial used as mark 2; FID02/FID2 when omitted */
  markRef2?: string | null;
  bomIndex?: BomIndex;
  /** Drop parts whose key has no feeder slot */
  skipUnassigned?: boolean;
  defaults?: MachineRowDefaults;
}

export interface MachineDataDocument extends MachineDataResult {
  content: string;
  /** Keys looked up in the feeder catalog, in first-lookup order */
  lookedUpKeys: string[];
}

const EXPLANATION_STRIP = /["()\uFF08\uFF09]/g;

export function sanitizeExplanation(text: string): string {
  return text.replace(EXPLANATION_STRIP, '').trim();
}

function markRefs(override: string | null | undefined, fallback: string[]): Set<string> {
  const ref = override?.trim();
  return new Set(ref ? [ref.toUpperCase()] : fallback);
}

function unsetMark(): MarkCoordinate {
  return { ref: null, x: UNSET_COORDINATE, y: UNSET_COORDINATE };
}

export function renderMachineData(
  records: Iterable<PlacementRecord>,
  catalog: FeederCatalog,
  options: MachineDataOptions = {}
): MachineDataDocument {
  const defaults = options.defaults ?? config.machine;
  const mark1Refs = markRefs(options.markRef1, DEFAULT_MARK1_REFS);
  const mark2Refs = markRefs(options.markRef2, DEFAULT_MARK2_REFS);

  let mark1 = unsetMark();
  let mark2 = unsetMark();
  let rowsTotal = 0;
  let rowsWithFeeder = 0;
  const lookedUpKeys = new Set<string>();

  const lines: string[] = [
    MACHINE_COLUMNS.join('\t') + CRLF,
    '\t'.repeat(MACHINE_COLUMNS.length - 1) + CRLF,
  ];

  for (const record of records) {
    const refUpper = record.ref.toUpperCase();

    if (mark1Refs.has(refUpper)) {
      if (mark1.ref === null) {
        mark1 = { ref: record.ref, x: record.x, y: record.y };
      }
      continue;
    }
    if (mark2Refs.has(refUpper)) {
      if (mark2.ref === null) {
        mark2 = { ref: record.ref, x: record.x, y: record.y };
      }
      continue;
    }
    if (isFiducialRef(record.ref)) {
      continue;
    }

    const key = resolveComponentKey(record, options.bomIndex);
    lookedUpKeys.add(key);
    const { feeder, nozzle, speed, height } = lookupFeeder(catalog, key);

    if (options.skipUnassigned && !feeder) {
      continue;
    }

    rowsTotal += 1;
    if (feeder || nozzle) {
      rowsWithFeeder += 1;
    }

    const cells = [
      record.ref,
      nozzle || defaults.nozzle,
      feeder,
      record.x,
      record.y,
      record.rotation,
      height || defaults.height,
      speed || defaults.speed,
      VISION,
      CHECK,
      sanitizeExplanation(key),
    ];
    lines.push(cells.join('\t') + CRLF);
  }

  lines.push('\n');

  return {
    content: lines.join(''),
    rowsTotal,
    rowsWithFeeder,
    mark1,
    mark2,
    lookedUpKeys: [...lookedUpKeys],
  };
}
