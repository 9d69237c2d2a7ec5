/**
 * Feeders template: one unassigned row per distinct component key, ready to
 * be filled in and fed back as the feeders CSV.
 */

import { config } from '../../config.js';
import { formatCsv } from '../../utils/csv.js';
import { isFiducialRef } from '../placement/fiducial-extractor.js';
import { resolveComponentKey } from '../feeders/component-key-resolver.js';
import type { BomIndex, PlacementRecord, TemplateRowDefaults } from '../../types/index.js';

export const TEMPLATE_COLUMNS = ['Component', 'Feeder', 'Nozzle', 'Speed', 'Height'];

/**
 * Sorted distinct keys of every non-fiducial record. Empty keys are left
 * out: a feeders row can't be keyed by one.
 */
export function collectComponentKeys(
  records: Iterable<PlacementRecord>,
  bomIndex?: BomIndex
): string[] {
  const keys = new Set<string>();
  for (const record of records) {
    if (isFiducialRef(record.ref)) {
      continue;
    }
    const key = resolveComponentKey(record, bomIndex);
    if (key) {
      keys.add(key);
    }
  }
  return [...keys].sort();
}

export function renderFeederTemplate(
  componentKeys: readonly string[],
  defaults: TemplateRowDefaults = config.template
): string {
  return formatCsv([
    TEMPLATE_COLUMNS,
    ...componentKeys.map((key) => [key, '', defaults.nozzle, defaults.speed, defaults.height]),
  ]);
}
