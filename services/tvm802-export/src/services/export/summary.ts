/**
 * Human-readable result messages.
 */

import type { FeederTemplateResult, MachineDataRunResult } from './placement-export-service.js';

export function formatMachineDataSummary(result: MachineDataRunResult): string {
  const lines = [
    `TVM802 machine data written to:`,
    result.outputPath,
    '',
    `Placements exported: ${result.rowsTotal}`,
    `With feeders/nozzles: ${result.rowsWithFeeder}`,
    `Mark 1: ${result.mark1.ref ?? 'not found'} (${result.mark1.x}, ${result.mark1.y})`,
    `Mark 2: ${result.mark2.ref ?? 'not found'} (${result.mark2.x}, ${result.mark2.y})`,
  ];

  if (result.rowsWithFeeder === 0 && result.rowsTotal > 0) {
    lines.push(
      '',
      'WARNING: No feeders matched! Check that your feeders CSV',
      'uses the same component keys as the BOM.'
    );
  }

  return lines.join('\n');
}

export function formatFeederTemplateSummary(result: FeederTemplateResult): string {
  return [
    'TVM802 feeders template written to:',
    result.outputPath,
    '',
    `Components: ${result.componentKeys.length}`,
  ].join('\n');
}
