import { describe, expect, it } from 'vitest';

import { renderMachineData, sanitizeExplanation } from '../machine-data-writer.js';
import { parsePlacementTable, readPlacementRecords } from '../../placement/index.js';
import type { FeederAssignment, MachineRowDefaults } from '../../../types/index.js';

const DEFAULTS: MachineRowDefaults = { nozzle: '1', speed: '100', height: '0' };

const HEADER =
  'Designator\tNozzleNum\tStackNum\tMid X\tMid Y\tRotation\tHeight\tSpeed\tVision\tCheck\tExplanation\r\n';
const SPACER = '\t\t\t\t\t\t\t\t\t\t\r\n';

function records(lines: string[]) {
  const header = 'Ref,Val,Package,PosX,PosY,Rot,Side';
  return readPlacementRecords(parsePlacementTable([header, ...lines].join('\n')));
}

function catalog(entries: Record<string, Partial<FeederAssignment>>) {
  return new Map(
    Object.entries(entries).map(([key, assignment]) => [
      key,
      { feeder: '', nozzle: '', speed: '', height: '', ...assignment },
    ])
  );
}

describe('renderMachineData', () => {
  it('writes defaulted rows and captures the default mark', () => {
    const document = renderMachineData(
      records(['FID1,,,0,0,0', 'R1,10k,0402,12.5,3.2,90']),
      new Map(),
      { defaults: DEFAULTS }
    );

    expect(document.content).toBe(
      HEADER +
        SPACER +
        'R1\t1\t\t12.5\t3.2\t90\t0\t100\tAccurate\tVision\t0402 10k\r\n' +
        '\n'
    );
    expect(document.rowsTotal).toBe(1);
    expect(document.rowsWithFeeder).toBe(0);
    expect(document.mark1).toEqual({ ref: 'FID1', x: '0', y: '0' });
    expect(document.mark2).toEqual({ ref: null, x: '0.00', y: '0.00' });
  });

  it('uses the feeder assignment and only defaults blank fields', () => {
    const document = renderMachineData(
      records(['R1,10k,0402,1,2,0']),
      catalog({ '0402 10k': { feeder: '7', nozzle: '2', height: '0.5' } }),
      { defaults: DEFAULTS }
    );

    expect(document.content.split('\r\n')[2]).toBe('R1\t2\t7\t1\t2\t0\t0.5\t100\tAccurate\tVision\t0402 10k');
    expect(document.rowsWithFeeder).toBe(1);
  });

  it('counts a nozzle-only assignment as assigned', () => {
    const document = renderMachineData(
      records(['C1,100n,0402,1,2,0']),
      catalog({ '0402 100n': { nozzle: '2' } }),
      { defaults: DEFAULTS }
    );

    expect(document.rowsWithFeeder).toBe(1);
  });

  it('honours explicit marks in any case and drops the other fiducials', () => {
    const document = renderMachineData(
      records(['FID1,,,1,1,0', 'FID2,,,2,2,0', 'FID3,,,3,3,0', 'R1,10k,0402,5,5,0']),
      new Map(),
      { markRef1: 'fid3', markRef2: 'FID1', defaults: DEFAULTS }
    );

    expect(document.mark1).toEqual({ ref: 'FID3', x: '3', y: '3' });
    expect(document.mark2).toEqual({ ref: 'FID1', x: '1', y: '1' });
    expect(document.rowsTotal).toBe(1);
    expect(document.content).not.toContain('FID');
  });

  it('keeps the first coordinate when a mark appears twice', () => {
    const document = renderMachineData(
      records(['FID01,,,5,5,0', 'FID1,,,6,6,0', 'fid02,,,7,8,0']),
      new Map(),
      { defaults: DEFAULTS }
    );

    expect(document.mark1).toEqual({ ref: 'FID01', x: '5', y: '5' });
    expect(document.mark2).toEqual({ ref: 'fid02', x: '7', y: '8' });
    expect(document.rowsTotal).toBe(0);
  });

  it('drops unassigned parts when asked without changing the feeder count', () => {
    const input = ['R1,10k,0402,1,1,0', 'C1,100n,0402,2,2,0'];
    const feeders = catalog({ '0402 10k': { feeder: '3' } });

    const all = renderMachineData(records(input), feeders, { defaults: DEFAULTS });
    const assigned = renderMachineData(records(input), feeders, { skipUnassigned: true, defaults: DEFAULTS });

    expect([all.rowsTotal, all.rowsWithFeeder]).toEqual([2, 1]);
    expect([assigned.rowsTotal, assigned.rowsWithFeeder]).toEqual([1, 1]);
    expect(assigned.content).not.toContain('C1\t');
  });

  it('looks up BOM keys and strips them for the explanation', () => {
    const document = renderMachineData(
      records(['R1,10k,0402,1,1,0']),
      catalog({ 'R_0402 (10k)': { feeder: '4' } }),
      { bomIndex: new Map([['R1', 'R_0402 (10k)']]), defaults: DEFAULTS }
    );

    expect(document.lookedUpKeys).toEqual(['R_0402 (10k)']);
    expect(document.content.split('\r\n')[2]).toBe('R1\t1\t4\t1\t1\t0\t0\t100\tAccurate\tVision\tR_0402 10k');
  });

  it('leaves the explanation blank when package and value are empty', () => {
    const document = renderMachineData(records(['R7,,,1,2,0']), new Map(), { defaults: DEFAULTS });

    expect(document.lookedUpKeys).toEqual(['']);
    expect(document.content.split('\r\n')[2]).toBe('R7\t1\t\t1\t2\t0\t0\t100\tAccurate\tVision\t');
  });

  it('keys positions.csv parts by reference without a BOM', () => {
    const table = parsePlacementTable(
      'Designator,Mid X,Mid Y,Rotation,Layer\nU1,1,2,90,top\nU2,3,4,0,top\nFID1,0,0,0,top\n'
    );
    const document = renderMachineData(readPlacementRecords(table), new Map(), { defaults: DEFAULTS });

    expect(document.lookedUpKeys).toEqual(['U1', 'U2']);
    expect(document.rowsTotal).toBe(2);
  });

  it('writes only the framing for an empty placement list', () => {
    const document = renderMachineData([], new Map(), { defaults: DEFAULTS });

    expect(document.content).toBe(HEADER + SPACER + '\n');
  });
});

describe('sanitizeExplanation', () => {
  it('removes quotes and parentheses', () => {
    expect(sanitizeExplanation('R(10k)"A"')).toBe('R10kA');
  });

  it('removes full-width parentheses and trims', () => {
    expect(sanitizeExplanation(' （C）100n ')).toBe('C100n');
  });
});
