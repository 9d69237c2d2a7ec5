import { describe, expect, it } from 'vitest';

import { EMPTY_ASSIGNMENT, buildFeederCatalog, lookupFeeder } from '../feeder-catalog.js';
import { DuplicateKeyError } from '../../../utils/errors.js';

describe('buildFeederCatalog', () => {
  it('reads positional rows and skips short or keyless ones', () => {
    const catalog = buildFeederCatalog(
      [
        'Component,Feeder,Nozzle,Speed,Height',
        ' R_0402 10k , 3 ,1,80,0.5',
        'short,1,2',
        ',4,1,100,0',
        'C_0402 100n,,2,,',
      ].join('\r\n')
    );

    expect([...catalog.entries()]).toEqual([
      ['R_0402 10k', { feeder: '3', nozzle: '1', speed: '80', height: '0.5' }],
      ['C_0402 100n', { feeder: '', nozzle: '2', speed: '', height: '' }],
    ]);
  });

  it('always drops the first row', () => {
    const catalog = buildFeederCatalog('R_0402 1k,1,1,1,1\nR_0603 2k,2,1,100,0.5\n');

    expect([...catalog.keys()]).toEqual(['R_0603 2k']);
  });

  it('lets the last duplicate win', () => {
    const catalog = buildFeederCatalog('Component,Feeder,Nozzle,Speed,Height\nK,1,1,1,1\nK,9,2,50,0.2\n');

    expect(catalog.get('K')).toEqual({ feeder: '9', nozzle: '2', speed: '50', height: '0.2' });
  });

  it('rejects duplicates when asked to', () => {
    const text = 'Component,Feeder,Nozzle,Speed,Height\nK,1,1,1,1\nK,9,2,50,0.2\n';

    expect(() => buildFeederCatalog(text, { duplicates: 'error' })).toThrow(DuplicateKeyError);
  });

  it('returns an empty catalog for an empty file', () => {
    expect(buildFeederCatalog('').size).toBe(0);
  });
});

describe('lookupFeeder', () => {
  it('returns blanks for unknown keys', () => {
    expect(lookupFeeder(new Map(), 'missing')).toBe(EMPTY_ASSIGNMENT);
    expect(EMPTY_ASSIGNMENT).toEqual({ feeder: '', nozzle: '', speed: '', height: '' });
  });
});
