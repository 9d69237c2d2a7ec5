import { describe, expect, it } from 'vitest';

import { buildBomIndex, splitDesignators } from '../bom-index.js';
import { DuplicateKeyError } from '../../../utils/errors.js';

describe('splitDesignators', () => {
  it('removes whitespace and empty tokens', () => {
    expect(splitDesignators(' R1 ,, R 2,')).toEqual(['R1', 'R2']);
  });
});

describe('buildBomIndex', () => {
  it('maps every designator of a row to the same key', () => {
    const index = buildBomIndex('Designator,Footprint,Value\n"C1,C2, C3",R,10k\n');

    expect([...index.entries()]).toEqual([
      ['C1', 'R 10k'],
      ['C2', 'R 10k'],
      ['C3', 'R 10k'],
    ]);
  });

  it('finds columns by name in any order and case', () => {
    const index = buildBomIndex('Value, FOOTPRINT ,Qty,designator\n100n,C_0402,2,"C5, C6"\n');

    expect(index.get('C5')).toBe('C_0402 100n');
    expect(index.get('C6')).toBe('C_0402 100n');
  });

  it('tolerates missing footprint and value columns', () => {
    const index = buildBomIndex('\uFEFF"Designator",Value\nR5,4k7\nR9\n');

    expect(index.get('R5')).toBe('4k7');
    expect(index.get('R9')).toBe('');
  });

  it('ignores every row when there is no designator column', () => {
    expect(buildBomIndex('Ref,Value\nR1,1k\n').size).toBe(0);
  });

  it('returns an empty index for an empty file', () => {
    expect(buildBomIndex('').size).toBe(0);
  });

  it('lets later rows overwrite earlier ones', () => {
    const index = buildBomIndex('Designator,Footprint,Value\nR1,0402,1k\nR1,0603,2k\n');

    expect(index.get('R1')).toBe('0603 2k');
  });

  it('rejects duplicates when asked to', () => {
    const text = 'Designator,Footprint,Value\nR1,0402,1k\n"R2,R1",0603,2k\n';

    expect(() => buildBomIndex(text, { duplicates: 'error' })).toThrow(DuplicateKeyError);
    expect(() => buildBomIndex(text, { duplicates: 'error' })).toThrow('Duplicate BOM designator key: R1');
  });
});
