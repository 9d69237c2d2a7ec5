import { describe, expect, it } from 'vitest';

import { collectFiducialRefs, isFiducialRef } from '../fiducial-extractor.js';

describe('isFiducialRef', () => {
  it('matches the FID prefix in any case', () => {
    expect(isFiducialRef('FID1')).toBe(true);
    expect(isFiducialRef('fid02')).toBe(true);
    expect(isFiducialRef('FIDUCIAL')).toBe(true);
  });

  it('only looks at the start of the reference', () => {
    expect(isFiducialRef('XFID1')).toBe(false);
    expect(isFiducialRef('R1')).toBe(false);
  });
});

describe('collectFiducialRefs', () => {
  it('keeps first-seen order and drops repeats', () => {
    expect(collectFiducialRefs(['FID2', 'R1', 'fid1', 'FID2', 'Fid3', 'C4'])).toEqual([
      'FID2',
      'fid1',
      'Fid3',
    ]);
  });

  it('treats differently cased references as distinct entries', () => {
    expect(collectFiducialRefs(['FID1', 'fid1'])).toEqual(['FID1', 'fid1']);
  });

  it('returns nothing when there are no fiducials', () => {
    expect(collectFiducialRefs(['R1', 'C1'])).toEqual([]);
  });
});
