/**
 * Fiducial detection. Fiducials are alignment marks, never placed parts.
 */

const FIDUCIAL_PREFIX = 'FID';

export function isFiducialRef(ref: string): boolean {
  return ref.toUpperCase().startsWith(FIDUCIAL_PREFIX);
}

/**
 * Distinct fiducial references in the order they first appear.
 */
export function collectFiducialRefs(refs: Iterable<string>): string[] {
  const seen = new Set<string>();
  for (const ref of refs) {
    if (isFiducialRef(ref)) {
      seen.add(ref);
    }
  }
  return [...seen];
}
