/**
 * Component key resolution.
 *
 * The feeders template and the machine file must agree on keys, so both go
 * through resolveComponentKey and nothing else.
 */

import type { BomIndex, PlacementRecord } from '../../types/index.js';

export type KeySource = Pick<PlacementRecord, 'ref' | 'schema' | 'package' | 'value'>;

function schemaKey({ ref, schema, package: pkg, value }: KeySource): string {
  // positions.csv carries no value/package, and unknown layouts can't be
  // trusted to have them where KiCad does
  if (schema === 'positions' || schema === 'unknown') {
    return ref;
  }
  return `${pkg} ${value}`.trim();
}

export function resolveComponentKey(source: KeySource, bomIndex?: BomIndex): string {
  return bomIndex?.get(source.ref) ?? schemaKey(source);
}
