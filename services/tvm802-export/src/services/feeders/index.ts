/**
 * Feeder Service Exports
 */

export { buildFeederCatalog, lookupFeeder, EMPTY_ASSIGNMENT } from './feeder-catalog.js';
export { resolveComponentKey } from './component-key-resolver.js';

export type { KeySource } from './component-key-resolver.js';
