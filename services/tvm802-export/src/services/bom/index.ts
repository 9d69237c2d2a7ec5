/**
 * BOM Service Exports
 */

export { buildBomIndex, splitDesignators } from './bom-index.js';
