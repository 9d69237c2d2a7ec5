/**
 * Placement Service Exports
 */

export { detectPositionSchema } from './format-detector.js';
export {
  parsePlacementTable,
  toPlacementRecord,
  readPlacementRecords,
  readPlacementRefs,
} from './position-reader.js';
export { isFiducialRef, collectFiducialRefs } from './fiducial-extractor.js';
