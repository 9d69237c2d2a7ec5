/**
 * Services Index
 *
 * Exports all services for TVM802 export.
 */

// Placement parsing
export {
  detectPositionSchema,
  parsePlacementTable,
  toPlacementRecord,
  readPlacementRecords,
  readPlacementRefs,
  isFiducialRef,
  collectFiducialRefs,
} from './placement/index.js';

// Lookup tables
export { buildBomIndex, splitDesignators } from './bom/index.js';
export {
  buildFeederCatalog,
  lookupFeeder,
  resolveComponentKey,
  EMPTY_ASSIGNMENT,
} from './feeders/index.js';

export type { KeySource } from './feeders/index.js';

// Output writers
export {
  renderMachineData,
  sanitizeExplanation,
  collectComponentKeys,
  renderFeederTemplate,
  MACHINE_COLUMNS,
  TEMPLATE_COLUMNS,
} from './output/index.js';

export type { MachineDataOptions, MachineDataDocument } from './output/index.js';

// File-level operations
export {
  PlacementExportService,
  getPlacementExportService,
  clearPlacementExportService,
  resolveProjectPaths,
  formatMachineDataSummary,
  formatFeederTemplateSummary,
} from './export/index.js';

export type {
  PlacementExportConfig,
  FeederTemplateRequest,
  FeederTemplateResult,
  MachineDataRequest,
  MachineDataRunResult,
  ProjectPaths,
} from './export/index.js';
