/**
 * Export Service Exports
 *
 * File-level operations used by the CLI and by library callers.
 */

export {
  PlacementExportService,
  getPlacementExportService,
  clearPlacementExportService,
} from './placement-export-service.js';
export { resolveProjectPaths } from './project-paths.js';
export { formatMachineDataSummary, formatFeederTemplateSummary } from './summary.js';

export type {
  PlacementExportConfig,
  FeederTemplateRequest,
  FeederTemplateResult,
  MachineDataRequest,
  MachineDataRunResult,
} from './placement-export-service.js';
export type { ProjectPaths } from './project-paths.js';
