/**
 * Output Writer Exports
 */

export {
  renderMachineData,
  sanitizeExplanation,
  MACHINE_COLUMNS,
} from './machine-data-writer.js';
export {
  collectComponentKeys,
  renderFeederTemplate,
  TEMPLATE_COLUMNS,
} from './feeder-template-writer.js';

export type { MachineDataOptions, MachineDataDocument } from './machine-data-writer.js';
