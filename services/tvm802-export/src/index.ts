/**
 * TVM802 Export - Library Entry Point
 *
 * Converts KiCad placement exports (plus optional BOM and feeder
 * assignments) into TVM802 pick-and-place machine files.
 */

export * from './services/index.js';
export * from './types/index.js';
export {
  Tvm802ExportError,
  ValidationError,
  BomRequiredError,
  DuplicateKeyError,
  FileAccessError,
  InternalError,
  isTvm802ExportError,
  handleError,
} from './utils/errors.js';
export type { ErrorContext } from './utils/errors.js';
export { config, getConfig } from './config.js';
export type { Config } from './config.js';
export { runCli } from './cli/commands.js';
export type { CliOutput } from './cli/commands.js';
