/**
 * Command-line adapter.
 *
 * Resolves paths and options from argv, calls PlacementExportService and
 * prints the result. The only place that decides on an exit code.
 */

import { parseArgs } from 'util';
import { config } from '../config.js';
import { log } from '../utils/logger.js';
import { ValidationError, handleError } from '../utils/errors.js';
import {
  PlacementExportService,
  formatFeederTemplateSummary,
  formatMachineDataSummary,
  resolveProjectPaths,
} from '../services/export/index.js';
import type { BomIndex, PositionSchema } from '../types/index.js';

const logger = log.child({ service: 'cli' });

export interface CliOutput {
  stdout(text: string): void;
  stderr(text: string): void;
}

const processOutput: CliOutput = {
  stdout: (text) => process.stdout.write(`${text}\n`),
  stderr: (text) => process.stderr.write(`${text}\n`),
};

export const USAGE = `Usage: ${config.toolName} <command> [options]

Commands:
  detect      Print the placement file's schema
  fiducials   List fiducial references
  keys        List component keys
  template    Write a blank feeders template
  machine     Write TVM802 machine data
  all         template, then machine

Options:
  --project <dir>      Project directory (default: current directory)
  --pos <file>         Placement CSV (default: <project>/production/positions.csv)
  --bom <file>         BOM CSV
  --feeders <file>     Feeders CSV (machine, all)
  --mark1 <ref>        Fiducial used as mark 1 (default: FID01/FID1)
  --mark2 <ref>        Fiducial used as mark 2 (default: FID02/FID2)
  --skip-unassigned    Leave out parts without a feeder
  --require-bom        Fail on positions.csv input without --bom
  --out <file>         Output file
  --template-out <file>  Template output for 'all'
  -h, --help           Show this help`;

const COMMANDS = ['detect', 'fiducials', 'keys', 'template', 'machine', 'all'] as const;
type Command = (typeof COMMANDS)[number];

function isCommand(value: string | undefined): value is Command {
  return COMMANDS.some((command) => command === value);
}

interface CliOptions {
  project?: string;
  pos?: string;
  bom?: string;
  feeders?: string;
  mark1?: string;
  mark2?: string;
  out?: string;
  'template-out'?: string;
  'skip-unassigned'?: boolean;
  'require-bom'?: boolean;
  help?: boolean;
}

function parseCliArgs(argv: string[]): { command: string | undefined; options: CliOptions } {
  try {
    const { values, positionals } = parseArgs({
      args: argv,
      allowPositionals: true,
      strict: true,
      options: {
        project: { type: 'string' },
        pos: { type: 'string' },
        bom: { type: 'string' },
        feeders: { type: 'string' },
        mark1: { type: 'string' },
        mark2: { type: 'string' },
        out: { type: 'string' },
        'template-out': { type: 'string' },
        'skip-unassigned': { type: 'boolean' },
        'require-bom': { type: 'boolean' },
        help: { type: 'boolean', short: 'h' },
      },
    });
    return { command: positionals[0], options: values };
  } catch (error) {
    throw new ValidationError(error instanceof Error ? error.message : String(error), {
      operation: 'parseCliArgs',
      input: argv,
    });
  }
}

/**
 * Load the BOM when one was given. For positions.csv input it is required
 * and a read failure is fatal; otherwise the run continues without it.
 */
async function loadBom(
  service: PlacementExportService,
  bomPath: string | undefined,
  schema: PositionSchema,
  output: CliOutput
): Promise<BomIndex | undefined> {
  if (!bomPath) {
    return undefined;
  }
  try {
    return await service.readBomIndex(bomPath);
  } catch (error) {
    if (schema === 'positions') {
      throw error;
    }
    const failure = handleError(error);
    logger.warn('Continuing without BOM', { filePath: bomPath, error: failure.message });
    output.stderr(`Failed to read BOM CSV (continuing without it):\n${failure.message}`);
    return undefined;
  }
}

export async function runCli(
  argv: string[],
  output: CliOutput = processOutput,
  service: PlacementExportService = new PlacementExportService()
): Promise<number> {
  try {
    const { command, options } = parseCliArgs(argv);
    if (options.help || command === undefined) {
      output.stdout(USAGE);
      return options.help ? 0 : 2;
    }
    if (!isCommand(command)) {
      throw new ValidationError(`Unknown command: ${command}`, {
        operation: 'runCli',
        suggestion: `Use one of: ${COMMANDS.join(', ')}`,
      });
    }

    const paths = resolveProjectPaths(options.project);
    const placementPath = options.pos ?? paths.placementPath;
    if (!placementPath) {
      throw new ValidationError('No placement file: pass --pos', { operation: command });
    }

    const schema = await service.detectFileSchema(placementPath);
    if (command === 'detect') {
      output.stdout(schema);
      return 0;
    }
    if (command === 'fiducials') {
      const refs = await service.listFiducials(placementPath);
      refs.forEach((ref) => output.stdout(ref));
      return 0;
    }

    const bomIndex = await loadBom(service, options.bom, schema, output);
    const requireBomForPositions = options['require-bom'] || undefined;

    if (command === 'keys') {
      const keys = await service.listComponentKeys(placementPath, bomIndex);
      keys.forEach((key) => output.stdout(key));
      return 0;
    }

    const writesMachine = command === 'machine' || command === 'all';
    const feedersPath = options.feeders;
    if (writesMachine && !feedersPath) {
      throw new ValidationError('No feeders file: pass --feeders', { operation: command });
    }

    if (command === 'template' || command === 'all') {
      const result = await service.generateFeederTemplate({
        placementPath,
        outputPath: (command === 'all' ? options['template-out'] : options.out)
          ?? paths.templateOutputPath,
        bomIndex,
        requireBomForPositions,
      });
      output.stdout(formatFeederTemplateSummary(result));
    }

    if (writesMachine && feedersPath) {
      if (command === 'all') {
        output.stdout('');
      }
      const result = await service.generateMachineData({
        placementPath,
        outputPath: options.out ?? paths.machineOutputPath,
        feeders: feedersPath,
        markRef1: options.mark1,
        markRef2: options.mark2,
        bomIndex,
        skipUnassigned: options['skip-unassigned'] ?? false,
        requireBomForPositions,
      });
      output.stdout(formatMachineDataSummary(result));
    }

    return 0;
  } catch (error) {
    const failure = handleError(error);
    logger.error('Command failed', failure, { code: failure.code });
    output.stderr(`Error: ${failure.message}`);
    return failure.exitCode;
  }
}
