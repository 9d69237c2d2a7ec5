/**
 * Default file locations for a KiCad project directory.
 */

import { existsSync } from 'fs';
import path from 'path';
import { config } from '../../config.js';

export interface ProjectPaths {
  /** Directory offered for inputs and outputs */
  workDir: string;
  /** production/positions.csv when the project has one */
  placementPath: string | null;
  machineOutputPath: string;
  templateOutputPath: string;
}

export function resolveProjectPaths(projectDir: string = process.cwd()): ProjectPaths {
  const positions = path.join(projectDir, 'production', 'positions.csv');
  const hasPositions = existsSync(positions);
  const workDir = hasPositions ? path.dirname(positions) : projectDir;

  return {
    workDir,
    placementPath: hasPositions ? positions : null,
    machineOutputPath: path.join(workDir, config.output.machineFileName),
    templateOutputPath: path.join(workDir, config.output.templateFileName),
  };
}
