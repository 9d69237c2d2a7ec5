/**
 * Whole-file text IO with failures mapped to FileAccessError.
 */

import * as fs from 'fs/promises';
import { FileAccessError } from './errors.js';

function describe(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  return String(error);
}

export async function readTextFile(filePath: string, operation: string): Promise<string> {
  try {
    return await fs.readFile(filePath, 'utf8');
  } catch (error) {
    throw new FileAccessError('read', filePath, describe(error), { operation });
  }
}

export async function writeTextFile(
  filePath: string,
  content: string,
  operation: string
): Promise<void> {
  try {
    await fs.writeFile(filePath, content, 'utf8');
  } catch (error) {
    throw new FileAccessError('write', filePath, describe(error), { operation });
  }
}
