/**
 * Plain JSON file reading for configuration files.
 */

import { safeReadFile } from './atomic.js';
import { DaylistError } from '../core/errors.js';
import { ExitCode } from '../types/exit-codes.js';

/**
 * Read and parse a JSON file.
 * Returns null if the file does not exist. Callers validate the shape.
 */
export async function readJson(filePath: string): Promise<unknown> {
  const content = await safeReadFile(filePath);
  if (content === null) return null;

  try {
    const parsed: unknown = JSON.parse(content);
    return parsed;
  } catch (err) {
    throw new DaylistError(
      ExitCode.CONFIG_ERROR,
      `Invalid JSON in: ${filePath}`,
      { cause: err },
    );
  }
}

export function isPlainObject(value: unknown): value is Record<string, unknown> {
  return value !== null && typeof value === 'object' && !Array.isArray(value);
}
