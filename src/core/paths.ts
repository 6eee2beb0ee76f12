/**
 * Path resolution for daylist.
 *
 * Environment variables:
 *   DAYLIST_HOME - Global directory (default: ~/.daylist)
 *   DAYLIST_DIR  - Project data directory (default: .daylist)
 */

import { resolve, join, isAbsolute } from 'node:path';
import { homedir } from 'node:os';

/**
 * Get the global daylist home directory.
 * Respects DAYLIST_HOME env var, defaults to ~/.daylist.
 */
export function getDaylistHome(): string {
  return process.env['DAYLIST_HOME'] ?? join(homedir(), '.daylist');
}

/**
 * Get the absolute path to the data directory.
 * An absolute DAYLIST_DIR wins; a relative one resolves against cwd.
 */
export function getDataDir(cwd?: string): string {
  const dir = process.env['DAYLIST_DIR'] ?? '.daylist';
  return isAbsolute(dir) ? dir : resolve(cwd ?? process.cwd(), dir);
}

export function getConfigPath(cwd?: string): string {
  return join(getDataDir(cwd), 'config.json');
}

export function getGlobalConfigPath(): string {
  return join(getDaylistHome(), 'config.json');
}

/**
 * Resolve a configured path against the data directory.
 */
export function resolveDataPath(pathFromConfig: string, cwd?: string): string {
  return isAbsolute(pathFromConfig) ? pathFromConfig : join(getDataDir(cwd), pathFromConfig);
}
