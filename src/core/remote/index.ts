/**
 * Remote synchronization of the encrypted store blob.
 */

import type { DaylistConfig } from '../../types/config.js';
import { resolveDataPath } from '../paths.js';
import { GitSyncAdapter } from './git-sync.js';
import type { CommandRunner } from './runner.js';

export { GitSyncAdapter, parseLeftRightCount, type GitSyncOptions } from './git-sync.js';
export { ExecFileRunner, type CommandRunner, type CommandResult, type RunOptions } from './runner.js';
export { classifySync, type SyncAdapter, type SyncOpOptions } from './sync-adapter.js';

/**
 * Build the git adapter for the configured store.
 */
export function createSyncAdapter(
  config: DaylistConfig,
  options?: { cwd?: string; runner?: CommandRunner },
): GitSyncAdapter {
  return new GitSyncAdapter({
    blobPath: resolveDataPath(config.storage.path, options?.cwd),
    remote: config.sync.remote,
    branch: config.sync.branch,
    timeoutMs: config.sync.timeoutMs,
    commitPrefix: config.sync.commitPrefix,
    backupDir: resolveDataPath(config.storage.backupDir, options?.cwd),
    runner: options?.runner,
  });
}
