/**
 * SyncAdapter: the remote synchronization port.
 *
 * Adapters move the encrypted blob between the local store and a remote
 * copy. They never decrypt it.
 */

import type { PullResult, PushResult, SyncStatus } from '../../types/task.js';

export interface SyncOpOptions {
  signal?: AbortSignal;
}

export interface SyncAdapter {
  /** Classify local vs. remote: synced, ahead, behind or diverged. */
  status(options?: SyncOpOptions): Promise<SyncStatus>;

  /** Commit and upload local changes. A no-op when there is nothing to push. */
  push(options?: SyncOpOptions): Promise<PushResult>;

  /** Bring in remote changes. Conflicts are resolved and reported, not thrown. */
  pull(options?: SyncOpOptions): Promise<PullResult>;
}

/**
 * Map revision counts to a sync status.
 *
 * @param localAhead  - Local revisions (or pending changes) the remote lacks
 * @param remoteAhead - Remote revisions the local copy lacks
 */
export function classifySync(localAhead: number, remoteAhead: number): SyncStatus {
  if (localAhead > 0 && remoteAhead > 0) return 'diverged';
  if (localAhead > 0) return 'ahead';
  if (remoteAhead > 0) return 'behind';
  return 'synced';
}
