/**
 * Task type definitions shared by the model, the store, and sync.
 */

import type { TaskStatus, SyncStatus } from '../store/status-registry.js';
export type { TaskStatus, SyncStatus };

/**
 * Plain, detached view of a task. Produced by `Task#toSnapshot()` and
 * accepted by `Task.restore()`.
 */
export interface TaskSnapshot {
  id: string;
  createdAt: Date;
  title: string;
  notes: string;
  status: TaskStatus;
  tags: string[];
  dueDate?: Date;
  completedAt?: Date;
  deferredCount: number;
}

/** Criteria for querying a collection. Unset fields match everything. */
export interface TaskFilter {
  status?: TaskStatus;
  /** Task must carry every listed tag. */
  tags?: readonly string[];
  /** Inclusive lower bound on dueDate. */
  dueAfter?: Date;
  /** Inclusive upper bound on dueDate. */
  dueBefore?: Date;
  /** Advisory cap, applied by callers via applyLimit(). */
  limit?: number;
}

/** Editable task attributes. */
export interface TaskChanges {
  title?: string;
  notes?: string;
  tags?: readonly string[];
  /** `null` clears the due date. */
  dueDate?: Date | null;
}

/** Persistence metadata carried by a collection. */
export interface CollectionMetadata {
  schemaVersion: string;
  lastModified: Date;
  /** Cipher mode tag the blob was last written with. */
  encryptionMode: string;
  /** Opaque, cipher-specific value. Empty when unused. */
  salt: string;
}

/** Result of a pull. A conflict is a handled outcome, not an error. */
export interface PullResult {
  conflict: boolean;
  message: string;
  /** Where the pre-pull local blob was kept when a conflict was resolved. */
  backupPath?: string;
}

/** Result of a push. */
export interface PushResult {
  /** False when there was nothing to push. */
  pushed: boolean;
  message: string;
}
