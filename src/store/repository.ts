/**
 * TaskRepository: the storage port.
 *
 * The only interface through which front ends read or write persisted
 * state. Implementations own serialization, encryption and atomicity; the
 * collection they return is the caller's to mutate until the next save().
 */

import type { TaskCollection } from '../core/tasks/collection.js';

/** Per-call options. */
export interface RepositoryOpOptions {
  /** Cancels pending I/O. A cancelled save never replaces the stored blob. */
  signal?: AbortSignal;
}

export interface TaskRepository {
  /** Load the stored collection, or a new empty one when nothing is stored. */
  load(options?: RepositoryOpOptions): Promise<TaskCollection>;

  /** Persist the collection atomically. */
  save(collection: TaskCollection, options?: RepositoryOpOptions): Promise<void>;

  /** Release resources. Idempotent. */
  close(): Promise<void>;
}
