/**
 * TaskCollection: the aggregate root that owns every task.
 *
 * The collection is the only holder of the id → task map and the only place
 * the uniqueness invariant is enforced. Callers get single task references
 * through get()/find()/all(); the map itself never leaves this class.
 */

import { DaylistError } from '../errors.js';
import { ExitCode } from '../../types/exit-codes.js';
import type { CollectionMetadata, TaskChanges, TaskFilter } from '../../types/task.js';
import { matchesFilter } from './filter.js';
import type { Task } from './task.js';
import { toTaskId, type TaskIdLike } from './task-id.js';

/** Schema version written into new collections. */
export const SCHEMA_VERSION = '1.0.0';

/** Newest first; equal timestamps fall back to id order. */
function byCreatedDesc(a: Task, b: Task): number {
  const diff = b.createdAt.getTime() - a.createdAt.getTime();
  if (diff !== 0) return diff;
  const idA = a.id.toString();
  const idB = b.id.toString();
  return idA < idB ? -1 : idA > idB ? 1 : 0;
}

export class TaskCollection {
  private readonly tasks = new Map<string, Task>();
  private _metadata: CollectionMetadata;

  constructor(metadata: CollectionMetadata) {
    this._metadata = { ...metadata, lastModified: new Date(metadata.lastModified.getTime()) };
  }

  /** A new, empty collection at the current schema version. */
  static empty(now: Date = new Date()): TaskCollection {
    return new TaskCollection({
      schemaVersion: SCHEMA_VERSION,
      lastModified: now,
      encryptionMode: 'none',
      salt: '',
    });
  }

  /**
   * Rebuild a persisted collection. Duplicate ids are rejected; the stored
   * lastModified is kept.
   */
  static restore(metadata: CollectionMetadata, tasks: Iterable<Task>): TaskCollection {
    const collection = new TaskCollection(metadata);
    for (const task of tasks) {
      collection.add(task);
    }
    collection.setMetadata({ lastModified: new Date(metadata.lastModified.getTime()) });
    return collection;
  }

  get metadata(): Readonly<CollectionMetadata> {
    return { ...this._metadata, lastModified: new Date(this._metadata.lastModified.getTime()) };
  }

  /** Update persistence metadata. Used by the storage layer. */
  setMetadata(changes: Partial<CollectionMetadata>): void {
    this._metadata = { ...this._metadata, ...changes };
  }

  get size(): number {
    return this.tasks.size;
  }

  has(id: TaskIdLike): boolean {
    return this.tasks.has(toTaskId(id).toString());
  }

  // ---- CRUD ----

  /** Insert a task. Never overwrites: a colliding id is DUPLICATE_ID. */
  add(task: Task): void {
    const key = task.id.toString();
    if (this.tasks.has(key)) {
      throw new DaylistError(
        ExitCode.DUPLICATE_ID,
        `task with this ID already exists: ${key}`,
      );
    }
    this.tasks.set(key, task);
    this.touch();
  }

  get(id: TaskIdLike): Task {
    const key = toTaskId(id).toString();
    const task = this.tasks.get(key);
    if (!task) {
      throw new DaylistError(ExitCode.NOT_FOUND, `task not found: ${key}`);
    }
    return task;
  }

  /** Remove and return a task. */
  remove(id: TaskIdLike): Task {
    const task = this.get(id);
    this.tasks.delete(task.id.toString());
    this.touch();
    return task;
  }

  // ---- Queries ----

  /** Every task, newest first. */
  all(): Task[] {
    return [...this.tasks.values()].sort(byCreatedDesc);
  }

  /** Every task matching the filter, in all() order. The limit is not applied. */
  find(filter: TaskFilter): Task[] {
    return this.all().filter((task) => matchesFilter(task, filter));
  }

  // ---- Routed mutations ----

  pick(id: TaskIdLike): Task {
    const task = this.get(id);
    task.pick();
    this.touch();
    return task;
  }

  defer(id: TaskIdLike): Task {
    const task = this.get(id);
    task.defer();
    this.touch();
    return task;
  }

  complete(id: TaskIdLike, now?: Date): Task {
    const task = this.get(id);
    task.complete(now);
    this.touch();
    return task;
  }

  /**
   * Apply attribute edits. A rejected edit is rolled back, leaving the task
   * unchanged.
   */
  update(id: TaskIdLike, changes: TaskChanges): Task {
    const task = this.get(id);
    const before = task.toSnapshot();
    try {
      if (changes.title !== undefined) task.rename(changes.title);
      if (changes.notes !== undefined) task.setNotes(changes.notes);
      if (changes.tags !== undefined) task.setTags(changes.tags);
      if (changes.dueDate !== undefined) task.setDueDate(changes.dueDate ?? undefined);
    } catch (err) {
      task.rename(before.title);
      task.setNotes(before.notes);
      task.setTags(before.tags);
      task.setDueDate(before.dueDate);
      throw err;
    }
    this.touch();
    return task;
  }

  private touch(): void {
    this._metadata.lastModified = new Date();
  }
}
