/**
 * Task entity and its lifecycle state machine.
 *
 *   pool ──pick──▶ today ──complete──▶ done
 *    ▲               │
 *    └────defer──────┘   (deferredCount += 1)
 *
 * `done` is terminal: only the identical, idempotent transition is allowed
 * out of it. A rejected transition throws INVALID_TRANSITION and leaves the
 * task untouched.
 */

import { DaylistError, ValidationError } from '../errors.js';
import { ExitCode } from '../../types/exit-codes.js';
import { isTaskStatus, TERMINAL_TASK_STATUSES } from '../../store/status-registry.js';
import type { TaskSnapshot, TaskStatus } from '../../types/task.js';
import { TaskId } from './task-id.js';

/** Options for Task.create(). */
export interface CreateTaskOptions {
  title: string;
  tags?: readonly string[];
  /** Creation time; defaults to the current time. */
  now?: Date;
}

function isValidDate(value: Date | undefined): value is Date {
  return value instanceof Date && !Number.isNaN(value.getTime());
}

function copyDate(value: Date | undefined): Date | undefined {
  return value ? new Date(value.getTime()) : undefined;
}

function normalizeTitle(title: string): string {
  const trimmed = title.trim();
  if (trimmed === '') {
    throw new ValidationError('title', 'task title cannot be empty');
  }
  return trimmed;
}

export class Task {
  readonly id: TaskId;
  private readonly _createdAt: Date;
  private _title: string;
  private _notes: string;
  private _status: TaskStatus;
  private _tags: string[];
  private _dueDate?: Date;
  private _completedAt?: Date;
  private _deferredCount: number;

  private constructor(id: TaskId, props: Omit<TaskSnapshot, 'id'>) {
    this.id = id;
    this._createdAt = new Date(props.createdAt.getTime());
    this._title = props.title;
    this._notes = props.notes;
    this._status = props.status;
    this._tags = [...props.tags];
    this._dueDate = copyDate(props.dueDate);
    this._completedAt = copyDate(props.completedAt);
    this._deferredCount = props.deferredCount;
  }

  /**
   * Create a new task in the pool with a fresh identifier.
   * The title is trimmed; an empty result is rejected.
   */
  static create(options: CreateTaskOptions): Task {
    const title = normalizeTitle(options.title);
    const createdAt = options.now ?? new Date();
    if (!isValidDate(createdAt)) {
      throw new ValidationError('createdAt', 'not a valid date');
    }
    return new Task(TaskId.generate(), {
      createdAt,
      title,
      notes: '',
      status: 'pool',
      tags: options.tags ? [...options.tags] : [],
      deferredCount: 0,
    });
  }

  /**
   * Rebuild a task from persisted or snapshot data. Throws ValidationError
   * when the data breaks an invariant.
   */
  static restore(snapshot: TaskSnapshot): Task {
    const task = new Task(TaskId.parse(snapshot.id), snapshot);
    task.validate();
    return task;
  }

  get createdAt(): Date {
    return new Date(this._createdAt.getTime());
  }

  get title(): string {
    return this._title;
  }

  get notes(): string {
    return this._notes;
  }

  get status(): TaskStatus {
    return this._status;
  }

  get tags(): readonly string[] {
    return [...this._tags];
  }

  get dueDate(): Date | undefined {
    return copyDate(this._dueDate);
  }

  get completedAt(): Date | undefined {
    return copyDate(this._completedAt);
  }

  get deferredCount(): number {
    return this._deferredCount;
  }

  // ---- Lifecycle ----

  /** pool → today. Idempotent on today; rejected on done. */
  pick(): void {
    this.assertNotTerminal('pick', 'today');
    this._status = 'today';
  }

  /** today → pool, counting the deferral. Idempotent on pool; rejected on done. */
  defer(): void {
    this.assertNotTerminal('defer', 'pool');
    if (this._status === 'today') {
      this._status = 'pool';
      this._deferredCount += 1;
    }
  }

  /** Any status → done. Completing a done task keeps the original completedAt. */
  complete(now: Date = new Date()): void {
    if (!isValidDate(now)) {
      throw new ValidationError('completedAt', 'not a valid date');
    }
    if (this._status === 'done') return;
    this._status = 'done';
    this._completedAt = new Date(now.getTime());
  }

  // ---- Editing ----

  rename(title: string): void {
    this._title = normalizeTitle(title);
  }

  setNotes(notes: string): void {
    this._notes = notes;
  }

  setTags(tags: readonly string[]): void {
    this._tags = [...tags];
  }

  setDueDate(dueDate: Date | undefined): void {
    if (dueDate !== undefined && !isValidDate(dueDate)) {
      throw new ValidationError('dueDate', 'not a valid date');
    }
    this._dueDate = copyDate(dueDate);
  }

  // ---- Invariants ----

  /**
   * Re-check every invariant. Throws a ValidationError naming the first
   * offending field.
   */
  validate(): void {
    if (this.id.isEmpty()) {
      throw new ValidationError('id', 'identifier must not be empty');
    }
    if (!isValidDate(this._createdAt)) {
      throw new ValidationError('createdAt', 'not a valid date');
    }
    if (this._title.trim() === '') {
      throw new ValidationError('title', 'task title cannot be empty');
    }
    if (!isTaskStatus(this._status)) {
      throw new ValidationError('status', `invalid task status: "${String(this._status)}"`);
    }
    if (!Number.isInteger(this._deferredCount) || this._deferredCount < 0) {
      throw new ValidationError('deferredCount', 'must be a non-negative integer');
    }
    if (this._status === 'done' && !isValidDate(this._completedAt)) {
      throw new ValidationError('completedAt', 'must be set when status is done');
    }
    if (this._status !== 'done' && this._completedAt !== undefined) {
      throw new ValidationError('completedAt', `must be unset when status is ${this._status}`);
    }
    if (this._dueDate !== undefined && !isValidDate(this._dueDate)) {
      throw new ValidationError('dueDate', 'not a valid date');
    }
  }

  /** Detached plain copy. */
  toSnapshot(): TaskSnapshot {
    return {
      id: this.id.toString(),
      createdAt: this.createdAt,
      title: this._title,
      notes: this._notes,
      status: this._status,
      tags: [...this._tags],
      ...(this._dueDate && { dueDate: this.dueDate }),
      ...(this._completedAt && { completedAt: this.completedAt }),
      deferredCount: this._deferredCount,
    };
  }

  private assertNotTerminal(action: string, target: TaskStatus): void {
    if (TERMINAL_TASK_STATUSES.has(this._status) && this._status !== target) {
      throw new DaylistError(
        ExitCode.INVALID_TRANSITION,
        `invalid state transition: cannot ${action} task ${this.id.toString()} (${this._status} → ${target})`,
        { fix: 'Completed tasks cannot be reopened' },
      );
    }
  }
}
