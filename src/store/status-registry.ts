/**
 * Status registry: single source of truth for the status enums.
 *
 * Dependency direction:
 *   status-registry.ts → types/task.ts, core/tasks/*, store/schema.ts
 */

// === TASK LIFECYCLE ===

export const TASK_STATUSES = ['pool', 'today', 'done'] as const;

// === SYNC ===

export const SYNC_STATUSES = ['synced', 'ahead', 'behind', 'diverged'] as const;

// === DERIVED TYPES ===

export type TaskStatus = typeof TASK_STATUSES[number];
export type SyncStatus = typeof SYNC_STATUSES[number];

// === TERMINAL STATE SETS ===

/** Statuses a task never leaves except through the identical transition. */
export const TERMINAL_TASK_STATUSES: ReadonlySet<TaskStatus> = new Set<TaskStatus>(['done']);

// === GUARDS ===

/** Structural check: is `value` one of the task statuses? */
export function isTaskStatus(value: unknown): value is TaskStatus {
  return typeof value === 'string' && TASK_STATUSES.some((status) => status === value);
}

export function isSyncStatus(value: unknown): value is SyncStatus {
  return typeof value === 'string' && SYNC_STATUSES.some((status) => status === value);
}
