/**
 * Task filter matching.
 *
 * Semantics:
 *   - status: unset matches any status; set requires exact match
 *   - tags: unset or empty matches all; otherwise the task must carry every tag
 *   - dueAfter / dueBefore: inclusive; either bound rejects tasks with no due date
 *   - limit: ignored here, see applyLimit()
 */

import type { TaskFilter } from '../../types/task.js';
import type { Task } from './task.js';

export function matchesFilter(task: Task, filter: TaskFilter): boolean {
  if (filter.status !== undefined && task.status !== filter.status) {
    return false;
  }

  if (filter.tags && filter.tags.length > 0) {
    const taskTags = new Set(task.tags);
    if (!filter.tags.every((tag) => taskTags.has(tag))) {
      return false;
    }
  }

  if (filter.dueAfter || filter.dueBefore) {
    const due = task.dueDate;
    if (!due) return false;
    if (filter.dueAfter && due.getTime() < filter.dueAfter.getTime()) return false;
    if (filter.dueBefore && due.getTime() > filter.dueBefore.getTime()) return false;
  }

  return true;
}

/**
 * Apply the advisory result cap. A missing or non-positive limit keeps
 * every item.
 */
export function applyLimit<T>(items: readonly T[], filter: Pick<TaskFilter, 'limit'>): T[] {
  const limit = filter.limit;
  if (limit === undefined || limit <= 0) return [...items];
  return items.slice(0, limit);
}
