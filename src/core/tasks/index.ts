/**
 * Task model and operations.
 */

export { TaskId, toTaskId, type TaskIdLike } from './task-id.js';
export { Task, type CreateTaskOptions } from './task.js';
export { TaskCollection, SCHEMA_VERSION } from './collection.js';
export { matchesFilter, applyLimit } from './filter.js';
export {
  addTask,
  pickTask,
  deferTask,
  completeTask,
  updateTask,
  deleteTask,
  listTasks,
  type AddTaskOptions,
} from './task-ops.js';
