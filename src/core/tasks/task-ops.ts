/**
 * Task operations over a TaskRepository.
 *
 * Each operation is one self-contained load → mutate → save round trip and
 * returns detached snapshots, so a front end can dispatch it as a unit of
 * work and render the result later.
 */

import { getLogger } from '../logger.js';
import type { RepositoryOpOptions, TaskRepository } from '../../store/repository.js';
import type { TaskChanges, TaskFilter, TaskSnapshot } from '../../types/task.js';
import type { TaskCollection } from './collection.js';
import { applyLimit } from './filter.js';
import { Task } from './task.js';
import type { TaskIdLike } from './task-id.js';

const log = () => getLogger('tasks');

/** Options for adding a task. */
export interface AddTaskOptions {
  title: string;
  tags?: readonly string[];
  notes?: string;
  dueDate?: Date;
}

async function mutate<T>(
  repo: TaskRepository,
  fn: (collection: TaskCollection) => T,
  options?: RepositoryOpOptions,
): Promise<T> {
  const collection = await repo.load(options);
  const result = fn(collection);
  await repo.save(collection, options);
  return result;
}

export async function addTask(
  repo: TaskRepository,
  input: AddTaskOptions,
  options?: RepositoryOpOptions,
): Promise<TaskSnapshot> {
  const task = Task.create({ title: input.title, tags: input.tags });
  if (input.notes !== undefined) task.setNotes(input.notes);
  if (input.dueDate !== undefined) task.setDueDate(input.dueDate);

  const snapshot = await mutate(repo, (collection) => {
    collection.add(task);
    return task.toSnapshot();
  }, options);
  log().info({ taskId: snapshot.id }, 'Task added');
  return snapshot;
}

export async function pickTask(
  repo: TaskRepository,
  id: TaskIdLike,
  options?: RepositoryOpOptions,
): Promise<TaskSnapshot> {
  return mutate(repo, (collection) => collection.pick(id).toSnapshot(), options);
}

export async function deferTask(
  repo: TaskRepository,
  id: TaskIdLike,
  options?: RepositoryOpOptions,
): Promise<TaskSnapshot> {
  return mutate(repo, (collection) => collection.defer(id).toSnapshot(), options);
}

export async function completeTask(
  repo: TaskRepository,
  id: TaskIdLike,
  options?: RepositoryOpOptions,
): Promise<TaskSnapshot> {
  const snapshot = await mutate(repo, (collection) => collection.complete(id).toSnapshot(), options);
  log().info({ taskId: snapshot.id }, 'Task completed');
  return snapshot;
}

export async function updateTask(
  repo: TaskRepository,
  id: TaskIdLike,
  changes: TaskChanges,
  options?: RepositoryOpOptions,
): Promise<TaskSnapshot> {
  return mutate(repo, (collection) => collection.update(id, changes).toSnapshot(), options);
}

export async function deleteTask(
  repo: TaskRepository,
  id: TaskIdLike,
  options?: RepositoryOpOptions,
): Promise<TaskSnapshot> {
  const snapshot = await mutate(repo, (collection) => collection.remove(id).toSnapshot(), options);
  log().info({ taskId: snapshot.id }, 'Task deleted');
  return snapshot;
}

/**
 * Query the store. Results are newest first, capped by filter.limit.
 */
export async function listTasks(
  repo: TaskRepository,
  filter: TaskFilter = {},
  options?: RepositoryOpOptions,
): Promise<TaskSnapshot[]> {
  const collection = await repo.load(options);
  return applyLimit(collection.find(filter), filter).map((task) => task.toSnapshot());
}
