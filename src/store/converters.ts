/**
 * Conversion between domain objects and the persisted document.
 */

import { TaskCollection } from '../core/tasks/collection.js';
import { Task } from '../core/tasks/task.js';
import type { StoreDocument, TaskRecord } from './schema.js';
import type { CollectionMetadata } from '../types/task.js';

/** Task → persisted record. Empty optional fields are left out. */
export function taskToRecord(task: Task): TaskRecord {
  const dueDate = task.dueDate;
  const completedAt = task.completedAt;
  const tags = task.tags;
  return {
    id: task.id.toString(),
    created_at: task.createdAt.toISOString(),
    title: task.title,
    ...(task.notes !== '' && { notes: task.notes }),
    status: task.status,
    ...(tags.length > 0 && { tags: [...tags] }),
    ...(dueDate && { due_date: dueDate.toISOString() }),
    ...(completedAt && { completed_at: completedAt.toISOString() }),
    deferred_count: task.deferredCount,
  };
}

/** Persisted record → Task. Throws ValidationError on an invariant violation. */
export function recordToTask(record: TaskRecord): Task {
  return Task.restore({
    id: record.id,
    createdAt: new Date(record.created_at),
    title: record.title,
    notes: record.notes ?? '',
    status: record.status,
    tags: record.tags ?? [],
    ...(record.due_date && { dueDate: new Date(record.due_date) }),
    ...(record.completed_at && { completedAt: new Date(record.completed_at) }),
    deferredCount: record.deferred_count,
  });
}

/**
 * Tasks are written in all() order so the document is deterministic.
 * `overrides` replace metadata fields in the document only.
 */
export function collectionToDocument(
  collection: TaskCollection,
  overrides?: Partial<CollectionMetadata>,
): StoreDocument {
  const meta = { ...collection.metadata, ...overrides };
  return {
    metadata: {
      version: meta.schemaVersion,
      last_modified: meta.lastModified.toISOString(),
      encryption: meta.encryptionMode,
      ...(meta.salt !== '' && { salt: meta.salt }),
    },
    tasks: collection.all().map(taskToRecord),
  };
}

export function documentToCollection(doc: StoreDocument): TaskCollection {
  return TaskCollection.restore(
    {
      schemaVersion: doc.metadata.version,
      lastModified: new Date(doc.metadata.last_modified),
      encryptionMode: doc.metadata.encryption,
      salt: doc.metadata.salt ?? '',
    },
    doc.tasks.map(recordToTask),
  );
}
