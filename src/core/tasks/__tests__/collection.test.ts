/**
 * Tests for the TaskCollection aggregate.
 */

import { describe, it, expect } from 'vitest';
import { TaskCollection, SCHEMA_VERSION } from '../collection.js';
import { Task } from '../task.js';
import { TaskId } from '../task-id.js';
import { ExitCode } from '../../../types/exit-codes.js';

function thrown(fn: () => unknown): unknown {
  try {
    fn();
  } catch (err) {
    return err;
  }
  throw new Error('expected function to throw');
}

function at(iso: string, title = iso): Task {
  return Task.create({ title, now: new Date(iso) });
}

describe('TaskCollection', () => {
  it('starts empty at the current schema version', () => {
    const collection = TaskCollection.empty();
    expect(collection.size).toBe(0);
    expect(collection.all()).toEqual([]);
    expect(collection.metadata.schemaVersion).toBe(SCHEMA_VERSION);
    expect(collection.metadata.encryptionMode).toBe('none');
  });

  describe('add / get / remove', () => {
    it('stores and retrieves a task by id or id string', () => {
      const collection = TaskCollection.empty();
      const task = Task.create({ title: 'Buy milk' });
      collection.add(task);

      expect(collection.get(task.id)).toBe(task);
      expect(collection.get(task.id.toString())).toBe(task);
      expect(collection.has(task.id)).toBe(true);
    });

    it('rejects a duplicate id without changing the size', () => {
      const collection = TaskCollection.empty();
      const task = Task.create({ title: 'Original' });
      collection.add(task);

      const twin = Task.restore({ ...task.toSnapshot(), title: 'Impostor' });
      expect(thrown(() => collection.add(twin))).toMatchObject({ code: ExitCode.DUPLICATE_ID });
      expect(collection.size).toBe(1);
      expect(collection.get(task.id).title).toBe('Original');
    });

    it('reports unknown ids as not found', () => {
      const collection = TaskCollection.empty();
      expect(thrown(() => collection.get(TaskId.generate()))).toMatchObject({ code: ExitCode.NOT_FOUND });
      expect(thrown(() => collection.remove(TaskId.generate()))).toMatchObject({ code: ExitCode.NOT_FOUND });
    });

    it('rejects malformed id strings as validation errors', () => {
      const collection = TaskCollection.empty();
      expect(thrown(() => collection.get('T001'))).toMatchObject({ code: ExitCode.VALIDATION_ERROR });
    });

    it('removes and returns the task', () => {
      const collection = TaskCollection.empty();
      const task = Task.create({ title: 'Temporary' });
      collection.add(task);

      expect(collection.remove(task.id)).toBe(task);
      expect(collection.size).toBe(0);
      expect(collection.has(task.id)).toBe(false);
    });
  });

  describe('all', () => {
    it('orders tasks newest first', () => {
      const collection = TaskCollection.empty();
      const t1 = at('2025-01-01T00:00:00.000Z');
      const t2 = at('2025-01-02T00:00:00.000Z');
      const t3 = at('2025-01-03T00:00:00.000Z');
      collection.add(t2);
      collection.add(t1);
      collection.add(t3);

      expect(collection.all()).toEqual([t3, t2, t1]);
    });

    it('orders equal timestamps by id', () => {
      const collection = TaskCollection.empty();
      const a = at('2025-01-01T00:00:00.000Z', 'a');
      const b = at('2025-01-01T00:00:00.000Z', 'b');
      collection.add(a);
      collection.add(b);

      const expected = [a, b].sort((x, y) => (x.id.toString() < y.id.toString() ? -1 : 1));
      expect(collection.all()).toEqual(expected);
    });

    it('returns a fresh array each time', () => {
      const collection = TaskCollection.empty();
      collection.add(Task.create({ title: 'One' }));
      const list = collection.all();
      list.pop();
      expect(collection.size).toBe(1);
      expect(collection.all()).toHaveLength(1);
    });
  });

  describe('find', () => {
    it('returns matches in newest-first order', () => {
      const collection = TaskCollection.empty();
      const older = at('2025-01-01T00:00:00.000Z');
      const newer = at('2025-01-02T00:00:00.000Z');
      const other = at('2025-01-03T00:00:00.000Z');
      older.setTags(['work']);
      newer.setTags(['work', 'urgent']);
      [older, newer, other].forEach((t) => collection.add(t));

      expect(collection.find({ tags: ['work'] })).toEqual([newer, older]);
      expect(collection.find({ tags: ['work', 'urgent'] })).toEqual([newer]);
      expect(collection.find({ status: 'done' })).toEqual([]);
    });

    it('does not apply the limit', () => {
      const collection = TaskCollection.empty();
      collection.add(Task.create({ title: 'A' }));
      collection.add(Task.create({ title: 'B' }));
      expect(collection.find({ limit: 1 })).toHaveLength(2);
    });
  });

  describe('routed mutations', () => {
    it('picks, defers and completes through the collection', () => {
      const collection = TaskCollection.empty();
      const task = Task.create({ title: 'Routed' });
      collection.add(task);

      expect(collection.pick(task.id).status).toBe('today');
      expect(collection.defer(task.id).deferredCount).toBe(1);
      const done = collection.complete(task.id, new Date('2025-06-01T00:00:00.000Z'));
      expect(done.completedAt?.toISOString()).toBe('2025-06-01T00:00:00.000Z');
    });

    it('refreshes lastModified on mutation', () => {
      const collection = TaskCollection.empty(new Date(0));
      collection.add(Task.create({ title: 'Touch' }));
      expect(collection.metadata.lastModified.getTime()).toBeGreaterThan(0);
    });

    it('updates attributes and clears the due date with null', () => {
      const collection = TaskCollection.empty();
      const task = Task.create({ title: 'Edit me' });
      task.setDueDate(new Date('2025-07-01T00:00:00.000Z'));
      collection.add(task);

      collection.update(task.id, { title: 'Edited', notes: 'see doc', tags: ['x'], dueDate: null });
      expect(task.title).toBe('Edited');
      expect(task.notes).toBe('see doc');
      expect(task.tags).toEqual(['x']);
      expect(task.dueDate).toBeUndefined();
    });

    it('rolls back a partially applied update', () => {
      const collection = TaskCollection.empty();
      const task = Task.create({ title: 'Stable', tags: ['keep'] });
      collection.add(task);

      const err = thrown(() => collection.update(task.id, {
        title: 'Changed',
        notes: 'changed',
        tags: ['changed'],
        dueDate: new Date('garbage'),
      }));
      expect(err).toMatchObject({ code: ExitCode.VALIDATION_ERROR, field: 'dueDate' });
      expect(task.title).toBe('Stable');
      expect(task.notes).toBe('');
      expect(task.tags).toEqual(['keep']);
    });
  });

  describe('restore', () => {
    it('keeps the stored lastModified', () => {
      const task = Task.create({ title: 'Persisted' });
      const collection = TaskCollection.restore(
        {
          schemaVersion: '1.0.0',
          lastModified: new Date('2024-12-31T23:00:00.000Z'),
          encryptionMode: 'scrypt-aes-256-gcm',
          salt: '',
        },
        [task],
      );
      expect(collection.size).toBe(1);
      expect(collection.metadata.lastModified.toISOString()).toBe('2024-12-31T23:00:00.000Z');
      expect(collection.metadata.encryptionMode).toBe('scrypt-aes-256-gcm');
    });

    it('rejects duplicate ids', () => {
      const task = Task.create({ title: 'Once' });
      const copy = Task.restore(task.toSnapshot());
      expect(thrown(() => TaskCollection.restore(TaskCollection.empty().metadata, [task, copy])))
        .toMatchObject({ code: ExitCode.DUPLICATE_ID });
    });
  });
});
