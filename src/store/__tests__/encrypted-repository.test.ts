/**
 * Tests for the encrypted single-blob repository.
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtemp, rm, readFile, writeFile, readdir } from 'node:fs/promises';
import { join } from 'node:path';
import { tmpdir } from 'node:os';
import { EncryptedFileRepository } from '../encrypted-repository.js';
import { NoopCipher, PassphraseCipher, type Cipher } from '../cipher.js';
import { TaskCollection } from '../../core/tasks/collection.js';
import { Task } from '../../core/tasks/task.js';
import { ExitCode } from '../../types/exit-codes.js';

const FAST = { scryptCost: 1024 };

describe('EncryptedFileRepository', () => {
  let tempDir: string;
  let blobPath: string;

  beforeEach(async () => {
    tempDir = await mkdtemp(join(tmpdir(), 'daylist-repo-'));
    blobPath = join(tempDir, 'data', 'tasks.enc');
  });

  afterEach(async () => {
    await rm(tempDir, { recursive: true, force: true });
  });

  function encrypted(passphrase = 'test-secret-passphrase'): EncryptedFileRepository {
    return new EncryptedFileRepository({ path: blobPath, cipher: new PassphraseCipher(passphrase, FAST) });
  }

  it('loads an empty collection when no blob exists', async () => {
    const collection = await encrypted().load();
    expect(collection.size).toBe(0);
  });

  it('round-trips a collection', async () => {
    const repo = encrypted();
    const collection = TaskCollection.empty();
    const milk = Task.create({ title: 'Buy milk', tags: ['errand'], now: new Date('2025-02-01T08:00:00.000Z') });
    const report = Task.create({ title: 'Write report', now: new Date('2025-02-02T08:00:00.000Z') });
    report.pick();
    report.setNotes('draft in docs/');
    report.setDueDate(new Date('2025-02-10T17:00:00.000Z'));
    collection.add(milk);
    collection.add(report);
    milk.complete(new Date('2025-02-03T09:00:00.000Z'));

    await repo.save(collection);
    const loaded = await encrypted().load();

    expect(loaded.all().map((t) => t.toSnapshot())).toEqual([report.toSnapshot(), milk.toSnapshot()]);
    expect(loaded.metadata.encryptionMode).toBe('scrypt-aes-256-gcm');
    expect(loaded.metadata.schemaVersion).toBe('1.0.0');
  });

  it('writes ciphertext only', async () => {
    const collection = TaskCollection.empty();
    collection.add(Task.create({ title: 'Visible title' }));
    await encrypted().save(collection);

    const raw = await readFile(blobPath);
    expect(raw.subarray(0, 4).toString('ascii')).toBe('DLST');
    expect(raw.includes(Buffer.from('Visible title', 'utf8'))).toBe(false);
  });

  it('fails with a corruption error for the wrong passphrase', async () => {
    const collection = TaskCollection.empty();
    collection.add(Task.create({ title: 'Secret' }));
    await encrypted().save(collection);

    const err = await encrypted('a-different-test-secret').load().catch((e: unknown) => e);
    expect(err).toMatchObject({ code: ExitCode.DATA_CORRUPTED });
    expect(err).toHaveProperty(
      'message',
      `Store is corrupted or the passphrase is wrong: ${blobPath} (decryption failed)`,
    );
  });

  it('fails with a corruption error for damaged bytes', async () => {
    await encrypted().save(TaskCollection.empty());
    const raw = await readFile(blobPath);
    raw[raw.length - 1] ^= 0xff;
    await writeFile(blobPath, raw);

    await expect(encrypted().load()).rejects.toMatchObject({ code: ExitCode.DATA_CORRUPTED });
  });

  describe('document format', () => {
    function plainRepo(): EncryptedFileRepository {
      return new EncryptedFileRepository({ path: blobPath, cipher: new NoopCipher() });
    }

    it('uses snake_case keys and omits empty fields', async () => {
      const collection = TaskCollection.empty();
      const task = Task.create({ title: 'Buy milk', now: new Date('2025-02-01T08:00:00.000Z') });
      collection.add(task);
      await plainRepo().save(collection);

      const doc: unknown = JSON.parse(await readFile(blobPath, 'utf8'));
      expect(doc).toMatchObject({
        metadata: { version: '1.0.0', encryption: 'none' },
        tasks: [{
          id: task.id.toString(),
          created_at: '2025-02-01T08:00:00.000Z',
          title: 'Buy milk',
          status: 'pool',
          deferred_count: 0,
        }],
      });
      const text = await readFile(blobPath, 'utf8');
      expect(text).not.toContain('"notes"');
      expect(text).not.toContain('"tags"');
      expect(text).not.toContain('"due_date"');
      expect(text).not.toContain('"completed_at"');
      expect(text).not.toContain('"salt"');
    });

    it('rejects JSON that is not a store document', async () => {
      await plainRepo().save(TaskCollection.empty());
      await writeFile(blobPath, '{"tasks": "nope"}');
      await expect(plainRepo().load()).rejects.toMatchObject({ code: ExitCode.DATA_CORRUPTED });
    });

    it('rejects text that is not JSON', async () => {
      await plainRepo().save(TaskCollection.empty());
      await writeFile(blobPath, 'not json at all');
      const err = await plainRepo().load().catch((e: unknown) => e);
      expect(err).toMatchObject({ code: ExitCode.DATA_CORRUPTED });
      expect(err).toHaveProperty(
        'message',
        `Store is corrupted or the passphrase is wrong: ${blobPath} (invalid JSON)`,
      );
    });

    it('rejects records that break task invariants', async () => {
      await plainRepo().save(TaskCollection.empty());
      await writeFile(blobPath, JSON.stringify({
        metadata: { version: '1.0.0', last_modified: '2025-01-01T00:00:00.000Z', encryption: 'none' },
        tasks: [{
          id: '6f1c2a9e-4b7d-4e21-9a3f-0c5d8e7b1a24',
          created_at: '2025-01-01T00:00:00.000Z',
          title: 'Done without a timestamp',
          status: 'done',
          deferred_count: 0,
        }],
      }));
      const err = await plainRepo().load().catch((e: unknown) => e);
      expect(err).toMatchObject({ code: ExitCode.DATA_CORRUPTED });
      expect(err).toHaveProperty(
        'message',
        `Store is corrupted or the passphrase is wrong: ${blobPath} (validation failed for completedAt: must be set when status is done)`,
      );
    });

    it('keeps the stored salt and last-modified time on load', async () => {
      await plainRepo().save(TaskCollection.empty());
      await writeFile(blobPath, JSON.stringify({
        metadata: {
          version: '1.0.0',
          last_modified: '2024-11-05T10:00:00.000Z',
          encryption: 'none',
          salt: 'c2FsdA==',
        },
        tasks: [],
      }));
      const loaded = await plainRepo().load();
      expect(loaded.metadata.salt).toBe('c2FsdA==');
      expect(loaded.metadata.lastModified.toISOString()).toBe('2024-11-05T10:00:00.000Z');
    });
  });

  it('keeps the previous blob when a save is aborted', async () => {
    const repo = encrypted();
    const first = TaskCollection.empty();
    first.add(Task.create({ title: 'Original' }));
    await repo.save(first);
    const before = await readFile(blobPath);

    const second = await repo.load();
    second.add(Task.create({ title: 'Never written' }));
    const controller = new AbortController();
    controller.abort();

    await expect(repo.save(second, { signal: controller.signal }))
      .rejects.toMatchObject({ code: ExitCode.ABORTED });
    expect((await readFile(blobPath)).equals(before)).toBe(true);
    expect(await readdir(join(tempDir, 'data'))).toEqual(['tasks.enc']);
  });

  it('leaves collection metadata alone when a save fails', async () => {
    const failing: Cipher = {
      mode: 'broken',
      encrypt: async () => {
        throw new Error('no key material');
      },
      decrypt: async (data) => Buffer.from(data),
    };
    const repo = new EncryptedFileRepository({ path: blobPath, cipher: failing });
    const collection = TaskCollection.empty(new Date('2025-01-01T00:00:00.000Z'));

    await expect(repo.save(collection)).rejects.toMatchObject({ code: ExitCode.CRYPTO_ERROR });
    expect(collection.metadata.lastModified.toISOString()).toBe('2025-01-01T00:00:00.000Z');
    expect(collection.metadata.encryptionMode).toBe('none');
  });

  it('stamps collection metadata after a successful save', async () => {
    const collection = TaskCollection.empty(new Date('2025-01-01T00:00:00.000Z'));
    await encrypted().save(collection);
    expect(collection.metadata.encryptionMode).toBe('scrypt-aes-256-gcm');
    expect(collection.metadata.lastModified.getTime())
      .toBeGreaterThan(new Date('2025-01-01T00:00:00.000Z').getTime());
  });

  it('refuses to work after close', async () => {
    const repo = encrypted();
    await repo.close();
    await repo.close();

    await expect(repo.load()).rejects.toMatchObject({
      code: ExitCode.GENERAL_ERROR,
      message: `Cannot load: repository is closed (${blobPath})`,
    });
    await expect(repo.save(TaskCollection.empty())).rejects.toMatchObject({ code: ExitCode.GENERAL_ERROR });
  });
});
