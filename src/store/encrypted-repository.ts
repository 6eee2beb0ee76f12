/**
 * Encrypted single-blob repository.
 *
 * Pipeline:
 *   save: collection -> document -> JSON -> cipher.encrypt -> atomic write
 *   load: read -> cipher.decrypt -> JSON -> zod -> Task.restore -> collection
 *
 * The write goes to a temp file in the target directory and is renamed into
 * place, so readers only ever see the old blob or the new one.
 */

import { DaylistError, isDaylistError } from '../core/errors.js';
import { getLogger } from '../core/logger.js';
import { TaskCollection } from '../core/tasks/collection.js';
import { ExitCode } from '../types/exit-codes.js';
import { atomicWrite, safeReadBuffer } from './atomic.js';
import type { Cipher } from './cipher.js';
import { collectionToDocument, documentToCollection } from './converters.js';
import type { RepositoryOpOptions, TaskRepository } from './repository.js';
import { StoreDocumentSchema } from './schema.js';

const log = () => getLogger('store');

export interface EncryptedFileRepositoryOptions {
  /** Absolute path of the encrypted blob. */
  path: string;
  cipher: Cipher;
}

function corruptedAt(path: string, detail: string, cause?: unknown): DaylistError {
  return new DaylistError(
    ExitCode.DATA_CORRUPTED,
    `Store is corrupted or the passphrase is wrong: ${path} (${detail})`,
    { cause, fix: 'Check the passphrase, or restore the blob from a backup' },
  );
}

export class EncryptedFileRepository implements TaskRepository {
  readonly path: string;
  private readonly cipher: Cipher;
  private closed = false;

  constructor(options: EncryptedFileRepositoryOptions) {
    this.path = options.path;
    this.cipher = options.cipher;
  }

  async load(options?: RepositoryOpOptions): Promise<TaskCollection> {
    this.assertOpen('load');

    const blob = await safeReadBuffer(this.path, options);
    if (blob === null) {
      log().debug({ path: this.path }, 'No stored blob; starting with an empty collection');
      return TaskCollection.empty();
    }

    let plaintext: Buffer;
    try {
      plaintext = await this.cipher.decrypt(blob);
    } catch (err) {
      throw corruptedAt(this.path, 'decryption failed', err);
    }

    let parsed: unknown;
    try {
      parsed = JSON.parse(plaintext.toString('utf8'));
    } catch (err) {
      throw corruptedAt(this.path, 'invalid JSON', err);
    }

    const result = StoreDocumentSchema.safeParse(parsed);
    if (!result.success) {
      throw corruptedAt(this.path, 'unexpected document shape', result.error);
    }

    let collection: TaskCollection;
    try {
      collection = documentToCollection(result.data);
    } catch (err) {
      const detail = err instanceof Error ? err.message : String(err);
      throw corruptedAt(this.path, detail, err);
    }

    log().debug({ path: this.path, tasks: collection.size }, 'Loaded collection');
    return collection;
  }

  async save(collection: TaskCollection, options?: RepositoryOpOptions): Promise<void> {
    this.assertOpen('save');

    // Applied to the collection only once the blob is in place.
    const stamp = { lastModified: new Date(), encryptionMode: this.cipher.mode };
    const json = JSON.stringify(collectionToDocument(collection, stamp));

    let blob: Buffer;
    try {
      blob = await this.cipher.encrypt(Buffer.from(json, 'utf8'));
    } catch (err) {
      if (isDaylistError(err)) throw err;
      throw new DaylistError(ExitCode.CRYPTO_ERROR, `Encryption failed: ${this.path}`, { cause: err });
    }

    await atomicWrite(this.path, blob, { mode: 0o600, signal: options?.signal });
    collection.setMetadata(stamp);
    log().debug({ path: this.path, tasks: collection.size, bytes: blob.length }, 'Saved collection');
  }

  async close(): Promise<void> {
    this.closed = true;
  }

  private assertOpen(operation: string): void {
    if (this.closed) {
      throw new DaylistError(
        ExitCode.GENERAL_ERROR,
        `Cannot ${operation}: repository is closed (${this.path})`,
      );
    }
  }
}
