/**
 * Store module: the encrypted task repository and its parts.
 */

import type { DaylistConfig } from '../types/config.js';
import { getPassphraseFromEnv } from '../core/config.js';
import { ValidationError } from '../core/errors.js';
import { resolveDataPath } from '../core/paths.js';
import { PassphraseCipher } from './cipher.js';
import { EncryptedFileRepository } from './encrypted-repository.js';

export { PassphraseCipher, NoopCipher, MIN_PASSPHRASE_LENGTH, type Cipher } from './cipher.js';
export { EncryptedFileRepository, type EncryptedFileRepositoryOptions } from './encrypted-repository.js';
export type { TaskRepository, RepositoryOpOptions } from './repository.js';
export { atomicWrite, safeReadBuffer, safeReadFile } from './atomic.js';

/**
 * Open the configured store with a passphrase cipher.
 * The passphrase comes from the argument, else DAYLIST_PASSPHRASE.
 */
export function openStore(
  config: DaylistConfig,
  options?: { passphrase?: string; cwd?: string },
): EncryptedFileRepository {
  const passphrase = options?.passphrase ?? getPassphraseFromEnv();
  if (passphrase === undefined) {
    throw new ValidationError('passphrase', 'not provided (set DAYLIST_PASSPHRASE)');
  }
  return new EncryptedFileRepository({
    path: resolveDataPath(config.storage.path, options?.cwd),
    cipher: new PassphraseCipher(passphrase, { scryptCost: config.crypto.scryptCost }),
  });
}
