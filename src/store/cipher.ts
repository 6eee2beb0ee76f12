/**
 * Cipher port and implementations.
 *
 * The repository only ever sees opaque bytes through this port. Decryption
 * failures are reported as DATA_CORRUPTED without saying whether the key was
 * wrong or the data was damaged.
 */

import { createCipheriv, createDecipheriv, randomBytes, scrypt } from 'node:crypto';
import { DaylistError, ValidationError } from '../core/errors.js';
import { ExitCode } from '../types/exit-codes.js';

/** Authenticated encryption of opaque payloads. */
export interface Cipher {
  /** Tag recorded in collection metadata, e.g. 'scrypt-aes-256-gcm'. */
  readonly mode: string;
  encrypt(plaintext: Uint8Array): Promise<Buffer>;
  decrypt(ciphertext: Uint8Array): Promise<Buffer>;
}

/** Minimum passphrase length accepted by PassphraseCipher. */
export const MIN_PASSPHRASE_LENGTH = 12;

/** Default scrypt cost parameter (N). */
export const DEFAULT_SCRYPT_COST = 16384;

const MAGIC = Buffer.from('DLST', 'ascii');
const FORMAT_VERSION = 1;
const SALT_LENGTH = 16;
const IV_LENGTH = 12;
const TAG_LENGTH = 16;
const KEY_LENGTH = 32;
const HEADER_LENGTH = MAGIC.length + 1 + SALT_LENGTH + IV_LENGTH;

export interface PassphraseCipherOptions {
  /** scrypt N; a power of two. */
  scryptCost?: number;
}

function corrupted(cause?: unknown): DaylistError {
  return new DaylistError(
    ExitCode.DATA_CORRUPTED,
    'Decryption failed: data is corrupted or the passphrase is wrong',
    { cause },
  );
}

/**
 * Passphrase-based AEAD: scrypt key derivation and AES-256-GCM.
 *
 * Blob layout: magic "DLST" | version | salt(16) | iv(12) | tag(16) | ciphertext.
 * The header (magic through iv) is bound as associated data. Salt and IV are
 * fresh on every encrypt, so equal inputs give different outputs.
 */
export class PassphraseCipher implements Cipher {
  readonly mode = 'scrypt-aes-256-gcm';
  private readonly passphrase: string;
  private readonly cost: number;

  constructor(passphrase: string, options?: PassphraseCipherOptions) {
    if (passphrase.length < MIN_PASSPHRASE_LENGTH) {
      throw new ValidationError(
        'passphrase',
        `must be at least ${MIN_PASSPHRASE_LENGTH} characters`,
      );
    }
    const cost = options?.scryptCost ?? DEFAULT_SCRYPT_COST;
    if (!Number.isInteger(cost) || cost < 2 || (cost & (cost - 1)) !== 0) {
      throw new ValidationError('scryptCost', 'must be a power of two greater than 1');
    }
    this.passphrase = passphrase;
    this.cost = cost;
  }

  async encrypt(plaintext: Uint8Array): Promise<Buffer> {
    const salt = randomBytes(SALT_LENGTH);
    const iv = randomBytes(IV_LENGTH);
    const header = Buffer.concat([MAGIC, Buffer.from([FORMAT_VERSION]), salt, iv]);

    try {
      const key = await this.deriveKey(salt);
      const cipher = createCipheriv('aes-256-gcm', key, iv, { authTagLength: TAG_LENGTH });
      cipher.setAAD(header);
      const body = Buffer.concat([cipher.update(plaintext), cipher.final()]);
      return Buffer.concat([header, cipher.getAuthTag(), body]);
    } catch (err) {
      throw new DaylistError(ExitCode.CRYPTO_ERROR, 'Encryption failed', { cause: err });
    }
  }

  async decrypt(ciphertext: Uint8Array): Promise<Buffer> {
    const blob = Buffer.from(ciphertext);
    if (blob.length < HEADER_LENGTH + TAG_LENGTH) throw corrupted();
    if (!blob.subarray(0, MAGIC.length).equals(MAGIC)) throw corrupted();
    if (blob[MAGIC.length] !== FORMAT_VERSION) throw corrupted();

    const header = blob.subarray(0, HEADER_LENGTH);
    const salt = blob.subarray(MAGIC.length + 1, MAGIC.length + 1 + SALT_LENGTH);
    const iv = blob.subarray(MAGIC.length + 1 + SALT_LENGTH, HEADER_LENGTH);
    const tag = blob.subarray(HEADER_LENGTH, HEADER_LENGTH + TAG_LENGTH);
    const body = blob.subarray(HEADER_LENGTH + TAG_LENGTH);

    try {
      const key = await this.deriveKey(salt);
      const decipher = createDecipheriv('aes-256-gcm', key, iv, { authTagLength: TAG_LENGTH });
      decipher.setAAD(header);
      decipher.setAuthTag(tag);
      return Buffer.concat([decipher.update(body), decipher.final()]);
    } catch (err) {
      throw corrupted(err);
    }
  }

  private deriveKey(salt: Buffer): Promise<Buffer> {
    return new Promise((resolve, reject) => {
      scrypt(
        this.passphrase,
        salt,
        KEY_LENGTH,
        { N: this.cost, r: 8, p: 1, maxmem: 256 * this.cost * 8 },
        (err, key) => {
          if (err) reject(err);
          else resolve(key);
        },
      );
    });
  }
}

/**
 * Identity cipher for test harnesses. Never use it for real data.
 */
export class NoopCipher implements Cipher {
  readonly mode = 'none';

  async encrypt(plaintext: Uint8Array): Promise<Buffer> {
    return Buffer.from(plaintext);
  }

  async decrypt(ciphertext: Uint8Array): Promise<Buffer> {
    return Buffer.from(ciphertext);
  }
}
