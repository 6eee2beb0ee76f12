/**
 * Atomic file write operations using write-file-atomic.
 * Ensures writes are crash-safe: temp file in the same directory -> rename.
 * A failed or aborted write leaves the previous file untouched.
 */

import writeFileAtomic from 'write-file-atomic';
import { readFile, mkdir } from 'node:fs/promises';
import { dirname } from 'node:path';
import { DaylistError } from '../core/errors.js';
import { ExitCode } from '../types/exit-codes.js';

/** Options shared by the read/write helpers. */
export interface FileOpOptions {
  /** Abort before the file is replaced. */
  signal?: AbortSignal;
}

export function isErrnoCode(err: unknown, code: string): boolean {
  return err instanceof Error && 'code' in err && err.code === code;
}

export function isAbortError(err: unknown): boolean {
  return err instanceof Error && err.name === 'AbortError';
}

function checkAborted(signal: AbortSignal | undefined, filePath: string): void {
  if (signal?.aborted) {
    throw new DaylistError(ExitCode.ABORTED, `Operation aborted: ${filePath}`, {
      cause: signal.reason,
    });
  }
}

/**
 * Write data to a file atomically.
 * Creates parent directories if they don't exist.
 */
export async function atomicWrite(
  filePath: string,
  data: string | Buffer,
  options?: FileOpOptions & { mode?: number },
): Promise<void> {
  checkAborted(options?.signal, filePath);
  try {
    await mkdir(dirname(filePath), { recursive: true });
    checkAborted(options?.signal, filePath);
    await writeFileAtomic(filePath, data, {
      mode: options?.mode,
      fsync: true,
    });
  } catch (err) {
    if (err instanceof DaylistError) throw err;
    throw new DaylistError(
      ExitCode.FILE_ERROR,
      `Atomic write failed: ${filePath}`,
      { cause: err },
    );
  }
}

/**
 * Read a file fully as bytes.
 * Returns null if the file does not exist.
 */
export async function safeReadBuffer(filePath: string, options?: FileOpOptions): Promise<Buffer | null> {
  try {
    return await readFile(filePath, { signal: options?.signal });
  } catch (err: unknown) {
    if (isErrnoCode(err, 'ENOENT')) {
      return null;
    }
    if (isAbortError(err)) {
      throw new DaylistError(ExitCode.ABORTED, `Operation aborted: ${filePath}`, { cause: err });
    }
    throw new DaylistError(
      ExitCode.FILE_ERROR,
      `Failed to read: ${filePath}`,
      { cause: err },
    );
  }
}

/**
 * Read a text file.
 * Returns null if the file does not exist.
 */
export async function safeReadFile(filePath: string, options?: FileOpOptions): Promise<string | null> {
  const buffer = await safeReadBuffer(filePath, options);
  return buffer === null ? null : buffer.toString('utf8');
}
