/**
 * daylist exit codes.
 * Ranges: 0 = success, 1-99 = errors.
 */

export enum ExitCode {
  // === SUCCESS (0) ===
  SUCCESS = 0,

  // === GENERAL ERRORS (1-9) ===
  GENERAL_ERROR = 1,
  FILE_ERROR = 3,
  NOT_FOUND = 4,
  VALIDATION_ERROR = 6,
  CONFIG_ERROR = 8,
  ABORTED = 9,

  // === TASK MODEL ERRORS (10-19) ===
  INVALID_TRANSITION = 10,
  DUPLICATE_ID = 11,

  // === STORAGE / CRYPTO ERRORS (20-29) ===
  DATA_CORRUPTED = 20,
  CRYPTO_ERROR = 21,

  // === SYNC ERRORS (30-39) ===
  SYNC_FAILED = 30,
  REMOTE_DIVERGED = 31,
  SYNC_NOT_CONFIGURED = 32,
}

/** Check if an exit code represents an error (1-99). */
export function isErrorCode(code: ExitCode): boolean {
  return code >= 1 && code < 100;
}

/** Check if an exit code is recoverable (retry may succeed). */
export function isRecoverableCode(code: ExitCode): boolean {
  const nonRecoverable = new Set<ExitCode>([
    ExitCode.VALIDATION_ERROR,
    ExitCode.CONFIG_ERROR,
    ExitCode.INVALID_TRANSITION,
    ExitCode.DUPLICATE_ID,
    ExitCode.DATA_CORRUPTED,
    ExitCode.CRYPTO_ERROR,
    ExitCode.SYNC_NOT_CONFIGURED,
  ]);

  if (!isErrorCode(code)) return false;
  return !nonRecoverable.has(code);
}

/** Human-readable name for an exit code. */
export function getExitCodeName(code: ExitCode): string {
  return ExitCode[code] ?? 'UNKNOWN';
}
