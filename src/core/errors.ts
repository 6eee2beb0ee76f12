/**
 * daylist error types with exit code integration.
 *
 * Every failure the store raises is a DaylistError; callers branch on
 * `code` rather than on message text.
 */

import { ExitCode, getExitCodeName } from '../types/exit-codes.js';

/**
 * Structured error class for daylist operations.
 * Carries an exit code, human-readable message, and optional fix suggestion.
 */
export class DaylistError extends Error {
  readonly code: ExitCode;
  readonly fix?: string;

  constructor(
    code: ExitCode,
    message: string,
    options?: {
      fix?: string;
      cause?: unknown;
    },
  ) {
    super(message, { cause: options?.cause });
    this.name = 'DaylistError';
    this.code = code;
    this.fix = options?.fix;
  }

  /** Structured JSON representation for machine-readable output. */
  toJSON(): Record<string, unknown> {
    return {
      success: false,
      error: {
        code: this.code,
        name: getExitCodeName(this.code),
        message: this.message,
        ...(this.fix && { fix: this.fix }),
      },
    };
  }
}

/**
 * An invariant violation on a single field.
 */
export class ValidationError extends DaylistError {
  readonly field: string;
  readonly reason: string;

  constructor(field: string, reason: string, options?: { cause?: unknown }) {
    super(ExitCode.VALIDATION_ERROR, `validation failed for ${field}: ${reason}`, options);
    this.name = 'ValidationError';
    this.field = field;
    this.reason = reason;
  }
}

/**
 * Type guard for DaylistError, optionally narrowed to one exit code.
 */
export function isDaylistError(err: unknown, code?: ExitCode): err is DaylistError {
  if (!(err instanceof DaylistError)) return false;
  return code === undefined || err.code === code;
}
