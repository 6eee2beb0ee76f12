/**
 * Task identity: a random 128-bit value in canonical UUID form.
 */

import { randomUUID } from 'node:crypto';
import { ValidationError } from '../errors.js';

const UUID_PATTERN = /^[0-9a-f]{8}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{12}$/i;

const NIL_UUID = '00000000-0000-0000-0000-000000000000';

export class TaskId {
  /** The all-zero sentinel meaning "no identifier". */
  static readonly EMPTY = new TaskId(NIL_UUID);

  private constructor(private readonly value: string) {}

  /** Generate a fresh random identifier. */
  static generate(): TaskId {
    return new TaskId(randomUUID());
  }

  /**
   * Parse canonical UUID text. Case-insensitive; normalized to lower case.
   * The nil UUID parses to EMPTY.
   */
  static parse(text: string): TaskId {
    const trimmed = text.trim();
    if (!UUID_PATTERN.test(trimmed)) {
      throw new ValidationError('id', `not a valid identifier: "${text}"`);
    }
    const normalized = trimmed.toLowerCase();
    return normalized === NIL_UUID ? TaskId.EMPTY : new TaskId(normalized);
  }

  isEmpty(): boolean {
    return this.value === NIL_UUID;
  }

  equals(other: TaskId): boolean {
    return this.value === other.value;
  }

  toString(): string {
    return this.value;
  }

  toJSON(): string {
    return this.value;
  }
}

/** Accept either form at API boundaries. */
export type TaskIdLike = TaskId | string;

export function toTaskId(id: TaskIdLike): TaskId {
  return typeof id === 'string' ? TaskId.parse(id) : id;
}
