/**
 * Zod schemas for the decrypted store document.
 *
 * Document shape:
 *   { "metadata": { version, last_modified, encryption, salt? },
 *     "tasks": [ { id, created_at, title, notes?, status, tags?,
 *                  due_date?, completed_at?, deferred_count } ] }
 *
 * Optional fields are omitted when empty or unset. Shape is checked here;
 * task invariants are checked by Task.restore().
 */

import { z } from 'zod';
import { TASK_STATUSES } from './status-registry.js';

const isoTimestamp = z.string().datetime({ offset: true });

export const TaskRecordSchema = z.object({
  id: z.string(),
  created_at: isoTimestamp,
  title: z.string(),
  notes: z.string().optional(),
  status: z.enum(TASK_STATUSES),
  tags: z.array(z.string()).optional(),
  due_date: isoTimestamp.optional(),
  completed_at: isoTimestamp.optional(),
  deferred_count: z.number().int(),
});

export const StoreMetadataSchema = z.object({
  version: z.string().min(1),
  last_modified: isoTimestamp,
  encryption: z.string(),
  salt: z.string().optional(),
});

export const StoreDocumentSchema = z.object({
  metadata: StoreMetadataSchema,
  tasks: z.array(TaskRecordSchema),
});

export type TaskRecord = z.infer<typeof TaskRecordSchema>;
export type StoreMetadata = z.infer<typeof StoreMetadataSchema>;
export type StoreDocument = z.infer<typeof StoreDocumentSchema>;
