/**
 * daylist - encrypted, git-synced task store.
 */

// Types
export { ExitCode, isErrorCode, isRecoverableCode, getExitCodeName } from './types/exit-codes.js';
export type {
  TaskSnapshot,
  TaskFilter,
  TaskChanges,
  CollectionMetadata,
  PullResult,
  PushResult,
  TaskStatus,
  SyncStatus,
} from './types/task.js';
export type { DaylistConfig, ConfigSource, ResolvedValue } from './types/config.js';
export { TASK_STATUSES, SYNC_STATUSES, isTaskStatus, isSyncStatus } from './store/status-registry.js';

// Core
export { DaylistError, ValidationError, isDaylistError } from './core/errors.js';
export { loadConfig, getConfigValue, getPassphraseFromEnv } from './core/config.js';
export { initLogger, getLogger, closeLogger } from './core/logger.js';
export { getDataDir, getDaylistHome } from './core/paths.js';

// Tasks
export * from './core/tasks/index.js';

// Store
export * from './store/index.js';

// Sync
export * from './core/remote/index.js';
