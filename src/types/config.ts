/**
 * Configuration type definitions for daylist.
 * Covers project and global config with cascade resolution.
 */

/** Pino log levels. */
export type LogLevel = 'trace' | 'debug' | 'info' | 'warn' | 'error' | 'fatal' | 'silent';

/** Storage configuration. */
export interface StorageConfig {
  /** Blob path, relative to the data directory unless absolute (default: 'tasks.enc') */
  path: string;
  /** Directory for conflict backups, relative to the data directory (default: '.backups') */
  backupDir: string;
}

/** Encryption configuration. The passphrase is never part of config. */
export interface CryptoConfig {
  /** scrypt N; a power of two (default: 16384) */
  scryptCost: number;
}

/** Remote synchronization configuration. */
export interface SyncConfig {
  remote: string;
  /** Branch to sync; empty means the current branch. */
  branch: string;
  /** Per git invocation. */
  timeoutMs: number;
  commitPrefix: string;
}

/** Logging configuration. */
export interface LoggingConfig {
  /** Minimum log level to record (default: 'info') */
  level: LogLevel;
  /** Log file path relative to the data directory (default: 'logs/daylist.log') */
  filePath: string;
  /** Maximum log file size in bytes before rotation (default: 10MB) */
  maxFileSize: number;
  /** Number of rotated log files to retain (default: 5) */
  maxFiles: number;
}

/** Full daylist configuration. */
export interface DaylistConfig {
  version: string;
  storage: StorageConfig;
  crypto: CryptoConfig;
  sync: SyncConfig;
  logging: LoggingConfig;
}

/** Where a resolved value came from. */
export type ConfigSource = 'env' | 'project' | 'global' | 'default';

/** A config value with its source. */
export interface ResolvedValue<T = unknown> {
  value: T;
  source: ConfigSource;
}
