/**
 * Configuration engine for daylist.
 *
 * Resolution priority: Environment vars > Project config > Global config > Defaults
 */

import { z } from 'zod';
import type { ConfigSource, DaylistConfig, ResolvedValue } from '../types/config.js';
import { readJson, isPlainObject } from '../store/json.js';
import { getConfigPath, getGlobalConfigPath } from './paths.js';
import { DaylistError } from './errors.js';
import { ExitCode } from '../types/exit-codes.js';

/** Default configuration values. */
const DEFAULTS: DaylistConfig = {
  version: '1.0.0',
  storage: {
    path: 'tasks.enc',
    backupDir: '.backups',
  },
  crypto: {
    scryptCost: 16384,
  },
  sync: {
    remote: 'origin',
    branch: '',
    timeoutMs: 30_000,
    commitPrefix: 'chore(daylist):',
  },
  logging: {
    level: 'info',
    filePath: 'logs/daylist.log',
    maxFileSize: 10 * 1024 * 1024, // 10MB
    maxFiles: 5,
  },
};

const ConfigSchema: z.ZodType<DaylistConfig> = z.object({
  version: z.string(),
  storage: z.object({
    path: z.string().min(1),
    backupDir: z.string().min(1),
  }),
  crypto: z.object({
    scryptCost: z.number().int().min(2),
  }),
  sync: z.object({
    remote: z.string().min(1),
    branch: z.string(),
    timeoutMs: z.number().int().positive(),
    commitPrefix: z.string(),
  }),
  logging: z.object({
    level: z.enum(['trace', 'debug', 'info', 'warn', 'error', 'fatal', 'silent']),
    filePath: z.string().min(1),
    maxFileSize: z.number().int().positive(),
    maxFiles: z.number().int().positive(),
  }),
});

/** Environment variable to config path mapping. */
const ENV_MAP: Record<string, string> = {
  'DAYLIST_STORE_PATH': 'storage.path',
  'DAYLIST_BACKUP_DIR': 'storage.backupDir',
  'DAYLIST_SCRYPT_COST': 'crypto.scryptCost',
  'DAYLIST_SYNC_REMOTE': 'sync.remote',
  'DAYLIST_SYNC_BRANCH': 'sync.branch',
  'DAYLIST_SYNC_TIMEOUT_MS': 'sync.timeoutMs',
  'DAYLIST_LOG_LEVEL': 'logging.level',
  'DAYLIST_LOG_FILE': 'logging.filePath',
};

/**
 * Get a value at a dotted path from an object.
 */
function getNestedValue(obj: Record<string, unknown>, path: string): unknown {
  let current: unknown = obj;
  for (const part of path.split('.')) {
    if (!isPlainObject(current)) {
      return undefined;
    }
    current = current[part];
  }
  return current;
}

/**
 * Set a value at a dotted path in an object (mutates).
 */
function setNestedValue(obj: Record<string, unknown>, path: string, value: unknown): void {
  const parts = path.split('.');
  const last = parts.pop();
  if (last === undefined) return;
  let current = obj;
  for (const part of parts) {
    const next = current[part];
    if (isPlainObject(next)) {
      current = next;
    } else {
      const created: Record<string, unknown> = {};
      current[part] = created;
      current = created;
    }
  }
  current[last] = value;
}

/**
 * Deep merge two objects. Source values override target values.
 * Arrays are replaced (not merged).
 */
function deepMerge(target: Record<string, unknown>, source: Record<string, unknown>): Record<string, unknown> {
  const result = { ...target };
  for (const key of Object.keys(source)) {
    const sourceVal = source[key];
    const targetVal = result[key];
    if (isPlainObject(sourceVal) && isPlainObject(targetVal)) {
      result[key] = deepMerge(targetVal, sourceVal);
    } else {
      result[key] = sourceVal;
    }
  }
  return result;
}

/**
 * Parse an environment variable value to the appropriate type.
 */
function parseEnvValue(value: string): unknown {
  if (value === 'true') return true;
  if (value === 'false') return false;
  const num = Number(value);
  if (!isNaN(num) && value.trim() !== '') return num;
  return value;
}

async function readConfigFile(filePath: string): Promise<Record<string, unknown> | null> {
  const data = await readJson(filePath);
  if (data === null) return null;
  if (!isPlainObject(data)) {
    throw new DaylistError(ExitCode.CONFIG_ERROR, `Config must be a JSON object: ${filePath}`);
  }
  return data;
}

function defaultsAsRecord(): Record<string, unknown> {
  const copy: unknown = JSON.parse(JSON.stringify(DEFAULTS));
  return isPlainObject(copy) ? copy : {};
}

/**
 * Load and merge configuration from all sources.
 * Priority: defaults < global config < project config < environment vars
 */
export async function loadConfig(cwd?: string): Promise<DaylistConfig> {
  let merged = defaultsAsRecord();

  // Layer 1: Global config
  const globalConfig = await readConfigFile(getGlobalConfigPath());
  if (globalConfig) {
    merged = deepMerge(merged, globalConfig);
  }

  // Layer 2: Project config
  const projectConfig = await readConfigFile(getConfigPath(cwd));
  if (projectConfig) {
    merged = deepMerge(merged, projectConfig);
  }

  // Layer 3: Environment variables
  for (const [envKey, configPath] of Object.entries(ENV_MAP)) {
    const envValue = process.env[envKey];
    if (envValue !== undefined) {
      setNestedValue(merged, configPath, parseEnvValue(envValue));
    }
  }

  const result = ConfigSchema.safeParse(merged);
  if (!result.success) {
    const issue = result.error.issues[0];
    const where = issue ? issue.path.join('.') : '(root)';
    throw new DaylistError(
      ExitCode.CONFIG_ERROR,
      `Invalid configuration at ${where}: ${issue?.message ?? 'unknown error'}`,
      { cause: result.error },
    );
  }
  return result.data;
}

/**
 * Get a single config value with source tracking.
 */
export async function getConfigValue(path: string, cwd?: string): Promise<ResolvedValue> {
  for (const [envKey, configPath] of Object.entries(ENV_MAP)) {
    const envValue = process.env[envKey];
    if (configPath === path && envValue !== undefined) {
      return { value: parseEnvValue(envValue), source: 'env' };
    }
  }

  const layers: Array<[ConfigSource, Record<string, unknown> | null]> = [
    ['project', await readConfigFile(getConfigPath(cwd))],
    ['global', await readConfigFile(getGlobalConfigPath())],
  ];
  for (const [source, config] of layers) {
    if (!config) continue;
    const val = getNestedValue(config, path);
    if (val !== undefined) {
      return { value: val, source };
    }
  }

  return { value: getNestedValue(defaultsAsRecord(), path), source: 'default' };
}

/**
 * The store passphrase from DAYLIST_PASSPHRASE, if set. Never read from files.
 */
export function getPassphraseFromEnv(): string | undefined {
  const value = process.env['DAYLIST_PASSPHRASE'];
  return value === undefined || value === '' ? undefined : value;
}
