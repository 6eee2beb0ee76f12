/**
 * pino logging for daylist.
 *
 * One root logger per process, with a child per subsystem ('store', 'sync',
 * 'tasks'). After initLogger() records go to a pino-roll file under the data
 * directory; before it, warnings and above go to stderr. stdout is left to
 * whatever front end embeds the store.
 *
 * Task contents and passphrases are never logged; `passphrase` keys are
 * redacted should one slip into a bound object.
 */

import pino from 'pino';
import { dirname, join } from 'node:path';
import { mkdirSync } from 'node:fs';
import type { LoggingConfig } from '../types/config.js';

const REDACT_PATHS = ['passphrase', '*.passphrase'];

const baseOptions: pino.LoggerOptions = {
  formatters: {
    level: (label: string) => ({ level: label.toUpperCase() }),
  },
  redact: { paths: REDACT_PATHS, censor: '[redacted]' },
};

let rootLogger: pino.Logger | null = null;
let fallbackLogger: pino.Logger | null = null;
const children = new Map<string, pino.Logger>();

/**
 * Byte count as a pino-roll size string ('10m', '1g', '500k').
 */
export function bytesToSizeString(bytes: number): string {
  const units: Array<[number, string]> = [
    [1024 * 1024 * 1024, 'g'],
    [1024 * 1024, 'm'],
    [1024, 'k'],
  ];
  for (const [size, suffix] of units) {
    if (bytes >= size) return `${Math.floor(bytes / size)}${suffix}`;
  }
  return `${bytes}`;
}

/**
 * Route logging to a rotating file under `dataDir`. Call once at startup;
 * loggers handed out earlier are replaced on their next getLogger() call.
 */
export function initLogger(dataDir: string, config: LoggingConfig): pino.Logger {
  const file = join(dataDir, config.filePath);
  mkdirSync(dirname(file), { recursive: true });

  // Runs in a worker thread.
  const transport = pino.transport({
    target: 'pino-roll',
    options: {
      file,
      size: bytesToSizeString(config.maxFileSize),
      frequency: 'daily',
      mkdir: true,
      limit: { count: config.maxFiles },
    },
  });

  rootLogger = pino(
    { ...baseOptions, level: config.level, timestamp: pino.stdTimeFunctions.isoTime },
    transport,
  );
  children.clear();
  return rootLogger;
}

function activeRoot(): pino.Logger {
  if (rootLogger) return rootLogger;
  fallbackLogger ??= pino({ ...baseOptions, level: 'warn' }, pino.destination(2));
  return fallbackLogger;
}

/**
 * Child logger for a subsystem. Safe before initLogger().
 * Resolve it at the call site rather than caching it in module scope.
 */
export function getLogger(subsystem: string): pino.Logger {
  let child = children.get(subsystem);
  if (!child) {
    child = activeRoot().child({ subsystem });
    children.set(subsystem, child);
  }
  return child;
}

/**
 * Flush and detach the file logger. Later getLogger() calls fall back to stderr.
 */
export function closeLogger(): void {
  rootLogger?.flush();
  rootLogger = null;
  children.clear();
}
