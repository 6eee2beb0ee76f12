/**
 * Command runner capability for the sync adapter.
 *
 * "Run this command, get exit status and output." A non-zero exit is a
 * normal result the caller interprets; only a failure to run at all
 * (missing executable, timeout, abort) throws.
 */

import { execFile } from 'node:child_process';
import { DaylistError } from '../errors.js';
import { ExitCode } from '../../types/exit-codes.js';

export interface CommandResult {
  exitCode: number;
  stdout: string;
  stderr: string;
}

export interface RunOptions {
  cwd: string;
  env?: NodeJS.ProcessEnv;
  signal?: AbortSignal;
  timeoutMs?: number;
}

export interface CommandRunner {
  run(command: string, args: readonly string[], options: RunOptions): Promise<CommandResult>;
}

/** child_process.execFile-backed runner. */
export class ExecFileRunner implements CommandRunner {
  run(command: string, args: readonly string[], options: RunOptions): Promise<CommandResult> {
    return new Promise((resolve, reject) => {
      execFile(
        command,
        args,
        {
          cwd: options.cwd,
          env: options.env,
          signal: options.signal,
          timeout: options.timeoutMs,
          maxBuffer: 16 * 1024 * 1024,
          encoding: 'utf8',
        },
        (error, stdout, stderr) => {
          if (!error) {
            resolve({ exitCode: 0, stdout, stderr });
            return;
          }
          if (typeof error.code === 'number' && !error.killed) {
            resolve({ exitCode: error.code, stdout, stderr });
            return;
          }
          const label = `${command} ${args[0] ?? ''}`.trim();
          if (error.name === 'AbortError') {
            reject(new DaylistError(ExitCode.ABORTED, `${label} aborted`, { cause: error }));
          } else if (error.killed) {
            reject(new DaylistError(
              ExitCode.SYNC_FAILED,
              `${label} timed out after ${options.timeoutMs ?? 0}ms`,
              { cause: error },
            ));
          } else {
            reject(new DaylistError(
              ExitCode.SYNC_FAILED,
              `Failed to run ${label}: ${error.message}`,
              { cause: error, fix: `Make sure '${command}' is installed and on PATH` },
            ));
          }
        },
      );
    });
  }
}
