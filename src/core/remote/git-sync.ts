/**
 * Git-backed sync adapter for the encrypted store blob.
 *
 * The blob's directory is a git work tree with a configured remote. Only
 * the blob file is ever staged. Conflict policy is last-write-wins in
 * favour of the remote: the pre-pull local blob is copied to the backup
 * directory and the remote version becomes the local state.
 */

import { basename, dirname, join } from 'node:path';
import { DaylistError, isDaylistError } from '../errors.js';
import { getLogger } from '../logger.js';
import { ExitCode } from '../../types/exit-codes.js';
import type { PullResult, PushResult, SyncStatus } from '../../types/task.js';
import { atomicWrite, safeReadBuffer } from '../../store/atomic.js';
import { ExecFileRunner, type CommandResult, type CommandRunner } from './runner.js';
import { classifySync, type SyncAdapter, type SyncOpOptions } from './sync-adapter.js';

const log = () => getLogger('sync');

/** Options for GitSyncAdapter. */
export interface GitSyncOptions {
  /** Absolute path of the encrypted blob; its directory is the work tree. */
  blobPath: string;
  remote?: string;
  /** Defaults to the current branch, or 'main' on an unborn HEAD. */
  branch?: string;
  runner?: CommandRunner;
  /** Per git invocation (default 30s). */
  timeoutMs?: number;
  commitPrefix?: string;
  /** Where conflict backups go (default: <work tree>/.backups). */
  backupDir?: string;
  /** Clock for backup names. */
  now?: () => Date;
}

const REJECTED_PUSH = /rejected|non-fast-forward|fetch first/i;

/**
 * Parse `git rev-list --left-right --count A...B` output ("<left>\t<right>").
 */
export function parseLeftRightCount(stdout: string): { ahead: number; behind: number } | null {
  const match = stdout.trim().match(/^(\d+)\s+(\d+)$/);
  if (!match) return null;
  return { ahead: Number(match[1]), behind: Number(match[2]) };
}

export class GitSyncAdapter implements SyncAdapter {
  readonly blobPath: string;
  readonly remote: string;
  private readonly workTree: string;
  private readonly fileName: string;
  private readonly branchOverride?: string;
  private readonly runner: CommandRunner;
  private readonly timeoutMs: number;
  private readonly commitPrefix: string;
  private readonly backupDir: string;
  private readonly now: () => Date;

  constructor(options: GitSyncOptions) {
    this.blobPath = options.blobPath;
    this.workTree = dirname(options.blobPath);
    this.fileName = basename(options.blobPath);
    this.remote = options.remote ?? 'origin';
    this.branchOverride = options.branch || undefined;
    this.runner = options.runner ?? new ExecFileRunner();
    this.timeoutMs = options.timeoutMs ?? 30_000;
    this.commitPrefix = options.commitPrefix ?? 'chore(daylist):';
    this.backupDir = options.backupDir ?? join(this.workTree, '.backups');
    this.now = options.now ?? (() => new Date());
  }

  async status(options?: SyncOpOptions): Promise<SyncStatus> {
    await this.ensureRepo(options);
    const branch = await this.currentBranch(options);
    await this.fetch(options);

    const dirty = await this.hasLocalChanges(options);
    const { ahead, behind } = await this.revisionCounts(branch, options);
    const status = classifySync(ahead + (dirty ? 1 : 0), behind);

    log().debug({ branch, ahead, behind, dirty, status }, 'Sync status');
    return status;
  }

  async push(options?: SyncOpOptions): Promise<PushResult> {
    await this.ensureRepo(options);
    const branch = await this.currentBranch(options);
    await this.commitLocalChanges(options);

    if (!(await this.hasHead(options))) {
      return { pushed: false, message: 'Nothing to push' };
    }

    const remoteExists = await this.remoteBranchExists(branch, options);
    if (remoteExists) {
      const { ahead } = await this.revisionCounts(branch, options);
      if (ahead === 0) {
        return { pushed: false, message: 'Nothing to push' };
      }
    }

    const args = remoteExists
      ? ['push', this.remote, branch]
      : ['push', '-u', this.remote, branch];
    const result = await this.git(args, options);

    if (result.exitCode !== 0) {
      if (REJECTED_PUSH.test(result.stderr)) {
        throw new DaylistError(
          ExitCode.REMOTE_DIVERGED,
          `Push rejected: ${this.remote}/${branch} has diverged`,
          { fix: 'Pull first, then push again' },
        );
      }
      throw new DaylistError(
        ExitCode.SYNC_FAILED,
        `Push failed: ${result.stderr.trim() || `exit code ${result.exitCode}`}`,
      );
    }

    log().info({ remote: this.remote, branch }, 'Pushed store');
    return { pushed: true, message: `Pushed ${branch} to ${this.remote}` };
  }

  async pull(options?: SyncOpOptions): Promise<PullResult> {
    await this.ensureRepo(options);
    const branch = await this.currentBranch(options);
    await this.fetch(options);

    const remoteRef = `${this.remote}/${branch}`;
    if (!(await this.remoteBranchExists(branch, options))) {
      return { conflict: false, message: `No remote branch '${remoteRef}' found. Nothing to pull.` };
    }

    await this.commitLocalChanges(options);
    const { ahead, behind } = await this.revisionCounts(branch, options);

    if (behind === 0) {
      return { conflict: false, message: 'Already up to date' };
    }

    if (ahead === 0) {
      await this.gitOk(['merge', '--ff-only', remoteRef], options, 'Fast-forward failed');
      log().info({ remoteRef }, 'Fast-forwarded store');
      return { conflict: false, message: `Fast-forwarded to ${remoteRef}` };
    }

    const localBlob = await safeReadBuffer(this.blobPath, options);
    // A store created on both sides independently shares no history.
    const merge = await this.git(['merge', '--no-edit', '--allow-unrelated-histories', remoteRef], options);
    if (merge.exitCode === 0) {
      log().info({ remoteRef }, 'Merged remote store');
      return { conflict: false, message: `Merged ${remoteRef}` };
    }

    // --relative keeps the pathspec and output relative to the blob's
    // directory, which need not be the repository root.
    const unmerged = await this.git(
      ['diff', '--name-only', '--diff-filter=U', '--relative', '--', this.fileName],
      options,
    );
    if (unmerged.stdout.trim() === '') {
      await this.git(['merge', '--abort'], options);
      throw new DaylistError(
        ExitCode.SYNC_FAILED,
        `Merge failed: ${merge.stderr.trim() || merge.stdout.trim() || `exit code ${merge.exitCode}`}`,
      );
    }

    return this.resolveConflict(remoteRef, localBlob, options);
  }

  /**
   * Keep the remote blob; preserve the local one under the backup directory.
   */
  private async resolveConflict(
    remoteRef: string,
    localBlob: Buffer | null,
    options?: SyncOpOptions,
  ): Promise<PullResult> {
    const stamp = this.now().toISOString().replace(/[:.]/g, '-');
    const backupPath = join(this.backupDir, `${this.fileName}.${stamp}.conflict`);

    if (localBlob !== null) {
      await atomicWrite(backupPath, localBlob, { mode: 0o600 });
    }

    await this.gitOk(['checkout', '--theirs', '--', this.fileName], options, 'Conflict resolution failed');
    await this.gitOk(['add', '--', this.fileName], options, 'Conflict resolution failed');
    await this.gitOk(['commit', '--no-edit', '--no-verify'], options, 'Conflict resolution failed');

    log().warn({ remoteRef, backupPath }, 'Store conflict resolved in favour of remote');

    const message = localBlob !== null
      ? `Conflict with ${remoteRef}: kept the remote version. Local copy saved to ${backupPath}`
      : `Conflict with ${remoteRef}: kept the remote version. No local copy to back up`;
    return {
      conflict: true,
      message,
      ...(localBlob !== null && { backupPath }),
    };
  }

  // ---- git plumbing ----

  private async git(args: string[], options?: SyncOpOptions): Promise<CommandResult> {
    try {
      return await this.runner.run('git', args, {
        cwd: this.workTree,
        env: { ...process.env, GIT_TERMINAL_PROMPT: '0' },
        signal: options?.signal,
        timeoutMs: this.timeoutMs,
      });
    } catch (err) {
      if (isDaylistError(err)) throw err;
      throw new DaylistError(ExitCode.SYNC_FAILED, `git ${args[0] ?? ''} failed to run`, { cause: err });
    }
  }

  private async gitOk(args: string[], options: SyncOpOptions | undefined, what: string): Promise<CommandResult> {
    const result = await this.git(args, options);
    if (result.exitCode !== 0) {
      throw new DaylistError(
        ExitCode.SYNC_FAILED,
        `${what}: git ${args[0] ?? ''}: ${result.stderr.trim() || `exit code ${result.exitCode}`}`,
      );
    }
    return result;
  }

  private async ensureRepo(options?: SyncOpOptions): Promise<void> {
    const result = await this.git(['rev-parse', '--is-inside-work-tree'], options);
    if (result.exitCode !== 0 || result.stdout.trim() !== 'true') {
      throw new DaylistError(
        ExitCode.SYNC_NOT_CONFIGURED,
        `Not a git work tree: ${this.workTree}`,
        { fix: `Run 'git init' in ${this.workTree} and add a remote named '${this.remote}'` },
      );
    }

    const remote = await this.git(['remote', 'get-url', this.remote], options);
    if (remote.exitCode !== 0 || remote.stdout.trim() === '') {
      throw new DaylistError(
        ExitCode.SYNC_NOT_CONFIGURED,
        `No git remote named '${this.remote}' in ${this.workTree}`,
        { fix: `Run 'git remote add ${this.remote} <url>'` },
      );
    }
  }

  private async currentBranch(options?: SyncOpOptions): Promise<string> {
    if (this.branchOverride) return this.branchOverride;
    const result = await this.git(['rev-parse', '--abbrev-ref', 'HEAD'], options);
    const name = result.stdout.trim();
    if (result.exitCode !== 0 || name === '' || name === 'HEAD') {
      // No commits yet
      return 'main';
    }
    return name;
  }

  private async fetch(options?: SyncOpOptions): Promise<void> {
    const result = await this.git(['fetch', this.remote], options);
    if (result.exitCode !== 0) {
      throw new DaylistError(
        ExitCode.SYNC_FAILED,
        `Fetch failed: ${result.stderr.trim() || `exit code ${result.exitCode}`}`,
        { fix: `Check the network and the '${this.remote}' remote URL` },
      );
    }
  }

  private async hasHead(options?: SyncOpOptions): Promise<boolean> {
    const result = await this.git(['rev-parse', '--verify', '--quiet', 'HEAD'], options);
    return result.exitCode === 0;
  }

  private async remoteBranchExists(branch: string, options?: SyncOpOptions): Promise<boolean> {
    const ref = `refs/remotes/${this.remote}/${branch}`;
    const result = await this.git(['rev-parse', '--verify', '--quiet', ref], options);
    return result.exitCode === 0;
  }

  private async hasLocalChanges(options?: SyncOpOptions): Promise<boolean> {
    const result = await this.gitOk(['status', '--porcelain', '--', this.fileName], options, 'Status failed');
    return result.stdout.trim() !== '';
  }

  /**
   * Local/remote revision counts. A missing side counts as one revision
   * ahead when the other side has nothing.
   */
  private async revisionCounts(
    branch: string,
    options?: SyncOpOptions,
  ): Promise<{ ahead: number; behind: number }> {
    const hasHead = await this.hasHead(options);
    const remoteExists = await this.remoteBranchExists(branch, options);

    if (!remoteExists) return { ahead: hasHead ? 1 : 0, behind: 0 };
    if (!hasHead) return { ahead: 0, behind: 1 };

    const result = await this.gitOk(
      ['rev-list', '--left-right', '--count', `HEAD...${this.remote}/${branch}`],
      options,
      'Revision count failed',
    );
    const counts = parseLeftRightCount(result.stdout);
    if (!counts) {
      throw new DaylistError(
        ExitCode.SYNC_FAILED,
        `Unexpected rev-list output: ${result.stdout.trim()}`,
      );
    }
    return counts;
  }

  /** Stage and commit the blob if it changed. Returns whether a commit was made. */
  private async commitLocalChanges(options?: SyncOpOptions): Promise<boolean> {
    if (!(await this.hasLocalChanges(options))) return false;

    await this.gitOk(['add', '--', this.fileName], options, 'Staging failed');
    await this.gitOk(
      ['commit', '-m', `${this.commitPrefix} update ${this.fileName}`, '--no-verify'],
      options,
      'Commit failed',
    );
    log().debug({ file: this.fileName }, 'Committed local store changes');
    return true;
  }
}
