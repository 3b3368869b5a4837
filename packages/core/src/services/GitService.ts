/**
 * GitService - Git operations abstraction
 *
 * Every call runs git through SystemAdapter with an argument vector,
 * so branch names and paths never pass through a shell.
 */

import type { CommandResult, SystemAdapter } from '../adapters/SystemAdapter';
import { GitOperationError } from '../errors';
import type { ILogger } from './Logger';

/**
 * Git service interface
 */
export interface IGitService {
  isGitRepo(path: string): Promise<boolean>;
  clone(repoUrl: string, destination: string, timeoutMs: number, signal?: AbortSignal): Promise<void>;
  fetch(repoPath: string, signal?: AbortSignal): Promise<void>;
  branchExists(repoPath: string, branchName: string): Promise<boolean>;
  remoteBranchExists(repoPath: string, branchName: string, remote?: string): Promise<boolean>;
  createBranch(repoPath: string, branchName: string, startPoint: string): Promise<void>;
  deleteBranch(repoPath: string, branchName: string): Promise<void>;
  addWorktree(repoPath: string, worktreePath: string, options: AddWorktreeOptions): Promise<void>;
  removeWorktree(repoPath: string, worktreePath: string): Promise<void>;
  pruneWorktrees(repoPath: string): Promise<void>;
  countCommitsSince(worktreePath: string, baseRef: string): Promise<number>;
}

export type AddWorktreeOptions =
  /** Create `branch` at `startPoint` and check it out */
  | { newBranch: string; startPoint: string }
  /** Check out an existing branch, even if another worktree has it */
  | { existingBranch: string };

interface GitCallOptions {
  timeoutMs?: number;
  signal?: AbortSignal;
}

/**
 * Git operations service
 */
export class GitService implements IGitService {
  private system: SystemAdapter;
  private timeoutMs: number;
  private logger?: ILogger;

  constructor(system: SystemAdapter, timeoutMs: number, logger?: ILogger) {
    this.system = system;
    this.timeoutMs = timeoutMs;
    this.logger = logger?.child({ component: 'GitService' });
  }

  /**
   * Check if a directory is a git repository
   */
  async isGitRepo(path: string): Promise<boolean> {
    if (!this.system.isDirectory(path)) {
      return false;
    }
    try {
      const result = await this.git(['rev-parse', '--git-dir'], path);
      return result.exitCode === 0;
    } catch {
      return false;
    }
  }

  async clone(repoUrl: string, destination: string, timeoutMs: number, signal?: AbortSignal): Promise<void> {
    const parent = this.system.dirname(destination);
    this.system.mkdir(parent);
    this.logger?.info({ repoUrl, destination }, 'Cloning repository');
    await this.gitOrThrow('clone', ['clone', repoUrl, destination], parent, { timeoutMs, signal });
  }

  async fetch(repoPath: string, signal?: AbortSignal): Promise<void> {
    await this.gitOrThrow('fetch', ['fetch', '--prune', 'origin'], repoPath, { signal });
  }

  async branchExists(repoPath: string, branchName: string): Promise<boolean> {
    return this.refExists(repoPath, `refs/heads/${branchName}`);
  }

  async remoteBranchExists(repoPath: string, branchName: string, remote = 'origin'): Promise<boolean> {
    return this.refExists(repoPath, `refs/remotes/${remote}/${branchName}`);
  }

  async createBranch(repoPath: string, branchName: string, startPoint: string): Promise<void> {
    await this.gitOrThrow('branch', ['branch', '--no-track', branchName, startPoint], repoPath);
  }

  async deleteBranch(repoPath: string, branchName: string): Promise<void> {
    await this.gitOrThrow('branch -D', ['branch', '-D', branchName], repoPath);
  }

  /**
   * Create a linked worktree.
   *
   * New branches are created with --no-track so concurrent additions
   * never contend for .git/config.
   */
  async addWorktree(repoPath: string, worktreePath: string, options: AddWorktreeOptions): Promise<void> {
    const args =
      'newBranch' in options
        ? ['worktree', 'add', '--no-track', '-b', options.newBranch, worktreePath, options.startPoint]
        : ['worktree', 'add', '--force', worktreePath, options.existingBranch];
    await this.gitOrThrow('worktree add', args, repoPath);
  }

  async removeWorktree(repoPath: string, worktreePath: string): Promise<void> {
    await this.gitOrThrow('worktree remove', ['worktree', 'remove', '--force', worktreePath], repoPath);
  }

  async pruneWorktrees(repoPath: string): Promise<void> {
    await this.gitOrThrow('worktree prune', ['worktree', 'prune'], repoPath);
  }

  /**
   * Number of commits on HEAD that `baseRef` does not have
   */
  async countCommitsSince(worktreePath: string, baseRef: string): Promise<number> {
    const result = await this.gitOrThrow(
      'rev-list',
      ['rev-list', '--count', `${baseRef}..HEAD`],
      worktreePath
    );
    const count = parseInt(result.stdout.trim(), 10);
    return Number.isNaN(count) ? 0 : count;
  }

  private async refExists(repoPath: string, ref: string): Promise<boolean> {
    const result = await this.git(['show-ref', '--verify', '--quiet', ref], repoPath);
    return result.exitCode === 0;
  }

  private git(args: string[], cwd: string, options: GitCallOptions = {}): Promise<CommandResult> {
    // Fail instead of waiting on a credential prompt nobody will answer
    return this.system.run('git', args, {
      cwd,
      timeoutMs: options.timeoutMs ?? this.timeoutMs,
      signal: options.signal,
      env: { GIT_TERMINAL_PROMPT: '0' },
    });
  }

  private async gitOrThrow(
    operation: string,
    args: string[],
    cwd: string,
    options?: GitCallOptions
  ): Promise<CommandResult> {
    let result: CommandResult;
    try {
      result = await this.git(args, cwd, options);
    } catch (error) {
      const detail = error instanceof Error ? error.message : String(error);
      throw new GitOperationError(operation, cwd, detail);
    }
    if (result.exitCode !== 0) {
      const detail = (result.stderr.trim() || result.stdout.trim() || `exit code ${result.exitCode}`)
        .split('\n')
        .slice(-5)
        .join('\n');
      throw new GitOperationError(operation, cwd, detail);
    }
    return result;
  }
}
