/**
 * WorktreeManager - disposable git worktrees for jobs
 *
 * Each acquisition gets its own directory under
 * `<scratchRoot>/worktrees/<project>/<uuid>`, so two jobs never share a
 * working copy even when they check out the same branch. The canonical
 * clone is created once per project under a keyed lock; worktree
 * creation afterwards takes no lock.
 */

import type { SystemAdapter } from '../adapters/SystemAdapter';
import type { ConfigAdapter } from '../adapters/ConfigAdapter';
import type { AddWorktreeOptions, IGitService } from '../services/GitService';
import type { ILogger } from '../services/Logger';
import type { Project } from '../types/schemas';
import type { Workspace, WorkspaceMode } from '../types/job';
import { assertNever } from '../types/commands';
import {
  BranchNotFoundError,
  CloneError,
  GitOperationError,
  WorkspaceAcquisitionError,
} from '../errors';
import { KeyedMutex } from '../utils/KeyedMutex';
import { shortId, uniqueId } from '../utils/ids';

/**
 * Worktree manager interface
 */
export interface IWorktreeManager {
  acquire(project: Project, mode: WorkspaceMode, signal?: AbortSignal): Promise<Workspace | null>;
  release(workspace: Workspace): Promise<void>;
  ensureClone(project: Project, signal?: AbortSignal): Promise<void>;
  sweep(project: Project): Promise<number>;
  getProjectBase(projectName: string): string;
}

/**
 * WorktreeManager implementation
 */
export class WorktreeManager implements IWorktreeManager {
  private system: SystemAdapter;
  private config: ConfigAdapter;
  private git: IGitService;
  private logger?: ILogger;

  private readonly cloneLocks = new KeyedMutex();
  /** Paths handed out and not yet released */
  private readonly live = new Set<string>();
  /** Releases in progress, shared by concurrent callers */
  private readonly releasing = new Map<string, Promise<void>>();

  constructor(system: SystemAdapter, config: ConfigAdapter, git: IGitService, logger?: ILogger) {
    this.system = system;
    this.config = config;
    this.git = git;
    this.logger = logger?.child({ component: 'WorktreeManager' });
  }

  private get worktreeRoot(): string {
    return this.system.joinPath(this.config.get('scratchRoot'), 'worktrees');
  }

  getProjectBase(projectName: string): string {
    return this.system.joinPath(this.worktreeRoot, projectName);
  }

  /**
   * Create a workspace for `mode`. Resolves to null for `none`. An
   * aborted `signal` stops the clone or fetch in progress.
   */
  async acquire(project: Project, mode: WorkspaceMode, signal?: AbortSignal): Promise<Workspace | null> {
    switch (mode.kind) {
      case 'none':
        return null;
      case 'new-branch':
        return this.acquireNewBranch(project, mode.prefix, mode.suffix ?? shortId(), signal);
      case 'existing-branch':
        return this.acquireExistingBranch(project, mode.branch, signal);
      default:
        return assertNever(mode);
    }
  }

  /**
   * Make sure the canonical clone exists. Concurrent first callers for
   * the same project wait for a single clone. An existing `workDir` that
   * is not a repository is never touched.
   */
  async ensureClone(project: Project, signal?: AbortSignal): Promise<void> {
    await this.cloneLocks.runExclusive(project.name, async () => {
      signal?.throwIfAborted();
      if (await this.git.isGitRepo(project.workDir)) {
        return;
      }

      const existed = this.system.exists(project.workDir);
      if (existed && !this.isEmptyDirectory(project.workDir)) {
        throw new CloneError(project.name, project.repoUrl, `${project.workDir} exists and is not a git repository`);
      }

      try {
        await this.git.clone(project.repoUrl, project.workDir, this.config.get('cloneTimeoutMs'), signal);
      } catch (error) {
        if (!existed) {
          this.system.rmdir(project.workDir, { recursive: true });
        }
        throw new CloneError(project.name, project.repoUrl, describe(error));
      }
      this.logger?.info({ project: project.name, workDir: project.workDir }, 'Canonical clone created');
    });
  }

  /**
   * Remove a workspace. Never throws; each step logs and continues.
   * Calls made while a release of the same path is running share it.
   */
  release(workspace: Workspace): Promise<void> {
    const pending = this.releasing.get(workspace.path);
    if (pending) {
      return pending;
    }
    this.live.delete(workspace.path);

    const releasing = this.remove(workspace).finally(() => {
      this.releasing.delete(workspace.path);
    });
    this.releasing.set(workspace.path, releasing);
    return releasing;
  }

  /**
   * Delete workspace directories of a project that no live workspace owns,
   * e.g. after a crash. Returns how many were removed.
   */
  async sweep(project: Project): Promise<number> {
    const base = this.getProjectBase(project.name);
    if (!this.system.isDirectory(base)) {
      return 0;
    }

    let removed = 0;
    for (const entry of this.system.readDir(base)) {
      const entryPath = this.system.joinPath(base, entry);
      if (this.live.has(entryPath)) {
        continue;
      }
      try {
        this.system.rmdir(entryPath, { recursive: true });
        removed++;
      } catch (error) {
        this.logger?.warn({ err: error, path: entryPath }, 'Failed to remove stale workspace');
      }
    }

    if (removed > 0 && (await this.git.isGitRepo(project.workDir))) {
      try {
        await this.git.pruneWorktrees(project.workDir);
      } catch (error) {
        this.logger?.warn({ err: error, project: project.name }, 'git worktree prune failed after sweep');
      }
    }
    this.logger?.info({ project: project.name, removed }, 'Swept stale workspaces');
    return removed;
  }

  private async acquireNewBranch(
    project: Project,
    prefix: string,
    suffix: string,
    signal?: AbortSignal
  ): Promise<Workspace> {
    await this.prepare(project, signal);

    const branch = `${prefix}-${suffix}`;
    const base = (await this.git.remoteBranchExists(project.workDir, project.defaultBranch))
      ? `origin/${project.defaultBranch}`
      : project.defaultBranch;

    signal?.throwIfAborted();
    const { id, path: workspacePath } = this.allocatePath(project.name);
    await this.addWorktree(project, workspacePath, { newBranch: branch, startPoint: base });

    return this.track({
      id,
      path: workspacePath,
      project: project.name,
      branch,
      baseBranch: base,
      createdAt: new Date(),
      createdBranch: true,
      discardBranch: false,
    });
  }

  private async acquireExistingBranch(project: Project, branch: string, signal?: AbortSignal): Promise<Workspace> {
    await this.prepare(project, signal);

    if (!(await this.git.branchExists(project.workDir, branch))) {
      if (!(await this.git.remoteBranchExists(project.workDir, branch))) {
        throw new BranchNotFoundError(project.name, branch);
      }
      await this.createTrackingBranch(project, branch);
    }

    signal?.throwIfAborted();
    const { id, path: workspacePath } = this.allocatePath(project.name);
    await this.addWorktree(project, workspacePath, { existingBranch: branch });

    return this.track({
      id,
      path: workspacePath,
      project: project.name,
      branch,
      baseBranch: branch,
      createdAt: new Date(),
      createdBranch: false,
      discardBranch: false,
    });
  }

  /**
   * Clone if needed, then refresh remote refs. A failed fetch leaves
   * local refs in place and is only logged.
   */
  private async prepare(project: Project, signal?: AbortSignal): Promise<void> {
    await this.ensureClone(project, signal);
    try {
      await this.git.fetch(project.workDir, signal);
    } catch (error) {
      signal?.throwIfAborted();
      this.logger?.warn({ err: error, project: project.name }, 'git fetch failed, using local refs');
    }
  }

  /**
   * Create a local branch from its remote counterpart. A concurrent job
   * may have created it first, which counts as success.
   */
  private async createTrackingBranch(project: Project, branch: string): Promise<void> {
    try {
      await this.git.createBranch(project.workDir, branch, `origin/${branch}`);
    } catch (error) {
      if (await this.git.branchExists(project.workDir, branch)) {
        return;
      }
      throw new WorkspaceAcquisitionError(project.name, project.workDir, describe(error));
    }
  }

  private isEmptyDirectory(dirPath: string): boolean {
    return this.system.isDirectory(dirPath) && this.system.readDir(dirPath).length === 0;
  }

  private allocatePath(projectName: string): { id: string; path: string } {
    const base = this.getProjectBase(projectName);
    this.system.mkdir(base);
    const id = uniqueId();
    return { id, path: this.system.joinPath(base, id) };
  }

  private async addWorktree(
    project: Project,
    workspacePath: string,
    options: AddWorktreeOptions
  ): Promise<void> {
    try {
      await this.git.addWorktree(project.workDir, workspacePath, options);
    } catch (error) {
      if (this.system.exists(workspacePath)) {
        this.system.rmdir(workspacePath, { recursive: true });
      }
      throw new WorkspaceAcquisitionError(project.name, workspacePath, describe(error));
    }
  }

  private track(workspace: Workspace): Workspace {
    this.live.add(workspace.path);
    this.logger?.info(
      { project: workspace.project, branch: workspace.branch, path: workspace.path },
      'Workspace acquired'
    );
    return workspace;
  }

  private async remove(workspace: Workspace): Promise<void> {
    const repoPath = this.config.getProject(workspace.project)?.workDir;
    if (repoPath !== undefined && this.system.isDirectory(repoPath)) {
      await this.detach(workspace, repoPath);
    } else {
      this.removeDirectory(workspace.path);
    }
  }

  private async detach(workspace: Workspace, repoPath: string): Promise<void> {
    if (this.system.exists(workspace.path)) {
      await this.bestEffort('worktree remove', workspace, () =>
        this.git.removeWorktree(repoPath, workspace.path)
      );
    }

    if (this.system.exists(workspace.path)) {
      this.logger?.debug({ path: workspace.path }, 'Worktree dir still exists after git remove, deleting directly');
      this.removeDirectory(workspace.path);
    }

    await this.bestEffort('worktree prune', workspace, () => this.git.pruneWorktrees(repoPath));

    if (workspace.discardBranch && workspace.createdBranch) {
      await this.bestEffort('branch -D', workspace, () => this.git.deleteBranch(repoPath, workspace.branch));
      this.logger?.debug({ branch: workspace.branch }, 'Discarded branch without commits');
    }
  }

  private removeDirectory(dirPath: string): void {
    try {
      this.system.rmdir(dirPath, { recursive: true });
    } catch (error) {
      this.logger?.warn({ err: error, path: dirPath }, 'Failed to delete workspace directory');
    }
  }

  private async bestEffort(step: string, workspace: Workspace, action: () => Promise<void>): Promise<void> {
    try {
      await action();
    } catch (error) {
      this.logger?.warn({ err: error, path: workspace.path, step }, `Workspace cleanup step '${step}' failed`);
    }
  }
}

function describe(error: unknown): string {
  if (error instanceof GitOperationError) {
    return error.detail;
  }
  return error instanceof Error ? error.message : String(error);
}
