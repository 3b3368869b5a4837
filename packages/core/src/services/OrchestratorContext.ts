/**
 * OrchestratorContext - composition root for the orchestration core
 *
 * Creates and wires the services and managers, owns the background
 * task of every submitted job, and tears everything down on dispose.
 * Chat adapters and the CLI talk to the core only through this class.
 *
 * Usage:
 * ```typescript
 * const orchestrator = new OrchestratorContext({
 *   config: new FileConfigAdapter(configPath),
 *   handleSignals: true,
 * });
 * await orchestrator.init();
 * const { id } = orchestrator.submit({ project: 'api', command: 'feat', argument: 'add health check' });
 * const result = await orchestrator.waitForResult(id);
 * ```
 */

import type { ConfigAdapter } from '../adapters/ConfigAdapter';
import type { SystemAdapter } from '../adapters/SystemAdapter';
import { NodeSystemAdapter } from '../adapters/NodeSystemAdapter';
import { createLogger, type ILogger } from './Logger';
import { EventBus } from './EventBus';
import { GitService, type IGitService } from './GitService';
import { StatusReporter, type StatusSnapshot } from './StatusReporter';
import type { IEventBus } from '../types/events';
import { WorktreeManager, type IWorktreeManager } from '../managers/WorktreeManager';
import { JobRegistry, toJobFailure, type IJobRegistry } from '../managers/JobRegistry';
import { SessionStore, type ISessionStore } from '../managers/SessionStore';
import { ExecutionEngine, composeRules, type IExecutionEngine } from '../managers/ExecutionEngine';
import {
  ProcessSupervisor,
  type IProcessSupervisor,
  type StartAllEntry,
} from '../managers/ProcessSupervisor';
import { assertNever, getCommandSpec, type CommandSpec } from '../types/commands';
import { JobRequestSchema, formatZodError, type JobRequest, type Project } from '../types/schemas';
import {
  isTerminalState,
  type AuxiliaryProcessInfo,
  type Job,
  type JobHandle,
  type JobOutcome,
  type JobResult,
  type SessionLink,
  type StopResult,
  type TerminalJobState,
  type Workspace,
  type WorkspaceMode,
} from '../types/job';
import {
  AlreadyRunningError,
  CancellationError,
  JobNotFoundError,
  NoActiveSessionError,
  ProjectNotFoundError,
  ValidationError,
  wrapError,
} from '../errors';

export interface OrchestratorOptions {
  config: ConfigAdapter;
  /** Defaults to NodeSystemAdapter */
  system?: SystemAdapter;
  /** Defaults to a stdout (or `logFile`) logger at the configured level */
  logger?: ILogger;
  /** Dispose on SIGINT/SIGTERM, then exit */
  handleSignals?: boolean;
}

export class OrchestratorContext {
  public readonly config: ConfigAdapter;
  public readonly system: SystemAdapter;
  public readonly logger: ILogger;
  public readonly eventBus: IEventBus;
  public readonly git: IGitService;
  public readonly sessions: ISessionStore;
  public readonly worktrees: IWorktreeManager;
  public readonly jobs: IJobRegistry;
  public readonly engine: IExecutionEngine;
  public readonly processes: IProcessSupervisor;
  public readonly statusReporter: StatusReporter;

  /** Background task of every job that has not finished yet */
  private readonly inFlight = new Map<string, Promise<Job>>();
  /** Acquisitions whose job was cancelled first; their workspace is released on arrival */
  private readonly abandoned = new Set<Promise<void>>();
  private disposing: Promise<void> | null = null;
  private signalHandler: ((signal: NodeJS.Signals) => void) | null = null;

  constructor(options: OrchestratorOptions) {
    this.config = options.config;
    this.system = options.system ?? new NodeSystemAdapter();
    this.logger =
      options.logger ??
      createLogger({ level: this.config.get('logLevel'), file: this.config.get('logFile') });

    this.eventBus = new EventBus(this.logger);
    this.git = new GitService(this.system, this.config.get('gitTimeoutMs'), this.logger);
    this.sessions = new SessionStore();
    this.worktrees = new WorktreeManager(this.system, this.config, this.git, this.logger);
    this.jobs = new JobRegistry(this.config, this.eventBus, this.logger);
    this.engine = new ExecutionEngine(this.system, this.config, this.git, this.sessions, this.logger);
    this.processes = new ProcessSupervisor(this.system, this.config, this.eventBus, this.logger);
    this.statusReporter = new StatusReporter(this.config, this.jobs, this.processes);

    // Summaries nobody collected go with their job
    this.eventBus.on('job:evicted', ({ summaryPath }) => {
      if (summaryPath) {
        this.removeFile(summaryPath);
      }
    });

    if (options.handleSignals) {
      this.registerSignalHandlers();
    }
  }

  get isDisposed(): boolean {
    return this.disposing !== null;
  }

  /**
   * Create the scratch directories and clear what a previous run left behind
   */
  async init(): Promise<void> {
    const scratchRoot = this.config.get('scratchRoot');
    const outputs = this.engine.outputDirectory();
    this.system.mkdir(outputs);
    this.system.mkdir(this.engine.neutralDirectory());

    for (const entry of this.system.readDir(outputs)) {
      this.removeFile(this.system.joinPath(outputs, entry));
    }
    for (const project of this.config.listProjects()) {
      await this.worktrees.sweep(project);
    }
    this.logger.info(
      { scratchRoot, projects: this.config.listProjects().length },
      'Orchestrator initialized'
    );
  }

  // ========== Jobs ==========

  /**
   * Validate and register a job, then run it in the background.
   * @throws ValidationError for malformed requests
   * @throws ProjectNotFoundError for unknown projects
   */
  submit(request: JobRequest): JobHandle {
    if (this.isDisposed) {
      throw new ValidationError('job request', 'orchestrator is shutting down');
    }
    const parsed = JobRequestSchema.safeParse(request);
    if (!parsed.success) {
      throw new ValidationError('job request', formatZodError(parsed.error));
    }
    const project = this.requireProject(parsed.data.project);

    const job = this.jobs.create(parsed.data);
    const task = this.execute(job, project).finally(() => {
      this.inFlight.delete(job.id);
    });
    this.inFlight.set(job.id, task);
    return { id: job.id };
  }

  cancel(id: string): boolean {
    return this.jobs.cancel(id);
  }

  /**
   * @returns ids of the jobs that were signalled
   */
  cancelProject(projectName: string): string[] {
    return this.jobs
      .listActive()
      .filter((job) => job.project === projectName && this.jobs.cancel(job.id))
      .map((job) => job.id);
  }

  cancelAll(): string[] {
    return this.jobs
      .listActive()
      .filter((job) => this.jobs.cancel(job.id))
      .map((job) => job.id);
  }

  getJob(id: string): Job | undefined {
    return this.jobs.get(id);
  }

  /**
   * Wait for a job to finish and collect its result. The summary text is
   * handed out once; later calls return the result without it.
   */
  async waitForResult(id: string): Promise<JobResult> {
    const job = (await this.inFlight.get(id)) ?? this.requireJob(id);
    if (!isTerminalState(job.state)) {
      throw new JobNotFoundError(id);
    }
    return this.collect(job, job.state);
  }

  /**
   * Result of a finished job, or null while it is still running
   */
  takeResult(id: string): JobResult | null {
    const job = this.requireJob(id);
    return isTerminalState(job.state) ? this.collect(job, job.state) : null;
  }

  // ========== Auxiliary processes ==========

  startProcess(projectName: string): Promise<AuxiliaryProcessInfo> {
    return this.processes.start(this.requireProject(projectName));
  }

  stopProcess(projectName: string): Promise<StopResult> {
    return this.processes.stop(this.requireProject(projectName));
  }

  startAllProcesses(): Promise<StartAllEntry[]> {
    return this.processes.startAll(this.config.listProjects());
  }

  tailLog(projectName: string, n?: number): string[] {
    this.requireProject(projectName);
    return this.processes.tailLog(projectName, n);
  }

  // ========== Status ==========

  status(): StatusSnapshot {
    return this.statusReporter.snapshot();
  }

  formatStatus(): string {
    return this.statusReporter.formatStatus();
  }

  listProjects(): Project[] {
    return this.config.listProjects();
  }

  // ========== Lifecycle ==========

  /**
   * Cancel all jobs, wait for them, stop processes and delete leftover
   * output files. Safe to call multiple times.
   */
  dispose(): Promise<void> {
    if (!this.disposing) {
      this.disposing = this.shutdown();
    }
    return this.disposing;
  }

  private async shutdown(): Promise<void> {
    this.unregisterSignalHandlers();

    const cancelled = this.cancelAll();
    await Promise.allSettled(this.inFlight.values());
    await Promise.allSettled(this.abandoned);
    await this.processes.dispose();

    for (const job of this.jobs.listAll()) {
      if (job.resultSummaryPath) {
        this.removeFile(job.resultSummaryPath);
      }
    }
    this.logger.info({ cancelled: cancelled.length }, 'Orchestrator disposed');
  }

  // ========== Job execution ==========

  /**
   * Run one job to a terminal state. Never rejects.
   */
  private async execute(job: Job, project: Project): Promise<Job> {
    const spec = getCommandSpec(job.command);
    const signal = this.jobs.cancelSignal(job.id);
    const startedAt = Date.now();
    let workspace: Workspace | null = null;
    let outcome: JobOutcome;

    try {
      const session = spec.workspace.kind === 'session-branch' ? this.resolveSession(job) : undefined;
      workspace = await this.acquireWorkspace(job, project, workspaceMode(spec, job, session), signal);
      this.jobs.markRunning(job.id, workspace);
      outcome = await this.engine.run(
        job,
        workspace,
        composeRules(this.config.getRules(), job.command),
        this.config.get('jobTimeoutMs'),
        { project, signal, session }
      );
    } catch (error) {
      this.logger.warn({ err: error, jobId: job.id, project: project.name }, 'Job could not run');
      outcome = signal.aborted
        ? { state: 'cancelled', error: new CancellationError(job.id), durationMs: Date.now() - startedAt }
        : { state: 'failed', error: wrapError(error, 'Job failed'), durationMs: Date.now() - startedAt };
    } finally {
      if (workspace) {
        await this.worktrees.release(workspace);
        this.jobs.markWorkspaceReleased(job.id);
      }
    }

    const finished = this.jobs.markTerminal(job.id, outcome.state, {
      summaryPath: outcome.summaryPath,
      error: outcome.error,
      agentSessionId: outcome.agentSessionId,
    });
    this.eventBus.emit('job:finished', {
      result: {
        id: finished.id,
        project: finished.project,
        command: finished.command,
        state: outcome.state,
        error: outcome.error ? toJobFailure(outcome.error) : undefined,
      },
      summaryPath: finished.resultSummaryPath,
    });

    if (job.command === 'init' && outcome.state === 'completed') {
      await this.startAfterInit(project);
    }
    return finished;
  }

  /**
   * Acquire the job's workspace, giving up as soon as the job is
   * cancelled. A workspace that still arrives afterwards is released.
   */
  private acquireWorkspace(
    job: Job,
    project: Project,
    mode: WorkspaceMode,
    signal: AbortSignal
  ): Promise<Workspace | null> {
    const acquiring = this.worktrees.acquire(project, mode, signal);

    return new Promise((resolve, reject) => {
      const onAbort = (): void => {
        this.releaseWhenAcquired(job, acquiring);
        reject(new CancellationError(job.id));
      };
      if (signal.aborted) {
        onAbort();
        return;
      }
      signal.addEventListener('abort', onAbort, { once: true });
      acquiring.then(
        (workspace) => {
          signal.removeEventListener('abort', onAbort);
          resolve(workspace);
        },
        (error: unknown) => {
          signal.removeEventListener('abort', onAbort);
          reject(error);
        }
      );
    });
  }

  private releaseWhenAcquired(job: Job, acquiring: Promise<Workspace | null>): void {
    const release = acquiring.then(
      async (workspace) => {
        if (workspace) {
          this.logger.debug({ jobId: job.id, path: workspace.path }, 'Releasing workspace of cancelled job');
          await this.worktrees.release(workspace);
        }
      },
      (error: unknown) => {
        this.logger.debug({ err: error, jobId: job.id }, 'Acquisition of cancelled job failed');
      }
    );
    this.abandoned.add(release);
    void release.then(() => this.abandoned.delete(release));
  }

  private resolveSession(job: Job): SessionLink {
    const link = job.sessionRef
      ? this.sessions.get(job.project, job.sessionRef)
      : this.sessions.latest(job.project);
    if (!link) {
      throw new NoActiveSessionError(job.project, job.sessionRef);
    }
    return link;
  }

  private async startAfterInit(project: Project): Promise<void> {
    if (!project.upCommand || this.processes.isRunning(project.name)) {
      return;
    }
    try {
      await this.processes.start(project);
    } catch (error) {
      if (error instanceof AlreadyRunningError) {
        this.logger.debug({ project: project.name }, 'Process already running after init');
      } else {
        this.logger.warn({ err: error, project: project.name }, 'Could not start process after init');
      }
    }
  }

  private collect(job: Job, state: TerminalJobState): JobResult {
    const summaryPath = this.jobs.get(job.id) ? this.jobs.takeSummaryPath(job.id) : null;
    let summaryText: string | undefined;
    if (summaryPath) {
      try {
        summaryText = this.system.readFile(summaryPath);
      } catch (error) {
        this.logger.warn({ err: error, jobId: job.id, summaryPath }, 'Could not read job summary');
      }
      this.removeFile(summaryPath);
    }

    return {
      id: job.id,
      project: job.project,
      command: job.command,
      state,
      summaryText,
      error: job.error ?? undefined,
    };
  }

  // ========== Helpers ==========

  private requireProject(name: string): Project {
    const project = this.config.getProject(name);
    if (!project) {
      throw new ProjectNotFoundError(
        name,
        this.config.listProjects().map((p) => p.name)
      );
    }
    return project;
  }

  private requireJob(id: string): Job {
    const job = this.jobs.get(id);
    if (!job) {
      throw new JobNotFoundError(id);
    }
    return job;
  }

  private removeFile(filePath: string): void {
    try {
      if (this.system.exists(filePath)) {
        this.system.unlink(filePath);
      }
    } catch (error) {
      this.logger.warn({ err: error, path: filePath }, 'Failed to remove file');
    }
  }

  private registerSignalHandlers(): void {
    this.signalHandler = (signal) => {
      this.logger.info({ signal }, 'Received signal, shutting down');
      void this.dispose().then(
        () => process.exit(signal === 'SIGINT' ? 130 : 143),
        (error: unknown) => {
          this.logger.error({ err: error }, 'Shutdown failed');
          process.exit(1);
        }
      );
    };
    process.once('SIGINT', this.signalHandler);
    process.once('SIGTERM', this.signalHandler);
  }

  private unregisterSignalHandlers(): void {
    if (this.signalHandler) {
      process.removeListener('SIGINT', this.signalHandler);
      process.removeListener('SIGTERM', this.signalHandler);
      this.signalHandler = null;
    }
  }
}

function workspaceMode(spec: CommandSpec, job: Job, session?: SessionLink): WorkspaceMode {
  const policy = spec.workspace;
  switch (policy.kind) {
    case 'none':
      return { kind: 'none' };
    case 'new-branch':
      return { kind: 'new-branch', prefix: policy.prefix, suffix: job.id };
    case 'session-branch':
      if (!session) {
        throw new NoActiveSessionError(job.project, job.sessionRef);
      }
      return { kind: 'existing-branch', branch: session.branchName };
    default:
      return assertNever(policy);
  }
}
