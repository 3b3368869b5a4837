/**
 * ExecutionEngine - runs the development agent for one job
 *
 * The agent is started as the leader of its own process group, so a
 * timeout or cancellation can take down everything it spawned. Both
 * paths share one termination routine: SIGTERM to the group, then a
 * watchdog escalates to SIGKILL after the grace period. The engine
 * never rejects; every ending is reported as a JobOutcome with a cause.
 */

import type { ChildProcess } from 'node:child_process';
import type { SystemAdapter } from '../adapters/SystemAdapter';
import type { ConfigAdapter } from '../adapters/ConfigAdapter';
import type { IGitService } from '../services/GitService';
import type { ILogger } from '../services/Logger';
import type { ISessionStore } from './SessionStore';
import type { Job, JobOutcome, SessionLink, Workspace } from '../types/job';
import { getCommandSpec, type CommandKind } from '../types/commands';
import { AgentStdoutLineSchema, safeParse, type Project, type Rules } from '../types/schemas';
import {
  AgentExecutionError,
  AgentSpawnError,
  CancellationError,
  MissingOutputError,
  TimeoutExceededError,
} from '../errors';
import { RingBuffer } from '../utils/RingBuffer';
import { LineSplitter } from '../utils/LineSplitter';
import { formatMinutes } from '../utils/timeout';

export interface ExecutionOptions {
  project: Project;
  signal: AbortSignal;
  /** Session a feedback job continues */
  session?: SessionLink;
}

export interface AgentInvocation {
  command: string;
  args: string[];
  cwd: string;
  env: Record<string, string>;
  outputFile: string;
}

export interface IExecutionEngine {
  run(
    job: Job,
    workspace: Workspace | null,
    rules: string,
    timeoutMs: number,
    options: ExecutionOptions
  ): Promise<JobOutcome>;
  outputPathFor(jobId: string): string;
  outputDirectory(): string;
  neutralDirectory(): string;
}

type ProcessEnding =
  | { kind: 'exit'; exitCode: number | null; signal: string | null }
  | { kind: 'timeout' }
  | { kind: 'cancel' }
  | { kind: 'spawn-error'; error: Error };

interface SupervisedRun {
  ending: ProcessEnding;
  outputTail: string;
  agentSessionId?: string;
}

/**
 * System prompt for a command: general rules, then the command's own
 */
export function composeRules(rules: Rules, command: CommandKind): string {
  const specific = rules[getCommandSpec(command).rulesKey];
  return [rules.general, specific].filter((part) => part.trim().length > 0).join('\n\n');
}

export function buildPrompt(
  project: Project,
  cwd: string,
  command: CommandKind,
  argument: string,
  outputFile: string
): string {
  return [
    `Project: ${project.name}`,
    `Repository: ${project.repoUrl}`,
    `Working Directory: ${cwd}`,
    '',
    `${getCommandSpec(command).promptLabel}: ${argument}`,
    '',
    `Write the output in ${outputFile}`,
  ].join('\n');
}

/**
 * Session id from one line of agent stdout, if the line is a JSON object carrying one
 */
export function parseAgentSessionId(line: string): string | undefined {
  const trimmed = line.trim();
  if (!trimmed.startsWith('{')) {
    return undefined;
  }
  let parsed: unknown;
  try {
    parsed = JSON.parse(trimmed);
  } catch {
    return undefined;
  }
  return safeParse(AgentStdoutLineSchema, parsed)?.session_id;
}

export class ExecutionEngine implements IExecutionEngine {
  private system: SystemAdapter;
  private config: ConfigAdapter;
  private git: IGitService;
  private sessions: ISessionStore;
  private logger?: ILogger;

  constructor(
    system: SystemAdapter,
    config: ConfigAdapter,
    git: IGitService,
    sessions: ISessionStore,
    logger?: ILogger
  ) {
    this.system = system;
    this.config = config;
    this.git = git;
    this.sessions = sessions;
    this.logger = logger?.child({ component: 'ExecutionEngine' });
  }

  outputDirectory(): string {
    return this.system.joinPath(this.config.get('scratchRoot'), 'outputs');
  }

  outputPathFor(jobId: string): string {
    return this.system.joinPath(this.outputDirectory(), `${jobId}.md`);
  }

  neutralDirectory(): string {
    return this.system.joinPath(this.config.get('scratchRoot'), 'neutral');
  }

  buildInvocation(
    job: Job,
    project: Project,
    cwd: string,
    rules: string,
    resumeSessionId?: string
  ): AgentInvocation {
    const outputFile = this.outputPathFor(job.id);
    const args = [...this.config.get('agentArgs')];
    if (rules.length > 0) {
      args.push('--append-system-prompt', rules);
    }
    if (resumeSessionId) {
      args.push('--resume', resumeSessionId);
    }
    args.push(buildPrompt(project, cwd, job.command, job.argument, outputFile));

    return {
      command: this.config.get('agentCommand'),
      args,
      cwd,
      env: { TASKDOCK_JOB_ID: job.id, TASKDOCK_OUTPUT_FILE: outputFile },
      outputFile,
    };
  }

  async run(
    job: Job,
    workspace: Workspace | null,
    rules: string,
    timeoutMs: number,
    options: ExecutionOptions
  ): Promise<JobOutcome> {
    const startedAt = Date.now();

    if (options.signal.aborted) {
      return { state: 'cancelled', error: new CancellationError(job.id), durationMs: 0 };
    }

    const cwd = workspace?.path ?? this.neutralDirectory();
    this.system.mkdir(cwd);
    const invocation = this.buildInvocation(
      job,
      options.project,
      cwd,
      rules,
      options.session?.agentSessionId
    );
    this.system.mkdir(this.system.dirname(invocation.outputFile));
    this.removeOutput(invocation.outputFile);

    this.logger?.info(
      { jobId: job.id, project: job.project, command: job.command, cwd },
      'Starting agent'
    );
    const supervised = await this.supervise(job.id, invocation, timeoutMs, options.signal);
    const durationMs = Date.now() - startedAt;

    const outcome = this.classify(job.id, invocation.outputFile, supervised, timeoutMs, durationMs);
    if (outcome.state !== 'completed') {
      this.removeOutput(invocation.outputFile);
    }
    this.logger?.info(
      { jobId: job.id, state: outcome.state, durationMs, err: outcome.error },
      'Agent finished'
    );

    if (workspace) {
      await this.settleWorkspace(job, workspace, outcome, options.session);
    }
    return outcome;
  }

  /**
   * Spawn the agent and wait for it to end, terminating it on timeout or cancel
   */
  private supervise(
    jobId: string,
    invocation: AgentInvocation,
    timeoutMs: number,
    signal: AbortSignal
  ): Promise<SupervisedRun> {
    const tailLines = this.config.get('outputTailLines');
    const stdoutTail = new RingBuffer<string>(tailLines);
    const stderrTail = new RingBuffer<string>(tailLines);
    let agentSessionId: string | undefined;

    const outputTail = (): string =>
      [...stderrTail.toArray(), ...stdoutTail.toArray()].slice(-tailLines).join('\n');

    let child: ChildProcess;
    try {
      child = this.system.spawnDetached(invocation.command, invocation.args, {
        cwd: invocation.cwd,
        env: invocation.env,
      });
    } catch (error) {
      const err = error instanceof Error ? error : new Error(String(error));
      return Promise.resolve({ ending: { kind: 'spawn-error', error: err }, outputTail: '' });
    }

    const stdoutLines = new LineSplitter((line) => {
      stdoutTail.push(line);
      agentSessionId = parseAgentSessionId(line) ?? agentSessionId;
    });
    const stderrLines = new LineSplitter((line) => stderrTail.push(line));
    child.stdout?.on('data', (chunk: Buffer) => stdoutLines.write(chunk));
    child.stderr?.on('data', (chunk: Buffer) => stderrLines.write(chunk));

    return new Promise<SupervisedRun>((resolve) => {
      let termination: 'timeout' | 'cancel' | null = null;
      let watchdog: NodeJS.Timeout | undefined;
      let settled = false;

      const finish = (ending: ProcessEnding): void => {
        if (settled) {
          return;
        }
        settled = true;
        clearTimeout(deadline);
        clearTimeout(watchdog);
        signal.removeEventListener('abort', onAbort);
        stdoutLines.flush();
        stderrLines.flush();
        resolve({ ending, outputTail: outputTail(), agentSessionId });
      };

      const terminate = (reason: 'timeout' | 'cancel'): void => {
        if (termination || settled || child.pid === undefined) {
          return;
        }
        termination = reason;
        const pid = child.pid;
        this.logger?.warn({ jobId, pid, reason }, 'Terminating agent process group');
        this.signalGroup(pid, 'SIGTERM');
        watchdog = setTimeout(() => {
          this.logger?.warn({ jobId, pid }, 'Agent ignored SIGTERM, sending SIGKILL');
          this.signalGroup(pid, 'SIGKILL');
        }, this.config.get('killGracePeriodMs'));
      };

      const onAbort = (): void => terminate('cancel');
      const deadline = setTimeout(() => terminate('timeout'), timeoutMs);
      signal.addEventListener('abort', onAbort, { once: true });

      child.once('error', (error) => {
        if (child.pid === undefined) {
          finish({ kind: 'spawn-error', error });
        } else {
          this.logger?.warn({ jobId, err: error }, 'Agent process error');
        }
      });

      child.once('exit', () => {
        // Whatever the agent left behind in its group goes with it
        if (child.pid !== undefined) {
          this.signalGroup(child.pid, 'SIGKILL');
        }
      });

      child.once('close', (exitCode, exitSignal) => {
        finish(termination ? { kind: termination } : { kind: 'exit', exitCode, signal: exitSignal });
      });
    });
  }

  private classify(
    jobId: string,
    outputFile: string,
    run: SupervisedRun,
    timeoutMs: number,
    durationMs: number
  ): JobOutcome {
    const { ending } = run;
    const base = { durationMs, agentSessionId: run.agentSessionId };

    switch (ending.kind) {
      case 'spawn-error':
        return {
          ...base,
          state: 'failed',
          error: new AgentSpawnError(jobId, this.config.get('agentCommand'), ending.error),
        };
      case 'timeout':
        return { ...base, state: 'timed-out', error: new TimeoutExceededError(jobId, timeoutMs) };
      case 'cancel':
        return { ...base, state: 'cancelled', error: new CancellationError(jobId) };
      case 'exit':
        break;
    }

    if (this.system.exists(outputFile)) {
      this.system.appendFile(outputFile, `\n\nExecution time: ${formatMinutes(durationMs)} minutes`);
      return { ...base, state: 'completed', summaryPath: outputFile, exitCode: ending.exitCode };
    }

    if (ending.exitCode === 0) {
      return {
        ...base,
        state: 'failed',
        error: new MissingOutputError(jobId, outputFile),
        exitCode: ending.exitCode,
      };
    }

    return {
      ...base,
      state: 'failed',
      error: new AgentExecutionError(jobId, ending.exitCode, ending.signal, run.outputTail),
      exitCode: ending.exitCode,
    };
  }

  /**
   * Record or refresh the session, and mark branches without commits for deletion
   */
  private async settleWorkspace(
    job: Job,
    workspace: Workspace,
    outcome: JobOutcome,
    session?: SessionLink
  ): Promise<void> {
    if (outcome.state === 'completed' && session && outcome.agentSessionId) {
      this.sessions.updateAgentSession(session.project, session.jobId, outcome.agentSessionId);
    }

    if (!workspace.createdBranch) {
      return;
    }

    let commits: number;
    try {
      commits = await this.git.countCommitsSince(workspace.path, workspace.baseBranch);
    } catch (error) {
      // Unknown commit count: keep the branch rather than risk deleting work
      this.logger?.warn({ err: error, jobId: job.id, branch: workspace.branch }, 'Could not count commits');
      return;
    }

    if (commits === 0) {
      workspace.discardBranch = true;
      return;
    }

    if (outcome.state === 'completed' && getCommandSpec(job.command).recordsSession) {
      this.sessions.record({
        project: job.project,
        jobId: job.id,
        command: job.command,
        branchName: workspace.branch,
        agentSessionId: outcome.agentSessionId,
      });
      this.logger?.info({ jobId: job.id, branch: workspace.branch, commits }, 'Session recorded');
    }
  }

  private signalGroup(pid: number, signal: NodeJS.Signals): void {
    try {
      this.system.signalProcessGroup(pid, signal);
    } catch (error) {
      this.logger?.error({ err: error, pid, signal }, 'Failed to signal agent process group');
    }
  }

  private removeOutput(outputFile: string): void {
    if (this.system.exists(outputFile)) {
      this.system.unlink(outputFile);
    }
  }
}
