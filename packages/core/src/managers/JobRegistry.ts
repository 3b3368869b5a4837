/**
 * JobRegistry - in-memory table of active and recently finished jobs
 *
 * Every mutation is a synchronous critical section: no await happens
 * between reading a job and writing its new state, so concurrent
 * callers on the event loop never observe a half-applied transition.
 * Callers get frozen snapshots; the mutable records stay private.
 */

import type { ConfigAdapter } from '../adapters/ConfigAdapter';
import type { IEventBus } from '../types/events';
import type { ILogger } from '../services/Logger';
import type { ValidatedJobRequest } from '../types/schemas';
import type { CommandKind } from '../types/commands';
import {
  isTerminalState,
  type Job,
  type JobFailure,
  type JobState,
  type TerminalJobState,
  type Workspace,
} from '../types/job';
import { createJobStateMachine, terminalEventFor, type JobEvent } from '../types/stateMachines';
import type { StateMachine } from '../utils/StateMachine';
import { JobNotFoundError, isTaskdockError } from '../errors';
import { shortId } from '../utils/ids';

/**
 * What the owner of a job reports when it finishes
 */
export interface TerminalSummary {
  summaryPath?: string;
  error?: Error;
  agentSessionId?: string;
}

export interface IJobRegistry {
  create(request: ValidatedJobRequest): Job;
  markRunning(id: string, workspace: Workspace | null): Job;
  markTerminal(id: string, state: TerminalJobState, summary?: TerminalSummary): Job;
  markWorkspaceReleased(id: string): void;
  cancel(id: string): boolean;
  cancelSignal(id: string): AbortSignal;
  takeSummaryPath(id: string): string | null;
  get(id: string): Job | undefined;
  listByProject(project: string): Job[];
  listAll(): Job[];
  listActive(): Job[];
  evictExpired(now?: number): number;
}

interface JobRecord {
  readonly id: string;
  /** Creation order, breaks ties between equal timestamps */
  readonly sequence: number;
  readonly project: string;
  readonly command: CommandKind;
  readonly argument: string;
  readonly requesterId?: string;
  readonly sessionRef?: string;
  readonly machine: StateMachine<JobState, JobEvent>;
  readonly controller: AbortController;
  readonly createdAt: Date;
  workspace: Workspace | null;
  workspaceReleased: boolean;
  startedAt: Date | null;
  completedAt: Date | null;
  resultSummaryPath: string | null;
  error: JobFailure | null;
  agentSessionId: string | null;
}

/**
 * Serializable form of the error that ended a job
 */
export function toJobFailure(error: Error): JobFailure {
  return {
    code: isTaskdockError(error) ? error.code : 'INTERNAL_ERROR',
    name: error.name,
    message: error.message,
  };
}

export class JobRegistry implements IJobRegistry {
  private readonly jobs = new Map<string, JobRecord>();
  private nextSequence = 0;
  private config: ConfigAdapter;
  private eventBus?: IEventBus;
  private logger?: ILogger;

  constructor(config: ConfigAdapter, eventBus?: IEventBus, logger?: ILogger) {
    this.config = config;
    this.eventBus = eventBus;
    this.logger = logger?.child({ component: 'JobRegistry' });
  }

  /**
   * Register a new job in the pending state
   */
  create(request: ValidatedJobRequest): Job {
    let id = shortId();
    while (this.jobs.has(id)) {
      id = shortId();
    }

    const record: JobRecord = {
      id,
      sequence: this.nextSequence++,
      project: request.project,
      command: request.command,
      argument: request.argument,
      requesterId: request.requesterId,
      sessionRef: request.sessionRef,
      machine: createJobStateMachine((previousState, state) => {
        this.eventBus?.emit('job:stateChanged', {
          jobId: id,
          project: request.project,
          command: request.command,
          previousState,
          state,
        });
      }),
      controller: new AbortController(),
      createdAt: new Date(),
      workspace: null,
      workspaceReleased: false,
      startedAt: null,
      completedAt: null,
      resultSummaryPath: null,
      error: null,
      agentSessionId: null,
    };
    this.jobs.set(id, record);

    const job = snapshot(record);
    this.logger?.info({ jobId: id, project: job.project, command: job.command }, 'Job created');
    this.eventBus?.emit('job:created', { job });
    this.evictExpired();
    return job;
  }

  markRunning(id: string, workspace: Workspace | null): Job {
    const record = this.require(id);
    record.machine.transition('START');
    record.workspace = workspace;
    record.startedAt = new Date();
    return snapshot(record);
  }

  /**
   * Move a job into a terminal state. Throws InvalidTransitionError if it
   * is already terminal.
   */
  markTerminal(id: string, state: TerminalJobState, summary: TerminalSummary = {}): Job {
    const record = this.require(id);
    record.machine.transition(terminalEventFor(state));
    record.completedAt = new Date();
    record.resultSummaryPath = summary.summaryPath ?? null;
    record.error = summary.error ? toJobFailure(summary.error) : null;
    record.agentSessionId = summary.agentSessionId ?? record.agentSessionId;

    this.logger?.info(
      { jobId: id, state, error: record.error?.code },
      `Job ${id} ${state}`
    );
    this.evictExpired();
    return snapshot(record);
  }

  markWorkspaceReleased(id: string): void {
    const record = this.jobs.get(id);
    if (record) {
      record.workspaceReleased = true;
    }
  }

  /**
   * Request cancellation. Only signals; the job's owner terminates the work.
   *
   * @returns false if the job is unknown or already terminal
   */
  cancel(id: string): boolean {
    const record = this.jobs.get(id);
    if (!record || isTerminalState(record.machine.state)) {
      return false;
    }
    if (!record.controller.signal.aborted) {
      this.logger?.info({ jobId: id }, 'Cancellation requested');
      record.controller.abort();
    }
    return true;
  }

  cancelSignal(id: string): AbortSignal {
    return this.require(id).controller.signal;
  }

  /**
   * Hand over the summary file path exactly once
   */
  takeSummaryPath(id: string): string | null {
    const record = this.require(id);
    const summaryPath = record.resultSummaryPath;
    record.resultSummaryPath = null;
    return summaryPath;
  }

  get(id: string): Job | undefined {
    const record = this.jobs.get(id);
    return record ? snapshot(record) : undefined;
  }

  listByProject(project: string): Job[] {
    return this.listAll().filter((job) => job.project === project);
  }

  /**
   * All jobs, oldest first
   */
  listAll(): Job[] {
    return Array.from(this.jobs.values(), snapshot);
  }

  listActive(): Job[] {
    return this.listAll().filter((job) => !isTerminalState(job.state));
  }

  /**
   * Drop finished jobs past the retention age or beyond the per-project
   * count. Jobs whose workspace is still held are kept.
   *
   * @returns number of jobs evicted
   */
  evictExpired(now: number = Date.now()): number {
    const maxPerProject = this.config.get('maxJobsPerProject');
    const retentionMs = this.config.get('jobRetentionMs');

    const finishedByProject = new Map<string, JobRecord[]>();
    for (const record of this.jobs.values()) {
      if (!isTerminalState(record.machine.state)) {
        continue;
      }
      const list = finishedByProject.get(record.project) ?? [];
      list.push(record);
      finishedByProject.set(record.project, list);
    }

    let evicted = 0;
    for (const finished of finishedByProject.values()) {
      // Newest first, so the index is the job's rank within the project
      finished.sort((a, b) => completedTime(b) - completedTime(a) || b.sequence - a.sequence);
      finished.forEach((record, rank) => {
        const holdsWorkspace = record.workspace !== null && !record.workspaceReleased;
        const expired = now - completedTime(record) > retentionMs;
        if (holdsWorkspace || (rank < maxPerProject && !expired)) {
          return;
        }
        this.jobs.delete(record.id);
        evicted++;
        this.logger?.debug({ jobId: record.id, expired }, 'Job evicted');
        this.eventBus?.emit('job:evicted', {
          jobId: record.id,
          project: record.project,
          summaryPath: record.resultSummaryPath,
        });
      });
    }
    return evicted;
  }

  private require(id: string): JobRecord {
    const record = this.jobs.get(id);
    if (!record) {
      throw new JobNotFoundError(id);
    }
    return record;
  }
}

function completedTime(record: JobRecord): number {
  return record.completedAt?.getTime() ?? record.createdAt.getTime();
}

function snapshot(record: JobRecord): Job {
  return Object.freeze({
    id: record.id,
    project: record.project,
    command: record.command,
    argument: record.argument,
    requesterId: record.requesterId,
    sessionRef: record.sessionRef,
    state: record.machine.state,
    workspace: record.workspace ? Object.freeze({ ...record.workspace }) : null,
    workspaceReleased: record.workspaceReleased,
    createdAt: record.createdAt,
    startedAt: record.startedAt,
    completedAt: record.completedAt,
    cancelRequested: record.controller.signal.aborted,
    resultSummaryPath: record.resultSummaryPath,
    error: record.error,
    agentSessionId: record.agentSessionId,
  });
}
