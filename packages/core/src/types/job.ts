/**
 * Job, workspace and session types
 */

import type { CommandKind } from './commands';

// ============================================================================
// Workspace
// ============================================================================

/**
 * How WorktreeManager.acquire should prepare a workspace
 */
export type WorkspaceMode =
  | { kind: 'none' }
  | { kind: 'new-branch'; prefix: string; suffix?: string }
  | { kind: 'existing-branch'; branch: string };

/**
 * Disposable linked checkout owned by exactly one job
 */
export interface Workspace {
  readonly id: string;
  readonly path: string;
  readonly project: string;
  readonly branch: string;
  /** Ref the branch was derived from (or the branch itself for existing branches) */
  readonly baseBranch: string;
  readonly createdAt: Date;
  /** True when acquisition created `branch` */
  readonly createdBranch: boolean;
  /** Set before release when the branch should be deleted with the workspace */
  discardBranch: boolean;
}

// ============================================================================
// Job
// ============================================================================

export type JobState = 'pending' | 'running' | 'completed' | 'failed' | 'cancelled' | 'timed-out';

export type TerminalJobState = Exclude<JobState, 'pending' | 'running'>;

export const TERMINAL_JOB_STATES: readonly TerminalJobState[] = [
  'completed',
  'failed',
  'cancelled',
  'timed-out',
];

export function isTerminalState(state: JobState): state is TerminalJobState {
  return TERMINAL_JOB_STATES.some((terminal) => terminal === state);
}

/**
 * Serializable cause recorded on every non-completed job
 */
export interface JobFailure {
  code: string;
  name: string;
  message: string;
}

/**
 * Read-only view of a job handed to callers
 */
export interface Job {
  readonly id: string;
  readonly project: string;
  readonly command: CommandKind;
  readonly argument: string;
  readonly requesterId?: string;
  readonly sessionRef?: string;
  readonly state: JobState;
  readonly workspace: Workspace | null;
  readonly workspaceReleased: boolean;
  readonly createdAt: Date;
  readonly startedAt: Date | null;
  readonly completedAt: Date | null;
  readonly cancelRequested: boolean;
  readonly resultSummaryPath: string | null;
  readonly error: JobFailure | null;
  readonly agentSessionId: string | null;
}

export interface JobHandle {
  readonly id: string;
}

/**
 * What the engine reports back for one run
 */
export interface JobOutcome {
  state: TerminalJobState;
  summaryPath?: string;
  error?: Error;
  exitCode?: number | null;
  durationMs: number;
  agentSessionId?: string;
}

/**
 * Result delivered to the calling adapter
 */
export interface JobResult {
  id: string;
  project: string;
  command: CommandKind;
  state: TerminalJobState;
  summaryText?: string;
  error?: JobFailure;
}

// ============================================================================
// Sessions
// ============================================================================

/**
 * Lets a later feedback job continue on the branch a job produced
 */
export interface SessionLink {
  readonly project: string;
  readonly jobId: string;
  readonly command: CommandKind;
  readonly branchName: string;
  agentSessionId?: string;
  readonly recordedAt: Date;
}

// ============================================================================
// Auxiliary processes
// ============================================================================

export interface AuxiliaryProcessInfo {
  readonly project: string;
  readonly pid: number;
  readonly command: string;
  readonly startedAt: Date;
}

export interface StopResult {
  pid: number;
  /** True when SIGKILL was needed */
  forced: boolean;
}
