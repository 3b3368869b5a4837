/**
 * Custom error classes for structured error handling
 *
 * Each error includes:
 * - Descriptive name for logging
 * - Error code for programmatic handling
 * - Context information (project, command, job id where known)
 * - Recoverable flag indicating if a retry by the caller may succeed
 */

// ============================================================================
// Base Error
// ============================================================================

/**
 * Base error class for all taskdock errors
 */
export abstract class TaskdockError extends Error {
  /** Error code for programmatic handling */
  abstract readonly code: string;
  /** Whether this error can potentially be recovered from */
  abstract readonly recoverable: boolean;
  /** Additional context for debugging */
  readonly context?: Record<string, unknown>;

  constructor(message: string, context?: Record<string, unknown>) {
    super(message);
    this.name = this.constructor.name;
    this.context = context;
    Error.captureStackTrace?.(this, this.constructor);
  }

  /**
   * Serialize error for logging or transmission
   */
  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      code: this.code,
      message: this.message,
      recoverable: this.recoverable,
      context: this.context,
    };
  }
}

// ============================================================================
// Workspace Errors
// ============================================================================

/**
 * The canonical clone could not be created (network, auth, bad URL)
 */
export class CloneError extends TaskdockError {
  readonly code = 'CLONE_FAILED';
  readonly recoverable = true;

  constructor(project: string, repoUrl: string, detail: string) {
    super(`Failed to clone ${repoUrl} for project '${project}': ${detail}`, {
      project,
      repoUrl,
      detail,
    });
  }
}

/**
 * Branch requested for an existing-branch workspace does not exist
 */
export class BranchNotFoundError extends TaskdockError {
  readonly code = 'BRANCH_NOT_FOUND';
  readonly recoverable = false;

  constructor(project: string, branchName: string) {
    super(`Branch '${branchName}' not found in project '${project}'`, {
      project,
      branchName,
    });
  }
}

/**
 * git refused to create the linked working copy
 */
export class WorkspaceAcquisitionError extends TaskdockError {
  readonly code = 'WORKSPACE_ACQUISITION_FAILED';
  readonly recoverable = true;

  constructor(project: string, path: string, detail: string) {
    super(`Could not create workspace at '${path}' for project '${project}': ${detail}`, {
      project,
      path,
      detail,
    });
  }
}

/**
 * Git operation failed
 */
export class GitOperationError extends TaskdockError {
  readonly code = 'GIT_OPERATION_ERROR';
  readonly recoverable = true;
  readonly detail: string;

  constructor(operation: string, path: string, detail: string) {
    super(`git ${operation} failed in '${path}': ${detail}`, { operation, path, detail });
    this.detail = detail;
  }
}

// ============================================================================
// Job Errors
// ============================================================================

export class NoActiveSessionError extends TaskdockError {
  readonly code = 'NO_ACTIVE_SESSION';
  readonly recoverable = false;

  constructor(project: string, sessionRef?: string) {
    super(
      sessionRef
        ? `No session recorded for job ${sessionRef} in project '${project}'`
        : `No active session for project '${project}'. Run feat, fix or plan first.`,
      { project, sessionRef }
    );
  }
}

/**
 * Agent exited cleanly but never wrote its output file
 */
export class MissingOutputError extends TaskdockError {
  readonly code = 'MISSING_OUTPUT';
  readonly recoverable = false;

  constructor(jobId: string, outputFile: string) {
    super(`Job ${jobId} finished without writing ${outputFile}`, { jobId, outputFile });
  }
}

/**
 * Agent exited non-zero without output. This is a task failure, not an infrastructure one.
 */
export class AgentExecutionError extends TaskdockError {
  readonly code = 'AGENT_EXECUTION_FAILED';
  readonly recoverable = false;
  readonly exitCode: number | null;
  readonly outputTail: string;

  constructor(jobId: string, exitCode: number | null, signal: string | null, outputTail: string) {
    const how = exitCode !== null ? `code ${exitCode}` : `signal ${signal ?? 'unknown'}`;
    super(`Agent for job ${jobId} exited with ${how}`, { jobId, exitCode, signal });
    this.exitCode = exitCode;
    this.outputTail = outputTail;
  }
}

/**
 * The agent process could not be started at all
 */
export class AgentSpawnError extends TaskdockError {
  readonly code = 'AGENT_SPAWN_FAILED';
  readonly recoverable = true;

  constructor(jobId: string, command: string, cause?: Error) {
    super(`Could not start agent '${command}' for job ${jobId}: ${cause?.message || 'Unknown error'}`, {
      jobId,
      command,
      cause: cause?.message,
    });
  }
}

export class TimeoutExceededError extends TaskdockError {
  readonly code = 'TIMEOUT_EXCEEDED';
  readonly recoverable = true;
  readonly timeoutMs: number;

  constructor(jobId: string, timeoutMs: number) {
    super(`Job ${jobId} exceeded its ${Math.round(timeoutMs / 1000)}s time limit`, {
      jobId,
      timeoutMs,
    });
    this.timeoutMs = timeoutMs;
  }
}

/**
 * Operation was cancelled
 */
export class CancellationError extends TaskdockError {
  readonly code = 'CANCELLED';
  readonly recoverable = false;

  constructor(jobId: string) {
    super(`Job ${jobId} was cancelled`, { jobId });
  }
}

export class JobNotFoundError extends TaskdockError {
  readonly code = 'JOB_NOT_FOUND';
  readonly recoverable = false;

  constructor(jobId: string) {
    super(`Job ${jobId} not found`, { jobId });
  }
}

// ============================================================================
// Process Errors
// ============================================================================

export class AlreadyRunningError extends TaskdockError {
  readonly code = 'ALREADY_RUNNING';
  readonly recoverable = false;
  readonly pid: number;

  constructor(project: string, pid: number) {
    super(`Project '${project}' is already running (PID: ${pid})`, { project, pid });
    this.pid = pid;
  }
}

export class ProcessNotRunningError extends TaskdockError {
  readonly code = 'PROCESS_NOT_RUNNING';
  readonly recoverable = false;

  constructor(project: string) {
    super(`No running process for project '${project}'`, { project });
  }
}

export class ProcessStartError extends TaskdockError {
  readonly code = 'PROCESS_START_FAILED';
  readonly recoverable = true;

  constructor(project: string, command: string, cause?: Error) {
    super(`Failed to start '${command}' for project '${project}': ${cause?.message || 'Unknown error'}`, {
      project,
      command,
      cause: cause?.message,
    });
  }
}

// ============================================================================
// Configuration Errors
// ============================================================================

export class ProjectNotFoundError extends TaskdockError {
  readonly code = 'PROJECT_NOT_FOUND';
  readonly recoverable = false;

  constructor(project: string, available: string[]) {
    super(`Project '${project}' not found. Available projects: ${available.join(', ') || 'none'}`, {
      project,
      available,
    });
  }
}

/**
 * Configuration value is invalid or missing
 */
export class ConfigurationError extends TaskdockError {
  readonly code = 'CONFIG_ERROR';
  readonly recoverable = true;

  constructor(key: string, reason: string) {
    super(`Configuration error for '${key}': ${reason}`, { key, reason });
  }
}

/**
 * Validation failed for an entity
 */
export class ValidationError extends TaskdockError {
  readonly code = 'VALIDATION_ERROR';
  readonly recoverable = false;

  constructor(entity: string, reason: string) {
    super(`Invalid ${entity}: ${reason}`, { entity, reason });
  }
}

// ============================================================================
// Utility Functions
// ============================================================================

export function isTaskdockError(error: unknown): error is TaskdockError {
  return error instanceof TaskdockError;
}

/**
 * Check if an error is recoverable
 */
export function isRecoverableError(error: unknown): boolean {
  if (isTaskdockError(error)) {
    return error.recoverable;
  }
  return false;
}

class WrappedError extends TaskdockError {
  readonly code = 'WRAPPED_ERROR';
  readonly recoverable = false;
}

/**
 * Wrap an unknown error as a TaskdockError
 */
export function wrapError(error: unknown, context: string): TaskdockError {
  if (isTaskdockError(error)) {
    return error;
  }

  const message = error instanceof Error ? error.message : String(error);
  return new WrappedError(`${context}: ${message}`, {
    originalError: message,
    context,
  });
}
