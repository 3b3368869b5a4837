/**
 * Event types for the EventBus
 *
 * Domain events describe what happened to jobs and auxiliary processes.
 * Chat adapters subscribe to `job:finished` to post results back.
 */

import type { CommandKind } from './commands';
import type { AuxiliaryProcessInfo, Job, JobResult, JobState } from './job';

/**
 * All event types emitted by the orchestrator
 */
export type EventType =
  // Jobs
  | 'job:created'
  | 'job:stateChanged'
  | 'job:finished'
  | 'job:evicted'
  // Auxiliary processes
  | 'process:started'
  | 'process:exited'
  | 'process:stopped'
  // Error events (for error reporting)
  | 'error:recoverable';

/**
 * Payload types for each event
 */
export interface EventPayloads {
  'job:created': { job: Job };
  'job:stateChanged': {
    jobId: string;
    project: string;
    command: CommandKind;
    previousState: JobState;
    state: JobState;
  };
  /** Summary text is not included; call takeResult to read it */
  'job:finished': { result: Omit<JobResult, 'summaryText'>; summaryPath: string | null };
  /** `summaryPath` is set when the summary was never retrieved */
  'job:evicted': { jobId: string; project: string; summaryPath: string | null };

  'process:started': { process: AuxiliaryProcessInfo };
  'process:exited': { project: string; pid: number; exitCode: number | null; signal: string | null };
  'process:stopped': { project: string; pid: number; forced: boolean };

  'error:recoverable': {
    source: string;
    code: string;
    message: string;
    context?: Record<string, unknown>;
  };
}

/**
 * Event handler type
 */
export type EventHandler<T extends EventType> = (payload: EventPayloads[T]) => void;

/**
 * Event bus service interface
 */
export interface IEventBus {
  on<T extends EventType>(event: T, handler: EventHandler<T>): void;
  off<T extends EventType>(event: T, handler: EventHandler<T>): void;
  once<T extends EventType>(event: T, handler: EventHandler<T>): void;
  emit<T extends EventType>(event: T, payload: EventPayloads[T]): void;
}
