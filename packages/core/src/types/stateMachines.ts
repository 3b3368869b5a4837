/**
 * State machine definitions for job lifecycles
 */

import { StateMachine, StateMachineConfig } from '../utils/StateMachine';
import { JobState, TerminalJobState, TERMINAL_JOB_STATES } from './job';
import { assertNever } from './commands';

/**
 * Events that can trigger job state transitions
 */
export type JobEvent =
  | 'START' // Workspace acquired, agent about to run
  | 'COMPLETE' // Agent wrote its output
  | 'FAIL' // Acquisition or agent failure
  | 'CANCEL' // Cancel observed by the owner
  | 'TIME_OUT'; // Wall-clock limit hit

/**
 * Create a state machine for one job
 *
 * State transitions:
 * ```
 * pending ──START──> running ──COMPLETE──> completed
 *    │                  ├──FAIL──> failed
 *    │                  ├──CANCEL──> cancelled
 *    │                  └──TIME_OUT──> timed-out
 *    ├──FAIL──> failed
 *    └──CANCEL──> cancelled
 * ```
 * Terminal states accept no events.
 */
export function createJobStateMachine(
  onTransition?: (from: JobState, to: JobState, event: JobEvent) => void
): StateMachine<JobState, JobEvent> {
  const config: StateMachineConfig<JobState, JobEvent> = {
    initial: 'pending',
    transitions: {
      START: { from: 'pending', to: 'running' },
      COMPLETE: { from: 'running', to: 'completed' },
      FAIL: { from: ['pending', 'running'], to: 'failed' },
      CANCEL: { from: ['pending', 'running'], to: 'cancelled' },
      TIME_OUT: { from: 'running', to: 'timed-out' },
    },
    final: TERMINAL_JOB_STATES,
    onTransition,
  };
  return new StateMachine(config);
}

/**
 * Event that moves a job into the given terminal state
 */
export function terminalEventFor(state: TerminalJobState): JobEvent {
  switch (state) {
    case 'completed':
      return 'COMPLETE';
    case 'failed':
      return 'FAIL';
    case 'cancelled':
      return 'CANCEL';
    case 'timed-out':
      return 'TIME_OUT';
    default:
      return assertNever(state);
  }
}
