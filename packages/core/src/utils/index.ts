/**
 * Core utilities
 */

// State machine
export { StateMachine, InvalidTransitionError } from './StateMachine';
export type { StateMachineConfig, TransitionConfig } from './StateMachine';

// Timing for child processes
export { delay, hasExited, waitForExit, waitForSpawn, formatMinutes } from './timeout';

// Buffers and locks
export { RingBuffer } from './RingBuffer';
export { LineSplitter } from './LineSplitter';
export { KeyedMutex } from './KeyedMutex';

// Ids
export { shortId, uniqueId } from './ids';
