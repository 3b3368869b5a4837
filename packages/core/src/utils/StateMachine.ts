/**
 * StateMachine - Lightweight finite state machine
 *
 * Transitions are declared per event and validated on every call.
 * States listed as `final` accept no further events, which keeps
 * lifecycles monotonic.
 */

import { TaskdockError } from '../errors';

/**
 * Transition configuration for a single event
 */
export interface TransitionConfig<S extends string> {
  /** State(s) from which this transition is allowed */
  from: S | readonly S[];
  /** Target state after transition */
  to: S;
}

/**
 * Full state machine configuration
 */
export interface StateMachineConfig<S extends string, E extends string> {
  initial: S;
  transitions: Record<E, TransitionConfig<S>>;
  /** States that can never be left */
  final?: readonly S[];
  /** Callback fired on successful transition */
  onTransition?: (from: S, to: S, event: E) => void;
}

/**
 * Error thrown when an invalid state transition is attempted
 */
export class InvalidTransitionError extends TaskdockError {
  readonly code = 'INVALID_TRANSITION';
  readonly recoverable = false;

  constructor(
    public readonly currentState: string,
    public readonly event: string,
    public readonly allowedFromStates: readonly string[]
  ) {
    super(
      `Invalid transition: Cannot apply '${event}' from state '${currentState}'. ` +
        `Allowed from: [${allowedFromStates.join(', ')}]`,
      { currentState, event, allowedFromStates }
    );
  }
}

/**
 * @example
 * ```typescript
 * const machine = new StateMachine({
 *   initial: 'idle',
 *   transitions: {
 *     START: { from: 'idle', to: 'busy' },
 *     FINISH: { from: 'busy', to: 'done' },
 *   },
 *   final: ['done'],
 * });
 *
 * machine.transition('START');  // idle -> busy
 * machine.canTransition('START'); // false
 * ```
 */
export class StateMachine<S extends string, E extends string> {
  private _state: S;
  private readonly _history: S[];
  private readonly config: StateMachineConfig<S, E>;

  constructor(config: StateMachineConfig<S, E>) {
    this.config = config;
    this._state = config.initial;
    this._history = [config.initial];
  }

  get state(): S {
    return this._state;
  }

  /**
   * Every state entered so far, initial state first
   */
  get history(): readonly S[] {
    return this._history;
  }

  isFinal(): boolean {
    return this.config.final?.includes(this._state) ?? false;
  }

  canTransition(event: E): boolean {
    if (this.isFinal()) {
      return false;
    }
    return allowedFrom(this.config.transitions[event]).includes(this._state);
  }

  /**
   * Execute a state transition
   * @throws InvalidTransitionError if transition is not valid from current state
   */
  transition(event: E): S {
    const transitionConfig = this.config.transitions[event];
    const from = allowedFrom(transitionConfig);

    if (!this.canTransition(event)) {
      throw new InvalidTransitionError(this._state, event, from);
    }

    const previousState = this._state;
    this._state = transitionConfig.to;
    this._history.push(this._state);

    this.config.onTransition?.(previousState, this._state, event);

    return this._state;
  }
}

function allowedFrom<S extends string>(transition: TransitionConfig<S> | undefined): readonly S[] {
  if (!transition) {
    return [];
  }
  return typeof transition.from === 'string' ? [transition.from] : transition.from;
}
