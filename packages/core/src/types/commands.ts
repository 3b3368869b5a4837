/**
 * Command kinds
 *
 * Every development command the orchestrator accepts has exactly one
 * record here. Code that needs per-command behaviour switches over
 * `CommandKind` and lets `assertNever` prove the match is exhaustive.
 */

export const COMMAND_KINDS = ['ask', 'feat', 'fix', 'plan', 'feedback', 'init'] as const;

export type CommandKind = (typeof COMMAND_KINDS)[number];

/**
 * How a command gets its working directory
 * - none: runs in the neutral directory, no checkout
 * - new-branch: fresh branch `<prefix>-<job id>` from the default branch
 * - session-branch: existing branch recorded by an earlier session
 */
export type WorkspacePolicy =
  | { kind: 'none' }
  | { kind: 'new-branch'; prefix: string }
  | { kind: 'session-branch' };

export interface CommandSpec {
  readonly kind: CommandKind;
  readonly workspace: WorkspacePolicy;
  /** Key into the configured rules */
  readonly rulesKey: CommandKind;
  /** Whether a completed run with commits becomes the project's session */
  readonly recordsSession: boolean;
  /** Label of the argument line in the agent prompt */
  readonly promptLabel: 'Query' | 'Task';
}

export const COMMANDS: { readonly [K in CommandKind]: CommandSpec & { readonly kind: K } } = {
  ask: {
    kind: 'ask',
    workspace: { kind: 'none' },
    rulesKey: 'ask',
    recordsSession: false,
    promptLabel: 'Query',
  },
  feat: {
    kind: 'feat',
    workspace: { kind: 'new-branch', prefix: 'feat' },
    rulesKey: 'feat',
    recordsSession: true,
    promptLabel: 'Task',
  },
  fix: {
    kind: 'fix',
    workspace: { kind: 'new-branch', prefix: 'fix' },
    rulesKey: 'fix',
    recordsSession: true,
    promptLabel: 'Task',
  },
  plan: {
    kind: 'plan',
    workspace: { kind: 'new-branch', prefix: 'plan' },
    rulesKey: 'plan',
    recordsSession: true,
    promptLabel: 'Task',
  },
  feedback: {
    kind: 'feedback',
    workspace: { kind: 'session-branch' },
    rulesKey: 'feedback',
    recordsSession: false,
    promptLabel: 'Task',
  },
  init: {
    kind: 'init',
    workspace: { kind: 'new-branch', prefix: 'init' },
    rulesKey: 'init',
    recordsSession: false,
    promptLabel: 'Task',
  },
};

export function getCommandSpec(kind: CommandKind): CommandSpec {
  return COMMANDS[kind];
}

export function isCommandKind(value: string): value is CommandKind {
  return COMMAND_KINDS.some((kind) => kind === value);
}

export function assertNever(value: never): never {
  throw new Error(`Unhandled variant: ${JSON.stringify(value)}`);
}
