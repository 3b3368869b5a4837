/**
 * Core type definitions
 */

// Commands
export {
  COMMAND_KINDS,
  COMMANDS,
  getCommandSpec,
  isCommandKind,
  assertNever,
} from './commands';
export type { CommandKind, CommandSpec, WorkspacePolicy } from './commands';

// Jobs, workspaces, sessions
export { TERMINAL_JOB_STATES, isTerminalState } from './job';
export type {
  WorkspaceMode,
  Workspace,
  JobState,
  TerminalJobState,
  JobFailure,
  Job,
  JobHandle,
  JobOutcome,
  JobResult,
  SessionLink,
  AuxiliaryProcessInfo,
  StopResult,
} from './job';

// Event types
export type { EventType, EventPayloads, EventHandler, IEventBus } from './events';

// State machines
export { createJobStateMachine, terminalEventFor } from './stateMachines';
export type { JobEvent } from './stateMachines';

// Schemas
export {
  ProjectNameSchema,
  ProjectSchema,
  RulesSchema,
  LogLevelSchema,
  OrchestratorConfigSchema,
  CommandKindSchema,
  JobRequestSchema,
  AgentStdoutLineSchema,
  safeParse,
  formatZodError,
} from './schemas';
export type {
  Project,
  Rules,
  RulesKey,
  OrchestratorConfig,
  OrchestratorConfigInput,
  JobRequest,
  ValidatedJobRequest,
} from './schemas';
