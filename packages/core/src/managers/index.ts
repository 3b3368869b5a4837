/**
 * Core managers
 */

// WorktreeManager
export { WorktreeManager } from './WorktreeManager';
export type { IWorktreeManager } from './WorktreeManager';

// JobRegistry
export { JobRegistry, toJobFailure } from './JobRegistry';
export type { IJobRegistry, TerminalSummary } from './JobRegistry';

// SessionStore
export { SessionStore, MAX_SESSIONS_PER_PROJECT } from './SessionStore';
export type { ISessionStore } from './SessionStore';

// ExecutionEngine
export { ExecutionEngine, buildPrompt, composeRules, parseAgentSessionId } from './ExecutionEngine';
export type { IExecutionEngine, ExecutionOptions, AgentInvocation } from './ExecutionEngine';

// ProcessSupervisor
export { ProcessSupervisor, DEFAULT_TAIL_LINES } from './ProcessSupervisor';
export type { IProcessSupervisor, StartAllEntry } from './ProcessSupervisor';
