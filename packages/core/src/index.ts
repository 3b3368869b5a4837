/**
 * @taskdock/core
 *
 * Job orchestration for coding agents: isolated git worktrees,
 * supervised agent runs and per-project auxiliary processes.
 */

// Types
export * from './types';

// Errors
export * from './errors';

// Adapters
export * from './adapters';

// Services
export * from './services';

// Managers
export * from './managers';

// Utilities
export * from './utils';
