/**
 * Core services
 */

// Logger
export { createLogger, createNullLogger } from './Logger';
export type { ILogger, LogLevel, LoggerOptions } from './Logger';

// EventBus
export { EventBus } from './EventBus';

// GitService
export { GitService } from './GitService';
export type { IGitService, AddWorktreeOptions } from './GitService';

// StatusReporter
export { StatusReporter, formatStatus } from './StatusReporter';
export type {
  StatusSnapshot,
  ProjectStatus,
  ActiveJobStatus,
  ProcessStatus,
} from './StatusReporter';

// OrchestratorContext
export { OrchestratorContext } from './OrchestratorContext';
export type { OrchestratorOptions } from './OrchestratorContext';
