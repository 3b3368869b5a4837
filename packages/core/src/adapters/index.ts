/**
 * Adapter interfaces
 *
 * These interfaces abstract OS and configuration access, allowing
 * core logic to be tested without touching the machine.
 */

// System operations (commands, processes, filesystem)
export type { SystemAdapter, CommandResult, RunOptions, SpawnOptions } from './SystemAdapter';

// Node.js implementation of SystemAdapter
export { NodeSystemAdapter } from './NodeSystemAdapter';

// Configuration
export { DEFAULT_CONFIG, InMemoryConfigAdapter, parseConfig } from './ConfigAdapter';
export type { ConfigAdapter } from './ConfigAdapter';
