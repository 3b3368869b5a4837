/**
 * Terminal-specific adapter implementations
 */

export { FileConfigAdapter, findConfigPath } from './FileConfigAdapter.js';
export type { FileConfigOptions } from './FileConfigAdapter.js';
