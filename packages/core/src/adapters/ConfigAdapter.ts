/**
 * ConfigAdapter - Abstracts configuration access
 *
 * Projects and rules are loaded once by whoever hosts the core; the
 * orchestrator only reads them.
 *
 * Implementations:
 * - InMemoryConfigAdapter - config object supplied by the embedder (and tests)
 * - FileConfigAdapter (packages/terminal) - JSON file on disk
 */

import { ValidationError } from '../errors';
import {
  OrchestratorConfigSchema,
  formatZodError,
  type OrchestratorConfig,
  type OrchestratorConfigInput,
  type Project,
  type Rules,
} from '../types/schemas';

/**
 * Default configuration values
 */
export const DEFAULT_CONFIG: OrchestratorConfig = OrchestratorConfigSchema.parse({});

/**
 * ConfigAdapter abstracts configuration access.
 */
export interface ConfigAdapter {
  get<K extends keyof OrchestratorConfig>(key: K): OrchestratorConfig[K];
  getAll(): OrchestratorConfig;
  getProject(name: string): Project | undefined;
  listProjects(): Project[];
  getRules(): Rules;
}

/**
 * Validate raw configuration, filling in defaults.
 * @throws ValidationError listing every invalid field
 */
export function parseConfig(raw: unknown): OrchestratorConfig {
  const result = OrchestratorConfigSchema.safeParse(raw);
  if (!result.success) {
    throw new ValidationError('configuration', formatZodError(result.error));
  }
  return result.data;
}

/**
 * ConfigAdapter over a configuration object held in memory
 */
export class InMemoryConfigAdapter implements ConfigAdapter {
  private readonly config: OrchestratorConfig;

  constructor(config: OrchestratorConfigInput = {}) {
    this.config = parseConfig(config);
  }

  get<K extends keyof OrchestratorConfig>(key: K): OrchestratorConfig[K] {
    return this.config[key];
  }

  getAll(): OrchestratorConfig {
    return { ...this.config };
  }

  getProject(name: string): Project | undefined {
    return this.config.projects.find((project) => project.name === name);
  }

  listProjects(): Project[] {
    return [...this.config.projects];
  }

  getRules(): Rules {
    return this.config.rules;
  }
}
