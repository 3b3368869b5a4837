/**
 * FileConfigAdapter - File-based configuration implementation
 *
 * Reads configuration from a JSON file with the following priority:
 * 1. an explicit path (`--config`)
 * 2. .taskdock/config.json (in the working directory)
 * 3. ~/.config/taskdock/config.json (user global)
 *
 * Without any of them the defaults apply and no project is configured.
 * Relative paths in the file (scratchRoot, logFile, project workDirs)
 * are resolved against the directory holding the file.
 */

import * as fs from 'node:fs';
import * as path from 'node:path';
import * as os from 'node:os';
import type { ConfigAdapter, OrchestratorConfig, Project, Rules } from '@taskdock/core';
import { ConfigurationError, OrchestratorConfigSchema, formatZodError } from '@taskdock/core';

export interface FileConfigOptions {
  /** Explicit config file; must exist */
  configPath?: string;
  /** Directory searched for .taskdock/config.json */
  cwd?: string;
  homeDir?: string;
}

export class FileConfigAdapter implements ConfigAdapter {
  private readonly config: OrchestratorConfig;
  private readonly configPath: string | null;

  /**
   * @throws ConfigurationError when the file cannot be read, is not JSON,
   *   or fails validation
   */
  constructor(options: FileConfigOptions = {}) {
    this.configPath = findConfigPath(options);
    this.config = this.configPath ? loadConfig(this.configPath) : OrchestratorConfigSchema.parse({});
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

  /**
   * Path of the loaded file, or null when running on defaults
   */
  get path(): string | null {
    return this.configPath;
  }
}

/**
 * Find the configuration file path.
 * @throws ConfigurationError if an explicit path does not exist
 */
export function findConfigPath(options: FileConfigOptions = {}): string | null {
  if (options.configPath) {
    const explicit = path.resolve(options.cwd ?? process.cwd(), options.configPath);
    if (!fs.existsSync(explicit)) {
      throw new ConfigurationError(explicit, 'config file not found');
    }
    return explicit;
  }

  const local = path.join(options.cwd ?? process.cwd(), '.taskdock', 'config.json');
  if (fs.existsSync(local)) {
    return local;
  }

  const global = path.join(options.homeDir ?? os.homedir(), '.config', 'taskdock', 'config.json');
  if (fs.existsSync(global)) {
    return global;
  }

  return null;
}

function loadConfig(configPath: string): OrchestratorConfig {
  let raw: unknown;
  try {
    raw = JSON.parse(fs.readFileSync(configPath, 'utf-8'));
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    throw new ConfigurationError(configPath, `failed to parse: ${message}`);
  }

  const result = OrchestratorConfigSchema.safeParse(raw);
  if (!result.success) {
    throw new ConfigurationError(configPath, formatZodError(result.error));
  }

  const baseDir = path.dirname(configPath);
  const config = result.data;
  return {
    ...config,
    scratchRoot: path.resolve(baseDir, config.scratchRoot),
    logFile: config.logFile ? path.resolve(baseDir, config.logFile) : undefined,
    projects: config.projects.map((project) => ({
      ...project,
      workDir: path.resolve(baseDir, project.workDir),
    })),
  };
}
