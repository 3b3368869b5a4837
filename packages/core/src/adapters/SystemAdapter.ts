/**
 * SystemAdapter - Abstracts all OS-specific operations
 *
 * Command execution, process signalling and file system access go
 * through this interface so managers can be unit tested without
 * touching the machine.
 *
 * Implementations:
 * - NodeSystemAdapter - Node.js child_process and fs
 * - MockSystemAdapter (tests) - scripted command results, in-memory files
 */

import type { ChildProcess } from 'node:child_process';

/**
 * Outcome of a finished command. Non-zero exits are results, not errors.
 */
export interface CommandResult {
  stdout: string;
  stderr: string;
  exitCode: number;
}

export interface RunOptions {
  cwd: string;
  /** Kill the command after this many milliseconds */
  timeoutMs?: number;
  /** Added to the inherited environment */
  env?: Record<string, string>;
  /** Kill the command when this signal aborts */
  signal?: AbortSignal;
}

export interface SpawnOptions {
  cwd: string;
  env?: Record<string, string>;
}

/**
 * SystemAdapter abstracts all OS-specific operations.
 */
export interface SystemAdapter {
  // ========== Command Execution ==========

  /**
   * Run a program to completion without a shell.
   *
   * @returns Captured output and exit code
   * @throws Error if the program cannot be started, exceeds the timeout or is aborted
   */
  run(file: string, args: string[], options: RunOptions): Promise<CommandResult>;

  /**
   * Start a long-running program as the leader of a new process group,
   * with stdin closed and stdout/stderr piped.
   */
  spawnDetached(file: string, args: string[], options: SpawnOptions): ChildProcess;

  // ========== Processes ==========

  /**
   * Send a signal to every process in the group led by `pid`.
   * @returns false if the group no longer exists
   */
  signalProcessGroup(pid: number, signal: NodeJS.Signals): boolean;

  /**
   * Send a signal to a single process.
   * @returns false if the process no longer exists
   */
  signalProcess(pid: number, signal: NodeJS.Signals): boolean;

  /**
   * Whether `pid` refers to a live (non-zombie) process
   */
  isProcessAlive(pid: number): boolean;

  // ========== File System ==========

  joinPath(basePath: string, ...segments: string[]): string;
  dirname(filePath: string): string;
  exists(path: string): boolean;
  isDirectory(path: string): boolean;

  /**
   * @throws Error if the file doesn't exist or can't be read
   */
  readFile(path: string): string;

  /**
   * Write content to a file, creating parent directories if needed.
   */
  writeFile(path: string, content: string): void;

  appendFile(path: string, content: string): void;
  readDir(path: string): string[];

  /**
   * Create a directory recursively.
   */
  mkdir(path: string): void;

  unlink(path: string): void;

  /**
   * Delete a directory. With `recursive`, contents go too and a missing
   * directory is not an error.
   */
  rmdir(path: string, options?: { recursive?: boolean }): void;
}
