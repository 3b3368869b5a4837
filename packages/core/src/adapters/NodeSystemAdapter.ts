/**
 * NodeSystemAdapter - Node.js implementation of SystemAdapter
 *
 * Targets POSIX hosts: process groups are used to signal an agent
 * together with everything it started.
 */

import * as fs from 'node:fs';
import * as path from 'node:path';
import { execFile, spawn, type ChildProcess } from 'node:child_process';
import type { CommandResult, RunOptions, SpawnOptions, SystemAdapter } from './SystemAdapter';

/**
 * Upper bound on captured output of short commands
 */
const MAX_BUFFER = 16 * 1024 * 1024;

function errnoCode(error: unknown): string | undefined {
  if (error instanceof Error && 'code' in error && typeof error.code === 'string') {
    return error.code;
  }
  return undefined;
}

export class NodeSystemAdapter implements SystemAdapter {
  // ========== Command Execution ==========

  run(file: string, args: string[], options: RunOptions): Promise<CommandResult> {
    return new Promise((resolve, reject) => {
      execFile(
        file,
        args,
        {
          cwd: options.cwd,
          env: { ...process.env, ...options.env },
          timeout: options.timeoutMs ?? 0,
          maxBuffer: MAX_BUFFER,
          encoding: 'utf-8',
          signal: options.signal,
        },
        (error, stdout, stderr) => {
          if (!error) {
            resolve({ stdout, stderr, exitCode: 0 });
            return;
          }
          if (options.signal?.aborted) {
            reject(new Error(`'${file} ${args.join(' ')}' was aborted`));
            return;
          }
          if (error.killed) {
            reject(new Error(`'${file} ${args.join(' ')}' timed out after ${options.timeoutMs}ms`));
            return;
          }
          if (typeof error.code === 'number') {
            resolve({ stdout, stderr, exitCode: error.code });
            return;
          }
          reject(error);
        }
      );
    });
  }

  spawnDetached(file: string, args: string[], options: SpawnOptions): ChildProcess {
    return spawn(file, args, {
      cwd: options.cwd,
      env: { ...process.env, ...options.env },
      detached: true,
      stdio: ['ignore', 'pipe', 'pipe'],
    });
  }

  // ========== Processes ==========

  signalProcessGroup(pid: number, signal: NodeJS.Signals): boolean {
    try {
      process.kill(-pid, signal);
      return true;
    } catch (error) {
      if (errnoCode(error) === 'ESRCH') {
        return false;
      }
      throw error;
    }
  }

  signalProcess(pid: number, signal: NodeJS.Signals): boolean {
    try {
      process.kill(pid, signal);
      return true;
    } catch (error) {
      if (errnoCode(error) === 'ESRCH') {
        return false;
      }
      throw error;
    }
  }

  isProcessAlive(pid: number): boolean {
    try {
      process.kill(pid, 0);
    } catch (error) {
      // EPERM means the process exists but belongs to someone else
      return errnoCode(error) === 'EPERM';
    }

    // A zombie still answers signal 0; its state letter follows the command name
    try {
      const stat = fs.readFileSync(`/proc/${pid}/stat`, 'utf-8');
      const state = stat.slice(stat.lastIndexOf(')') + 2, stat.lastIndexOf(')') + 3);
      return state !== 'Z';
    } catch {
      return true;
    }
  }

  // ========== File System ==========

  joinPath(basePath: string, ...segments: string[]): string {
    return path.join(basePath, ...segments);
  }

  dirname(filePath: string): string {
    return path.dirname(filePath);
  }

  exists(inputPath: string): boolean {
    return fs.existsSync(inputPath);
  }

  isDirectory(inputPath: string): boolean {
    try {
      return fs.statSync(inputPath).isDirectory();
    } catch {
      return false;
    }
  }

  readFile(inputPath: string): string {
    return fs.readFileSync(inputPath, 'utf-8');
  }

  writeFile(inputPath: string, content: string): void {
    fs.mkdirSync(path.dirname(inputPath), { recursive: true });
    fs.writeFileSync(inputPath, content, 'utf-8');
  }

  appendFile(inputPath: string, content: string): void {
    fs.appendFileSync(inputPath, content, 'utf-8');
  }

  readDir(inputPath: string): string[] {
    return fs.readdirSync(inputPath);
  }

  mkdir(inputPath: string): void {
    fs.mkdirSync(inputPath, { recursive: true });
  }

  unlink(inputPath: string): void {
    fs.unlinkSync(inputPath);
  }

  rmdir(inputPath: string, options?: { recursive?: boolean }): void {
    if (options?.recursive) {
      fs.rmSync(inputPath, { recursive: true, force: true });
    } else {
      fs.rmdirSync(inputPath);
    }
  }
}
