/**
 * Timing utilities for supervised child processes
 */

import type { ChildProcess } from 'node:child_process';

/**
 * Create a delay promise (useful for testing and polling)
 */
export function delay(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

export function hasExited(child: ChildProcess): boolean {
  return child.exitCode !== null || child.signalCode !== null;
}

/**
 * Wait up to `timeoutMs` for a child to exit.
 *
 * @returns true if the child exited within the window
 */
export function waitForExit(child: ChildProcess, timeoutMs: number): Promise<boolean> {
  if (hasExited(child)) {
    return Promise.resolve(true);
  }

  return new Promise<boolean>((resolve) => {
    const onExit = (): void => {
      clearTimeout(timer);
      resolve(true);
    };
    const timer = setTimeout(() => {
      child.removeListener('exit', onExit);
      resolve(false);
    }, timeoutMs);
    child.once('exit', onExit);
  });
}

/**
 * Resolve once the child has been spawned, reject with the spawn error otherwise.
 */
export function waitForSpawn(child: ChildProcess): Promise<void> {
  return new Promise<void>((resolve, reject) => {
    const onSpawn = (): void => {
      child.removeListener('error', onError);
      resolve();
    };
    const onError = (error: Error): void => {
      child.removeListener('spawn', onSpawn);
      reject(error);
    };
    child.once('spawn', onSpawn);
    child.once('error', onError);
  });
}

/**
 * Milliseconds as minutes with two decimals, e.g. "1.25"
 */
export function formatMinutes(ms: number): string {
  return (ms / 60000).toFixed(2);
}
