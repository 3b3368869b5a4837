/**
 * ProcessSupervisor - long-running auxiliary process per project
 *
 * At most one process per project. Start and stop for a project are
 * serialized; different projects never wait on each other. A process
 * that exits by itself is forgotten either through its exit event or,
 * if that is missed, by the reaper on its next pass.
 */

import type { ChildProcess } from 'node:child_process';
import type { CommandResult, SystemAdapter } from '../adapters/SystemAdapter';
import type { ConfigAdapter } from '../adapters/ConfigAdapter';
import type { ILogger } from '../services/Logger';
import type { IEventBus } from '../types/events';
import type { Project } from '../types/schemas';
import type { AuxiliaryProcessInfo, StopResult } from '../types/job';
import {
  AlreadyRunningError,
  ConfigurationError,
  ProcessNotRunningError,
  ProcessStartError,
} from '../errors';
import { KeyedMutex } from '../utils/KeyedMutex';
import { LineSplitter } from '../utils/LineSplitter';
import { RingBuffer } from '../utils/RingBuffer';
import { delay, waitForExit, waitForSpawn } from '../utils/timeout';

export const DEFAULT_TAIL_LINES = 50;

/** Time for the kernel to let go of a port after its holder was killed */
const PORT_RELEASE_DELAY_MS = 500;

export type StartAllEntry =
  | { project: string; status: 'started'; pid: number }
  | { project: string; status: 'already-running'; pid: number }
  | { project: string; status: 'failed'; message: string };

export interface IProcessSupervisor {
  start(project: Project): Promise<AuxiliaryProcessInfo>;
  stop(project: Project): Promise<StopResult>;
  startAll(projects: Project[]): Promise<StartAllEntry[]>;
  stopAll(): Promise<string[]>;
  tailLog(projectName: string, n?: number): string[];
  isRunning(projectName: string): boolean;
  get(projectName: string): AuxiliaryProcessInfo | undefined;
  list(): AuxiliaryProcessInfo[];
  reap(): number;
  dispose(): Promise<void>;
}

interface ProcessRecord {
  project: Project;
  info: AuxiliaryProcessInfo;
  child: ChildProcess;
  log: RingBuffer<string>;
  stopping: boolean;
}

export class ProcessSupervisor implements IProcessSupervisor {
  private system: SystemAdapter;
  private config: ConfigAdapter;
  private eventBus?: IEventBus;
  private logger?: ILogger;

  private readonly records = new Map<string, ProcessRecord>();
  /** Log of the last process per project, kept after it exits */
  private readonly lastLogs = new Map<string, RingBuffer<string>>();
  private readonly locks = new KeyedMutex();
  private reaper: NodeJS.Timeout | null = null;

  constructor(system: SystemAdapter, config: ConfigAdapter, eventBus?: IEventBus, logger?: ILogger) {
    this.system = system;
    this.config = config;
    this.eventBus = eventBus;
    this.logger = logger?.child({ component: 'ProcessSupervisor' });
  }

  start(project: Project): Promise<AuxiliaryProcessInfo> {
    return this.locks.runExclusive(project.name, async () => {
      const existing = this.records.get(project.name);
      if (existing) {
        throw new AlreadyRunningError(project.name, existing.info.pid);
      }
      if (!project.upCommand) {
        throw new ConfigurationError(`projects.${project.name}.upCommand`, 'no up command configured');
      }

      const command = project.upCommand;
      await this.freePorts(project);

      let child: ChildProcess;
      try {
        child = this.system.spawnDetached('/bin/bash', ['-c', command], { cwd: project.workDir });
        await waitForSpawn(child);
      } catch (error) {
        throw new ProcessStartError(project.name, command, error instanceof Error ? error : undefined);
      }

      const pid = child.pid;
      if (pid === undefined) {
        throw new ProcessStartError(project.name, command);
      }

      const log = new RingBuffer<string>(this.config.get('processLogLines'));
      this.lastLogs.set(project.name, log);
      this.capture(child, log);

      const record: ProcessRecord = {
        project,
        info: { project: project.name, pid, command, startedAt: new Date() },
        child,
        log,
        stopping: false,
      };
      this.records.set(project.name, record);

      child.on('error', (error) => {
        this.logger?.warn({ err: error, project: project.name, pid }, 'Auxiliary process error');
      });
      child.once('exit', (exitCode, signal) => {
        if (this.records.get(project.name) !== record || record.stopping) {
          return;
        }
        this.records.delete(project.name);
        this.logger?.info({ project: project.name, pid, exitCode, signal }, 'Auxiliary process exited');
        this.eventBus?.emit('process:exited', { project: project.name, pid, exitCode, signal });
      });

      this.ensureReaper();
      this.logger?.info({ project: project.name, pid, command }, 'Auxiliary process started');
      this.eventBus?.emit('process:started', { process: record.info });
      return { ...record.info };
    });
  }

  /**
   * Kill whatever still listens on the project's ports, typically a dev
   * server from an earlier run. Failures are logged; the start goes on.
   */
  private async freePorts(project: Project): Promise<void> {
    const killed: Array<{ port: number; pid: number }> = [];

    for (const port of project.ports ?? []) {
      let result: CommandResult;
      try {
        result = await this.system.run('lsof', ['-t', `-iTCP:${port}`, '-sTCP:LISTEN'], {
          cwd: '/',
          timeoutMs: 10_000,
        });
      } catch (error) {
        this.logger?.warn({ err: error, project: project.name, port }, 'Could not check port');
        continue;
      }

      // lsof exits 1 when nothing listens
      const pids = result.stdout
        .split('\n')
        .map((line) => parseInt(line.trim(), 10))
        .filter((pid) => Number.isInteger(pid) && pid > 0 && pid !== process.pid);

      for (const pid of pids) {
        try {
          if (this.system.signalProcess(pid, 'SIGKILL')) {
            killed.push({ port, pid });
          }
        } catch (error) {
          this.logger?.warn({ err: error, project: project.name, port, pid }, 'Could not kill process holding port');
        }
      }
    }

    if (killed.length > 0) {
      this.logger?.info({ project: project.name, killed }, 'Killed processes holding project ports');
      await delay(PORT_RELEASE_DELAY_MS);
    }
  }

  /**
   * SIGTERM the process group, SIGKILL it after the grace period, then
   * run the project's down command if it has one.
   */
  stop(project: Project): Promise<StopResult> {
    return this.locks.runExclusive(project.name, async () => {
      const record = this.records.get(project.name);
      if (!record) {
        throw new ProcessNotRunningError(project.name);
      }
      record.stopping = true;

      const { pid } = record.info;
      const grace = this.config.get('processStopGraceMs');
      let forced = false;

      this.signalGroup(pid, 'SIGTERM');
      if (!(await waitForExit(record.child, grace)) && this.system.isProcessAlive(pid)) {
        forced = true;
        this.logger?.warn({ project: project.name, pid }, 'Auxiliary process ignored SIGTERM, sending SIGKILL');
        this.signalGroup(pid, 'SIGKILL');
        await waitForExit(record.child, grace);
      }
      // Leftover group members outlive their leader otherwise
      this.signalGroup(pid, 'SIGKILL');

      if (this.records.get(project.name) === record) {
        this.records.delete(project.name);
      }
      this.logger?.info({ project: project.name, pid, forced }, 'Auxiliary process stopped');
      this.eventBus?.emit('process:stopped', { project: project.name, pid, forced });

      if (project.downCommand) {
        await this.runDownCommand(project, project.downCommand);
      }
      return { pid, forced };
    });
  }

  async startAll(projects: Project[]): Promise<StartAllEntry[]> {
    const withUp = projects.filter((project) => project.upCommand);
    return Promise.all(
      withUp.map(async (project): Promise<StartAllEntry> => {
        try {
          const info = await this.start(project);
          return { project: project.name, status: 'started', pid: info.pid };
        } catch (error) {
          if (error instanceof AlreadyRunningError) {
            return { project: project.name, status: 'already-running', pid: error.pid };
          }
          this.logger?.error({ err: error, project: project.name }, 'Failed to start auxiliary process');
          return {
            project: project.name,
            status: 'failed',
            message: error instanceof Error ? error.message : String(error),
          };
        }
      })
    );
  }

  /**
   * Stop every running process.
   * @returns names of the projects that were stopped
   */
  async stopAll(): Promise<string[]> {
    const running = Array.from(this.records.values(), (record) => record.project);
    const results = await Promise.allSettled(
      running.map(async (project) => {
        await this.stop(project);
        return project.name;
      })
    );

    const stopped: string[] = [];
    results.forEach((result, index) => {
      if (result.status === 'fulfilled') {
        stopped.push(result.value);
      } else if (!(result.reason instanceof ProcessNotRunningError)) {
        this.logger?.error({ err: result.reason, project: running[index]?.name }, 'Failed to stop auxiliary process');
      }
    });
    return stopped;
  }

  /**
   * Last `n` log lines of the running process, or of the one that ran last
   */
  tailLog(projectName: string, n: number = DEFAULT_TAIL_LINES): string[] {
    const log = this.records.get(projectName)?.log ?? this.lastLogs.get(projectName);
    if (!log) {
      throw new ProcessNotRunningError(projectName);
    }
    return log.tail(n);
  }

  isRunning(projectName: string): boolean {
    return this.records.has(projectName);
  }

  get(projectName: string): AuxiliaryProcessInfo | undefined {
    const record = this.records.get(projectName);
    return record ? { ...record.info } : undefined;
  }

  list(): AuxiliaryProcessInfo[] {
    return Array.from(this.records.values(), (record) => ({ ...record.info }));
  }

  /**
   * Forget processes that are gone (zombies included).
   * @returns number of records cleared
   */
  reap(): number {
    let cleared = 0;
    for (const [name, record] of this.records) {
      if (record.stopping || this.system.isProcessAlive(record.info.pid)) {
        continue;
      }
      this.records.delete(name);
      cleared++;
      this.logger?.info({ project: name, pid: record.info.pid }, 'Reaped exited auxiliary process');
      this.eventBus?.emit('process:exited', {
        project: name,
        pid: record.info.pid,
        exitCode: record.child.exitCode,
        signal: record.child.signalCode,
      });
    }
    return cleared;
  }

  async dispose(): Promise<void> {
    if (this.reaper) {
      clearInterval(this.reaper);
      this.reaper = null;
    }
    await this.stopAll();
  }

  private capture(child: ChildProcess, log: RingBuffer<string>): void {
    const push = (line: string): void => log.push(line);
    const stdout = new LineSplitter(push);
    const stderr = new LineSplitter(push);
    child.stdout?.on('data', (chunk: Buffer) => stdout.write(chunk));
    child.stderr?.on('data', (chunk: Buffer) => stderr.write(chunk));
    child.stdout?.once('end', () => stdout.flush());
    child.stderr?.once('end', () => stderr.flush());
  }

  private ensureReaper(): void {
    if (this.reaper) {
      return;
    }
    this.reaper = setInterval(() => this.reap(), this.config.get('reaperIntervalMs'));
    this.reaper.unref();
  }

  private async runDownCommand(project: Project, downCommand: string): Promise<void> {
    try {
      const result = await this.system.run('/bin/bash', ['-c', downCommand], {
        cwd: project.workDir,
        timeoutMs: this.config.get('downTimeoutMs'),
      });
      if (result.exitCode !== 0) {
        this.logger?.warn(
          { project: project.name, exitCode: result.exitCode, stderr: result.stderr.trim() },
          'Down command failed'
        );
      }
    } catch (error) {
      this.logger?.warn({ err: error, project: project.name }, 'Down command could not run');
    }
  }

  private signalGroup(pid: number, signal: NodeJS.Signals): void {
    try {
      this.system.signalProcessGroup(pid, signal);
    } catch (error) {
      this.logger?.warn({ err: error, pid, signal }, 'Failed to signal auxiliary process group');
    }
  }
}
