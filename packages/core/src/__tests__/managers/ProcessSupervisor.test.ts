/**
 * ProcessSupervisor tests
 *
 * Starts real bash processes in a temp directory.
 */

import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import * as fs from 'node:fs';
import * as os from 'node:os';
import * as path from 'node:path';
import { ProcessSupervisor } from '../../managers/ProcessSupervisor';
import { InMemoryConfigAdapter } from '../../adapters/ConfigAdapter';
import { NodeSystemAdapter } from '../../adapters/NodeSystemAdapter';
import { EventBus } from '../../services/EventBus';
import {
  AlreadyRunningError,
  ConfigurationError,
  ProcessNotRunningError,
  ProcessStartError,
} from '../../errors';
import type { Project } from '../../types/schemas';
import { MockSystemAdapter } from '../mocks/MockSystemAdapter';

const system = new NodeSystemAdapter();

describe('ProcessSupervisor', () => {
  let workDir: string;
  let eventBus: EventBus;
  let supervisor: ProcessSupervisor;

  function project(upCommand?: string, overrides: Partial<Project> = {}): Project {
    return { name: 'demo', repoUrl: 'unused', workDir, defaultBranch: 'main', upCommand, ...overrides };
  }

  beforeEach(() => {
    workDir = fs.mkdtempSync(path.join(os.tmpdir(), 'process-supervisor-test-'));
    eventBus = new EventBus();
    const config = new InMemoryConfigAdapter({
      processStopGraceMs: 300,
      reaperIntervalMs: 100,
      processLogLines: 10,
    });
    supervisor = new ProcessSupervisor(system, config, eventBus);
  });

  afterEach(async () => {
    await supervisor.dispose();
    fs.rmSync(workDir, { recursive: true, force: true });
  });

  describe('start', () => {
    it('starts the up command and reports it as running', async () => {
      const started = vi.fn();
      eventBus.on('process:started', started);

      const info = await supervisor.start(project('sleep 300'));

      expect(info).toMatchObject({ project: 'demo', command: 'sleep 300' });
      expect(system.isProcessAlive(info.pid)).toBe(true);
      expect(supervisor.isRunning('demo')).toBe(true);
      expect(supervisor.list()).toEqual([info]);
      expect(started).toHaveBeenCalledWith({ process: info });
    });

    it('rejects a second start and keeps the original process', async () => {
      const info = await supervisor.start(project('sleep 300'));

      await expect(supervisor.start(project('sleep 300'))).rejects.toBeInstanceOf(AlreadyRunningError);
      expect(supervisor.get('demo')?.pid).toBe(info.pid);
    });

    it('serializes concurrent starts for one project', async () => {
      const results = await Promise.allSettled([
        supervisor.start(project('sleep 300')),
        supervisor.start(project('sleep 300')),
      ]);

      expect(results.map((result) => result.status).sort()).toEqual(['fulfilled', 'rejected']);
      expect(supervisor.list()).toHaveLength(1);
    });

    it('requires an up command', async () => {
      await expect(supervisor.start(project())).rejects.toBeInstanceOf(ConfigurationError);
    });

    it('wraps spawn failures in ProcessStartError', async () => {
      const failing = new ProcessSupervisor(new MockSystemAdapter(), new InMemoryConfigAdapter());
      await expect(failing.start(project('sleep 300'))).rejects.toBeInstanceOf(ProcessStartError);
    });
  });

  describe('ports', () => {
    it('kills processes still listening on the project ports before starting', async () => {
      const mock = new MockSystemAdapter();
      mock.setRunResult('lsof -t -iTCP:3000 -sTCP:LISTEN', { stdout: '4321\n4322\n' });
      mock.setRunResult('lsof -t -iTCP:3001 -sTCP:LISTEN', { exitCode: 1 });
      mock.setProcessAlive(4321, true);
      mock.setProcessAlive(4322, true);
      const withPorts = new ProcessSupervisor(mock, new InMemoryConfigAdapter());

      // The mock cannot spawn, so the start fails after the ports are freed
      await expect(withPorts.start(project('npm run dev', { ports: [3000, 3001] }))).rejects.toBeInstanceOf(
        ProcessStartError
      );

      expect(mock.commands.map(({ command }) => command)).toEqual([
        'lsof -t -iTCP:3000 -sTCP:LISTEN',
        'lsof -t -iTCP:3001 -sTCP:LISTEN',
      ]);
      expect(mock.signals).toEqual([
        { pid: 4321, signal: 'SIGKILL' },
        { pid: 4322, signal: 'SIGKILL' },
      ]);
    });

    it('still starts when the ports cannot be checked', async () => {
      const mock = new MockSystemAdapter();
      mock.setRunError('lsof', new Error('spawn lsof ENOENT'));
      const withPorts = new ProcessSupervisor(mock, new InMemoryConfigAdapter());

      await expect(withPorts.start(project('npm run dev', { ports: [3000] }))).rejects.toThrow(
        "Failed to start 'npm run dev' for project 'demo': spawn /bin/bash ENOENT"
      );
      expect(mock.signals).toEqual([]);
    });

    it('rejects port numbers outside the valid range', () => {
      expect(() =>
        new InMemoryConfigAdapter({ projects: [{ name: 'api', repoUrl: 'unused', workDir: '/srv/api', ports: [0] }] })
      ).toThrow('Invalid configuration: projects.0.ports.0: Number must be greater than or equal to 1');
    });
  });

  describe('exit detection', () => {
    it('forgets a process that exits by itself and keeps its log', async () => {
      const exited = vi.fn();
      eventBus.on('process:exited', exited);

      const info = await supervisor.start(project('echo bye'));

      await vi.waitFor(() => expect(supervisor.isRunning('demo')).toBe(false), { timeout: 5000 });
      expect(exited).toHaveBeenCalledWith({ project: 'demo', pid: info.pid, exitCode: 0, signal: null });
      await vi.waitFor(() => expect(supervisor.tailLog('demo')).toEqual(['bye']), { timeout: 5000 });
    });
  });

  describe('tailLog', () => {
    it('returns the newest lines up to the buffer size', async () => {
      await supervisor.start(project('for i in $(seq 1 15); do echo line-$i; done; sleep 300'));

      await vi.waitFor(() => expect(supervisor.tailLog('demo', 2)).toEqual(['line-14', 'line-15']), {
        timeout: 5000,
      });
      expect(supervisor.tailLog('demo')).toHaveLength(10);
    });

    it('includes stderr', async () => {
      await supervisor.start(project('echo to-stderr >&2; sleep 300'));

      await vi.waitFor(() => expect(supervisor.tailLog('demo')).toEqual(['to-stderr']), { timeout: 5000 });
    });

    it('throws for a project that never ran', () => {
      expect(() => supervisor.tailLog('demo')).toThrow(ProcessNotRunningError);
    });
  });

  describe('stop', () => {
    it('terminates the process group with SIGTERM', async () => {
      const stopped = vi.fn();
      eventBus.on('process:stopped', stopped);
      const info = await supervisor.start(project('sleep 300 & sleep 300'));

      const result = await supervisor.stop(project('sleep 300 & sleep 300'));

      expect(result).toEqual({ pid: info.pid, forced: false });
      expect(supervisor.isRunning('demo')).toBe(false);
      expect(stopped).toHaveBeenCalledWith({ project: 'demo', pid: info.pid, forced: false });
    });

    it('escalates to SIGKILL when SIGTERM is ignored', async () => {
      const command = "trap '' TERM; sleep 300";
      const info = await supervisor.start(project(command));

      const result = await supervisor.stop(project(command));

      expect(result).toEqual({ pid: info.pid, forced: true });
      await vi.waitFor(() => expect(system.isProcessAlive(info.pid)).toBe(false), { timeout: 5000 });
    });

    it('runs the down command after stopping', async () => {
      const withDown = project('sleep 300', { downCommand: 'echo down > down.txt' });
      await supervisor.start(withDown);

      await supervisor.stop(withDown);

      expect(fs.readFileSync(path.join(workDir, 'down.txt'), 'utf-8')).toBe('down\n');
    });

    it('throws ProcessNotRunningError when nothing runs', async () => {
      await expect(supervisor.stop(project('sleep 300'))).rejects.toBeInstanceOf(ProcessNotRunningError);
    });
  });

  describe('startAll', () => {
    it('summarises every project with an up command', async () => {
      const projects = [
        project('sleep 300', { name: 'api' }),
        project(undefined, { name: 'docs' }),
        project('sleep 300', { name: 'broken', workDir: path.join(workDir, 'missing') }),
      ];

      const first = await supervisor.startAll(projects);
      const second = await supervisor.startAll(projects);

      expect(first.map((entry) => [entry.project, entry.status])).toEqual([
        ['api', 'started'],
        ['broken', 'failed'],
      ]);
      expect(second[0]).toEqual({
        project: 'api',
        status: 'already-running',
        pid: supervisor.get('api')?.pid,
      });
    });
  });

  it('dispose stops everything', async () => {
    await supervisor.start(project('sleep 300', { name: 'one' }));
    await supervisor.start(project('sleep 300', { name: 'two' }));

    await supervisor.dispose();

    expect(supervisor.list()).toEqual([]);
  });
});
