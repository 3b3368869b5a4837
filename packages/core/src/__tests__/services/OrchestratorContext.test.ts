/**
 * OrchestratorContext integration tests
 *
 * Full job lifecycle against a temporary git remote and the fake agent.
 */

import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import * as fs from 'node:fs';
import * as path from 'node:path';
import { OrchestratorContext } from '../../services/OrchestratorContext';
import { InMemoryConfigAdapter } from '../../adapters/ConfigAdapter';
import { NodeSystemAdapter } from '../../adapters/NodeSystemAdapter';
import type { CommandResult, RunOptions, SystemAdapter } from '../../adapters/SystemAdapter';
import { createNullLogger } from '../../services/Logger';
import { ProjectNotFoundError, ValidationError } from '../../errors';
import type { OrchestratorConfigInput, Project } from '../../types/schemas';
import { delay } from '../../utils/timeout';
import { fakeAgentConfig } from '../fixtures/agent';
import { createTestRemote, localBranches, type TestRemote } from '../fixtures/gitRepo';

/**
 * Real system whose `git clone` sits for a few seconds before it starts,
 * ignoring cancellation while it waits
 */
class SlowCloneSystem extends NodeSystemAdapter {
  async run(file: string, args: string[], options: RunOptions): Promise<CommandResult> {
    if (file === 'git' && args[0] === 'clone') {
      await delay(3000);
    }
    return super.run(file, args, options);
  }
}

describe('OrchestratorContext', () => {
  let remote: TestRemote;
  let project: Project;
  let orchestrator: OrchestratorContext;

  function createOrchestrator(
    overrides: Partial<Project> = {},
    config: OrchestratorConfigInput = {},
    system?: SystemAdapter
  ): OrchestratorContext {
    project = remote.project('demo', overrides);
    return new OrchestratorContext({
      config: new InMemoryConfigAdapter(
        fakeAgentConfig({ scratchRoot: remote.scratchRoot, projects: [project], ...config })
      ),
      system,
      logger: createNullLogger(),
    });
  }

  beforeEach(async () => {
    remote = createTestRemote('orchestrator-test-');
    orchestrator = createOrchestrator();
    await orchestrator.init();
  });

  afterEach(async () => {
    await orchestrator.dispose();
    remote.cleanup();
  });

  describe('init', () => {
    it('clears output files and workspaces left by a previous run', async () => {
      const leftover = path.join(remote.scratchRoot, 'outputs', 'old00000.md');
      const stale = path.join(remote.scratchRoot, 'worktrees', 'demo', 'old-workspace');
      fs.writeFileSync(leftover, 'stale');
      fs.mkdirSync(stale, { recursive: true });

      await orchestrator.init();

      expect(fs.existsSync(leftover)).toBe(false);
      expect(fs.existsSync(stale)).toBe(false);
    });
  });

  describe('submit', () => {
    it('rejects malformed requests', () => {
      expect(() => orchestrator.submit({ project: 'demo', command: 'feat', argument: '   ' })).toThrow(
        ValidationError
      );
    });

    it('rejects unknown projects', () => {
      expect(() => orchestrator.submit({ project: 'nope', command: 'ask', argument: 'hi' })).toThrow(
        ProjectNotFoundError
      );
    });

    it('announces finished jobs on the event bus', async () => {
      const finished = vi.fn();
      orchestrator.eventBus.on('job:finished', finished);

      const { id } = orchestrator.submit({ project: 'demo', command: 'ask', argument: 'hello' });
      await orchestrator.waitForResult(id);

      expect(finished).toHaveBeenCalledWith({
        result: { id, project: 'demo', command: 'ask', state: 'completed', error: undefined },
        summaryPath: path.join(remote.scratchRoot, 'outputs', `${id}.md`),
      });
    });
  });

  describe('results', () => {
    it('hands out the summary once and deletes the file', async () => {
      const { id } = orchestrator.submit({ project: 'demo', command: 'ask', argument: 'what is here?' });

      const result = await orchestrator.waitForResult(id);

      expect(result).toMatchObject({ id, project: 'demo', command: 'ask', state: 'completed' });
      expect(result.summaryText).toMatch(
        new RegExp(`^Agent summary for job ${id}\\ncwd: .*neutral\\n\\n\\nExecution time: \\d+\\.\\d{2} minutes$`)
      );
      expect(fs.existsSync(path.join(remote.scratchRoot, 'outputs', `${id}.md`))).toBe(false);
      expect(orchestrator.takeResult(id)).toMatchObject({ state: 'completed', summaryText: undefined });
    });

    it('returns null from takeResult while the job runs', async () => {
      const { id } = orchestrator.submit({ project: 'demo', command: 'ask', argument: '[hang] think' });

      expect(orchestrator.takeResult(id)).toBeNull();

      orchestrator.cancel(id);
      await orchestrator.waitForResult(id);
    });
  });

  describe('branch lifecycle', () => {
    it('continues a feat branch with feedback, resuming the agent session', async () => {
      const feat = orchestrator.submit({ project: 'demo', command: 'feat', argument: '[commit] add a file' });
      expect((await orchestrator.waitForResult(feat.id)).state).toBe('completed');

      const feedback = orchestrator.submit({
        project: 'demo',
        command: 'feedback',
        argument: '[args] [commit] rename it',
      });
      const result = await orchestrator.waitForResult(feedback.id);

      expect(result.state).toBe('completed');
      expect(orchestrator.getJob(feedback.id)?.workspace?.branch).toBe(`feat-${feat.id}`);
      expect(result.summaryText?.split('\n').slice(0, 2)).toEqual(['--resume', 'sess-123']);
      expect(localBranches(project.workDir).sort()).toEqual([`feat-${feat.id}`, 'main']);
    });

    it('fails feedback without a session and creates no workspace', async () => {
      const { id } = orchestrator.submit({ project: 'demo', command: 'feedback', argument: 'more please' });

      const result = await orchestrator.waitForResult(id);

      expect(result.state).toBe('failed');
      expect(result.error?.code).toBe('NO_ACTIVE_SESSION');
      expect(orchestrator.getJob(id)?.workspace).toBeNull();
    });

    it('deletes the branch of a job that committed nothing', async () => {
      const { id } = orchestrator.submit({ project: 'demo', command: 'fix', argument: 'look around' });

      expect((await orchestrator.waitForResult(id)).state).toBe('completed');
      expect(localBranches(project.workDir)).toEqual(['main']);
    });

    it('runs concurrent jobs in separate workspaces on separate branches', async () => {
      const handles = [1, 2, 3].map((n) =>
        orchestrator.submit({ project: 'demo', command: 'feat', argument: `[commit] change ${n}` })
      );

      const results = await Promise.all(handles.map(({ id }) => orchestrator.waitForResult(id)));

      expect(results.map((result) => result.state)).toEqual(['completed', 'completed', 'completed']);
      const paths = handles.map(({ id }) => orchestrator.getJob(id)?.workspace?.path);
      expect(new Set(paths).size).toBe(3);
      expect(localBranches(project.workDir).sort()).toEqual(
        [...handles.map(({ id }) => `feat-${id}`), 'main'].sort()
      );
    });
  });

  describe('cancellation', () => {
    it('cancels every active job of a project', async () => {
      const first = orchestrator.submit({ project: 'demo', command: 'ask', argument: '[hang] one' });
      const second = orchestrator.submit({ project: 'demo', command: 'ask', argument: '[hang] two' });

      expect(orchestrator.cancelProject('demo').sort()).toEqual([first.id, second.id].sort());

      const results = await Promise.all([first, second].map(({ id }) => orchestrator.waitForResult(id)));
      expect(results.map((result) => result.state)).toEqual(['cancelled', 'cancelled']);
      expect(results[0]?.error?.code).toBe('CANCELLED');
      expect(orchestrator.cancelProject('demo')).toEqual([]);
    });

    it('releases the workspaces of cancelled and timed-out branch jobs', async () => {
      await orchestrator.dispose();
      orchestrator = createOrchestrator({}, { jobTimeoutMs: 2000 });
      await orchestrator.init();

      const cancelled = orchestrator.submit({ project: 'demo', command: 'feat', argument: '[hang] wait for cancel' });
      const timedOut = orchestrator.submit({ project: 'demo', command: 'feat', argument: '[hang] run past the limit' });
      await vi.waitFor(() => expect(orchestrator.getJob(cancelled.id)?.state).toBe('running'), { timeout: 10000 });
      expect(orchestrator.cancel(cancelled.id)).toBe(true);

      const results = await Promise.all([cancelled, timedOut].map(({ id }) => orchestrator.waitForResult(id)));

      expect(results.map((result) => result.state)).toEqual(['cancelled', 'timed-out']);
      expect(results.map((result) => result.error?.code)).toEqual(['CANCELLED', 'TIMEOUT_EXCEEDED']);
      expect(fs.readdirSync(orchestrator.worktrees.getProjectBase('demo'))).toEqual([]);
      expect(localBranches(project.workDir)).toEqual(['main']);
    });

    it('cancels a job while its canonical clone is still being created', async () => {
      await orchestrator.dispose();
      orchestrator = createOrchestrator({}, {}, new SlowCloneSystem());
      await orchestrator.init();

      const { id } = orchestrator.submit({ project: 'demo', command: 'feat', argument: 'add a file' });
      await delay(100);
      const cancelledAt = Date.now();
      expect(orchestrator.cancel(id)).toBe(true);
      const result = await orchestrator.waitForResult(id);

      expect(Date.now() - cancelledAt).toBeLessThan(1000);
      expect(result.state).toBe('cancelled');
      expect(result.error?.code).toBe('CANCELLED');
      expect(orchestrator.getJob(id)?.workspace).toBeNull();

      // The abandoned clone is aborted once it starts and leaves nothing behind
      await orchestrator.dispose();
      expect(fs.existsSync(project.workDir)).toBe(false);
    });
  });

  describe('auxiliary processes', () => {
    it('starts the up command after a successful init job', async () => {
      await orchestrator.dispose();
      orchestrator = createOrchestrator({ upCommand: 'sleep 300' });
      await orchestrator.init();

      const { id } = orchestrator.submit({ project: 'demo', command: 'init', argument: 'set up the project' });
      expect((await orchestrator.waitForResult(id)).state).toBe('completed');

      expect(orchestrator.processes.isRunning('demo')).toBe(true);
      expect(orchestrator.formatStatus()).toMatch(/^Running background processes:\n {2}- demo \(PID: \d+, up 0\.0m\)$/);
    });

    it('rejects process commands for unknown projects', () => {
      expect(() => orchestrator.tailLog('nope')).toThrow(ProjectNotFoundError);
    });
  });

  describe('dispose', () => {
    it('cancels running jobs and refuses new ones', async () => {
      const { id } = orchestrator.submit({ project: 'demo', command: 'ask', argument: '[hang] forever' });

      await orchestrator.dispose();

      expect(orchestrator.getJob(id)?.state).toBe('cancelled');
      expect(() => orchestrator.submit({ project: 'demo', command: 'ask', argument: 'late' })).toThrow(
        ValidationError
      );
    });
  });
});
