/**
 * ExecutionEngine tests
 *
 * Runs the fake agent script as a real child process.
 */

import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import * as fs from 'node:fs';
import * as os from 'node:os';
import * as path from 'node:path';
import {
  ExecutionEngine,
  buildPrompt,
  composeRules,
  parseAgentSessionId,
} from '../../managers/ExecutionEngine';
import { JobRegistry } from '../../managers/JobRegistry';
import { SessionStore } from '../../managers/SessionStore';
import { WorktreeManager } from '../../managers/WorktreeManager';
import { InMemoryConfigAdapter } from '../../adapters/ConfigAdapter';
import { NodeSystemAdapter } from '../../adapters/NodeSystemAdapter';
import { GitService } from '../../services/GitService';
import {
  AgentExecutionError,
  AgentSpawnError,
  CancellationError,
  MissingOutputError,
  TimeoutExceededError,
} from '../../errors';
import { RulesSchema, type OrchestratorConfigInput, type Project } from '../../types/schemas';
import type { CommandKind } from '../../types/commands';
import type { Job, SessionLink } from '../../types/job';
import { fakeAgentConfig, readAgentPids } from '../fixtures/agent';
import { createTestRemote } from '../fixtures/gitRepo';

const system = new NodeSystemAdapter();

const project: Project = {
  name: 'demo',
  repoUrl: 'git@example.com:demo.git',
  workDir: '/srv/demo',
  defaultBranch: 'main',
};

describe('ExecutionEngine', () => {
  let scratchRoot: string;
  let sessions: SessionStore;
  let registry: JobRegistry;
  let engine: ExecutionEngine;

  function createEngine(overrides: OrchestratorConfigInput = {}): ExecutionEngine {
    const config = new InMemoryConfigAdapter(fakeAgentConfig({ scratchRoot, ...overrides }));
    registry = new JobRegistry(config);
    return new ExecutionEngine(system, config, new GitService(system, 30_000), sessions);
  }

  function newJob(argument: string, command: CommandKind = 'ask'): Job {
    return registry.create({ project: 'demo', command, argument });
  }

  function run(job: Job, timeoutMs = 20_000, signal = new AbortController().signal) {
    return engine.run(job, null, '', timeoutMs, { project, signal });
  }

  async function expectGone(pids: number[]): Promise<void> {
    await vi.waitFor(() => {
      expect(pids.filter((pid) => system.isProcessAlive(pid))).toEqual([]);
    }, { timeout: 5000 });
  }

  beforeEach(() => {
    scratchRoot = fs.mkdtempSync(path.join(os.tmpdir(), 'execution-engine-test-'));
    sessions = new SessionStore();
    engine = createEngine();
  });

  afterEach(() => {
    fs.rmSync(scratchRoot, { recursive: true, force: true });
  });

  describe('completed runs', () => {
    it('reports the output file with the execution time appended', async () => {
      const job = newJob('what does main do?');

      const outcome = await run(job);

      expect(outcome.state).toBe('completed');
      expect(outcome.summaryPath).toBe(path.join(scratchRoot, 'outputs', `${job.id}.md`));
      expect(outcome.agentSessionId).toBe('sess-123');
      const text = fs.readFileSync(outcome.summaryPath ?? '', 'utf-8');
      expect(text).toMatch(
        new RegExp(`^Agent summary for job ${job.id}\\ncwd: .*\\n\\n\\nExecution time: \\d+\\.\\d{2} minutes$`)
      );
    });

    it('runs jobs without a workspace in the neutral directory', async () => {
      const outcome = await run(newJob('where am I?'));

      const text = fs.readFileSync(outcome.summaryPath ?? '', 'utf-8');
      expect(text).toContain(`cwd: ${path.join(scratchRoot, 'neutral')}\n`);
    });

    it('passes rules, the resumed session and the prompt to the agent', async () => {
      const job = newJob('[args] show me');
      const session: SessionLink = {
        project: 'demo',
        jobId: 'prev0001',
        command: 'feat',
        branchName: 'feat-prev0001',
        agentSessionId: 'sess-9',
        recordedAt: new Date(),
      };

      const outcome = await engine.run(job, null, 'Be brief.', 20_000, {
        project,
        signal: new AbortController().signal,
        session,
      });

      const outputFile = path.join(scratchRoot, 'outputs', `${job.id}.md`);
      const prompt = buildPrompt(project, path.join(scratchRoot, 'neutral'), 'ask', '[args] show me', outputFile);
      const [args] = fs.readFileSync(outcome.summaryPath ?? '', 'utf-8').split('\n\n\nExecution time:');
      expect(args).toBe(['--append-system-prompt', 'Be brief.', '--resume', 'sess-9', prompt].join('\n'));
    });
  });

  describe('failed runs', () => {
    it('fails with MissingOutputError when the agent exits 0 without output', async () => {
      const job = newJob('[no-output] nothing to say');

      const outcome = await run(job);

      expect(outcome.state).toBe('failed');
      expect(outcome.exitCode).toBe(0);
      expect(outcome.error).toBeInstanceOf(MissingOutputError);
    });

    it('fails with AgentExecutionError carrying the output tail', async () => {
      const outcome = await run(newJob('[fail] break things'));

      expect(outcome.state).toBe('failed');
      expect(outcome.exitCode).toBe(3);
      expect(outcome.error).toBeInstanceOf(AgentExecutionError);
      if (outcome.error instanceof AgentExecutionError) {
        expect(outcome.error.outputTail).toBe('agent crashed while working\npartial stdout');
      }
    });

    it('fails with AgentSpawnError when the agent command does not exist', async () => {
      engine = createEngine({ agentCommand: path.join(scratchRoot, 'no-such-agent'), agentArgs: [] });

      const outcome = await run(newJob('anything'));

      expect(outcome.state).toBe('failed');
      expect(outcome.error).toBeInstanceOf(AgentSpawnError);
    });
  });

  describe('termination', () => {
    it('times out and kills the whole process group', async () => {
      const job = newJob('[hang] think forever');

      const outcome = await run(job, 500);

      expect(outcome.state).toBe('timed-out');
      expect(outcome.error).toBeInstanceOf(TimeoutExceededError);
      const pids = readAgentPids(engine.outputPathFor(job.id));
      expect(pids).not.toBeNull();
      await expectGone(pids ?? []);
    });

    it('escalates to SIGKILL when the agent ignores SIGTERM', async () => {
      const job = newJob('[stubborn] refuse to stop');

      const outcome = await run(job, 300);

      expect(outcome.state).toBe('timed-out');
      expect(outcome.durationMs).toBeGreaterThanOrEqual(500);
      await expectGone(readAgentPids(engine.outputPathFor(job.id)) ?? []);
    });

    it('cancels a running agent through the abort signal', async () => {
      const job = newJob('[hang] wait for cancel');
      const controller = new AbortController();

      const pending = run(job, 20_000, controller.signal);
      await vi.waitFor(() => {
        expect(readAgentPids(engine.outputPathFor(job.id))).not.toBeNull();
      }, { timeout: 5000 });
      controller.abort();
      const outcome = await pending;

      expect(outcome.state).toBe('cancelled');
      expect(outcome.error).toBeInstanceOf(CancellationError);
      expect(fs.existsSync(engine.outputPathFor(job.id))).toBe(false);
      await expectGone(readAgentPids(engine.outputPathFor(job.id)) ?? []);
    });

    it('does not start the agent when already cancelled', async () => {
      const controller = new AbortController();
      controller.abort();

      const outcome = await run(newJob('[args] never runs'), 20_000, controller.signal);

      expect(outcome).toMatchObject({ state: 'cancelled', durationMs: 0 });
      expect(fs.existsSync(path.join(scratchRoot, 'outputs'))).toBe(false);
    });
  });

  describe('branch bookkeeping', () => {
    it('records a session for a completed job with commits, and discards empty branches', async () => {
      const remote = createTestRemote('execution-engine-git-');
      try {
        const config = new InMemoryConfigAdapter({ scratchRoot });
        const worktrees = new WorktreeManager(system, config, new GitService(system, 30_000));
        const gitProject = remote.project();

        const withCommit = newJob('[commit] add a file', 'feat');
        const first = await worktrees.acquire(gitProject, { kind: 'new-branch', prefix: 'feat', suffix: withCommit.id });
        if (!first) throw new Error('expected a workspace');
        const completed = await engine.run(withCommit, first, '', 20_000, {
          project: gitProject,
          signal: new AbortController().signal,
        });

        expect(completed.state).toBe('completed');
        expect(first.discardBranch).toBe(false);
        expect(sessions.latest('demo')).toMatchObject({
          jobId: withCommit.id,
          command: 'feat',
          branchName: `feat-${withCommit.id}`,
          agentSessionId: 'sess-123',
        });

        const empty = newJob('look but do not touch', 'feat');
        const second = await worktrees.acquire(gitProject, { kind: 'new-branch', prefix: 'feat', suffix: empty.id });
        if (!second) throw new Error('expected a workspace');
        await engine.run(empty, second, '', 20_000, { project: gitProject, signal: new AbortController().signal });

        expect(second.discardBranch).toBe(true);
        expect(sessions.latest('demo')?.jobId).toBe(withCommit.id);
      } finally {
        remote.cleanup();
      }
    });
  });
});

describe('composeRules', () => {
  it('puts the general rules before the command rules', () => {
    const rules = RulesSchema.parse({ general: 'Be careful.', feat: 'Write tests.' });
    expect(composeRules(rules, 'feat')).toBe('Be careful.\n\nWrite tests.');
  });

  it('skips empty parts', () => {
    const rules = RulesSchema.parse({ ask: 'Answer briefly.' });
    expect(composeRules(rules, 'ask')).toBe('Answer briefly.');
    expect(composeRules(rules, 'fix')).toBe('');
  });
});

describe('buildPrompt', () => {
  it('labels questions as Query and work as Task', () => {
    expect(buildPrompt(project, '/scratch/neutral', 'ask', 'why?', '/scratch/outputs/1.md')).toBe(
      [
        'Project: demo',
        'Repository: git@example.com:demo.git',
        'Working Directory: /scratch/neutral',
        '',
        'Query: why?',
        '',
        'Write the output in /scratch/outputs/1.md',
      ].join('\n')
    );
    expect(buildPrompt(project, '/ws', 'fix', 'the bug', '/o.md')).toContain('\nTask: the bug\n');
  });
});

describe('parseAgentSessionId', () => {
  it('reads session_id from JSON lines', () => {
    expect(parseAgentSessionId('{"type":"result","session_id":"sess-1"}')).toBe('sess-1');
  });

  it('ignores other lines', () => {
    expect(parseAgentSessionId('plain text')).toBeUndefined();
    expect(parseAgentSessionId('{not json')).toBeUndefined();
    expect(parseAgentSessionId('{"type":"result"}')).toBeUndefined();
  });
});
