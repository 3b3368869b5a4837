/**
 * Test fixture utilities for CLI tests
 *
 * Creates a temp directory holding a bare git remote, a stand-in agent
 * script and a .taskdock/config.json pointing at both.
 */

import * as fs from 'node:fs';
import * as os from 'node:os';
import * as path from 'node:path';
import { execFileSync } from 'node:child_process';

export interface TestRepo {
  /** Temp directory; also the cwd the CLI searches for .taskdock/config.json */
  path: string;
  /** Bare repository used as the project's repoUrl */
  remoteUrl: string;
  configPath: string;
  cleanup: () => void;
}

/**
 * Agent stand-in. `[fail]` in the prompt makes it exit 2, `[sleep]`
 * keeps it busy until it is killed.
 */
const AGENT_SCRIPT = `#!/usr/bin/env bash
args="$*"
if [[ "$args" == *"[fail]"* ]]; then
  echo "could not finish" >&2
  exit 2
fi
if [[ "$args" == *"[sleep]"* ]]; then
  sleep 300
fi
echo "answered by test agent" > "$TASKDOCK_OUTPUT_FILE"
`;

function git(cwd: string, ...args: string[]): string {
  return execFileSync('git', args, { cwd, encoding: 'utf-8' }).trim();
}

/**
 * Create a temp workspace with config. `config` is merged over the
 * defaults; `project` over the single `demo` project.
 */
export function createTestRepoWithConfig(
  prefix = 'taskdock-cli-test-',
  config: Record<string, unknown> = {},
  project: Record<string, unknown> = {}
): TestRepo {
  const tempDir = fs.mkdtempSync(path.join(os.tmpdir(), prefix));
  const seed = path.join(tempDir, 'seed');
  const remoteUrl = path.join(tempDir, 'remote.git');

  fs.mkdirSync(seed);
  git(seed, 'init', '--quiet');
  git(seed, 'config', 'user.email', 'test@example.com');
  git(seed, 'config', 'user.name', 'Test User');
  fs.writeFileSync(path.join(seed, 'README.md'), '# Test Repo\n');
  git(seed, 'add', '-A');
  git(seed, 'commit', '--quiet', '-m', 'Initial commit');
  git(seed, 'branch', '-M', 'main');
  git(tempDir, 'clone', '--quiet', '--bare', seed, remoteUrl);

  const agentScript = path.join(tempDir, 'agent.sh');
  fs.writeFileSync(agentScript, AGENT_SCRIPT);

  const configDir = path.join(tempDir, '.taskdock');
  fs.mkdirSync(configDir);
  const configPath = path.join(configDir, 'config.json');
  fs.writeFileSync(
    configPath,
    JSON.stringify(
      {
        scratchRoot: '../scratch',
        agentCommand: 'bash',
        agentArgs: [agentScript],
        killGracePeriodMs: 300,
        processStopGraceMs: 300,
        projects: [{ name: 'demo', repoUrl: remoteUrl, workDir: '../clones/demo', ...project }],
        ...config,
      },
      null,
      2
    )
  );

  return {
    path: tempDir,
    remoteUrl,
    configPath,
    cleanup: () => fs.rmSync(tempDir, { recursive: true, force: true }),
  };
}
