/**
 * CLI entry point using Commander.js
 */

import { Command, CommanderError } from 'commander';
import chalk from 'chalk';
import * as path from 'node:path';
import * as readline from 'node:readline';
import {
  OrchestratorContext,
  createLogger,
  isCommandKind,
  isTaskdockError,
  COMMAND_KINDS,
  type ConfigAdapter,
  type EventHandler,
  type ILogger,
} from '@taskdock/core';
import { FileConfigAdapter } from './adapters/FileConfigAdapter.js';
import { ShellSession, formatResult } from './services/ShellSession.js';

export interface CliOutput {
  log(text: string): void;
  error(text: string): void;
}

export interface CliOptions {
  output?: CliOutput;
  /** Directory searched for .taskdock/config.json */
  cwd?: string;
  /** Shell input; stdin when omitted */
  input?: NodeJS.ReadableStream;
  /** Replaces the file logger (tests pass a silent one) */
  logger?: ILogger;
  /** Dispose and exit on SIGINT/SIGTERM */
  handleSignals?: boolean;
}

const consoleOutput: CliOutput = {
  log: (text) => console.log(text),
  error: (text) => console.error(text),
};

/**
 * Build a fresh program. Each invocation gets its own so option values
 * never leak between runs.
 */
export function createProgram(options: CliOptions = {}): Command {
  const output = options.output ?? consoleOutput;
  const cwd = options.cwd ?? process.cwd();
  const program: Command = new Command();

  program
    .name('taskdock')
    .description('Run coding-agent jobs against git projects in isolated worktrees')
    .version('0.1.0')
    .option('-c, --config <path>', 'config file (default: .taskdock/config.json, then ~/.config/taskdock/config.json)')
    .exitOverride() // Throw instead of process.exit() - enables testing
    .configureOutput({
      writeOut: (str) => output.log(str.trimEnd()),
      writeErr: (str) => output.error(str.trimEnd()),
    });

  function loadConfig(): ConfigAdapter {
    return new FileConfigAdapter({ configPath: program.opts<{ config?: string }>().config, cwd });
  }

  function openOrchestrator(handleSignals: boolean): OrchestratorContext {
    const config = loadConfig();
    const logger =
      options.logger ??
      createLogger({
        level: config.get('logLevel'),
        file: config.get('logFile') ?? path.join(config.get('scratchRoot'), 'taskdock.log'),
      });
    return new OrchestratorContext({ config, logger, handleSignals });
  }

  /**
   * Turn taskdock errors into a non-zero exit with their message
   */
  async function guarded<T>(action: () => Promise<T>): Promise<T> {
    try {
      return await action();
    } catch (error) {
      if (!isTaskdockError(error)) {
        throw error;
      }
      program.error(chalk.red(error.message), { exitCode: 1, code: error.code });
    }
  }

  program
    .command('run')
    .description('Submit one job, wait for it and print the result')
    .argument('<project>', 'configured project name')
    .argument('<command>', `one of ${COMMAND_KINDS.join(', ')}`)
    .argument('<text...>', 'question or task for the agent')
    .option('-s, --session <jobId>', 'job whose session a feedback job continues')
    .action(async (project: string, command: string, text: string[], opts: { session?: string }) => {
      if (!isCommandKind(command)) {
        program.error(chalk.red(`Unknown command '${command}'. Use one of: ${COMMAND_KINDS.join(', ')}`), {
          exitCode: 1,
        });
      }

      const result = await guarded(async () => {
        const orchestrator = openOrchestrator(options.handleSignals ?? false);
        try {
          await orchestrator.init();
          const { id } = orchestrator.submit({ project, command, argument: text.join(' '), sessionRef: opts.session });
          output.log(chalk.blue(`Job ${id} started: ${project} /${command}`));
          return await orchestrator.waitForResult(id);
        } finally {
          await orchestrator.dispose();
        }
      });

      output.log(formatResult(result));
      if (result.state !== 'completed') {
        program.error(chalk.red(`Job ${result.id} ${result.state}`), { exitCode: 1 });
      }
    });

  program
    .command('projects')
    .description('List configured projects')
    .action(async () => {
      const projects = await guarded(async () => loadConfig().listProjects());
      if (projects.length === 0) {
        output.log(chalk.yellow('No projects configured.'));
        return;
      }
      for (const project of projects) {
        output.log(`${chalk.bold(project.name)} ${project.repoUrl}`);
        output.log(`  ${chalk.dim('workDir:')} ${project.workDir}`);
        if (project.upCommand) {
          output.log(`  ${chalk.dim('up:')} ${project.upCommand}`);
        }
      }
    });

  program
    .command('up')
    .description("Start a project's up command and keep it running until interrupted")
    .argument('<project>', 'configured project name')
    .action(async (projectName: string) => {
      await guarded(async () => {
        const orchestrator = openOrchestrator(false);
        try {
          const info = await orchestrator.startProcess(projectName);
          output.log(chalk.green(`Started ${projectName} (PID: ${info.pid}). Press Ctrl+C to stop.`));

          output.log(await waitUntilStopped(orchestrator, projectName));
          const lines = orchestrator.tailLog(projectName);
          if (lines.length > 0) {
            output.log(chalk.dim('Last output:'));
            output.log(lines.join('\n'));
          }
        } finally {
          await orchestrator.dispose();
        }
      });
    });

  program
    .command('shell')
    .description('Interactive slash-command shell (/help lists commands)')
    .action(async () => {
      await guarded(async () => {
        const orchestrator = openOrchestrator(false);
        const session = new ShellSession(orchestrator, (text) => output.log(text));
        const rl = readline.createInterface({
          input: options.input ?? process.stdin,
          terminal: false,
        });
        const onSignal = (): void => rl.close();
        process.once('SIGINT', onSignal);

        try {
          await orchestrator.init();
          output.log(chalk.dim(`${orchestrator.listProjects().length} project(s) loaded. /help lists commands.`));
          for await (const line of rl) {
            if (!(await session.handle(line))) {
              break;
            }
          }
        } finally {
          process.removeListener('SIGINT', onSignal);
          rl.close();
          session.close();
          await orchestrator.dispose();
        }
      });
    });

  return program;
}

/**
 * Resolve once the project's process exits or the user interrupts
 */
function waitUntilStopped(orchestrator: OrchestratorContext, projectName: string): Promise<string> {
  return new Promise((resolve) => {
    const finish = (reason: string): void => {
      orchestrator.eventBus.off('process:exited', onExited);
      process.removeListener('SIGINT', onSignal);
      process.removeListener('SIGTERM', onSignal);
      resolve(reason);
    };
    const onExited: EventHandler<'process:exited'> = ({ project, exitCode, signal }) => {
      if (project === projectName) {
        finish(`${projectName} exited (${signal ?? `code ${exitCode ?? 'unknown'}`})`);
      }
    };
    const onSignal = (signal: NodeJS.Signals): void => finish(`Received ${signal}, stopping ${projectName}`);

    orchestrator.eventBus.on('process:exited', onExited);
    process.once('SIGINT', onSignal);
    process.once('SIGTERM', onSignal);
    if (!orchestrator.processes.isRunning(projectName)) {
      finish(`${projectName} exited`);
    }
  });
}

export function run(argv: string[] = process.argv): Promise<void> {
  return createProgram({ handleSignals: true })
    .parseAsync(argv)
    .then(
      () => undefined,
      (error: unknown) => {
        process.exitCode = error instanceof CommanderError ? error.exitCode : 1;
        if (!(error instanceof CommanderError)) {
          console.error(error);
        }
      }
    );
}

export interface CliResult {
  stdout: string;
  stderr: string;
  exitCode: number;
}

/**
 * Run CLI command programmatically (for testing).
 * Captures output and returns result instead of writing to console.
 */
export async function runCommand(
  args: string[],
  options: Omit<CliOptions, 'output' | 'handleSignals'> = {}
): Promise<CliResult> {
  const stdout: string[] = [];
  const stderr: string[] = [];
  const program = createProgram({
    ...options,
    output: { log: (text) => stdout.push(text), error: (text) => stderr.push(text) },
  });

  let exitCode = 0;
  try {
    await program.parseAsync(['node', 'taskdock', ...args]);
  } catch (error) {
    if (!(error instanceof CommanderError)) {
      throw error;
    }
    exitCode = error.exitCode;
  }

  return {
    stdout: stdout.join('\n'),
    stderr: stderr.join('\n'),
    exitCode,
  };
}
