/**
 * ShellSession - slash-command loop over an orchestrator
 *
 * Accepts the same commands a chat adapter would forward:
 *   /ask /feat /fix /plan /feedback /init <project> <text>
 *   /cancel [project] [id]
 *   /status
 *   /up /stop <project>
 *   /log <project> [n]
 *   /startall
 *   /help /quit
 *
 * Results are printed when the job finishes, not when it is submitted.
 */

import chalk from 'chalk';
import {
  COMMAND_KINDS,
  ValidationError,
  isCommandKind,
  isTaskdockError,
  type CommandKind,
  type EventHandler,
  type JobResult,
  type OrchestratorContext,
  type StartAllEntry,
} from '@taskdock/core';

export type ShellCommand =
  | { kind: 'empty' }
  | { kind: 'job'; command: CommandKind; project: string; argument: string }
  | { kind: 'cancel'; project?: string; jobId?: string }
  | { kind: 'status' }
  | { kind: 'up'; project: string }
  | { kind: 'stop'; project: string }
  | { kind: 'log'; project: string; lines?: number }
  | { kind: 'startall' }
  | { kind: 'help' }
  | { kind: 'quit' };

export const SHELL_HELP = [
  'Commands:',
  ...COMMAND_KINDS.map((kind) => `  /${kind} <project> <text>`),
  '  /cancel [project] [id]',
  '  /status',
  '  /up <project>',
  '  /stop <project>',
  '  /log <project> [n]',
  '  /startall',
  '  /help',
  '  /quit',
].join('\n');

/**
 * Parse one input line.
 * @throws ValidationError for unknown commands or missing arguments
 */
export function parseShellCommand(line: string): ShellCommand {
  const trimmed = line.trim();
  if (trimmed === '') {
    return { kind: 'empty' };
  }
  if (!trimmed.startsWith('/')) {
    throw new ValidationError('command', 'commands start with "/", try /help');
  }

  const [head = '', ...rest] = trimmed.slice(1).split(/\s+/);
  const name = head.toLowerCase();
  const [first, second] = rest;

  if (isCommandKind(name)) {
    const argument = rest.slice(1).join(' ');
    if (!first || !argument) {
      throw new ValidationError('command', `usage: /${name} <project> <text>`);
    }
    return { kind: 'job', command: name, project: first, argument };
  }

  switch (name) {
    case 'cancel':
      return { kind: 'cancel', project: first, jobId: second };
    case 'status':
      return { kind: 'status' };
    case 'up':
      return { kind: 'up', project: requireArgument(first, '/up <project>') };
    case 'stop':
      return { kind: 'stop', project: requireArgument(first, '/stop <project>') };
    case 'log': {
      const project = requireArgument(first, '/log <project> [n]');
      if (second === undefined) {
        return { kind: 'log', project };
      }
      const lines = Number(second);
      if (!Number.isInteger(lines) || lines < 1) {
        throw new ValidationError('command', `line count must be a positive integer, got '${second}'`);
      }
      return { kind: 'log', project, lines };
    }
    case 'startall':
      return { kind: 'startall' };
    case 'help':
      return { kind: 'help' };
    case 'quit':
    case 'exit':
      return { kind: 'quit' };
    default:
      throw new ValidationError('command', `unknown command '/${name}', try /help`);
  }
}

function requireArgument(value: string | undefined, usage: string): string {
  if (!value) {
    throw new ValidationError('command', `usage: ${usage}`);
  }
  return value;
}

/**
 * Render a finished job for the terminal
 */
export function formatResult(result: JobResult): string {
  const header = `[${result.id}] ${result.project} /${result.command}`;
  if (result.state === 'completed') {
    return `${chalk.green(`${header} completed`)}\n${result.summaryText ?? ''}`.trimEnd();
  }
  const reason = result.error ? `: ${result.error.message}` : '';
  return chalk.red(`${header} ${result.state}${reason}`);
}

export class ShellSession {
  private orchestrator: OrchestratorContext;
  private print: (text: string) => void;
  private readonly onFinished: EventHandler<'job:finished'>;

  constructor(orchestrator: OrchestratorContext, print: (text: string) => void) {
    this.orchestrator = orchestrator;
    this.print = print;
    this.onFinished = ({ result }) => {
      const finished = this.orchestrator.takeResult(result.id);
      if (finished) {
        this.print(formatResult(finished));
      }
    };
    this.orchestrator.eventBus.on('job:finished', this.onFinished);
  }

  /**
   * Run one input line.
   * @returns false once the user asked to quit
   */
  async handle(line: string): Promise<boolean> {
    try {
      return await this.execute(parseShellCommand(line));
    } catch (error) {
      if (!isTaskdockError(error)) {
        throw error;
      }
      this.print(chalk.red(`Error: ${error.message}`));
      return true;
    }
  }

  close(): void {
    this.orchestrator.eventBus.off('job:finished', this.onFinished);
  }

  private async execute(command: ShellCommand): Promise<boolean> {
    switch (command.kind) {
      case 'empty':
        return true;
      case 'quit':
        return false;
      case 'help':
        this.print(SHELL_HELP);
        return true;
      case 'job': {
        const { id } = this.orchestrator.submit({
          project: command.project,
          command: command.command,
          argument: command.argument,
        });
        this.print(chalk.blue(`Job ${id} started: ${command.project} /${command.command}`));
        return true;
      }
      case 'cancel':
        this.printCancelled(this.cancel(command.project, command.jobId));
        return true;
      case 'status':
        this.print(this.orchestrator.formatStatus());
        return true;
      case 'up': {
        const info = await this.orchestrator.startProcess(command.project);
        this.print(chalk.green(`Started ${command.project} (PID: ${info.pid})`));
        return true;
      }
      case 'stop': {
        const result = await this.orchestrator.stopProcess(command.project);
        const how = result.forced ? ' (killed)' : '';
        this.print(chalk.green(`Stopped ${command.project} (PID: ${result.pid})${how}`));
        return true;
      }
      case 'log': {
        const lines = this.orchestrator.tailLog(command.project, command.lines);
        this.print(lines.length > 0 ? lines.join('\n') : chalk.dim('(no output yet)'));
        return true;
      }
      case 'startall':
        this.printStartAll(await this.orchestrator.startAllProcesses());
        return true;
    }
  }

  private cancel(project?: string, jobId?: string): string[] {
    if (!project) {
      return this.orchestrator.cancelAll();
    }
    if (!jobId) {
      return this.orchestrator.cancelProject(project);
    }
    const job = this.orchestrator.getJob(jobId);
    if (!job || job.project !== project) {
      throw new ValidationError('command', `no job '${jobId}' in project '${project}'`);
    }
    return this.orchestrator.cancel(jobId) ? [jobId] : [];
  }

  private printCancelled(ids: string[]): void {
    this.print(
      ids.length > 0 ? `Cancelling ${ids.length} job(s): ${ids.join(', ')}` : 'No running jobs to cancel.'
    );
  }

  private printStartAll(entries: StartAllEntry[]): void {
    if (entries.length === 0) {
      this.print('No projects have an up command.');
      return;
    }
    for (const entry of entries) {
      switch (entry.status) {
        case 'started':
          this.print(chalk.green(`  ${entry.project}: started (PID: ${entry.pid})`));
          break;
        case 'already-running':
          this.print(`  ${entry.project}: already running (PID: ${entry.pid})`);
          break;
        case 'failed':
          this.print(chalk.red(`  ${entry.project}: failed: ${entry.message}`));
          break;
      }
    }
  }
}
