/**
 * StatusReporter - read-only view of active jobs and auxiliary processes
 */

import type { ConfigAdapter } from '../adapters/ConfigAdapter';
import type { IJobRegistry } from '../managers/JobRegistry';
import type { IProcessSupervisor } from '../managers/ProcessSupervisor';
import type { CommandKind } from '../types/commands';
import type { JobState } from '../types/job';

const ARGUMENT_PREVIEW_LENGTH = 50;

export interface ActiveJobStatus {
  id: string;
  command: CommandKind;
  state: JobState;
  argument: string;
  elapsedMs: number;
}

export interface ProcessStatus {
  pid: number;
  command: string;
  uptimeMs: number;
  endpointUrl?: string;
}

export interface ProjectStatus {
  project: string;
  jobs: ActiveJobStatus[];
  process: ProcessStatus | null;
}

export interface StatusSnapshot {
  takenAt: Date;
  projects: ProjectStatus[];
}

export class StatusReporter {
  private config: ConfigAdapter;
  private jobs: IJobRegistry;
  private processes: IProcessSupervisor;

  constructor(config: ConfigAdapter, jobs: IJobRegistry, processes: IProcessSupervisor) {
    this.config = config;
    this.jobs = jobs;
    this.processes = processes;
  }

  /**
   * Configured projects first, in configuration order, then any other
   * project that has activity
   */
  snapshot(now: Date = new Date()): StatusSnapshot {
    const names = this.config.listProjects().map((project) => project.name);
    const active = this.jobs.listActive();
    const running = this.processes.list();
    for (const name of [...active.map((job) => job.project), ...running.map((p) => p.project)]) {
      if (!names.includes(name)) {
        names.push(name);
      }
    }

    const projects = names.map((name): ProjectStatus => {
      const info = running.find((p) => p.project === name);
      return {
        project: name,
        jobs: active
          .filter((job) => job.project === name)
          .map((job) => ({
            id: job.id,
            command: job.command,
            state: job.state,
            argument: job.argument,
            elapsedMs: now.getTime() - (job.startedAt ?? job.createdAt).getTime(),
          })),
        process: info
          ? {
              pid: info.pid,
              command: info.command,
              uptimeMs: now.getTime() - info.startedAt.getTime(),
              endpointUrl: this.config.getProject(name)?.endpointUrl,
            }
          : null,
      };
    });

    return { takenAt: now, projects };
  }

  formatStatus(now?: Date): string {
    return formatStatus(this.snapshot(now));
  }
}

function minutes(ms: number): string {
  return `${(ms / 60000).toFixed(1)}m`;
}

function preview(argument: string): string {
  return argument.length > ARGUMENT_PREVIEW_LENGTH
    ? `${argument.slice(0, ARGUMENT_PREVIEW_LENGTH)}...`
    : argument;
}

/**
 * Render a snapshot as chat-friendly text
 */
export function formatStatus(snapshot: StatusSnapshot): string {
  const lines: string[] = [];

  const jobLines = snapshot.projects.flatMap((status) =>
    status.jobs.map(
      (job) =>
        `  [${job.id}] ${status.project} /${job.command}: ${preview(job.argument)} (${minutes(job.elapsedMs)})`
    )
  );
  if (jobLines.length > 0) {
    lines.push('Running jobs:', ...jobLines, '');
    lines.push('Use /cancel <project> to cancel all, or /cancel <project> <id> for a specific job');
  }

  const processLines = snapshot.projects.flatMap((status) => {
    if (!status.process) {
      return [];
    }
    const endpoint = status.process.endpointUrl ? ` ${status.process.endpointUrl}` : '';
    return [
      `  - ${status.project} (PID: ${status.process.pid}, up ${minutes(status.process.uptimeMs)})${endpoint}`,
    ];
  });
  if (processLines.length > 0) {
    if (lines.length > 0) {
      lines.push('');
    }
    lines.push('Running background processes:', ...processLines);
  }

  return lines.length > 0 ? lines.join('\n') : 'No running jobs or processes.';
}
