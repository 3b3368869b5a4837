/**
 * SessionStore - which branch a feedback job should continue on
 *
 * Links are kept per project and keyed by the job that produced them.
 * The newest link is the project's current session. Each project keeps
 * a bounded number of links; the oldest go first.
 */

import type { SessionLink } from '../types/job';

export interface ISessionStore {
  record(link: Omit<SessionLink, 'recordedAt'>): SessionLink;
  get(project: string, jobId: string): SessionLink | undefined;
  latest(project: string): SessionLink | undefined;
  updateAgentSession(project: string, jobId: string, agentSessionId: string): void;
  list(project: string): SessionLink[];
  clear(project: string): void;
}

export const MAX_SESSIONS_PER_PROJECT = 50;

export class SessionStore implements ISessionStore {
  private readonly links = new Map<string, Map<string, SessionLink>>();
  /** Job id of each project's current session */
  private readonly current = new Map<string, string>();
  private readonly limit: number;

  constructor(limit = MAX_SESSIONS_PER_PROJECT) {
    this.limit = limit;
  }

  /**
   * Store a link and make it the project's current session
   */
  record(link: Omit<SessionLink, 'recordedAt'>): SessionLink {
    const stored: SessionLink = { ...link, recordedAt: new Date() };
    let byJob = this.links.get(link.project);
    if (!byJob) {
      byJob = new Map();
      this.links.set(link.project, byJob);
    }
    // Re-insert so iteration order stays oldest first
    byJob.delete(link.jobId);
    byJob.set(link.jobId, stored);
    for (const jobId of byJob.keys()) {
      if (byJob.size <= this.limit) {
        break;
      }
      byJob.delete(jobId);
    }
    this.current.set(link.project, link.jobId);
    return { ...stored };
  }

  get(project: string, jobId: string): SessionLink | undefined {
    const link = this.links.get(project)?.get(jobId);
    return link ? { ...link } : undefined;
  }

  latest(project: string): SessionLink | undefined {
    const jobId = this.current.get(project);
    return jobId === undefined ? undefined : this.get(project, jobId);
  }

  updateAgentSession(project: string, jobId: string, agentSessionId: string): void {
    const link = this.links.get(project)?.get(jobId);
    if (link) {
      link.agentSessionId = agentSessionId;
    }
  }

  list(project: string): SessionLink[] {
    return Array.from(this.links.get(project)?.values() ?? [], (link) => ({ ...link }));
  }

  clear(project: string): void {
    this.links.delete(project);
    this.current.delete(project);
  }
}

