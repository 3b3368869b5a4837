/**
 * Zod Schemas for Runtime Validation
 *
 * Configuration and job requests arrive from outside the process
 * (config files, chat adapters, the CLI), so they are validated here
 * and the rest of the core works with the inferred types.
 */

import * as os from 'node:os';
import * as path from 'node:path';
import { z } from 'zod';
import { COMMAND_KINDS } from './commands';

// ============================================================================
// Project Schemas
// ============================================================================

/**
 * Project names become directory names under the scratch root
 */
export const ProjectNameSchema = z
  .string()
  .min(1)
  .regex(/^[A-Za-z0-9][A-Za-z0-9._-]*$/, 'may only contain letters, digits, ".", "_" and "-"');

export const ProjectSchema = z.object({
  name: ProjectNameSchema,
  repoUrl: z.string().min(1),
  workDir: z.string().min(1),
  defaultBranch: z.string().min(1).default('main'),
  upCommand: z.string().min(1).optional(),
  downCommand: z.string().min(1).optional(),
  endpointUrl: z.string().optional(),
  /** Ports freed before the up command starts */
  ports: z.array(z.number().int().min(1).max(65535)).optional(),
});

export type Project = z.output<typeof ProjectSchema>;

/**
 * System prompt fragments. `general` is prepended to every command's rules.
 */
export const RulesSchema = z
  .object({
    general: z.string().default(''),
    ask: z.string().default(''),
    feat: z.string().default(''),
    fix: z.string().default(''),
    plan: z.string().default(''),
    feedback: z.string().default(''),
    init: z.string().default(''),
  })
  .default({});

export type Rules = z.output<typeof RulesSchema>;
export type RulesKey = keyof Rules;

// ============================================================================
// Config Schemas
// ============================================================================

export const LogLevelSchema = z.enum(['debug', 'info', 'warn', 'error']);

const durationMs = (fallback: number) => z.number().int().positive().default(fallback);

export const OrchestratorConfigSchema = z.object({
  /** Workspaces, output files and the neutral directory live here */
  scratchRoot: z.string().min(1).default(() => path.join(os.tmpdir(), 'taskdock')),

  // Agent invocation
  agentCommand: z.string().min(1).default('claude'),
  agentArgs: z
    .array(z.string())
    .default(['-p', '--output-format', 'json', '--permission-mode', 'bypassPermissions']),
  jobTimeoutMs: durationMs(30 * 60 * 1000),
  killGracePeriodMs: durationMs(5000),
  outputTailLines: z.number().int().positive().default(200),

  // Git
  cloneTimeoutMs: durationMs(30 * 60 * 1000),
  gitTimeoutMs: durationMs(2 * 60 * 1000),

  // Job retention
  maxJobsPerProject: z.number().int().positive().default(20),
  jobRetentionMs: durationMs(60 * 60 * 1000),

  // Auxiliary processes
  processLogLines: z.number().int().positive().default(500),
  processStopGraceMs: durationMs(5000),
  reaperIntervalMs: durationMs(2000),
  downTimeoutMs: durationMs(60 * 1000),

  // Logging
  logLevel: LogLevelSchema.default('info'),
  logFile: z.string().optional(),

  projects: z
    .array(ProjectSchema)
    .default([])
    .superRefine((projects, ctx) => {
      const seen = new Set<string>();
      for (const [index, project] of projects.entries()) {
        if (seen.has(project.name)) {
          ctx.addIssue({
            code: z.ZodIssueCode.custom,
            path: [index, 'name'],
            message: `duplicate project name '${project.name}'`,
          });
        }
        seen.add(project.name);
      }
    }),
  rules: RulesSchema,
});

export type OrchestratorConfig = z.output<typeof OrchestratorConfigSchema>;
export type OrchestratorConfigInput = z.input<typeof OrchestratorConfigSchema>;

// ============================================================================
// Job Schemas
// ============================================================================

export const CommandKindSchema = z.enum(COMMAND_KINDS);

export const JobRequestSchema = z.object({
  project: ProjectNameSchema,
  command: CommandKindSchema,
  argument: z.string().trim().min(1, 'argument must not be empty'),
  requesterId: z.string().optional(),
  /** Prior job id whose session a feedback job should resume */
  sessionRef: z.string().min(1).optional(),
});

export type JobRequest = z.input<typeof JobRequestSchema>;
export type ValidatedJobRequest = z.output<typeof JobRequestSchema>;

/**
 * Structured line printed by the agent on stdout. Only the session id is read.
 */
export const AgentStdoutLineSchema = z
  .object({
    session_id: z.string().min(1),
  })
  .passthrough();

// ============================================================================
// Validation Helpers
// ============================================================================

/**
 * Safely parse data with a schema, returning null on failure
 */
export function safeParse<T extends z.ZodTypeAny>(
  schema: T,
  data: unknown,
  onError?: (error: z.ZodError) => void
): z.output<T> | null {
  const result = schema.safeParse(data);
  if (result.success) {
    return result.data;
  }
  onError?.(result.error);
  return null;
}

/**
 * Get a formatted error message from a Zod error
 */
export function formatZodError(error: z.ZodError<unknown>): string {
  return error.issues
    .map((e) => (e.path.length > 0 ? `${e.path.map(String).join('.')}: ${e.message}` : e.message))
    .join('; ');
}
