/**
 * Supabase CLI Command Wrappers
 *
 * Centralized `supabase` command execution. Every call is abortable and
 * returns schema-validated JSON.
 *
 * @packageDocumentation
 */

import { logDebug, safeExecAsync } from '@branchgate/utils';
import type { z } from 'zod';

import {
  SupabaseBranchListSchema,
  SupabaseProjectListSchema,
  type SupabaseBranch,
  type SupabaseProject,
} from './schemas.js';

export interface SupabaseCliOptions {
  /** Executable name or path (default: supabase) */
  cli?: string;

  /** Passed as --project-ref when set */
  projectRef?: string;

  /** Milliseconds before the child process is killed */
  timeout?: number;

  signal?: AbortSignal;
}

/**
 * Raised when the CLI succeeds but prints something that is not the expected JSON
 */
export class SupabaseOutputError extends Error {
  constructor(
    public readonly command: string,
    detail: string
  ) {
    super(`Unexpected output from \`${command}\`: ${detail}`);
    this.name = 'SupabaseOutputError';
  }
}

async function runJsonCommand<T extends z.ZodType>(
  args: string[],
  schema: T,
  options: SupabaseCliOptions
): Promise<z.infer<T>> {
  const cli = options.cli ?? 'supabase';
  const fullArgs = options.projectRef ? [...args, '--project-ref', options.projectRef] : args;
  const commandLine = `${cli} ${fullArgs.join(' ')}`;

  logDebug('directory', `Running ${commandLine}`);
  const { stdout } = await safeExecAsync(cli, fullArgs, {
    ...(options.timeout === undefined ? {} : { timeout: options.timeout }),
    ...(options.signal ? { signal: options.signal } : {}),
  });

  let raw: unknown;
  try {
    raw = JSON.parse(stdout);
  } catch (error) {
    throw new SupabaseOutputError(commandLine, error instanceof Error ? error.message : String(error));
  }

  const result = schema.safeParse(raw);
  if (!result.success) {
    const detail = result.error.errors
      .map(err => (err.path.length > 0 ? `${err.path.join('.')}: ${err.message}` : err.message))
      .join('; ');
    throw new SupabaseOutputError(commandLine, detail);
  }
  return result.data;
}

/**
 * List remote branches (`supabase branches list --output json`)
 */
export async function listBranches(options: SupabaseCliOptions = {}): Promise<SupabaseBranch[]> {
  return runJsonCommand(['branches', 'list', '--output', 'json'], SupabaseBranchListSchema, options);
}

/**
 * List projects visible to the logged-in account (`supabase projects list --output json`)
 *
 * Never takes --project-ref: the project list is account-wide.
 */
export async function listProjects(options: SupabaseCliOptions = {}): Promise<SupabaseProject[]> {
  const { projectRef: _projectRef, ...rest } = options;
  return runJsonCommand(['projects', 'list', '--output', 'json'], SupabaseProjectListSchema, rest);
}
