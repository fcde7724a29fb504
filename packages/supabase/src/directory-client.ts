/**
 * Supabase-backed branch directory
 */

import {
  DirectoryUnavailableError,
  errorMessage,
  isAbortError,
  type BranchDirectory,
  type RemoteBranch,
} from '@branchgate/core';
import { CommandExecutionError, logDebug } from '@branchgate/utils';

import type { SupabaseBranch } from './schemas.js';
import { listBranches, listProjects, type SupabaseCliOptions } from './supabase-commands.js';

export interface SupabaseDirectoryOptions {
  /** Executable name or path (default: supabase) */
  cli?: string;

  /** Passed as --project-ref to branch listing */
  projectRef?: string;

  /** Per-call timeout in milliseconds */
  timeout?: number;
}

const BRANCHING_DISABLED_MARKER = 'not enabled';

/** Error target for failures while listing every branch */
export const BRANCH_LISTING_TARGET = 'all remote branches';

/**
 * Map a CLI branch record onto the core model
 */
export function toRemoteBranch(branch: SupabaseBranch): RemoteBranch {
  return {
    ...(branch.id ? { id: branch.id } : {}),
    name: branch.name,
    gitBranchName: branch.git_branch,
    projectRef: branch.project_ref,
    isDefault: branch.is_default,
    isPersistent: branch.persistent,
    status: branch.status,
    ...(branch.created_at ? { createdAt: branch.created_at } : {}),
    ...(branch.updated_at ? { updatedAt: branch.updated_at } : {}),
  };
}

/**
 * API URL for a Supabase project
 */
export function supabaseApiUrl(projectRef: string): string {
  return `https://${projectRef}.supabase.co`;
}

/**
 * Branch directory backed by the `supabase` CLI
 *
 * Each lookup lists branches once; nothing is cached across calls.
 *
 * @example
 * ```typescript
 * const directory = new SupabaseBranchDirectory({ projectRef: 'abcdefghijklmnop' });
 * const resolver = new BranchResolver({ directory });
 * ```
 */
export class SupabaseBranchDirectory implements BranchDirectory {
  constructor(private readonly options: SupabaseDirectoryOptions = {}) {}

  async listAll(signal?: AbortSignal): Promise<RemoteBranch[]> {
    return this.fetchBranches(BRANCH_LISTING_TARGET, signal);
  }

  /**
   * Match on git branch first, then on display name
   */
  async findByGitBranch(name: string, signal?: AbortSignal): Promise<RemoteBranch | undefined> {
    const branches = await this.fetchBranches(name, signal);
    return (
      branches.find(branch => branch.gitBranchName === name) ??
      branches.find(branch => branch.name === name)
    );
  }

  urlFor(projectRef: string): string {
    return supabaseApiUrl(projectRef);
  }

  async findProjectRegion(projectRef: string, signal?: AbortSignal): Promise<string | undefined> {
    try {
      const projects = await listProjects(this.cliOptions(signal, false));
      const region = projects.find(project => project.ref === projectRef)?.region;
      return region ? region : undefined;
    } catch (error) {
      throw this.toDirectoryError(projectRef, error);
    }
  }

  private async fetchBranches(target: string, signal: AbortSignal | undefined): Promise<RemoteBranch[]> {
    try {
      const branches = await listBranches(this.cliOptions(signal, true));
      logDebug('directory', `Listed ${branches.length} remote branches`);
      return branches.map(toRemoteBranch);
    } catch (error) {
      throw this.toDirectoryError(target, error);
    }
  }

  private cliOptions(signal: AbortSignal | undefined, withProjectRef: boolean): SupabaseCliOptions {
    const { cli, projectRef, timeout } = this.options;
    return {
      ...(cli ? { cli } : {}),
      ...(withProjectRef && projectRef ? { projectRef } : {}),
      ...(timeout === undefined ? {} : { timeout }),
      ...(signal ? { signal } : {}),
    };
  }

  /**
   * Aborts pass through untouched so the resolver can report them as such
   */
  private toDirectoryError(target: string, error: unknown): unknown {
    if (isAbortError(error)) {
      return error;
    }

    if (error instanceof CommandExecutionError) {
      const stderr = String(error.stderr).trim();
      const output = `${stderr}\n${String(error.stdout)}`;
      if (output.includes(BRANCHING_DISABLED_MARKER)) {
        return new DirectoryUnavailableError(target, 'branching is not enabled for this project', {
          cause: error,
          nextStep: 'Enable branching for the project in the Supabase dashboard',
        });
      }
      return new DirectoryUnavailableError(target, stderr ? `${error.message}\n${stderr}` : error.message, {
        cause: error,
      });
    }

    return new DirectoryUnavailableError(target, errorMessage(error), { cause: error });
  }
}
