/**
 * Git Command Utilities
 *
 * The local git branch reader used to seed branch resolution, plus the
 * repository checks the CLI runs before resolving anything.
 */

import { logDebug } from '@branchgate/utils';

import { execGitCommand, tryGitCommand, type GitExecutionOptions } from './git-executor.js';

/**
 * Thrown when HEAD does not point at a branch
 */
export class DetachedHeadError extends Error {
  constructor() {
    super('HEAD is detached; check out a branch or pass --branch <name> explicitly');
    this.name = 'DetachedHeadError';
  }
}

/**
 * Check if the directory is inside a git work tree
 */
export function isGitRepository(options: Pick<GitExecutionOptions, 'cwd'> = {}): boolean {
  return tryGitCommand(['rev-parse', '--is-inside-work-tree'], { ...options, suppressStderr: true });
}

/**
 * Get the root directory of the git repository
 * @throws Error if not in a git repository
 */
export function getRepositoryRoot(options: Pick<GitExecutionOptions, 'cwd'> = {}): string {
  return execGitCommand(['rev-parse', '--show-toplevel'], options);
}

/**
 * Get the current branch name
 *
 * A detached HEAD throws instead of falling back to the short commit SHA.
 * A SHA never names a remote branch, and resolving it would only end in an
 * unmatched lookup or a fallback the user did not ask for. Callers that
 * need to work on a detached checkout pass --branch <name>.
 *
 * @returns The short name of the checked-out branch (e.g. "feature/login")
 * @throws DetachedHeadError if HEAD is detached
 * @throws GitCommandError if not in a git repository
 */
export function getCurrentBranch(options: Pick<GitExecutionOptions, 'cwd'> = {}): string {
  const branch = execGitCommand(['rev-parse', '--abbrev-ref', 'HEAD'], options);
  logDebug('git', `Current branch: ${branch}`);

  if (branch === 'HEAD' || branch === '') {
    throw new DetachedHeadError();
  }

  return branch;
}
