/**
 * Collaborator interfaces consumed by the resolution engine
 */

import type { RemoteBranch } from './types.js';

/**
 * Remote branch directory
 *
 * Implementations may throw on any call. Untyped errors are wrapped in
 * DirectoryUnavailableError by the resolver.
 */
export interface BranchDirectory {
  /** Look up a branch by git branch name (then display name), or undefined */
  findByGitBranch(name: string, signal?: AbortSignal): Promise<RemoteBranch | undefined>;

  /** Full branch list */
  listAll(signal?: AbortSignal): Promise<RemoteBranch[]>;

  /** API URL of a project */
  urlFor(projectRef: string): string;

  /** Region of a project, or undefined when unknown */
  findProjectRegion(projectRef: string, signal?: AbortSignal): Promise<string | undefined>;
}

/**
 * Interactive prompt
 *
 * Implementations throw PromptCancelledError when the user dismisses a
 * prompt and reject with an AbortError when the signal fires.
 */
export interface Prompt {
  /** Ask the user to pick one option; resolves to its index */
  selectOne(label: string, options: readonly string[], signal?: AbortSignal): Promise<number>;

  /** Yes/no question */
  confirm(message: string, defaultValue: boolean, signal?: AbortSignal): Promise<boolean>;

  /** Free-text answer */
  text(message: string, signal?: AbortSignal): Promise<string>;

  warn(message: string): void;
  info(message: string): void;
}
