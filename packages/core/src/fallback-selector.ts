/**
 * Interactive fallback selection
 *
 * Filters and orders the directory's branch list, then asks the prompt
 * collaborator to pick one.
 */

import { logDebug } from '@branchgate/utils';

import type { Prompt } from './directory.js';
import { classifyBranch, environmentWeight } from './environment.js';
import {
  AbortedError,
  InteractiveCancelledError,
  PromptCancelledError,
  isAbortError,
} from './errors.js';
import type { ProtectionPredicate } from './protection.js';
import { createProtectionPredicate } from './protection.js';
import type { RemoteBranch } from './types.js';

export interface RankOptions {
  /** Drop protected branches */
  disallowProduction: boolean;

  /** Predicate used for dropping (default: built-in protected names) */
  isProtected?: ProtectionPredicate;
}

function compareCodeUnits(a: string, b: string): number {
  if (a < b) return -1;
  if (a > b) return 1;
  return 0;
}

/**
 * Filter and sort fallback candidates
 *
 * Order is (environment weight, git branch name) ascending, so
 * Development comes first, then Feature, then Production.
 *
 * @returns A new array; the input is not modified
 */
export function rankFallbackCandidates(
  branches: readonly RemoteBranch[],
  options: RankOptions
): RemoteBranch[] {
  const isProtected = options.isProtected ?? createProtectionPredicate();
  const eligible = options.disallowProduction
    ? branches.filter(branch => !isProtected(branch))
    : [...branches];

  return eligible.sort((a, b) => {
    const byWeight = environmentWeight(classifyBranch(a)) - environmentWeight(classifyBranch(b));
    return byWeight === 0 ? compareCodeUnits(a.gitBranchName, b.gitBranchName) : byWeight;
  });
}

/**
 * Picker entry for a branch, e.g. `develop (Development)`
 */
export function formatCandidateOption(branch: RemoteBranch): string {
  return `${branch.gitBranchName} (${classifyBranch(branch)})`;
}

export function defaultPromptLabel(target: string): string {
  return `No remote branch for '${target}'. Select fallback target`;
}

export interface SelectFallbackOptions {
  prompt: Prompt;

  /** Resolution key the fallback stands in for */
  target: string;

  label?: string;
  signal?: AbortSignal;
}

/**
 * Ask the user to pick one of the ranked candidates
 *
 * @throws InteractiveCancelledError when the prompt is dismissed or returns an out-of-range index
 * @throws AbortedError when the signal fires
 */
export async function selectFallbackBranch(
  candidates: readonly RemoteBranch[],
  options: SelectFallbackOptions
): Promise<RemoteBranch> {
  const { prompt, target, signal } = options;
  const label = options.label ?? defaultPromptLabel(target);
  const choices = candidates.map(formatCandidateOption);

  let index: number;
  try {
    index = await prompt.selectOne(label, choices, signal);
  } catch (error) {
    if (error instanceof PromptCancelledError) {
      throw new InteractiveCancelledError(target, { cause: error });
    }
    if (signal?.aborted || isAbortError(error)) {
      throw new AbortedError(target, { cause: error });
    }
    throw error;
  }

  const chosen = Number.isInteger(index) ? candidates[index] : undefined;
  if (chosen === undefined) {
    throw new InteractiveCancelledError(target);
  }

  logDebug('prompt', 'Fallback branch selected', { target, selected: chosen.gitBranchName });
  return chosen;
}
