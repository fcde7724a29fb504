/**
 * Protection predicate
 *
 * Decides whether a remote branch counts as production for refusal
 * purposes. Broader than classification: a branch whose name looks like
 * production is protected even before the directory marks it default.
 */

import type { RemoteBranch } from './types.js';

/**
 * Names protected when the project configures none
 */
export const DEFAULT_PROTECTED_BRANCH_NAMES: readonly string[] = ['main', 'master', 'production', 'prod'];

export type ProtectionPredicate = (branch: RemoteBranch) => boolean;

function normalizeName(name: string): string {
  return name.trim().toLowerCase();
}

/**
 * Check a single name against the protected set (case-insensitive, trimmed)
 */
export function isProtectedBranchName(
  name: string,
  protectedNames: readonly string[] = DEFAULT_PROTECTED_BRANCH_NAMES
): boolean {
  const normalized = normalizeName(name);
  return protectedNames.some(candidate => normalizeName(candidate) === normalized);
}

/**
 * Check whether a remote branch is protected
 *
 * @example
 * ```typescript
 * isProtectedBranch({ ...branch, name: 'Production', isDefault: false }); // true
 * isProtectedBranch(branch, ['live']); // only 'live' (and default branches) protected
 * ```
 */
export function isProtectedBranch(
  branch: RemoteBranch,
  protectedNames: readonly string[] = DEFAULT_PROTECTED_BRANCH_NAMES
): boolean {
  if (branch.isDefault) {
    return true;
  }
  return (
    isProtectedBranchName(branch.name, protectedNames) ||
    isProtectedBranchName(branch.gitBranchName, protectedNames)
  );
}

/**
 * Bind a protected-name set into a reusable predicate
 */
export function createProtectionPredicate(
  protectedNames: readonly string[] = DEFAULT_PROTECTED_BRANCH_NAMES
): ProtectionPredicate {
  const normalized = protectedNames.map(normalizeName);
  return branch => isProtectedBranch(branch, normalized);
}
