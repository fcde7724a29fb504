/**
 * Core branch resolution types for branchgate
 *
 * These types describe remote branches, the resolved target handed to
 * every downstream command, and the per-call resolution policy.
 */

/**
 * Operating tier of a remote branch
 */
export const Environment = {
  Production: 'Production',
  Development: 'Development',
  Feature: 'Feature',
} as const;

export type Environment = (typeof Environment)[keyof typeof Environment];

/**
 * A provisioned remote environment tracked by the branch directory
 */
export interface RemoteBranch {
  /** Directory identifier (optional, display only) */
  id?: string;

  /** Display name of the remote branch */
  name: string;

  /** Git branch this remote branch tracks; the primary match key */
  gitBranchName: string;

  /** Opaque identifier of the provisioned project */
  projectRef: string;

  /** True for the production branch (at most one per directory) */
  isDefault: boolean;

  /** True for the long-lived development branch */
  isPersistent: boolean;

  /** Lifecycle status (e.g. ACTIVE_HEALTHY); not interpreted */
  status: string;

  createdAt?: string;
  updatedAt?: string;
}

/**
 * How a target was reached
 */
export type ResolutionSource = 'exact' | 'configured-fallback' | 'interactive-fallback';

/**
 * Resolved remote target
 *
 * Built once all fields are known and frozen before it is returned.
 */
export interface BranchTarget {
  /** Git branch the caller started from */
  readonly gitBranch: string;

  readonly remoteBranch: RemoteBranch;

  /** Classification of remoteBranch */
  readonly environment: Environment;

  readonly projectRef: string;

  /** API endpoint of the project */
  readonly apiUrl: string;

  /** Project region, when the directory could report it */
  readonly region?: string;

  /** True when an override replaced the git branch as the resolution key */
  readonly isOverride: boolean;

  /** Original git branch when isOverride is true */
  readonly overrideFrom?: string;

  /** True when the branch is not an exact match for the resolution key */
  readonly isFallback: boolean;

  readonly resolvedVia: ResolutionSource;
}

/**
 * Caller-supplied configuration for one resolution call
 */
export interface ResolutionPolicy {
  /** Local git branch (or explicit --branch target) */
  readonly gitBranch: string;

  /** Remote branch name that supersedes gitBranch as the resolution key */
  readonly override?: string;

  /** Remote branch name used when the key has no exact match */
  readonly fallback?: string;

  /** Offer an interactive picker as the last resort */
  readonly allowInteractive: boolean;

  /** Refuse protected branches reached through override or fallback */
  readonly disallowProduction: boolean;

  /** Label for the interactive picker */
  readonly promptLabel?: string;
}
