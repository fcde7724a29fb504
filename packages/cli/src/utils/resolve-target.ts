/**
 * Shared target resolution for commands
 */

import {
  BranchResolver,
  buildResolutionPolicy,
  type BranchTarget,
} from '@branchgate/core';
import { getCurrentBranch, validateGitRef } from '@branchgate/git';

import type { CommandContext } from './command-context.js';

export interface TargetOptions {
  /** --branch */
  branch?: string;

  /** --fallback-branch */
  fallbackBranch?: string;

  /** false with --no-interactive */
  interactive?: boolean;
}

export interface ResolveForCommandOptions {
  /** Protection default when neither --branch nor an override applies */
  disallowProduction?: boolean;

  /** false lets a configured override land on a protected branch (read-only commands) */
  protectRedirects?: boolean;
}

/**
 * Resolve the remote target for the current invocation
 *
 * The git branch is only read when no explicit --branch is given, so an
 * explicit target also works on a detached HEAD. Branch names given on the
 * command line must be valid git refs.
 */
export async function resolveTargetForCommand(
  context: CommandContext,
  options: TargetOptions,
  resolveOptions: ResolveForCommandOptions = {}
): Promise<BranchTarget> {
  const explicitBranch = options.branch?.trim();
  const fallbackFlag = options.fallbackBranch?.trim();
  if (explicitBranch) {
    validateGitRef(explicitBranch);
  }
  if (fallbackFlag) {
    validateGitRef(fallbackFlag);
  }
  const gitBranch = explicitBranch ? explicitBranch : getCurrentBranch({ cwd: context.cwd });
  const { branches } = context.config;

  const policy = buildResolutionPolicy({
    gitBranch,
    ...(explicitBranch ? { explicitBranch } : {}),
    ...(fallbackFlag ? { fallbackFlag } : {}),
    ...(branches.override_branch ? { configOverride: branches.override_branch } : {}),
    ...(branches.fallback_branch ? { configFallback: branches.fallback_branch } : {}),
    allowInteractive: options.interactive !== false,
    interactiveFallbackEnabled: branches.interactive_fallback,
    disallowProduction: resolveOptions.disallowProduction ?? false,
    protectRedirects: resolveOptions.protectRedirects ?? true,
  });

  const resolver = new BranchResolver({
    directory: context.directory,
    prompt: context.prompt,
    session: context.session,
    ...(branches.protected_names ? { protectedNames: branches.protected_names } : {}),
  });
  return resolver.resolve(policy, { signal: context.signal });
}
