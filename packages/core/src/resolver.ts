/**
 * Branch resolution engine
 *
 * Maps a git branch (or override) onto one remote branch:
 * override substitution, exact match, configured fallback, interactive
 * fallback, then failure. Directory calls are issued strictly in sequence.
 *
 * @packageDocumentation
 */

import { logDebug, logWarning } from '@branchgate/utils';

import type { BranchDirectory, Prompt } from './directory.js';
import { classifyBranch } from './environment.js';
import {
  AbortedError,
  BranchResolutionError,
  DirectoryUnavailableError,
  FallbackNotFoundError,
  FallbackProductionRefusedError,
  NoInteractiveCandidatesError,
  ProductionRefusedError,
  UnresolvedError,
  errorMessage,
  isAbortError,
} from './errors.js';
import { rankFallbackCandidates, selectFallbackBranch } from './fallback-selector.js';
import { createProtectionPredicate, type ProtectionPredicate } from './protection.js';
import { promptsAllowed, type Session } from './session.js';
import type { BranchTarget, RemoteBranch, ResolutionPolicy, ResolutionSource } from './types.js';

export interface BranchResolverOptions {
  directory: BranchDirectory;

  /** Needed for interactive fallback; without it that step is skipped */
  prompt?: Prompt;

  /** Prompts are skipped when the session suppresses them */
  session?: Session;

  /** Names treated as production (default: main, master, production, prod) */
  protectedNames?: readonly string[];
}

export interface ResolveCallOptions {
  signal?: AbortSignal;
}

export type SafeResolveResult =
  | { success: true; target: BranchTarget }
  | { success: false; error: BranchResolutionError };

interface TargetContext {
  gitBranch: string;
  isOverride: boolean;
  overrideFrom?: string;
}

/**
 * Resolves remote branch targets against one directory
 *
 * @example
 * ```typescript
 * const resolver = new BranchResolver({ directory, prompt, session });
 * const target = await resolver.resolve({
 *   gitBranch: 'feature/checkout',
 *   fallback: 'develop',
 *   allowInteractive: true,
 *   disallowProduction: false,
 * });
 * console.log(target.environment, target.apiUrl);
 * ```
 */
export class BranchResolver {
  private readonly directory: BranchDirectory;
  private readonly prompt: Prompt | undefined;
  private readonly session: Session | undefined;
  private readonly isProtected: ProtectionPredicate;

  constructor(options: BranchResolverOptions) {
    this.directory = options.directory;
    this.prompt = options.prompt;
    this.session = options.session;
    this.isProtected = createProtectionPredicate(options.protectedNames);
  }

  /**
   * Resolve a policy to a target
   *
   * @throws BranchResolutionError subclass for every failure path
   */
  async resolve(policy: ResolutionPolicy, options: ResolveCallOptions = {}): Promise<BranchTarget> {
    const { signal } = options;
    const { gitBranch } = policy;
    const override = policy.override?.trim() ?? '';
    const fallback = policy.fallback?.trim() ?? '';

    if (gitBranch.trim() === '' && override === '') {
      throw new UnresolvedError(gitBranch);
    }

    const targetKey = override === '' ? gitBranch : override;
    const context: TargetContext = override === ''
      ? { gitBranch, isOverride: false }
      : { gitBranch, isOverride: true, overrideFrom: gitBranch };

    logDebug('resolution', 'Resolving remote branch', {
      gitBranch,
      override: override || undefined,
      fallback: fallback || undefined,
      allowInteractive: policy.allowInteractive,
      disallowProduction: policy.disallowProduction,
    });

    // Exact match
    const exact = await this.callDirectory(targetKey, signal, () =>
      this.directory.findByGitBranch(targetKey, signal)
    );
    if (exact) {
      // Working on one's own production branch is allowed; redirecting to one is not
      if (policy.disallowProduction && this.isProtected(exact) && targetKey !== gitBranch) {
        throw new ProductionRefusedError(targetKey);
      }
      logDebug('resolution', 'Resolved exact branch match', {
        branch: exact.gitBranchName,
        projectRef: exact.projectRef,
      });
      return this.buildTarget(context, exact, 'exact', signal);
    }

    // Configured fallback
    if (fallback !== '') {
      const found = await this.callDirectory(fallback, signal, () =>
        this.directory.findByGitBranch(fallback, signal)
      );
      if (!found) {
        throw new FallbackNotFoundError(fallback);
      }
      if (policy.disallowProduction && this.isProtected(found)) {
        throw new FallbackProductionRefusedError(fallback);
      }
      logDebug('resolution', 'Using configured fallback', { target: targetKey, fallback: found.gitBranchName });
      return this.buildTarget(context, found, 'configured-fallback', signal);
    }

    // Interactive fallback
    if (policy.allowInteractive && this.prompt && this.canPrompt()) {
      const prompt = this.prompt;
      const branches = await this.callDirectory(targetKey, signal, () => this.directory.listAll(signal));
      const candidates = rankFallbackCandidates(branches, {
        disallowProduction: policy.disallowProduction,
        isProtected: this.isProtected,
      });
      if (candidates.length === 0) {
        throw new NoInteractiveCandidatesError(targetKey);
      }
      const chosen = await selectFallbackBranch(candidates, {
        prompt,
        target: targetKey,
        ...(policy.promptLabel ? { label: policy.promptLabel } : {}),
        ...(signal ? { signal } : {}),
      });
      return this.buildTarget(context, chosen, 'interactive-fallback', signal);
    }

    throw new UnresolvedError(targetKey);
  }

  /**
   * Resolve without throwing resolution failures
   *
   * Errors that are not BranchResolutionError still propagate.
   */
  async safeResolve(policy: ResolutionPolicy, options: ResolveCallOptions = {}): Promise<SafeResolveResult> {
    try {
      return { success: true, target: await this.resolve(policy, options) };
    } catch (error) {
      if (error instanceof BranchResolutionError) {
        return { success: false, error };
      }
      throw error;
    }
  }

  private canPrompt(): boolean {
    return this.session === undefined || promptsAllowed(this.session);
  }

  /**
   * Run one directory call, mapping failures onto typed errors
   */
  private async callDirectory<T>(
    target: string,
    signal: AbortSignal | undefined,
    operation: () => Promise<T>
  ): Promise<T> {
    if (signal?.aborted) {
      throw new AbortedError(target, { cause: signal.reason });
    }
    try {
      return await operation();
    } catch (error) {
      if (error instanceof BranchResolutionError) {
        throw error;
      }
      if (signal?.aborted || isAbortError(error)) {
        throw new AbortedError(target, { cause: error });
      }
      throw new DirectoryUnavailableError(target, errorMessage(error), { cause: error });
    }
  }

  /**
   * Region is display-only: lookup failures are logged and dropped
   */
  private async lookupRegion(projectRef: string, signal: AbortSignal | undefined): Promise<string | undefined> {
    try {
      return await this.directory.findProjectRegion(projectRef, signal);
    } catch (error) {
      if (signal?.aborted || isAbortError(error)) {
        throw new AbortedError(projectRef, { cause: error });
      }
      logWarning(
        'directory',
        `Region lookup failed for project ${projectRef}; continuing without region`,
        error instanceof Error ? error : new Error(String(error))
      );
      return undefined;
    }
  }

  private async buildTarget(
    context: TargetContext,
    branch: RemoteBranch,
    resolvedVia: ResolutionSource,
    signal: AbortSignal | undefined
  ): Promise<BranchTarget> {
    const region = await this.lookupRegion(branch.projectRef, signal);

    const target: BranchTarget = {
      gitBranch: context.gitBranch,
      remoteBranch: branch,
      environment: classifyBranch(branch),
      projectRef: branch.projectRef,
      apiUrl: this.directory.urlFor(branch.projectRef),
      ...(region ? { region } : {}),
      isOverride: context.isOverride,
      ...(context.overrideFrom === undefined ? {} : { overrideFrom: context.overrideFrom }),
      isFallback: resolvedVia !== 'exact',
      resolvedVia,
    };
    return Object.freeze(target);
  }
}

/**
 * One-shot resolution
 */
export async function resolveBranchTarget(
  policy: ResolutionPolicy,
  options: BranchResolverOptions & ResolveCallOptions
): Promise<BranchTarget> {
  const { signal, ...resolverOptions } = options;
  return new BranchResolver(resolverOptions).resolve(policy, signal ? { signal } : {});
}

/**
 * One-shot resolution returning a result union
 */
export async function safeResolveBranchTarget(
  policy: ResolutionPolicy,
  options: BranchResolverOptions & ResolveCallOptions
): Promise<SafeResolveResult> {
  const { signal, ...resolverOptions } = options;
  return new BranchResolver(resolverOptions).safeResolve(policy, signal ? { signal } : {});
}
