/**
 * Typed resolution failures
 *
 * Every failure names what was being resolved (`target`), why it failed
 * (`message`) and what to do next (`nextStep`). `kind` is the
 * discriminant callers switch on.
 */

export const ResolutionErrorKind = {
  DirectoryUnavailable: 'DirectoryUnavailable',
  ProductionRefused: 'ProductionRefused',
  FallbackNotFound: 'FallbackNotFound',
  FallbackProductionRefused: 'FallbackProductionRefused',
  NoInteractiveCandidates: 'NoInteractiveCandidates',
  InteractiveCancelled: 'InteractiveCancelled',
  Unresolved: 'Unresolved',
  Aborted: 'Aborted',
} as const;

export type ResolutionErrorKind = (typeof ResolutionErrorKind)[keyof typeof ResolutionErrorKind];

export abstract class BranchResolutionError extends Error {
  abstract readonly kind: ResolutionErrorKind;

  constructor(
    message: string,
    public readonly target: string,
    public readonly nextStep: string,
    options?: ErrorOptions
  ) {
    super(message, options);
    this.name = new.target.name;
  }
}

/**
 * The branch directory call itself failed
 */
export class DirectoryUnavailableError extends BranchResolutionError {
  readonly kind = ResolutionErrorKind.DirectoryUnavailable;

  constructor(
    target: string,
    public readonly detail: string,
    options?: ErrorOptions & { nextStep?: string }
  ) {
    super(
      `branch directory unavailable while resolving '${target}': ${detail}`,
      target,
      options?.nextStep ?? 'Check that the directory CLI is installed and logged in, then retry',
      options
    );
  }
}

/**
 * An override landed on a protected branch
 */
export class ProductionRefusedError extends BranchResolutionError {
  readonly kind = ResolutionErrorKind.ProductionRefused;

  constructor(target: string) {
    super(
      `refusing to target production branch '${target}' via override; remove override or use a non-production branch`,
      target,
      'Remove the override or point it at a non-production branch'
    );
  }
}

/**
 * The configured fallback does not exist in the directory
 */
export class FallbackNotFoundError extends BranchResolutionError {
  readonly kind = ResolutionErrorKind.FallbackNotFound;

  constructor(target: string) {
    super(
      `fallback branch '${target}' was not found`,
      target,
      'Set fallback_branch to an existing remote branch (see `branchgate branches`)'
    );
  }
}

/**
 * The configured fallback is a protected branch
 */
export class FallbackProductionRefusedError extends BranchResolutionError {
  readonly kind = ResolutionErrorKind.FallbackProductionRefused;

  constructor(target: string) {
    super(
      `refusing to use production branch '${target}' as fallback target`,
      target,
      'Point fallback_branch at a development or feature branch'
    );
  }
}

/**
 * Every interactive candidate was filtered out as protected
 */
export class NoInteractiveCandidatesError extends BranchResolutionError {
  readonly kind = ResolutionErrorKind.NoInteractiveCandidates;

  constructor(target: string) {
    super(
      `no non-production branches are available as fallback for '${target}'`,
      target,
      'Create a development or feature branch in the directory, or set an override'
    );
  }
}

/**
 * The user dismissed the interactive picker
 */
export class InteractiveCancelledError extends BranchResolutionError {
  readonly kind = ResolutionErrorKind.InteractiveCancelled;

  constructor(target: string, options?: ErrorOptions) {
    super(
      `fallback selection for '${target}' was cancelled`,
      target,
      'Pick a branch, or set fallback_branch to skip the prompt',
      options
    );
  }
}

/**
 * Nothing matched and no fallback applied
 */
export class UnresolvedError extends BranchResolutionError {
  readonly kind = ResolutionErrorKind.Unresolved;

  constructor(target: string) {
    super(
      `no remote branch found for '${target}'; set --fallback-branch or configure branches.fallback_branch`,
      target,
      'Set --fallback-branch, configure branches.fallback_branch in .branchgate.local.yaml, or run interactively to pick one'
    );
  }
}

/**
 * Resolution was cancelled through its AbortSignal
 */
export class AbortedError extends BranchResolutionError {
  readonly kind = ResolutionErrorKind.Aborted;

  constructor(target: string, options?: ErrorOptions) {
    super(`resolution of '${target}' was aborted`, target, 'Re-run the command', options);
  }
}

/**
 * Raised by Prompt implementations when the user dismisses a prompt
 */
export class PromptCancelledError extends Error {
  constructor(message = 'Prompt cancelled') {
    super(message);
    this.name = 'PromptCancelledError';
  }
}

export function isBranchResolutionError(error: unknown): error is BranchResolutionError {
  return error instanceof BranchResolutionError;
}

/**
 * Whether an error came from an aborted AbortSignal
 */
export function isAbortError(error: unknown): boolean {
  return error instanceof Error && error.name === 'AbortError';
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
