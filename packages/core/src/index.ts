/**
 * @branchgate/core
 *
 * Branch resolution and environment classification engine.
 *
 * ## Features
 *
 * - **Resolution**: override, exact match, configured fallback, interactive fallback
 * - **Classification**: Production, Development or Feature from directory flags
 * - **Protection**: refuses to redirect onto production-like branches
 * - **Confirmation Gate**: standard (yes/no) and strict (type `yes`) levels
 * - **Cancellation**: every directory call and prompt takes an AbortSignal
 *
 * ## Example Usage
 *
 * ```typescript
 * import {
 *   BranchResolver,
 *   ConfirmationLevel,
 *   buildResolutionPolicy,
 *   confirmProductionOperation,
 *   createSession,
 * } from '@branchgate/core';
 *
 * const session = createSession({ interactive: true });
 * const resolver = new BranchResolver({ directory, prompt, session });
 * const target = await resolver.resolve(buildResolutionPolicy({ gitBranch: 'feature/x' }));
 *
 * if (await confirmProductionOperation(target.environment, 'push migrations', ConfirmationLevel.Strict, { session, prompt })) {
 *   // ...
 * }
 * ```
 *
 * @packageDocumentation
 */

export { Environment } from './types.js';
export type { RemoteBranch, BranchTarget, ResolutionPolicy, ResolutionSource } from './types.js';

export { classifyBranch, environmentWeight, isProductionEnvironment, ENVIRONMENT_WEIGHTS } from './environment.js';

export {
  DEFAULT_PROTECTED_BRANCH_NAMES,
  isProtectedBranch,
  isProtectedBranchName,
  createProtectionPredicate,
  type ProtectionPredicate,
} from './protection.js';

export {
  ResolutionErrorKind,
  BranchResolutionError,
  DirectoryUnavailableError,
  ProductionRefusedError,
  FallbackNotFoundError,
  FallbackProductionRefusedError,
  NoInteractiveCandidatesError,
  InteractiveCancelledError,
  UnresolvedError,
  AbortedError,
  PromptCancelledError,
  isBranchResolutionError,
  isAbortError,
  errorMessage,
} from './errors.js';

export type { BranchDirectory, Prompt } from './directory.js';

export {
  rankFallbackCandidates,
  selectFallbackBranch,
  formatCandidateOption,
  defaultPromptLabel,
  type RankOptions,
  type SelectFallbackOptions,
} from './fallback-selector.js';

export {
  BranchResolver,
  resolveBranchTarget,
  safeResolveBranchTarget,
  type BranchResolverOptions,
  type ResolveCallOptions,
  type SafeResolveResult,
} from './resolver.js';

export {
  ConfirmationLevel,
  confirmProductionOperation,
  confirmDestructiveOperation,
  isStrictConfirmation,
  type ConfirmationOptions,
} from './confirmation.js';

export { buildResolutionPolicy, type PolicyInputs } from './policy.js';

export { createSession, promptsAllowed, detectInteractive, type Session } from './session.js';
