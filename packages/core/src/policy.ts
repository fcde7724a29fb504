/**
 * Translate command inputs into a resolution policy
 */

import type { ResolutionPolicy } from './types.js';

export interface PolicyInputs {
  /** Current local git branch */
  gitBranch: string;

  /** Explicit target from --branch; replaces gitBranch */
  explicitBranch?: string;

  /** --fallback-branch flag */
  fallbackFlag?: string;

  /** branches.override_branch from configuration */
  configOverride?: string;

  /** branches.fallback_branch from configuration */
  configFallback?: string;

  /** Whether the command wants an interactive picker (default: true) */
  allowInteractive?: boolean;

  /** branches.interactive_fallback from configuration (default: true) */
  interactiveFallbackEnabled?: boolean;

  /** Protection default when neither --branch nor an override applies (default: false) */
  disallowProduction?: boolean;

  /**
   * Whether a configured override turns on production protection (default: true).
   * Read-only commands pass false so an override onto production is shown, not refused.
   */
  protectRedirects?: boolean;

  promptLabel?: string;
}

function nonEmpty(value: string | undefined): string | undefined {
  const trimmed = value?.trim();
  return trimmed ? trimmed : undefined;
}

/**
 * Build a policy
 *
 * An explicit --branch wins over a configured override and both turn on
 * production protection, the override only while `protectRedirects` holds.
 * The fallback flag wins over configuration.
 */
export function buildResolutionPolicy(inputs: PolicyInputs): ResolutionPolicy {
  const explicitBranch = nonEmpty(inputs.explicitBranch);
  const configOverride = explicitBranch ? undefined : nonEmpty(inputs.configOverride);
  const fallback = nonEmpty(inputs.fallbackFlag) ?? nonEmpty(inputs.configFallback);

  const protectRedirects = inputs.protectRedirects ?? true;
  const disallowProduction =
    explicitBranch !== undefined ||
    (protectRedirects && configOverride !== undefined) ||
    (inputs.disallowProduction ?? false);
  const allowInteractive = (inputs.allowInteractive ?? true) && (inputs.interactiveFallbackEnabled ?? true);

  return Object.freeze({
    gitBranch: explicitBranch ?? inputs.gitBranch,
    ...(configOverride ? { override: configOverride } : {}),
    ...(fallback ? { fallback } : {}),
    allowInteractive,
    disallowProduction,
    ...(inputs.promptLabel ? { promptLabel: inputs.promptLabel } : {}),
  });
}
