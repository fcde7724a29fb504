/**
 * Production confirmation gate
 *
 * A decline is a normal `false` result, not an error: the caller should
 * stop gracefully.
 */

import { logDebug } from '@branchgate/utils';

import type { Prompt } from './directory.js';
import { isProductionEnvironment } from './environment.js';
import { PromptCancelledError } from './errors.js';
import { promptsAllowed, type Session } from './session.js';
import type { Environment } from './types.js';

export const ConfirmationLevel = {
  /** Yes/no question defaulting to no */
  Standard: 'standard',
  /** The user must type `yes` */
  Strict: 'strict',
} as const;

export type ConfirmationLevel = (typeof ConfirmationLevel)[keyof typeof ConfirmationLevel];

export interface ConfirmationOptions {
  session: Session;
  prompt: Prompt;
  signal?: AbortSignal;
}

const STRICT_TOKEN = 'yes';

/**
 * Whether a typed answer accepts a strict confirmation
 */
export function isStrictConfirmation(answer: string): boolean {
  return answer.trim().toLowerCase() === STRICT_TOKEN;
}

async function ask(
  level: ConfirmationLevel,
  { prompt, signal }: ConfirmationOptions
): Promise<boolean> {
  try {
    if (level === ConfirmationLevel.Strict) {
      const answer = await prompt.text(`Type '${STRICT_TOKEN}' to confirm`, signal);
      return isStrictConfirmation(answer);
    }
    return await prompt.confirm('Continue?', false, signal);
  } catch (error) {
    if (error instanceof PromptCancelledError) {
      return false;
    }
    throw error;
  }
}

async function confirmWithWarnings(
  warnings: readonly string[],
  level: ConfirmationLevel,
  options: ConfirmationOptions
): Promise<boolean> {
  const { prompt, session } = options;
  for (const warning of warnings) {
    prompt.warn(warning);
  }

  if (!promptsAllowed(session)) {
    prompt.warn('Not running interactively; refusing without confirmation (pass --yes to proceed)');
    return false;
  }

  const proceed = await ask(level, options);
  if (!proceed) {
    prompt.info('Cancelled');
  }
  return proceed;
}

/**
 * Gate an operation on the resolved environment
 *
 * `session.assumeYes` short-circuits to `true` before the environment is
 * even checked, permitting production operations without a prompt.
 * Non-production environments always proceed without prompting.
 *
 * @example
 * ```typescript
 * const proceed = await confirmProductionOperation(
 *   target.environment, 'push migrations', ConfirmationLevel.Strict, { session, prompt }
 * );
 * if (!proceed) return;
 * ```
 */
export async function confirmProductionOperation(
  environment: Environment,
  operation: string,
  level: ConfirmationLevel,
  options: ConfirmationOptions
): Promise<boolean> {
  if (options.session.assumeYes) {
    logDebug('prompt', 'Confirmation skipped (--yes)', { environment, operation });
    return true;
  }
  if (!isProductionEnvironment(environment)) {
    return true;
  }

  return confirmWithWarnings([`You are about to ${operation} on PRODUCTION!`], level, options);
}

/**
 * Confirm an irreversible operation regardless of environment
 */
export async function confirmDestructiveOperation(
  description: string,
  level: ConfirmationLevel,
  options: ConfirmationOptions
): Promise<boolean> {
  if (options.session.assumeYes) {
    logDebug('prompt', 'Destructive confirmation skipped (--yes)', { description });
    return true;
  }

  const warnings = level === ConfirmationLevel.Strict
    ? [`This will ${description}`, 'This action cannot be undone!']
    : [`This will ${description}`];
  return confirmWithWarnings(warnings, level, options);
}
