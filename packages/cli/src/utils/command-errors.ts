/**
 * Command error reporting and exit codes
 */

import { isAbortError, isBranchResolutionError, ResolutionErrorKind } from '@branchgate/core';
import { DetachedHeadError } from '@branchgate/git';
import chalk from 'chalk';

import { displayConfigErrors } from './config-error-reporter.js';
import { ConfigLoadError } from './config-loader.js';

/**
 * Exit codes shared by every command
 */
export const ExitCode = {
  /** Resolved, proceed */
  Success: 0,
  /** Resolution failed or confirmation declined */
  Failure: 1,
  /** Unexpected error or invalid configuration */
  Error: 2,
  /** Interrupted with Ctrl-C */
  Interrupted: 130,
} as const;

export type ExitCode = (typeof ExitCode)[keyof typeof ExitCode];

/**
 * Print an error and choose the exit code for it
 *
 * @param action - What was being attempted, e.g. "Resolution"
 */
export function reportCommandError(error: unknown, action: string): ExitCode {
  if (isBranchResolutionError(error)) {
    if (error.kind === ResolutionErrorKind.Aborted) {
      console.error(chalk.yellow('✋ Interrupted'));
      return ExitCode.Interrupted;
    }
    console.error(chalk.red(`❌ ${error.message}`));
    console.error(chalk.gray(`   Next step: ${error.nextStep}`));
    return ExitCode.Failure;
  }

  if (isAbortError(error)) {
    console.error(chalk.yellow('✋ Interrupted'));
    return ExitCode.Interrupted;
  }

  if (error instanceof DetachedHeadError) {
    console.error(chalk.red(`❌ ${error.message}`));
    return ExitCode.Failure;
  }

  if (error instanceof ConfigLoadError) {
    displayConfigErrors({ fileName: error.filePath, errors: error.errors });
    return ExitCode.Error;
  }

  console.error(chalk.red(`❌ ${action} failed with error:`));
  console.error(error instanceof Error ? error.message : String(error));
  return ExitCode.Error;
}

/**
 * Run a command body and exit with its code
 *
 * The exit happens outside the error handler so a failing body and a
 * successful exit are never confused.
 */
export async function runWithExitCode(action: string, body: () => Promise<ExitCode>): Promise<void> {
  let code: ExitCode;
  try {
    code = await body();
  } catch (error) {
    code = reportCommandError(error, action);
  }
  process.exit(code);
}
