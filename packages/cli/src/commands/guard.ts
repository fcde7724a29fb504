/**
 * Guard Command
 *
 * Resolves the target and runs the production confirmation gate, for use
 * in scripts:
 *
 *   branchgate guard "push migrations" --strict && supabase db push
 */

import { ConfirmationLevel, confirmDestructiveOperation, confirmProductionOperation } from '@branchgate/core';
import chalk from 'chalk';
import type { Command } from 'commander';

import { createCommandContext } from '../utils/command-context.js';
import { ExitCode, runWithExitCode } from '../utils/command-errors.js';
import { resolveTargetForCommand, type TargetOptions } from '../utils/resolve-target.js';

interface GuardOptions extends TargetOptions {
  strict?: boolean;
  destructive?: boolean;
}

export function guardCommand(program: Command): void {
  program
    .command('guard')
    .description('Confirm an operation before it runs against the resolved target')
    .argument('<operation>', 'What is about to happen, e.g. "push migrations"')
    .option('--strict', 'Require typing "yes" instead of a yes/no answer')
    .option('--destructive', 'Confirm even outside production; the operation cannot be undone')
    .option('--branch <name>', 'Target this remote branch instead of the current git branch')
    .option('--fallback-branch <name>', 'Remote branch to use when there is no exact match')
    .option('--no-interactive', 'Never prompt for a fallback branch')
    .action(async (operation: string, options: GuardOptions, command: Command) => {
      await runWithExitCode('Guard', async () => {
        const context = await createCommandContext(command);
        const target = await resolveTargetForCommand(context, options);

        console.error(
          chalk.gray(`Target: ${target.remoteBranch.gitBranchName} (${target.environment}) → project ${target.projectRef}`)
        );

        const level = options.strict ? ConfirmationLevel.Strict : ConfirmationLevel.Standard;
        const confirmation = { session: context.session, prompt: context.prompt, signal: context.signal };
        const proceed = options.destructive
          ? await confirmDestructiveOperation(`${operation} on ${target.remoteBranch.gitBranchName}`, level, confirmation)
          : await confirmProductionOperation(target.environment, operation, level, confirmation);

        // Exit codes:
        // 0 = proceed
        // 1 = declined or unresolved
        // 2 = error
        return proceed ? ExitCode.Success : ExitCode.Failure;
      });
    });
}
