/**
 * Resolve Command
 *
 * Resolves the remote target with every precedence rule applied:
 * --branch, configured override, exact match, fallback, picker.
 */

import { createProtectionPredicate } from '@branchgate/core';
import type { Command } from 'commander';

import { createCommandContext } from '../utils/command-context.js';
import { ExitCode, runWithExitCode } from '../utils/command-errors.js';
import { resolveTargetForCommand, type TargetOptions } from '../utils/resolve-target.js';
import { displayTarget, targetToRecord } from '../utils/target-display.js';
import { outputYamlResult } from '../utils/yaml-output.js';

interface ResolveOptions extends TargetOptions {
  yaml?: boolean;
}

export function resolveCommand(program: Command): void {
  program
    .command('resolve')
    .description('Resolve the remote branch to act against')
    .option('--branch <name>', 'Target this remote branch instead of the current git branch')
    .option('--fallback-branch <name>', 'Remote branch to use when there is no exact match')
    .option('--no-interactive', 'Never prompt for a fallback branch')
    .option('--yaml', 'Output YAML only (no human-friendly display)')
    .action(async (options: ResolveOptions, command: Command) => {
      await runWithExitCode('Resolution', async () => {
        const context = await createCommandContext(command);
        const target = await resolveTargetForCommand(context, options);

        if (options.yaml) {
          const isProtected = createProtectionPredicate(context.config.branches.protected_names)(target.remoteBranch);
          await outputYamlResult(targetToRecord(target, isProtected));
        } else {
          displayTarget(target, '🎯 Resolved Target');
        }
        // Exit codes:
        // 0 = resolved
        // 1 = resolution failed
        // 2 = error
        return ExitCode.Success;
      });
    });
}
