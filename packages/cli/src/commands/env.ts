/**
 * Env Command
 *
 * Shows which remote environment the current git branch maps to.
 */

import { createProtectionPredicate } from '@branchgate/core';
import type { Command } from 'commander';

import { createCommandContext } from '../utils/command-context.js';
import { ExitCode, runWithExitCode } from '../utils/command-errors.js';
import { resolveTargetForCommand } from '../utils/resolve-target.js';
import { displayTarget, targetToRecord } from '../utils/target-display.js';
import { outputYamlResult } from '../utils/yaml-output.js';

interface EnvShowOptions {
  yaml?: boolean;
  interactive?: boolean;
}

export function envCommand(program: Command): void {
  const env = program
    .command('env')
    .description('Inspect the remote environment for the current branch');

  env
    .command('show')
    .description('Show the resolved remote branch, environment and connection details')
    .option('--yaml', 'Output YAML only (no human-friendly display)')
    .option('--no-interactive', 'Never prompt for a fallback branch')
    .action(async (options: EnvShowOptions, command: Command) => {
      await runWithExitCode('Environment lookup', async () => {
        const context = await createCommandContext(command);
        // Read-only: the current branch or a configured override may be production
        const target = await resolveTargetForCommand(
          context,
          { interactive: options.interactive },
          { protectRedirects: false }
        );
        const isProtected = createProtectionPredicate(context.config.branches.protected_names)(target.remoteBranch);

        if (options.yaml) {
          await outputYamlResult(targetToRecord(target, isProtected));
        } else {
          displayTarget(target, '🌿 Branch Environment');
        }
        return ExitCode.Success;
      });
    });
}
