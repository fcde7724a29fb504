/**
 * Config Command
 *
 * Shows or validates the effective configuration (shared file merged
 * with local overrides).
 */

import { CONFIG_FILE_NAME, createDefaultConfig } from '@branchgate/config';
import { DEFAULT_PROTECTED_BRANCH_NAMES } from '@branchgate/core';
import chalk from 'chalk';
import type { Command } from 'commander';

import { ExitCode, runWithExitCode } from '../utils/command-errors.js';
import { displayConfigErrors } from '../utils/config-error-reporter.js';
import { loadConfigWithErrors } from '../utils/config-loader.js';
import { outputYamlResult } from '../utils/yaml-output.js';

export function configCommand(program: Command): void {
  program
    .command('config')
    .description('Show or validate the effective configuration')
    .option('--validate', 'Only validate the configuration (exit 0 if valid, 2 if invalid)')
    .action(async (options: { validate?: boolean }) => {
      await runWithExitCode('Config', async () => {
        const { config, errors, filePath } = await loadConfigWithErrors();

        if (filePath && !config) {
          displayConfigErrors({ fileName: filePath, errors: errors ?? ['Unknown validation error'] });
          return ExitCode.Error;
        }

        if (options.validate) {
          console.log(
            filePath
              ? chalk.green(`✅ Configuration is valid: ${filePath}`)
              : chalk.gray(`No ${CONFIG_FILE_NAME} found; defaults apply`)
          );
          return ExitCode.Success;
        }

        const effective = config ?? createDefaultConfig();
        if (!filePath) {
          console.error(chalk.gray(`No ${CONFIG_FILE_NAME} found; showing defaults`));
        }
        await outputYamlResult({
          ...effective,
          branches: {
            ...effective.branches,
            protected_names: effective.branches.protected_names ?? [...DEFAULT_PROTECTED_BRANCH_NAMES],
          },
        });
        return ExitCode.Success;
      });
    });
}
