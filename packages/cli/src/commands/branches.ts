/**
 * Branches Command
 *
 * Lists remote branches in fallback-candidate order.
 */

import {
  classifyBranch,
  createProtectionPredicate,
  rankFallbackCandidates,
  type RemoteBranch,
} from '@branchgate/core';
import chalk from 'chalk';
import type { Command } from 'commander';

import { createCommandContext } from '../utils/command-context.js';
import { ExitCode, runWithExitCode } from '../utils/command-errors.js';
import { colorEnvironment } from '../utils/target-display.js';
import { outputYamlResult } from '../utils/yaml-output.js';

interface BranchRow {
  branch: RemoteBranch;
  isProtected: boolean;
}

export function branchesCommand(program: Command): void {
  program
    .command('branches')
    .description('List remote branches with their environment and protection status')
    .option('--yaml', 'Output YAML only (no human-friendly display)')
    .action(async (options: { yaml?: boolean }, command: Command) => {
      await runWithExitCode('Branch listing', async () => {
        const context = await createCommandContext(command);
        const isProtected = createProtectionPredicate(context.config.branches.protected_names);
        const branches = await context.directory.listAll(context.signal);
        const rows = rankFallbackCandidates(branches, { disallowProduction: false, isProtected }).map(
          branch => ({ branch, isProtected: isProtected(branch) })
        );

        if (options.yaml) {
          await outputYamlResult({
            branches: rows.map(({ branch, isProtected: protectedBranch }) => ({
              name: branch.name,
              git_branch: branch.gitBranchName,
              environment: classifyBranch(branch),
              protected: protectedBranch,
              project_ref: branch.projectRef,
              status: branch.status,
              ...(branch.updatedAt ? { updated_at: branch.updatedAt } : {}),
            })),
          });
        } else {
          displayBranches(rows);
        }
        return ExitCode.Success;
      });
    });
}

function displayBranches(rows: BranchRow[]): void {
  console.log(chalk.blue('🌳 Remote Branches'));
  console.log(chalk.gray('─'.repeat(50)));

  if (rows.length === 0) {
    console.log(chalk.gray('No remote branches found'));
  }

  for (const { branch, isProtected } of rows) {
    const lock = isProtected ? ' 🔒' : '';
    console.log(`${branch.gitBranchName} ${chalk.gray(`(${branch.name})`)} ${colorEnvironment(classifyBranch(branch))}${lock}`);
    console.log(chalk.gray(`   project ${branch.projectRef} · ${branch.status || 'unknown status'}`));
  }

  console.log(chalk.gray('─'.repeat(50)));
}
