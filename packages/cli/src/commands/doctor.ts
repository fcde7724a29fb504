/**
 * Doctor Command
 *
 * Diagnoses common setup issues:
 * - Git repository and current branch
 * - Configuration validity
 * - Directory CLI availability
 *
 * @packageDocumentation
 */

import { existsSync } from 'node:fs';
import { dirname } from 'node:path';

import { CONFIG_FILE_NAME, localConfigPathFor, type BranchgateConfig } from '@branchgate/config';
import { DetachedHeadError, getCurrentBranch, getRepositoryRoot, isGitRepository } from '@branchgate/git';
import { getToolVersion } from '@branchgate/utils';
import chalk from 'chalk';
import type { Command } from 'commander';

import { ExitCode, runWithExitCode } from '../utils/command-errors.js';
import { formatDoctorConfigError } from '../utils/config-error-reporter.js';
import { loadConfigWithErrors } from '../utils/config-loader.js';
import { outputYamlResult } from '../utils/yaml-output.js';

/**
 * Result of a single doctor check
 */
export interface DoctorCheckResult {
  name: string;
  passed: boolean;
  message: string;
  /** Optional suggestion for fixing the issue */
  suggestion?: string;
}

export interface DoctorResult {
  allPassed: boolean;
  checks: DoctorCheckResult[];
  totalChecks: number;
  passedChecks: number;
}

function checkGitRepository(cwd: string): DoctorCheckResult {
  return isGitRepository({ cwd })
    ? { name: 'Git repository', passed: true, message: getRepositoryRoot({ cwd }) }
    : {
        name: 'Git repository',
        passed: false,
        message: 'Not inside a git repository',
        suggestion: 'Run branchgate from your project checkout, or pass --branch <name> explicitly',
      };
}

function checkCurrentBranch(cwd: string): DoctorCheckResult {
  try {
    return { name: 'Current branch', passed: true, message: getCurrentBranch({ cwd }) };
  } catch (error) {
    return {
      name: 'Current branch',
      passed: false,
      message: error instanceof Error ? error.message : String(error),
      ...(error instanceof DetachedHeadError
        ? { suggestion: 'Check out a branch: git switch <branch>' }
        : {}),
    };
  }
}

function checkConfiguration(
  loaded: Awaited<ReturnType<typeof loadConfigWithErrors>>
): DoctorCheckResult {
  const { config, errors, filePath } = loaded;
  if (!filePath) {
    return {
      name: 'Configuration',
      passed: true,
      message: `No ${CONFIG_FILE_NAME} found; defaults apply`,
    };
  }
  if (!config) {
    const { message, suggestion } = formatDoctorConfigError({
      fileName: filePath,
      errors: errors ?? ['Unknown validation error'],
    });
    return { name: 'Configuration', passed: false, message, suggestion };
  }

  const localPath = localConfigPathFor(dirname(filePath));
  const localNote = existsSync(localPath) ? ` (with local overrides from ${localPath})` : '';
  return { name: 'Configuration', passed: true, message: `${filePath}${localNote}` };
}

function checkDirectoryCli(config: BranchgateConfig | null): DoctorCheckResult {
  const cli = config?.directory.cli ?? 'supabase';
  const version = getToolVersion(cli);
  return version
    ? { name: 'Directory CLI', passed: true, message: `${cli} ${version}` }
    : {
        name: 'Directory CLI',
        passed: false,
        message: `${cli} is not installed or not on PATH`,
        suggestion: `Install the ${cli} CLI or set directory.cli in ${CONFIG_FILE_NAME}`,
      };
}

/**
 * Run every check
 */
export async function runDoctor(cwd: string = process.cwd()): Promise<DoctorResult> {
  const loaded = await loadConfigWithErrors(cwd);

  const checks = [
    checkGitRepository(cwd),
    checkCurrentBranch(cwd),
    checkConfiguration(loaded),
    checkDirectoryCli(loaded.config),
  ];
  const passedChecks = checks.filter(check => check.passed).length;

  return {
    allPassed: passedChecks === checks.length,
    checks,
    totalChecks: checks.length,
    passedChecks,
  };
}

function displayDoctorResults(result: DoctorResult): void {
  console.log('🩺 branchgate Doctor\n');

  for (const check of result.checks) {
    const icon = check.passed ? chalk.green('✅') : chalk.red('❌');
    console.log(`${icon} ${check.name}`);
    console.log(chalk.gray(`   ${check.message}`));
    if (!check.passed && check.suggestion) {
      console.log(chalk.yellow(`   💡 ${check.suggestion}`));
    }
  }

  console.log('');
  const summary = `📊 Results: ${result.passedChecks}/${result.totalChecks} checks passed`;
  console.log(result.allPassed ? chalk.green(summary) : chalk.yellow(summary));
}

export function doctorCommand(program: Command): void {
  program
    .command('doctor')
    .description('Diagnose git, configuration and directory CLI setup')
    .option('--yaml', 'Output YAML only (no human-friendly display)')
    .action(async (options: { yaml?: boolean }) => {
      await runWithExitCode('Doctor check', async () => {
        const result = await runDoctor();

        if (options.yaml) {
          await outputYamlResult(result);
        } else {
          displayDoctorResults(result);
        }
        return result.allPassed ? ExitCode.Success : ExitCode.Failure;
      });
    });
}
