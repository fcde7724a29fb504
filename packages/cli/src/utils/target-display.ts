/**
 * Display helpers for resolved targets
 */

import { Environment, type BranchTarget } from '@branchgate/core';
import chalk from 'chalk';

/**
 * Snake_case record for YAML output
 */
export function targetToRecord(target: BranchTarget, isProtected: boolean): Record<string, unknown> {
  return {
    git_branch: target.gitBranch,
    environment: target.environment,
    remote_branch: target.remoteBranch.name,
    remote_git_branch: target.remoteBranch.gitBranchName,
    project_ref: target.projectRef,
    api_url: target.apiUrl,
    ...(target.region ? { region: target.region } : {}),
    status: target.remoteBranch.status,
    protected: isProtected,
    is_override: target.isOverride,
    ...(target.overrideFrom === undefined ? {} : { override_from: target.overrideFrom }),
    is_fallback: target.isFallback,
    resolved_via: target.resolvedVia,
  };
}

export function colorEnvironment(environment: Environment): string {
  switch (environment) {
    case Environment.Production:
      return chalk.red.bold(environment);
    case Environment.Development:
      return chalk.green(environment);
    case Environment.Feature:
      return chalk.cyan(environment);
  }
}

/**
 * Print a resolved target in human-friendly format
 */
export function displayTarget(target: BranchTarget, title: string): void {
  console.log(chalk.blue(title));
  console.log(chalk.gray('─'.repeat(50)));
  console.log(`Git branch:    ${target.gitBranch}`);
  console.log(`Environment:   ${colorEnvironment(target.environment)}`);
  console.log(`Remote branch: ${target.remoteBranch.name} (${target.remoteBranch.gitBranchName})`);
  console.log(`Project ref:   ${target.projectRef}`);
  console.log(`API URL:       ${target.apiUrl}`);
  if (target.region) {
    console.log(`Region:        ${target.region}`);
  }

  if (target.isOverride && target.overrideFrom !== undefined) {
    console.log(chalk.yellow(`ℹ️  Override active: '${target.overrideFrom}' redirected to '${target.remoteBranch.gitBranchName}'`));
  }
  if (target.resolvedVia === 'configured-fallback') {
    console.log(chalk.yellow('ℹ️  No exact match; using configured fallback branch'));
  } else if (target.resolvedVia === 'interactive-fallback') {
    console.log(chalk.yellow('ℹ️  No exact match; using the fallback branch you selected'));
  }
  console.log(chalk.gray('─'.repeat(50)));
}
