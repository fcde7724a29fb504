/**
 * Shared configuration error reporting utility
 *
 * Consistent error formatting across commands (config, doctor, and every
 * command that loads configuration).
 */

import chalk from 'chalk';

export interface ConfigErrorDetails {
  fileName: string;
  errors: string[];
}

/**
 * Format configuration validation errors for display
 *
 * @param maxErrors Maximum number of errors to show (default: 5)
 */
export function formatConfigErrors(details: ConfigErrorDetails, maxErrors: number = 5): string[] {
  const messages: string[] = [chalk.yellow('Validation errors:')];

  for (const err of details.errors.slice(0, maxErrors)) {
    messages.push(chalk.gray(`  • ${err}`));
  }

  if (details.errors.length > maxErrors) {
    messages.push(chalk.gray(`  ... and ${details.errors.length - maxErrors} more`));
  }

  return messages;
}

export function formatConfigSuggestions(): string[] {
  return [
    chalk.blue('💡 Suggestions:'),
    chalk.gray('  • Check YAML syntax (indentation, colons, quotes)'),
    chalk.gray('  • Keys are snake_case: override_branch, fallback_branch, protected_names'),
    chalk.gray('  • .branchgate.local.yaml may only set branches.override_branch and branches.fallback_branch'),
  ];
}

/**
 * Print configuration validation errors with suggestions to stderr
 */
export function displayConfigErrors(details: ConfigErrorDetails, maxErrors: number = 5): void {
  console.error(chalk.red(`❌ Configuration is invalid: ${details.fileName}`));
  console.error();

  for (const msg of formatConfigErrors(details, maxErrors)) console.error(msg);

  console.error();

  for (const msg of formatConfigSuggestions()) console.error(msg);
}

/**
 * Format config errors for the doctor command
 */
export function formatDoctorConfigError(
  details: ConfigErrorDetails,
  maxErrors: number = 5
): { message: string; suggestion: string } {
  const errorMessages = details.errors
    .slice(0, maxErrors)
    .map(err => `     • ${err}`)
    .join('\n');

  return {
    message: `Found ${details.fileName} but it contains validation errors:\n${errorMessages}`,
    suggestion: 'Fix the validation errors shown above, then run `branchgate config --validate`',
  };
}
