/**
 * branchgate program definition
 *
 * Builds the commander program with every command registered. The
 * executable in bin.ts only adds the interrupt handler and parses argv.
 */

import { readFileSync } from 'node:fs';
import { dirname, join } from 'node:path';
import { fileURLToPath } from 'node:url';

import { enableDebugLogging } from '@branchgate/utils';
import { Command } from 'commander';

import { branchesCommand } from './commands/branches.js';
import { configCommand } from './commands/config.js';
import { doctorCommand } from './commands/doctor.js';
import { envCommand } from './commands/env.js';
import { guardCommand } from './commands/guard.js';
import { resolveCommand } from './commands/resolve.js';

// package.json sits one level above both src/ and dist/
const __filename = fileURLToPath(import.meta.url);
const __dirname = dirname(__filename);
export const PACKAGE_JSON_PATH = join(__dirname, '../package.json');

/**
 * Read the CLI version, or 0.0.0 when package.json cannot be read
 */
export function readVersion(packageJsonPath: string = PACKAGE_JSON_PATH): string {
  try {
    const packageJson: unknown = JSON.parse(readFileSync(packageJsonPath, 'utf-8'));
    if (
      typeof packageJson === 'object' &&
      packageJson !== null &&
      'version' in packageJson &&
      typeof packageJson.version === 'string'
    ) {
      return packageJson.version;
    }
  } catch (error) {
    const errorMessage = error instanceof Error ? error.message : String(error);
    console.warn(`Warning: Could not read package.json version (${errorMessage}), using fallback`);
  }
  return '0.0.0';
}

const EXIT_CODE_HELP = `
Exit codes:
  0    resolved, proceed
  1    resolution failed or confirmation declined
  2    unexpected error or invalid configuration
  130  interrupted (Ctrl-C)
`;

export function createProgram(): Command {
  const program = new Command();

  program
    .name('branchgate')
    .description('Resolve the Supabase branch and environment behind your git branch')
    .version(readVersion())
    .option('--verbose', 'Show debug logging on stderr')
    .option('-y, --yes', 'Assume yes for production confirmations')
    .addHelpText('after', EXIT_CODE_HELP)
    .hook('preAction', thisCommand => {
      if (thisCommand.opts<{ verbose?: boolean }>().verbose) {
        enableDebugLogging();
      }
    });

  // Register commands
  envCommand(program);       // branchgate env show
  resolveCommand(program);   // branchgate resolve
  branchesCommand(program);  // branchgate branches
  guardCommand(program);     // branchgate guard <operation>
  configCommand(program);    // branchgate config
  doctorCommand(program);    // branchgate doctor

  return program;
}
