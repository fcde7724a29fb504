/**
 * Command Context
 *
 * Everything a command needs to resolve a target, built once per
 * invocation from global flags and configuration.
 */

import type { BranchgateConfig } from '@branchgate/config';
import { createSession, detectInteractive, type BranchDirectory, type Prompt, type Session } from '@branchgate/core';
import { SupabaseBranchDirectory } from '@branchgate/supabase';
import type { Command } from 'commander';

import { loadEffectiveConfig } from './config-loader.js';
import { getProcessSignal } from './interrupt.js';
import { createTerminalPrompt } from './terminal-prompt.js';

export interface CommandContext {
  cwd: string;
  session: Session;
  prompt: Prompt;
  signal: AbortSignal;
  config: BranchgateConfig;
  /** Shared config file, or null when defaults apply */
  configPath: string | null;
  directory: BranchDirectory;
}

type GlobalOptions = {
  yes?: boolean;
  verbose?: boolean;
};

/**
 * Build the session from global flags
 */
export function sessionFromCommand(command: Command): Session {
  const globals = command.optsWithGlobals<GlobalOptions>();
  return createSession({
    assumeYes: globals.yes === true,
    interactive: detectInteractive(),
    verbose: globals.verbose === true,
  });
}

/**
 * Create the directory client described by configuration
 */
export function createDirectory(config: BranchgateConfig): BranchDirectory {
  const { cli, project_ref: projectRef, timeout_ms: timeout } = config.directory;
  return new SupabaseBranchDirectory({
    cli,
    ...(projectRef ? { projectRef } : {}),
    ...(timeout === undefined ? {} : { timeout }),
  });
}

/**
 * @throws ConfigLoadError if the config file is invalid
 */
export async function createCommandContext(command: Command, cwd: string = process.cwd()): Promise<CommandContext> {
  const { config, filePath } = await loadEffectiveConfig(cwd);

  return {
    cwd,
    session: sessionFromCommand(command),
    prompt: createTerminalPrompt(),
    signal: getProcessSignal(),
    config,
    configPath: filePath,
    directory: createDirectory(config),
  };
}
