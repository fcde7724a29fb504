/**
 * Configuration Loader
 *
 * Finds `.branchgate.yaml` by walking up from the working directory and
 * loads it together with `.branchgate.local.yaml`.
 */

import { existsSync } from 'node:fs';
import { dirname, join, resolve } from 'node:path';

import {
  CONFIG_FILE_NAME,
  ConfigValidationError,
  createDefaultConfig,
  loadConfigWithLocalOverrides,
  type BranchgateConfig,
} from '@branchgate/config';
import { logDebug } from '@branchgate/utils';

/**
 * Raised when a config file exists but cannot be used
 */
export class ConfigLoadError extends Error {
  constructor(
    public readonly filePath: string,
    public readonly errors: string[]
  ) {
    super(`Configuration is invalid: ${filePath}`);
    this.name = 'ConfigLoadError';
  }
}

/**
 * Find configuration directory by walking up directory tree
 *
 * Searches for .branchgate.yaml starting from startDir and walking up
 * to the root directory, similar to how ESLint/Prettier find their config files.
 *
 * @returns Directory containing the config file, or null if not found
 */
export function findConfigUp(startDir: string): string | null {
  let currentDir = resolve(startDir);

  for (;;) {
    if (existsSync(join(currentDir, CONFIG_FILE_NAME))) {
      return currentDir;
    }

    const parentDir = dirname(currentDir);
    if (parentDir === currentDir) {
      return null;
    }
    currentDir = parentDir;
  }
}

/**
 * Find config file path if it exists (searches up directory tree)
 */
export function findConfigPath(cwd?: string): string | null {
  const configDir = findConfigUp(cwd ?? process.cwd());
  return configDir ? join(configDir, CONFIG_FILE_NAME) : null;
}

/**
 * Load configuration with detailed validation errors
 *
 * @returns Object with config, errors, and file path (all null when no config file exists)
 */
export async function loadConfigWithErrors(cwd?: string): Promise<{
  config: BranchgateConfig | null;
  errors: string[] | null;
  filePath: string | null;
}> {
  const configPath = findConfigPath(cwd);

  if (!configPath) {
    return { config: null, errors: null, filePath: null };
  }

  try {
    const config = await loadConfigWithLocalOverrides(configPath);
    return { config, errors: null, filePath: configPath };
  } catch (error) {
    if (error instanceof ConfigValidationError) {
      return { config: null, errors: error.errors, filePath: error.filePath };
    }
    const message = error instanceof Error ? error.message : String(error);
    return { config: null, errors: [`YAML syntax error: ${message}`], filePath: configPath };
  }
}

/**
 * Load the effective configuration
 *
 * Defaults apply when no config file exists.
 *
 * @throws ConfigLoadError if a config file exists but is invalid
 */
export async function loadEffectiveConfig(cwd?: string): Promise<{
  config: BranchgateConfig;
  filePath: string | null;
}> {
  const { config, errors, filePath } = await loadConfigWithErrors(cwd);

  if (filePath === null) {
    logDebug('config', `No ${CONFIG_FILE_NAME} found; using defaults`);
    return { config: createDefaultConfig(), filePath: null };
  }
  if (config === null) {
    throw new ConfigLoadError(filePath, errors ?? ['Unknown validation error']);
  }

  logDebug('config', `Loaded ${filePath}`);
  return { config, filePath };
}
