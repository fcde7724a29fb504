/**
 * Configuration Loader
 *
 * Loads branchgate configuration from YAML files and layers the
 * developer-local overrides on top.
 */

import { existsSync, readFileSync } from 'node:fs';
import { dirname, join, resolve } from 'node:path';

import { parse as parseYaml } from 'yaml';

import { LOCAL_CONFIG_FILE_NAME } from './constants.js';
import {
  safeValidateConfig,
  safeValidateLocalConfig,
  type BranchgateConfig,
  type LocalConfig,
} from './schema.js';

/**
 * Raised when a config file parses but fails schema validation
 */
export class ConfigValidationError extends Error {
  constructor(
    public readonly filePath: string,
    public readonly errors: string[]
  ) {
    super(`Invalid configuration in ${filePath}:\n${errors.map(e => `  - ${e}`).join('\n')}`);
    this.name = 'ConfigValidationError';
  }
}

/**
 * Read a YAML file into a plain value
 *
 * An empty file yields an empty object. The `$schema` key is dropped
 * (IDE support only).
 */
function readYamlFile(absolutePath: string): unknown {
  if (!absolutePath.endsWith('.yaml')) {
    throw new Error(
      `Unsupported config file format: ${absolutePath}\n` +
      `Only .yaml format is supported.`
    );
  }

  const content = readFileSync(absolutePath, 'utf-8');
  const raw: unknown = parseYaml(content);

  if (raw === null || raw === undefined) {
    return {};
  }

  if (typeof raw !== 'object' || Array.isArray(raw)) {
    throw new ConfigValidationError(absolutePath, ['Configuration must be an object']);
  }

  const { $schema: _schema, ...rest } = Object.fromEntries(Object.entries(raw));
  return rest;
}

/**
 * Load configuration from a file path
 *
 * @param configPath - Path to config file (must be .yaml)
 * @returns Loaded and validated configuration with defaults applied
 * @throws ConfigValidationError if the content does not match the schema
 */
export async function loadConfigFromFile(configPath: string): Promise<BranchgateConfig> {
  const absolutePath = resolve(configPath);
  const raw = readYamlFile(absolutePath);

  const result = safeValidateConfig(raw);
  if (!result.success) {
    throw new ConfigValidationError(absolutePath, result.errors);
  }
  return result.data;
}

/**
 * Load the developer-local overrides that sit beside a config file
 *
 * @param configDir - Directory holding the shared config file
 * @returns Local overrides, or undefined when no local file exists
 */
export async function loadLocalConfig(configDir: string): Promise<LocalConfig | undefined> {
  const localPath = resolve(configDir, LOCAL_CONFIG_FILE_NAME);
  if (!existsSync(localPath)) {
    return undefined;
  }

  const raw = readYamlFile(localPath);
  const result = safeValidateLocalConfig(raw);
  if (!result.success) {
    throw new ConfigValidationError(localPath, result.errors);
  }
  return result.data;
}

/**
 * Layer local overrides onto the shared configuration
 *
 * Non-empty local values win. Blank local values leave the shared
 * value in place.
 */
export function mergeLocalConfig(
  config: BranchgateConfig,
  local: LocalConfig | undefined
): BranchgateConfig {
  const overrideBranch = local?.branches?.override_branch?.trim();
  const fallbackBranch = local?.branches?.fallback_branch?.trim();

  return {
    ...config,
    branches: {
      ...config.branches,
      ...(overrideBranch ? { override_branch: overrideBranch } : {}),
      ...(fallbackBranch ? { fallback_branch: fallbackBranch } : {}),
    },
  };
}

/**
 * Load the shared config file and its local overrides in one step
 *
 * @param configPath - Path to the shared config file
 */
export async function loadConfigWithLocalOverrides(configPath: string): Promise<BranchgateConfig> {
  const config = await loadConfigFromFile(configPath);
  const local = await loadLocalConfig(dirname(resolve(configPath)));
  return mergeLocalConfig(config, local);
}

/**
 * Path of the local override file for a given config directory
 */
export function localConfigPathFor(configDir: string): string {
  return join(configDir, LOCAL_CONFIG_FILE_NAME);
}
