/**
 * Configuration Constants
 *
 * Single source of truth for file names and default values.
 *
 * @packageDocumentation
 */

/**
 * Shared project configuration, committed to the repository
 */
export const CONFIG_FILE_NAME = '.branchgate.yaml';

/**
 * Developer-specific overrides next to the shared file (gitignored)
 */
export const LOCAL_CONFIG_FILE_NAME = '.branchgate.local.yaml';

/**
 * Default configuration values
 *
 * @example
 * ```typescript
 * import { CONFIG_DEFAULTS } from '@branchgate/config';
 *
 * const cli = config.directory.cli ?? CONFIG_DEFAULTS.DIRECTORY_CLI;
 * ```
 */
export const CONFIG_DEFAULTS = {
  /**
   * Executable that lists remote branches and projects
   */
  DIRECTORY_CLI: 'supabase' as const,

  /**
   * Offer an interactive picker when nothing else resolves
   */
  INTERACTIVE_FALLBACK: true as const,
} as const;

export type ConfigDefaults = typeof CONFIG_DEFAULTS;
