/**
 * @branchgate/config
 *
 * YAML configuration for branchgate with Zod schema validation.
 *
 * @example Shared configuration
 * ```yaml
 * # .branchgate.yaml
 * project:
 *   name: storefront
 *
 * directory:
 *   cli: supabase
 *   project_ref: abcdefghijklmnop
 *
 * branches:
 *   fallback_branch: develop
 *   protected_names: [main, production]
 * ```
 *
 * @example Local overrides (gitignored)
 * ```yaml
 * # .branchgate.local.yaml
 * branches:
 *   override_branch: feature-payments
 * ```
 */

// Core schema types and validation
export {
  type ProjectConfig,
  type DirectoryConfig,
  type BranchesConfig,
  type BranchgateConfig,
  type LocalConfig,
  ProjectConfigSchema,
  DirectoryConfigSchema,
  BranchesConfigSchema,
  BranchgateConfigSchema,
  LocalConfigSchema,
  validateConfig,
  safeValidateConfig,
  safeValidateLocalConfig,
  createDefaultConfig,
} from './schema.js';

// Config loading
export {
  ConfigValidationError,
  loadConfigFromFile,
  loadLocalConfig,
  mergeLocalConfig,
  loadConfigWithLocalOverrides,
  localConfigPathFor,
} from './loader.js';

// Constants
export { CONFIG_FILE_NAME, LOCAL_CONFIG_FILE_NAME, CONFIG_DEFAULTS } from './constants.js';

// Validator helpers
export { createSafeValidator, createStrictValidator } from './schema-utils.js';
