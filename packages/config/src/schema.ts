/**
 * Configuration Schema with Zod Validation
 *
 * Runtime validation and types for `.branchgate.yaml` and
 * `.branchgate.local.yaml`. Keys are snake_case in YAML and in the
 * inferred types.
 */

import { z } from 'zod';

import { CONFIG_DEFAULTS } from './constants.js';
import { createSafeValidator, createStrictValidator } from './schema-utils.js';

/**
 * Project metadata (display only)
 */
export const ProjectConfigSchema = z.object({
  /** Human-readable project name */
  name: z.string().optional(),
}).strict();

export type ProjectConfig = z.infer<typeof ProjectConfigSchema>;

/**
 * Branch directory settings
 */
export const DirectoryConfigSchema = z.object({
  /** Executable used to list branches and projects (default: supabase) */
  cli: z.string().min(1, 'cli cannot be empty').default(CONFIG_DEFAULTS.DIRECTORY_CLI),

  /** Optional: project ref passed as --project-ref to every directory call */
  project_ref: z.string().min(1, 'project_ref cannot be empty').optional(),

  /** Optional: per-call timeout in milliseconds (default: none) */
  timeout_ms: z.number().int().positive().optional(),
}).strict();

export type DirectoryConfig = z.infer<typeof DirectoryConfigSchema>;

/**
 * Branch resolution settings
 */
export const BranchesConfigSchema = z.object({
  /** Remote branch that replaces the git branch as the resolution key */
  override_branch: z.string().optional(),

  /** Remote branch used when the resolution key has no exact match */
  fallback_branch: z.string().optional(),

  /**
   * Names treated as production regardless of directory flags
   * (default: main, master, production, prod)
   */
  protected_names: z
    .array(z.string().trim().min(1, 'protected name cannot be empty'))
    .min(1, 'protected_names must list at least one name')
    .optional(),

  /** Offer an interactive picker when nothing else resolves (default: true) */
  interactive_fallback: z.boolean().default(CONFIG_DEFAULTS.INTERACTIVE_FALLBACK),
}).strict();

export type BranchesConfig = z.infer<typeof BranchesConfigSchema>;

/**
 * Full Configuration Schema
 */
export const BranchgateConfigSchema = z.object({
  project: ProjectConfigSchema.optional(),

  directory: DirectoryConfigSchema.optional().default({}),

  branches: BranchesConfigSchema.optional().default({}),
}).strict();

export type BranchgateConfig = z.infer<typeof BranchgateConfigSchema>;

/**
 * Local overrides schema
 *
 * Only the per-developer branch redirections may be set locally.
 */
export const LocalConfigSchema = z.object({
  branches: z.object({
    override_branch: z.string().optional(),
    fallback_branch: z.string().optional(),
  }).strict().optional(),
}).strict();

export type LocalConfig = z.infer<typeof LocalConfigSchema>;

/**
 * Validate configuration object
 *
 * @returns Validated configuration with defaults applied
 * @throws ZodError if validation fails
 */
export const validateConfig = createStrictValidator(BranchgateConfigSchema);

/**
 * Safe validation function for BranchgateConfig
 */
export const safeValidateConfig = createSafeValidator(BranchgateConfigSchema);

/**
 * Safe validation function for LocalConfig
 */
export const safeValidateLocalConfig = createSafeValidator(LocalConfigSchema);

/**
 * Configuration used when no config file exists
 */
export function createDefaultConfig(): BranchgateConfig {
  return validateConfig({});
}
