/**
 * @branchgate/supabase
 *
 * Branch directory backed by the Supabase CLI.
 */

export {
  BRANCH_LISTING_TARGET,
  SupabaseBranchDirectory,
  supabaseApiUrl,
  toRemoteBranch,
  type SupabaseDirectoryOptions,
} from './directory-client.js';

export {
  listBranches,
  listProjects,
  SupabaseOutputError,
  type SupabaseCliOptions,
} from './supabase-commands.js';

export {
  SupabaseBranchSchema,
  SupabaseBranchListSchema,
  SupabaseProjectSchema,
  SupabaseProjectListSchema,
  type SupabaseBranch,
  type SupabaseProject,
} from './schemas.js';
