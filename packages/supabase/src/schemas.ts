/**
 * Zod schemas for `supabase ... --output json`
 *
 * Unknown fields are ignored; the CLI adds fields between releases.
 */

import { z } from 'zod';

export const SupabaseBranchSchema = z.object({
  id: z.string().optional(),
  name: z.string(),
  git_branch: z.string().default(''),
  project_ref: z.string().min(1),
  is_default: z.boolean().default(false),
  persistent: z.boolean().default(false),
  status: z.string().default(''),
  created_at: z.string().optional(),
  updated_at: z.string().optional(),
});

export type SupabaseBranch = z.infer<typeof SupabaseBranchSchema>;

export const SupabaseBranchListSchema = z.array(SupabaseBranchSchema);

export const SupabaseProjectSchema = z.object({
  id: z.string().optional(),
  name: z.string().optional(),
  ref: z.string(),
  region: z.string().optional(),
  status: z.string().optional(),
});

export type SupabaseProject = z.infer<typeof SupabaseProjectSchema>;

export const SupabaseProjectListSchema = z.array(SupabaseProjectSchema);
