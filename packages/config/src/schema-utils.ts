/**
 * Zod Schema Utilities
 *
 * Shared validation helpers for consistent error formatting.
 *
 * @packageDocumentation
 */

import type { z } from 'zod';

/**
 * Create a type-safe validator function from a Zod schema
 *
 * Error messages include the full path (e.g., "branches.protected_names.0: ...").
 *
 * @example
 * ```typescript
 * const safeValidate = createSafeValidator(BranchgateConfigSchema);
 *
 * const result = safeValidate(data);
 * if (result.success) {
 *   console.log(result.data.branches.fallback_branch);
 * } else {
 *   console.error(result.errors);
 * }
 * ```
 */
export function createSafeValidator<T extends z.ZodType>(schema: T) {
  return function safeValidate(data: unknown):
    | { success: true; data: z.infer<T> }
    | { success: false; errors: string[] } {
    const result = schema.safeParse(data);

    if (result.success) {
      return { success: true, data: result.data };
    }

    const errors = result.error.errors.map(err => {
      const path = err.path.join('.');
      return path ? `${path}: ${err.message}` : err.message;
    });

    return { success: false, errors };
  };
}

/**
 * Create a strict validator function from a Zod schema
 *
 * Throws ZodError on validation failure.
 */
export function createStrictValidator<T extends z.ZodType>(schema: T) {
  return function validate(data: unknown): z.infer<T> {
    return schema.parse(data);
  };
}
