import { z } from 'zod';
import { UsageError, formatIssues } from './errors.js';

/**
 * Validates arguments against a Zod schema and converts validation errors to usage errors.
 *
 * @param args - The arguments to validate (from the command line)
 * @param schema - The Zod schema to validate against
 * @returns The validated and typed arguments
 * @throws UsageError if validation fails
 *
 * @example
 * ```typescript
 * const options = validateArgs(program.opts(), searchOptionsSchema);
 * // options is now type-safe with SearchOptions type
 * ```
 */
export function validateArgs<T>(
  args: unknown,
  schema: z.ZodType<T, z.ZodTypeDef, unknown>
): T {
  const result = schema.safeParse(args);
  if (!result.success) {
    throw new UsageError(`Invalid arguments: ${formatIssues(result.error)}`);
  }
  return result.data;
}
