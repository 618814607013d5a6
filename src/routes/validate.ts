// =============================================================================
// BASTION — Request Validation Helper
// =============================================================================

import { z } from 'zod';
import { InvalidInputError } from '../errors';

/**
 * Parse a request body or query with a zod schema. Failures become
 * InvalidInputError (HTTP 400) listing each offending field.
 */
export function parseWith<S extends z.ZodTypeAny>(schema: S, value: unknown, what: string): z.output<S> {
  const result = schema.safeParse(value);
  if (!result.success) {
    throw new InvalidInputError(
      `Invalid ${what}`,
      result.error.issues.map((i) => (i.path.length > 0 ? `${i.path.join('.')}: ${i.message}` : i.message))
    );
  }
  return result.data;
}
