import { z } from 'zod';
import type { ErrorDetail } from '../errors';
import { ValidationError } from '../errors';

/** `YYYY-MM-DD`, checked for a real calendar day. */
export const calendarDateSchema = z
  .string()
  .regex(/^\d{4}-\d{2}-\d{2}$/, 'Must be YYYY-MM-DD format')
  .refine((value) => {
    const [y, m, d] = value.split('-').map(Number);
    const date = new Date(Date.UTC(y ?? 0, (m ?? 1) - 1, d ?? 1));
    return date.getUTCFullYear() === y && date.getUTCMonth() + 1 === m && date.getUTCDate() === d;
  }, 'Not a real calendar date');

export function toErrorDetails(error: z.ZodError): ErrorDetail[] {
  return error.issues.map((i) => ({
    field: i.path.join('.') || '_root',
    message: i.message,
  }));
}

/**
 * Assert that a Zod safeParse result succeeded, throwing a ValidationError if not.
 * After calling this, `parsed.data` is type-safe.
 *
 * @example
 * ```ts
 * const parsed = schema.safeParse(body);
 * assertValidated(parsed);
 * // parsed.data is now typed
 * ```
 */
export function assertValidated<T>(
  parsed: z.SafeParseReturnType<unknown, T>,
  message = 'Validation failed',
): asserts parsed is z.SafeParseSuccess<T> {
  if (!parsed.success) {
    throw new ValidationError(message, toErrorDetails(parsed.error));
  }
}
