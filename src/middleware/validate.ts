import type { z, ZodTypeAny } from 'zod';
import { ValidationError } from '../utils/errors';

/**
 * Parse untrusted input, throwing a 400 with the first issue's message
 */
export function parseInput<S extends ZodTypeAny>(schema: S, input: unknown): z.output<S> {
  const result = schema.safeParse(input);
  if (!result.success) {
    const issue = result.error.issues[0];
    throw new ValidationError(issue?.message ?? 'Invalid request');
  }
  return result.data;
}
