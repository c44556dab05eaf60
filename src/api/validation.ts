import type { z } from 'zod';
import { ValidationError } from '../domain/errors.js';

/**
 * Parses a request body or query against a zod schema, throwing ValidationError
 * with one "path: message" line per issue
 */
export function parseRequest<T extends z.ZodTypeAny>(schema: T, input: unknown, what: string): z.infer<T> {
  const result = schema.safeParse(input);
  if (!result.success) {
    throw new ValidationError(`Invalid ${what}`, {
      issues: result.error.issues.map((issue) => `${issue.path.join('.') || what}: ${issue.message}`),
    });
  }
  return result.data;
}
