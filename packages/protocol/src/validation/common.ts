// Shared validation helpers

import type { ZodError } from 'zod';
import { z } from 'zod';

/**
 * A single validation failure
 */
export type ValidationIssue = {
  /** Dotted path to the offending field, empty for the root */
  path: string;
  message: string;
};

/**
 * Result of validating unknown input
 */
export type ValidationResult<T> =
  | { valid: true; value: T; errors: [] }
  | { valid: false; errors: ValidationIssue[] };

export const permissionLevelSchema = z.enum([
  'read_only',
  'read_execute',
  'read_execute_write',
  'admin',
]);

/**
 * Flatten zod issues into path/message pairs
 */
export function formatIssues(error: ZodError): ValidationIssue[] {
  return error.issues.map((issue) => ({
    path: issue.path.join('.'),
    message: issue.message,
  }));
}

/**
 * Run a schema and convert the outcome into a ValidationResult
 */
export function validateWith<T>(schema: z.ZodType<T, z.ZodTypeDef, unknown>, input: unknown): ValidationResult<T> {
  const parsed = schema.safeParse(input);
  if (parsed.success) {
    return { valid: true, value: parsed.data, errors: [] };
  }
  return { valid: false, errors: formatIssues(parsed.error) };
}
