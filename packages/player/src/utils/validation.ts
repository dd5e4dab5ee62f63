/**
 * Validation helper utilities
 *
 * Provides consistent validation and error handling for commands, events and config
 */

import { z } from 'zod';
import { ValidationError, type ValidationIssue } from '../types/errors';

/**
 * Validates data against a Zod schema
 *
 * @param context - Additional context for error messages
 * @returns Validated and typed data
 * @throws ValidationError if validation fails
 */
export function validate<T extends z.ZodTypeAny>(
  schema: T,
  data: unknown,
  context?: string
): z.infer<T> {
  const result = schema.safeParse(data);
  if (result.success) {
    // eslint-disable-next-line @typescript-eslint/no-unsafe-return
    return result.data;
  }

  const issues = toIssues(result.error);
  const message = context
    ? `Validation failed for ${context}: ${formatIssues(issues)}`
    : `Validation failed: ${formatIssues(issues)}`;

  throw new ValidationError(message, issues, {
    receivedData: data,
  });
}

/**
 * Validates data against a Zod schema, returning null on failure instead of throwing
 */
export function validateSafe<T extends z.ZodTypeAny>(schema: T, data: unknown): z.infer<T> | null {
  const result = schema.safeParse(data);
  // eslint-disable-next-line @typescript-eslint/no-unsafe-return
  return result.success ? result.data : null;
}

/**
 * Explains why data does not match a schema
 *
 * @returns The list of issues, or null when the data is valid
 */
export function explain(schema: z.ZodTypeAny, data: unknown): ValidationIssue[] | null {
  const result = schema.safeParse(data);
  return result.success ? null : toIssues(result.error);
}

/**
 * Flattens a Zod error into path/message pairs
 */
export function toIssues(error: z.ZodError): ValidationIssue[] {
  return error.errors.map((err) => ({
    path: err.path.join('.'),
    message: err.message,
  }));
}

/**
 * Formats validation issues into a readable message
 */
export function formatIssues(issues: ValidationIssue[]): string {
  return issues
    .map((issue) => (issue.path ? `${issue.path}: ${issue.message}` : issue.message))
    .join('; ');
}

/**
 * Type guard to check if an error is a ValidationError
 */
export function isValidationError(error: unknown): error is ValidationError {
  return error instanceof ValidationError;
}
