/**
 * Tool argument validation
 */

import type { ZodIssue, ZodType, ZodTypeDef } from 'zod';

export interface ArgsValidationIssue {
  path: string;
  message: string;
}

export type ArgsValidationResult<T> =
  | { success: true; data: T }
  | { success: false; errors: ArgsValidationIssue[] };

function toIssue(issue: ZodIssue): ArgsValidationIssue {
  return { path: issue.path.join('.'), message: issue.message };
}

export function validateToolArgs<T>(
  schema: ZodType<T, ZodTypeDef, unknown>,
  args: unknown
): ArgsValidationResult<T> {
  const result = schema.safeParse(args);
  if (result.success) {
    return { success: true, data: result.data };
  }
  return { success: false, errors: result.error.issues.map(toIssue) };
}

/**
 * One `path: message` line per issue, for tool error results
 */
export function formatValidationErrors(errors: readonly ArgsValidationIssue[]): string {
  if (errors.length === 0) {
    return 'No validation errors';
  }

  const lines = errors.map(({ path, message }) => (path ? `${path}: ${message}` : message));
  return `Validation errors:\n${lines.join('\n')}`;
}
