/**
 * Primitive field checks shared by every interface type.
 *
 * Absent values (`undefined` or `null`) always pass: a field that is not set
 * has nothing to check. Every failure is a ValidationError naming the field.
 */

import { ValidationError } from '../errors/index.js';

export type StringConstraint =
  | { allowed: readonly string[] }
  | { pattern: RegExp };

function isAbsent(value: unknown): value is undefined | null {
  return value === undefined || value === null;
}

function describe(value: unknown): string {
  if (typeof value === 'string') {
    return JSON.stringify(value);
  }
  if (Array.isArray(value)) {
    return 'array';
  }
  if (typeof value === 'object') {
    return 'object';
  }
  return String(value);
}

export function validateBoolean(value: unknown, field: string): void {
  if (isAbsent(value)) return;
  if (typeof value !== 'boolean') {
    throw new ValidationError(field, `expected a boolean, got ${describe(value)}`);
  }
}

export function validateInteger(value: unknown, field: string, minimum?: number): void {
  if (isAbsent(value)) return;
  if (typeof value !== 'number' || !Number.isInteger(value)) {
    throw new ValidationError(field, `expected an integer, got ${describe(value)}`);
  }
  if (minimum !== undefined && value < minimum) {
    throw new ValidationError(field, `must be at least ${minimum}, got ${value}`);
  }
}

export function validateString(value: unknown, field: string, constraint?: StringConstraint): void {
  if (isAbsent(value)) return;
  if (typeof value !== 'string') {
    throw new ValidationError(field, `expected a string, got ${describe(value)}`);
  }
  if (!constraint) return;

  if ('allowed' in constraint) {
    if (!constraint.allowed.includes(value)) {
      throw new ValidationError(
        field,
        `must be one of ${constraint.allowed.join(', ')}, got ${describe(value)}`
      );
    }
  } else if (!constraint.pattern.test(value)) {
    throw new ValidationError(
      field,
      `${describe(value)} does not match ${constraint.pattern.source}`
    );
  }
}
