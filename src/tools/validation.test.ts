import { describe, it, expect } from '@jest/globals';
import { DeriveVfNamesArgsSchema } from '../types/tools.js';
import { formatValidationErrors, validateToolArgs } from './validation.js';

describe('validateToolArgs', () => {
  it('should return parsed data with defaults applied', () => {
    expect(validateToolArgs(DeriveVfNamesArgsSchema, { pfName: 'eth0', totalVfs: 2 })).toEqual({
      success: true,
      data: { pfName: 'eth0', totalVfs: 2, fromIndex: 0 },
    });
  });

  it('should list every issue with its path', () => {
    const result = validateToolArgs(DeriveVfNamesArgsSchema, { pfName: '', totalVfs: 1.5 });

    expect(result.success).toBe(false);
    if (!result.success) {
      expect(result.errors.map((issue) => issue.path)).toEqual(['pfName', 'totalVfs']);
    }
  });
});

describe('formatValidationErrors', () => {
  it('should put one issue per line', () => {
    expect(
      formatValidationErrors([
        { path: 'totalVfs', message: 'Expected integer, received float' },
        { path: '', message: 'Required' },
      ])
    ).toBe('Validation errors:\ntotalVfs: Expected integer, received float\nRequired');
  });

  it('should say when there is nothing to report', () => {
    expect(formatValidationErrors([])).toBe('No validation errors');
  });
});
