/**
 * Validator Utilities
 * 
 * Converts Zod issues into the shared ValidationError shape.
 */

import { z } from 'zod';
import { ValidationError } from './types';

/**
 * Converts Zod validation errors to ValidationError entries
 */
export function zodErrorToValidationErrors(error: z.ZodError, prefix?: string): ValidationError[] {
  return error.errors.map(err => {
    const path = err.path.join('.');
    return {
      field: prefix ? [prefix, path].filter(Boolean).join('.') : path,
      message: err.message
    };
  });
}

/**
 * Formats validation errors as a single line
 */
export function formatValidationErrors(errors: ValidationError[]): string {
  return errors.map(err => `${err.field || '(root)'}: ${err.message}`).join('; ');
}
