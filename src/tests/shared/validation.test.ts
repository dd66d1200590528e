/**
 * Tests for shared validation utilities
 */

import { describe, it, expect } from 'vitest';
import fc from 'fast-check';
import { z } from 'zod';
import {
  formatValidationErrors,
  zodErrorToValidationErrors
} from '../../shared/validation/validator';
import {
  HexColorSchema,
  ISODateSchema,
  NonEmptyStringSchema,
  PercentageSchema,
  YearSchema
} from '../../shared/validation/schemas';

describe('Shared Validation Utilities', () => {
  describe('Schemas', () => {
    it('should accept ISO dates and reject impossible ones', () => {
      expect(ISODateSchema.safeParse('2025-12-10').success).toBe(true);
      expect(ISODateSchema.safeParse('2025-02-30').success).toBe(false);
      expect(ISODateSchema.safeParse('12/10/2025').success).toBe(false);
    });

    it('should accept whole years in range', () => {
      expect(YearSchema.safeParse(2006).success).toBe(true);
      expect(YearSchema.safeParse(2006.5).success).toBe(false);
      expect(YearSchema.safeParse(1899).success).toBe(false);
    });

    it('should accept short and long hex colors', () => {
      expect(HexColorSchema.safeParse('#4A90E2').success).toBe(true);
      expect(HexColorSchema.safeParse('#fff').success).toBe(true);
      expect(HexColorSchema.safeParse('4A90E2').success).toBe(false);
      expect(HexColorSchema.safeParse('#4A90E').success).toBe(false);
    });

    it('should accept exactly the whole numbers 0 to 100 as percentages', () => {
      fc.assert(
        fc.property(fc.integer({ min: -1000, max: 1000 }), value => {
          expect(PercentageSchema.safeParse(value).success).toBe(value >= 0 && value <= 100);
        })
      );
      expect(PercentageSchema.safeParse(50.5).success).toBe(false);
    });

    it('should reject whitespace-only strings', () => {
      expect(NonEmptyStringSchema.safeParse('   ').success).toBe(false);
      expect(NonEmptyStringSchema.parse('  SQL ')).toBe('SQL');
    });
  });

  describe('zodErrorToValidationErrors', () => {
    it('should report field paths and messages', () => {
      const schema = z.object({ name: NonEmptyStringSchema, score: PercentageSchema });
      const result = schema.safeParse({ name: '', score: 120 });
      if (result.success) {
        throw new Error('Expected a parse failure');
      }
      expect(zodErrorToValidationErrors(result.error)).toEqual([
        { field: 'name', message: 'Value cannot be empty or whitespace only' },
        { field: 'score', message: 'Value must be between 0 and 100' }
      ]);
    });

    it('should prefix field paths', () => {
      const result = z.object({ score: PercentageSchema }).safeParse({ score: -1 });
      if (result.success) {
        throw new Error('Expected a parse failure');
      }
      expect(zodErrorToValidationErrors(result.error, 'skills.0')).toEqual([
        { field: 'skills.0.score', message: 'Value must be between 0 and 100' }
      ]);
    });
  });

  describe('formatValidationErrors', () => {
    it('should join errors on one line and name the root', () => {
      expect(formatValidationErrors([
        { field: '', message: 'Expected object, received string' },
        { field: 'roles.0.endYear', message: 'End year must be after or equal to start year' }
      ])).toBe('(root): Expected object, received string; roles.0.endYear: End year must be after or equal to start year');
    });
  });
});
