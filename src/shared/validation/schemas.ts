/**
 * Validation Schemas
 * 
 * Zod schemas for common data structures.
 */

import { z } from 'zod';

/**
 * ISO 8601 date format (YYYY-MM-DD)
 */
export const ISODateSchema = z.string().regex(
  /^\d{4}-\d{2}-\d{2}$/,
  'Date must be in ISO 8601 format (YYYY-MM-DD)'
).refine((dateString) => {
  const date = new Date(dateString);
  return !isNaN(date.getTime()) && date.toISOString().startsWith(dateString);
}, 'Invalid date value');

/**
 * Calendar year
 */
export const YearSchema = z.number().int('Year must be a whole number').min(1900).max(2200);

/**
 * CSS hex color (#RGB or #RRGGBB)
 */
export const HexColorSchema = z.string().regex(
  /^#(?:[0-9a-fA-F]{3}){1,2}$/,
  'Color must be a hex value such as #4A90E2'
);

/**
 * Integer score or percentage in [0, 100]
 */
export const PercentageSchema = z.number()
  .int('Value must be a whole number')
  .min(0, 'Value must be between 0 and 100')
  .max(100, 'Value must be between 0 and 100');

/**
 * Non-empty, trimmed text
 */
export const NonEmptyStringSchema = z.string().trim().min(1, 'Value cannot be empty or whitespace only');
