/**
 * Validation Module
 * 
 * Common validation utilities using Zod for schema validation.
 */

export * from './validator';
export * from './schemas';
export * from './types';
