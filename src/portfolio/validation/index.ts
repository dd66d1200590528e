/**
 * Portfolio Validation Module
 * 
 * Exports the table schemas and the data-quality validator.
 */

export * from './schemas';
export * from './validator';

export type { ValidationResult, ValidationError } from '../../shared/validation/types';
