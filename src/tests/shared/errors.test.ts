/**
 * Tests for shared error handling utilities
 */

import { describe, it, expect, beforeEach } from 'vitest';
import {
  ErrorHandler,
  ErrorLogger,
  ErrorCategory,
  ErrorSeverity,
  AppError
} from '../../shared/errors';

describe('Shared Error Handler', () => {
  beforeEach(() => {
    ErrorLogger.clearLogs();
  });

  describe('Error Creation', () => {
    it('should create data errors', () => {
      const error = ErrorHandler.createDataError(
        'Invalid portfolio data in skills.json',
        'proficiencies.0.score: Value must be between 0 and 100',
        { file: 'skills.json' }
      );

      expect(error).toBeInstanceOf(AppError);
      expect(error).toBeInstanceOf(Error);
      expect(error.name).toBe('AppError');
      expect(error.message).toBe('Invalid portfolio data in skills.json');
      expect(error.category).toBe(ErrorCategory.DATA);
      expect(error.severity).toBe(ErrorSeverity.HIGH);
      expect(error.recoverable).toBe(false);
      expect(error.context).toEqual({ file: 'skills.json' });
    });

    it('should create validation errors', () => {
      const error = ErrorHandler.createValidationError(
        'Validation failed',
        'Missing required field',
        { field: 'company' }
      );

      expect(error.category).toBe(ErrorCategory.VALIDATION);
      expect(error.severity).toBe(ErrorSeverity.LOW);
      expect(error.recoverable).toBe(true);
    });

    it('should create rendering errors', () => {
      const error = ErrorHandler.createRenderingError('Chart failed', 'No layout position');

      expect(error.category).toBe(ErrorCategory.RENDERING);
      expect(error.severity).toBe(ErrorSeverity.MEDIUM);
      expect(error.suggestedAction).toBeUndefined();
    });

    it('should suggest an action for file errors', () => {
      expect(ErrorHandler.createFileError('Write failed', "EACCES: permission denied, open 'x'").suggestedAction)
        .toBe('Check that the output directory is writable.');
      expect(ErrorHandler.createFileError('Write failed', 'ENOSPC: no space left on device').suggestedAction)
        .toBe('Free some disk space and try again.');
      expect(ErrorHandler.createFileError('Write failed', 'ENOTDIR: not a directory').suggestedAction)
        .toBe('Check the output path and try again.');
    });

    it('should create unexpected errors', () => {
      const originalError = new Error('Something went wrong');
      const error = ErrorHandler.createUnexpectedError(
        originalError,
        { operation: 'test' }
      );

      expect(error.category).toBe(ErrorCategory.UNEXPECTED);
      expect(error.severity).toBe(ErrorSeverity.CRITICAL);
      expect(error.recoverable).toBe(false);
      expect(error.technicalDetails).toBe('Something went wrong');
    });

    it('should accept non-Error values as unexpected errors', () => {
      expect(ErrorHandler.createUnexpectedError('plain string').technicalDetails).toBe('plain string');
    });
  });

  describe('Normalization', () => {
    it('should keep AppErrors as they are', () => {
      const error = ErrorHandler.createValidationError('Invalid', 'Details');
      expect(ErrorHandler.normalize(error)).toBe(error);
    });

    it('should wrap anything else as unexpected', () => {
      const error = ErrorHandler.normalize(new TypeError('bad type'), { chart: 'radar' });

      expect(error.category).toBe(ErrorCategory.UNEXPECTED);
      expect(error.technicalDetails).toBe('bad type');
      expect(error.context).toEqual({ chart: 'radar' });
    });
  });

  describe('Error Logging', () => {
    it('should log errors', () => {
      const error = ErrorHandler.createValidationError(
        'Test error',
        'Details',
        { test: true }
      );

      ErrorLogger.logError(error);

      const logs = ErrorLogger.getLogs();
      expect(logs.length).toBe(1);
      expect(logs[0].category).toBe(ErrorCategory.VALIDATION);
      expect(logs[0].userMessage).toBe('Test error');
    });

    it('should log plain errors as unexpected', () => {
      ErrorLogger.logError(new Error('Plain failure'));

      const [log] = ErrorLogger.getLogs();
      expect(log.category).toBe(ErrorCategory.UNEXPECTED);
      expect(log.technicalDetails).toBe('Plain failure');
    });

    it('should keep logs in the order they were recorded', () => {
      ErrorLogger.logError(
        ErrorHandler.createValidationError('Val error', 'Details')
      );
      ErrorLogger.logError(
        ErrorHandler.createDataError('Data error', 'Details')
      );

      expect(ErrorLogger.getLogs().map(log => log.category)).toEqual([
        ErrorCategory.VALIDATION,
        ErrorCategory.DATA
      ]);
    });

    it('should keep only the most recent 1000 logs', () => {
      for (let i = 0; i < 1005; i++) {
        ErrorLogger.logError(
          ErrorHandler.createValidationError(`Error ${i}`, 'Details')
        );
      }

      const logs = ErrorLogger.getLogs();
      expect(logs.length).toBe(1000);
      expect(logs[0].userMessage).toBe('Error 5');
      expect(logs[999].userMessage).toBe('Error 1004');
    });

    it('should clear logs', () => {
      ErrorLogger.logError(
        ErrorHandler.createValidationError('Test', 'Details')
      );
      expect(ErrorLogger.getLogs().length).toBe(1);

      ErrorLogger.clearLogs();
      expect(ErrorLogger.getLogs().length).toBe(0);
    });
  });

  describe('Error Formatting', () => {
    it('should append technical details to the user message', () => {
      const error = ErrorHandler.createFileError('Failed to write radar.html', 'ENOSPC: no space left on device');
      expect(ErrorHandler.getUserMessage(error)).toBe(
        'Failed to write radar.html (ENOSPC: no space left on device)'
      );
    });

    it('should use the user message alone when there are no details', () => {
      const error = ErrorHandler.createRenderingError('Chart failed', '');
      expect(ErrorHandler.getUserMessage(error)).toBe('Chart failed');
    });

    it('should format regular errors and other values', () => {
      expect(ErrorHandler.getUserMessage(new Error('Regular error'))).toBe('Regular error');
      expect(ErrorHandler.getUserMessage(42)).toBe('42');
    });
  });
});
