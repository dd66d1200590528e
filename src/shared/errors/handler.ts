/**
 * Error Handler
 * 
 * Standardized error construction so every failure carries a category,
 * a severity and a suggested action.
 */

import { AppError, ErrorCategory, ErrorSeverity } from './types';

/**
 * Error handler class for managing errors throughout the application
 */
export class ErrorHandler {
  /**
   * Create a data error (a table could not be loaded or is inconsistent)
   */
  static createDataError(
    message: string,
    technicalDetails: string,
    context?: Record<string, unknown>
  ): AppError {
    return new AppError({
      category: ErrorCategory.DATA,
      severity: ErrorSeverity.HIGH,
      userMessage: message,
      technicalDetails,
      timestamp: new Date(),
      context,
      recoverable: false,
      suggestedAction: 'Check the portfolio data files under src/portfolio/data.'
    });
  }

  /**
   * Create a validation error
   */
  static createValidationError(
    message: string,
    technicalDetails: string,
    context?: Record<string, unknown>
  ): AppError {
    return new AppError({
      category: ErrorCategory.VALIDATION,
      severity: ErrorSeverity.LOW,
      userMessage: message,
      technicalDetails,
      timestamp: new Date(),
      context,
      recoverable: true,
      suggestedAction: 'Correct the reported fields and run again.'
    });
  }

  /**
   * Create a rendering error (a figure could not be built)
   */
  static createRenderingError(
    message: string,
    technicalDetails: string,
    context?: Record<string, unknown>
  ): AppError {
    return new AppError({
      category: ErrorCategory.RENDERING,
      severity: ErrorSeverity.MEDIUM,
      userMessage: message,
      technicalDetails,
      timestamp: new Date(),
      context,
      recoverable: true
    });
  }

  /**
   * Create a file handling error
   */
  static createFileError(
    message: string,
    technicalDetails: string,
    context?: Record<string, unknown>
  ): AppError {
    return new AppError({
      category: ErrorCategory.FILE_HANDLING,
      severity: ErrorSeverity.MEDIUM,
      userMessage: message,
      technicalDetails,
      timestamp: new Date(),
      context,
      recoverable: true,
      suggestedAction: this.getFileErrorSuggestion(technicalDetails)
    });
  }

  /**
   * Create an unexpected error
   */
  static createUnexpectedError(
    error: unknown,
    context?: Record<string, unknown>
  ): AppError {
    const message = error instanceof Error ? error.message : String(error);
    return new AppError({
      category: ErrorCategory.UNEXPECTED,
      severity: ErrorSeverity.CRITICAL,
      userMessage: 'An unexpected error occurred.',
      technicalDetails: message,
      timestamp: new Date(),
      context,
      recoverable: false
    });
  }

  /**
   * Wrap anything thrown into an AppError, keeping AppErrors as they are
   */
  static normalize(error: unknown, context?: Record<string, unknown>): AppError {
    if (error instanceof AppError) {
      return error;
    }
    return this.createUnexpectedError(error, context);
  }

  /**
   * Get a readable message for display
   */
  static getUserMessage(error: unknown): string {
    if (error instanceof AppError) {
      return error.technicalDetails
        ? `${error.userMessage} (${error.technicalDetails})`
        : error.userMessage;
    }
    if (error instanceof Error) {
      return error.message;
    }
    return String(error);
  }

  private static getFileErrorSuggestion(technicalDetails: string): string {
    if (technicalDetails.includes('EACCES') || technicalDetails.includes('EPERM')) {
      return 'Check that the output directory is writable.';
    }
    if (technicalDetails.includes('ENOSPC')) {
      return 'Free some disk space and try again.';
    }
    return 'Check the output path and try again.';
  }
}
