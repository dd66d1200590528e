/**
 * Error Logger
 * 
 * Keeps the errors raised during a run so they can be summarised at the end.
 */

import { ErrorInfo, AppError, ErrorCategory, ErrorSeverity } from './types';

/**
 * Error logger class for managing error logs
 */
export class ErrorLogger {
  private static logs: ErrorInfo[] = [];
  private static maxLogs = 1000;

  /**
   * Record an error
   */
  static logError(error: AppError | Error): void {
    const errorInfo: ErrorInfo = error instanceof AppError
      ? {
          category: error.category,
          severity: error.severity,
          userMessage: error.userMessage,
          technicalDetails: error.technicalDetails,
          timestamp: error.timestamp,
          context: error.context,
          recoverable: error.recoverable,
          suggestedAction: error.suggestedAction
        }
      : {
          category: ErrorCategory.UNEXPECTED,
          severity: ErrorSeverity.CRITICAL,
          userMessage: 'An unexpected error occurred',
          technicalDetails: error.message,
          timestamp: new Date(),
          recoverable: false
        };

    this.logs.push(errorInfo);

    // Keep only the most recent logs
    if (this.logs.length > this.maxLogs) {
      this.logs = this.logs.slice(-this.maxLogs);
    }
  }

  /**
   * Get all logged errors
   */
  static getLogs(): ErrorInfo[] {
    return [...this.logs];
  }

  /**
   * Clear error logs
   */
  static clearLogs(): void {
    this.logs = [];
  }
}
