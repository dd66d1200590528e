/**
 * Logger utility tests
 */

import { describe, it, expect, beforeEach, vi } from 'vitest';
import { createComponentLogger, logError, serializeError } from '../../portfolio/logging/logger';
import { ErrorHandler, ErrorLogger, ErrorCategory } from '../../shared/errors';

describe('serializeError', () => {
  it('should keep the structured fields of an AppError', () => {
    const error = ErrorHandler.createDataError('Bad table', 'roles: Required', { file: 'experience.json' });

    expect(serializeError(error)).toEqual({
      type: 'AppError',
      message: 'Bad table',
      category: ErrorCategory.DATA,
      severity: 'high',
      technicalDetails: 'roles: Required',
      context: { file: 'experience.json' },
      recoverable: false
    });
  });

  it('should name the class of plain errors', () => {
    expect(serializeError(new TypeError('bad'))).toMatchObject({ type: 'TypeError', message: 'bad' });
  });

  it('should stringify anything else', () => {
    expect(serializeError('oops')).toEqual({ message: 'oops' });
  });
});

describe('logError', () => {
  beforeEach(() => {
    ErrorLogger.clearLogs();
  });

  it('should record the error and log it at error level', () => {
    const log = createComponentLogger('test');
    const spy = vi.spyOn(log, 'error');
    const error = ErrorHandler.createRenderingError('Chart failed', 'No layout position');

    logError(log, error, 'Radar failed', { kind: 'radar' });

    expect(ErrorLogger.getLogs().map(log => log.category)).toEqual([ErrorCategory.RENDERING]);
    expect(spy).toHaveBeenCalledWith({ kind: 'radar', err: serializeError(error) }, 'Radar failed');
  });
});
