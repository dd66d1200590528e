/**
 * Logger Configuration
 *
 * pino logger with environment-aware formatting:
 * - Development: pretty-printed, colorized output
 * - Production: JSON lines
 * - Test: silent unless LOG_LEVEL says otherwise
 *
 * Usage:
 *   import { loggers } from './logging/logger';
 *   loggers.charts.info({ outputPath }, 'Chart written');
 */

import pino, { Logger, LoggerOptions } from 'pino';
import { config } from '../config';
import { AppError, ErrorLogger } from '../../shared/errors';

// =============================================================================
// Configuration
// =============================================================================

const baseOptions: LoggerOptions = {
  level: config.runtime.logLevel,
  base: {
    pid: process.pid,
    env: config.runtime.nodeEnv,
  },
  timestamp: pino.stdTimeFunctions.isoTime,
};

const developmentOptions: LoggerOptions = {
  ...baseOptions,
  transport: {
    target: 'pino-pretty',
    options: {
      colorize: true,
      translateTime: 'SYS:HH:MM:ss.l',
      ignore: 'pid,hostname,env',
      messageFormat: '{msg}',
      // stdout carries the run report
      destination: 2,
    },
  },
};

const productionOptions: LoggerOptions = {
  ...baseOptions,
  formatters: {
    level: (label) => ({ level: label }),
  },
};

// =============================================================================
// Logger Instance
// =============================================================================

export const logger: Logger = config.runtime.isDevelopment
  ? pino(developmentOptions)
  : pino(productionOptions, pino.destination(2));

/**
 * Create a child logger for a specific component
 *
 * @example
 * const graphLogger = createComponentLogger('graph');
 * graphLogger.debug({ nodes: 19 }, 'Layout computed');
 */
export function createComponentLogger(component: string): Logger {
  return logger.child({ component });
}

export const loggers = {
  /** Data loading and validation */
  data: createComponentLogger('data'),
  /** Figure construction and HTML output */
  charts: createComponentLogger('charts'),
  /** Graph layout and metrics */
  graph: createComponentLogger('graph'),
  /** Command line entry point */
  cli: createComponentLogger('cli'),
};

// =============================================================================
// Utility Functions
// =============================================================================

/**
 * Serialize an error for structured logging
 */
export function serializeError(err: unknown): Record<string, unknown> {
  if (err instanceof AppError) {
    return {
      type: err.name,
      message: err.message,
      category: err.category,
      severity: err.severity,
      technicalDetails: err.technicalDetails,
      context: err.context,
      recoverable: err.recoverable,
    };
  }
  if (err instanceof Error) {
    return {
      type: err.constructor.name,
      message: err.message,
      stack: config.runtime.isDevelopment ? err.stack : undefined,
    };
  }
  return { message: String(err) };
}

/**
 * Record an error for the run summary and log it
 */
export function logError(
  log: Logger,
  error: AppError | Error,
  message: string,
  context?: Record<string, unknown>
): void {
  ErrorLogger.logError(error);
  log.error({ ...context, err: serializeError(error) }, message);
}

export default logger;
