import { pino, type Logger, type LoggerOptions } from 'pino';
import type { AppConfig } from './config.js';
import { cfg } from './config.js';

/**
 * Logger configuration and setup for Treeloom
 *
 * - Pretty-printed output in development
 * - JSON output in production
 * - Warn-level output under tests and in CLI mode
 */

/**
 * Create logger options based on environment
 */
export function createLoggerOptions(appConfig: AppConfig): LoggerOptions {
  const isDevelopment = appConfig.NODE_ENV === 'development';
  const isTest = appConfig.NODE_ENV === 'test';

  // CLI output goes to the terminal; keep it to warnings and errors
  const logLevel = isTest || appConfig.CLI_MODE ? 'warn' : appConfig.LOG_LEVEL;

  const baseOptions: LoggerOptions = {
    level: logLevel,
    base: {
      pid: process.pid,
      hostname: process.env['HOSTNAME'] || 'unknown',
    },
    timestamp: pino.stdTimeFunctions.isoTime,
    formatters: {
      level: (label: string) => ({ level: label }),
    },
  };

  if (isDevelopment && !appConfig.CLI_MODE) {
    return {
      ...baseOptions,
      transport: {
        target: 'pino-pretty',
        options: {
          colorize: true,
          translateTime: 'yyyy-mm-dd HH:MM:ss',
          ignore: 'pid,hostname',
          destination: 2, // stderr
        },
      },
    };
  }

  return baseOptions;
}

/**
 * Logger factory for creating configured logger instances
 */
export class LoggerFactory {
  private readonly mainLogger: Logger;

  constructor(appConfig: AppConfig) {
    const options = createLoggerOptions(appConfig);
    // pino takes either a transport or a destination stream, not both
    this.mainLogger = options.transport ? pino(options) : pino(options, process.stderr);
  }

  /**
   * Create a module-specific logger
   *
   * @param moduleName - Name of the module/component
   */
  createModuleLogger(moduleName: string): Logger {
    return this.mainLogger.child({ module: moduleName });
  }
}

const defaultFactory = new LoggerFactory(cfg);

export function createModuleLogger(moduleName: string): Logger {
  return defaultFactory.createModuleLogger(moduleName);
}

/**
 * Performance timing utility
 *
 * @returns Function to call when the operation completes
 */
export function startTimer(
  logger: Logger,
  operation: string
): (result?: Record<string, unknown>) => void {
  const start = process.hrtime.bigint();

  return (result: Record<string, unknown> = {}) => {
    const duration = Number(process.hrtime.bigint() - start) / 1_000_000;

    logger.debug(
      {
        operation,
        duration: `${duration.toFixed(2)}ms`,
        ...result,
      },
      `${operation} completed in ${duration.toFixed(2)}ms`
    );
  };
}

/**
 * Error logging utility with stack trace handling
 */
export function logError(
  logger: Logger,
  error: Error | string,
  context: Record<string, unknown> = {}
): void {
  if (typeof error === 'string') {
    logger.error(context, error);
    return;
  }

  const errorInfo: Record<string, unknown> = {
    name: error.name,
    message: error.message,
    stack: error.stack,
  };

  if ('cause' in error && error.cause !== undefined) {
    errorInfo['cause'] = error.cause;
  }

  logger.error(
    {
      ...context,
      error: errorInfo,
    },
    error.message
  );
}
