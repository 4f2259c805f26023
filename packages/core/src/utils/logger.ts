import { pino, type Logger, type LoggerOptions } from 'pino';
import type { AppConfig } from './config.js';
import { cfg } from './config.js';

/**
 * Logger configuration and setup for Threadtree
 *
 * Structured JSON on stderr, pretty-printed in development, quiet under test.
 */

/**
 * Logger factory for creating configured logger instances
 */
export class LoggerFactory {
  private readonly appConfig: AppConfig;
  private readonly mainLogger: Logger;

  constructor(appConfig: AppConfig) {
    this.appConfig = appConfig;
    const options = this.createLoggerOptions();
    // pino refuses a destination stream next to a transport; the transport writes to stderr itself
    this.mainLogger = options.transport ? pino(options) : pino(options, process.stderr);
  }

  private createLoggerOptions(): LoggerOptions {
    const isDevelopment = this.appConfig.NODE_ENV === 'development';
    const isTest = this.appConfig.NODE_ENV === 'test';

    const baseOptions: LoggerOptions = {
      level: isTest ? 'warn' : this.appConfig.LOG_LEVEL,
      base: {
        pid: process.pid,
        hostname: process.env.HOSTNAME || 'unknown',
      },
      timestamp: pino.stdTimeFunctions.isoTime,
      formatters: {
        level: (label: string) => ({ level: label }),
      },
    };

    if (isDevelopment) {
      return {
        ...baseOptions,
        transport: {
          target: 'pino-pretty',
          options: {
            colorize: true,
            translateTime: 'yyyy-mm-dd HH:MM:ss',
            ignore: 'pid,hostname',
            singleLine: false,
            destination: 2, // stderr
          },
        },
      };
    }

    return baseOptions;
  }

  getLogger(): Logger {
    return this.mainLogger;
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

export function createLoggerFactory(appConfig: AppConfig): LoggerFactory {
  return new LoggerFactory(appConfig);
}

/**
 * Main library logger. Always writes to stderr so stdout stays free for
 * printed traversals.
 */
export const logger = defaultFactory.getLogger();

export function createModuleLogger(moduleName: string): Logger {
  return defaultFactory.createModuleLogger(moduleName);
}

/**
 * Error logging utility with stack trace handling
 *
 * @param context - Additional context about the error
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

  if (error.cause !== undefined) {
    errorInfo.cause = error.cause;
  }

  logger.error(
    {
      ...context,
      error: errorInfo,
    },
    error.message
  );
}

export default logger;
