/**
 * Logging utility powered by electron-log
 *
 * Outside Electron, electron-log selects its Node.js logger, so the same
 * transports and scopes are available to the CLI and the test runner.
 *
 * Features:
 * - Colored console output in development, minimal output in production
 * - Optional file logging with rotation (5MB per file)
 * - Namespaced loggers per module
 * - Performance timing utilities
 *
 * Usage:
 * ```typescript
 * import { logger } from '@/utils/logger';
 *
 * const log = logger.namespace('LinkFindReplace');
 * log.debug('Detailed info');  // Only in development
 * log.info('Important event');
 * log.warn('Warning message');
 * log.error('Error occurred', error);
 *
 * const timer = startTimer('Bulk replace');
 * // ... do work ...
 * timer.end();
 * ```
 */

import electronLog from 'electron-log';

export type LogLevel = 'error' | 'warn' | 'info' | 'debug' | 'verbose' | 'silly';

const isDevelopment = process.env.NODE_ENV !== 'production';
const isTest = process.env.NODE_ENV === 'test';

// File logging stays off until initializeLogging() is given a path
electronLog.transports.file.level = false;
electronLog.transports.file.maxSize = 5 * 1024 * 1024; // 5MB per file
electronLog.transports.file.format = '[{y}-{m}-{d} {h}:{i}:{s}.{ms}] [{level}]{scope} {text}';
electronLog.transports.console.level = isDevelopment ? 'debug' : 'warn';

if (isDevelopment) {
  electronLog.transports.console.format = '[{h}:{i}:{s}.{ms}] [{level}]{scope} {text}';
  electronLog.transports.console.useStyles = true;
} else {
  electronLog.transports.console.format = '[{level}]{scope} {text}';
}

// Only errors reach the console under test
if (isTest) {
  electronLog.transports.console.level = 'error';
}

export interface ScopedLogger {
  debug(message: string, ...args: unknown[]): void;
  info(message: string, ...args: unknown[]): void;
  warn(message: string, ...args: unknown[]): void;
  error(message: string, ...args: unknown[]): void;
  verbose(message: string, ...args: unknown[]): void;
}

/**
 * Create a scoped logger for a specific module
 */
function createScopedLogger(scope: string): ScopedLogger {
  const scopedLog = electronLog.scope(scope);

  return {
    /**
     * Debug level - only enabled in development
     */
    debug(message: string, ...args: unknown[]): void {
      if (isDevelopment && !isTest) {
        scopedLog.debug(message, ...args);
      }
    },

    info(message: string, ...args: unknown[]): void {
      if (!isTest) {
        scopedLog.info(message, ...args);
      }
    },

    warn(message: string, ...args: unknown[]): void {
      if (!isTest) {
        scopedLog.warn(message, ...args);
      }
    },

    /**
     * Error level - always enabled
     */
    error(message: string, ...args: unknown[]): void {
      scopedLog.error(message, ...args);
    },

    verbose(message: string, ...args: unknown[]): void {
      if (isDevelopment && !isTest) {
        scopedLog.verbose(message, ...args);
      }
    },
  };
}

/**
 * Main logger export with utility methods
 */
export const logger = {
  debug(message: string, ...args: unknown[]): void {
    if (isDevelopment && !isTest) {
      electronLog.debug(message, ...args);
    }
  },

  info(message: string, ...args: unknown[]): void {
    if (!isTest) {
      electronLog.info(message, ...args);
    }
  },

  warn(message: string, ...args: unknown[]): void {
    if (!isTest) {
      electronLog.warn(message, ...args);
    }
  },

  error(message: string, ...args: unknown[]): void {
    electronLog.error(message, ...args);
  },

  /**
   * Create a namespaced logger for specific modules
   *
   * @example
   * const log = logger.namespace('DependencyGraphBuilder');
   * log.info('Graph built');
   */
  namespace(name: string): ScopedLogger {
    return createScopedLogger(name);
  },

  /**
   * Set console log level at runtime
   */
  setLevel(level: LogLevel | false): void {
    electronLog.transports.console.level = level;
  },

  /**
   * Send console output to stderr so stdout carries only command results
   */
  useStderr(): void {
    electronLog.transports.console.writeFn = ({ message }) => {
      console.error(...message.data);
    };
  },

  /**
   * Route log output to a file (5MB rotation), or disable file logging
   */
  setLogFile(filePath: string | undefined): void {
    if (!filePath) {
      electronLog.transports.file.level = false;
      return;
    }
    electronLog.transports.file.resolvePathFn = () => filePath;
    electronLog.transports.file.level = 'info';
  },
};

/**
 * Performance measurement utility
 *
 * @example
 * const timer = startTimer('Dependency graph');
 * buildDependencies(root, files, linkData);
 * timer.end(); // Logs: "Dependency graph took 12ms"
 */
export function startTimer(operationName: string) {
  const start = performance.now();
  const log = logger.namespace('Timer');

  return {
    end(): number {
      const duration = Math.round(performance.now() - start);
      log.debug(`${operationName} took ${duration}ms`);
      return duration;
    },
  };
}

/**
 * Apply configured levels and file path (call once from an entry point)
 */
export function initializeLogging(options: { logLevel?: LogLevel; logFile?: string }): void {
  if (options.logLevel && !isTest) {
    logger.setLevel(options.logLevel);
  }
  logger.setLogFile(options.logFile);

  const log = logger.namespace('Logger');
  log.debug(`Environment: ${process.env.NODE_ENV || 'development'}`);
  log.debug(`Log file: ${options.logFile ?? '(disabled)'}`);
}

export default logger;
