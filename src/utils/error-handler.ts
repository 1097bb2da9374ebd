/**
 * Centralized error handler with stack trace logging
 * Shared by the CLI commands and the top-level entry point
 */

import chalk from 'chalk';
import { LogLevel, logger } from './logger.js';

export interface ErrorHandlingOptions {
  /** Whether to include full stack trace */
  includeStack?: boolean;
  /** Log level to use (default: ERROR) */
  logLevel?: LogLevel;
  /** Custom context message */
  context?: string;
  /** Whether to exit the process (default: false) */
  exitProcess?: boolean;
  /** Exit code (default: 1) */
  exitCode?: number;
  /** Whether to suppress output */
  silent?: boolean;
}

/**
 * Error carrying the place it was raised from and the error it wraps
 */
export class HandledError extends Error {
  constructor(
    message: string,
    public readonly context?: string,
    public readonly originalError?: unknown
  ) {
    super(message);
    this.name = 'HandledError';
  }
}

export class ErrorHandler {
  private static formatError(error: unknown, options: ErrorHandlingOptions): string {
    const output: string[] = [];

    if (options.context) {
      output.push(chalk.red.bold(`Error in ${options.context}:`));
    }

    output.push(chalk.red(this.getErrorMessage(error)));

    const stackTrace = this.getStackTrace(error);
    if (options.includeStack && stackTrace) {
      output.push('');
      output.push(chalk.dim('Stack trace:'));
      output.push(chalk.gray(stackTrace));
    }

    output.push('');

    return output.join('\n');
  }

  /**
   * Handle an error with consistent logging and optional stack trace
   */
  static handle(error: unknown, options: ErrorHandlingOptions = {}): void {
    const {
      includeStack = process.env.NODE_ENV === 'development' || !!process.env.DEBUG,
      logLevel = LogLevel.ERROR,
      context,
      exitProcess = false,
      exitCode = 1,
      silent = false,
    } = options;

    if (!silent) {
      process.stderr.write(this.formatError(error, { includeStack, context }));

      const line = `[${context || 'ErrorHandler'}] ${this.getErrorMessage(error)}`;
      if (logLevel === LogLevel.DEBUG) {
        logger.debug(line);
      } else if (logLevel === LogLevel.WARN) {
        logger.warn(line);
      } else {
        logger.error(line);
      }
    }

    if (exitProcess) {
      process.exit(exitCode);
    }
  }

  static getErrorMessage(error: unknown): string {
    if (error instanceof Error) {
      return error.message;
    }
    return String(error);
  }

  static getStackTrace(error: unknown): string | undefined {
    if (error instanceof Error) {
      return error.stack;
    }
    return undefined;
  }
}

export function handleError(error: unknown, options?: ErrorHandlingOptions): void {
  ErrorHandler.handle(error, options);
}
