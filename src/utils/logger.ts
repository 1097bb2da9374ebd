/**
 * Centralized logging utility for diagnostics
 *
 * Everything goes to stderr so that CLI commands can keep stdout for their
 * actual output (rendered JSON, token reports).
 */

import chalk from 'chalk';

export enum LogLevel {
  DEBUG = 0,
  INFO = 1,
  WARN = 2,
  ERROR = 3,
  SILENT = 99,
}

export interface LoggerConfig {
  level: LogLevel;
  useTimestamps: boolean;
  useColors: boolean;
}

const LEVEL_NAMES: Record<string, LogLevel> = {
  debug: LogLevel.DEBUG,
  info: LogLevel.INFO,
  warn: LogLevel.WARN,
  error: LogLevel.ERROR,
  silent: LogLevel.SILENT,
};

/**
 * Parse a level name such as "debug" or "WARN". Unknown names yield undefined.
 */
export function parseLogLevel(name: string | undefined): LogLevel | undefined {
  if (!name) return undefined;
  return LEVEL_NAMES[name.trim().toLowerCase()];
}

export const DEFAULT_LOGGER_CONFIG: LoggerConfig = {
  level: parseLogLevel(process.env.REPLYFORGE_LOG_LEVEL) ?? LogLevel.INFO,
  useTimestamps: false,
  useColors: true,
};

export class Logger {
  private config: LoggerConfig;

  constructor(config: Partial<LoggerConfig> = {}) {
    this.config = { ...DEFAULT_LOGGER_CONFIG, ...config };
  }

  setLevel(level: LogLevel): void {
    this.config.level = level;
  }

  getLevel(): LogLevel {
    return this.config.level;
  }

  shouldLog(level: LogLevel): boolean {
    return level >= this.config.level;
  }

  private write(message: string, level: LogLevel): void {
    if (!this.shouldLog(level)) {
      return;
    }

    const timestamp = this.config.useTimestamps
      ? chalk.dim(`[${new Date().toISOString()}] `)
      : '';

    process.stderr.write(timestamp + message + '\n');
  }

  private format(message: string, colorFn: (str: string) => string): string {
    if (this.config.useColors) {
      return colorFn(message);
    }
    return message;
  }

  debug(message: string): void {
    this.write(this.format(message, chalk.gray), LogLevel.DEBUG);
  }

  info(message: string): void {
    this.write(this.format(message, chalk.white), LogLevel.INFO);
  }

  success(message: string): void {
    this.write(this.format(message, chalk.green), LogLevel.INFO);
  }

  warn(message: string): void {
    this.write(this.format(message, chalk.yellow), LogLevel.WARN);
  }

  error(message: string): void {
    this.write(this.format(message, chalk.red), LogLevel.ERROR);
  }
}

/**
 * Global logger instance
 */
export const logger = new Logger();

export const log = {
  debug: (message: string) => logger.debug(message),
  info: (message: string) => logger.info(message),
  success: (message: string) => logger.success(message),
  warn: (message: string) => logger.warn(message),
  error: (message: string) => logger.error(message),
  setLevel: (level: LogLevel) => logger.setLevel(level),
};
