/**
 * Structured logging utility with log levels
 *
 * Usage:
 *   import { createLogger } from '@/lib/logger';
 *   const log = createLogger('HotReload');
 *   log.debug('Details here', { data });
 *   log.info('Preset activated');
 *   log.warn('Frame dropped');
 *   log.error('Reload failed', error);
 */

import { config, type LogLevelName } from './config';

export enum LogLevel {
  DEBUG = 0,
  INFO = 1,
  WARN = 2,
  ERROR = 3,
  SILENT = 4,
}

const LEVELS_BY_NAME: Record<LogLevelName, LogLevel> = {
  debug: LogLevel.DEBUG,
  info: LogLevel.INFO,
  warn: LogLevel.WARN,
  error: LogLevel.ERROR,
  silent: LogLevel.SILENT,
};

interface LoggerConfig {
  prefix: string;
}

/** Shared by every logger so `setLogLevel` reaches children created earlier. */
const rootState = {
  level: LEVELS_BY_NAME[config.logLevel],
};

export class Logger {
  private config: LoggerConfig;

  constructor(config?: Partial<LoggerConfig>) {
    this.config = {
      prefix: '',
      ...config,
    };
  }

  private shouldLog(level: LogLevel): boolean {
    return level >= rootState.level;
  }

  private formatMessage(message: string): string {
    return this.config.prefix ? `[${this.config.prefix}] ${message}` : message;
  }

  debug(message: string, ...args: unknown[]): void {
    if (this.shouldLog(LogLevel.DEBUG)) {
      console.log(this.formatMessage(message), ...args);
    }
  }

  info(message: string, ...args: unknown[]): void {
    if (this.shouldLog(LogLevel.INFO)) {
      console.info(this.formatMessage(message), ...args);
    }
  }

  warn(message: string, ...args: unknown[]): void {
    if (this.shouldLog(LogLevel.WARN)) {
      console.warn(this.formatMessage(message), ...args);
    }
  }

  error(message: string, ...args: unknown[]): void {
    if (this.shouldLog(LogLevel.ERROR)) {
      console.error(this.formatMessage(message), ...args);
    }
  }

  /**
   * Create a child logger with a nested prefix
   */
  child(prefix: string): Logger {
    return new Logger({
      prefix: this.config.prefix ? `${this.config.prefix}:${prefix}` : prefix,
    });
  }
}

const logger = new Logger();

/**
 * Change the level of every logger at runtime
 */
export function setLogLevel(level: LogLevel | LogLevelName): void {
  rootState.level = typeof level === 'string' ? LEVELS_BY_NAME[level] : level;
}

export function getLogLevel(): LogLevel {
  return rootState.level;
}

/**
 * Factory for creating module-specific loggers
 *
 * @example
 * const log = createLogger('FrameScheduler');
 * log.debug('Holding frame', { elapsed });
 */
export function createLogger(module: string): Logger {
  return logger.child(module);
}
