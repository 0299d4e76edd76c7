import chalk from 'chalk';

export enum LogLevel {
  DEBUG = 'DEBUG',
  INFO = 'INFO',
  WARN = 'WARN',
  ERROR = 'ERROR',
  SUCCESS = 'SUCCESS'
}

const LEVEL_ORDER = [LogLevel.DEBUG, LogLevel.INFO, LogLevel.WARN, LogLevel.ERROR, LogLevel.SUCCESS];

export function parseLogLevel(value: string): LogLevel | undefined {
  const upper = value.trim().toUpperCase();
  return LEVEL_ORDER.find(level => level === upper);
}

/**
 * Logger view bound to a scope. Every line it writes carries `[scope]`
 * after the level tag; level filtering is shared with the root logger.
 */
export interface ScopedLogger {
  debug(message: string, ...args: unknown[]): void;
  info(message: string, ...args: unknown[]): void;
  warn(message: string, ...args: unknown[]): void;
  error(message: string, error?: unknown, ...args: unknown[]): void;
  success(message: string, ...args: unknown[]): void;
}

class Logger {
  private static instance: Logger;
  private logLevel: LogLevel = LogLevel.INFO;

  private constructor() {}

  static getInstance(): Logger {
    if (!Logger.instance) {
      Logger.instance = new Logger();
    }
    return Logger.instance;
  }

  setLogLevel(level: LogLevel) {
    this.logLevel = level;
  }

  getLogLevel(): LogLevel {
    return this.logLevel;
  }

  child(scope: string): ScopedLogger {
    const tag = chalk.magenta(`[${scope}]`);
    return {
      debug: (message, ...args) => this.log(LogLevel.DEBUG, `${tag} ${message}`, ...args),
      info: (message, ...args) => this.log(LogLevel.INFO, `${tag} ${message}`, ...args),
      warn: (message, ...args) => this.log(LogLevel.WARN, `${tag} ${message}`, ...args),
      error: (message, error, ...args) => this.error(`${tag} ${message}`, error, ...args),
      success: (message, ...args) => this.log(LogLevel.SUCCESS, `${tag} ${message}`, ...args),
    };
  }

  debug(message: string, ...args: unknown[]) {
    this.log(LogLevel.DEBUG, message, ...args);
  }

  info(message: string, ...args: unknown[]) {
    this.log(LogLevel.INFO, message, ...args);
  }

  warn(message: string, ...args: unknown[]) {
    this.log(LogLevel.WARN, message, ...args);
  }

  error(message: string, error?: unknown, ...args: unknown[]) {
    this.log(LogLevel.ERROR, message, ...args);
    if (error instanceof Error) {
      console.error(chalk.red(error.stack || error.message));
    } else if (error) {
      console.error(chalk.red(JSON.stringify(error, null, 2)));
    }
  }

  success(message: string, ...args: unknown[]) {
    this.log(LogLevel.SUCCESS, message, ...args);
  }

  private log(level: LogLevel, message: string, ...args: unknown[]) {
    const currentLevelIndex = LEVEL_ORDER.indexOf(this.logLevel);
    const messageLevelIndex = LEVEL_ORDER.indexOf(level);

    if (messageLevelIndex < currentLevelIndex && level !== LogLevel.SUCCESS) {
      return;
    }

    const timestamp = new Date().toISOString();
    const prefix = this.getPrefix(level);
    const formattedMessage = `${chalk.gray(timestamp)} ${prefix} ${message}`;

    console.log(formattedMessage, ...args);
  }

  private getPrefix(level: LogLevel): string {
    switch (level) {
      case LogLevel.DEBUG:
        return chalk.gray('[DEBUG]');
      case LogLevel.INFO:
        return chalk.blue('[INFO]');
      case LogLevel.WARN:
        return chalk.yellow('[WARN]');
      case LogLevel.ERROR:
        return chalk.red('[ERROR]');
      case LogLevel.SUCCESS:
        return chalk.green('[SUCCESS]');
      default:
        return '';
    }
  }
}

export const logger = Logger.getInstance();
