import * as fs from 'fs-extra';
import * as path from 'path';
import chalk from 'chalk';

// Log levels
export enum LogLevel {
  ERROR = 'error',
  INFO = 'info',
  VERBOSE = 'verbose'
}

export interface LoggerConfig {
  verbose: boolean;
  logLevel: LogLevel;
  // File logging is off unless a directory is given
  logsDir?: string | undefined;
}

const LEVEL_ORDER = [LogLevel.ERROR, LogLevel.INFO, LogLevel.VERBOSE];

const LEVELS_BY_NAME: Record<'error' | 'info' | 'verbose', LogLevel> = {
  error: LogLevel.ERROR,
  info: LogLevel.INFO,
  verbose: LogLevel.VERBOSE
};

export function toLogLevel(name: 'error' | 'info' | 'verbose'): LogLevel {
  return LEVELS_BY_NAME[name];
}

class Logger {
  private config: LoggerConfig;

  constructor(config: LoggerConfig) {
    this.config = config;
    this.ensureLogsDirectory();
  }

  private ensureLogsDirectory(): void {
    if (!this.config.logsDir) return;
    try {
      fs.ensureDirSync(this.config.logsDir);
    } catch (error) {
      console.error('Failed to create logs directory:', error);
    }
  }

  private getTimestamp(): string {
    return new Date().toISOString();
  }

  private formatMessage(level: LogLevel, message: string): string {
    return `[${this.getTimestamp()}] [${level.toUpperCase()}] ${message}`;
  }

  private writeToFile(fileName: string, line: string): void {
    if (!this.config.logsDir) return;
    try {
      fs.appendFileSync(path.join(this.config.logsDir, fileName), line + '\n');
    } catch (error) {
      console.error(`Failed to write to ${fileName}:`, error);
    }
  }

  private shouldLog(level: LogLevel): boolean {
    return LEVEL_ORDER.indexOf(level) <= LEVEL_ORDER.indexOf(this.config.logLevel);
  }

  error(message: string, error?: Error): void {
    if (!this.shouldLog(LogLevel.ERROR)) return;

    const errorMessage = error ? `${message}: ${error.message}` : message;
    const formattedMessage = this.formatMessage(LogLevel.ERROR, errorMessage);

    console.error(chalk.red(formattedMessage));
    this.writeToFile(`${LogLevel.ERROR}.log`, formattedMessage);

    // errors.log always gets the stack; the console only in verbose mode
    const stack = error?.stack ? '\n' + error.stack : '';
    this.writeToFile('errors.log', `[${this.getTimestamp()}] ${errorMessage}${stack}`);
    if (stack && this.config.verbose) {
      console.error(chalk.gray(error?.stack));
    }
  }

  info(message: string): void {
    if (!this.shouldLog(LogLevel.INFO)) return;

    const formattedMessage = this.formatMessage(LogLevel.INFO, message);
    console.log(chalk.blue(formattedMessage));
    this.writeToFile(`${LogLevel.INFO}.log`, formattedMessage);
  }

  verbose(message: string): void {
    if (!this.config.verbose && !this.shouldLog(LogLevel.VERBOSE)) return;

    const formattedMessage = this.formatMessage(LogLevel.VERBOSE, message);
    console.log(chalk.gray(formattedMessage));
    this.writeToFile(`${LogLevel.VERBOSE}.log`, formattedMessage);
  }

  success(message: string): void {
    if (!this.shouldLog(LogLevel.INFO)) return;

    const formattedMessage = this.formatMessage(LogLevel.INFO, message);
    console.log(chalk.green(formattedMessage));
    this.writeToFile(`${LogLevel.INFO}.log`, formattedMessage);
  }

  warning(message: string): void {
    if (!this.shouldLog(LogLevel.INFO)) return;

    const formattedMessage = this.formatMessage(LogLevel.INFO, message);
    console.log(chalk.yellow(formattedMessage));
    this.writeToFile(`${LogLevel.INFO}.log`, formattedMessage);
  }
}

// Global logger instance
let globalLogger: Logger | null = null;

export function initializeLogger(config: LoggerConfig): Logger {
  globalLogger = new Logger(config);
  return globalLogger;
}

export function getLogger(): Logger {
  if (!globalLogger) {
    throw new Error('Logger not initialized. Call initializeLogger() first.');
  }
  return globalLogger;
}

// Convenience function for verbose logging
export function logVerbose(message: string): void {
  if (globalLogger) {
    globalLogger.verbose(message);
  }
}

export { Logger };
