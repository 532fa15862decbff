import chalk from 'chalk';

export enum LogLevel {
  DEBUG = 0,
  INFO = 1,
  WARN = 2,
  ERROR = 3,
  SILENT = 4,
}

export function parseLogLevel(raw: string | undefined, fallback: LogLevel = LogLevel.INFO): LogLevel {
  switch ((raw ?? '').trim().toLowerCase()) {
    case 'debug':
      return LogLevel.DEBUG;
    case 'info':
      return LogLevel.INFO;
    case 'warn':
    case 'warning':
      return LogLevel.WARN;
    case 'error':
      return LogLevel.ERROR;
    case 'silent':
    case 'off':
      return LogLevel.SILENT;
    default:
      return fallback;
  }
}

const PREFIX = '[sastweave]';

// All diagnostics go to stderr; stdout is reserved for command output (--list-engines).
export class Logger {
  private static level: LogLevel = parseLogLevel(process.env.SASTWEAVE_LOG_LEVEL);

  static setLevel(level: LogLevel) {
    this.level = level;
  }

  static getLevel(): LogLevel {
    return this.level;
  }

  static info(message: string) {
    if (this.level <= LogLevel.INFO) {
      console.error(`${chalk.dim(PREFIX)} ${chalk.blue('info:')} ${message}`);
    }
  }

  static warn(message: string) {
    if (this.level <= LogLevel.WARN) {
      console.warn(`${chalk.dim(PREFIX)} ${chalk.yellow('warn:')} ${message}`);
    }
  }

  static error(message: string, error?: unknown) {
    if (this.level <= LogLevel.ERROR) {
      console.error(`${chalk.dim(PREFIX)} ${chalk.red('error:')} ${message}`);
      if (error instanceof Error && this.level <= LogLevel.DEBUG && error.stack) {
        console.error(error.stack);
      }
    }
  }

  static debug(message: string) {
    if (this.level <= LogLevel.DEBUG) {
      console.error(`${chalk.dim(PREFIX)} ${chalk.dim('debug:')} ${message}`);
    }
  }
}
