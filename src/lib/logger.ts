import chalk from 'chalk';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent';

export const LOG_LEVELS: readonly LogLevel[] = ['debug', 'info', 'warn', 'error', 'silent'];

const LEVEL_RANK: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: 100,
};

export function isLogLevel(value: string): value is LogLevel {
  return LOG_LEVELS.some((level) => level === value);
}

/**
 * Levelled console logger. Everything goes to stderr so stdout stays
 * reserved for command results.
 */
export class Logger {
  private readonly level: LogLevel;
  private readonly write: (line: string) => void;

  constructor(level: LogLevel = 'info', write: (line: string) => void = (line) => console.error(line)) {
    this.level = level;
    this.write = write;
  }

  debug(message: string): void {
    this.log('debug', chalk.dim(`[debug] ${message}`));
  }

  info(message: string): void {
    this.log('info', chalk.blue(message));
  }

  success(message: string): void {
    this.log('info', chalk.green(message));
  }

  warn(message: string): void {
    this.log('warn', chalk.yellow(`⚠️  ${message}`));
  }

  error(message: string): void {
    this.log('error', chalk.red(message));
  }

  isEnabled(level: LogLevel): boolean {
    return LEVEL_RANK[level] >= LEVEL_RANK[this.level];
  }

  private log(level: LogLevel, line: string): void {
    if (this.isEnabled(level)) {
      this.write(line);
    }
  }
}

export const silentLogger = new Logger('silent');
