/**
 * Leveled console logger for the CLI and the migration pipelines.
 * Debug and info lines go to stdout; warnings and errors to stderr.
 */
import chalk from 'chalk';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent';

const LOG_LEVELS: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
  silent: 4,
};

class Logger {
  private level: LogLevel = 'info';

  /**
   * @param prefix - shown in brackets before every message, e.g. the file
   * being migrated
   */
  constructor(private readonly prefix = '') {}

  setLevel(level: LogLevel): void {
    this.level = level;
  }

  debug(message: string): void {
    if (this.enabled('debug')) console.log(chalk.gray(`[DEBUG] ${this.format(message)}`));
  }

  info(message: string): void {
    if (this.enabled('info')) console.log(chalk.blue(`[INFO] ${this.format(message)}`));
  }

  warn(message: string): void {
    if (this.enabled('warn')) console.warn(chalk.yellow(`[WARN] ${this.format(message)}`));
  }

  error(message: string): void {
    if (this.enabled('error')) console.error(chalk.red(`[ERROR] ${this.format(message)}`));
  }

  /**
   * Logger for one unit of work. Prefixes nest (`parent:child`) and the
   * child starts at the parent's current level.
   */
  child(prefix: string): Logger {
    const child = new Logger(this.prefix ? `${this.prefix}:${prefix}` : prefix);
    child.level = this.level;
    return child;
  }

  private enabled(level: LogLevel): boolean {
    return LOG_LEVELS[level] >= LOG_LEVELS[this.level];
  }

  private format(message: string): string {
    return this.prefix ? `[${this.prefix}] ${message}` : message;
  }
}

export const logger = new Logger();

export { Logger };
