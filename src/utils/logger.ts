/**
 * Levelled console logging.
 *
 * INFO and DEBUG go to stdout; WARN and ERROR go to stderr.
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

/**
 * Simple logger for the promote-branch CLI.
 */
class Logger {
  private level: LogLevel = 'info';
  private prefix: string = '';

  setLevel(level: LogLevel): void {
    this.level = level;
  }

  private shouldLog(level: LogLevel): boolean {
    return LOG_LEVELS[level] >= LOG_LEVELS[this.level];
  }

  private formatMessage(message: string): string {
    return this.prefix ? `[${this.prefix}] ${message}` : message;
  }

  debug(message: string, data?: Record<string, unknown>): void {
    if (!this.shouldLog('debug')) return;
    const formatted = this.formatMessage(message);
    console.log(chalk.gray(`[DEBUG] ${formatted}`));
    if (data) {
      console.log(chalk.gray(JSON.stringify(data, null, 2)));
    }
  }

  info(message: string): void {
    if (!this.shouldLog('info')) return;
    console.log(chalk.blue(`[INFO] ${this.formatMessage(message)}`));
  }

  warn(message: string): void {
    if (!this.shouldLog('warn')) return;
    console.error(chalk.yellow(`[WARN] ${this.formatMessage(message)}`));
  }

  /**
   * Log an error. Extra lines (a file list, git's stderr) are each
   * printed with the same prefix.
   */
  error(message: string, lines: readonly string[] = []): void {
    if (!this.shouldLog('error')) return;
    console.error(chalk.red(`[ERROR] ${this.formatMessage(message)}`));
    for (const line of lines) {
      console.error(chalk.red(`[ERROR]   ${line}`));
    }
  }

  /**
   * Log a success message (shown unless level is above info).
   */
  success(message: string): void {
    if (!this.shouldLog('info')) return;
    console.log(chalk.green(`[INFO] ${this.formatMessage(message)}`));
  }

  /**
   * Create a child logger with a prefix.
   */
  child(prefix: string): Logger {
    const child = new Logger();
    child.level = this.level;
    child.prefix = this.prefix ? `${this.prefix}:${prefix}` : prefix;
    return child;
  }
}

// Singleton instance
export const logger = new Logger();

export { Logger };
