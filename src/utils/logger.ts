/**
 * Levelled console logging for the CLI.
 *
 * Everything goes to stderr; stdout carries only the rendered report so that
 * `--format json` output can be piped.
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

/** Environment variable that sets the initial level of the shared logger. */
export const LOG_LEVEL_ENV = 'PROPCHECK_LOG_LEVEL';

export function isLogLevel(value: string): value is LogLevel {
  return Object.hasOwn(LOG_LEVELS, value);
}

/**
 * Level named by `value`, or `fallback` when it names none.
 */
export function parseLogLevel(value: string | undefined, fallback: LogLevel = 'info'): LogLevel {
  const normalized = value?.trim().toLowerCase();
  return normalized && isLogLevel(normalized) ? normalized : fallback;
}

class Logger {
  private level: LogLevel;
  private prefix: string = '';

  constructor(level: LogLevel = 'info') {
    this.level = level;
  }

  setLevel(level: LogLevel): void {
    this.level = level;
  }

  getLevel(): LogLevel {
    return this.level;
  }

  setPrefix(prefix: string): void {
    this.prefix = prefix;
  }

  isEnabled(level: LogLevel): boolean {
    return level !== 'silent' && LOG_LEVELS[level] >= LOG_LEVELS[this.level];
  }

  debug(message: string, data?: Record<string, unknown>): void {
    this.write('debug', chalk.gray, `[DEBUG] ${this.withPrefix(message)}`, data);
  }

  info(message: string, data?: Record<string, unknown>): void {
    this.write('info', chalk.blue, `[INFO] ${this.withPrefix(message)}`, data);
  }

  warn(message: string, data?: Record<string, unknown>): void {
    this.write('warn', chalk.yellow, `[WARN] ${this.withPrefix(message)}`, data);
  }

  error(message: string, error?: Error | Record<string, unknown>): void {
    if (!this.isEnabled('error')) return;
    console.error(chalk.red(`[ERROR] ${this.withPrefix(message)}`));
    if (error instanceof Error) {
      console.error(chalk.red(error.stack ?? error.message));
    } else if (error) {
      console.error(chalk.red(JSON.stringify(error, null, 2)));
    }
  }

  success(message: string): void {
    this.write('info', chalk.green, `✓ ${message}`);
  }

  fail(message: string): void {
    this.write('info', chalk.red, `✗ ${message}`);
  }

  /**
   * Child logger with a nested prefix (`parent:child`). The level is copied
   * at creation time.
   */
  child(prefix: string): Logger {
    const child = new Logger(this.level);
    child.prefix = this.prefix ? `${this.prefix}:${prefix}` : prefix;
    return child;
  }

  private withPrefix(message: string): string {
    return this.prefix ? `[${this.prefix}] ${message}` : message;
  }

  private write(
    level: LogLevel,
    color: (text: string) => string,
    line: string,
    data?: Record<string, unknown>
  ): void {
    if (!this.isEnabled(level)) return;
    console.error(color(line));
    if (data) {
      console.error(color(JSON.stringify(data, null, 2)));
    }
  }
}

export const logger = new Logger(parseLogLevel(process.env[LOG_LEVEL_ENV]));

export { Logger };
