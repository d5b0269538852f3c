/**
 * Leveled console logger.
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

type Sink = (line: string) => void;

const SINKS: Record<Exclude<LogLevel, 'silent'>, { sink: Sink; color: (s: string) => string; tag: string }> = {
  debug: { sink: (l) => console.log(l), color: chalk.gray, tag: 'DEBUG' },
  info: { sink: (l) => console.log(l), color: chalk.blue, tag: 'INFO' },
  warn: { sink: (l) => console.warn(l), color: chalk.yellow, tag: 'WARN' },
  error: { sink: (l) => console.error(l), color: chalk.red, tag: 'ERROR' },
};

/**
 * Structured logger. Child loggers share the root's level so a single
 * `setLevel` on the root controls every component.
 */
class Logger {
  private readonly levelRef: { value: LogLevel };
  private readonly prefix: string;

  constructor(prefix = '', levelRef: { value: LogLevel } = { value: 'info' }) {
    this.prefix = prefix;
    this.levelRef = levelRef;
  }

  setLevel(level: LogLevel): void {
    this.levelRef.value = level;
  }

  getLevel(): LogLevel {
    return this.levelRef.value;
  }

  isEnabled(level: LogLevel): boolean {
    return LOG_LEVELS[level] >= LOG_LEVELS[this.levelRef.value];
  }

  debug(message: string, data?: Record<string, unknown>): void {
    this.write('debug', message, data);
  }

  info(message: string, data?: Record<string, unknown>): void {
    this.write('info', message, data);
  }

  warn(message: string, data?: Record<string, unknown>): void {
    this.write('warn', message, data);
  }

  error(message: string, error?: Error | Record<string, unknown>): void {
    if (!this.isEnabled('error')) return;
    const { sink, color, tag } = SINKS.error;
    sink(color(`[${tag}] ${this.format(message)}`));
    if (error instanceof Error) {
      sink(color(error.stack ?? error.message));
    } else if (error) {
      sink(color(JSON.stringify(error, null, 2)));
    }
  }

  /**
   * Create a child logger whose prefix is nested under this one.
   */
  child(prefix: string): Logger {
    return new Logger(this.prefix ? `${this.prefix}:${prefix}` : prefix, this.levelRef);
  }

  private format(message: string): string {
    return this.prefix ? `[${this.prefix}] ${message}` : message;
  }

  private write(level: 'debug' | 'info' | 'warn', message: string, data?: Record<string, unknown>): void {
    if (!this.isEnabled(level)) return;
    const { sink, color, tag } = SINKS[level];
    sink(color(`[${tag}] ${this.format(message)}`));
    if (data) {
      sink(color(JSON.stringify(data, null, 2)));
    }
  }
}

export const logger = new Logger();

export { Logger };
