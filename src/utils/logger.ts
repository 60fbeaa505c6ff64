/**
 * Logging utility with levels and colors
 */

import chalk from 'chalk';
import type { LogLevel } from '../core/types.js';

const LEVELS: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

export type LogWriter = (line: string, level: LogLevel) => void;

const consoleWriter: LogWriter = (line, level) => {
  if (level === 'warn' || level === 'error') {
    console.error(line);
  } else {
    console.log(line);
  }
};

function stringify(arg: unknown): string {
  if (arg instanceof Error) return arg.message;
  if (typeof arg === 'string') return arg;
  return JSON.stringify(arg) ?? String(arg);
}

/**
 * Logger class with configurable levels
 */
class Logger {
  private level: LogLevel = 'info';
  private quiet = false;
  private writer: LogWriter = consoleWriter;

  setLevel(level: LogLevel) {
    this.level = level;
  }

  /**
   * Map repeated -v flags to a level: none → warn, -v → info, -vv → debug
   */
  setVerbosity(count: number) {
    this.level = count >= 2 ? 'debug' : count === 1 ? 'info' : 'warn';
  }

  setQuiet(quiet: boolean) {
    this.quiet = quiet;
  }

  /**
   * Redirect output, e.g. through the progress display. `undefined` restores the console.
   */
  setWriter(writer: LogWriter | undefined) {
    this.writer = writer ?? consoleWriter;
  }

  private shouldLog(level: LogLevel): boolean {
    if (this.quiet) {
      return false;
    }
    return LEVELS[level] >= LEVELS[this.level];
  }

  private write(level: LogLevel, text: string, args: unknown[]) {
    const suffix = args.length > 0 ? ` ${args.map(stringify).join(' ')}` : '';
    this.writer(text + suffix, level);
  }

  debug(message: string, ...args: unknown[]) {
    if (this.shouldLog('debug')) {
      this.write('debug', chalk.gray(`[DEBUG] ${message}`), args);
    }
  }

  info(message: string, ...args: unknown[]) {
    if (this.shouldLog('info')) {
      this.write('info', chalk.blue(`[INFO] ${message}`), args);
    }
  }

  warn(message: string, ...args: unknown[]) {
    if (this.shouldLog('warn')) {
      this.write('warn', chalk.yellow(`[WARN] ${message}`), args);
    }
  }

  error(message: string, ...args: unknown[]) {
    if (this.shouldLog('error')) {
      this.write('error', chalk.red(`[ERROR] ${message}`), args);
    }
  }

  /**
   * Success log (always info level)
   */
  success(message: string, ...args: unknown[]) {
    if (this.shouldLog('info')) {
      this.write('info', chalk.green(`[✓] ${message}`), args);
    }
  }
}

/**
 * Global logger instance
 */
export const logger = new Logger();
