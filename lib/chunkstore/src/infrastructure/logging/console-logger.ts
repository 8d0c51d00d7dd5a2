/**
 * Console logging with consistent formatting.
 */

import type { Logger } from '../../ports/logging/logger';

const RESET = '\x1b[0m';
const DIM = '\x1b[2m';
const RED = '\x1b[31m';
const YELLOW = '\x1b[33m';
const CYAN = '\x1b[36m';

export interface ConsoleLoggerOptions {
  /** Print debug lines (default: false). */
  debug?: boolean;
  /** Wrap level tags in ANSI colors (default: true). */
  colors?: boolean;
}

/**
 * Production logger writing tagged lines to the console.
 *
 * Warnings and errors go to stderr, everything else to stdout.
 */
export class ConsoleLogger implements Logger {
  private readonly debugEnabled: boolean;
  private readonly colors: boolean;

  constructor(options: ConsoleLoggerOptions = {}) {
    this.debugEnabled = options.debug ?? false;
    this.colors = options.colors ?? true;
  }

  debug(message: string): void {
    if (this.debugEnabled) {
      console.log(`${this.tag('debug', DIM)} ${message}`);
    }
  }

  info(message: string): void {
    console.log(`${this.tag('info', CYAN)}  ${message}`);
  }

  warn(message: string): void {
    console.error(`${this.tag('warn', YELLOW)}  ${message}`);
  }

  error(message: string): void {
    console.error(`${this.tag('error', RED)} ${message}`);
  }

  private tag(label: string, color: string): string {
    return this.colors ? `${color}${label}${RESET}` : label;
  }
}
