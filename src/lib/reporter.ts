/**
 * Operator Report
 *
 * Symbol-prefixed, human-readable lines on stdout. Diagnostics belong in the
 * Pino logger; this is what the person running the setup reads.
 */

import chalk from 'chalk';

export interface Reporter {
  info(message: string): void;
  success(message: string): void;
  warn(message: string): void;
  error(message: string): void;
  /** Unprefixed line, for tables and summaries */
  line(text?: string): void;
}

export interface WritableLike {
  write(chunk: string): unknown;
}

export const SYMBOLS = {
  info: 'ℹ️ ',
  success: '✅',
  warn: '⚠️ ',
  error: '❌',
} as const;

/**
 * Reporter writing coloured lines to a stream
 */
export class ConsoleReporter implements Reporter {
  constructor(
    private readonly out: WritableLike = process.stdout,
    private readonly err: WritableLike = process.stderr,
  ) {}

  info(message: string): void {
    this.out.write(`${chalk.blue(`${SYMBOLS.info} ${message}`)}\n`);
  }

  success(message: string): void {
    this.out.write(`${chalk.green(`${SYMBOLS.success} ${message}`)}\n`);
  }

  warn(message: string): void {
    this.out.write(`${chalk.yellow(`${SYMBOLS.warn} ${message}`)}\n`);
  }

  error(message: string): void {
    this.err.write(`${chalk.red(`${SYMBOLS.error} ${message}`)}\n`);
  }

  line(text = ''): void {
    this.out.write(`${text}\n`);
  }
}
