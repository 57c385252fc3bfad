/**
 * Structured logging utility
 *
 * A Logger is created once per run and passed to each stage. Console output is
 * coloured; every line is also forwarded, uncoloured, to the optional sink
 * (the run log file).
 */

import chalk from 'chalk';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'success';

/** Destination for plain-text log lines, typically the per-run log file */
export interface LogSink {
  write(level: LogLevel, message: string): void;
}

export interface Logger {
  debug(message: string, details?: Record<string, unknown>): void;
  info(message: string, details?: Record<string, unknown>): void;
  warn(message: string, details?: Record<string, unknown>): void;
  error(message: string, details?: Record<string, unknown>): void;
  success(message: string, details?: Record<string, unknown>): void;
  /** Record a line in the run log only, keeping the console scannable */
  audit(message: string, level?: LogLevel): void;
  section(title: string): void;
  subsection(title: string): void;
  listItem(item: string, indent?: number): void;
  keyValue(key: string, value: string | number | boolean | undefined, indent?: number): void;
  table(headers: string[], rows: string[][]): void;
  isVerbose(): boolean;
}

export interface LoggerOptions {
  verbose?: boolean;
  sink?: LogSink;
}

function formatDetails(details?: Record<string, unknown>): string {
  if (!details || Object.keys(details).length === 0) return '';
  return Object.entries(details)
    .map(([key, value]) => `${key}=${JSON.stringify(value)}`)
    .join(' ');
}

function prefixFor(level: LogLevel): string {
  switch (level) {
    case 'debug':
      return chalk.gray('[DEBUG]');
    case 'info':
      return chalk.blue('[INFO]');
    case 'warn':
      return chalk.yellow('[WARN]');
    case 'error':
      return chalk.red('[ERROR]');
    case 'success':
      return chalk.green('[OK]');
  }
}

export function createLogger(options: LoggerOptions = {}): Logger {
  const verbose = options.verbose ?? false;
  const sink = options.sink;

  function emit(level: LogLevel, message: string, details?: Record<string, unknown>): void {
    const detailStr = formatDetails(details);
    sink?.write(level, detailStr ? `${message} ${detailStr}` : message);

    if (level === 'debug' && !verbose) return;

    let output = `${prefixFor(level)} ${message}`;
    if (detailStr) {
      output += ` ${chalk.gray(detailStr)}`;
    }

    if (level === 'error') {
      console.error(output);
    } else {
      console.log(output);
    }
  }

  function table(headers: string[], rows: string[][]): void {
    const widths = headers.map((h, i) => {
      const maxDataWidth = Math.max(0, ...rows.map((row) => (row[i] ?? '').length));
      return Math.max(h.length, maxDataWidth);
    });

    const headerRow = headers.map((h, i) => h.padEnd(widths[i])).join(' | ');
    console.log(chalk.bold(headerRow));
    console.log(widths.map((w) => '-'.repeat(w)).join('-+-'));

    for (const row of rows) {
      console.log(row.map((cell, i) => (cell ?? '').padEnd(widths[i])).join(' | '));
    }
  }

  return {
    debug: (message, details) => emit('debug', message, details),
    info: (message, details) => emit('info', message, details),
    warn: (message, details) => emit('warn', message, details),
    error: (message, details) => emit('error', message, details),
    success: (message, details) => emit('success', message, details),
    audit: (message, level = 'info') => sink?.write(level, message),
    section(title) {
      console.log();
      console.log(chalk.bold.cyan(`=== ${title} ===`));
      sink?.write('info', `=== ${title} ===`);
    },
    subsection(title) {
      console.log(chalk.cyan(`--- ${title} ---`));
    },
    listItem(item, indent = 0) {
      console.log(`${'  '.repeat(indent)}${chalk.gray('•')} ${item}`);
    },
    keyValue(key, value, indent = 0) {
      const displayValue = value === undefined ? chalk.gray('(not set)') : String(value);
      console.log(`${'  '.repeat(indent)}${chalk.gray(key + ':')} ${displayValue}`);
    },
    table,
    isVerbose: () => verbose,
  };
}
