/**
 * Append-only run log: one timestamped file per run.
 *
 * Lines look like `2026-01-05T10:00:00.000Z - INFO - message`.
 */

import * as fs from 'fs';
import * as path from 'path';
import type { LogLevel, LogSink } from '../utils/logger.js';

const ANSI_PATTERN = /\x1b\[[0-9;]*m/g;

export interface RunLog extends LogSink {
  readonly path: string;
}

/** Filename-safe timestamp: 2026-01-05T10-00-00-000Z */
export function fileTimestamp(date: Date): string {
  return date.toISOString().replace(/:/g, '-').replace(/\./g, '-');
}

export function formatLogLine(level: LogLevel, message: string, now: Date = new Date()): string {
  const label = level === 'success' ? 'INFO' : level.toUpperCase();
  return `${now.toISOString()} - ${label} - ${message.replace(ANSI_PATTERN, '')}\n`;
}

export function openRunLog(logDir: string, startedAt: Date, clock: () => Date = () => new Date()): RunLog {
  if (!fs.existsSync(logDir)) {
    fs.mkdirSync(logDir, { recursive: true });
  }

  const filepath = path.resolve(logDir, `org-deletion-${fileTimestamp(startedAt)}.log`);
  fs.writeFileSync(filepath, '', { flag: 'a' });

  return {
    path: filepath,
    write(level, message) {
      fs.appendFileSync(filepath, formatLogLine(level, message, clock()));
    },
  };
}
