/**
 * Structured JSON logger
 *
 * Log format (one object per line):
 * { timestamp, level, event, ... }
 *
 * Lines go to stderr so they never mix with command output on stdout.
 */

import type { LogLevel } from '../types/index.js';

export interface LogEntry {
  timestamp: string;
  level: LogLevel;
  event: string;
  selector?: string;
  arity?: number;
  path?: string;
  command?: string;
  error?: string;
  [key: string]: unknown;
}

export type LogFields = Omit<LogEntry, 'timestamp' | 'level'>;

export interface Logger {
  debug(entry: LogFields): void;
  info(entry: LogFields): void;
  warn(entry: LogFields): void;
  error(entry: LogFields): void;
}

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

function writeStderr(line: string): void {
  process.stderr.write(line + '\n');
}

/**
 * Create a structured JSON logger
 * @param output Write function (default: stderr)
 * @param minLevel Minimum log level to output
 */
export function createLogger(
  output: (line: string) => void = writeStderr,
  minLevel: LogLevel = 'warn'
): Logger {
  const log = (level: LogLevel, entry: LogFields) => {
    if (LEVEL_ORDER[level] < LEVEL_ORDER[minLevel]) return;

    const fullEntry = {
      timestamp: new Date().toISOString(),
      level,
      ...entry,
    };

    output(JSON.stringify(fullEntry));
  };

  return {
    debug: (entry) => log('debug', entry),
    info: (entry) => log('info', entry),
    warn: (entry) => log('warn', entry),
    error: (entry) => log('error', entry),
  };
}

/** Logger that drops everything (used where no logger is wired) */
export const silentLogger: Logger = createLogger(() => {}, 'error');
