/**
 * Log levels and history entries.
 *
 * @module debug/types
 */

/** Higher values are quieter */
export const LOG_LEVELS = {
  DEBUG: 0,
  VERBOSE: 1,
  INFO: 2,
  WARN: 3,
  ERROR: 4,
  SILENT: 5,
} as const;

export type LogLevel = keyof typeof LOG_LEVELS;
export type LogLevelValue = (typeof LOG_LEVELS)[LogLevel];

/** Level tag stored with each entry; `ALWAYS` bypasses filtering */
export type LogTag = Exclude<LogLevel, 'SILENT'> | 'ALWAYS';

export function isLogLevel(name: string): name is LogLevel {
  return Object.prototype.hasOwnProperty.call(LOG_LEVELS, name);
}

/** Level value for a case-insensitive name, or undefined. */
export function parseLogLevel(name: string): LogLevelValue | undefined {
  const upper = name.trim().toUpperCase();
  return isLogLevel(upper) ? LOG_LEVELS[upper] : undefined;
}

export function logLevelName(value: LogLevelValue): string {
  const entry = Object.entries(LOG_LEVELS).find(([, v]) => v === value);
  return entry ? entry[0].toLowerCase() : 'info';
}

export interface LogEntry {
  time: number;
  level: LogTag;
  module: string;
  message: string;
  data?: unknown;
}
