/**
 * Core Logging Interface
 *
 * @module debug/logger
 */

import { getRuntimeConfig } from '../config/runtime.js';
import { state } from './state.js';
import { LOG_LEVELS, type LogLevelValue, type LogTag } from './types.js';

/** Console method, looked up per call */
type Sink = 'error' | 'warn' | 'log';

/**
 * `[12.3ms][Module] message`, timed from process start.
 */
export function formatMessage(module: string, message: string): string {
  return `[${performance.now().toFixed(1)}ms][${module}] ${message}`;
}

export function shouldLog(module: string, level: LogLevelValue): boolean {
  if (level < state.level) return false;
  const key = module.toLowerCase();
  if (state.enabled.size > 0 && !state.enabled.has(key)) return false;
  return !state.disabled.has(key);
}

function record(level: LogTag, module: string, message: string, data: unknown): void {
  state.history.push({ time: Date.now(), level, module, message, data });
  const excess = state.history.length - getRuntimeConfig().debug.logHistory.maxLogHistoryEntries;
  if (excess > 0) {
    state.history.splice(0, excess);
  }
}

function emit(sink: Sink, level: LogTag, module: string, message: string, data?: unknown): void {
  record(level, module, message, data);
  const line = formatMessage(module, message);
  if (data === undefined) console[sink](line);
  else console[sink](line, data);
}

function leveled(level: Exclude<LogTag, 'ALWAYS'>, sink: Sink) {
  return (module: string, message: string, data?: unknown): void => {
    if (shouldLog(module, LOG_LEVELS[level])) {
      emit(sink, level, module, message, data);
    }
  };
}

/**
 * Main logging interface. Everything except `always` writes to stderr.
 */
export const log = {
  debug: leveled('DEBUG', 'error'),
  verbose: leveled('VERBOSE', 'error'),
  info: leveled('INFO', 'error'),
  warn: leveled('WARN', 'warn'),
  error: leveled('ERROR', 'error'),
  always(module: string, message: string, data?: unknown): void {
    emit('log', 'ALWAYS', module, message, data);
  },
};
