/**
 * Debug Configuration
 *
 * Log level and module filters.
 *
 * @module debug/config
 */

import type { DebugConfigSchema } from '../config/schema/debug.schema.js';
import { state } from './state.js';
import { LOG_LEVELS, logLevelName, parseLogLevel, type LogEntry } from './types.js';

/**
 * Set the global log level. Unknown names fall back to info.
 */
export function setLogLevel(level: string): void {
  state.level = parseLogLevel(level) ?? LOG_LEVELS.INFO;
}

export function getLogLevel(): string {
  return logLevelName(state.level);
}

function moduleSet(modules: readonly string[]): Set<string> {
  return new Set(modules.map((m) => m.trim().toLowerCase()).filter((m) => m.length > 0));
}

/**
 * Only log these modules (case-insensitive). Empty list clears the filter.
 */
export function enableModules(modules: readonly string[]): void {
  state.enabled = moduleSet(modules);
}

/**
 * Silence these modules (case-insensitive).
 */
export function disableModules(modules: readonly string[]): void {
  state.disabled = moduleSet(modules);
}

/**
 * Apply the configured level and module filters.
 */
export function applyDebugConfig(config: DebugConfigSchema): void {
  setLogLevel(config.logLevel.defaultLogLevel);
  enableModules(config.modules.enabled);
  disableModules(config.modules.disabled);
}

/**
 * Copy of the log history, optionally filtered by level or module.
 */
export function getLogHistory(filter: { level?: string; module?: string } = {}): LogEntry[] {
  const level = filter.level?.toUpperCase();
  const module = filter.module?.toLowerCase();
  return state.history.filter(
    (entry) => (!level || entry.level === level) && (!module || entry.module.toLowerCase() === module)
  );
}

export function clearLogHistory(): void {
  state.history = [];
}
