/**
 * Debug Config Schema
 *
 * Logger defaults: history retention, level and module filters.
 *
 * @module config/schema/debug
 */

export interface LogHistoryConfigSchema {
  /** Entries kept in memory for getLogHistory() */
  maxLogHistoryEntries: number;
}

export interface LogLevelConfigSchema {
  /** debug, verbose, info, warn, error or silent */
  defaultLogLevel: string;
}

export interface LogModulesConfigSchema {
  /** Log only these modules; empty logs all */
  enabled: string[];
  disabled: string[];
}

export interface DebugConfigSchema {
  logHistory: LogHistoryConfigSchema;
  logLevel: LogLevelConfigSchema;
  modules: LogModulesConfigSchema;
}

export const DEFAULT_DEBUG_CONFIG: DebugConfigSchema = {
  logHistory: { maxLogHistoryEntries: 1000 },
  logLevel: { defaultLogLevel: 'info' },
  modules: { enabled: [], disabled: [] },
};
