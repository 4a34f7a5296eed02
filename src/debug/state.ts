/**
 * Process-wide logger state.
 *
 * @module debug/state
 */

import { LOG_LEVELS, type LogEntry, type LogLevelValue } from './types.js';

export interface DebugState {
  level: LogLevelValue;
  /** Lower-cased module names; empty means every module */
  enabled: Set<string>;
  disabled: Set<string>;
  history: LogEntry[];
}

export const state: DebugState = {
  level: LOG_LEVELS.INFO,
  enabled: new Set(),
  disabled: new Set(),
  history: [],
};
