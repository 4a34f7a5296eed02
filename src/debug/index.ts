/**
 * Kiln Debug Module - Logging
 *
 * ## Log Levels
 *   silent  - nothing
 *   error   - errors only
 *   warn    - errors + warnings
 *   info    - normal operation (default)
 *   verbose - detailed info
 *   debug   - everything
 *
 * ## Usage
 *   import { log, setLogLevel } from '../debug/index.js';
 *
 *   log.info('Convert', 'Wrote weights.bin');
 *   log.verbose('Pack', 'sha256 computed');
 *   log.debug('Payload', `len=${bytes.length}`);
 *
 *   setLogLevel('verbose');
 *
 * ## CLI Flags
 *   --verbose, -v  → verbose
 *   --debug        → debug
 *   --quiet, -q    → silent
 *
 * @module debug
 */

export { LOG_LEVELS, type LogLevel, type LogLevelValue, type LogEntry } from './types.js';
export { log, formatMessage, shouldLog } from './logger.js';
export {
  setLogLevel,
  getLogLevel,
  enableModules,
  disableModules,
  applyDebugConfig,
  getLogHistory,
  clearLogHistory,
} from './config.js';
