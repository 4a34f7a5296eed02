/**
 * Config Module Index
 *
 * Runtime configuration schemas plus the process-wide active config.
 *
 * @module config
 */

export * from './schema/index.js';

export { getRuntimeConfig, setRuntimeConfig, resetRuntimeConfig, runtimeOverridesFromEnv } from './runtime.js';
