/**
 * Runtime Config Registry
 *
 * Stores the active RuntimeConfigSchema for the current process.
 * Call setRuntimeConfig() early (before any command runs) to apply overrides.
 *
 * @module config/runtime
 */

import type { RuntimeConfigSchema, RuntimeConfigOverrides } from './schema/index.js';
import { createRuntimeConfig } from './schema/index.js';

let runtimeConfig: RuntimeConfigSchema = createRuntimeConfig();

/**
 * Get the active runtime config (merged with defaults).
 */
export function getRuntimeConfig(): RuntimeConfigSchema {
  return runtimeConfig;
}

/**
 * Set the active runtime config.
 * Accepts partial overrides and merges with defaults.
 */
export function setRuntimeConfig(overrides?: RuntimeConfigOverrides): RuntimeConfigSchema {
  runtimeConfig = createRuntimeConfig(overrides);
  return runtimeConfig;
}

/**
 * Reset runtime config to defaults.
 */
export function resetRuntimeConfig(): RuntimeConfigSchema {
  runtimeConfig = createRuntimeConfig();
  return runtimeConfig;
}

/**
 * Read KILN_* environment variables into runtime overrides.
 *
 * Unset or empty variables are skipped so defaults stay in effect.
 */
export function runtimeOverridesFromEnv(env: NodeJS.ProcessEnv): RuntimeConfigOverrides {
  const overrides: RuntimeConfigOverrides = {};
  const pick = (name: string): string | undefined => {
    const value = env[name]?.trim();
    return value ? value : undefined;
  };

  const debug: NonNullable<RuntimeConfigOverrides['debug']> = {};
  const logLevel = pick('KILN_LOG_LEVEL');
  const logModules = pick('KILN_LOG_MODULES');
  if (logLevel) debug.logLevel = { defaultLogLevel: logLevel.toLowerCase() };
  if (logModules) debug.modules = { enabled: logModules.split(',').map((m) => m.trim()).filter(Boolean) };
  if (Object.keys(debug).length > 0) {
    overrides.debug = debug;
  }

  const registryPath = pick('KILN_REGISTRY_PATH');
  if (registryPath) {
    overrides.paths = { registryPath };
  }

  const cluster: NonNullable<RuntimeConfigOverrides['cluster']> = {};
  const rpcUrl = pick('KILN_RPC_URL');
  const programId = pick('KILN_PROGRAM_ID');
  const payer = pick('KILN_PAYER');
  if (rpcUrl) cluster.rpcUrl = rpcUrl;
  if (programId) cluster.programId = programId;
  if (payer) cluster.payer = payer;
  if (Object.keys(cluster).length > 0) {
    overrides.cluster = cluster;
  }

  const tools: NonNullable<RuntimeConfigOverrides['tools']> = {};
  const toolsDir = pick('KILN_TOOLS_DIR');
  const runner = pick('KILN_RUNNER');
  const envPrefix = pick('KILN_TOOL_ENV_PREFIX');
  if (toolsDir) tools.toolsDir = toolsDir;
  if (runner) tools.runner = runner;
  if (envPrefix) tools.envPrefix = envPrefix;
  if (Object.keys(tools).length > 0) {
    overrides.tools = tools;
  }

  return overrides;
}
