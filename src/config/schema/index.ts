/**
 * Kiln Config Schema
 *
 * Composes the runtime configuration and re-exports every schema module.
 *
 * @module config/schema
 */

import type { DebugConfigSchema } from './debug.schema.js';
import type { ClusterConfigSchema } from './cluster.schema.js';
import type { ToolsConfigSchema } from './tools.schema.js';
import type { PathsConfigSchema } from './paths.schema.js';

import { DEFAULT_DEBUG_CONFIG } from './debug.schema.js';
import { DEFAULT_CLUSTER_CONFIG } from './cluster.schema.js';
import { DEFAULT_TOOLS_CONFIG } from './tools.schema.js';
import { DEFAULT_PATHS_CONFIG } from './paths.schema.js';

export * from './debug.schema.js';
export * from './cluster.schema.js';
export * from './tools.schema.js';
export * from './paths.schema.js';
export * from './manifest-constants.schema.js';

// =============================================================================
// Runtime Config
// =============================================================================

export interface RuntimeConfigSchema {
  /** Logging */
  debug: DebugConfigSchema;
  /** Registry and other on-disk locations */
  paths: PathsConfigSchema;
  /** Cluster fallbacks for accounts files */
  cluster: ClusterConfigSchema;
  /** External binaries */
  tools: ToolsConfigSchema;
}

export interface RuntimeConfigOverrides {
  debug?: {
    logHistory?: Partial<DebugConfigSchema['logHistory']>;
    logLevel?: Partial<DebugConfigSchema['logLevel']>;
    modules?: Partial<DebugConfigSchema['modules']>;
  };
  paths?: Partial<PathsConfigSchema>;
  cluster?: Partial<ClusterConfigSchema>;
  tools?: Partial<ToolsConfigSchema>;
}

export const DEFAULT_RUNTIME_CONFIG: RuntimeConfigSchema = {
  debug: DEFAULT_DEBUG_CONFIG,
  paths: DEFAULT_PATHS_CONFIG,
  cluster: DEFAULT_CLUSTER_CONFIG,
  tools: DEFAULT_TOOLS_CONFIG,
};

/**
 * Create a runtime configuration with optional overrides.
 *
 * Nested objects are merged one level deep; missing sections fall back to
 * the defaults.
 */
export function createRuntimeConfig(overrides?: RuntimeConfigOverrides): RuntimeConfigSchema {
  const base = DEFAULT_RUNTIME_CONFIG;
  if (!overrides) {
    return {
      debug: {
        logHistory: { ...base.debug.logHistory },
        logLevel: { ...base.debug.logLevel },
        modules: { enabled: [...base.debug.modules.enabled], disabled: [...base.debug.modules.disabled] },
      },
      paths: { ...base.paths },
      cluster: { ...base.cluster },
      tools: { ...base.tools },
    };
  }

  return {
    debug: {
      logHistory: { ...base.debug.logHistory, ...overrides.debug?.logHistory },
      logLevel: { ...base.debug.logLevel, ...overrides.debug?.logLevel },
      modules: {
        enabled: [...(overrides.debug?.modules?.enabled ?? base.debug.modules.enabled)],
        disabled: [...(overrides.debug?.modules?.disabled ?? base.debug.modules.disabled)],
      },
    },
    paths: { ...base.paths, ...overrides.paths },
    cluster: { ...base.cluster, ...overrides.cluster },
    tools: { ...base.tools, ...overrides.tools },
  };
}
