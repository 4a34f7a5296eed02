/**
 * Paths Config Schema
 *
 * @module config/schema/paths
 */

import { homedir } from 'os';
import { join } from 'path';

export interface PathsConfigSchema {
  /** Location of the project registry file */
  registryPath: string;
}

export const DEFAULT_PATHS_CONFIG: PathsConfigSchema = {
  registryPath: join(homedir(), '.kiln', 'registry.toml'),
};
