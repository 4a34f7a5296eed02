/**
 * Project Registry Types
 *
 * @module registry/types
 */

export interface ProjectEntry {
  name: string;
  /** Project directory */
  path: string;
  manifest: string;
  /** Accounts file, absolute or relative to `path` */
  accounts?: string;
  template?: string;
  cluster?: string;
  rpcUrl?: string;
  programId?: string;
  payer?: string;
  /** ISO-8601 timestamp */
  lastActivity?: string;
  deploymentState: string;
}

export interface RegistryDefaults {
  version: number;
  defaultCluster: string;
  defaultRpcUrl: string;
  defaultPayer?: string;
  defaultProgramId?: string;
}

export interface RegistryData {
  defaults: RegistryDefaults;
  projects: ProjectEntry[];
}

export const REGISTRY_VERSION = 1;
export const DEFAULT_DEPLOYMENT_STATE = 'init';
