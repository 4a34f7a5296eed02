/**
 * Project Registry
 *
 * Local record of known projects (name -> manifest and accounts paths plus
 * cached cluster settings). Used to spot seed reuse across projects; it is
 * not authoritative for anything on chain.
 *
 * Every operation reads the store, applies one change and writes it back.
 *
 * @module registry/registry
 */

import { homedir } from 'os';
import { join } from 'path';
import { parse as parseToml, stringify as stringifyToml } from 'smol-toml';

import { getRuntimeConfig } from '../config/runtime.js';
import { log } from '../debug/index.js';
import { ERROR_CODES, RegistryError } from '../errors/index.js';
import { getInt, getString, getTable, isTable, type TomlTable } from '../manifest/values.js';
import { FileRegistryStore, type RegistryStore } from './store.js';
import {
  DEFAULT_DEPLOYMENT_STATE,
  REGISTRY_VERSION,
  type ProjectEntry,
  type RegistryData,
  type RegistryDefaults,
} from './types.js';

export function defaultRegistryDefaults(): RegistryDefaults {
  const cluster = getRuntimeConfig().cluster;
  return {
    version: REGISTRY_VERSION,
    defaultCluster: cluster.name,
    defaultRpcUrl: cluster.rpcUrl,
    defaultPayer: cluster.payer ?? join(homedir(), '.config', 'solana', 'id.json'),
  };
}

// ============================================================================
// TOML mapping
// ============================================================================

function projectFromToml(table: TomlTable): ProjectEntry | null {
  const path = getString(table, 'path');
  const manifest = getString(table, 'manifest');
  if (!path || !manifest) return null;
  const name = getString(table, 'name')?.trim() || path;
  return {
    name,
    path,
    manifest,
    accounts: getString(table, 'accounts'),
    template: getString(table, 'template'),
    cluster: getString(table, 'cluster'),
    rpcUrl: getString(table, 'rpc_url'),
    programId: getString(table, 'program_id'),
    payer: getString(table, 'payer'),
    lastActivity: getString(table, 'last_activity'),
    deploymentState: getString(table, 'deployment_state') ?? DEFAULT_DEPLOYMENT_STATE,
  };
}

function projectToToml(project: ProjectEntry): TomlTable {
  const out: TomlTable = { name: project.name, path: project.path, manifest: project.manifest };
  const optional: [string, string | undefined][] = [
    ['accounts', project.accounts],
    ['template', project.template],
    ['cluster', project.cluster],
    ['rpc_url', project.rpcUrl],
    ['program_id', project.programId],
    ['payer', project.payer],
    ['last_activity', project.lastActivity],
  ];
  for (const [key, value] of optional) {
    if (value) out[key] = value;
  }
  out.deployment_state = project.deploymentState;
  return out;
}

export function parseRegistryText(text: string): RegistryData {
  let data: TomlTable;
  try {
    data = parseToml(text);
  } catch (err) {
    throw new RegistryError(
      ERROR_CODES.REGISTRY_INVALID,
      `Failed to parse registry: ${err instanceof Error ? err.message : String(err)}`
    );
  }
  const fallback = defaultRegistryDefaults();
  const table = getTable(data, 'registry');
  const defaults: RegistryDefaults = {
    version: getInt(table, 'version') ?? REGISTRY_VERSION,
    defaultCluster: getString(table, 'default_cluster') ?? fallback.defaultCluster,
    defaultRpcUrl: getString(table, 'default_rpc_url') ?? fallback.defaultRpcUrl,
    defaultPayer: getString(table, 'default_payer'),
    defaultProgramId: getString(table, 'default_program_id'),
  };
  const rawProjects = Array.isArray(data.projects) ? data.projects : [];
  const projects = rawProjects.filter(isTable).flatMap((p) => projectFromToml(p) ?? []);
  return { defaults, projects };
}

export function renderRegistry(data: RegistryData): string {
  const registry: TomlTable = {
    version: data.defaults.version,
    default_cluster: data.defaults.defaultCluster,
    default_rpc_url: data.defaults.defaultRpcUrl,
  };
  if (data.defaults.defaultPayer) registry.default_payer = data.defaults.defaultPayer;
  if (data.defaults.defaultProgramId) registry.default_program_id = data.defaults.defaultProgramId;
  return `${stringifyToml({ registry, projects: data.projects.map(projectToToml) }).trimEnd()}\n`;
}

// ============================================================================
// Registry
// ============================================================================

export interface ProjectRegistryOptions {
  /** Defaults to a FileRegistryStore at the configured registry path */
  store?: RegistryStore;
  now?: () => Date;
}

export class ProjectRegistry {
  readonly store: RegistryStore;
  private readonly now: () => Date;

  constructor(options: ProjectRegistryOptions = {}) {
    this.store = options.store ?? new FileRegistryStore(getRuntimeConfig().paths.registryPath);
    this.now = options.now ?? (() => new Date());
  }

  /**
   * Read the registry. A store with nothing in it reads as an empty
   * registry with default settings; nothing is written until a change.
   */
  async load(): Promise<RegistryData> {
    const text = await this.store.read();
    if (text === null) {
      return { defaults: defaultRegistryDefaults(), projects: [] };
    }
    return parseRegistryText(text);
  }

  async save(data: RegistryData): Promise<void> {
    await this.store.write(renderRegistry(data));
  }

  async list(): Promise<ProjectEntry[]> {
    return (await this.load()).projects;
  }

  async get(name: string): Promise<ProjectEntry | undefined> {
    return (await this.list()).find((p) => p.name === name);
  }

  /**
   * Add a project, replacing any entry with the same name or path.
   */
  async register(project: Omit<ProjectEntry, 'deploymentState'> & { deploymentState?: string }): Promise<ProjectEntry> {
    const data = await this.load();
    const entry: ProjectEntry = { ...project, deploymentState: project.deploymentState ?? DEFAULT_DEPLOYMENT_STATE };
    const existing = data.projects.findIndex((p) => p.name === entry.name || p.path === entry.path);
    if (existing >= 0) {
      data.projects[existing] = entry;
    } else {
      data.projects.push(entry);
    }
    await this.save(data);
    log.verbose('Registry', `Registered project ${entry.name} (${entry.path})`);
    return entry;
  }

  /** Returns false when no project has that name. */
  async unregister(name: string): Promise<boolean> {
    const data = await this.load();
    const remaining = data.projects.filter((p) => p.name !== name);
    if (remaining.length === data.projects.length) return false;
    await this.save({ ...data, projects: remaining });
    log.verbose('Registry', `Unregistered project ${name}`);
    return true;
  }

  async touch(name: string): Promise<void> {
    await this.update(name, {});
  }

  async setDeploymentState(name: string, state: string): Promise<void> {
    await this.update(name, { deploymentState: state });
  }

  async getDefaults(): Promise<RegistryDefaults> {
    return (await this.load()).defaults;
  }

  async setDefaults(
    changes: Partial<Pick<RegistryDefaults, 'defaultCluster' | 'defaultRpcUrl' | 'defaultPayer' | 'defaultProgramId'>>
  ): Promise<RegistryDefaults> {
    const data = await this.load();
    const defaults: RegistryDefaults = {
      ...data.defaults,
      defaultCluster: changes.defaultCluster ?? data.defaults.defaultCluster,
      defaultRpcUrl: changes.defaultRpcUrl ?? data.defaults.defaultRpcUrl,
      defaultPayer: changes.defaultPayer ?? data.defaults.defaultPayer,
      defaultProgramId: changes.defaultProgramId ?? data.defaults.defaultProgramId,
    };
    await this.save({ ...data, defaults });
    return defaults;
  }

  private async update(name: string, change: Partial<ProjectEntry>): Promise<void> {
    const data = await this.load();
    const project = data.projects.find((p) => p.name === name);
    if (!project) {
      throw new RegistryError(ERROR_CODES.REGISTRY_INVALID, `Project not registered: ${name}`);
    }
    Object.assign(project, change, { lastActivity: this.now().toISOString() });
    await this.save(data);
  }
}
