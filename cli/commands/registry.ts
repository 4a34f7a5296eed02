/**
 * `kiln registry` subcommands.
 */

import { resolve } from 'path';

import { ProjectRegistry } from '../../src/registry/index.js';
import { flagString, positional, requireFlag } from '../args/index.js';
import type { CLIOptions } from '../helpers/types.js';

export async function runRegistryList(_opts: CLIOptions): Promise<number> {
  const registry = new ProjectRegistry();
  const projects = await registry.list();
  if (projects.length === 0) {
    console.log('No projects registered');
    return 0;
  }
  for (const project of projects) {
    const activity = project.lastActivity ? ` (${project.lastActivity})` : '';
    console.log(`${project.name.padEnd(20)} ${project.deploymentState.padEnd(16)} ${project.path}${activity}`);
  }
  return 0;
}

export async function runRegistryAdd(opts: CLIOptions): Promise<number> {
  const path = resolve(positional(opts, 0, 'project-dir'));
  const entry = await new ProjectRegistry().register({
    name: flagString(opts, 'name') ?? path,
    path,
    manifest: requireFlag(opts, 'manifest'),
    accounts: flagString(opts, 'accounts'),
    template: flagString(opts, 'template'),
    cluster: flagString(opts, 'cluster'),
    rpcUrl: flagString(opts, 'rpc-url'),
    programId: flagString(opts, 'program-id'),
    payer: flagString(opts, 'payer'),
  });
  console.log(`Registered ${entry.name}`);
  return 0;
}

export async function runRegistryRemove(opts: CLIOptions): Promise<number> {
  const name = positional(opts, 0, 'name');
  if (!(await new ProjectRegistry().unregister(name))) {
    console.error(`Project not registered: ${name}`);
    return 1;
  }
  console.log(`Removed ${name}`);
  return 0;
}

/** Print the defaults, after applying any that were passed. */
export async function runRegistryDefaults(opts: CLIOptions): Promise<number> {
  const registry = new ProjectRegistry();
  const changes = {
    defaultCluster: flagString(opts, 'cluster'),
    defaultRpcUrl: flagString(opts, 'rpc-url'),
    defaultProgramId: flagString(opts, 'program-id'),
    defaultPayer: flagString(opts, 'payer'),
  };
  const changed = Object.values(changes).some((v) => v !== undefined);
  const defaults = changed ? await registry.setDefaults(changes) : await registry.getDefaults();
  console.log(`cluster     ${defaults.defaultCluster}`);
  console.log(`rpc_url     ${defaults.defaultRpcUrl}`);
  console.log(`program_id  ${defaults.defaultProgramId ?? '(default)'}`);
  console.log(`payer       ${defaults.defaultPayer ?? '(default)'}`);
  return 0;
}
