/**
 * Seed Collision Detection
 *
 * Two accounts files that resolve to the same (rpc, program, authority, seed)
 * would drive the same VM. Before accounts are created the candidate is
 * compared against every other registered project and, when a chain lookup
 * is supplied, against accounts that already exist.
 *
 * Best effort only: two processes racing on the same seed can both pass.
 *
 * @module registry/collision
 */

import { isAbsolute, resolve } from 'path';

import {
  accountsSegmentMetas,
  loadAccounts,
  type AccountsDocument,
  type AccountsInfo,
  type SegmentMetaOptions,
} from '../accounts/index.js';
import { log } from '../debug/index.js';
import { ERROR_CODES, RegistryError } from '../errors/index.js';
import type { ProjectRegistry } from './registry.js';
import type { ProjectEntry } from './types.js';

export const UNSPECIFIED_RPC = '<unspecified-rpc>';

export interface SeedFingerprint {
  rpcUrl: string;
  programId: string;
  authorityPubkey: string;
  vmSeed: bigint;
  vmPubkey: string;
}

/** True when the account exists on the cluster at `rpcUrl`. */
export type ChainLookup = (pubkey: string, rpcUrl: string) => Promise<boolean>;

export type AccountsLoader = (path: string) => Promise<AccountsDocument>;

export interface SeedCollision {
  source: 'registry' | 'chain';
  fingerprint: SeedFingerprint;
  project?: ProjectEntry;
}

export interface CollisionOptions {
  /** Project directory of the candidate; its own registry entry is skipped */
  selfPath?: string;
  chainLookup?: ChainLookup;
  loadAccounts?: AccountsLoader;
  metaOptions?: SegmentMetaOptions;
}

export function normalizeRpcUrl(url: string | undefined): string {
  const cleaned = url?.trim().replace(/\/+$/, '');
  return cleaned ? cleaned : UNSPECIFIED_RPC;
}

/**
 * Fingerprint from resolved accounts info, or null when the file is not in
 * derived mode.
 */
export function fingerprintFromInfo(info: AccountsInfo, rpcUrl?: string): SeedFingerprint | null {
  if (info.vmSeed === undefined || !info.authorityPubkey) return null;
  return {
    rpcUrl: normalizeRpcUrl(rpcUrl ?? info.rpcUrl),
    programId: info.programId,
    authorityPubkey: info.authorityPubkey,
    vmSeed: info.vmSeed,
    vmPubkey: info.vmPubkey,
  };
}

export async function fingerprintFromAccounts(
  doc: AccountsDocument,
  options: SegmentMetaOptions & { rpcUrl?: string } = {}
): Promise<SeedFingerprint | null> {
  const { info } = await accountsSegmentMetas(doc, options);
  return fingerprintFromInfo(info, options.rpcUrl);
}

export function sameSeed(a: SeedFingerprint, b: SeedFingerprint): boolean {
  return (
    a.rpcUrl === b.rpcUrl &&
    a.programId === b.programId &&
    a.authorityPubkey === b.authorityPubkey &&
    a.vmSeed === b.vmSeed
  );
}

function projectAccountsPath(project: ProjectEntry): string | undefined {
  if (!project.accounts) return undefined;
  return isAbsolute(project.accounts) ? project.accounts : resolve(project.path, project.accounts);
}

async function projectFingerprint(
  project: ProjectEntry,
  options: CollisionOptions
): Promise<SeedFingerprint | null> {
  const accountsPath = projectAccountsPath(project);
  if (!accountsPath) return null;
  const load = options.loadAccounts ?? ((path: string) => loadAccounts(path));
  try {
    const doc = await load(accountsPath);
    return await fingerprintFromAccounts(doc, {
      ...options.metaOptions,
      programId: project.programId,
      payer: project.payer,
      rpcUrl: project.rpcUrl,
    });
  } catch (err) {
    log.debug('Registry', `Skipping ${project.name}: ${err instanceof Error ? err.message : String(err)}`);
    return null;
  }
}

/**
 * Every registered project (other than `selfPath`) whose accounts resolve to
 * the same seed, plus a chain hit when the VM account already exists.
 */
export async function findSeedCollisions(
  registry: ProjectRegistry,
  fingerprint: SeedFingerprint,
  options: CollisionOptions = {}
): Promise<SeedCollision[]> {
  const selfPath = options.selfPath ? resolve(options.selfPath) : undefined;
  const collisions: SeedCollision[] = [];

  for (const project of await registry.list()) {
    if (selfPath && resolve(project.path) === selfPath) continue;
    const other = await projectFingerprint(project, options);
    if (other && sameSeed(other, fingerprint)) {
      collisions.push({ source: 'registry', fingerprint: other, project });
    }
  }

  if (options.chainLookup && fingerprint.rpcUrl !== UNSPECIFIED_RPC) {
    if (await options.chainLookup(fingerprint.vmPubkey, fingerprint.rpcUrl)) {
      collisions.push({ source: 'chain', fingerprint });
    }
  }
  return collisions;
}

export function describeCollision(collision: SeedCollision): string {
  if (collision.source === 'chain') {
    return `Seed collision blocked: VM account ${collision.fingerprint.vmPubkey} already exists on ${collision.fingerprint.rpcUrl}`;
  }
  const project = collision.project;
  return (
    'Seed collision blocked: vm.seed + authority + program already registered by project ' +
    `'${project?.name ?? '<unknown>'}' at ${project?.path ?? '<unknown>'}`
  );
}

export async function assertNoSeedCollision(
  registry: ProjectRegistry,
  fingerprint: SeedFingerprint,
  options: CollisionOptions = {}
): Promise<void> {
  const [first] = await findSeedCollisions(registry, fingerprint, options);
  if (first) {
    throw new RegistryError(ERROR_CODES.SEED_COLLISION, describeCollision(first));
  }
}
