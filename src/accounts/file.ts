/**
 * Accounts File I/O
 *
 * Reads and writes accounts TOML through smol-toml and resolves keypair
 * files to public keys.
 *
 * @module accounts/file
 */

import { Keypair } from '@solana/web3.js';
import { homedir } from 'os';
import { dirname, isAbsolute, join, resolve } from 'path';
import { parse as parseToml, stringify as stringifyToml } from 'smol-toml';

import { log } from '../debug/index.js';
import { AccountsError } from '../errors/index.js';
import { NodeBlobIO } from '../converter/io/node.js';
import type { BlobIO } from '../converter/io/types.js';
import { getBool, getInt, getString, getTable, isTable, type TomlTable } from '../manifest/values.js';
import { parseVmSeed } from './seeds.js';
import {
  ACCOUNT_MODELS,
  type AccountModel,
  type AccountsDocument,
  type AccountsFile,
  type ClusterEntry,
  type PubkeyResolver,
  type SegmentEntry,
  type VmEntry,
} from './types.js';

// ============================================================================
// Parsing
// ============================================================================

function isAccountModel(value: string): value is AccountModel {
  return ACCOUNT_MODELS.some((m) => m === value);
}

function nonEmpty(table: TomlTable | undefined, key: string): string | undefined {
  const value = getString(table, key);
  return value ? value : undefined;
}

function parseCluster(table: TomlTable | undefined): ClusterEntry {
  return {
    rpcUrl: nonEmpty(table, 'rpc_url'),
    programId: nonEmpty(table, 'program_id'),
    payer: nonEmpty(table, 'payer'),
  };
}

function parseVm(table: TomlTable | undefined): VmEntry {
  const accountModel = getString(table, 'account_model');
  if (accountModel !== undefined && !isAccountModel(accountModel)) {
    throw new AccountsError(`vm.account_model must be one of ${ACCOUNT_MODELS.join(', ')}`);
  }
  return {
    pubkey: nonEmpty(table, 'pubkey'),
    keypair: nonEmpty(table, 'keypair'),
    seed: parseVmSeed(table?.seed),
    accountModel,
    authority: nonEmpty(table, 'authority'),
    authorityKeypair: nonEmpty(table, 'authority_keypair'),
  };
}

function parseSegments(value: unknown): SegmentEntry[] {
  if (!Array.isArray(value)) return [];
  const segments: SegmentEntry[] = [];
  value.forEach((item, position) => {
    if (!isTable(item)) return;
    const index = getInt(item, 'index') ?? position + 1;
    segments.push({
      index,
      slot: getInt(item, 'slot') ?? index,
      kind: getString(item, 'kind') ?? 'custom',
      writable: getBool(item, 'writable') ?? false,
      pubkey: nonEmpty(item, 'pubkey'),
      keypair: nonEmpty(item, 'keypair'),
      bytes: getInt(item, 'bytes'),
    });
  });
  return segments.sort((a, b) => a.index - b.index);
}

/**
 * Parse accounts TOML. Unknown keys are ignored.
 */
export function parseAccountsText(text: string, source = '<memory>'): AccountsFile {
  let data: TomlTable;
  try {
    data = parseToml(text);
  } catch (err) {
    throw new AccountsError(
      `Failed to parse accounts file ${source}: ${err instanceof Error ? err.message : String(err)}`
    );
  }
  return {
    cluster: parseCluster(getTable(data, 'cluster')),
    vm: parseVm(getTable(data, 'vm')),
    segments: parseSegments(data.segments),
  };
}

export async function loadAccounts(path: string, io: BlobIO = new NodeBlobIO()): Promise<AccountsDocument> {
  const absolute = resolve(path);
  if (!(await io.exists(absolute))) {
    throw new AccountsError(`Accounts file not found: ${absolute}`);
  }
  const accounts = parseAccountsText(await io.readText(absolute), absolute);
  log.debug('Accounts', `Loaded ${absolute} (${accounts.segments.length} segments)`);
  return { path: absolute, accounts };
}

// ============================================================================
// Writing
// ============================================================================

function compact(entries: Record<string, string | number | boolean | undefined>): TomlTable {
  const out: TomlTable = {};
  for (const [key, value] of Object.entries(entries)) {
    if (value !== undefined) out[key] = value;
  }
  return out;
}

/**
 * Serialize an accounts file. The seed is written as a decimal string so
 * values past 2^63 survive a TOML round trip.
 */
export function renderAccounts(accounts: AccountsFile): string {
  const { cluster, vm } = accounts;
  const data: TomlTable = {};
  const clusterTable = compact({ rpc_url: cluster.rpcUrl, program_id: cluster.programId, payer: cluster.payer });
  if (Object.keys(clusterTable).length > 0) {
    data.cluster = clusterTable;
  }
  data.vm = compact({
    pubkey: vm.pubkey,
    keypair: vm.keypair,
    seed: vm.seed?.toString(),
    account_model: vm.accountModel,
    authority: vm.authority,
    authority_keypair: vm.authorityKeypair,
  });
  data.segments = accounts.segments.map((seg) =>
    compact({
      index: seg.index,
      slot: seg.slot,
      kind: seg.kind,
      pubkey: seg.pubkey,
      keypair: seg.keypair,
      writable: seg.writable,
      bytes: seg.bytes,
    })
  );
  return `${stringifyToml(data).trimEnd()}\n`;
}

export async function writeAccounts(
  path: string,
  accounts: AccountsFile,
  io: BlobIO = new NodeBlobIO()
): Promise<void> {
  await io.mkdir(dirname(path));
  await io.writeTextAtomic(path, renderAccounts(accounts));
  log.info('Accounts', `Wrote accounts file: ${path}`);
}

// ============================================================================
// Paths and keypairs
// ============================================================================

/**
 * Resolve a path written in an accounts file: `~` expands to the home
 * directory, relative paths resolve against the file's directory.
 */
export function resolveAccountsPath(accountsPath: string, raw: string): string {
  const expanded = raw === '~' ? homedir() : raw.startsWith('~/') ? join(homedir(), raw.slice(2)) : raw;
  if (isAbsolute(expanded)) return expanded;
  return resolve(dirname(resolve(accountsPath)), expanded);
}

/**
 * Public key of a keypair file: a JSON array of the 64 secret key bytes.
 */
export async function readKeypairPubkey(path: string, io: BlobIO = new NodeBlobIO()): Promise<string> {
  let parsed: unknown;
  try {
    parsed = JSON.parse(await io.readText(path));
  } catch (err) {
    if (err instanceof SyntaxError) {
      throw new AccountsError(`Keypair file ${path} is not valid JSON`);
    }
    throw err;
  }
  if (
    !Array.isArray(parsed) ||
    parsed.length !== 64 ||
    !parsed.every((b): b is number => Number.isInteger(b) && b >= 0 && b <= 255)
  ) {
    throw new AccountsError(`Keypair file ${path} must hold a JSON array of 64 bytes`);
  }
  try {
    return Keypair.fromSecretKey(Uint8Array.from(parsed)).publicKey.toBase58();
  } catch (err) {
    throw new AccountsError(`Keypair file ${path} is invalid: ${err instanceof Error ? err.message : String(err)}`);
  }
}

/**
 * Keypair resolver backed by a blob store, memoized per path.
 */
export function createKeypairResolver(io: BlobIO = new NodeBlobIO()): PubkeyResolver {
  const cache = new Map<string, Promise<string>>();
  return (keypairPath) => {
    let pending = cache.get(keypairPath);
    if (!pending) {
      pending = readKeypairPubkey(keypairPath, io);
      cache.set(keypairPath, pending);
    }
    return pending;
  };
}
