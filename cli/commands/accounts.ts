/**
 * `kiln accounts` subcommands.
 */

import { access, writeFile } from 'fs/promises';
import { dirname, resolve } from 'path';

import {
  ACCOUNT_MODELS,
  accountsSegmentMetas,
  initAccounts,
  parseVmSeed,
  writeAccounts,
  type AccountModel,
  type AccountsDocument,
} from '../../src/accounts/index.js';
import { log } from '../../src/debug/index.js';
import { ERROR_CODES, createKilnError } from '../../src/errors/index.js';
import { loadManifest } from '../../src/manifest/index.js';
import {
  ProjectRegistry,
  assertNoSeedCollision,
  createRpcChainLookup,
  fingerprintFromAccounts,
  fingerprintFromInfo,
  type SeedFingerprint,
} from '../../src/registry/index.js';
import { parseSegmentKind, planAccountOperation, planAccountsCreate } from '../../src/tools/index.js';
import { flagBool, flagInt, flagString, requireFlag } from '../args/index.js';
import type { CLIOptions } from '../helpers/types.js';
import { execute, loadAccountsFlag, planOptionsFromFlags } from './deploy.js';

function usage(message: string): Error {
  return createKilnError(ERROR_CODES.CLI_USAGE, message);
}

function isAccountModel(value: string): value is AccountModel {
  return ACCOUNT_MODELS.some((m) => m === value);
}

async function fileExists(path: string): Promise<boolean> {
  try {
    await access(path);
    return true;
  } catch {
    return false;
  }
}

async function checkCollisions(opts: CLIOptions, fingerprint: SeedFingerprint, accountsPath: string): Promise<void> {
  await assertNoSeedCollision(new ProjectRegistry(), fingerprint, {
    selfPath: dirname(accountsPath),
    chainLookup: flagBool(opts, 'check-chain') ? createRpcChainLookup() : undefined,
  });
}

/** Bytes the weights segment must hold: the end of the furthest blob. */
async function weightsBytesFromManifest(path: string): Promise<number | undefined> {
  const { manifest } = await loadManifest(path, { validate: false });
  const end = Math.max(0, ...(manifest.weights?.blobs ?? []).map((b) => (b.dataOffset ?? 0) + b.sizeBytes));
  return end > 0 ? end : undefined;
}

export async function runAccountsInit(opts: CLIOptions): Promise<number> {
  const out = resolve(flagString(opts, 'out') ?? 'accounts.toml');
  if ((await fileExists(out)) && !flagBool(opts, 'force')) {
    throw usage(`${out} already exists; pass --force to overwrite`);
  }
  const accountModel = flagString(opts, 'account-model');
  if (accountModel !== undefined && !isAccountModel(accountModel)) {
    throw usage(`--account-model must be one of ${ACCOUNT_MODELS.join(', ')}`);
  }
  const seedFlag = flagString(opts, 'seed');
  const manifestPath = flagString(opts, 'manifest');

  const accounts = initAccounts({
    ramCount: flagInt(opts, 'ram-count') ?? 1,
    ramBytes: flagInt(opts, 'ram-bytes'),
    weightsBytes: flagInt(opts, 'weights-bytes') ?? (manifestPath ? await weightsBytesFromManifest(manifestPath) : undefined),
    seed: seedFlag === undefined ? undefined : parseVmSeed(seedFlag),
    accountModel,
    authority: flagString(opts, 'authority'),
    authorityKeypair: flagString(opts, 'authority-keypair'),
    cluster: {
      rpcUrl: flagString(opts, 'rpc-url'),
      programId: flagString(opts, 'program-id'),
      payer: flagString(opts, 'payer'),
    },
  });
  const doc: AccountsDocument = { path: out, accounts };

  const { vm, cluster } = accounts;
  if (vm.authority || vm.authorityKeypair || cluster.payer) {
    const fingerprint = await fingerprintFromAccounts(doc);
    if (fingerprint) {
      await checkCollisions(opts, fingerprint, out);
      console.log(`VM ${fingerprint.vmPubkey}`);
    }
  } else {
    log.warn('Accounts', 'No authority or payer given; seed collision check skipped');
  }

  await writeAccounts(out, accounts);
  console.log(`vm.seed = ${vm.seed}`);
  return 0;
}

export async function runAccountsShow(opts: CLIOptions): Promise<number> {
  const doc = await loadAccountsFlag(opts);
  const { cluster, vm, segments } = doc.accounts;
  console.log(`\n${doc.path}`);
  console.log(`  rpc:        ${cluster.rpcUrl ?? '(default)'}`);
  console.log(`  program:    ${cluster.programId ?? '(default)'}`);
  console.log(`  payer:      ${cluster.payer ?? '(default)'}`);
  if (vm.seed !== undefined) {
    console.log(`  vm.seed:    ${vm.seed} (${vm.accountModel ?? 'seeded'})`);
    console.log(`  authority:  ${vm.authority ?? vm.authorityKeypair ?? '(payer)'}`);
  } else {
    console.log(`  vm:         ${vm.pubkey ?? vm.keypair ?? '(missing)'}`);
  }
  for (const seg of segments) {
    const bytes = seg.bytes !== undefined ? ` ${seg.bytes}B` : '';
    const key = seg.pubkey ?? seg.keypair ?? '';
    console.log(`  segment ${seg.index}: slot ${seg.slot} ${seg.kind} ${seg.writable ? 'rw' : 'ro'}${bytes} ${key}`.trimEnd());
  }
  console.log('');
  return 0;
}

export async function runAccountsDerive(opts: CLIOptions): Promise<number> {
  const doc = await loadAccountsFlag(opts);
  const { info, segments, mapped } = await accountsSegmentMetas(doc, planOptionsFromFlags(opts));
  console.log(`vm       ${info.vmPubkey}`);
  if (info.authorityPubkey) console.log(`authority ${info.authorityPubkey}`);
  console.log(`program  ${info.programId}`);
  for (const seg of segments) {
    console.log(`slot ${String(seg.slot).padStart(2)} ${seg.kind.padEnd(8)} ${seg.writable ? 'rw' : 'ro'} ${seg.pubkey}`);
  }
  const mappedOut = flagString(opts, 'mapped-out');
  if (mappedOut) {
    await writeFile(mappedOut, `${mapped.join('\n')}\n`);
    console.log(`Wrote ${mappedOut}`);
  }
  return 0;
}

export async function runAccountsCreate(opts: CLIOptions): Promise<number> {
  const doc = await loadAccountsFlag(opts);
  const planOptions = planOptionsFromFlags(opts);
  const plan = await planAccountsCreate(doc, { ...planOptions, defaultRamBytes: flagInt(opts, 'ram-bytes') });

  const fingerprint = fingerprintFromInfo(plan.metas.info, planOptions.rpcUrl);
  if (fingerprint) {
    await checkCollisions(opts, fingerprint, doc.path);
  }
  const mappedOut = flagString(opts, 'mapped-out') ?? 'mapped_accounts.txt';
  await writeFile(mappedOut, `${plan.metas.mapped.join('\n')}\n`);

  const status = await execute(opts, [plan.invocation]);
  if (status === 0 && !flagBool(opts, 'dry-run')) {
    const registry = new ProjectRegistry();
    const projectDir = dirname(doc.path);
    const project = (await registry.list()).find((p) => resolve(p.path) === projectDir);
    if (project) {
      await registry.setDeploymentState(project.name, 'accounts-created');
    }
  }
  return status;
}

export async function runAccountsClear(opts: CLIOptions): Promise<number> {
  const doc = await loadAccountsFlag(opts);
  const slot = flagInt(opts, 'slot');
  if (slot === undefined) throw usage('--slot is required');
  const plan = await planAccountOperation(
    doc,
    {
      op: 'clear-segment',
      kind: parseSegmentKind(requireFlag(opts, 'kind')),
      slot,
      offset: flagInt(opts, 'offset') ?? 0,
      length: flagInt(opts, 'len') ?? 0,
    },
    planOptionsFromFlags(opts)
  );
  return execute(opts, [plan.invocation]);
}

/** Closes one segment when `--slot` is given, otherwise the VM account. */
export async function runAccountsClose(opts: CLIOptions): Promise<number> {
  const doc = await loadAccountsFlag(opts);
  const slot = flagInt(opts, 'slot');
  const recipient = flagString(opts, 'recipient');
  const plan = await planAccountOperation(
    doc,
    slot === undefined
      ? { op: 'close-vm', recipient }
      : { op: 'close-segment', kind: parseSegmentKind(requireFlag(opts, 'kind')), slot, recipient },
    planOptionsFromFlags(opts)
  );
  return execute(opts, [plan.invocation]);
}
