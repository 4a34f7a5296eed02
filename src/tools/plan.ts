/**
 * Tool Invocation Plans
 *
 * Turns an accounts file plus a requested operation into the exact tool
 * invocations to run. Planning resolves and checks every address first;
 * nothing here spawns a process.
 *
 * @module tools/plan
 */

import {
  accountsSegmentMetas,
  createKeypairResolver,
  resolveAccountsPath,
  type AccountsDocument,
  type AddressDeriver,
  type PubkeyResolver,
  type SegmentMetas,
} from '../accounts/index.js';
import { getRuntimeConfig } from '../config/runtime.js';
import { log } from '../debug/index.js';
import { AccountsError, DerivationError } from '../errors/index.js';
import {
  clearSegmentArgs,
  closeSegmentArgs,
  closeVmArgs,
  initAccountsArgs,
  runnerArgs,
  segmentSpecs,
  toolEnv,
  writeAccountArgs,
  type RunnerRequest,
} from './argv.js';
import { toolCommand } from './runner.js';
import type { DerivedSegmentKind } from '../accounts/types.js';
import type { ToolInvocation } from './types.js';

export interface PlanOptions {
  rpcUrl?: string;
  programId?: string;
  /** Payer keypair path */
  payer?: string;
  resolveKeypair?: PubkeyResolver;
  deriver?: AddressDeriver;
}

export interface AccountsPlan {
  metas: SegmentMetas;
  invocation: ToolInvocation;
}

interface PreparedAccounts {
  metas: SegmentMetas;
  env: Record<string, string>;
  resolveKeypair: PubkeyResolver;
}

async function prepare(doc: AccountsDocument, options: PlanOptions): Promise<PreparedAccounts> {
  const resolveKeypair = options.resolveKeypair ?? createKeypairResolver();
  const metas = await accountsSegmentMetas(doc, {
    resolveKeypair,
    deriver: options.deriver,
    programId: options.programId,
    payer: options.payer,
  });
  const { info } = metas;
  const authorityKeypair = doc.accounts.vm.authorityKeypair;
  const env = toolEnv({
    rpcUrl: options.rpcUrl ?? info.rpcUrl,
    payer: info.payer,
    programId: info.programId,
    authorityPubkey: info.vmSeed !== undefined ? info.authorityPubkey : undefined,
    authorityKeypair: authorityKeypair ? resolveAccountsPath(doc.path, authorityKeypair) : undefined,
  });
  return { metas, env, resolveKeypair };
}

function requireSeed(metas: SegmentMetas, operation: string): bigint {
  const seed = metas.info.vmSeed;
  if (seed === undefined) {
    throw new AccountsError(`${operation} requires vm.seed (derived mode)`);
  }
  return seed;
}

// ============================================================================
// Account lifecycle
// ============================================================================

/**
 * Plan `init_pda_accounts` for a derived-mode accounts file. Without an
 * authority keypair the payer signs, so it must be the authority.
 */
export async function planAccountsCreate(
  doc: AccountsDocument,
  options: PlanOptions & { defaultRamBytes?: number } = {}
): Promise<AccountsPlan> {
  const { metas, env, resolveKeypair } = await prepare(doc, options);
  const seed = requireSeed(metas, 'accounts create');
  const { authorityPubkey, payer } = metas.info;

  if (!doc.accounts.vm.authorityKeypair && authorityPubkey && payer) {
    const payerPubkey = await resolveKeypair(payer);
    if (payerPubkey !== authorityPubkey) {
      throw new DerivationError(
        'account creation authority differs from payer signer; set vm.authority_keypair ' +
          'or use a payer that matches vm.authority'
      );
    }
  }

  const specs = segmentSpecs(doc.accounts.segments, options.defaultRamBytes);
  if (specs.length === 0) {
    log.warn('Tools', 'No segment sizes known; only the VM account will be created');
  }
  return {
    metas,
    invocation: { command: toolCommand('initAccounts'), args: initAccountsArgs(seed, specs), env },
  };
}

export type SegmentOperation =
  | { op: 'clear-segment'; kind: DerivedSegmentKind; slot: number; offset: number; length: number }
  | { op: 'close-segment'; kind: DerivedSegmentKind; slot: number; recipient?: string }
  | { op: 'close-vm'; recipient?: string };

function operationArgs(seed: bigint, operation: SegmentOperation): string[] {
  switch (operation.op) {
    case 'clear-segment':
      return clearSegmentArgs({ seed, ...operation });
    case 'close-segment':
      return closeSegmentArgs({ seed, ...operation });
    case 'close-vm':
      return closeVmArgs({ seed, recipient: operation.recipient });
  }
}

export async function planAccountOperation(
  doc: AccountsDocument,
  operation: SegmentOperation,
  options: PlanOptions = {}
): Promise<AccountsPlan> {
  const { metas, env } = await prepare(doc, options);
  const seed = requireSeed(metas, 'accounts operation');

  const args = operationArgs(seed, operation);
  return { metas, invocation: { command: toolCommand('accountOps'), args, env } };
}

// ============================================================================
// Execution
// ============================================================================

export type InvokeRequest = Omit<RunnerRequest, 'vmPubkey' | 'rpcUrl' | 'payer' | 'programId'>;

/**
 * Plan a runner call. Writable mapped segments already provide ram, so
 * the runner is told not to allocate its own unless `ramCount` says so.
 */
export async function planInvoke(
  doc: AccountsDocument,
  request: InvokeRequest,
  options: PlanOptions = {}
): Promise<AccountsPlan> {
  const { metas, env } = await prepare(doc, options);
  const { info } = metas;
  const hasWritable = metas.segments.some((seg) => seg.writable);
  const args = runnerArgs({
    ...request,
    ramCount: request.ramCount ?? (hasWritable ? 0 : undefined),
    vmPubkey: info.vmPubkey,
    rpcUrl: options.rpcUrl ?? info.rpcUrl,
    payer: info.payer,
    programId: info.programId,
  });
  return { metas, invocation: { command: toolCommand('runner'), args, env } };
}

// ============================================================================
// Uploads
// ============================================================================

export interface UploadOptions {
  /** Byte offset of the first chunk inside the account */
  baseOffset?: number;
  /** `--chunk-size` passed to write_account; defaults to `tools.writeChunkSize` */
  writeChunkSize?: number;
  env?: Record<string, string>;
}

/**
 * One `write_account` call per chunk file, each landing `chunkSize` bytes
 * after the previous one in the weights segment.
 */
export function planWeightUpload(
  metas: SegmentMetas,
  chunks: readonly string[],
  chunkSize: number,
  options: UploadOptions = {}
): ToolInvocation[] {
  const target = metas.segments.find((seg) => seg.kind.trim().toLowerCase() === 'weights');
  if (!target) {
    throw new AccountsError('accounts file has no weights segment');
  }
  if (!Number.isInteger(chunkSize) || chunkSize <= 0) {
    throw new AccountsError('chunk size must be a positive integer');
  }
  const base = options.baseOffset ?? 0;
  const writeChunkSize = options.writeChunkSize ?? getRuntimeConfig().tools.writeChunkSize;
  const command = toolCommand('writeAccount');
  return chunks.map((path, i) => ({
    command,
    args: writeAccountArgs(target.pubkey, base + i * chunkSize, path, writeChunkSize),
    env: options.env,
  }));
}

/**
 * `write_account` calls for staged VM writes (input payload, control block)
 * whose bytes were saved to `paths` in the same order.
 */
export function planStagedWrites(
  vmPubkey: string,
  writes: readonly { offset: number; path: string }[],
  options: Pick<UploadOptions, 'writeChunkSize' | 'env'> = {}
): ToolInvocation[] {
  const writeChunkSize = options.writeChunkSize ?? getRuntimeConfig().tools.writeChunkSize;
  const command = toolCommand('writeAccount');
  return writes.map((write) => ({
    command,
    args: writeAccountArgs(vmPubkey, write.offset, write.path, writeChunkSize),
    env: options.env,
  }));
}

/** Tool environment for an accounts file, for callers that plan writes themselves. */
export async function accountsToolEnv(doc: AccountsDocument, options: PlanOptions = {}): Promise<Record<string, string>> {
  return (await prepare(doc, options)).env;
}
