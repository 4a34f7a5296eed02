/**
 * Tool Argument Builders
 *
 * Command lines for the account tools and the execution runner. Arguments
 * are checked here so a bad slot or offset fails before anything is
 * spawned.
 *
 * @module tools/argv
 */

import { getRuntimeConfig } from '../config/runtime.js';
import { AccountsError } from '../errors/index.js';
import { assertSlot, assertVmSeed } from '../accounts/seeds.js';
import { SEGMENT_KIND_CODES, type DerivedSegmentKind, type SegmentEntry } from '../accounts/types.js';

export const U32_MAX = 0xffff_ffff;

/** Payload size given to ram segments that do not declare `bytes` */
export const DEFAULT_RAM_SEGMENT_BYTES = 262_144;

function isDerivedKind(kind: string): kind is DerivedSegmentKind {
  return kind in SEGMENT_KIND_CODES;
}

function assertU32(value: number, name: string): void {
  if (!Number.isInteger(value) || value < 0) {
    throw new AccountsError(`${name} must be >= 0`);
  }
  if (value > U32_MAX) {
    throw new AccountsError(`${name} must fit in u32`);
  }
}

export function parseSegmentKind(raw: string): DerivedSegmentKind {
  const kind = raw.trim().toLowerCase();
  if (!isDerivedKind(kind)) {
    throw new AccountsError(`unsupported segment kind '${raw}' (expected weights|ram)`);
  }
  return kind;
}

// ============================================================================
// init_pda_accounts
// ============================================================================

/**
 * `kind:slot:bytes` specs for account creation. Ram segments always get
 * one; the weights segment only when its size is known.
 */
export function segmentSpecs(segments: readonly SegmentEntry[], defaultRamBytes = DEFAULT_RAM_SEGMENT_BYTES): string[] {
  const specs: string[] = [];
  for (const seg of segments) {
    const kind = seg.kind.trim().toLowerCase();
    const declared = seg.bytes !== undefined && seg.bytes > 0 ? seg.bytes : undefined;
    const bytes = kind === 'ram' ? declared ?? defaultRamBytes : kind === 'weights' ? declared : undefined;
    if (bytes === undefined) continue;
    assertSlot(seg.slot);
    assertU32(bytes, `segment ${seg.index} bytes`);
    specs.push(`${kind}:${seg.slot}:${bytes}`);
  }
  return specs;
}

export function initAccountsArgs(seed: bigint, specs: readonly string[]): string[] {
  assertVmSeed(seed);
  return ['--vm-seed', seed.toString(), ...specs.flatMap((spec) => ['--segment', spec])];
}

// ============================================================================
// pda_account_ops
// ============================================================================

export interface SegmentTarget {
  seed: bigint;
  kind: DerivedSegmentKind;
  slot: number;
}

export interface ClearSegmentRequest extends SegmentTarget {
  offset: number;
  /** Bytes to zero; 0 clears the whole segment */
  length: number;
}

export interface CloseSegmentRequest extends SegmentTarget {
  recipient?: string;
}

export interface CloseVmRequest {
  seed: bigint;
  recipient?: string;
}

function targetArgs(target: SegmentTarget): string[] {
  assertVmSeed(target.seed);
  if (!Number.isInteger(target.slot) || target.slot < 1 || target.slot > 15) {
    throw new AccountsError('slot must be in range 1..15');
  }
  return ['--vm-seed', target.seed.toString(), '--kind', target.kind, '--slot', String(target.slot)];
}

export function clearSegmentArgs(request: ClearSegmentRequest): string[] {
  const target = targetArgs(request);
  assertU32(request.offset, 'offset');
  assertU32(request.length, 'length');
  if (request.length === 0 && request.offset !== 0) {
    throw new AccountsError('length=0 requires offset=0');
  }
  return ['clear-segment', ...target, '--offset', String(request.offset), '--len', String(request.length)];
}

export function closeSegmentArgs(request: CloseSegmentRequest): string[] {
  const args = ['close-segment', ...targetArgs(request)];
  if (request.recipient) args.push('--recipient', request.recipient);
  return args;
}

export function closeVmArgs(request: CloseVmRequest): string[] {
  assertVmSeed(request.seed);
  const args = ['close-vm', '--vm-seed', request.seed.toString()];
  if (request.recipient) args.push('--recipient', request.recipient);
  return args;
}

// ============================================================================
// write_account
// ============================================================================

export function writeAccountArgs(pubkey: string, offset: number, payloadPath: string, chunkSize?: number): string[] {
  assertU32(offset, 'offset');
  const args = [pubkey, String(offset), payloadPath];
  if (chunkSize !== undefined) {
    if (!Number.isInteger(chunkSize) || chunkSize <= 0) {
      throw new AccountsError('chunk size must be a positive integer');
    }
    args.push('--chunk-size', String(chunkSize));
  }
  return args;
}

// ============================================================================
// Runner
// ============================================================================

export interface RunnerRequest {
  vmPubkey: string;
  mappedFile: string;
  instructions: number;
  /** Guest ELF to load before running */
  programPath?: string;
  entryPc?: number;
  /** Continue a suspended run instead of starting at the entry point */
  resume?: boolean;
  ramCount?: number;
  ramBytes?: number;
  computeLimit?: number;
  rpcUrl?: string;
  payer?: string;
  programId?: string;
}

export function runnerArgs(request: RunnerRequest): string[] {
  if (!Number.isInteger(request.instructions) || request.instructions <= 0) {
    throw new AccountsError('instructions must be a positive integer');
  }
  if (request.resume && request.entryPc !== undefined) {
    throw new AccountsError('--entry-pc and --resume are mutually exclusive');
  }
  const args: string[] = [];
  if (request.programPath) args.push(request.programPath, '--load');
  args.push('--vm', request.vmPubkey, '--mapped-file', request.mappedFile, '--instructions', String(request.instructions));
  if (request.entryPc !== undefined) {
    assertU32(request.entryPc, 'entry pc');
    args.push('--entry-pc', `0x${request.entryPc.toString(16)}`);
  }
  if (request.resume) args.push('--resume');
  if (request.ramCount !== undefined) args.push('--ram-count', String(request.ramCount));
  if (request.ramBytes !== undefined) args.push('--ram-bytes', String(request.ramBytes));
  if (request.computeLimit !== undefined) args.push('--compute-limit', String(request.computeLimit));
  if (request.rpcUrl) args.push('--rpc', request.rpcUrl);
  if (request.payer) args.push('--keypair', request.payer);
  args.push('--program-id', request.programId ?? getRuntimeConfig().cluster.programId);
  return args;
}

// ============================================================================
// Environment
// ============================================================================

export interface ToolEnvSettings {
  rpcUrl?: string;
  payer?: string;
  programId?: string;
  authorityPubkey?: string;
  authorityKeypair?: string;
}

/**
 * Variables the account tools read their cluster settings from. Unset
 * settings are left out.
 */
export function toolEnv(settings: ToolEnvSettings, prefix = getRuntimeConfig().tools.envPrefix): Record<string, string> {
  const env: Record<string, string> = {};
  const entries: [string, string | undefined][] = [
    ['RPC_URL', settings.rpcUrl],
    ['PAYER_KEYPAIR', settings.payer],
    ['PROGRAM_ID', settings.programId],
    ['AUTHORITY_PUBKEY', settings.authorityPubkey],
    ['AUTHORITY_KEYPAIR', settings.authorityKeypair],
  ];
  for (const [name, value] of entries) {
    if (value) env[`${prefix}_${name}`] = value;
  }
  return env;
}
