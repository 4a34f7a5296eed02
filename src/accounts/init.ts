/**
 * Fresh accounts documents for derived mode.
 *
 * @module accounts/init
 */

import { randomBytes } from 'crypto';

import { AccountsError } from '../errors/index.js';
import { assertVmSeed } from './seeds.js';
import { MAX_SLOT, type AccountModel, type AccountsFile, type ClusterEntry, type SegmentEntry } from './types.js';

/** Slots 2..15 are left for ram once weights takes slot 1. */
export const MAX_RAM_SEGMENTS = MAX_SLOT - 1;

export interface InitAccountsOptions {
  ramCount?: number;
  ramBytes?: number;
  weightsBytes?: number;
  /** Random 64-bit seed when omitted */
  seed?: bigint;
  accountModel?: AccountModel;
  authority?: string;
  authorityKeypair?: string;
  cluster?: ClusterEntry;
}

export function randomVmSeed(): bigint {
  return randomBytes(8).readBigUInt64LE(0);
}

function positiveOrUndefined(value: number | undefined, name: string): number | undefined {
  if (value === undefined) return undefined;
  if (!Number.isInteger(value) || value <= 0) {
    throw new AccountsError(`${name} must be a positive integer`);
  }
  return value;
}

/**
 * Build an accounts document: weights read-only at slot 1, then `ramCount`
 * writable ram segments at slots 2.. in order.
 */
export function initAccounts(options: InitAccountsOptions = {}): AccountsFile {
  const ramCount = options.ramCount ?? 0;
  if (!Number.isInteger(ramCount) || ramCount < 0) {
    throw new AccountsError('ram count must be a non-negative integer');
  }
  if (ramCount > MAX_RAM_SEGMENTS) {
    throw new AccountsError(`derived mode supports at most ${MAX_RAM_SEGMENTS} RAM segments total (slots 2..15)`);
  }
  const ramBytes = positiveOrUndefined(options.ramBytes, 'ram bytes');
  const weightsBytes = positiveOrUndefined(options.weightsBytes, 'weights bytes');
  const seed = options.seed ?? randomVmSeed();
  assertVmSeed(seed);

  const segments: SegmentEntry[] = [{ index: 1, slot: 1, kind: 'weights', writable: false, bytes: weightsBytes }];
  for (let i = 0; i < ramCount; i++) {
    segments.push({ index: i + 2, slot: i + 2, kind: 'ram', writable: true, bytes: ramBytes });
  }

  return {
    cluster: { ...options.cluster },
    vm: {
      seed,
      accountModel: options.accountModel ?? 'seeded',
      authority: options.authority,
      authorityKeypair: options.authority ? undefined : options.authorityKeypair,
    },
    segments,
  };
}
