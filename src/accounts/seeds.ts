/**
 * Seed strings and seed parsing for derived accounts.
 *
 * @module accounts/seeds
 */

import { DerivationError } from '../errors/index.js';
import { MAX_SLOT, MIN_SLOT, SEGMENT_KIND_CODES, type SegmentKindCode } from './types.js';

export const VM_SEED_PREFIX = 'fbv1:vm:';
export const SEGMENT_SEED_PREFIX = 'fbv1:sg:';

/** Longest seed create-with-seed accepts. */
export const MAX_SEED_LENGTH = 32;

export const MAX_VM_SEED = (1n << 64n) - 1n;

const DECIMAL_RE = /^\d+$/;
const HEX_RE = /^0x[0-9a-fA-F]+$/;

/**
 * Read `vm.seed` from its TOML value: an integer, or a decimal or `0x` hex
 * string for seeds past the safe integer range. Returns undefined when unset.
 */
export function parseVmSeed(value: unknown): bigint | undefined {
  if (value === undefined) return undefined;
  let seed: bigint | undefined;
  if (typeof value === 'bigint') {
    seed = value;
  } else if (typeof value === 'number' && Number.isSafeInteger(value)) {
    seed = BigInt(value);
  } else if (typeof value === 'string') {
    const trimmed = value.trim();
    if (DECIMAL_RE.test(trimmed) || HEX_RE.test(trimmed)) {
      seed = BigInt(trimmed);
    }
  }
  if (seed === undefined || seed < 0n || seed > MAX_VM_SEED) {
    throw new DerivationError('vm.seed must be an unsigned 64-bit integer');
  }
  return seed;
}

export function assertVmSeed(seed: bigint): void {
  if (seed < 0n || seed > MAX_VM_SEED) {
    throw new DerivationError(`vm seed ${seed} is out of range (0..2^64-1)`);
  }
}

export function assertSlot(slot: number): void {
  if (!Number.isInteger(slot) || slot < MIN_SLOT || slot > MAX_SLOT) {
    throw new DerivationError(`slot ${slot} is out of range (${MIN_SLOT}..${MAX_SLOT})`);
  }
}

export function segmentKindCode(kind: string): SegmentKindCode | undefined {
  const normalized = kind.trim().toLowerCase();
  if (normalized === 'weights') return SEGMENT_KIND_CODES.weights;
  if (normalized === 'ram') return SEGMENT_KIND_CODES.ram;
  return undefined;
}

function hex(value: bigint | number, width: number): string {
  return value.toString(16).padStart(width, '0');
}

export function vmSeedString(seed: bigint): string {
  assertVmSeed(seed);
  return `${VM_SEED_PREFIX}${hex(seed, 16)}`;
}

export function segmentSeedString(seed: bigint, kind: SegmentKindCode, slot: number): string {
  assertVmSeed(seed);
  assertSlot(slot);
  return `${SEGMENT_SEED_PREFIX}${hex(seed, 16)}:${hex(kind, 2)}${hex(slot, 2)}`;
}

/** Little-endian u64 bytes of a seed. */
export function seedBytes(seed: bigint): Uint8Array {
  assertVmSeed(seed);
  const bytes = new Uint8Array(8);
  new DataView(bytes.buffer).setBigUint64(0, seed, true);
  return bytes;
}
