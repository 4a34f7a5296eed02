/**
 * Account Address Derivation
 *
 * Two strategies behind one interface. Both are pure: the same program,
 * authority, seed, kind and slot always give the same address.
 *
 * - Seeded (default): `PublicKey.createWithSeed(authority, seedString, program)`,
 *   i.e. sha256(authority || seed string || program id).
 * - Legacy: program-derived address found by bump search over
 *   `["vm", authority, u64le(seed)]` and
 *   `["seg", authority, u64le(seed), [kind, slot]]`.
 *
 * @module accounts/derive
 */

import { PublicKey } from '@solana/web3.js';
import { Buffer } from 'buffer';

import { DerivationError } from '../errors/index.js';
import { assertSlot, MAX_SEED_LENGTH, seedBytes, segmentSeedString, vmSeedString } from './seeds.js';
import type { AccountModel, SegmentKindCode } from './types.js';

export interface AddressDeriver {
  readonly model: AccountModel;
  deriveVm(programId: PublicKey, authority: PublicKey, seed: bigint): Promise<PublicKey>;
  deriveSegment(
    programId: PublicKey,
    authority: PublicKey,
    seed: bigint,
    kind: SegmentKindCode,
    slot: number
  ): Promise<PublicKey>;
}

export class SeededAddressDeriver implements AddressDeriver {
  readonly model = 'seeded' as const;

  async deriveVm(programId: PublicKey, authority: PublicKey, seed: bigint): Promise<PublicKey> {
    return this.derive(programId, authority, vmSeedString(seed));
  }

  async deriveSegment(
    programId: PublicKey,
    authority: PublicKey,
    seed: bigint,
    kind: SegmentKindCode,
    slot: number
  ): Promise<PublicKey> {
    return this.derive(programId, authority, segmentSeedString(seed, kind, slot));
  }

  private async derive(programId: PublicKey, authority: PublicKey, seedString: string): Promise<PublicKey> {
    if (seedString.length > MAX_SEED_LENGTH) {
      throw new DerivationError(`seed string "${seedString}" exceeds ${MAX_SEED_LENGTH} bytes`);
    }
    return PublicKey.createWithSeed(authority, seedString, programId);
  }
}

export class LegacyBumpAddressDeriver implements AddressDeriver {
  readonly model = 'pda' as const;

  async deriveVm(programId: PublicKey, authority: PublicKey, seed: bigint): Promise<PublicKey> {
    const [address] = PublicKey.findProgramAddressSync(
      [Buffer.from('vm'), authority.toBuffer(), Buffer.from(seedBytes(seed))],
      programId
    );
    return address;
  }

  async deriveSegment(
    programId: PublicKey,
    authority: PublicKey,
    seed: bigint,
    kind: SegmentKindCode,
    slot: number
  ): Promise<PublicKey> {
    assertSlot(slot);
    const [address] = PublicKey.findProgramAddressSync(
      [Buffer.from('seg'), authority.toBuffer(), Buffer.from(seedBytes(seed)), Buffer.from([kind, slot])],
      programId
    );
    return address;
  }
}

export function createAddressDeriver(model: AccountModel = 'seeded'): AddressDeriver {
  return model === 'pda' ? new LegacyBumpAddressDeriver() : new SeededAddressDeriver();
}

/**
 * Parse a base58 public key, naming the field in the error.
 */
export function toPublicKey(value: string, field: string): PublicKey {
  try {
    return new PublicKey(value);
  } catch (err) {
    throw new DerivationError(`${field} is not a valid public key: ${err instanceof Error ? err.message : String(err)}`);
  }
}
