/**
 * Segment Metadata
 *
 * Turns an accounts file into the VM address plus the ordered list of
 * mapped segment accounts an execution call takes. In derived mode
 * (`vm.seed` present) every address is re-derived and checked against what
 * the file declares, and the slot layout is enforced:
 *
 * - slot 1 holds the weights segment, read-only
 * - ram segments are writable and sit in slots 2..15
 * - mapped slots run 1..N without gaps or duplicates
 *
 * @module accounts/metas
 */

import { getRuntimeConfig } from '../config/runtime.js';
import { log } from '../debug/index.js';
import { AccountsError, DerivationError } from '../errors/index.js';
import { createAddressDeriver, toPublicKey, type AddressDeriver } from './derive.js';
import { createKeypairResolver, resolveAccountsPath } from './file.js';
import { segmentKindCode } from './seeds.js';
import {
  MAX_SLOT,
  MIN_SLOT,
  SEGMENT_KIND_CODES,
  type AccountsDocument,
  type PubkeyResolver,
  type SegmentEntry,
  type SegmentKindCode,
} from './types.js';

export interface SegmentMetaOptions {
  resolveKeypair?: PubkeyResolver;
  /** Overrides the strategy named by `vm.account_model` */
  deriver?: AddressDeriver;
  programId?: string;
  /** Payer keypair path */
  payer?: string;
}

export interface AccountsInfo {
  rpcUrl?: string;
  programId: string;
  payer?: string;
  vmPubkey: string;
  authorityPubkey?: string;
  vmSeed?: bigint;
}

export interface MappedSegment {
  index: number;
  slot: number;
  kind: string;
  writable: boolean;
  pubkey: string;
}

export interface SegmentMetas {
  info: AccountsInfo;
  segments: MappedSegment[];
  /** `rw:<pubkey>` / `ro:<pubkey>` in mapping order */
  mapped: string[];
}

export function mappedLine(segment: { writable: boolean; pubkey: string }): string {
  return `${segment.writable ? 'rw' : 'ro'}:${segment.pubkey}`;
}

/**
 * Parse a mapped-accounts list. Lines without an `rw:`/`ro:` prefix take
 * `defaultWritable`; blank lines and `#` comments are skipped.
 */
export function parseMappedLines(text: string, defaultWritable: boolean): { pubkey: string; writable: boolean }[] {
  const out: { pubkey: string; writable: boolean }[] = [];
  for (const line of text.split(/\r?\n/)) {
    const trimmed = line.trim();
    if (!trimmed || trimmed.startsWith('#')) continue;
    let writable = defaultWritable;
    let pubkey = trimmed;
    if (trimmed.startsWith('ro:') || trimmed.startsWith('rw:')) {
      writable = trimmed.startsWith('rw:');
      pubkey = trimmed.slice(3).trim();
    }
    if (!pubkey) {
      throw new AccountsError('Empty pubkey entry in mapped accounts list');
    }
    out.push({ pubkey, writable });
  }
  return out;
}

/**
 * When both `vm.authority` and `vm.authority_keypair` are set they must name
 * the same key.
 */
export async function validateAuthorityBinding(
  doc: AccountsDocument,
  resolveKeypair: PubkeyResolver = createKeypairResolver()
): Promise<void> {
  const { authority, authorityKeypair } = doc.accounts.vm;
  if (!authority || !authorityKeypair) return;
  const keypairPubkey = await resolveKeypair(resolveAccountsPath(doc.path, authorityKeypair));
  if (keypairPubkey !== authority) {
    throw new DerivationError(
      'vm.authority does not match vm.authority_keypair pubkey; update accounts file or signer path'
    );
  }
}

/**
 * Authority for derivation: `vm.authority`, else the key of
 * `vm.authority_keypair`, else the key of the fallback signer.
 */
export async function resolveAuthorityPubkey(
  doc: AccountsDocument,
  resolveKeypair: PubkeyResolver,
  fallbackKeypair?: string
): Promise<string | undefined> {
  const { authority, authorityKeypair } = doc.accounts.vm;
  if (authority) return authority;
  if (authorityKeypair) return resolveKeypair(resolveAccountsPath(doc.path, authorityKeypair));
  if (fallbackKeypair) return resolveKeypair(fallbackKeypair);
  return undefined;
}

async function declaredPubkey(
  doc: AccountsDocument,
  entry: { pubkey?: string; keypair?: string },
  resolveKeypair: PubkeyResolver
): Promise<string | undefined> {
  if (entry.pubkey) return entry.pubkey;
  if (entry.keypair) return resolveKeypair(resolveAccountsPath(doc.path, entry.keypair));
  return undefined;
}

function checkDerivedSlot(seg: SegmentEntry): SegmentKindCode {
  const kind = segmentKindCode(seg.kind);
  if (kind === undefined) {
    throw new DerivationError(
      `Unable to derive segment ${seg.index}: unsupported kind '${seg.kind}' (expected weights|ram)`
    );
  }
  if (seg.slot === 1 && kind !== SEGMENT_KIND_CODES.weights) {
    throw new DerivationError(`derived mode requires the weights segment at slot 1; slot 1 holds ${seg.kind}`);
  }
  if (kind === SEGMENT_KIND_CODES.weights && seg.slot !== 1) {
    throw new DerivationError(
      `derived mode requires the weights segment at slot 1; segment ${seg.index} is at slot ${seg.slot}`
    );
  }
  if (seg.slot < MIN_SLOT || seg.slot > MAX_SLOT) {
    throw new DerivationError(
      `Unable to derive segment ${seg.index}: slot ${seg.slot} is out of range (${MIN_SLOT}..${MAX_SLOT})`
    );
  }
  const expectedWritable = kind === SEGMENT_KIND_CODES.ram;
  if (seg.writable !== expectedWritable) {
    throw new DerivationError(
      `segment ${seg.index} (${seg.kind}) must be ${expectedWritable ? 'writable' : 'readonly'} in derived mode; ` +
        'fix segment writable metadata'
    );
  }
  return kind;
}

function checkContiguous(segments: readonly MappedSegment[]): void {
  const seen = new Set<number>();
  for (const seg of segments) {
    if (seen.has(seg.slot)) {
      throw new DerivationError(
        `duplicate segment slot ${seg.slot} in derived mode; each mapped account must use a unique slot`
      );
    }
    seen.add(seg.slot);
  }
  segments.forEach((seg, i) => {
    const expected = i + 1;
    if (seg.slot !== expected) {
      throw new DerivationError(
        'derived mode requires contiguous segment slots starting at 1; ' +
          `missing slot ${expected} before configured slot ${seg.slot}`
      );
    }
  });
}

/**
 * Resolve the VM address and the mapped segment list for an accounts file.
 */
export async function accountsSegmentMetas(
  doc: AccountsDocument,
  options: SegmentMetaOptions = {}
): Promise<SegmentMetas> {
  const { cluster, vm, segments } = doc.accounts;
  const resolveKeypair = options.resolveKeypair ?? createKeypairResolver();
  await validateAuthorityBinding(doc, resolveKeypair);

  const programId = options.programId ?? cluster.programId ?? getRuntimeConfig().cluster.programId;
  const payer = options.payer ?? (cluster.payer ? resolveAccountsPath(doc.path, cluster.payer) : undefined);
  const seed = vm.seed;
  // Signer files are only read when addresses have to be derived
  const authorityPubkey =
    seed !== undefined ? await resolveAuthorityPubkey(doc, resolveKeypair, payer) : vm.authority;
  let vmPubkey = await declaredPubkey(doc, vm, resolveKeypair);

  let derive: ((seg: SegmentEntry) => Promise<string>) | undefined;
  if (seed !== undefined) {
    if (!authorityPubkey) {
      throw new DerivationError('Unable to derive VM address: missing authority pubkey');
    }
    const deriver = options.deriver ?? createAddressDeriver(vm.accountModel);
    const program = toPublicKey(programId, 'program_id');
    const authority = toPublicKey(authorityPubkey, 'vm.authority');

    const expectedVm = (await deriver.deriveVm(program, authority, seed)).toBase58();
    if (vmPubkey && vmPubkey !== expectedVm) {
      throw new DerivationError(
        'vm.pubkey does not match derived VM address for vm.seed/authority; remove vm.pubkey or fix vm.seed/authority'
      );
    }
    vmPubkey = expectedVm;
    derive = async (seg) => {
      const kind = checkDerivedSlot(seg);
      return (await deriver.deriveSegment(program, authority, seed, kind, seg.slot)).toBase58();
    };
    log.debug('Accounts', `Derived VM ${expectedVm} (${deriver.model}, seed ${seed})`);
  }
  if (!vmPubkey) {
    throw new AccountsError('accounts file missing vm pubkey/keypair (or vm.seed + authority)');
  }
  if (segments.length === 0) {
    throw new AccountsError('accounts file has no segments');
  }

  const resolved: MappedSegment[] = [];
  for (const seg of segments) {
    let pubkey = await declaredPubkey(doc, seg, resolveKeypair);
    if (derive) {
      const expected = await derive(seg);
      if (pubkey && pubkey !== expected) {
        throw new DerivationError(
          `segment ${seg.index} pubkey does not match derived address for vm.seed/authority/slot; ` +
            'remove segment pubkey/keypair or fix metadata'
        );
      }
      pubkey = expected;
    }
    if (!pubkey) {
      throw new AccountsError(`segment ${seg.index} missing pubkey/keypair (or derivation metadata)`);
    }
    resolved.push({ index: seg.index, slot: seg.slot, kind: seg.kind, writable: seg.writable, pubkey });
  }

  resolved.sort(derive ? (a, b) => a.slot - b.slot : (a, b) => a.index - b.index);
  if (derive) {
    checkContiguous(resolved);
  }

  return {
    info: {
      rpcUrl: cluster.rpcUrl,
      programId,
      payer,
      vmPubkey,
      authorityPubkey,
      vmSeed: seed,
    },
    segments: resolved,
    mapped: resolved.map(mappedLine),
  };
}
