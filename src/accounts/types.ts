/**
 * Accounts File Types
 *
 * Typed view of an accounts TOML file: the cluster a model is deployed to,
 * the VM account, and the segment accounts mapped into the VM's address
 * space.
 *
 * @module accounts/types
 */

/** `seeded` derives with create-with-seed; `pda` uses the legacy bump search. */
export type AccountModel = 'seeded' | 'pda';

export const ACCOUNT_MODELS: readonly AccountModel[] = ['seeded', 'pda'];

export const SEGMENT_KIND_CODES = {
  weights: 1,
  ram: 2,
} as const;

export type DerivedSegmentKind = keyof typeof SEGMENT_KIND_CODES;
export type SegmentKindCode = (typeof SEGMENT_KIND_CODES)[DerivedSegmentKind];

export const MIN_SLOT = 1;
export const MAX_SLOT = 15;

export interface ClusterEntry {
  rpcUrl?: string;
  programId?: string;
  /** Payer keypair path */
  payer?: string;
}

export interface VmEntry {
  pubkey?: string;
  keypair?: string;
  /** Unsigned 64-bit seed; its presence switches the file to derived mode */
  seed?: bigint;
  accountModel?: AccountModel;
  authority?: string;
  authorityKeypair?: string;
}

export interface SegmentEntry {
  index: number;
  slot: number;
  kind: string;
  writable: boolean;
  pubkey?: string;
  keypair?: string;
  bytes?: number;
}

export interface AccountsFile {
  cluster: ClusterEntry;
  vm: VmEntry;
  /** Sorted by index */
  segments: SegmentEntry[];
}

/** An accounts file together with where it was read from. */
export interface AccountsDocument {
  path: string;
  accounts: AccountsFile;
}

/** Resolves a keypair file to its base58 public key. */
export type PubkeyResolver = (keypairPath: string) => Promise<string>;
