/**
 * Accounts Module - Public API
 *
 * @module accounts
 */

export {
  ACCOUNT_MODELS,
  SEGMENT_KIND_CODES,
  MIN_SLOT,
  MAX_SLOT,
  type AccountModel,
  type DerivedSegmentKind,
  type SegmentKindCode,
  type ClusterEntry,
  type VmEntry,
  type SegmentEntry,
  type AccountsFile,
  type AccountsDocument,
  type PubkeyResolver,
} from './types.js';

export {
  VM_SEED_PREFIX,
  SEGMENT_SEED_PREFIX,
  MAX_SEED_LENGTH,
  MAX_VM_SEED,
  parseVmSeed,
  assertVmSeed,
  assertSlot,
  segmentKindCode,
  vmSeedString,
  segmentSeedString,
  seedBytes,
} from './seeds.js';

export {
  SeededAddressDeriver,
  LegacyBumpAddressDeriver,
  createAddressDeriver,
  toPublicKey,
  type AddressDeriver,
} from './derive.js';

export {
  parseAccountsText,
  loadAccounts,
  renderAccounts,
  writeAccounts,
  resolveAccountsPath,
  readKeypairPubkey,
  createKeypairResolver,
} from './file.js';

export {
  mappedLine,
  parseMappedLines,
  validateAuthorityBinding,
  resolveAuthorityPubkey,
  accountsSegmentMetas,
  type SegmentMetaOptions,
  type AccountsInfo,
  type MappedSegment,
  type SegmentMetas,
} from './metas.js';

export { MAX_RAM_SEGMENTS, randomVmSeed, initAccounts, type InitAccountsOptions } from './init.js';
