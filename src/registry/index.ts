/**
 * Registry Module - Public API
 *
 * @module registry
 */

export {
  REGISTRY_VERSION,
  DEFAULT_DEPLOYMENT_STATE,
  type ProjectEntry,
  type RegistryDefaults,
  type RegistryData,
} from './types.js';

export { FileRegistryStore, MemoryRegistryStore, type RegistryStore } from './store.js';

export {
  defaultRegistryDefaults,
  parseRegistryText,
  renderRegistry,
  ProjectRegistry,
  type ProjectRegistryOptions,
} from './registry.js';

export {
  UNSPECIFIED_RPC,
  normalizeRpcUrl,
  fingerprintFromInfo,
  fingerprintFromAccounts,
  sameSeed,
  findSeedCollisions,
  describeCollision,
  assertNoSeedCollision,
  type SeedFingerprint,
  type ChainLookup,
  type AccountsLoader,
  type SeedCollision,
  type CollisionOptions,
} from './collision.js';

export { createRpcChainLookup } from './chain.js';
