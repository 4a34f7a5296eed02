/**
 * kiln - manifest-driven weight compiler and account derivation for
 * quantized models on an on-chain VM.
 *
 * @module kiln
 */

export const KILN_VERSION = '0.1.0';

export * from './errors/index.js';
export * from './debug/index.js';
export * from './config/index.js';

// Manifest and schema
export * from './manifest/index.js';
export * from './schema/hash.js';

// Weights
export * from './converter/index.js';
export * from './guest/index.js';

// Payloads
export * from './payload/index.js';

// Accounts and deployment
export * from './accounts/index.js';
export * from './registry/index.js';
export * from './tools/index.js';
