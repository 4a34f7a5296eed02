/**
 * FBH1 Payload Envelope
 *
 * Optional 32-byte header in front of a packed payload:
 *
 *   magic:u32  version:u16  flags:u16  header_len:u32  schema_id:u32
 *   payload_len:u32  crc32:u32  schema_hash:u32  reserved:u32
 *
 * @module payload/envelope
 */

import { PayloadError } from '../errors/index.js';
import type { Manifest } from '../manifest/types.js';
import { getString, getTable } from '../manifest/values.js';
import { parseHash32, schemaHash32 } from '../schema/hash.js';
import { crc32 } from './crc32.js';

// ============================================================================
// Constants
// ============================================================================

/** 'FBH1' little-endian */
export const FBH1_MAGIC = 0x31484246;
export const FBH1_VERSION = 1;
export const FBH1_HEADER_LEN = 32;

export const FBH_FLAG_HAS_CRC32 = 1 << 0;
export const FBH_FLAG_HAS_SCHEMA_HASH = 1 << 1;

export const SCHEMA_HASH_MODES = ['auto', 'manifest', 'none'] as const;
export type SchemaHashMode = (typeof SCHEMA_HASH_MODES)[number];

export function isSchemaHashMode(value: unknown): value is SchemaHashMode {
  return typeof value === 'string' && SCHEMA_HASH_MODES.some((m) => m === value);
}

// ============================================================================
// Types
// ============================================================================

export interface EnvelopeHeader {
  magic: number;
  version: number;
  flags: number;
  headerLen: number;
  schemaId: number;
  payloadLen: number;
  crc32: number;
  schemaHash: number;
  reserved: number;
}

export interface WrapOptions {
  schemaId: number;
  /** Compute and store the payload CRC32 */
  crc?: boolean;
  /** Stored (and flagged) only when non-zero */
  schemaHash?: number;
}

export interface ParsedEnvelope {
  header: EnvelopeHeader;
  payload: Uint8Array;
  hasCrc: boolean;
  hasSchemaHash: boolean;
}

// ============================================================================
// Wrap / Parse
// ============================================================================

export function encodeEnvelopeHeader(payload: Uint8Array, options: WrapOptions): Uint8Array {
  let flags = 0;
  let crc = 0;
  if (options.crc) {
    flags |= FBH_FLAG_HAS_CRC32;
    crc = crc32(payload);
  }
  const schemaHash = options.schemaHash ?? 0;
  if (schemaHash !== 0) {
    flags |= FBH_FLAG_HAS_SCHEMA_HASH;
  }

  const header = new Uint8Array(FBH1_HEADER_LEN);
  const view = new DataView(header.buffer);
  view.setUint32(0, FBH1_MAGIC, true);
  view.setUint16(4, FBH1_VERSION, true);
  view.setUint16(6, flags, true);
  view.setUint32(8, FBH1_HEADER_LEN, true);
  view.setUint32(12, options.schemaId, true);
  view.setUint32(16, payload.length, true);
  view.setUint32(20, crc, true);
  view.setUint32(24, schemaHash >>> 0, true);
  view.setUint32(28, 0, true);
  return header;
}

/**
 * Prefix `payload` with an FBH1 header.
 */
export function wrapEnvelope(payload: Uint8Array, options: WrapOptions): Uint8Array {
  const header = encodeEnvelopeHeader(payload, options);
  const out = new Uint8Array(header.length + payload.length);
  out.set(header, 0);
  out.set(payload, header.length);
  return out;
}

export function hasEnvelope(bytes: Uint8Array): boolean {
  if (bytes.length < 4) return false;
  return new DataView(bytes.buffer, bytes.byteOffset, 4).getUint32(0, true) === FBH1_MAGIC;
}

/**
 * Split an enveloped buffer into header and payload, checking magic,
 * version, lengths and (when flagged) the CRC.
 */
export function parseEnvelope(bytes: Uint8Array): ParsedEnvelope {
  if (bytes.length < FBH1_HEADER_LEN) {
    throw new PayloadError(`envelope too short: ${bytes.length} < ${FBH1_HEADER_LEN}`);
  }
  const view = new DataView(bytes.buffer, bytes.byteOffset, bytes.byteLength);
  const header: EnvelopeHeader = {
    magic: view.getUint32(0, true),
    version: view.getUint16(4, true),
    flags: view.getUint16(6, true),
    headerLen: view.getUint32(8, true),
    schemaId: view.getUint32(12, true),
    payloadLen: view.getUint32(16, true),
    crc32: view.getUint32(20, true),
    schemaHash: view.getUint32(24, true),
    reserved: view.getUint32(28, true),
  };

  if (header.magic !== FBH1_MAGIC) {
    throw new PayloadError(`bad envelope magic 0x${header.magic.toString(16).toUpperCase()}`);
  }
  if (header.version !== FBH1_VERSION) {
    throw new PayloadError(`unsupported envelope version ${header.version}`);
  }
  if (header.headerLen < FBH1_HEADER_LEN) {
    throw new PayloadError(`envelope header_len ${header.headerLen} < ${FBH1_HEADER_LEN}`);
  }
  const end = header.headerLen + header.payloadLen;
  if (end > bytes.length) {
    throw new PayloadError(`envelope payload_len ${header.payloadLen} exceeds buffer`);
  }

  const payload = bytes.subarray(header.headerLen, end);
  const hasCrc = (header.flags & FBH_FLAG_HAS_CRC32) !== 0;
  if (hasCrc) {
    const actual = crc32(payload);
    if (actual !== header.crc32) {
      throw new PayloadError(
        `envelope crc32 mismatch: header 0x${header.crc32.toString(16)} != payload 0x${actual.toString(16)}`
      );
    }
  }

  return {
    header,
    payload,
    hasCrc,
    hasSchemaHash: (header.flags & FBH_FLAG_HAS_SCHEMA_HASH) !== 0,
  };
}

// ============================================================================
// Schema hash selection
// ============================================================================

/**
 * Hash value to embed for a mode. `manifest` reads `schema.custom.schema_hash32`
 * and yields 0 when it is absent; `none` always yields 0.
 */
export function resolveSchemaHash(manifest: Manifest, mode: string): number {
  switch (mode) {
    case 'none':
      return 0;
    case 'auto':
      return schemaHash32(manifest.raw);
    case 'manifest': {
      const value = getString(getTable(getTable(manifest.raw, 'schema') ?? {}, 'custom'), 'schema_hash32');
      return value === undefined ? 0 : parseHash32(value);
    }
    default:
      throw new PayloadError('schema-hash mode must be auto, manifest, or none');
  }
}
