/**
 * Manifest Constants Schema
 *
 * Allowed enum values, dtype sizes and ABI defaults shared by the manifest
 * validator, the converter, the payload codec and the guest config compiler.
 *
 * @module config/schema/manifest-constants
 */

// =============================================================================
// Enumerations
// =============================================================================

export const ALLOWED_ARCH = ['rv64imac'] as const;
export const ALLOWED_ENDIANNESS = ['little'] as const;
export const SCHEMA_TYPES = ['vector', 'time_series', 'graph', 'custom'] as const;
export const QUANTIZATION_KINDS = ['q8', 'q4', 'f16', 'f32', 'custom'] as const;
export const HEADER_FORMATS = ['none', 'rvcd-v1'] as const;
export const SEGMENT_KINDS = ['scratch', 'weights', 'ram', 'input', 'output', 'custom'] as const;
export const SEGMENT_ACCESS = ['ro', 'rw', 'wo'] as const;
export const VALIDATION_MODES = ['minimal', 'guest'] as const;
export const PROFILES = ['finance-int'] as const;

export type SchemaType = (typeof SCHEMA_TYPES)[number];
export type SegmentKind = (typeof SEGMENT_KINDS)[number];
export type SegmentAccess = (typeof SEGMENT_ACCESS)[number];

/** Byte width of every dtype a manifest may declare. */
export const DTYPE_SIZES = {
  f32: 4,
  f16: 2,
  i32: 4,
  i16: 2,
  i8: 1,
  u32: 4,
  u8: 1,
} as const;

export type Dtype = keyof typeof DTYPE_SIZES;

export function isDtype(value: unknown): value is Dtype {
  return typeof value === 'string' && Object.prototype.hasOwnProperty.call(DTYPE_SIZES, value);
}

/** Numeric schema id the guest compares against the payload header. */
export const SCHEMA_IDS: Record<SchemaType, number> = {
  vector: 0,
  time_series: 1,
  graph: 2,
  custom: 3,
};

export const SCALE_KEYS = [
  'w_scale_q16',
  'w1_scale_q16',
  'w2_scale_q16',
  'w3_scale_q16',
  'w4_scale_q16',
] as const;

export type ScaleKey = (typeof SCALE_KEYS)[number];

// =============================================================================
// ABI
// =============================================================================

/** 'FBM1' little-endian; first word of the control block */
export const FBM1_MAGIC = 0x314d4246;
export const ABI_VERSION = 1;

/** VM account header that precedes mapped memory on chain */
export const VM_HEADER_SIZE = 545;

export const MAX_SEGMENT_BYTES = 0x1000_0000;
export const MAX_SEGMENT_INDEX = 15;
export const DEFAULT_SCRATCH_MIN = 262_144;
export const MIN_CONTROL_SIZE = 64;
export const MIN_RESERVED_TAIL = 32;
export const REQUIRED_VADDR_BITS = 32;

export const DEFAULT_STACK_GUARD = 0x4000;
export const DEFAULT_HIDDEN_OFFSET = 0x3000;

/** Byte offset of weight data inside an rvcd-v1 blob */
export const RVCD_V1_DATA_OFFSET = 12;

/** Q16 fixed-point unit */
export const Q16_ONE = 65536;

/** Size of one packed tree node: feature, threshold, left, right, value (i32 each) */
export const TREE_NODE_BYTES = 20;

export const DEFAULT_CHUNK_SIZE = 1024 * 1024;
