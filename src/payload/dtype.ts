/**
 * Dtype Codec
 *
 * Little-endian packing of plain number arrays for every dtype a schema may
 * declare. Payload values are stored as-is: no quantization, no scaling.
 *
 * @module payload/dtype
 */

import { DTYPE_SIZES, type Dtype } from '../config/schema/index.js';
import { PayloadError } from '../errors/index.js';

// ============================================================================
// Float16
// ============================================================================

const f32Scratch = new Float32Array(1);
const u32Scratch = new Uint32Array(f32Scratch.buffer);

/**
 * Convert a float32 value to IEEE half-precision bits (round to nearest even).
 */
export function float32ToFloat16(value: number): number {
  f32Scratch[0] = value;
  const x = u32Scratch[0];

  const sign = (x >>> 16) & 0x8000;
  const exp = (x >>> 23) & 0xff;
  const mant = x & 0x7fffff;

  if (exp === 0xff) {
    return sign | 0x7c00 | (mant ? 0x200 : 0);
  }

  const e = exp - 127 + 15;
  if (e >= 0x1f) {
    return sign | 0x7c00;
  }

  if (e <= 0) {
    // Subnormal or underflow to signed zero
    if (e < -10) return sign;
    const m = mant | 0x800000;
    const shift = 14 - e;
    let half = m >>> shift;
    const rem = m & ((1 << shift) - 1);
    const halfway = 1 << (shift - 1);
    if (rem > halfway || (rem === halfway && (half & 1) === 1)) half++;
    return sign | half;
  }

  let half = (e << 10) | (mant >>> 13);
  const rem = mant & 0x1fff;
  // A carry out of the mantissa bumps the exponent, up to infinity
  if (rem > 0x1000 || (rem === 0x1000 && (half & 1) === 1)) half++;
  return sign | half;
}

export function float16ToFloat32(h: number): number {
  const sign = (h >> 15) & 0x1;
  const exp = (h >> 10) & 0x1f;
  const mant = h & 0x3ff;

  if (exp === 0) {
    if (mant === 0) return sign ? -0 : 0;
    const f = (mant / 1024) * Math.pow(2, -14);
    return sign ? -f : f;
  }
  if (exp === 31) {
    return mant ? NaN : sign ? -Infinity : Infinity;
  }

  const f = (1 + mant / 1024) * Math.pow(2, exp - 15);
  return sign ? -f : f;
}

// ============================================================================
// Integer ranges
// ============================================================================

const INT_RANGES: Partial<Record<Dtype, readonly [number, number]>> = {
  i8: [-128, 127],
  u8: [0, 255],
  i16: [-32768, 32767],
  i32: [-2147483648, 2147483647],
  u32: [0, 0xffffffff],
};

function checkValue(dtype: Dtype, value: unknown, index: number): number {
  if (typeof value !== 'number' || Number.isNaN(value)) {
    throw new PayloadError(`value at index ${index} is not a number`);
  }
  const range = INT_RANGES[dtype];
  if (range) {
    if (!Number.isInteger(value)) {
      throw new PayloadError(`value ${value} at index ${index} is not an integer for ${dtype}`);
    }
    if (value < range[0] || value > range[1]) {
      throw new PayloadError(`value ${value} at index ${index} out of range for ${dtype}`);
    }
  }
  return value;
}

// ============================================================================
// Encode / Decode
// ============================================================================

export function dtypeSize(dtype: Dtype): number {
  return DTYPE_SIZES[dtype];
}

/**
 * Pack values as consecutive little-endian elements of `dtype`.
 */
export function encodeValues(dtype: Dtype, values: readonly unknown[]): Uint8Array {
  const size = DTYPE_SIZES[dtype];
  const out = new Uint8Array(values.length * size);
  const view = new DataView(out.buffer);

  for (let i = 0; i < values.length; i++) {
    const v = checkValue(dtype, values[i], i);
    const at = i * size;
    switch (dtype) {
      case 'i8':
        view.setInt8(at, v);
        break;
      case 'u8':
        view.setUint8(at, v);
        break;
      case 'i16':
        view.setInt16(at, v, true);
        break;
      case 'i32':
        view.setInt32(at, v, true);
        break;
      case 'u32':
        view.setUint32(at, v, true);
        break;
      case 'f32':
        view.setFloat32(at, v, true);
        break;
      case 'f16':
        view.setUint16(at, float32ToFloat16(v), true);
        break;
    }
  }
  return out;
}

/**
 * Read `count` elements (default: as many as fit) from `bytes`.
 */
export function decodeValues(dtype: Dtype, bytes: Uint8Array, count?: number): number[] {
  const size = DTYPE_SIZES[dtype];
  const available = Math.floor(bytes.length / size);
  const n = count ?? available;
  if (n > available) {
    throw new PayloadError(`need ${n * size} bytes for ${n} x ${dtype}, have ${bytes.length}`);
  }

  const view = new DataView(bytes.buffer, bytes.byteOffset, bytes.byteLength);
  const out: number[] = new Array(n);
  for (let i = 0; i < n; i++) {
    const at = i * size;
    switch (dtype) {
      case 'i8':
        out[i] = view.getInt8(at);
        break;
      case 'u8':
        out[i] = view.getUint8(at);
        break;
      case 'i16':
        out[i] = view.getInt16(at, true);
        break;
      case 'i32':
        out[i] = view.getInt32(at, true);
        break;
      case 'u32':
        out[i] = view.getUint32(at, true);
        break;
      case 'f32':
        out[i] = view.getFloat32(at, true);
        break;
      case 'f16':
        out[i] = float16ToFloat32(view.getUint16(at, true));
        break;
    }
  }
  return out;
}
