/**
 * Int8 / Q16 Quantizer
 *
 * Per-tensor symmetric int8 quantization with a Q16 scale, and Q16 encoding
 * of biases and tree thresholds. All rounding is half-to-even.
 *
 * @module converter/quantizer
 */

import { Q16_ONE } from '../config/schema/index.js';
import { ConversionError } from '../errors/index.js';

const I32_MIN = -0x8000_0000;
const I32_MAX = 0x7fff_ffff;

/**
 * Round to nearest, ties to even.
 */
export function roundHalfEven(x: number): number {
  const floor = Math.floor(x);
  const diff = x - floor;
  if (diff > 0.5) return floor + 1;
  if (diff < 0.5) return floor;
  return floor % 2 === 0 ? floor : floor + 1;
}

/**
 * Scale that maps max|w| onto 127, floored at 1. All-zero input gets 1.0.
 */
export function computeScaleQ16(values: ArrayLike<number>): number {
  let maxAbs = 0;
  for (let i = 0; i < values.length; i++) {
    const a = Math.abs(values[i]);
    if (a > maxAbs) maxAbs = a;
  }
  if (maxAbs === 0) return Q16_ONE;
  return Math.max(1, roundHalfEven((maxAbs / 127) * Q16_ONE));
}

export interface QuantizeResult {
  values: Int8Array;
  scaleQ16: number;
}

/**
 * Quantize to int8. A supplied scale is used as-is; otherwise one is derived
 * from the data. Empty input keeps the unit scale.
 */
export function quantizeI8(values: ArrayLike<number>, scaleQ16?: number): QuantizeResult {
  if (values.length === 0) {
    return { values: new Int8Array(0), scaleQ16: Q16_ONE };
  }
  if (scaleQ16 !== undefined && (!Number.isInteger(scaleQ16) || scaleQ16 < 0)) {
    throw new ConversionError(`scale_q16 must be a non-negative integer, got ${scaleQ16}`);
  }
  const scale = scaleQ16 ?? computeScaleQ16(values);
  const scaleReal = scale === 0 ? 1 : scale / Q16_ONE;

  const out = new Int8Array(values.length);
  for (let i = 0; i < values.length; i++) {
    const q = roundHalfEven(values[i] / scaleReal);
    out[i] = q > 127 ? 127 : q < -128 ? -128 : q;
  }
  return { values: out, scaleQ16: scale };
}

export function dequantizeI8(values: ArrayLike<number>, scaleQ16: number): Float64Array {
  const scaleReal = scaleQ16 / Q16_ONE;
  const out = new Float64Array(values.length);
  for (let i = 0; i < values.length; i++) {
    out[i] = values[i] * scaleReal;
  }
  return out;
}

/**
 * Encode a real value as a signed 32-bit Q16 integer.
 */
export function toQ16(value: number, name = 'value'): number {
  const q = roundHalfEven(value * Q16_ONE);
  if (!Number.isFinite(q) || q < I32_MIN || q > I32_MAX) {
    throw new ConversionError(`${name} ${value} does not fit in i32 Q16`);
  }
  return q;
}

export function toQ16Array(values: ArrayLike<number>, name: string): Int32Array {
  const out = new Int32Array(values.length);
  for (let i = 0; i < values.length; i++) {
    out[i] = toQ16(values[i], name);
  }
  return out;
}

export function fromQ16(value: number): number {
  return value / Q16_ONE;
}
