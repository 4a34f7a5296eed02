/**
 * Tensor shape helpers for conversion input.
 *
 * Input tensors arrive as nested JSON arrays (or already-flat arrays) and are
 * flattened row-major after checking them against the expected dimensions.
 *
 * @module converter/tensors
 */

import { ConversionError } from '../errors/index.js';

function toNumber(value: unknown, name: string): number {
  if (typeof value !== 'number' || !Number.isFinite(value)) {
    throw new ConversionError(`${name} must contain finite numbers`);
  }
  return value;
}

function isNested(data: unknown[]): boolean {
  return data.length > 0 && Array.isArray(data[0]);
}

/**
 * Exact-length vector. A scalar is accepted when length is 1.
 */
export function flattenVector(data: unknown, length: number, name: string): number[] {
  if (Array.isArray(data)) {
    if (data.length !== length) {
      throw new ConversionError(`${name} length mismatch: ${data.length} != ${length}`);
    }
    return data.map((v) => toNumber(v, name));
  }
  if (length === 1 && data !== undefined) {
    return [toNumber(data, name)];
  }
  throw new ConversionError(`${name} must be a list`);
}

/**
 * rows x cols matrix, given as a 2-D list or a flat list of rows*cols.
 */
export function flattenMatrix(data: unknown, rows: number, cols: number, name: string): number[] {
  if (!Array.isArray(data)) {
    throw new ConversionError(`${name} must be a list or 2D list`);
  }
  if (isNested(data)) {
    if (data.length !== rows) {
      throw new ConversionError(`${name} row count mismatch: ${data.length} != ${rows}`);
    }
    const flat: number[] = [];
    for (const row of data) {
      if (!Array.isArray(row) || row.length !== cols) {
        throw new ConversionError(`${name} column count mismatch`);
      }
      for (const v of row) flat.push(toNumber(v, name));
    }
    return flat;
  }
  if (data.length !== rows * cols) {
    throw new ConversionError(`${name} length mismatch: ${data.length} != ${rows * cols}`);
  }
  return data.map((v) => toNumber(v, name));
}

/**
 * Conv1d kernel [out_ch][in_ch][kernel]; each output channel may also be flat.
 */
export function flattenConv1d(
  data: unknown,
  outChannels: number,
  inChannels: number,
  kernel: number,
  name: string
): number[] {
  const total = outChannels * inChannels * kernel;
  if (Array.isArray(data) && data.length > 0 && !isNested(data)) {
    if (data.length !== total) {
      throw new ConversionError(`${name} length mismatch: ${data.length} != ${total}`);
    }
    return data.map((v) => toNumber(v, name));
  }
  if (!Array.isArray(data) || data.length !== outChannels) {
    throw new ConversionError(`${name} outer dimension mismatch`);
  }
  const flat: number[] = [];
  for (const oc of data) {
    if (!Array.isArray(oc)) {
      throw new ConversionError(`${name} must be a nested list`);
    }
    if (isNested(oc)) {
      if (oc.length !== inChannels) {
        throw new ConversionError(`${name} in_channel count mismatch`);
      }
      for (const chan of oc) {
        if (!Array.isArray(chan) || chan.length !== kernel) {
          throw new ConversionError(`${name} kernel length mismatch`);
        }
        for (const v of chan) flat.push(toNumber(v, name));
      }
    } else {
      if (oc.length !== inChannels * kernel) {
        throw new ConversionError(`${name} flattened length mismatch`);
      }
      for (const v of oc) flat.push(toNumber(v, name));
    }
  }
  return flat;
}

/**
 * Single-input-channel conv2d kernel [out_ch][k][k]. A [out_ch][1][k][k]
 * layout is unwrapped.
 */
export function flattenConv2d(data: unknown, outChannels: number, kernel: number, name: string): number[] {
  const total = outChannels * kernel * kernel;
  if (Array.isArray(data) && data.length > 0 && !isNested(data)) {
    if (data.length !== total) {
      throw new ConversionError(`${name} length mismatch: ${data.length} != ${total}`);
    }
    return data.map((v) => toNumber(v, name));
  }
  if (!Array.isArray(data) || data.length !== outChannels) {
    throw new ConversionError(`${name} outer dimension mismatch`);
  }
  const flat: number[] = [];
  for (const entry of data) {
    let oc: unknown = entry;
    if (Array.isArray(oc) && oc.length === 1 && Array.isArray(oc[0]) && isNested(oc[0])) {
      oc = oc[0];
    }
    if (!Array.isArray(oc)) {
      throw new ConversionError(`${name} must be a nested list`);
    }
    if (isNested(oc)) {
      if (oc.length !== kernel) {
        throw new ConversionError(`${name} kernel rows mismatch`);
      }
      for (const row of oc) {
        if (!Array.isArray(row) || row.length !== kernel) {
          throw new ConversionError(`${name} kernel cols mismatch`);
        }
        for (const v of row) flat.push(toNumber(v, name));
      }
    } else {
      if (oc.length !== kernel * kernel) {
        throw new ConversionError(`${name} flattened length mismatch`);
      }
      for (const v of oc) flat.push(toNumber(v, name));
    }
  }
  return flat;
}

/**
 * [rows, cols] of a rectangular 2-D list, or null.
 */
export function matrixShape(data: unknown): [number, number] | null {
  if (!Array.isArray(data) || !isNested(data)) return null;
  const first = data[0];
  const cols = Array.isArray(first) ? first.length : 0;
  for (const row of data) {
    if (!Array.isArray(row) || row.length !== cols) return null;
  }
  return [data.length, cols];
}
