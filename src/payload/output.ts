/**
 * Output Decoding
 *
 * Reads the guest's output region out of a VM account image and renders
 * it in a chosen format.
 *
 * @module payload/output
 */

import { Buffer } from 'buffer';

import { VM_HEADER_SIZE, type Dtype } from '../config/schema/index.js';
import { PayloadError } from '../errors/index.js';
import type { AbiSection, SchemaSection } from '../manifest/types.js';
import { product } from '../manifest/values.js';
import { parseControlBlock, type ControlBlock } from './control.js';
import { decodeValues, dtypeSize } from './dtype.js';

export const OUTPUT_FORMATS = ['auto', 'hex', 'raw', 'u8', 'i8', 'i16', 'i32', 'u32', 'f32'] as const;
export type OutputFormat = (typeof OUTPUT_FORMATS)[number];

export function isOutputFormat(value: unknown): value is OutputFormat {
  return typeof value === 'string' && OUTPUT_FORMATS.some((f) => f === value);
}

export interface OutputInfo {
  dtype: Dtype;
  /** Element count from the output shape */
  count: number;
}

/**
 * Output dtype and element count declared by a schema. Custom schemas
 * produce `output_blob_size` bytes.
 */
export function schemaOutputInfo(schema: SchemaSection): OutputInfo {
  if (schema.type === 'custom') {
    return { dtype: 'u8', count: schema.outputBlobSize };
  }
  return { dtype: schema.outputDtype, count: product(schema.outputShape) };
}

/**
 * Render output bytes. Typed formats decode at most `count` elements and
 * never more than fit in `data`.
 */
export function decodeOutput(data: Uint8Array, format: Exclude<OutputFormat, 'auto'>, count?: number): string {
  if (format === 'hex') return Buffer.from(data).toString('hex');
  if (format === 'raw') return '<raw>';
  if (format === 'u8') return JSON.stringify(Array.from(data));

  const maxItems = Math.floor(data.length / dtypeSize(format));
  const n = count === undefined || count > maxItems ? maxItems : count;
  if (n <= 0) return '[]';
  return JSON.stringify(decodeValues(format, data, n));
}

export function resolveOutputFormat(format: OutputFormat, schema: SchemaSection): Exclude<OutputFormat, 'auto'> {
  if (format !== 'auto') return format;
  const { dtype } = schemaOutputInfo(schema);
  // f16 has no text rendering of its own
  return dtype !== 'f16' ? dtype : 'hex';
}

export interface VmOutput {
  control: ControlBlock;
  outputLen: number;
  bytes: Uint8Array;
}

/**
 * Slice the output region out of raw VM account data (header included).
 * With `useMax`, a zero `output_len` reads the whole `abi.output_max`.
 */
export function readVmOutput(accountData: Uint8Array, abi: AbiSection, options: { useMax?: boolean } = {}): VmOutput {
  if (accountData.length < VM_HEADER_SIZE) {
    throw new PayloadError('VM account data too small');
  }
  const scratch = accountData.subarray(VM_HEADER_SIZE);
  const control = parseControlBlock(scratch, abi.controlOffset);

  let outputLen = control.outputLen;
  if (outputLen === 0 && options.useMax) {
    outputLen = abi.outputMax;
  }
  const end = abi.outputOffset + outputLen;
  if (end > scratch.length) {
    throw new PayloadError('output buffer out of bounds');
  }
  return { control, outputLen, bytes: scratch.slice(abi.outputOffset, end) };
}
