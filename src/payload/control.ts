/**
 * Control Block
 *
 * The host/guest handshake at `abi.control_offset` in VM scratch:
 * twelve u32 fields followed by one u64, little-endian. Only the first
 * 56 bytes are defined; the rest of `control_size` stays zero.
 *
 * @module payload/control
 */

import { ABI_VERSION, FBM1_MAGIC, MIN_CONTROL_SIZE, VM_HEADER_SIZE } from '../config/schema/index.js';
import { PayloadError } from '../errors/index.js';
import type { AbiSection } from '../manifest/types.js';

export interface ControlBlock {
  magic: number;
  abiVersion: number;
  flags: number;
  status: number;
  inputPtr: number;
  inputLen: number;
  outputPtr: number;
  outputLen: number;
  scratchPtr: number;
  scratchLen: number;
  userPtr: number;
  userLen: number;
  reserved0: bigint;
}

export interface ControlPointers {
  inputPtr: number;
  inputLen: number;
  outputPtr: number;
  outputLen: number;
}

const U32_FIELDS = [
  'magic',
  'abiVersion',
  'flags',
  'status',
  'inputPtr',
  'inputLen',
  'outputPtr',
  'outputLen',
  'scratchPtr',
  'scratchLen',
  'userPtr',
  'userLen',
] as const;

function checkU32(name: string, value: number): void {
  if (!Number.isInteger(value) || value < 0 || value > 0xffffffff) {
    throw new PayloadError(`${name} must fit in u32`);
  }
}

/**
 * Encode a fresh control block of `controlSize` bytes.
 */
export function buildControlBlock(controlSize: number, pointers: ControlPointers): Uint8Array {
  if (controlSize < MIN_CONTROL_SIZE) {
    throw new PayloadError(`abi.control_size must be >= ${MIN_CONTROL_SIZE}`);
  }
  checkU32('input_ptr', pointers.inputPtr);
  checkU32('input_len', pointers.inputLen);
  checkU32('output_ptr', pointers.outputPtr);
  checkU32('output_len', pointers.outputLen);

  const buf = new Uint8Array(controlSize);
  const view = new DataView(buf.buffer);
  const words = [
    FBM1_MAGIC,
    ABI_VERSION,
    0,
    0,
    pointers.inputPtr,
    pointers.inputLen,
    pointers.outputPtr,
    pointers.outputLen,
    0,
    0,
    0,
    0,
  ];
  words.forEach((w, i) => view.setUint32(i * 4, w, true));
  view.setBigUint64(48, 0n, true);
  return buf;
}

/**
 * Decode the control block found at `offset` inside a scratch image.
 */
export function parseControlBlock(scratch: Uint8Array, offset: number): ControlBlock {
  if (offset < 0 || offset + MIN_CONTROL_SIZE > scratch.length) {
    throw new PayloadError('control block out of bounds');
  }
  const view = new DataView(scratch.buffer, scratch.byteOffset + offset, MIN_CONTROL_SIZE);
  const block: ControlBlock = {
    magic: 0,
    abiVersion: 0,
    flags: 0,
    status: 0,
    inputPtr: 0,
    inputLen: 0,
    outputPtr: 0,
    outputLen: 0,
    scratchPtr: 0,
    scratchLen: 0,
    userPtr: 0,
    userLen: 0,
    reserved0: view.getBigUint64(48, true),
  };
  U32_FIELDS.forEach((field, i) => {
    block[field] = view.getUint32(i * 4, true);
  });
  return block;
}

// ============================================================================
// Staging
// ============================================================================

/** One write into the VM account, offsets already include the VM header. */
export interface StagedWrite {
  label: 'input' | 'control';
  offset: number;
  data: Uint8Array;
}

/**
 * Writes that place `input` and a matching control block in VM scratch,
 * input first.
 */
export function planInputStaging(abi: AbiSection, input: Uint8Array): StagedWrite[] {
  if (input.length > abi.inputMax) {
    throw new PayloadError(`input payload is ${input.length} bytes, exceeds abi.input_max ${abi.inputMax}`);
  }
  if (abi.outputMax <= 0) {
    throw new PayloadError('abi.output_max must be positive');
  }
  const control = buildControlBlock(abi.controlSize, {
    inputPtr: abi.inputOffset,
    inputLen: input.length,
    outputPtr: abi.outputOffset,
    outputLen: 0,
  });
  return [
    { label: 'input', offset: VM_HEADER_SIZE + abi.inputOffset, data: input },
    { label: 'control', offset: VM_HEADER_SIZE + abi.controlOffset, data: control },
  ];
}
